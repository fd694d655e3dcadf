import Joi from 'joi';

export const loginSchema = Joi.object({
  username: Joi.string().trim().min(1).max(120).required(),
  password: Joi.string().min(1).max(200).required(),
  deviceType: Joi.string().trim().max(40),
  deviceName: Joi.string().trim().allow('').max(120),
  timeout: Joi.number().integer().min(1000).max(30 * 24 * 60 * 60 * 1000)
});

export interface LoginBody {
  username: string;
  password: string;
  deviceType?: string;
  deviceName?: string;
  timeout?: number;
}
