import Joi from 'joi';

const key = Joi.string().min(1).max(300);

export const userKeyParamsSchema = Joi.object({
  userKey: key.required()
});

export const sessionParamsSchema = Joi.object({
  userKey: key.required(),
  sessionKey: Joi.string().hex().length(32).required()
});
