import mongoose, { Schema, Model } from 'mongoose';

export interface ISession {
  // 'id' choca con el virtual de mongoose
  subjectId: string;
  userType: string;
  userKey: string;
  sessionKey: string;
  token: string;
  timeoutMillis: number;
  loginTimeMillis: number;
  lastAccessTimeMillis: number;
  deviceType: string;
  deviceName: string;
}

const SessionSchema = new Schema<ISession>({
  subjectId: { type: String, required: true },
  userType: { type: String, required: true },
  userKey: { type: String, required: true, index: true },
  sessionKey: { type: String, required: true, unique: true },
  token: { type: String, required: true },
  timeoutMillis: { type: Number, required: true },
  loginTimeMillis: { type: Number, required: true },
  lastAccessTimeMillis: { type: Number, required: true },
  deviceType: { type: String, default: '' },
  deviceName: { type: String, default: '' }
}, { timestamps: true });

export const SessionModel: Model<ISession> = mongoose.model<ISession>('AuthSession', SessionSchema);
