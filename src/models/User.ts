import mongoose, { Schema, Model } from 'mongoose';

export interface IUser {
  username: string;
  passwordHash: string;
  userType: string;
  isActive: boolean;
  lastLoginAt?: Date;
}

const UserSchema = new Schema<IUser>({
  username: { type: String, required: true, unique: true, lowercase: true, trim: true },
  passwordHash: { type: String, required: true },
  userType: { type: String, required: true, default: 'user', index: true },
  isActive: { type: Boolean, default: true },
  lastLoginAt: Date
}, { timestamps: true });

export const UserModel: Model<IUser> = mongoose.model<IUser>('User', UserSchema);
