import { UserModel } from '../../models/User.js';
import { comparePassword } from '../../utils/password.js';

export interface VerifiedUser {
  id: string;
  userType: string;
}

/** Comprueba usuario/contraseña; null si no son válidos */
export type CredentialVerifier = (username: string, password: string) => Promise<VerifiedUser | null>;

export const verifyUserCredentials: CredentialVerifier = async (username, password) => {
  const user = await UserModel.findOne({ username: username.trim().toLowerCase() });
  if (!user || !user.isActive) return null;
  if (!(await comparePassword(password, user.passwordHash))) return null;

  user.lastLoginAt = new Date();
  await user.save();
  return { id: user._id.toString(), userType: user.userType };
};
