import bcrypt from 'bcryptjs';

export async function hashPassword(plain: string, rounds = 10) {
  const salt = await bcrypt.genSalt(rounds);
  return bcrypt.hash(plain, salt);
}
export async function comparePassword(plain: string, hash: string) {
  return bcrypt.compare(plain, hash);
}
