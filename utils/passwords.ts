import bcrypt from "bcrypt";

export function hashPassword(password: string, rounds: number): Promise<string> {
  return bcrypt.hash(password, rounds);
}

export function verifyPassword(
  storedDigest: string,
  providedPassword: string
): Promise<boolean> {
  return bcrypt.compare(providedPassword, storedDigest);
}
