import argon2 from 'argon2';

export function hashPassword(password: string) {
  return argon2.hash(password, { type: argon2.argon2id });
}

export async function verifyPassword(hash: string, password: string) {
  if (!hash.startsWith('$argon2')) {
    return false;
  }
  return argon2.verify(hash, password);
}
