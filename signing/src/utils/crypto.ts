import crypto from 'crypto';

export const ACCESS_TOKEN_BYTES = 32;
const ACCESS_TOKEN_PATTERN = /^[A-Za-z0-9_-]{43,}$/;

export function sha256Hex(input: Buffer | string): string {
  return crypto.createHash('sha256').update(input).digest('hex');
}

/** Opaque recipient credential: 32 random bytes, base64url encoded (43 chars). */
export function generateAccessToken(): string {
  return crypto.randomBytes(ACCESS_TOKEN_BYTES).toString('base64url');
}

export function isWellFormedAccessToken(token: string | null | undefined): token is string {
  return typeof token === 'string' && ACCESS_TOKEN_PATTERN.test(token);
}

export function generateId(): string {
  return crypto.randomUUID();
}

export function timingSafeEqualHex(left: string, right: string): boolean {
  const leftBytes = Buffer.from(left, 'hex');
  const rightBytes = Buffer.from(right, 'hex');
  if (leftBytes.length === 0 || leftBytes.length !== rightBytes.length) {
    return false;
  }

  return crypto.timingSafeEqual(leftBytes, rightBytes);
}
