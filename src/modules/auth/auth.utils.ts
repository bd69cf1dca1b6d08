import * as crypto from 'node:crypto';

export function hmacSha256Hex(secret: string, value: string) {
  return crypto.createHmac('sha256', secret).update(value).digest('hex');
}
