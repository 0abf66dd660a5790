import { createHmac } from 'node:crypto';

export const SIGNATURE_HEADER = 'x-vigil-signature';

export function signHmacSha256(payload: string, secret: string): string {
  return createHmac('sha256', secret).update(payload).digest('hex');
}
