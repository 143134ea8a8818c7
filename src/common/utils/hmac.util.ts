import { createHmac } from 'crypto';

/** Hex HMAC-SHA256 over `<timestamp>.<body>`. */
export function signTimestampedPayload(secret: string, timestamp: number, body: string) {
  return createHmac('sha256', secret).update(`${timestamp}.${body}`).digest('hex');
}
