import { randomInt } from 'crypto';

export const TRACKING_ID_LENGTH = 12;

/**
 * Digits only, so a customer quoting it in chat can be matched by the
 * digit-extraction lookup.
 */
export function generateTrackingId(length = TRACKING_ID_LENGTH): string {
  let id = '';
  for (let i = 0; i < length; i += 1) {
    id += randomInt(0, 10).toString();
  }
  return id;
}
