import { randomUUID } from 'crypto';

export const BOOKING_REFERENCE_PREFIX = 'BK';

/** Short code printed on tickets, e.g. `BK-3F9A1C07D2E4`. */
export function generateBookingReference(): string {
  const code = randomUUID().replace(/-/g, '').slice(0, 12).toUpperCase();
  return `${BOOKING_REFERENCE_PREFIX}-${code}`;
}
