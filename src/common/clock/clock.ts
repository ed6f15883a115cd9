export const CLOCK = Symbol('CLOCK');

/**
 * Source of "now" for every expiry decision. Queries compare against this
 * value instead of the database clock so that tests can move time.
 */
export interface Clock {
  now(): Date;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60_000);
}
