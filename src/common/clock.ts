// src/common/clock.ts
export interface Clock {
  now(): Date;
}

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = { now: () => new Date() };

/** Fecha calendario (UTC) en formato YYYY-MM-DD. */
export function toDateOnly(d: Date): string {
  return d.toISOString().slice(0, 10);
}
