import { monotonicFactory } from 'ulid';

const CROCKFORD_BASE32 = /^[0123456789ABCDEFGHJKMNPQRSTVWXYZ]{26}$/;

const ulid = monotonicFactory();

/** Monotonic within a process: ids sort by creation. */
export function generateUlid(): string {
  return ulid();
}

export function isValidUlid(value: unknown): value is string {
  return typeof value === 'string' && CROCKFORD_BASE32.test(value);
}
