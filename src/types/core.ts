// types/core.ts — Fundamental types

export type EntityId = string;
export type Tick = number;
export type RoomId = number;
/** Epoch milliseconds. */
export type Timestamp = number;

export type Clock = () => Timestamp;

export const systemClock: Clock = () => Date.now();

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

/** Addition saturating at the signed 32-bit bounds. */
export function safeAdd(a: number, b: number): number {
  const sum = a + b;
  if (sum > INT32_MAX) return INT32_MAX;
  if (sum < INT32_MIN) return INT32_MIN;
  return sum;
}
