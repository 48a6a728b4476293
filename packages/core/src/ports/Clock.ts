export interface Clock {
  /** Current instant in epoch milliseconds. */
  now(): number;
}
