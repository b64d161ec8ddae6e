export interface TimePort {
  now(): number;
  /** Nanoseconds from an arbitrary, monotonically increasing origin. */
  monotonicNs(): bigint;
}
