import { ClockError, errorMessage } from '../errors';

/** Returns a monotonic timestamp in nanoseconds. */
export type Clock = () => bigint;

export const NANOSEC_PER_SEC = 1_000_000_000;

export const monotonicNs: Clock = () => {
  try {
    return process.hrtime.bigint();
  } catch (err) {
    // All rate math depends on it, nothing sensible to fall back to
    throw new ClockError(errorMessage(err));
  }
};
