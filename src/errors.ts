/**
 * Process exit statuses. FAIL is reserved for unexpected errors;
 * every fatal StatsError maps to its own code.
 */
export enum ExitCode {
  OK = 0,
  FAIL = 1,
  FAIL_OPTION = 2,
  FAIL_XDP = 3,
  FAIL_BPF = 4,
  FAIL_MEM = 5,
  FAIL_CLOCK = 6,
}

export class StatsError extends Error {
  constructor(message: string, public readonly exitCode: ExitCode = ExitCode.FAIL) {
    super(message);
    this.name = 'StatsError';
  }
}

export class ConfigurationError extends StatsError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, ExitCode.FAIL_OPTION);
    this.name = 'ConfigurationError';
  }
}

/** Non-fatal: one group could not be read this cycle. */
export class CounterReadError extends StatsError {
  constructor(map: string, key: number, reason: string) {
    super(`lookup failed map:${map} key:0x${key.toString(16).toUpperCase()} (${reason})`);
    this.name = 'CounterReadError';
  }
}

export class ClockError extends StatsError {
  constructor(reason: string) {
    super(`Monotonic clock unavailable: ${reason}`, ExitCode.FAIL_CLOCK);
    this.name = 'ClockError';
  }
}

export class AllocationError extends StatsError {
  constructor(cpus: number, targets: number) {
    super(`Mem alloc error (nr_cpus:${cpus} targets:${targets})`, ExitCode.FAIL_MEM);
    this.name = 'AllocationError';
  }
}

export class BackendUnavailableError extends StatsError {
  constructor(reason: string) {
    super(`Counter backend unavailable: ${reason}`, ExitCode.FAIL_BPF);
    this.name = 'BackendUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
