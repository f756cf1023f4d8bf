/**
 * @file Error types raised inside the core.
 *
 * Only startup failures surface to callers, and then as a failure result
 * from startSession. Everything else is logged where it happens.
 */

export class CoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A sensor source could not start (missing permission, device absent). */
export class SensorUnavailableError extends CoreError {
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`${source} unavailable: ${reason}`);
    this.source = source;
  }
}

export class SessionStateError extends CoreError {
  readonly state: string;

  constructor(operation: string, state: string) {
    super(`Cannot ${operation} while session is ${state}`);
    this.state = state;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
