/**
 * Host Monitor Errors
 *
 * Fatal errors (missing dependency, invalid argument, invalid configuration)
 * end the invocation with a non-zero exit code. Local errors (unreadable
 * source, sink failure) are absorbed by the component that hit them.
 */

export type MonitorErrorCode =
  | 'MISSING_DEPENDENCY'
  | 'UNREADABLE_SOURCE'
  | 'INVALID_ARGUMENT'
  | 'SINK_FAILURE'
  | 'INVALID_CONFIGURATION';

export abstract class MonitorError extends Error {
  abstract readonly code: MonitorErrorCode;
  /** Whether the error ends the invocation */
  abstract readonly fatal: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingDependencyError extends MonitorError {
  readonly code = 'MISSING_DEPENDENCY';
  readonly fatal = true;

  constructor(readonly missing: readonly string[]) {
    super(`Missing required commands: ${missing.join(', ')}`);
  }
}

export class UnreadableSourceError extends MonitorError {
  readonly code = 'UNREADABLE_SOURCE';
  readonly fatal = false;

  constructor(readonly source: string, reason: string, options?: { cause?: unknown }) {
    super(`${source}: ${reason}`, options);
  }
}

export class InvalidArgumentError extends MonitorError {
  readonly code = 'INVALID_ARGUMENT';
  readonly fatal = true;
}

export class SinkFailureError extends MonitorError {
  readonly code = 'SINK_FAILURE';
  readonly fatal = false;

  constructor(readonly sink: string, options?: { cause?: unknown }) {
    super(`Sink '${sink}' failed to deliver`, options);
  }
}

export class ConfigurationError extends MonitorError {
  readonly code = 'INVALID_CONFIGURATION';
  readonly fatal = true;

  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
