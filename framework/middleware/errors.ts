/**
 * Pipeline Errors
 *
 * Construction errors are fatal at startup. Everything deriving from
 * PipelineFault is fatal to one request only.
 */

import type { HookName } from './capabilities.ts';

export const PipelineErrorCodes = {
  CONSTRUCTION_FAILED: 'CONSTRUCTION_FAILED',
  INVALID_HOOK_RETURN: 'INVALID_HOOK_RETURN',
  UNHANDLED_VIEW_ERROR: 'UNHANDLED_VIEW_ERROR',
  HOOK_FAILED: 'HOOK_FAILED',
} as const;

export type PipelineErrorCode = (typeof PipelineErrorCodes)[keyof typeof PipelineErrorCodes];

/**
 * Base error for the framework
 */
export class StrataError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StrataError';
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * A middleware factory failed or threw; the pipeline cannot be built
 */
export class ConstructionError extends StrataError {
  constructor(
    public readonly unitName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Cannot construct middleware "${unitName}": ${message}`, PipelineErrorCodes.CONSTRUCTION_FAILED, options);
    this.name = 'ConstructionError';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), unit: this.unitName };
  }
}

/**
 * Fault that aborts a single request
 */
export class PipelineFault extends StrataError {
  constructor(message: string, code: PipelineErrorCode, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'PipelineFault';
  }
}

/**
 * A hook (or the view) returned something its phase does not accept
 */
export class InvalidHookReturn extends PipelineFault {
  constructor(
    public readonly source: string,
    public readonly hook: HookName | 'view-handler',
    public readonly received: string
  ) {
    super(`${source}.${hook} returned ${received}`, PipelineErrorCodes.INVALID_HOOK_RETURN);
    this.name = 'InvalidHookReturn';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), source: this.source, hook: this.hook, received: this.received };
  }
}

/**
 * The view threw and no exception hook produced a response
 */
export class UnhandledViewError extends PipelineFault {
  constructor(cause: unknown) {
    super(`Unhandled view error: ${describeError(cause)}`, PipelineErrorCodes.UNHANDLED_VIEW_ERROR, { cause });
    this.name = 'UnhandledViewError';
  }
}

/**
 * A middleware hook threw
 */
export class HookFailure extends PipelineFault {
  constructor(
    public readonly unitName: string,
    public readonly hook: HookName,
    cause: unknown
  ) {
    super(`${unitName}.${hook} hook failed: ${describeError(cause)}`, PipelineErrorCodes.HOOK_FAILED, { cause });
    this.name = 'HookFailure';
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), unit: this.unitName, hook: this.hook };
  }
}

/**
 * Short description of a value for error messages
 */
export function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';
  if (typeof value === 'object') {
    const name = value.constructor?.name;
    return name ? `an instance of ${name}` : 'an object';
  }
  return `a ${typeof value}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
