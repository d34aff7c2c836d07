/**
 * Error types for intent composition and simulation.
 *
 * Every failure carries a stable `code`. Layers add context with
 * `ContextError`, which keeps the code of the error it wraps and chains it
 * as `cause`, so the message reads outer-to-inner while callers can still
 * branch on the code of the original failure.
 */

export type ErrorCode =
  | 'LOOKUP_MISS'
  | 'INVALID_ADDRESS'
  | 'INVALID_NUMBER'
  | 'AMOUNT_OUT_OF_RANGE'
  | 'FETCH_FAILED'
  | 'OWNERSHIP_MISMATCH'
  | 'DECODE_FAILED'
  | 'MISSING_RESULTS'
  | 'MISSING_FIRST_CALL'
  | 'MISSING_RETURN_VALUE'
  | 'EXECUTION_FAILED'
  | 'INTENT_FINALIZED'
  | 'INVALID_CONFIGURATION'
  | 'INVALID_CALL';

export abstract class DeepBookError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============== Configuration ==============

export type LookupKind = 'coin' | 'pool' | 'balance manager';

export class LookupMissError extends DeepBookError {
  readonly code = 'LOOKUP_MISS';

  constructor(
    readonly kind: LookupKind,
    readonly key: string,
  ) {
    super(`Unknown ${kind} key: ${key}`);
  }
}

export class ConfigurationError extends DeepBookError {
  readonly code = 'INVALID_CONFIGURATION';
}

// ============== Parsing & Scaling ==============

export class AddressParseError extends DeepBookError {
  readonly code = 'INVALID_ADDRESS';

  constructor(readonly address: string) {
    super(`Invalid object address: "${address}"`);
  }
}

export class NumericParseError extends DeepBookError {
  readonly code = 'INVALID_NUMBER';

  constructor(
    readonly value: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Invalid numeric value "${value}": ${reason}`, options);
  }
}

export class AmountRangeError extends DeepBookError {
  readonly code = 'AMOUNT_OUT_OF_RANGE';

  constructor(
    readonly value: string,
    readonly limit: string,
  ) {
    super(`Amount ${value} is outside the representable range [0, ${limit}]`);
  }
}

// ============== Object Resolution ==============

export type Ownership = 'shared' | 'owned' | 'object-owned' | 'consensus' | 'immutable';

export class ObjectFetchError extends DeepBookError {
  readonly code = 'FETCH_FAILED';

  constructor(
    readonly objectId: string,
    cause: unknown,
  ) {
    super(`Failed to fetch object ${objectId}: ${describeCause(cause)}`, { cause });
  }
}

export class OwnershipMismatchError extends DeepBookError {
  readonly code = 'OWNERSHIP_MISMATCH';

  constructor(
    readonly objectId: string,
    readonly expected: 'shared' | 'owned',
    readonly actual: Ownership,
    /** Set when the object is address-owned, but not by the expected address */
    readonly owners?: { expected: string; actual: string },
  ) {
    super(
      owners
        ? `Object ${objectId} must be owned by ${owners.expected}, but the ledger reports it as owned by ${owners.actual}`
        : `Object ${objectId} must be ${expected}, but the ledger reports it as ${actual}`,
    );
  }
}

// ============== Composition ==============

export class SchemaError extends DeepBookError {
  readonly code = 'INVALID_CALL';
}

export class IntentFinalizedError extends DeepBookError {
  readonly code = 'INTENT_FINALIZED';

  constructor() {
    super('Intent has already been finalized; start a new one');
  }
}

// ============== Simulation ==============

export class SimulationRequestError extends DeepBookError {
  readonly code = 'FETCH_FAILED';

  constructor(cause: unknown) {
    super(`Simulation request failed: ${describeCause(cause)}`, { cause });
  }
}

export class ExecutionFailedError extends DeepBookError {
  readonly code = 'EXECUTION_FAILED';

  constructor(readonly reason: string) {
    super(`Simulation aborted: ${reason}`);
  }
}

export class MissingResultsError extends DeepBookError {
  readonly code = 'MISSING_RESULTS';

  constructor() {
    super('Simulation returned no results');
  }
}

export class MissingFirstCallError extends DeepBookError {
  readonly code = 'MISSING_FIRST_CALL';

  constructor() {
    super('Simulation results do not contain a first call');
  }
}

export class MissingReturnValueError extends DeepBookError {
  readonly code = 'MISSING_RETURN_VALUE';

  constructor() {
    super('First call of the simulation has no return value');
  }
}

export class DecodeError extends DeepBookError {
  readonly code = 'DECODE_FAILED';

  constructor(
    readonly valueType: string,
    cause: unknown,
  ) {
    super(`Failed to decode return value of type ${valueType}: ${describeCause(cause)}`, { cause });
  }
}

// ============== Context Chaining ==============

export class ContextError extends DeepBookError {
  readonly code: ErrorCode;

  constructor(
    readonly context: string,
    cause: DeepBookError,
  ) {
    super(`${context}: ${cause.message}`, { cause });
    this.code = cause.code;
  }
}

export function withContext(context: string): (error: DeepBookError) => ContextError {
  return (error) => new ContextError(context, error);
}

/**
 * Innermost error of a cause chain.
 */
export function rootCause(error: Error): Error {
  let current = error;
  while (current.cause instanceof Error) {
    current = current.cause;
  }
  return current;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
