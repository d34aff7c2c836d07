import { ResultAsync, err, errAsync, ok, type Result } from 'neverthrow';

import type { DeepBookConfig } from './config';
import {
  DecodeError,
  ExecutionFailedError,
  IntentFinalizedError,
  MissingFirstCallError,
  MissingResultsError,
  MissingReturnValueError,
  SimulationRequestError,
} from './errors';
import type { IntentBuilder } from './intent';
import type { LedgerReader, SimulationOutcome } from './ledger';
import { getLogger } from './logger';

export interface ReturnDecoder<T> {
  parse(bytes: Uint8Array): T;
}

export type SimulationError =
  | IntentFinalizedError
  | SimulationRequestError
  | ExecutionFailedError
  | MissingResultsError
  | MissingFirstCallError
  | MissingReturnValueError
  | DecodeError;

/**
 * Dry-runs an intent as the configured caller and decodes the first return
 * value of its first call. Nothing is signed or submitted.
 */
export class SimulationExecutor {
  private readonly logger = getLogger('simulator');

  constructor(
    private readonly ledger: LedgerReader,
    private readonly config: DeepBookConfig,
  ) {}

  simulate<T>(intent: IntentBuilder, decoder: ReturnDecoder<T>, valueType: string): ResultAsync<T, SimulationError> {
    const finalized = intent.finalize();
    if (finalized.isErr()) {
      return errAsync(finalized.error);
    }

    const { transaction, commands } = finalized.value;
    this.logger.debug({ sender: this.config.address, commands: commands.length, valueType }, 'Simulating intent');

    return ResultAsync.fromPromise(
      this.ledger.simulate(this.config.address, transaction),
      (cause) => new SimulationRequestError(cause),
    ).andThen((outcome) => decodeFirstReturn(outcome, decoder, valueType));
  }
}

export function decodeFirstReturn<T>(
  outcome: SimulationOutcome,
  decoder: ReturnDecoder<T>,
  valueType: string,
): Result<T, SimulationError> {
  if (outcome.error) {
    return err(new ExecutionFailedError(outcome.error));
  }
  if (!outcome.results) {
    return err(new MissingResultsError());
  }

  const firstCall = outcome.results.at(0);
  if (!firstCall) {
    return err(new MissingFirstCallError());
  }

  const returnValue = firstCall.returnValues?.at(0);
  if (!returnValue) {
    return err(new MissingReturnValueError());
  }

  try {
    return ok(decoder.parse(returnValue.bytes));
  } catch (cause) {
    return err(new DecodeError(valueType, cause));
  }
}
