import type { Result } from 'neverthrow';

import type { SchemaError } from './errors';
import type { OperationPlan, ResultRef, StagedArg } from './intent';

/**
 * Access path to a balance manager with its objects already resolved.
 */
export type ResolvedAccess = { kind: 'owner' } | { kind: 'delegated'; tradeCap: StagedArg };

/**
 * Stage the call producing a TradeProof for `manager`.
 *
 * The owner proves ownership directly; a delegated trader presents its
 * TradeCap. The returned reference is the proof argument of the order call.
 */
export function deriveProof(
  plan: OperationPlan,
  manager: StagedArg,
  access: ResolvedAccess,
): Result<ResultRef, SchemaError> {
  if (access.kind === 'delegated') {
    return plan.call('generateProofAsTrader', { balanceManager: manager, tradeCap: access.tradeCap });
  }
  return plan.call('generateProofAsOwner', { balanceManager: manager });
}
