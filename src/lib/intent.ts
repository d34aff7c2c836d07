import {
  Transaction,
  coinWithBalance,
  type TransactionArgument,
  type TransactionObjectArgument,
  type TransactionResult,
} from '@mysten/sui/transactions';
import { err, ok, type Result } from 'neverthrow';

import { parseObjectId } from './address';
import { CALL_SCHEMAS, type CallKind, type CallParam, type CallSchema } from './call-schemas';
import { GAS_BUDGET, SUI_FRAMEWORK_ADDRESS, U128_MAX, U64_MAX, U8_MAX } from './constants';
import { IntentFinalizedError, SchemaError } from './errors';
import type { ObjectArgument } from './resolver';

// ============== Staged Arguments ==============

export type PureArg =
  | { type: 'u8'; value: number }
  | { type: 'u64'; value: bigint }
  | { type: 'u128'; value: bigint }
  | { type: 'bool'; value: boolean }
  | { type: 'address'; value: string };

/** Output of an earlier call; `index` selects one value of a tuple return. */
export interface ResultRef {
  kind: 'result';
  step: number;
  index?: number;
}

export type StagedArg =
  | { kind: 'object'; object: ObjectArgument }
  | { kind: 'pure'; pure: PureArg }
  | { kind: 'coin'; coinType: string; balance: bigint }
  | ResultRef;

export type CallArgs<K extends CallKind> = { readonly [P in CallParam<K>]: StagedArg };

export const arg = {
  object: (object: ObjectArgument): StagedArg => ({ kind: 'object', object }),
  u8: (value: number): StagedArg => ({ kind: 'pure', pure: { type: 'u8', value } }),
  u64: (value: bigint): StagedArg => ({ kind: 'pure', pure: { type: 'u64', value } }),
  u128: (value: bigint): StagedArg => ({ kind: 'pure', pure: { type: 'u128', value } }),
  bool: (value: boolean): StagedArg => ({ kind: 'pure', pure: { type: 'bool', value } }),
  address: (value: string): StagedArg => ({ kind: 'pure', pure: { type: 'address', value } }),
  /** Coin of `coinType` split from the sender's wallet at build time */
  coin: (coinType: string, balance: bigint): StagedArg => ({ kind: 'coin', coinType, balance }),
  nested: (ref: ResultRef, index: number): ResultRef => ({ kind: 'result', step: ref.step, index }),
};

export type StagedStep =
  | { kind: 'moveCall'; call: CallKind; typeArguments: string[]; arguments: StagedArg[] }
  | { kind: 'transfer'; objects: ResultRef[]; recipient: string };

// ============== Operation Plan ==============

/**
 * The calls of one logical operation, staged before anything touches the
 * intent. Result references point at steps of the same plan, and every pure
 * value is range-checked here so that appending an accepted plan cannot fail.
 */
export class OperationPlan {
  readonly #steps: StagedStep[] = [];

  constructor(readonly label: string) {}

  get steps(): readonly StagedStep[] {
    return this.#steps;
  }

  call<K extends CallKind>(kind: K, args: CallArgs<K>, typeArguments: string[] = []): Result<ResultRef, SchemaError> {
    const schema: CallSchema = CALL_SCHEMAS[kind];
    const name = `${schema.module}::${schema.function}`;

    if (typeArguments.length !== schema.typeParams) {
      return err(
        new SchemaError(`${name} takes ${schema.typeParams} type arguments, got ${typeArguments.length}`),
      );
    }

    const named: Readonly<Record<string, StagedArg>> = args;
    const extra = Object.keys(named).filter((key) => !schema.params.includes(key));
    if (extra.length > 0) {
      return err(new SchemaError(`${name} has no parameter ${extra.join(', ')}`));
    }

    const ordered: StagedArg[] = [];
    for (const param of schema.params) {
      const value = named[param];
      if (!value) {
        return err(new SchemaError(`${name} is missing argument ${param}`));
      }
      if (value.kind === 'result' && !this.#producesValue(value.step)) {
        return err(new SchemaError(`${name}: ${param} refers to step ${value.step}, which has no result`));
      }
      const invalid = describeInvalid(value);
      if (invalid) {
        return err(new SchemaError(`${name}: ${param} ${invalid}`));
      }
      ordered.push(value);
    }

    this.#steps.push({ kind: 'moveCall', call: kind, typeArguments: [...typeArguments], arguments: ordered });
    return ok({ kind: 'result', step: this.#steps.length - 1 });
  }

  transfer(objects: ResultRef[], recipient: string): Result<void, SchemaError> {
    const dangling = objects.find((ref) => !this.#producesValue(ref.step));
    if (dangling) {
      return err(new SchemaError(`transfer refers to step ${dangling.step}, which has no result`));
    }
    if (parseObjectId(recipient).isErr()) {
      return err(new SchemaError(`transfer recipient "${recipient}" is not an address`));
    }
    this.#steps.push({ kind: 'transfer', objects: [...objects], recipient });
    return ok(undefined);
  }

  #producesValue(step: number): boolean {
    return Number.isInteger(step) && step >= 0 && this.#steps[step]?.kind === 'moveCall';
  }
}

// ============== Intent Builder ==============

/**
 * A step as appended to the intent. Result references are rebased to the
 * position of the producing command within the intent.
 */
export type ComposedCommand =
  | { kind: 'moveCall'; target: string; typeArguments: string[]; arguments: StagedArg[] }
  | { kind: 'transfer'; objects: ResultRef[]; recipient: string };

export interface FinalizedIntent {
  /** Handed over to the caller; the builder never touches it again. */
  transaction: Transaction;
  commands: readonly ComposedCommand[];
}

/**
 * Append-only, single-use call bundle. Plans are the only way in; finalize
 * hands out the transaction once, after which the builder refuses further
 * plans and its command list is fixed. Whatever the caller then does with the
 * transaction is outside the builder's record.
 */
export class IntentBuilder {
  readonly #transaction = new Transaction();
  readonly #commands: ComposedCommand[] = [];
  /** Move call results by command position */
  readonly #results = new Map<number, TransactionResult>();
  #finalized = false;

  constructor(
    readonly packageId: string,
    readonly sender: string,
  ) {}

  get finalized(): boolean {
    return this.#finalized;
  }

  commands(): readonly ComposedCommand[] {
    return [...this.#commands];
  }

  append(plan: OperationPlan): Result<void, IntentFinalizedError> {
    if (this.#finalized) {
      return err(new IntentFinalizedError());
    }

    const offset = this.#commands.length;
    const rebase = (ref: ResultRef): ResultRef => ({ ...ref, step: ref.step + offset });
    const rebaseArg = (value: StagedArg): StagedArg => (value.kind === 'result' ? rebase(value) : value);

    for (const step of plan.steps) {
      if (step.kind === 'moveCall') {
        const schema: CallSchema = CALL_SCHEMAS[step.call];
        const pkg = schema.package === 'deepbook' ? this.packageId : SUI_FRAMEWORK_ADDRESS;
        const target = `${pkg}::${schema.module}::${schema.function}`;
        const args = step.arguments.map(rebaseArg);

        const result = this.#transaction.moveCall({
          target,
          typeArguments: step.typeArguments,
          arguments: args.map((value) => this.#toTransactionArgument(value)),
        });
        this.#results.set(this.#commands.length, result);
        this.#commands.push({ kind: 'moveCall', target, typeArguments: step.typeArguments, arguments: args });
      } else {
        const objects = step.objects.map(rebase);
        this.#transaction.transferObjects(
          objects.map((ref) => this.#toResult(ref)),
          step.recipient,
        );
        this.#commands.push({ kind: 'transfer', objects, recipient: step.recipient });
      }
    }
    return ok(undefined);
  }

  finalize(): Result<FinalizedIntent, IntentFinalizedError> {
    if (this.#finalized) {
      return err(new IntentFinalizedError());
    }
    this.#finalized = true;
    this.#transaction.setSenderIfNotSet(this.sender);
    this.#transaction.setGasBudgetIfNotSet(GAS_BUDGET);
    return ok({ transaction: this.#transaction, commands: [...this.#commands] });
  }

  #toResult(ref: ResultRef): TransactionObjectArgument {
    const result = this.#results.get(ref.step);
    if (!result) {
      // Plans only hand out references to their own move calls.
      throw new Error(`No move call result at command ${ref.step}`);
    }
    return ref.index === undefined ? result : result[ref.index];
  }

  #toTransactionArgument(value: StagedArg): TransactionArgument {
    const tx = this.#transaction;
    switch (value.kind) {
      case 'object': {
        const object = value.object;
        return object.$kind === 'SharedObject'
          ? tx.sharedObjectRef({
              objectId: object.objectId,
              initialSharedVersion: object.initialSharedVersion,
              mutable: object.mutable,
            })
          : tx.objectRef({ objectId: object.objectId, version: object.version, digest: object.digest });
      }
      case 'pure':
        return pureArgument(tx, value.pure);
      case 'coin':
        return tx.add(coinWithBalance({ type: value.coinType, balance: value.balance }));
      case 'result':
        return this.#toResult(value);
    }
  }
}

function pureArgument(tx: Transaction, value: PureArg): TransactionArgument {
  switch (value.type) {
    case 'u8':
      return tx.pure.u8(value.value);
    case 'u64':
      return tx.pure.u64(value.value);
    case 'u128':
      return tx.pure.u128(value.value);
    case 'bool':
      return tx.pure.bool(value.value);
    case 'address':
      return tx.pure.address(value.value);
  }
}

function fits(value: bigint, limit: bigint): boolean {
  return value >= 0n && value <= limit;
}

function describeInvalid(value: StagedArg): string | undefined {
  if (value.kind === 'coin') {
    return fits(value.balance, U64_MAX) ? undefined : `balance ${value.balance} does not fit in u64`;
  }
  if (value.kind !== 'pure') {
    return undefined;
  }
  const pure = value.pure;
  switch (pure.type) {
    case 'u8':
      return Number.isInteger(pure.value) && pure.value >= 0 && pure.value <= U8_MAX
        ? undefined
        : `${pure.value} does not fit in u8`;
    case 'u64':
      return fits(pure.value, U64_MAX) ? undefined : `${pure.value} does not fit in u64`;
    case 'u128':
      return fits(pure.value, U128_MAX) ? undefined : `${pure.value} does not fit in u128`;
    case 'bool':
      return undefined;
    case 'address':
      return parseObjectId(pure.value).isOk() ? undefined : `"${pure.value}" is not an address`;
  }
}
