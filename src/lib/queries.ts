import { bcs } from '@mysten/sui/bcs';
import type { Decimal } from 'decimal.js';
import { Result, errAsync, err, ok, type ResultAsync } from 'neverthrow';

import { toDecimal } from './amounts';
import type { Coin, DeepBookConfig } from './config';
import { ContextError, LookupMissError, type DeepBookError } from './errors';
import { IntentBuilder, OperationPlan, arg } from './intent';
import type { ObjectResolver } from './resolver';
import type { ReturnDecoder, SimulationExecutor } from './simulator';

// ============== Decoders ==============

const VecSet = bcs.struct('VecSet', { contents: bcs.vector(bcs.u128()) });

export const openOrdersDecoder: ReturnDecoder<string[]> = {
  parse: (bytes) => VecSet.parse(bytes).contents,
};

export const u64Decoder: ReturnDecoder<string> = {
  parse: (bytes) => bcs.u64().parse(bytes),
};

export const boolDecoder: ReturnDecoder<boolean> = {
  parse: (bytes) => bcs.bool().parse(bytes),
};

export interface ManagerBalance {
  coinType: string;
  balance: Decimal;
}

// ============== Queries ==============

/**
 * Read-only pool and balance manager views, answered by dry-running a single
 * call as the configured caller.
 */
export class DeepBookQueries {
  constructor(
    private readonly config: DeepBookConfig,
    private readonly resolver: ObjectResolver,
    private readonly simulator: SimulationExecutor,
  ) {}

  /**
   * Protocol ids of the manager's open orders in the pool.
   */
  accountOpenOrders(poolKey: string, managerKey: string): ResultAsync<string[], ContextError> {
    const label = `accountOpenOrders(${poolKey}, ${managerKey})`;
    const inputs = Result.combine([this.#pool(poolKey), this.#managerAddress(managerKey)]);
    if (inputs.isErr()) return this.#fail(label, inputs.error);
    const [{ address, typeArguments }, managerAddress] = inputs.value;

    return this.resolver
      .resolveShared(address, false)
      .andThen((pool) => this.resolver.resolveShared(managerAddress, false).map((manager) => ({ pool, manager })))
      .andThen(({ pool, manager }) => {
        const plan = new OperationPlan(label);
        return plan
          .call('accountOpenOrders', { pool: arg.object(pool), balanceManager: arg.object(manager) }, typeArguments)
          .map(() => plan);
      })
      .andThen((plan) => this.#run(plan, openOrdersDecoder, 'VecSet<u128>'))
      .mapErr((error) => new ContextError(label, error));
  }

  checkManagerBalance(managerKey: string, coinKey: string): ResultAsync<ManagerBalance, ContextError> {
    const label = `checkManagerBalance(${managerKey}, ${coinKey})`;
    const inputs = Result.combine([this.#managerAddress(managerKey), this.#coin(coinKey)]);
    if (inputs.isErr()) return this.#fail(label, inputs.error);
    const [managerAddress, coin] = inputs.value;

    return this.resolver
      .resolveShared(managerAddress, false)
      .andThen((manager) => {
        const plan = new OperationPlan(label);
        return plan.call('managerBalance', { balanceManager: arg.object(manager) }, [coin.type]).map(() => plan);
      })
      .andThen((plan) => this.#run(plan, u64Decoder, 'u64'))
      .map((units) => ({ coinType: coin.type, balance: toDecimal(units, coin) }))
      .mapErr((error) => new ContextError(label, error));
  }

  whitelisted(poolKey: string): ResultAsync<boolean, ContextError> {
    const label = `whitelisted(${poolKey})`;
    const pool = this.#pool(poolKey);
    if (pool.isErr()) return this.#fail(label, pool.error);
    const { address, typeArguments } = pool.value;

    return this.resolver
      .resolveShared(address, false)
      .andThen((poolArg) => {
        const plan = new OperationPlan(label);
        return plan.call('whitelisted', { pool: arg.object(poolArg) }, typeArguments).map(() => plan);
      })
      .andThen((plan) => this.#run(plan, boolDecoder, 'bool'))
      .mapErr((error) => new ContextError(label, error));
  }

  #run<T>(plan: OperationPlan, decoder: ReturnDecoder<T>, valueType: string): ResultAsync<T, DeepBookError> {
    const intent = new IntentBuilder(this.config.packageIds.deepbookPackageId, this.config.address);
    return intent.append(plan).asyncAndThen(() => this.simulator.simulate(intent, decoder, valueType));
  }

  #fail<T>(label: string, error: DeepBookError): ResultAsync<T, ContextError> {
    return errAsync(new ContextError(label, error));
  }

  #pool(poolKey: string): Result<{ address: string; typeArguments: string[] }, LookupMissError> {
    const pool = this.config.getPool(poolKey);
    if (!pool) return err(new LookupMissError('pool', poolKey));
    return Result.combine([this.#coin(pool.baseCoin), this.#coin(pool.quoteCoin)]).map(([base, quote]) => ({
      address: pool.address,
      typeArguments: [base.type, quote.type],
    }));
  }

  #coin(coinKey: string): Result<Coin, LookupMissError> {
    const coin = this.config.getCoin(coinKey);
    return coin ? ok(coin) : err(new LookupMissError('coin', coinKey));
  }

  #managerAddress(managerKey: string): Result<string, LookupMissError> {
    const manager = this.config.getBalanceManager(managerKey);
    return manager ? ok(manager.address) : err(new LookupMissError('balance manager', managerKey));
  }
}
