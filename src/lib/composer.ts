/**
 * DeepBook V3 operation composer
 *
 * Each operation looks up its keys, parses and scales its inputs, resolves
 * the objects it touches and stages every call in an OperationPlan. The plan
 * is appended to the intent only once all of that has succeeded, so a failed
 * operation leaves the intent exactly as it was.
 */

import { SUI_CLOCK_OBJECT_ID } from '@mysten/sui/utils';
import { Result, ResultAsync, err, errAsync, ok, okAsync } from 'neverthrow';

import { parseObjectId } from './address';
import { checkU64, parseUnsignedId, priceToInput, toUnits, type DecimalInput } from './amounts';
import type { BalanceManager, Coin, DeepBookConfig, Pool } from './config';
import { MAX_TIMESTAMP, OrderType, SelfMatchingOption } from './constants';
import { ContextError, IntentFinalizedError, LookupMissError, NumericParseError, type DeepBookError } from './errors';
import { OperationPlan, arg, type IntentBuilder, type StagedArg } from './intent';
import { getLogger } from './logger';
import { deriveProof, type ResolvedAccess } from './proof';
import type { ObjectResolver, ResolutionError } from './resolver';

// ============== Parameters ==============

export interface PlaceLimitOrderParams {
  poolKey: string;
  balanceManagerKey: string;
  /** Caller-chosen order id, an unsigned 64-bit integer as text */
  clientOrderId: string;
  /** Quote per base, human readable */
  price: DecimalInput;
  /** Base quantity, human readable */
  quantity: DecimalInput;
  isBid: boolean;
  orderType?: OrderType;
  selfMatchingOption?: SelfMatchingOption;
  payWithDeep?: boolean;
  /** Milliseconds since epoch; omitted means the order never expires */
  expireTimestamp?: bigint;
}

export interface PlaceMarketOrderParams {
  poolKey: string;
  balanceManagerKey: string;
  clientOrderId: string;
  quantity: DecimalInput;
  isBid: boolean;
  selfMatchingOption?: SelfMatchingOption;
  payWithDeep?: boolean;
}

export interface ModifyOrderParams {
  poolKey: string;
  balanceManagerKey: string;
  /** Protocol order id, an unsigned 128-bit integer as text */
  orderId: string;
  newQuantity: DecimalInput;
}

export interface CancelOrderParams {
  poolKey: string;
  balanceManagerKey: string;
  orderId: string;
}

export interface SwapParams {
  poolKey: string;
  /** Input amount, in base units for base-to-quote and quote units otherwise */
  amount: DecimalInput;
  /** DEEP paid as fee; zero when omitted */
  deepAmount?: DecimalInput;
  /** Minimum output, in the output coin's units; zero when omitted */
  minOut?: DecimalInput;
}

// ============== Internals ==============

interface Market {
  pool: Pool;
  base: Coin;
  quote: Coin;
}

interface ResolvedAccount {
  manager: StagedArg;
  access: ResolvedAccess;
}

interface ResolvedTrade extends ResolvedAccount {
  pool: StagedArg;
  clock: StagedArg;
}

const DEEP_KEY = 'DEEP';

/** Order enums travel as u8; only their declared members are accepted. */
function orderOption(name: string, value: number, max: number): Result<number, NumericParseError> {
  return Number.isInteger(value) && value >= 0 && value <= max
    ? ok(value)
    : err(new NumericParseError(String(value), `not a valid ${name}`));
}

// ============== Composer ==============

export class DeepBookComposer {
  private readonly logger = getLogger('composer');

  constructor(
    private readonly config: DeepBookConfig,
    private readonly resolver: ObjectResolver,
  ) {}

  // ============== Balance Manager ==============

  /**
   * Create a new balance manager owned by the sender and share it.
   */
  createAndShareBalanceManager(intent: IntentBuilder): ResultAsync<void, ContextError> {
    return this.#compose(intent, 'createAndShareBalanceManager', () => {
      const plan = new OperationPlan('createAndShareBalanceManager');
      const managerType = `${this.config.packageIds.deepbookPackageId}::balance_manager::BalanceManager`;
      return plan
        .call('newBalanceManager', {})
        .andThen((manager) => plan.call('publicShareObject', { object: manager }, [managerType]))
        .map(() => plan);
    });
  }

  depositIntoManager(
    intent: IntentBuilder,
    managerKey: string,
    coinKey: string,
    amount: DecimalInput,
  ): ResultAsync<void, ContextError> {
    return this.#compose(intent, `depositIntoManager(${managerKey}, ${coinKey})`, (label) => {
      const inputs = Result.combine([this.#manager(managerKey), this.#coin(coinKey)]).andThen(([manager, coin]) =>
        toUnits(amount, coin).map((units) => ({ manager, coin, units })),
      );
      if (inputs.isErr()) return err(inputs.error);
      const { manager, coin, units } = inputs.value;

      return this.#resolveManager(manager).andThen((managerArg) => {
        const plan = new OperationPlan(label);
        return plan
          .call('deposit', { balanceManager: managerArg, coin: arg.coin(coin.type, units) }, [coin.type])
          .map(() => plan);
      });
    });
  }

  withdrawFromManager(
    intent: IntentBuilder,
    managerKey: string,
    coinKey: string,
    amount: DecimalInput,
    recipient: string,
  ): ResultAsync<void, ContextError> {
    return this.#compose(intent, `withdrawFromManager(${managerKey}, ${coinKey})`, (label) => {
      const inputs = Result.combine([this.#manager(managerKey), this.#coin(coinKey), parseObjectId(recipient)]).andThen(
        ([manager, coin, to]) => toUnits(amount, coin).map((units) => ({ manager, coin, to, units })),
      );
      if (inputs.isErr()) return err(inputs.error);
      const { manager, coin, to, units } = inputs.value;

      return this.#resolveManager(manager).andThen((managerArg) => {
        const plan = new OperationPlan(label);
        return plan
          .call('withdraw', { balanceManager: managerArg, amount: arg.u64(units) }, [coin.type])
          .andThen((withdrawn) => plan.transfer([withdrawn], to))
          .map(() => plan);
      });
    });
  }

  withdrawAllFromManager(
    intent: IntentBuilder,
    managerKey: string,
    coinKey: string,
    recipient: string,
  ): ResultAsync<void, ContextError> {
    return this.#compose(intent, `withdrawAllFromManager(${managerKey}, ${coinKey})`, (label) => {
      const inputs = Result.combine([this.#manager(managerKey), this.#coin(coinKey), parseObjectId(recipient)]);
      if (inputs.isErr()) return err(inputs.error);
      const [manager, coin, to] = inputs.value;

      return this.#resolveManager(manager).andThen((managerArg) => {
        const plan = new OperationPlan(label);
        return plan
          .call('withdrawAll', { balanceManager: managerArg }, [coin.type])
          .andThen((withdrawn) => plan.transfer([withdrawn], to))
          .map(() => plan);
      });
    });
  }

  /**
   * Mint a TradeCap for the manager and keep it at the sender's address.
   */
  mintTradeCap(intent: IntentBuilder, managerKey: string): ResultAsync<void, ContextError> {
    return this.#mintTradeCap(intent, `mintTradeCap(${managerKey})`, managerKey, this.config.address);
  }

  mintAndTransferTradeCap(
    intent: IntentBuilder,
    managerKey: string,
    recipient: string,
  ): ResultAsync<void, ContextError> {
    return this.#mintTradeCap(intent, `mintAndTransferTradeCap(${managerKey})`, managerKey, recipient);
  }

  generateProof(intent: IntentBuilder, managerKey: string): ResultAsync<void, ContextError> {
    return this.#compose(intent, `generateProof(${managerKey})`, (label) => {
      const manager = this.#manager(managerKey);
      if (manager.isErr()) return err(manager.error);

      return this.#resolveAccount(manager.value).andThen((account) => {
        const plan = new OperationPlan(label);
        return deriveProof(plan, account.manager, account.access).map(() => plan);
      });
    });
  }

  // ============== Orders ==============

  placeLimitOrder(intent: IntentBuilder, params: PlaceLimitOrderParams): ResultAsync<void, ContextError> {
    const {
      poolKey,
      balanceManagerKey,
      clientOrderId,
      price,
      quantity,
      isBid,
      orderType = OrderType.NO_RESTRICTION,
      selfMatchingOption = SelfMatchingOption.SELF_MATCHING_ALLOWED,
      payWithDeep = true,
      expireTimestamp = MAX_TIMESTAMP,
    } = params;

    return this.#compose(intent, `placeLimitOrder(${poolKey})`, (label) => {
      const inputs = Result.combine([
        this.#market(poolKey),
        this.#manager(balanceManagerKey),
        parseUnsignedId(clientOrderId, 64),
        orderOption('order type', orderType, OrderType.POST_ONLY),
        orderOption('self-matching option', selfMatchingOption, SelfMatchingOption.CANCEL_MAKER),
        checkU64(expireTimestamp),
      ]).andThen(([market, manager, orderId, restriction, selfMatching, expiry]) =>
        Result.combine([priceToInput(price, market.base, market.quote), toUnits(quantity, market.base)]).map(
          ([inputPrice, inputQuantity]) => ({
            market,
            manager,
            orderId,
            restriction,
            selfMatching,
            expiry,
            inputPrice,
            inputQuantity,
          }),
        ),
      );
      if (inputs.isErr()) return err(inputs.error);
      const { market, manager, orderId, restriction, selfMatching, expiry, inputPrice, inputQuantity } = inputs.value;

      this.logger.debug(
        {
          poolKey,
          price: String(price),
          quantity: String(quantity),
          inputPrice: inputPrice.toString(),
          inputQuantity: inputQuantity.toString(),
          isBid,
          orderType,
        },
        'Staging limit order',
      );

      return this.#resolveTrade(market, manager).andThen((trade) => {
        const plan = new OperationPlan(label);
        return deriveProof(plan, trade.manager, trade.access)
          .andThen((tradeProof) =>
            plan.call(
              'placeLimitOrder',
              {
                pool: trade.pool,
                balanceManager: trade.manager,
                tradeProof,
                clientOrderId: arg.u64(orderId),
                orderType: arg.u8(restriction),
                selfMatchingOption: arg.u8(selfMatching),
                price: arg.u64(inputPrice),
                quantity: arg.u64(inputQuantity),
                isBid: arg.bool(isBid),
                payWithDeep: arg.bool(payWithDeep),
                expireTimestamp: arg.u64(expiry),
                clock: trade.clock,
              },
              [market.base.type, market.quote.type],
            ),
          )
          .map(() => plan);
      });
    });
  }

  placeMarketOrder(intent: IntentBuilder, params: PlaceMarketOrderParams): ResultAsync<void, ContextError> {
    const {
      poolKey,
      balanceManagerKey,
      clientOrderId,
      quantity,
      isBid,
      selfMatchingOption = SelfMatchingOption.SELF_MATCHING_ALLOWED,
      payWithDeep = true,
    } = params;

    return this.#compose(intent, `placeMarketOrder(${poolKey})`, (label) => {
      const inputs = Result.combine([
        this.#market(poolKey),
        this.#manager(balanceManagerKey),
        parseUnsignedId(clientOrderId, 64),
        orderOption('self-matching option', selfMatchingOption, SelfMatchingOption.CANCEL_MAKER),
      ]).andThen(([market, manager, orderId, selfMatching]) =>
        toUnits(quantity, market.base).map((inputQuantity) => ({
          market,
          manager,
          orderId,
          selfMatching,
          inputQuantity,
        })),
      );
      if (inputs.isErr()) return err(inputs.error);
      const { market, manager, orderId, selfMatching, inputQuantity } = inputs.value;

      return this.#resolveTrade(market, manager).andThen((trade) => {
        const plan = new OperationPlan(label);
        return deriveProof(plan, trade.manager, trade.access)
          .andThen((tradeProof) =>
            plan.call(
              'placeMarketOrder',
              {
                pool: trade.pool,
                balanceManager: trade.manager,
                tradeProof,
                clientOrderId: arg.u64(orderId),
                selfMatchingOption: arg.u8(selfMatching),
                quantity: arg.u64(inputQuantity),
                isBid: arg.bool(isBid),
                payWithDeep: arg.bool(payWithDeep),
                clock: trade.clock,
              },
              [market.base.type, market.quote.type],
            ),
          )
          .map(() => plan);
      });
    });
  }

  modifyOrder(intent: IntentBuilder, params: ModifyOrderParams): ResultAsync<void, ContextError> {
    const { poolKey, balanceManagerKey, orderId, newQuantity } = params;

    return this.#compose(intent, `modifyOrder(${poolKey})`, (label) => {
      const inputs = Result.combine([
        this.#market(poolKey),
        this.#manager(balanceManagerKey),
        parseUnsignedId(orderId, 128),
      ]).andThen(([market, manager, id]) =>
        toUnits(newQuantity, market.base).map((inputQuantity) => ({ market, manager, id, inputQuantity })),
      );
      if (inputs.isErr()) return err(inputs.error);
      const { market, manager, id, inputQuantity } = inputs.value;

      return this.#resolveTrade(market, manager).andThen((trade) => {
        const plan = new OperationPlan(label);
        return deriveProof(plan, trade.manager, trade.access)
          .andThen((tradeProof) =>
            plan.call(
              'modifyOrder',
              {
                pool: trade.pool,
                balanceManager: trade.manager,
                tradeProof,
                orderId: arg.u128(id),
                newQuantity: arg.u64(inputQuantity),
                clock: trade.clock,
              },
              [market.base.type, market.quote.type],
            ),
          )
          .map(() => plan);
      });
    });
  }

  cancelOrder(intent: IntentBuilder, params: CancelOrderParams): ResultAsync<void, ContextError> {
    const { poolKey, balanceManagerKey, orderId } = params;

    return this.#compose(intent, `cancelOrder(${poolKey})`, (label) => {
      const inputs = Result.combine([
        this.#market(poolKey),
        this.#manager(balanceManagerKey),
        parseUnsignedId(orderId, 128),
      ]);
      if (inputs.isErr()) return err(inputs.error);
      const [market, manager, id] = inputs.value;

      return this.#resolveTrade(market, manager).andThen((trade) => {
        const plan = new OperationPlan(label);
        return deriveProof(plan, trade.manager, trade.access)
          .andThen((tradeProof) =>
            plan.call(
              'cancelOrder',
              {
                pool: trade.pool,
                balanceManager: trade.manager,
                tradeProof,
                orderId: arg.u128(id),
                clock: trade.clock,
              },
              [market.base.type, market.quote.type],
            ),
          )
          .map(() => plan);
      });
    });
  }

  cancelAllOrders(intent: IntentBuilder, poolKey: string, balanceManagerKey: string): ResultAsync<void, ContextError> {
    return this.#compose(intent, `cancelAllOrders(${poolKey})`, (label) => {
      const inputs = Result.combine([this.#market(poolKey), this.#manager(balanceManagerKey)]);
      if (inputs.isErr()) return err(inputs.error);
      const [market, manager] = inputs.value;

      return this.#resolveTrade(market, manager).andThen((trade) => {
        const plan = new OperationPlan(label);
        return deriveProof(plan, trade.manager, trade.access)
          .andThen((tradeProof) =>
            plan.call(
              'cancelAllOrders',
              { pool: trade.pool, balanceManager: trade.manager, tradeProof, clock: trade.clock },
              [market.base.type, market.quote.type],
            ),
          )
          .map(() => plan);
      });
    });
  }

  withdrawSettledAmounts(
    intent: IntentBuilder,
    poolKey: string,
    balanceManagerKey: string,
  ): ResultAsync<void, ContextError> {
    return this.#compose(intent, `withdrawSettledAmounts(${poolKey})`, (label) => {
      const inputs = Result.combine([this.#market(poolKey), this.#manager(balanceManagerKey)]);
      if (inputs.isErr()) return err(inputs.error);
      const [market, manager] = inputs.value;

      return this.resolver
        .resolveShared(market.pool.address, true)
        .andThen((pool) => this.#resolveAccount(manager).map((account) => ({ pool: arg.object(pool), ...account })))
        .andThen((trade) => {
          const plan = new OperationPlan(label);
          return deriveProof(plan, trade.manager, trade.access)
            .andThen((tradeProof) =>
              plan.call('withdrawSettledAmounts', { pool: trade.pool, balanceManager: trade.manager, tradeProof }, [
                market.base.type,
                market.quote.type,
              ]),
            )
            .map(() => plan);
        });
    });
  }

  // ============== Swaps ==============

  /**
   * Swap an exact base amount taken from the sender's wallet. The base
   * remainder, quote output and unused DEEP go back to the sender.
   */
  swapExactBaseForQuote(intent: IntentBuilder, params: SwapParams): ResultAsync<void, ContextError> {
    return this.#swap(intent, 'base', params);
  }

  swapExactQuoteForBase(intent: IntentBuilder, params: SwapParams): ResultAsync<void, ContextError> {
    return this.#swap(intent, 'quote', params);
  }

  #swap(intent: IntentBuilder, input: 'base' | 'quote', params: SwapParams): ResultAsync<void, ContextError> {
    const { poolKey, amount, deepAmount = 0, minOut = 0 } = params;
    const operation = input === 'base' ? 'swapExactBaseForQuote' : 'swapExactQuoteForBase';

    return this.#compose(intent, `${operation}(${poolKey})`, (label) => {
      const inputs = Result.combine([this.#market(poolKey), this.#coin(DEEP_KEY)]).andThen(([market, deep]) => {
        const inCoin = input === 'base' ? market.base : market.quote;
        const outCoin = input === 'base' ? market.quote : market.base;
        return Result.combine([toUnits(amount, inCoin), toUnits(deepAmount, deep), toUnits(minOut, outCoin)]).map(
          ([inUnits, deepUnits, minOutUnits]) => ({ market, deep, inCoin, inUnits, deepUnits, minOutUnits }),
        );
      });
      if (inputs.isErr()) return err(inputs.error);
      const { market, deep, inCoin, inUnits, deepUnits, minOutUnits } = inputs.value;

      return this.resolver
        .resolveShared(market.pool.address, true)
        .andThen((pool) => this.#clock().map((clock) => ({ pool: arg.object(pool), clock })))
        .andThen(({ pool, clock }) => {
          const plan = new OperationPlan(label);
          const coinIn = arg.coin(inCoin.type, inUnits);
          const deepIn = arg.coin(deep.type, deepUnits);
          const typeArguments = [market.base.type, market.quote.type];
          const swap =
            input === 'base'
              ? plan.call(
                  'swapExactBaseForQuote',
                  { pool, baseIn: coinIn, deepIn, minQuoteOut: arg.u64(minOutUnits), clock },
                  typeArguments,
                )
              : plan.call(
                  'swapExactQuoteForBase',
                  { pool, quoteIn: coinIn, deepIn, minBaseOut: arg.u64(minOutUnits), clock },
                  typeArguments,
                );
          return swap
            .andThen((outputs) =>
              plan.transfer([arg.nested(outputs, 0), arg.nested(outputs, 1), arg.nested(outputs, 2)], this.config.address),
            )
            .map(() => plan);
        });
    });
  }

  // ============== Helpers ==============

  #mintTradeCap(
    intent: IntentBuilder,
    label: string,
    managerKey: string,
    recipient: string,
  ): ResultAsync<void, ContextError> {
    return this.#compose(intent, label, () => {
      const inputs = Result.combine([this.#manager(managerKey), parseObjectId(recipient)]);
      if (inputs.isErr()) return err(inputs.error);
      const [manager, to] = inputs.value;

      return this.#resolveManager(manager).andThen((managerArg) => {
        const plan = new OperationPlan(label);
        return plan
          .call('mintTradeCap', { balanceManager: managerArg })
          .andThen((tradeCap) => plan.transfer([tradeCap], to))
          .map(() => plan);
      });
    });
  }

  /**
   * Stage an operation and append it. Staging runs only while the intent is
   * still open; every failure comes back wrapped with the operation label.
   */
  #compose(
    intent: IntentBuilder,
    label: string,
    stage: (label: string) => Result<OperationPlan, DeepBookError> | ResultAsync<OperationPlan, DeepBookError>,
  ): ResultAsync<void, ContextError> {
    const composed: ResultAsync<OperationPlan, DeepBookError> = intent.finalized
      ? errAsync(new IntentFinalizedError())
      : okAsync(label)
          .andThen(stage)
          .andThen((plan) => intent.append(plan).map(() => plan));

    return composed
      .map((plan) => {
        this.logger.debug({ operation: label, calls: plan.steps.length }, 'Composed operation');
      })
      .mapErr((error) => {
        this.logger.warn({ operation: label, code: error.code }, error.message);
        return new ContextError(label, error);
      });
  }

  #market(poolKey: string): Result<Market, LookupMissError> {
    const pool = this.config.getPool(poolKey);
    if (!pool) {
      return err(new LookupMissError('pool', poolKey));
    }
    return Result.combine([this.#coin(pool.baseCoin), this.#coin(pool.quoteCoin)]).map(([base, quote]) => ({
      pool,
      base,
      quote,
    }));
  }

  #coin(coinKey: string): Result<Coin, LookupMissError> {
    const coin = this.config.getCoin(coinKey);
    return coin ? ok(coin) : err(new LookupMissError('coin', coinKey));
  }

  #manager(managerKey: string): Result<BalanceManager, LookupMissError> {
    const manager = this.config.getBalanceManager(managerKey);
    return manager ? ok(manager) : err(new LookupMissError('balance manager', managerKey));
  }

  #resolveManager(manager: BalanceManager): ResultAsync<StagedArg, ResolutionError> {
    return this.resolver.resolveShared(manager.address, true).map(arg.object);
  }

  /**
   * Resolve the manager and, for a delegated account, its TradeCap. The cap
   * must be owned by the configured caller address.
   */
  #resolveAccount(manager: BalanceManager): ResultAsync<ResolvedAccount, ResolutionError> {
    const { access } = manager;
    return this.#resolveManager(manager).andThen((managerArg) => {
      if (access.kind === 'owner') {
        const account: ResolvedAccount = { manager: managerArg, access: { kind: 'owner' } };
        return okAsync(account);
      }
      return this.resolver.resolveOwned(access.tradeCap, this.config.address).map(
        (tradeCap): ResolvedAccount => ({
          manager: managerArg,
          access: { kind: 'delegated', tradeCap: arg.object(tradeCap) },
        }),
      );
    });
  }

  #resolveTrade(market: Market, manager: BalanceManager): ResultAsync<ResolvedTrade, ResolutionError> {
    return this.resolver
      .resolveShared(market.pool.address, true)
      .andThen((pool) => this.#resolveAccount(manager).map((account) => ({ pool: arg.object(pool), ...account })))
      .andThen((trade) => this.#clock().map((clock): ResolvedTrade => ({ ...trade, clock })));
  }

  #clock(): ResultAsync<StagedArg, ResolutionError> {
    return this.resolver.resolveShared(SUI_CLOCK_OBJECT_ID, false).map(arg.object);
  }
}
