import { normalizeSuiObjectId } from '@mysten/sui/utils';
import { beforeEach, describe, expect, it } from 'vitest';

import { DeepBookComposer } from '../composer';
import type { DeepBookConfig } from '../config';
import { MAX_TIMESTAMP, OrderType, SelfMatchingOption } from '../constants';
import { ObjectFetchError, rootCause } from '../errors';
import { IntentBuilder, arg } from '../intent';
import { ObjectResolver } from '../resolver';

import type { FakeLedger } from './fake-ledger';
import {
  CALLER,
  CLOCK,
  DEEP_SUI,
  DEEP_TYPE,
  MANAGER_1,
  MANAGER_2,
  MISSING_MANAGER,
  SUI_TYPE,
  TESTNET_PACKAGE,
  TRADE_CAP,
  createTestConfig,
  createTestLedger,
  sharedArg,
} from './fixtures';

const POOL_ARG = sharedArg(DEEP_SUI, '100', true);
const MANAGER_1_ARG = sharedArg(MANAGER_1, '200', true);
const MANAGER_2_ARG = sharedArg(MANAGER_2, '300', true);
const CLOCK_ARG = sharedArg(CLOCK, '1', false);
const STRANGER = normalizeSuiObjectId('0xb0b');
const CAP_ARG = arg.object({ $kind: 'OwnedObject', objectId: TRADE_CAP, version: '42', digest: 'cap-digest' });

describe('DeepBookComposer', () => {
  let config: DeepBookConfig;
  let ledger: FakeLedger;
  let composer: DeepBookComposer;
  let intent: IntentBuilder;

  beforeEach(() => {
    config = createTestConfig();
    ledger = createTestLedger();
    composer = new DeepBookComposer(config, new ObjectResolver(ledger));
    intent = new IntentBuilder(TESTNET_PACKAGE, config.address);
  });

  describe('placeLimitOrder', () => {
    it('emits the owner proof and the order arguments in declared order with defaults', async () => {
      const result = await composer.placeLimitOrder(intent, {
        poolKey: 'DEEP_SUI',
        balanceManagerKey: 'MANAGER_1',
        clientOrderId: '123456789',
        price: 0.02,
        quantity: 10,
        isBid: true,
      });

      expect(result.isOk()).toBe(true);
      expect(intent.commands()).toEqual([
        {
          kind: 'moveCall',
          target: `${TESTNET_PACKAGE}::balance_manager::generate_proof_as_owner`,
          typeArguments: [],
          arguments: [MANAGER_1_ARG],
        },
        {
          kind: 'moveCall',
          target: `${TESTNET_PACKAGE}::pool::place_limit_order`,
          typeArguments: [DEEP_TYPE, SUI_TYPE],
          arguments: [
            POOL_ARG,
            MANAGER_1_ARG,
            { kind: 'result', step: 0 },
            arg.u64(123_456_789n),
            arg.u8(0),
            arg.u8(0),
            arg.u64(20_000_000_000n),
            arg.u64(10_000_000n),
            arg.bool(true),
            arg.bool(true),
            arg.u64(MAX_TIMESTAMP),
            CLOCK_ARG,
          ],
        },
      ]);
    });

    it('passes explicit order options through', async () => {
      await composer.placeLimitOrder(intent, {
        poolKey: 'DEEP_SUI',
        balanceManagerKey: 'MANAGER_1',
        clientOrderId: '7',
        price: '0.5',
        quantity: '1',
        isBid: false,
        orderType: OrderType.POST_ONLY,
        selfMatchingOption: SelfMatchingOption.CANCEL_MAKER,
        payWithDeep: false,
        expireTimestamp: 1_700_000_000_000n,
      });

      const order = intent.commands()[1];
      expect(order).toMatchObject({
        arguments: [
          POOL_ARG,
          MANAGER_1_ARG,
          { kind: 'result', step: 0 },
          arg.u64(7n),
          arg.u8(3),
          arg.u8(2),
          arg.u64(500_000_000_000n),
          arg.u64(1_000_000n),
          arg.bool(false),
          arg.bool(false),
          arg.u64(1_700_000_000_000n),
          CLOCK_ARG,
        ],
      });
    });

    it('proves as trader for a delegated manager', async () => {
      await composer.placeLimitOrder(intent, {
        poolKey: 'DEEP_SUI',
        balanceManagerKey: 'MANAGER_2',
        clientOrderId: '1',
        price: '0.02',
        quantity: '10',
        isBid: true,
      });

      const [proof, order] = intent.commands();
      expect(proof).toEqual({
        kind: 'moveCall',
        target: `${TESTNET_PACKAGE}::balance_manager::generate_proof_as_trader`,
        typeArguments: [],
        arguments: [MANAGER_2_ARG, CAP_ARG],
      });
      expect(order).toMatchObject({
        arguments: [
          POOL_ARG,
          MANAGER_2_ARG,
          { kind: 'result', step: 0 },
          arg.u64(1n),
          arg.u8(0),
          arg.u8(0),
          arg.u64(20_000_000_000n),
          arg.u64(10_000_000n),
          arg.bool(true),
          arg.bool(true),
          arg.u64(MAX_TIMESTAMP),
          CLOCK_ARG,
        ],
      });
    });

    it('resolves each object once, in call order', async () => {
      await composer.placeLimitOrder(intent, {
        poolKey: 'DEEP_SUI',
        balanceManagerKey: 'MANAGER_2',
        clientOrderId: '1',
        price: '0.02',
        quantity: '10',
        isBid: true,
      });

      expect(ledger.fetched).toEqual([DEEP_SUI, MANAGER_2, TRADE_CAP, CLOCK]);
    });

    it('rejects a non-numeric client order id before any ledger read', async () => {
      const error = (
        await composer.placeLimitOrder(intent, {
          poolKey: 'DEEP_SUI',
          balanceManagerKey: 'MANAGER_1',
          clientOrderId: 'order-1',
          price: '0.02',
          quantity: '10',
          isBid: true,
        })
      )._unsafeUnwrapErr();

      expect(error.code).toBe('INVALID_NUMBER');
      expect(error.message).toBe(
        'placeLimitOrder(DEEP_SUI): Invalid numeric value "order-1": expected an unsigned integer',
      );
      expect(ledger.fetched).toEqual([]);
    });

    it('reports an unknown pool key with context', async () => {
      const error = (
        await composer.placeLimitOrder(intent, {
          poolKey: 'DOGE_SUI',
          balanceManagerKey: 'MANAGER_1',
          clientOrderId: '1',
          price: '0.02',
          quantity: '10',
          isBid: true,
        })
      )._unsafeUnwrapErr();

      expect(error.code).toBe('LOOKUP_MISS');
      expect(error.message).toBe('placeLimitOrder(DOGE_SUI): Unknown pool key: DOGE_SUI');
    });

    it('reports a shared trade cap as an ownership mismatch', async () => {
      ledger.addShared(TRADE_CAP, '9');

      const error = (
        await composer.placeLimitOrder(intent, {
          poolKey: 'DEEP_SUI',
          balanceManagerKey: 'MANAGER_2',
          clientOrderId: '1',
          price: '0.02',
          quantity: '10',
          isBid: true,
        })
      )._unsafeUnwrapErr();

      expect(error.code).toBe('OWNERSHIP_MISMATCH');
      expect(intent.commands()).toEqual([]);
    });

    it('refuses an immutable trade cap', async () => {
      ledger.addImmutable(TRADE_CAP, '9', 'frozen-digest');

      const error = (
        await composer.cancelAllOrders(intent, 'DEEP_SUI', 'MANAGER_2')
      )._unsafeUnwrapErr();

      expect(error.message).toBe(
        `cancelAllOrders(DEEP_SUI): Object ${TRADE_CAP} must be owned, but the ledger reports it as immutable`,
      );
      expect(intent.commands()).toEqual([]);
    });

    it('refuses a trade cap held by another address', async () => {
      ledger.addOwned(TRADE_CAP, STRANGER, '43', 'cap-digest');

      const error = (
        await composer.placeLimitOrder(intent, {
          poolKey: 'DEEP_SUI',
          balanceManagerKey: 'MANAGER_2',
          clientOrderId: '1',
          price: '0.02',
          quantity: '10',
          isBid: true,
        })
      )._unsafeUnwrapErr();

      expect(error.code).toBe('OWNERSHIP_MISMATCH');
      expect(error.message).toBe(
        `placeLimitOrder(DEEP_SUI): Object ${TRADE_CAP} must be owned by ${CALLER}, but the ledger reports it as owned by ${STRANGER}`,
      );
      expect(intent.commands()).toEqual([]);
    });
  });

  describe('all-or-nothing composition', () => {
    it('leaves earlier operations untouched when a later one fails', async () => {
      (await composer.depositIntoManager(intent, 'MANAGER_1', 'SUI', '1.5'))._unsafeUnwrap();
      const before = intent.commands();

      const error = (
        await composer.placeLimitOrder(intent, {
          poolKey: 'DEEP_SUI',
          balanceManagerKey: 'MANAGER_3',
          clientOrderId: '1',
          price: '0.02',
          quantity: '10',
          isBid: true,
        })
      )._unsafeUnwrapErr();

      expect(error.code).toBe('FETCH_FAILED');
      expect(error.cause).toBeInstanceOf(ObjectFetchError);
      expect(rootCause(error).message).toBe(`object ${MISSING_MANAGER} not found`);
      expect(error.message).toBe(
        `placeLimitOrder(DEEP_SUI): Failed to fetch object ${MISSING_MANAGER}: object ${MISSING_MANAGER} not found`,
      );
      expect(intent.commands()).toEqual(before);
    });

    it('rejects an expiry beyond u64 before touching the intent', async () => {
      (await composer.depositIntoManager(intent, 'MANAGER_1', 'SUI', '1.5'))._unsafeUnwrap();
      const before = intent.commands();

      const error = (
        await composer.placeLimitOrder(intent, {
          poolKey: 'DEEP_SUI',
          balanceManagerKey: 'MANAGER_1',
          clientOrderId: '1',
          price: '0.02',
          quantity: '10',
          isBid: true,
          expireTimestamp: 2n ** 64n,
        })
      )._unsafeUnwrapErr();

      expect(error.code).toBe('AMOUNT_OUT_OF_RANGE');
      expect(error.message).toBe(
        'placeLimitOrder(DEEP_SUI): Amount 18446744073709551616 is outside the representable range [0, 18446744073709551615]',
      );
      expect(intent.commands()).toEqual(before);
      expect(ledger.fetched).toEqual([MANAGER_1]);
    });

    it('rejects order options outside their enums', async () => {
      const unknownOption = Number('7');

      const limit = (
        await composer.placeLimitOrder(intent, {
          poolKey: 'DEEP_SUI',
          balanceManagerKey: 'MANAGER_1',
          clientOrderId: '1',
          price: '0.02',
          quantity: '10',
          isBid: true,
          orderType: unknownOption,
        })
      )._unsafeUnwrapErr();
      const market = (
        await composer.placeMarketOrder(intent, {
          poolKey: 'DEEP_SUI',
          balanceManagerKey: 'MANAGER_1',
          clientOrderId: '2',
          quantity: '10',
          isBid: false,
          selfMatchingOption: unknownOption,
        })
      )._unsafeUnwrapErr();

      expect(limit.code).toBe('INVALID_NUMBER');
      expect(limit.message).toBe('placeLimitOrder(DEEP_SUI): Invalid numeric value "7": not a valid order type');
      expect(market.message).toBe(
        'placeMarketOrder(DEEP_SUI): Invalid numeric value "7": not a valid self-matching option',
      );
      expect(intent.commands()).toEqual([]);
      expect(ledger.fetched).toEqual([]);
    });

    it('rebases references when operations are chained', async () => {
      (await composer.depositIntoManager(intent, 'MANAGER_1', 'DEEP', '100'))._unsafeUnwrap();
      (await composer.cancelAllOrders(intent, 'DEEP_SUI', 'MANAGER_1'))._unsafeUnwrap();

      const commands = intent.commands();
      expect(commands).toHaveLength(3);
      expect(commands[2]).toEqual({
        kind: 'moveCall',
        target: `${TESTNET_PACKAGE}::pool::cancel_all_orders`,
        typeArguments: [DEEP_TYPE, SUI_TYPE],
        arguments: [POOL_ARG, MANAGER_1_ARG, { kind: 'result', step: 1 }, CLOCK_ARG],
      });
    });

    it('refuses to compose into a finalized intent without reading the ledger', async () => {
      intent.finalize()._unsafeUnwrap();

      const error = (await composer.cancelAllOrders(intent, 'DEEP_SUI', 'MANAGER_1'))._unsafeUnwrapErr();

      expect(error.code).toBe('INTENT_FINALIZED');
      expect(ledger.fetched).toEqual([]);
    });
  });

  describe('orders', () => {
    it('places a market order', async () => {
      (
        await composer.placeMarketOrder(intent, {
          poolKey: 'DEEP_SUI',
          balanceManagerKey: 'MANAGER_1',
          clientOrderId: '42',
          quantity: '2.5',
          isBid: false,
        })
      )._unsafeUnwrap();

      expect(intent.commands()[1]).toEqual({
        kind: 'moveCall',
        target: `${TESTNET_PACKAGE}::pool::place_market_order`,
        typeArguments: [DEEP_TYPE, SUI_TYPE],
        arguments: [
          POOL_ARG,
          MANAGER_1_ARG,
          { kind: 'result', step: 0 },
          arg.u64(42n),
          arg.u8(0),
          arg.u64(2_500_000n),
          arg.bool(false),
          arg.bool(true),
          CLOCK_ARG,
        ],
      });
    });

    it('modifies an order by its protocol id', async () => {
      const orderId = '170141183460469231731687303715884105728';
      (
        await composer.modifyOrder(intent, {
          poolKey: 'DEEP_SUI',
          balanceManagerKey: 'MANAGER_1',
          orderId,
          newQuantity: '4',
        })
      )._unsafeUnwrap();

      expect(intent.commands()[1]).toMatchObject({
        target: `${TESTNET_PACKAGE}::pool::modify_order`,
        arguments: [
          POOL_ARG,
          MANAGER_1_ARG,
          { kind: 'result', step: 0 },
          arg.u128(BigInt(orderId)),
          arg.u64(4_000_000n),
          CLOCK_ARG,
        ],
      });
    });

    it('cancels an order', async () => {
      (
        await composer.cancelOrder(intent, { poolKey: 'DEEP_SUI', balanceManagerKey: 'MANAGER_1', orderId: '99' })
      )._unsafeUnwrap();

      expect(intent.commands()[1]).toMatchObject({
        target: `${TESTNET_PACKAGE}::pool::cancel_order`,
        arguments: [POOL_ARG, MANAGER_1_ARG, { kind: 'result', step: 0 }, arg.u128(99n), CLOCK_ARG],
      });
    });

    it('withdraws settled amounts without reading the clock', async () => {
      (await composer.withdrawSettledAmounts(intent, 'DEEP_SUI', 'MANAGER_1'))._unsafeUnwrap();

      expect(intent.commands()[1]).toMatchObject({
        target: `${TESTNET_PACKAGE}::pool::withdraw_settled_amounts`,
        arguments: [POOL_ARG, MANAGER_1_ARG, { kind: 'result', step: 0 }],
      });
      expect(ledger.fetched).toEqual([DEEP_SUI, MANAGER_1]);
    });
  });

  describe('balance manager', () => {
    it('creates and shares a balance manager', async () => {
      (await composer.createAndShareBalanceManager(intent))._unsafeUnwrap();

      expect(intent.commands()).toEqual([
        { kind: 'moveCall', target: `${TESTNET_PACKAGE}::balance_manager::new`, typeArguments: [], arguments: [] },
        {
          kind: 'moveCall',
          target: '0x2::transfer::public_share_object',
          typeArguments: [`${TESTNET_PACKAGE}::balance_manager::BalanceManager`],
          arguments: [{ kind: 'result', step: 0 }],
        },
      ]);
    });

    it('deposits a coin taken from the wallet', async () => {
      (await composer.depositIntoManager(intent, 'MANAGER_1', 'SUI', '1.5'))._unsafeUnwrap();

      expect(intent.commands()).toEqual([
        {
          kind: 'moveCall',
          target: `${TESTNET_PACKAGE}::balance_manager::deposit`,
          typeArguments: [SUI_TYPE],
          arguments: [MANAGER_1_ARG, arg.coin(SUI_TYPE, 1_500_000_000n)],
        },
      ]);
    });

    it('withdraws to a recipient', async () => {
      (await composer.withdrawFromManager(intent, 'MANAGER_1', 'DEEP', '3', CALLER))._unsafeUnwrap();

      expect(intent.commands()).toEqual([
        {
          kind: 'moveCall',
          target: `${TESTNET_PACKAGE}::balance_manager::withdraw`,
          typeArguments: [DEEP_TYPE],
          arguments: [MANAGER_1_ARG, arg.u64(3_000_000n)],
        },
        { kind: 'transfer', objects: [{ kind: 'result', step: 0 }], recipient: CALLER },
      ]);
    });

    it('rejects a malformed recipient', async () => {
      const error = (await composer.withdrawAllFromManager(intent, 'MANAGER_1', 'DEEP', 'bob'))._unsafeUnwrapErr();

      expect(error.code).toBe('INVALID_ADDRESS');
      expect(error.message).toBe('withdrawAllFromManager(MANAGER_1, DEEP): Invalid object address: "bob"');
      expect(ledger.fetched).toEqual([]);
    });

    it('withdraws the whole balance', async () => {
      (await composer.withdrawAllFromManager(intent, 'MANAGER_1', 'DEEP', CALLER))._unsafeUnwrap();

      expect(intent.commands()[0]).toEqual({
        kind: 'moveCall',
        target: `${TESTNET_PACKAGE}::balance_manager::withdraw_all`,
        typeArguments: [DEEP_TYPE],
        arguments: [MANAGER_1_ARG],
      });
    });

    it('mints a trade cap for the caller', async () => {
      (await composer.mintTradeCap(intent, 'MANAGER_1'))._unsafeUnwrap();

      expect(intent.commands()).toEqual([
        {
          kind: 'moveCall',
          target: `${TESTNET_PACKAGE}::balance_manager::mint_trade_cap`,
          typeArguments: [],
          arguments: [MANAGER_1_ARG],
        },
        { kind: 'transfer', objects: [{ kind: 'result', step: 0 }], recipient: CALLER },
      ]);
    });

    it('mints a trade cap for another address', async () => {
      (await composer.mintAndTransferTradeCap(intent, 'MANAGER_1', MANAGER_2))._unsafeUnwrap();

      expect(intent.commands()[1]).toEqual({
        kind: 'transfer',
        objects: [{ kind: 'result', step: 0 }],
        recipient: MANAGER_2,
      });
    });

    it('generates a standalone proof', async () => {
      (await composer.generateProof(intent, 'MANAGER_2'))._unsafeUnwrap();

      expect(intent.commands()).toEqual([
        {
          kind: 'moveCall',
          target: `${TESTNET_PACKAGE}::balance_manager::generate_proof_as_trader`,
          typeArguments: [],
          arguments: [MANAGER_2_ARG, CAP_ARG],
        },
      ]);
    });

    it('reports an unknown manager key', async () => {
      const error = (await composer.generateProof(intent, 'MANAGER_9'))._unsafeUnwrapErr();

      expect(error.message).toBe('generateProof(MANAGER_9): Unknown balance manager key: MANAGER_9');
    });
  });

  describe('swaps', () => {
    it('swaps exact base for quote and returns every output to the caller', async () => {
      (await composer.swapExactBaseForQuote(intent, { poolKey: 'DEEP_SUI', amount: '10', minOut: '0.5' }))._unsafeUnwrap();

      expect(intent.commands()).toEqual([
        {
          kind: 'moveCall',
          target: `${TESTNET_PACKAGE}::pool::swap_exact_base_for_quote`,
          typeArguments: [DEEP_TYPE, SUI_TYPE],
          arguments: [
            POOL_ARG,
            arg.coin(DEEP_TYPE, 10_000_000n),
            arg.coin(DEEP_TYPE, 0n),
            arg.u64(500_000_000n),
            CLOCK_ARG,
          ],
        },
        {
          kind: 'transfer',
          objects: [
            { kind: 'result', step: 0, index: 0 },
            { kind: 'result', step: 0, index: 1 },
            { kind: 'result', step: 0, index: 2 },
          ],
          recipient: CALLER,
        },
      ]);
    });

    it('swaps exact quote for base with a DEEP fee', async () => {
      (
        await composer.swapExactQuoteForBase(intent, { poolKey: 'DEEP_SUI', amount: '2', deepAmount: '1', minOut: '50' })
      )._unsafeUnwrap();

      expect(intent.commands()[0]).toMatchObject({
        target: `${TESTNET_PACKAGE}::pool::swap_exact_quote_for_base`,
        arguments: [
          POOL_ARG,
          arg.coin(SUI_TYPE, 2_000_000_000n),
          arg.coin(DEEP_TYPE, 1_000_000n),
          arg.u64(50_000_000n),
          CLOCK_ARG,
        ],
      });
    });

    it('rejects an amount that does not fit in a u64', async () => {
      const error = (
        await composer.swapExactBaseForQuote(intent, { poolKey: 'DEEP_SUI', amount: '18446744073709.551616' })
      )._unsafeUnwrapErr();

      expect(error.code).toBe('AMOUNT_OUT_OF_RANGE');
      expect(ledger.fetched).toEqual([]);
    });
  });
});
