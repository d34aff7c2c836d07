/**
 * DeepBook configuration registry
 *
 * Maps symbolic keys ("SUI", "DEEP_SUI", "MANAGER_1") to the coin, pool and
 * balance manager descriptors of one network, plus the deployed package
 * coordinates. Lookups never throw: an unknown key is `undefined` and the
 * caller decides whether that is fatal.
 */

import { z } from 'zod';

import { parseObjectId } from './address';
import { resolveNetwork, type NetworkEnv } from './constants';
import mainnetTables from './data/mainnet.json';
import testnetTables from './data/testnet.json';
import { ConfigurationError } from './errors';

// ============== Types ==============

export interface Coin {
  address: string;
  type: string;
  /** Integer units per whole coin, 10^decimals */
  scalar: number;
}

export interface Pool {
  address: string;
  baseCoin: string;
  quoteCoin: string;
}

/**
 * How the caller is allowed to act on a balance manager: as its owner, or
 * through a TradeCap minted by the owner.
 */
export type AccountAccess = { kind: 'owner' } | { kind: 'delegated'; tradeCap: string };

export interface BalanceManager {
  address: string;
  access: AccountAccess;
}

/** Balance manager as supplied by callers; `tradeCap` only when not the owner. */
export interface BalanceManagerInput {
  address: string;
  tradeCap?: string;
}

export interface PackageIds {
  deepbookPackageId: string;
  registryId: string;
  deepTreasuryId: string;
}

export type CoinMap = Record<string, Coin>;
export type PoolMap = Record<string, Pool>;
export type BalanceManagerMap = Record<string, BalanceManagerInput>;

// ============== Schemas ==============

const objectIdSchema = z.string().transform((value, ctx) => {
  const parsed = parseObjectId(value);
  if (parsed.isErr()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message });
    return z.NEVER;
  }
  return parsed.value;
});

const coinSchema = z.object({
  address: objectIdSchema,
  type: z.string().trim().regex(/^0x[0-9a-fA-F]+::\w+::\w+$/, { message: 'not a fully qualified coin type' }),
  scalar: z
    .number()
    .int()
    .positive()
    .refine((value) => /^10*$/.test(String(value)), { message: 'scalar must be a power of ten' }),
});

const poolSchema = z.object({
  address: objectIdSchema,
  baseCoin: z.string().min(1),
  quoteCoin: z.string().min(1),
});

const balanceManagerSchema = z.object({
  address: objectIdSchema,
  tradeCap: objectIdSchema.optional(),
});

const networkTablesSchema = z.object({
  packageIds: z.object({
    deepbookPackageId: objectIdSchema,
    registryId: objectIdSchema,
    deepTreasuryId: objectIdSchema,
  }),
  coins: z.record(coinSchema),
  pools: z.record(poolSchema),
});

export type NetworkTables = z.infer<typeof networkTablesSchema>;

function freezeTables(tables: NetworkTables): Readonly<NetworkTables> {
  return Object.freeze({
    packageIds: Object.freeze({ ...tables.packageIds }),
    coins: Object.freeze({ ...tables.coins }),
    pools: Object.freeze({ ...tables.pools }),
  });
}

/** Built-in tables, validated once when this module loads. */
export const DEFAULT_NETWORK_TABLES: Readonly<Record<NetworkEnv, Readonly<NetworkTables>>> = Object.freeze({
  mainnet: freezeTables(networkTablesSchema.parse(mainnetTables)),
  testnet: freezeTables(networkTablesSchema.parse(testnetTables)),
});

// ============== Config ==============

export interface DeepBookConfigOptions {
  /** "mainnet" or anything else, which selects testnet */
  env: string;
  /** Caller address, used as sender for simulations */
  address: string;
  coins?: CoinMap;
  pools?: PoolMap;
  balanceManagers?: BalanceManagerMap;
}

export class DeepBookConfig {
  readonly network: NetworkEnv;
  readonly address: string;
  readonly packageIds: Readonly<PackageIds>;

  readonly #coins: ReadonlyMap<string, Coin>;
  readonly #pools: ReadonlyMap<string, Pool>;
  readonly #balanceManagers: ReadonlyMap<string, BalanceManager>;

  /**
   * @throws ConfigurationError when an override table is malformed or a pool
   * references a coin key missing from the active coin table
   */
  constructor(options: DeepBookConfigOptions) {
    this.network = resolveNetwork(options.env);
    const defaults = DEFAULT_NETWORK_TABLES[this.network];

    const address = parseObjectId(options.address);
    if (address.isErr()) {
      throw new ConfigurationError(`Invalid caller address: "${options.address}"`, { cause: address.error });
    }
    this.address = address.value;
    this.packageIds = defaults.packageIds;

    const coins = options.coins ? parseTable('coins', z.record(coinSchema), options.coins) : defaults.coins;
    const pools = options.pools ? parseTable('pools', z.record(poolSchema), options.pools) : defaults.pools;
    const managers = parseTable('balanceManagers', z.record(balanceManagerSchema), options.balanceManagers ?? {});

    this.#coins = new Map(Object.entries(coins));
    this.#pools = new Map(Object.entries(pools));

    for (const [key, pool] of this.#pools) {
      for (const coinKey of [pool.baseCoin, pool.quoteCoin]) {
        if (!this.#coins.has(coinKey)) {
          throw new ConfigurationError(`Pool ${key} references unknown coin ${coinKey}`);
        }
      }
    }
    this.#balanceManagers = new Map(
      Object.entries(managers).map(([key, manager]): [string, BalanceManager] => [
        key,
        {
          address: manager.address,
          access: manager.tradeCap ? { kind: 'delegated', tradeCap: manager.tradeCap } : { kind: 'owner' },
        },
      ]),
    );
  }

  getCoin(key: string): Coin | undefined {
    return this.#coins.get(key);
  }

  getPool(key: string): Pool | undefined {
    return this.#pools.get(key);
  }

  getBalanceManager(key: string): BalanceManager | undefined {
    return this.#balanceManagers.get(key);
  }

  coinKeys(): string[] {
    return [...this.#coins.keys()];
  }

  poolKeys(): string[] {
    return [...this.#pools.keys()];
  }

  balanceManagerKeys(): string[] {
    return [...this.#balanceManagers.keys()];
  }
}

function parseTable<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid ${name} table: ${details}`, { cause: parsed.error });
  }
  return parsed.data;
}
