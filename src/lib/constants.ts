// ============== Protocol Constants ==============

export const FLOAT_SCALAR = 1_000_000_000n; // 1e9 - fixed-point scale applied to every price
export const DEEP_SCALAR = 1_000_000n; // 1e6 - DEEP has 6 decimals
export const GAS_BUDGET = 250_000_000; // 0.25 SUI
export const MAX_TIMESTAMP = 18_446_744_073_709_551_615n; // u64::MAX, "never expires"

export const U8_MAX = 255;
export const U64_MAX = (1n << 64n) - 1n;
export const U128_MAX = (1n << 128n) - 1n;

export const SUI_FRAMEWORK_ADDRESS = '0x2';

// ============== Network Endpoints ==============

export type NetworkEnv = 'testnet' | 'mainnet';

export const NETWORK_CONFIG: Record<NetworkEnv, { rpcUrl: string }> = {
  testnet: {
    rpcUrl: 'https://fullnode.testnet.sui.io:443',
  },
  mainnet: {
    rpcUrl: 'https://fullnode.mainnet.sui.io:443',
  },
};

/**
 * Anything other than "mainnet" selects the testnet deployment.
 */
export function resolveNetwork(env: string): NetworkEnv {
  return env === 'mainnet' ? 'mainnet' : 'testnet';
}

// ============== Order Enums ==============

export enum OrderType {
  NO_RESTRICTION = 0,
  IMMEDIATE_OR_CANCEL = 1,
  FILL_OR_KILL = 2,
  POST_ONLY = 3,
}

export enum SelfMatchingOption {
  SELF_MATCHING_ALLOWED = 0,
  CANCEL_TAKER = 1,
  CANCEL_MAKER = 2,
}
