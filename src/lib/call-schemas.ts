/**
 * Declared parameter order of every Move function the composer calls.
 *
 * Arguments are staged by parameter name and laid out from `params` when the
 * call is appended, so an argument cannot land in the wrong position.
 */

export interface CallSchema {
  package: 'deepbook' | 'framework';
  module: string;
  function: string;
  params: readonly string[];
  typeParams: number;
}

export const CALL_SCHEMAS = {
  // ============== Balance Manager ==============
  newBalanceManager: {
    package: 'deepbook',
    module: 'balance_manager',
    function: 'new',
    params: [],
    typeParams: 0,
  },
  deposit: {
    package: 'deepbook',
    module: 'balance_manager',
    function: 'deposit',
    params: ['balanceManager', 'coin'],
    typeParams: 1,
  },
  withdraw: {
    package: 'deepbook',
    module: 'balance_manager',
    function: 'withdraw',
    params: ['balanceManager', 'amount'],
    typeParams: 1,
  },
  withdrawAll: {
    package: 'deepbook',
    module: 'balance_manager',
    function: 'withdraw_all',
    params: ['balanceManager'],
    typeParams: 1,
  },
  managerBalance: {
    package: 'deepbook',
    module: 'balance_manager',
    function: 'balance',
    params: ['balanceManager'],
    typeParams: 1,
  },
  mintTradeCap: {
    package: 'deepbook',
    module: 'balance_manager',
    function: 'mint_trade_cap',
    params: ['balanceManager'],
    typeParams: 0,
  },
  generateProofAsOwner: {
    package: 'deepbook',
    module: 'balance_manager',
    function: 'generate_proof_as_owner',
    params: ['balanceManager'],
    typeParams: 0,
  },
  generateProofAsTrader: {
    package: 'deepbook',
    module: 'balance_manager',
    function: 'generate_proof_as_trader',
    params: ['balanceManager', 'tradeCap'],
    typeParams: 0,
  },

  // ============== Pool ==============
  placeLimitOrder: {
    package: 'deepbook',
    module: 'pool',
    function: 'place_limit_order',
    params: [
      'pool',
      'balanceManager',
      'tradeProof',
      'clientOrderId',
      'orderType',
      'selfMatchingOption',
      'price',
      'quantity',
      'isBid',
      'payWithDeep',
      'expireTimestamp',
      'clock',
    ],
    typeParams: 2,
  },
  placeMarketOrder: {
    package: 'deepbook',
    module: 'pool',
    function: 'place_market_order',
    params: [
      'pool',
      'balanceManager',
      'tradeProof',
      'clientOrderId',
      'selfMatchingOption',
      'quantity',
      'isBid',
      'payWithDeep',
      'clock',
    ],
    typeParams: 2,
  },
  modifyOrder: {
    package: 'deepbook',
    module: 'pool',
    function: 'modify_order',
    params: ['pool', 'balanceManager', 'tradeProof', 'orderId', 'newQuantity', 'clock'],
    typeParams: 2,
  },
  cancelOrder: {
    package: 'deepbook',
    module: 'pool',
    function: 'cancel_order',
    params: ['pool', 'balanceManager', 'tradeProof', 'orderId', 'clock'],
    typeParams: 2,
  },
  cancelAllOrders: {
    package: 'deepbook',
    module: 'pool',
    function: 'cancel_all_orders',
    params: ['pool', 'balanceManager', 'tradeProof', 'clock'],
    typeParams: 2,
  },
  withdrawSettledAmounts: {
    package: 'deepbook',
    module: 'pool',
    function: 'withdraw_settled_amounts',
    params: ['pool', 'balanceManager', 'tradeProof'],
    typeParams: 2,
  },
  swapExactBaseForQuote: {
    package: 'deepbook',
    module: 'pool',
    function: 'swap_exact_base_for_quote',
    params: ['pool', 'baseIn', 'deepIn', 'minQuoteOut', 'clock'],
    typeParams: 2,
  },
  swapExactQuoteForBase: {
    package: 'deepbook',
    module: 'pool',
    function: 'swap_exact_quote_for_base',
    params: ['pool', 'quoteIn', 'deepIn', 'minBaseOut', 'clock'],
    typeParams: 2,
  },
  accountOpenOrders: {
    package: 'deepbook',
    module: 'pool',
    function: 'account_open_orders',
    params: ['pool', 'balanceManager'],
    typeParams: 2,
  },
  whitelisted: {
    package: 'deepbook',
    module: 'pool',
    function: 'whitelisted',
    params: ['pool'],
    typeParams: 2,
  },

  // ============== Sui Framework ==============
  publicShareObject: {
    package: 'framework',
    module: 'transfer',
    function: 'public_share_object',
    params: ['object'],
    typeParams: 1,
  },
} as const satisfies Record<string, CallSchema>;

export type CallKind = keyof typeof CALL_SCHEMAS;

export type CallParam<K extends CallKind> = (typeof CALL_SCHEMAS)[K]['params'][number];
