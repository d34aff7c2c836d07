export {
  AMOUNT_ROUNDING,
  DISPLAY_PRECISION,
  inputToPrice,
  parseUnsignedId,
  priceToInput,
  toDecimal,
  toUnits,
  type AmountError,
  type DecimalInput,
} from './lib/amounts';
export { parseObjectId } from './lib/address';
export { CALL_SCHEMAS, type CallKind, type CallSchema } from './lib/call-schemas';
export {
  DeepBookClient,
  createDeepBookClient,
  createDeepBookClientFromEnv,
  type DeepBookClientOptions,
} from './lib/client';
export {
  DeepBookComposer,
  type CancelOrderParams,
  type ModifyOrderParams,
  type PlaceLimitOrderParams,
  type PlaceMarketOrderParams,
  type SwapParams,
} from './lib/composer';
export {
  DEFAULT_NETWORK_TABLES,
  DeepBookConfig,
  type AccountAccess,
  type BalanceManager,
  type BalanceManagerInput,
  type BalanceManagerMap,
  type Coin,
  type CoinMap,
  type DeepBookConfigOptions,
  type NetworkTables,
  type PackageIds,
  type Pool,
  type PoolMap,
} from './lib/config';
export {
  DEEP_SCALAR,
  FLOAT_SCALAR,
  GAS_BUDGET,
  MAX_TIMESTAMP,
  NETWORK_CONFIG,
  OrderType,
  SelfMatchingOption,
  resolveNetwork,
  type NetworkEnv,
} from './lib/constants';
export { envSchema, readEnv, type EnvConfig } from './lib/env';
export * from './lib/errors';
export {
  IntentBuilder,
  OperationPlan,
  arg,
  type CallArgs,
  type ComposedCommand,
  type FinalizedIntent,
  type PureArg,
  type ResultRef,
  type StagedArg,
  type StagedStep,
} from './lib/intent';
export {
  SuiLedgerReader,
  toOwnership,
  type LedgerClient,
  type LedgerReader,
  type ObjectMetadata,
  type ObjectOwnership,
  type ReturnValue,
  type SimulatedCall,
  type SimulationOutcome,
} from './lib/ledger';
export { getLogger, type Logger } from './lib/logger';
export { deriveProof, type ResolvedAccess } from './lib/proof';
export {
  DeepBookQueries,
  boolDecoder,
  openOrdersDecoder,
  u64Decoder,
  type ManagerBalance,
} from './lib/queries';
export { ObjectResolver, type ObjectArgument, type ObjectRequirement, type ResolutionError } from './lib/resolver';
export {
  SimulationExecutor,
  decodeFirstReturn,
  type ReturnDecoder,
  type SimulationError,
} from './lib/simulator';
