import { DeepBookComposer } from './composer';
import { DeepBookConfig, type DeepBookConfigOptions } from './config';
import { readEnv } from './env';
import { ConfigurationError } from './errors';
import { IntentBuilder } from './intent';
import { SuiLedgerReader, type LedgerReader } from './ledger';
import { getLogger } from './logger';
import { DeepBookQueries } from './queries';
import { ObjectResolver } from './resolver';
import { SimulationExecutor } from './simulator';

export interface DeepBookClientOptions extends DeepBookConfigOptions {
  /** Fullnode URL; the network's public fullnode when omitted */
  rpcUrl?: string;
  /** Ledger reader to use instead of a JSON-RPC client */
  ledger?: LedgerReader;
}

/**
 * Wires the registry, ledger reader, resolver, composer, simulator and
 * queries for one network and caller.
 */
export class DeepBookClient {
  readonly config: DeepBookConfig;
  readonly resolver: ObjectResolver;
  readonly composer: DeepBookComposer;
  readonly simulator: SimulationExecutor;
  readonly queries: DeepBookQueries;

  constructor(config: DeepBookConfig, ledger: LedgerReader) {
    this.config = config;
    this.resolver = new ObjectResolver(ledger);
    this.composer = new DeepBookComposer(config, this.resolver);
    this.simulator = new SimulationExecutor(ledger, config);
    this.queries = new DeepBookQueries(config, this.resolver, this.simulator);
  }

  /** Fresh intent bound to the configured package and caller */
  newIntent(): IntentBuilder {
    return new IntentBuilder(this.config.packageIds.deepbookPackageId, this.config.address);
  }
}

export function createDeepBookClient(options: DeepBookClientOptions): DeepBookClient {
  const { rpcUrl, ledger, ...configOptions } = options;
  const config = new DeepBookConfig(configOptions);

  getLogger('client').info(
    { network: config.network, address: config.address, balanceManagers: config.balanceManagerKeys() },
    'DeepBook client ready',
  );

  return new DeepBookClient(config, ledger ?? SuiLedgerReader.forNetwork(config.network, rpcUrl));
}

/**
 * Build a client from SUI_NETWORK, SUI_RPC_URL and SUI_ADDRESS.
 *
 * @throws ConfigurationError when SUI_ADDRESS is missing
 */
export function createDeepBookClientFromEnv(
  source: NodeJS.ProcessEnv = process.env,
  options: Pick<DeepBookClientOptions, 'coins' | 'pools' | 'balanceManagers' | 'ledger'> = {},
): DeepBookClient {
  const env = readEnv(source);
  if (!env.SUI_ADDRESS) {
    throw new ConfigurationError('SUI_ADDRESS is not set');
  }
  return createDeepBookClient({
    ...options,
    env: env.SUI_NETWORK,
    address: env.SUI_ADDRESS,
    rpcUrl: env.SUI_RPC_URL,
  });
}
