/**
 * Remote ledger read interface and its Sui JSON-RPC implementation.
 *
 * The engine only needs two remote capabilities: the ownership/version
 * metadata of an object and a dry-run (dev-inspect) of a transaction.
 * Nothing here is cached; every call is a fresh read.
 */

import {
  SuiClient,
  type DevInspectResults,
  type DevInspectTransactionBlockParams,
  type GetObjectParams,
  type ObjectOwner,
  type SuiObjectResponse,
} from '@mysten/sui/client';
import type { Transaction } from '@mysten/sui/transactions';
import { normalizeSuiAddress } from '@mysten/sui/utils';

import { NETWORK_CONFIG, type NetworkEnv } from './constants';

// ============== Types ==============

/**
 * Who holds an object. Only `shared`, address-`owned` and `immutable` objects
 * can be passed to a call directly; `object-owned` (a child of another object)
 * and `consensus` objects are reported so the resolver can refuse them.
 */
export type ObjectOwnership =
  | { kind: 'shared'; initialSharedVersion: string }
  | { kind: 'owned'; owner: string }
  | { kind: 'object-owned'; parent: string }
  | { kind: 'consensus' }
  | { kind: 'immutable' };

export interface ObjectMetadata {
  objectId: string;
  version: string;
  digest: string;
  owner: ObjectOwnership;
}

export interface ReturnValue {
  bytes: Uint8Array;
  type: string;
}

export interface SimulatedCall {
  returnValues?: ReturnValue[];
}

export interface SimulationOutcome {
  /** Abort or execution error reported by the ledger */
  error?: string;
  results?: SimulatedCall[];
}

export interface LedgerReader {
  getObjectMetadata(objectId: string): Promise<ObjectMetadata>;
  simulate(sender: string, transaction: Transaction): Promise<SimulationOutcome>;
}

// ============== Sui Implementation ==============

/** The two JSON-RPC reads the reader makes; `SuiClient` satisfies it. */
export interface LedgerClient {
  getObject(input: GetObjectParams): Promise<SuiObjectResponse>;
  devInspectTransactionBlock(
    input: DevInspectTransactionBlockParams,
  ): Promise<Pick<DevInspectResults, 'error' | 'results'>>;
}

export function toOwnership(owner: ObjectOwner): ObjectOwnership {
  if (owner === 'Immutable') {
    return { kind: 'immutable' };
  }
  if ('AddressOwner' in owner) {
    return { kind: 'owned', owner: normalizeSuiAddress(owner.AddressOwner) };
  }
  if ('ObjectOwner' in owner) {
    return { kind: 'object-owned', parent: normalizeSuiAddress(owner.ObjectOwner) };
  }
  if ('Shared' in owner) {
    return { kind: 'shared', initialSharedVersion: owner.Shared.initial_shared_version };
  }
  return { kind: 'consensus' };
}

export class SuiLedgerReader implements LedgerReader {
  constructor(private readonly client: LedgerClient) {}

  static forNetwork(network: NetworkEnv, rpcUrl?: string): SuiLedgerReader {
    return new SuiLedgerReader(new SuiClient({ url: rpcUrl ?? NETWORK_CONFIG[network].rpcUrl }));
  }

  async getObjectMetadata(objectId: string): Promise<ObjectMetadata> {
    const response = await this.client.getObject({
      id: objectId,
      options: { showOwner: true },
    });

    const data = response.data;
    if (!data) {
      throw new Error(response.error ? `ledger returned ${response.error.code}` : 'object not found');
    }
    if (!data.owner) {
      throw new Error('ledger response carries no owner');
    }

    return {
      objectId: data.objectId,
      version: data.version,
      digest: data.digest,
      owner: toOwnership(data.owner),
    };
  }

  async simulate(sender: string, transaction: Transaction): Promise<SimulationOutcome> {
    const response = await this.client.devInspectTransactionBlock({
      sender,
      transactionBlock: transaction,
    });

    return {
      error: response.error ?? undefined,
      results: response.results?.map((result) => ({
        returnValues: result.returnValues?.map(([bytes, type]) => ({ bytes: Uint8Array.from(bytes), type })),
      })),
    };
  }
}
