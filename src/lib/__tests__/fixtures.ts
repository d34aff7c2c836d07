import { SUI_CLOCK_OBJECT_ID, normalizeSuiObjectId } from '@mysten/sui/utils';

import { DeepBookConfig } from '../config';
import type { StagedArg } from '../intent';

import { FakeLedger } from './fake-ledger';

export const CALLER = normalizeSuiObjectId('0xa11ce');
export const MANAGER_1 = normalizeSuiObjectId('0xb1');
export const MANAGER_2 = normalizeSuiObjectId('0xb2');
export const MISSING_MANAGER = normalizeSuiObjectId('0xb3');
export const TRADE_CAP = normalizeSuiObjectId('0xc2');
export const CLOCK = normalizeSuiObjectId(SUI_CLOCK_OBJECT_ID);

export const DEEP_SUI = '0x48c95963e9eac37a316b7ae04a0deb761bcdcc2b67912374d6036e7f0e9bae9f';
export const DEEP_TYPE = '0x36dbef866a1d62bf7328989a10fb2f07d769f4ee587c0de4a0a256e57e0a58a8::deep::DEEP';
export const SUI_TYPE = '0x0000000000000000000000000000000000000000000000000000000000000002::sui::SUI';
export const TESTNET_PACKAGE = '0x22be4cade64bf2d02412c7e8d0e8beea2f78828b948118d46735315409371a3c';

/** Testnet tables, one owner-held and one delegated manager, plus a manager the ledger does not know */
export function createTestConfig(): DeepBookConfig {
  return new DeepBookConfig({
    env: 'testnet',
    address: CALLER,
    balanceManagers: {
      MANAGER_1: { address: MANAGER_1 },
      MANAGER_2: { address: MANAGER_2, tradeCap: TRADE_CAP },
      MANAGER_3: { address: MISSING_MANAGER },
    },
  });
}

export function createTestLedger(): FakeLedger {
  return new FakeLedger()
    .addShared(DEEP_SUI, '100')
    .addShared(MANAGER_1, '200')
    .addShared(MANAGER_2, '300')
    .addOwned(TRADE_CAP, CALLER, '42', 'cap-digest')
    .addShared(CLOCK, '1');
}

export function sharedArg(objectId: string, initialSharedVersion: string, mutable: boolean): StagedArg {
  return { kind: 'object', object: { $kind: 'SharedObject', objectId, initialSharedVersion, mutable } };
}
