import { normalizeSuiAddress } from '@mysten/sui/utils';
import { ResultAsync, err, errAsync, ok, type Result } from 'neverthrow';

import { parseObjectId } from './address';
import { AddressParseError, ObjectFetchError, OwnershipMismatchError } from './errors';
import type { LedgerReader, ObjectMetadata } from './ledger';

// ============== Types ==============

/**
 * A ledger object ready to be passed to a Move call.
 *
 * Shared objects carry their initial shared version so that concurrent
 * mutations are sequenced by the ledger; owned and immutable objects carry
 * the exact version and digest they were read at.
 */
export type ObjectArgument =
  | { $kind: 'SharedObject'; objectId: string; initialSharedVersion: string; mutable: boolean }
  | { $kind: 'OwnedObject'; objectId: string; version: string; digest: string };

export type ObjectRequirement =
  | { ownership: 'shared'; mutable: boolean }
  | { ownership: 'owned'; owner: string }
  | { ownership: 'any'; mutable: boolean };

export type ResolutionError = AddressParseError | ObjectFetchError | OwnershipMismatchError;

// ============== Resolver ==============

/**
 * Turns object addresses into typed call arguments using one ledger read per
 * resolution. A pool must come back shared and a TradeCap owned by the given
 * address; a mismatch is reported, never coerced.
 */
export class ObjectResolver {
  constructor(private readonly ledger: LedgerReader) {}

  resolve(address: string, requirement: ObjectRequirement): ResultAsync<ObjectArgument, ResolutionError> {
    const objectId = parseObjectId(address);
    if (objectId.isErr()) {
      return errAsync(objectId.error);
    }

    return ResultAsync.fromPromise(
      this.ledger.getObjectMetadata(objectId.value),
      (cause) => new ObjectFetchError(objectId.value, cause),
    ).andThen((metadata) => toArgument(objectId.value, metadata, requirement));
  }

  resolveShared(address: string, mutable: boolean): ResultAsync<ObjectArgument, ResolutionError> {
    return this.resolve(address, { ownership: 'shared', mutable });
  }

  resolveOwned(address: string, owner: string): ResultAsync<ObjectArgument, ResolutionError> {
    return this.resolve(address, { ownership: 'owned', owner });
  }
}

function toArgument(
  objectId: string,
  metadata: ObjectMetadata,
  requirement: ObjectRequirement,
): Result<ObjectArgument, OwnershipMismatchError> {
  const { owner } = metadata;

  if (owner.kind === 'shared') {
    if (requirement.ownership === 'owned') {
      return err(new OwnershipMismatchError(objectId, 'owned', 'shared'));
    }
    const shared: ObjectArgument = {
      $kind: 'SharedObject',
      objectId,
      initialSharedVersion: owner.initialSharedVersion,
      mutable: requirement.mutable,
    };
    return ok(shared);
  }

  if (requirement.ownership === 'shared') {
    return err(new OwnershipMismatchError(objectId, 'shared', owner.kind));
  }
  if (owner.kind === 'object-owned' || owner.kind === 'consensus') {
    return err(new OwnershipMismatchError(objectId, 'owned', owner.kind));
  }
  if (requirement.ownership === 'owned') {
    if (owner.kind === 'immutable') {
      return err(new OwnershipMismatchError(objectId, 'owned', 'immutable'));
    }
    const expected = normalizeSuiAddress(requirement.owner);
    const actual = normalizeSuiAddress(owner.owner);
    if (actual !== expected) {
      return err(new OwnershipMismatchError(objectId, 'owned', 'owned', { expected, actual }));
    }
  }

  const owned: ObjectArgument = {
    $kind: 'OwnedObject',
    objectId,
    version: metadata.version,
    digest: metadata.digest,
  };
  return ok(owned);
}
