import { isValidSuiObjectId, normalizeSuiObjectId } from '@mysten/sui/utils';
import { err, ok, type Result } from 'neverthrow';

import { AddressParseError } from './errors';

const HEX_ADDRESS = /^0x[0-9a-fA-F]{1,64}$/;

/**
 * Validate and normalize an object id or address to its 32-byte form.
 * Short forms such as "0x6" are accepted.
 */
export function parseObjectId(value: string): Result<string, AddressParseError> {
  const trimmed = value.trim();
  if (!HEX_ADDRESS.test(trimmed)) {
    return err(new AddressParseError(value));
  }
  const normalized = normalizeSuiObjectId(trimmed);
  return isValidSuiObjectId(normalized) ? ok(normalized) : err(new AddressParseError(value));
}
