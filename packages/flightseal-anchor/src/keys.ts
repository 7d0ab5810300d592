import { MalformedInputError, isHashHex, type HashHex } from '@flightseal/core';
import { keccak256, stringToBytes, type Hex } from 'viem';

/** bytes32 registry key of a mission: keccak256 over the UTF-8 of its NFC id. */
export function missionKey(missionId: string): Hex {
  if (missionId.length === 0) {
    throw new MalformedInputError('Mission id must be a non-empty string', { path: 'mission_id' });
  }
  return keccak256(stringToBytes(missionId.normalize('NFC')));
}

export function toBytes32(hash: HashHex): Hex {
  if (!isHashHex(hash)) {
    throw new MalformedInputError('Expected 64 lowercase hex characters', { path: 'chain_hash' });
  }
  return `0x${hash}`;
}

/** Accepts `0x`-prefixed bytes32 in any case; returns bare lowercase hex. */
export function fromBytes32(value: Hex): HashHex {
  const bare = value.slice(2).toLowerCase();
  if (!isHashHex(bare)) {
    throw new MalformedInputError(`Registry returned a malformed bytes32 value: ${value}`);
  }
  return bare;
}
