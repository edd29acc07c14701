import bls from "@chainsafe/bls/switchable";
import type {PublicKey} from "@chainsafe/bls/types";
import {BitArray} from "@chainsafe/ssz";
import {Root, SyncCommittee} from "@vouch/types";
import {toHex} from "@vouch/utils";
import {SyncCommitteeFast} from "../types.js";

export function sumBits(bits: BitArray): number {
  return bits.getTrueBitIndexes().length;
}

export function isZeroHash(root: Root): boolean {
  for (let i = 0; i < root.length; i++) {
    if (root[i] !== 0) {
      return false;
    }
  }
  return true;
}

export function isZeroBranch(branch: Root[]): boolean {
  return branch.every(isZeroHash);
}

/**
 * Util to guarantee that all bits have a corresponding pubkey
 */
export function getParticipantPubkeys<T>(pubkeys: T[], bits: BitArray): T[] {
  // BitArray.intersectValues() checks the length is correct
  return bits.intersectValues(pubkeys);
}

export function deserializeSyncCommittee(syncCommittee: SyncCommittee): SyncCommitteeFast {
  // Committees repeat keys across periods, deserialize each distinct key once
  const pubkeyCache = new Map<string, PublicKey>();
  const pubkeys = syncCommittee.pubkeys.map((pkBytes) => {
    const key = toHex(pkBytes);
    let pk = pubkeyCache.get(key);
    if (!pk) {
      pk = bls.PublicKey.fromBytes(pkBytes);
      pubkeyCache.set(key, pk);
    }
    return pk;
  });

  return {
    pubkeys,
    aggregatePubkey: bls.PublicKey.fromBytes(syncCommittee.aggregatePubkey),
  };
}
