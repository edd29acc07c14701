import {
  BLOCK_BODY_EXECUTION_PAYLOAD_DEPTH as EXECUTION_PAYLOAD_DEPTH,
  BLOCK_BODY_EXECUTION_PAYLOAD_INDEX as EXECUTION_PAYLOAD_INDEX,
  CURRENT_SYNC_COMMITTEE_DEPTH,
  CURRENT_SYNC_COMMITTEE_DEPTH_ELECTRA,
  CURRENT_SYNC_COMMITTEE_INDEX,
  CURRENT_SYNC_COMMITTEE_INDEX_ELECTRA,
  FINALIZED_ROOT_DEPTH,
  FINALIZED_ROOT_DEPTH_ELECTRA,
  FINALIZED_ROOT_INDEX,
  FINALIZED_ROOT_INDEX_ELECTRA,
  ForkName,
  ForkSeq,
  NEXT_SYNC_COMMITTEE_DEPTH,
  NEXT_SYNC_COMMITTEE_DEPTH_ELECTRA,
  NEXT_SYNC_COMMITTEE_INDEX,
  NEXT_SYNC_COMMITTEE_INDEX_ELECTRA,
  isForkPostElectra,
} from "@vouch/params";
import {ChainForkConfig} from "@vouch/config";
import {
  LightClientFinalityUpdate,
  LightClientHeader,
  LightClientOptimisticUpdate,
  LightClientUpdate,
  Root,
  Slot,
  SyncAggregate,
  SyncCommittee,
} from "@vouch/types";
import {isValidMerkleBranch, isZeroBranch} from "../utils/index.js";

export const ZERO_HASH = new Uint8Array(32);

export type MerkleBranchPosition = {depth: number; index: number};

/**
 * Update reduced to what it proves. A part whose branch is all zeros is absent.
 */
export type NormalizedUpdate = {
  attestedHeader: LightClientHeader;
  nextSyncCommittee: {committee: SyncCommittee; branch: Root[]} | null;
  finality: {header: LightClientHeader; branch: Root[]} | null;
  syncAggregate: SyncAggregate;
  signatureSlot: Slot;
};

export function normalizeLightClientUpdate(update: LightClientUpdate): NormalizedUpdate {
  return {
    attestedHeader: update.attestedHeader,
    nextSyncCommittee: isZeroBranch(update.nextSyncCommitteeBranch)
      ? null
      : {committee: update.nextSyncCommittee, branch: update.nextSyncCommitteeBranch},
    finality: isZeroBranch(update.finalityBranch)
      ? null
      : {header: update.finalizedHeader, branch: update.finalityBranch},
    syncAggregate: update.syncAggregate,
    signatureSlot: update.signatureSlot,
  };
}

export function normalizeFinalityUpdate(update: LightClientFinalityUpdate): NormalizedUpdate {
  return {
    attestedHeader: update.attestedHeader,
    nextSyncCommittee: null,
    finality: isZeroBranch(update.finalityBranch)
      ? null
      : {header: update.finalizedHeader, branch: update.finalityBranch},
    syncAggregate: update.syncAggregate,
    signatureSlot: update.signatureSlot,
  };
}

export function normalizeOptimisticUpdate(update: LightClientOptimisticUpdate): NormalizedUpdate {
  return {
    attestedHeader: update.attestedHeader,
    nextSyncCommittee: null,
    finality: null,
    syncAggregate: update.syncAggregate,
    signatureSlot: update.signatureSlot,
  };
}

export function getFinalizedRootPosition(fork: ForkName): MerkleBranchPosition {
  return isForkPostElectra(fork)
    ? {depth: FINALIZED_ROOT_DEPTH_ELECTRA, index: FINALIZED_ROOT_INDEX_ELECTRA}
    : {depth: FINALIZED_ROOT_DEPTH, index: FINALIZED_ROOT_INDEX};
}

export function getNextSyncCommitteePosition(fork: ForkName): MerkleBranchPosition {
  return isForkPostElectra(fork)
    ? {depth: NEXT_SYNC_COMMITTEE_DEPTH_ELECTRA, index: NEXT_SYNC_COMMITTEE_INDEX_ELECTRA}
    : {depth: NEXT_SYNC_COMMITTEE_DEPTH, index: NEXT_SYNC_COMMITTEE_INDEX};
}

export function getCurrentSyncCommitteePosition(fork: ForkName): MerkleBranchPosition {
  return isForkPostElectra(fork)
    ? {depth: CURRENT_SYNC_COMMITTEE_DEPTH_ELECTRA, index: CURRENT_SYNC_COMMITTEE_INDEX_ELECTRA}
    : {depth: CURRENT_SYNC_COMMITTEE_DEPTH, index: CURRENT_SYNC_COMMITTEE_INDEX};
}

/**
 * A header is valid if its execution payload header is proven against `beacon.bodyRoot`.
 * Headers before capella carry no execution payload header and are not accepted.
 */
export function isValidLightClientHeader(config: ChainForkConfig, header: LightClientHeader): boolean {
  const slot = header.beacon.slot;
  const forkSeq = config.getForkSeq(slot);

  if (forkSeq < ForkSeq.capella) {
    return false;
  }

  if (forkSeq < ForkSeq.deneb) {
    if (header.execution.blobGasUsed !== BigInt(0) || header.execution.excessBlobGas !== BigInt(0)) {
      return false;
    }
  }

  return isValidMerkleBranch(
    config.getLightClientForkTypes(slot).ExecutionPayloadHeader.hashTreeRoot(header.execution),
    header.executionBranch,
    EXECUTION_PAYLOAD_DEPTH,
    EXECUTION_PAYLOAD_INDEX,
    header.beacon.bodyRoot
  );
}
