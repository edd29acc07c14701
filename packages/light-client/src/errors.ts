import {RootHex, Slot, SyncPeriod} from "@vouch/types";
import {VouchError} from "@vouch/utils";

export enum BootstrapErrorCode {
  /** Bootstrap header does not hash to the trusted checkpoint root */
  CHECKPOINT_MISMATCH = "BOOTSTRAP_ERROR_CHECKPOINT_MISMATCH",
  INVALID_HEADER = "BOOTSTRAP_ERROR_INVALID_HEADER",
  INVALID_COMMITTEE_PROOF = "BOOTSTRAP_ERROR_INVALID_COMMITTEE_PROOF",
  CHECKPOINT_TOO_OLD = "BOOTSTRAP_ERROR_CHECKPOINT_TOO_OLD",
}

export type BootstrapErrorType =
  | {code: BootstrapErrorCode.CHECKPOINT_MISMATCH; headerRoot: RootHex; checkpointRoot: RootHex}
  | {code: BootstrapErrorCode.INVALID_HEADER; slot: Slot}
  | {code: BootstrapErrorCode.INVALID_COMMITTEE_PROOF; slot: Slot}
  | {code: BootstrapErrorCode.CHECKPOINT_TOO_OLD; slot: Slot; ageSec: number; maxAgeSec: number};

export class BootstrapError extends VouchError<BootstrapErrorType> {}

export enum ConsensusErrorCode {
  /** No store to verify updates against, a bootstrap must come first */
  NOT_BOOTSTRAPPED = "CONSENSUS_ERROR_NOT_BOOTSTRAPPED",
  /** Update would not advance the store */
  NOT_RELEVANT = "CONSENSUS_ERROR_NOT_RELEVANT",
  INVALID_TIMING = "CONSENSUS_ERROR_INVALID_TIMING",
  NO_COMMITTEE = "CONSENSUS_ERROR_NO_COMMITTEE",
  INSUFFICIENT_PARTICIPATION = "CONSENSUS_ERROR_INSUFFICIENT_PARTICIPATION",
  INVALID_SIGNATURE = "CONSENSUS_ERROR_INVALID_SIGNATURE",
  INVALID_COMMITTEE_PROOF = "CONSENSUS_ERROR_INVALID_COMMITTEE_PROOF",
  INVALID_FINALITY_PROOF = "CONSENSUS_ERROR_INVALID_FINALITY_PROOF",
  INVALID_HEADER = "CONSENSUS_ERROR_INVALID_HEADER",
}

export type ConsensusErrorType =
  | {code: ConsensusErrorCode.NOT_BOOTSTRAPPED}
  | {code: ConsensusErrorCode.NOT_RELEVANT; attestedSlot: Slot; optimisticSlot: Slot; finalizedSlot: Slot}
  | {
      code: ConsensusErrorCode.INVALID_TIMING;
      signatureSlot: Slot;
      attestedSlot: Slot;
      finalizedSlot: Slot | null;
      currentSlot: Slot;
    }
  | {code: ConsensusErrorCode.NO_COMMITTEE; signaturePeriod: SyncPeriod; storePeriod: SyncPeriod}
  | {code: ConsensusErrorCode.INSUFFICIENT_PARTICIPATION; participants: number; committeeSize: number}
  | {code: ConsensusErrorCode.INVALID_SIGNATURE; signatureSlot: Slot; reason: string}
  | {code: ConsensusErrorCode.INVALID_COMMITTEE_PROOF; attestedSlot: Slot}
  | {code: ConsensusErrorCode.INVALID_FINALITY_PROOF; finalizedSlot: Slot}
  | {code: ConsensusErrorCode.INVALID_HEADER; slot: Slot};

export class ConsensusError extends VouchError<ConsensusErrorType> {}
