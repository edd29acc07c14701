import {ContainerType, VectorCompositeType} from "@chainsafe/ssz";
import {
  CURRENT_SYNC_COMMITTEE_DEPTH_ELECTRA,
  FINALIZED_ROOT_DEPTH_ELECTRA,
  NEXT_SYNC_COMMITTEE_DEPTH_ELECTRA,
} from "@vouch/params";
import * as primitiveSsz from "../primitive/sszTypes.js";
import * as altairSsz from "../altair/sszTypes.js";
import * as denebSsz from "../deneb/sszTypes.js";

const {Bytes32, Slot} = primitiveSsz;

// The execution payload header is unchanged since deneb, only state branches grow
export const ExecutionPayloadHeader = denebSsz.ExecutionPayloadHeader;
export const LightClientHeader = denebSsz.LightClientHeader;

export const LightClientBootstrap = new ContainerType(
  {
    header: LightClientHeader,
    currentSyncCommittee: altairSsz.SyncCommittee,
    currentSyncCommitteeBranch: new VectorCompositeType(Bytes32, CURRENT_SYNC_COMMITTEE_DEPTH_ELECTRA),
  },
  {typeName: "LightClientBootstrap", jsonCase: "eth2"}
);

export const LightClientUpdate = new ContainerType(
  {
    attestedHeader: LightClientHeader,
    nextSyncCommittee: altairSsz.SyncCommittee,
    nextSyncCommitteeBranch: new VectorCompositeType(Bytes32, NEXT_SYNC_COMMITTEE_DEPTH_ELECTRA),
    finalizedHeader: LightClientHeader,
    finalityBranch: new VectorCompositeType(Bytes32, FINALIZED_ROOT_DEPTH_ELECTRA),
    syncAggregate: altairSsz.SyncAggregate,
    signatureSlot: Slot,
  },
  {typeName: "LightClientUpdate", jsonCase: "eth2"}
);

export const LightClientFinalityUpdate = new ContainerType(
  {
    attestedHeader: LightClientHeader,
    finalizedHeader: LightClientHeader,
    finalityBranch: new VectorCompositeType(Bytes32, FINALIZED_ROOT_DEPTH_ELECTRA),
    syncAggregate: altairSsz.SyncAggregate,
    signatureSlot: Slot,
  },
  {typeName: "LightClientFinalityUpdate", jsonCase: "eth2"}
);

export const LightClientOptimisticUpdate = denebSsz.LightClientOptimisticUpdate;
