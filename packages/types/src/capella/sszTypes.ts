import {ByteListType, ByteVectorType, ContainerType, VectorCompositeType} from "@chainsafe/ssz";
import {
  BLOCK_BODY_EXECUTION_PAYLOAD_DEPTH,
  CURRENT_SYNC_COMMITTEE_DEPTH,
  FINALIZED_ROOT_DEPTH,
  NEXT_SYNC_COMMITTEE_DEPTH,
} from "@vouch/params";
import * as primitiveSsz from "../primitive/sszTypes.js";
import * as phase0Ssz from "../phase0/sszTypes.js";
import * as altairSsz from "../altair/sszTypes.js";

const {Bytes32, UintNum64, UintBn256, Root, ExecutionAddress, Slot} = primitiveSsz;

const MAX_EXTRA_DATA_BYTES = 32;
const BYTES_PER_LOGS_BLOOM = 256;

export const ExecutionPayloadHeader = new ContainerType(
  {
    parentHash: Root,
    feeRecipient: ExecutionAddress,
    stateRoot: Bytes32,
    receiptsRoot: Bytes32,
    logsBloom: new ByteVectorType(BYTES_PER_LOGS_BLOOM),
    prevRandao: Bytes32,
    blockNumber: UintNum64,
    gasLimit: UintNum64,
    gasUsed: UintNum64,
    timestamp: UintNum64,
    extraData: new ByteListType(MAX_EXTRA_DATA_BYTES),
    baseFeePerGas: UintBn256,
    blockHash: Root,
    transactionsRoot: Root,
    withdrawalsRoot: Root,
  },
  {typeName: "ExecutionPayloadHeader", jsonCase: "eth2"}
);

export const ExecutionBranch = new VectorCompositeType(Bytes32, BLOCK_BODY_EXECUTION_PAYLOAD_DEPTH);

export const LightClientHeader = new ContainerType(
  {
    beacon: phase0Ssz.BeaconBlockHeader,
    execution: ExecutionPayloadHeader,
    executionBranch: ExecutionBranch,
  },
  {typeName: "LightClientHeader", jsonCase: "eth2"}
);

export const LightClientBootstrap = new ContainerType(
  {
    header: LightClientHeader,
    currentSyncCommittee: altairSsz.SyncCommittee,
    currentSyncCommitteeBranch: new VectorCompositeType(Bytes32, CURRENT_SYNC_COMMITTEE_DEPTH),
  },
  {typeName: "LightClientBootstrap", jsonCase: "eth2"}
);

export const LightClientUpdate = new ContainerType(
  {
    attestedHeader: LightClientHeader,
    nextSyncCommittee: altairSsz.SyncCommittee,
    nextSyncCommitteeBranch: new VectorCompositeType(Bytes32, NEXT_SYNC_COMMITTEE_DEPTH),
    finalizedHeader: LightClientHeader,
    finalityBranch: new VectorCompositeType(Bytes32, FINALIZED_ROOT_DEPTH),
    syncAggregate: altairSsz.SyncAggregate,
    signatureSlot: Slot,
  },
  {typeName: "LightClientUpdate", jsonCase: "eth2"}
);

export const LightClientFinalityUpdate = new ContainerType(
  {
    attestedHeader: LightClientHeader,
    finalizedHeader: LightClientHeader,
    finalityBranch: new VectorCompositeType(Bytes32, FINALIZED_ROOT_DEPTH),
    syncAggregate: altairSsz.SyncAggregate,
    signatureSlot: Slot,
  },
  {typeName: "LightClientFinalityUpdate", jsonCase: "eth2"}
);

export const LightClientOptimisticUpdate = new ContainerType(
  {
    attestedHeader: LightClientHeader,
    syncAggregate: altairSsz.SyncAggregate,
    signatureSlot: Slot,
  },
  {typeName: "LightClientOptimisticUpdate", jsonCase: "eth2"}
);
