import {BitVectorType, ContainerType, VectorCompositeType} from "@chainsafe/ssz";
import {SYNC_COMMITTEE_SIZE} from "@vouch/params";
import * as primitiveSsz from "../primitive/sszTypes.js";

const {BLSPubkey, BLSSignature} = primitiveSsz;

export const SyncCommitteeBits = new BitVectorType(SYNC_COMMITTEE_SIZE);

export const SyncAggregate = new ContainerType(
  {
    syncCommitteeBits: SyncCommitteeBits,
    syncCommitteeSignature: BLSSignature,
  },
  {typeName: "SyncAggregate", jsonCase: "eth2"}
);

export const SyncCommittee = new ContainerType(
  {
    pubkeys: new VectorCompositeType(BLSPubkey, SYNC_COMMITTEE_SIZE),
    aggregatePubkey: BLSPubkey,
  },
  {typeName: "SyncCommittee", jsonCase: "eth2"}
);
