import bls from "@chainsafe/bls/switchable";
import {PointFormat} from "@chainsafe/bls/types";
import type {SecretKey} from "@chainsafe/bls/types";
import {LeafNode, Tree, zeroNode} from "@chainsafe/persistent-merkle-tree";
import {BitArray} from "@chainsafe/ssz";
import {BeaconConfig, ChainConfig, createBeaconConfig, createChainConfig} from "@vouch/config";
import {
  BLOCK_BODY_EXECUTION_PAYLOAD_GINDEX,
  CURRENT_SYNC_COMMITTEE_GINDEX,
  DOMAIN_SYNC_COMMITTEE,
  EPOCHS_PER_SYNC_COMMITTEE_PERIOD,
  FINALIZED_ROOT_DEPTH,
  FINALIZED_ROOT_GINDEX,
  NEXT_SYNC_COMMITTEE_DEPTH,
  NEXT_SYNC_COMMITTEE_GINDEX,
  SLOTS_PER_EPOCH,
  SYNC_COMMITTEE_SIZE,
} from "@vouch/params";
import {
  BeaconBlockHeader,
  LightClientBootstrap,
  LightClientFinalityUpdate,
  LightClientHeader,
  LightClientOptimisticUpdate,
  LightClientUpdate,
  Root,
  Slot,
  SyncAggregate,
  SyncCommittee,
  SyncPeriod,
  ssz,
} from "@vouch/types";

export const SLOTS_PER_PERIOD = SLOTS_PER_EPOCH * EPOCHS_PER_SYNC_COMMITTEE_PERIOD;

export const genesisValidatorsRoot = new Uint8Array(32).fill(0xaa);
export const SOME_HASH = new Uint8Array(32).fill(0xbb);

/** Every fork up to deneb active from genesis */
export const testChainConfig: ChainConfig = createChainConfig({
  ALTAIR_FORK_EPOCH: 0,
  BELLATRIX_FORK_EPOCH: 0,
  CAPELLA_FORK_EPOCH: 0,
  DENEB_FORK_EPOCH: 0,
  ELECTRA_FORK_EPOCH: Infinity,
});

export const testConfig: BeaconConfig = createBeaconConfig(testChainConfig, genesisValidatorsRoot);

/** Genesis time such that the wall clock is now at `currentSlot` */
export function getGenesisTimeForSlot(currentSlot: Slot): number {
  return Math.floor(Date.now() / 1000) - currentSlot * testChainConfig.SECONDS_PER_SLOT;
}

export type SyncCommitteeKeys = {
  sk: SecretKey;
  syncCommittee: SyncCommittee;
  signHeader(header: BeaconBlockHeader, signatureSlot: Slot, participants?: number): SyncAggregate;
};

const committeeCache = new Map<SyncPeriod, SyncCommitteeKeys>();

/**
 * To make the test fast each sync committee has a single key repeated `SYNC_COMMITTEE_SIZE` times.
 * BLS must be initialized first.
 */
export function getInteropSyncCommittee(period: SyncPeriod): SyncCommitteeKeys {
  const cached = committeeCache.get(period);
  if (cached) return cached;

  const skBytes = Buffer.alloc(32, 0);
  skBytes.writeInt32BE(1 + period);
  const sk = bls.SecretKey.fromBytes(skBytes);
  const pk = sk.toPublicKey();
  const pkBytes = pk.toBytes(PointFormat.compressed);
  const aggPk = bls.PublicKey.aggregate(Array.from({length: SYNC_COMMITTEE_SIZE}, () => pk));

  function signHeader(header: BeaconBlockHeader, signatureSlot: Slot, participants = SYNC_COMMITTEE_SIZE): SyncAggregate {
    const signingRoot = ssz.phase0.SigningData.hashTreeRoot({
      objectRoot: ssz.phase0.BeaconBlockHeader.hashTreeRoot(header),
      domain: testConfig.getDomain(Math.max(signatureSlot, 1) - 1, DOMAIN_SYNC_COMMITTEE),
    });
    // Same key everywhere: the aggregate of `participants` copies of one signature is valid for
    // the aggregate of `participants` copies of the pubkey
    const sig = sk.sign(signingRoot);
    const aggSig = bls.Signature.aggregate(Array.from({length: participants}, () => sig));
    return {
      syncCommitteeBits: BitArray.fromBoolArray(Array.from({length: SYNC_COMMITTEE_SIZE}, (_, i) => i < participants)),
      syncCommitteeSignature: aggSig.toBytes(PointFormat.compressed),
    };
  }

  const keys: SyncCommitteeKeys = {
    sk,
    signHeader,
    syncCommittee: {
      pubkeys: Array.from({length: SYNC_COMMITTEE_SIZE}, () => pkBytes),
      aggregatePubkey: aggPk.toBytes(PointFormat.compressed),
    },
  };
  committeeCache.set(period, keys);
  return keys;
}

/**
 * Header at `slot` with an execution payload header proven against its body root
 */
export function createLightClientHeader(slot: Slot, stateRoot: Root = SOME_HASH): LightClientHeader {
  const execution = ssz.deneb.ExecutionPayloadHeader.defaultValue();
  execution.blockNumber = 1000 + slot;
  execution.stateRoot = new Uint8Array(32).fill(slot % 256);
  execution.blockHash = new Uint8Array(32).fill(0xcc);

  const bodyTree = new Tree(zeroNode(4));
  bodyTree.setNode(
    BigInt(BLOCK_BODY_EXECUTION_PAYLOAD_GINDEX),
    LeafNode.fromRoot(ssz.deneb.ExecutionPayloadHeader.hashTreeRoot(execution))
  );

  return {
    beacon: {slot, proposerIndex: 0, parentRoot: SOME_HASH, stateRoot, bodyRoot: bodyTree.root},
    execution,
    executionBranch: bodyTree.getSingleProof(BigInt(BLOCK_BODY_EXECUTION_PAYLOAD_GINDEX)),
  };
}

type StateLeaves = {
  currentSyncCommittee?: SyncCommittee;
  nextSyncCommittee?: SyncCommittee;
  finalizedRoot?: Root;
};

/**
 * Beacon state stand-in: only the leaves light client proofs point at are set
 */
export function createStateTree(leaves: StateLeaves): Tree {
  const tree = new Tree(zeroNode(6));
  if (leaves.currentSyncCommittee) {
    tree.setNode(
      BigInt(CURRENT_SYNC_COMMITTEE_GINDEX),
      LeafNode.fromRoot(ssz.altair.SyncCommittee.hashTreeRoot(leaves.currentSyncCommittee))
    );
  }
  if (leaves.nextSyncCommittee) {
    tree.setNode(
      BigInt(NEXT_SYNC_COMMITTEE_GINDEX),
      LeafNode.fromRoot(ssz.altair.SyncCommittee.hashTreeRoot(leaves.nextSyncCommittee))
    );
  }
  if (leaves.finalizedRoot) {
    tree.setNode(BigInt(FINALIZED_ROOT_GINDEX), LeafNode.fromRoot(leaves.finalizedRoot));
  }
  return tree;
}

export function zeroBranch(depth: number): Root[] {
  return Array.from({length: depth}, () => new Uint8Array(32));
}

export function createBootstrap(slot: Slot, committee: SyncCommitteeKeys): {checkpointRoot: Root; bootstrap: LightClientBootstrap} {
  const stateTree = createStateTree({currentSyncCommittee: committee.syncCommittee});
  const header = createLightClientHeader(slot, stateTree.root);
  return {
    checkpointRoot: ssz.phase0.BeaconBlockHeader.hashTreeRoot(header.beacon),
    bootstrap: {
      header,
      currentSyncCommittee: committee.syncCommittee,
      currentSyncCommitteeBranch: stateTree.getSingleProof(BigInt(CURRENT_SYNC_COMMITTEE_GINDEX)),
    },
  };
}

export type UpdateArgs = {
  /** Committee that signs the attested header */
  signer: SyncCommitteeKeys;
  attestedSlot: Slot;
  /** Defaults to `attestedSlot + 1` */
  signatureSlot?: Slot;
  finalizedSlot?: Slot;
  nextCommittee?: SyncCommitteeKeys;
  participants?: number;
};

export function createUpdate(args: UpdateArgs): LightClientUpdate {
  const {signer, attestedSlot, finalizedSlot, nextCommittee, participants} = args;
  const signatureSlot = args.signatureSlot ?? attestedSlot + 1;

  const finalizedHeader =
    finalizedSlot !== undefined ? createLightClientHeader(finalizedSlot) : ssz.deneb.LightClientHeader.defaultValue();
  const stateTree = createStateTree({
    nextSyncCommittee: nextCommittee?.syncCommittee,
    finalizedRoot:
      finalizedSlot !== undefined ? ssz.phase0.BeaconBlockHeader.hashTreeRoot(finalizedHeader.beacon) : undefined,
  });
  const attestedHeader = createLightClientHeader(attestedSlot, stateTree.root);

  return {
    attestedHeader,
    nextSyncCommittee: nextCommittee?.syncCommittee ?? ssz.altair.SyncCommittee.defaultValue(),
    nextSyncCommitteeBranch: nextCommittee
      ? stateTree.getSingleProof(BigInt(NEXT_SYNC_COMMITTEE_GINDEX))
      : zeroBranch(NEXT_SYNC_COMMITTEE_DEPTH),
    finalizedHeader,
    finalityBranch:
      finalizedSlot !== undefined
        ? stateTree.getSingleProof(BigInt(FINALIZED_ROOT_GINDEX))
        : zeroBranch(FINALIZED_ROOT_DEPTH),
    syncAggregate: signer.signHeader(attestedHeader.beacon, signatureSlot, participants),
    signatureSlot,
  };
}

export function createFinalityUpdate(args: UpdateArgs & {finalizedSlot: Slot}): LightClientFinalityUpdate {
  const {attestedHeader, finalizedHeader, finalityBranch, syncAggregate, signatureSlot} = createUpdate(args);
  return {attestedHeader, finalizedHeader, finalityBranch, syncAggregate, signatureSlot};
}

export function createOptimisticUpdate(args: UpdateArgs): LightClientOptimisticUpdate {
  const {attestedHeader, syncAggregate, signatureSlot} = createUpdate(args);
  return {attestedHeader, syncAggregate, signatureSlot};
}
