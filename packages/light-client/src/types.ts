import type {PublicKey} from "@chainsafe/bls/types";
import {
  LightClientBootstrap,
  LightClientFinalityUpdate,
  LightClientHeader,
  LightClientOptimisticUpdate,
  LightClientUpdate,
  Root,
  RootHex,
} from "@vouch/types";

export type SyncCommitteeFast = {
  pubkeys: PublicKey[];
  aggregatePubkey: PublicKey;
};

export type GenesisData = {
  genesisTime: number;
  genesisValidatorsRoot: RootHex | Uint8Array;
};

/**
 * Every message a light client consumes, tagged by `kind`. Each variant carries only its own fields.
 */
export type LightClientMessage =
  | {kind: "bootstrap"; checkpointRoot: Root; bootstrap: LightClientBootstrap}
  | {kind: "update"; update: LightClientUpdate}
  | {kind: "finalityUpdate"; update: LightClientFinalityUpdate}
  | {kind: "optimisticUpdate"; update: LightClientOptimisticUpdate};

/**
 * Published trusted heads. Readers get these, never the mutable store.
 */
export type LightClientHeads = {
  finalized: LightClientHeader;
  optimistic: LightClientHeader;
};

export enum LightClientSyncState {
  bootstrapped = "bootstrapped",
  optimistic = "optimistic",
  finalized = "finalized",
}

export enum RunStatusCode {
  started = "started",
  syncing = "syncing",
  stopped = "stopped",
}
