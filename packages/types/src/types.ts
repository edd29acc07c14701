import {ValueOf} from "@chainsafe/ssz";
import * as phase0 from "./phase0/sszTypes.js";
import * as altair from "./altair/sszTypes.js";
import * as deneb from "./deneb/sszTypes.js";

export * from "./primitive/types.js";

/** Common non-spec type to represent roots as strings */
export type RootHex = string;

export type BeaconBlockHeader = ValueOf<typeof phase0.BeaconBlockHeader>;
export type ForkData = ValueOf<typeof phase0.ForkData>;
export type SigningData = ValueOf<typeof phase0.SigningData>;

export type SyncCommittee = ValueOf<typeof altair.SyncCommittee>;
export type SyncAggregate = ValueOf<typeof altair.SyncAggregate>;

// Values use the widest shape. Capella headers carry zeroed blob fields, electra values only
// differ in branch lengths.
export type ExecutionPayloadHeader = ValueOf<typeof deneb.ExecutionPayloadHeader>;
export type LightClientHeader = ValueOf<typeof deneb.LightClientHeader>;
export type LightClientBootstrap = ValueOf<typeof deneb.LightClientBootstrap>;
export type LightClientUpdate = ValueOf<typeof deneb.LightClientUpdate>;
export type LightClientFinalityUpdate = ValueOf<typeof deneb.LightClientFinalityUpdate>;
export type LightClientOptimisticUpdate = ValueOf<typeof deneb.LightClientOptimisticUpdate>;
