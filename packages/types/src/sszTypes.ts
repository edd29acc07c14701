import {ForkExecutionHeader, ForkName} from "@vouch/params";
import * as phase0 from "./phase0/sszTypes.js";
import * as altair from "./altair/sszTypes.js";
import * as capella from "./capella/sszTypes.js";
import * as deneb from "./deneb/sszTypes.js";
import * as electra from "./electra/sszTypes.js";
import type {
  ExecutionPayloadHeader,
  LightClientBootstrap,
  LightClientFinalityUpdate,
  LightClientHeader,
  LightClientUpdate,
} from "./types.js";

export * from "./primitive/sszTypes.js";
export {phase0, altair, capella, deneb, electra};

/**
 * Narrow view of an SSZ type. Types of older forks accept the values of newer forks since
 * every fork only appends fields, so one value shape can be hashed with the type of any fork.
 */
export interface HashTreeRootType<T> {
  hashTreeRoot(value: T): Uint8Array;
}

export type LightClientForkTypes = {
  ExecutionPayloadHeader: HashTreeRootType<ExecutionPayloadHeader>;
  LightClientHeader: HashTreeRootType<LightClientHeader>;
  LightClientBootstrap: HashTreeRootType<LightClientBootstrap>;
  LightClientUpdate: HashTreeRootType<LightClientUpdate>;
  LightClientFinalityUpdate: HashTreeRootType<LightClientFinalityUpdate>;
};

const lightClientTypesByFork: Record<ForkExecutionHeader, LightClientForkTypes> = {
  [ForkName.capella]: {
    ExecutionPayloadHeader: capella.ExecutionPayloadHeader,
    LightClientHeader: capella.LightClientHeader,
    LightClientBootstrap: capella.LightClientBootstrap,
    LightClientUpdate: capella.LightClientUpdate,
    LightClientFinalityUpdate: capella.LightClientFinalityUpdate,
  },
  [ForkName.deneb]: {
    ExecutionPayloadHeader: deneb.ExecutionPayloadHeader,
    LightClientHeader: deneb.LightClientHeader,
    LightClientBootstrap: deneb.LightClientBootstrap,
    LightClientUpdate: deneb.LightClientUpdate,
    LightClientFinalityUpdate: deneb.LightClientFinalityUpdate,
  },
  [ForkName.electra]: {
    ExecutionPayloadHeader: electra.ExecutionPayloadHeader,
    LightClientHeader: electra.LightClientHeader,
    LightClientBootstrap: electra.LightClientBootstrap,
    LightClientUpdate: electra.LightClientUpdate,
    LightClientFinalityUpdate: electra.LightClientFinalityUpdate,
  },
};

export function sszTypesFor(fork: ForkExecutionHeader): LightClientForkTypes {
  return lightClientTypesByFork[fork];
}
