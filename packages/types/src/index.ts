export * from "./types.js";
import * as ssz from "./sszTypes.js";
export {ssz};
export {sszTypesFor} from "./sszTypes.js";
export type {HashTreeRootType, LightClientForkTypes} from "./sszTypes.js";
