export * from "./bls.js";
export * from "./chunkify.js";
export * from "./clock.js";
export * from "./utils.js";
export * from "./verifyMerkleBranch.js";
