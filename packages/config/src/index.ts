export * from "./chainConfig/index.js";
export * from "./forkConfig/index.js";
export * from "./genesisConfig/index.js";
export * from "./beaconConfig.js";
export * from "./networks.js";
