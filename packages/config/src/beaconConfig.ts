import {Root} from "@vouch/types";
import {ChainConfig} from "./chainConfig/index.js";
import {createForkConfig, ForkConfig} from "./forkConfig/index.js";
import {createCachedGenesis, CachedGenesis} from "./genesisConfig/index.js";

export type ChainForkConfig = ChainConfig & ForkConfig;

/**
 * Chain run-time configuration with additional fork schedule helpers
 */
export function createChainForkConfig(chainConfig: ChainConfig): ChainForkConfig {
  return {
    ...chainConfig,
    ...createForkConfig(chainConfig),
  };
}

/**
 * Chain run-time configuration with fork schedule and the signing domains bound to one genesis
 */
export type BeaconConfig = ChainForkConfig & CachedGenesis;

export function createBeaconConfig(chainConfig: ChainConfig, genesisValidatorsRoot: Root): BeaconConfig {
  const chainForkConfig = createChainForkConfig(chainConfig);

  return {
    ...chainForkConfig,
    ...createCachedGenesis(chainForkConfig, genesisValidatorsRoot),
  };
}
