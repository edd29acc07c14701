import {PresetName} from "@vouch/params";

/**
 * Run-time chain configuration
 */
export type ChainConfig = {
  PRESET_BASE: PresetName;
  /**
   * Free-form short name of the network that this configuration applies to - known
   * canonical network names include:
   * * 'mainnet' - there can be only one
   * * 'sepolia' - testnet
   * * 'holesky' - testnet
   * Must match the regex: [a-z0-9\-]
   */
  CONFIG_NAME: string;

  // Genesis
  GENESIS_FORK_VERSION: Uint8Array;

  // Forking
  // Altair
  ALTAIR_FORK_VERSION: Uint8Array;
  ALTAIR_FORK_EPOCH: number;
  // Bellatrix
  BELLATRIX_FORK_VERSION: Uint8Array;
  BELLATRIX_FORK_EPOCH: number;
  // Capella
  CAPELLA_FORK_VERSION: Uint8Array;
  CAPELLA_FORK_EPOCH: number;
  // Deneb
  DENEB_FORK_VERSION: Uint8Array;
  DENEB_FORK_EPOCH: number;
  // Electra
  ELECTRA_FORK_VERSION: Uint8Array;
  ELECTRA_FORK_EPOCH: number;

  // Time parameters
  SECONDS_PER_SLOT: number;

  // Execution layer the beacon chain commits to
  DEPOSIT_CHAIN_ID: number;
};
