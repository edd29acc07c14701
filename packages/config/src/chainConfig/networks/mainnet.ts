import {fromHexString as b} from "@chainsafe/ssz";
import {PresetName} from "@vouch/params";
import {ChainConfig} from "../types.js";

export const mainnetChainConfig: ChainConfig = {
  PRESET_BASE: PresetName.mainnet,
  CONFIG_NAME: "mainnet",

  GENESIS_FORK_VERSION: b("0x00000000"),

  ALTAIR_FORK_VERSION: b("0x01000000"),
  ALTAIR_FORK_EPOCH: 74240,
  BELLATRIX_FORK_VERSION: b("0x02000000"),
  BELLATRIX_FORK_EPOCH: 144896,
  CAPELLA_FORK_VERSION: b("0x03000000"),
  CAPELLA_FORK_EPOCH: 194048,
  DENEB_FORK_VERSION: b("0x04000000"),
  DENEB_FORK_EPOCH: 269568,
  ELECTRA_FORK_VERSION: b("0x05000000"),
  ELECTRA_FORK_EPOCH: 364032,

  SECONDS_PER_SLOT: 12,

  DEPOSIT_CHAIN_ID: 1,
};
