import {fromHexString as b} from "@chainsafe/ssz";
import {ChainConfig} from "../types.js";
import {mainnetChainConfig} from "./mainnet.js";

export const sepoliaChainConfig: ChainConfig = {
  ...mainnetChainConfig,

  CONFIG_NAME: "sepolia",

  GENESIS_FORK_VERSION: b("0x90000069"),

  ALTAIR_FORK_VERSION: b("0x90000070"),
  ALTAIR_FORK_EPOCH: 50,
  BELLATRIX_FORK_VERSION: b("0x90000071"),
  BELLATRIX_FORK_EPOCH: 100,
  CAPELLA_FORK_VERSION: b("0x90000072"),
  CAPELLA_FORK_EPOCH: 56832,
  DENEB_FORK_VERSION: b("0x90000073"),
  DENEB_FORK_EPOCH: 132608,
  ELECTRA_FORK_VERSION: b("0x90000074"),
  ELECTRA_FORK_EPOCH: 222464,

  DEPOSIT_CHAIN_ID: 11155111,
};
