import {fromHexString as b} from "@chainsafe/ssz";
import {ChainConfig} from "../types.js";
import {mainnetChainConfig} from "./mainnet.js";

export const holeskyChainConfig: ChainConfig = {
  ...mainnetChainConfig,

  CONFIG_NAME: "holesky",

  GENESIS_FORK_VERSION: b("0x01017000"),

  ALTAIR_FORK_VERSION: b("0x02017000"),
  ALTAIR_FORK_EPOCH: 0,
  BELLATRIX_FORK_VERSION: b("0x03017000"),
  BELLATRIX_FORK_EPOCH: 0,
  CAPELLA_FORK_VERSION: b("0x04017000"),
  CAPELLA_FORK_EPOCH: 256,
  DENEB_FORK_VERSION: b("0x05017000"),
  DENEB_FORK_EPOCH: 29696,
  ELECTRA_FORK_VERSION: b("0x06017000"),
  ELECTRA_FORK_EPOCH: 115968,

  DEPOSIT_CHAIN_ID: 17000,
};
