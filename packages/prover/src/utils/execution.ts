import {Common, Hardfork} from "@ethereumjs/common";
import {ForkName} from "@vouch/params";
import {TX_BASE_GAS, TX_CREATE_GAS, TX_DATA_NON_ZERO_GAS, TX_DATA_ZERO_GAS} from "../constants.js";
import {ExecutionError, ExecutionErrorCode} from "../errors.js";

/** Execution hardfork of the payloads of each consensus fork, null before execution state can be proven */
const hardforkByFork: Record<ForkName, string | null> = {
  [ForkName.phase0]: null,
  [ForkName.altair]: null,
  [ForkName.bellatrix]: null,
  [ForkName.capella]: Hardfork.Shanghai,
  [ForkName.deneb]: Hardfork.Cancun,
  [ForkName.electra]: "prague",
};

export function getChainCommon(chainId: number, fork: ForkName): Common {
  const hardfork = hardforkByFork[fork];
  if (hardfork === null) {
    throw new ExecutionError({code: ExecutionErrorCode.UNSUPPORTED_FORK, fork});
  }

  const common = Common.isSupportedChainId(BigInt(chainId))
    ? new Common({chain: chainId})
    : Common.custom({chainId, name: `chain-${chainId}`});

  if (!common.hardforks().some((hf) => hf.name === hardfork)) {
    throw new ExecutionError({code: ExecutionErrorCode.UNSUPPORTED_FORK, fork});
  }
  common.setHardfork(hardfork);
  return common;
}

/** Gas charged before execution starts: the base fee of a transaction and its calldata */
export function getIntrinsicGas(data: Uint8Array, isCreate: boolean): bigint {
  let gas = TX_BASE_GAS + (isCreate ? TX_CREATE_GAS : 0n);
  for (const byte of data) {
    gas += byte === 0 ? TX_DATA_ZERO_GAS : TX_DATA_NON_ZERO_GAS;
  }
  return gas;
}
