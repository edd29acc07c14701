import {GENESIS_EPOCH, ForkName, SLOTS_PER_EPOCH, ForkSeq, forkAll, isForkExecutionHeader} from "@vouch/params";
import {Slot, Version, sszTypesFor, Epoch, LightClientForkTypes} from "@vouch/types";
import {ChainConfig} from "../chainConfig/index.js";
import {ForkConfig, ForkInfo} from "./types.js";

export * from "./types.js";

type ForkActivation = {epoch: Epoch; version: Version};

function getForkActivations(config: ChainConfig): Record<ForkName, ForkActivation> {
  return {
    [ForkName.phase0]: {epoch: GENESIS_EPOCH, version: config.GENESIS_FORK_VERSION},
    [ForkName.altair]: {epoch: config.ALTAIR_FORK_EPOCH, version: config.ALTAIR_FORK_VERSION},
    [ForkName.bellatrix]: {epoch: config.BELLATRIX_FORK_EPOCH, version: config.BELLATRIX_FORK_VERSION},
    [ForkName.capella]: {epoch: config.CAPELLA_FORK_EPOCH, version: config.CAPELLA_FORK_VERSION},
    [ForkName.deneb]: {epoch: config.DENEB_FORK_EPOCH, version: config.DENEB_FORK_VERSION},
    [ForkName.electra]: {epoch: config.ELECTRA_FORK_EPOCH, version: config.ELECTRA_FORK_VERSION},
  };
}

export function createForkConfig(config: ChainConfig): ForkConfig {
  const activations = getForkActivations(config);

  const getInfo = (name: ForkName): ForkInfo => {
    // phase0 is its own predecessor
    const prevForkName = forkAll[Math.max(ForkSeq[name] - 1, 0)];
    return {
      name,
      seq: ForkSeq[name],
      epoch: activations[name].epoch,
      version: activations[name].version,
      prevVersion: activations[prevForkName].version,
      prevForkName,
    };
  };

  const forks: Record<ForkName, ForkInfo> = {
    [ForkName.phase0]: getInfo(ForkName.phase0),
    [ForkName.altair]: getInfo(ForkName.altair),
    [ForkName.bellatrix]: getInfo(ForkName.bellatrix),
    [ForkName.capella]: getInfo(ForkName.capella),
    [ForkName.deneb]: getInfo(ForkName.deneb),
    [ForkName.electra]: getInfo(ForkName.electra),
  };

  // Lookups walk the schedule latest fork first
  const forksAscendingEpochOrder = forkAll.map((name) => forks[name]);
  const forksDescendingEpochOrder = [...forksAscendingEpochOrder].reverse();

  return {
    forks,
    forksAscendingEpochOrder,
    forksDescendingEpochOrder,

    getForkInfo(slot: Slot): ForkInfo {
      // Slots before genesis belong to the genesis fork
      return this.getForkInfoAtEpoch(Math.floor(Math.max(slot, 0) / SLOTS_PER_EPOCH));
    },
    getForkInfoAtEpoch(epoch: Epoch): ForkInfo {
      return forksDescendingEpochOrder.find((fork) => epoch >= fork.epoch) ?? forks.phase0;
    },
    getForkName(slot: Slot): ForkName {
      return this.getForkInfo(slot).name;
    },
    getForkSeq(slot: Slot): ForkSeq {
      return this.getForkInfo(slot).seq;
    },
    getForkVersion(slot: Slot): Version {
      return this.getForkInfo(slot).version;
    },
    getLightClientForkTypes(slot: Slot): LightClientForkTypes {
      const forkName = this.getForkName(slot);
      if (!isForkExecutionHeader(forkName)) {
        throw Error(`Invalid slot=${slot} fork=${forkName} for lightclient fork types`);
      }
      return sszTypesFor(forkName);
    },
  };
}
