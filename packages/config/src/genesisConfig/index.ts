import {ForkName, SLOTS_PER_EPOCH} from "@vouch/params";
import {DomainType, ForkData, Root, Slot, ssz, Version} from "@vouch/types";
import {ForkConfig} from "../forkConfig/index.js";
import {CachedGenesis} from "./types.js";

export type {CachedGenesis} from "./types.js";

export function createCachedGenesis(forkConfig: ForkConfig, genesisValidatorsRoot: Root): CachedGenesis {
  const domainCache = new Map<ForkName, Map<string, Uint8Array>>();

  function getDomainForFork(forkName: ForkName, domainType: DomainType): Uint8Array {
    const forkInfo = forkConfig.forks[forkName];
    let domainByType = domainCache.get(forkInfo.name);
    if (!domainByType) {
      domainByType = new Map<string, Uint8Array>();
      domainCache.set(forkInfo.name, domainByType);
    }
    // Uint8Array map keys compare by reference
    const domainKey = domainType.join(",");
    let domain = domainByType.get(domainKey);
    if (!domain) {
      domain = computeDomain(domainType, forkInfo.version, genesisValidatorsRoot);
      domainByType.set(domainKey, domain);
    }
    return domain;
  }

  return {
    genesisValidatorsRoot,

    getDomain(stateSlot: Slot, domainType: DomainType, messageSlot?: Slot): Uint8Array {
      // ```py
      // def get_domain(state: BeaconState, domain_type: DomainType, epoch: Epoch=None) -> Domain:
      //   epoch = get_current_epoch(state) if epoch is None else epoch
      //   fork_version = state.fork.previous_version if epoch < state.fork.epoch else state.fork.current_version
      //   return compute_domain(domain_type, fork_version, state.genesis_validators_root)
      // ```

      const epoch = Math.floor((messageSlot ?? stateSlot) / SLOTS_PER_EPOCH);
      // Get pre-computed fork schedule, which _should_ match the one in the state
      const stateForkInfo = forkConfig.getForkInfo(stateSlot);
      // Only allow to select either current or previous fork respective of the fork schedule at stateSlot
      const forkName = epoch < stateForkInfo.epoch ? stateForkInfo.prevForkName : stateForkInfo.name;
      return getDomainForFork(forkName, domainType);
    },

    getDomainAtFork(forkName: ForkName, domainType: DomainType): Uint8Array {
      return getDomainForFork(forkName, domainType);
    },
  };
}

export function computeDomain(domainType: DomainType, forkVersion: Version, genesisValidatorRoot: Root): Uint8Array {
  const forkDataRoot = computeForkDataRoot(forkVersion, genesisValidatorRoot);
  const domain = new Uint8Array(32);
  domain.set(domainType, 0);
  domain.set(forkDataRoot.slice(0, 28), 4);
  return domain;
}

export function computeForkDataRoot(currentVersion: Version, genesisValidatorsRoot: Root): Uint8Array {
  const forkData: ForkData = {
    currentVersion,
    genesisValidatorsRoot,
  };
  return ssz.phase0.ForkData.hashTreeRoot(forkData);
}
