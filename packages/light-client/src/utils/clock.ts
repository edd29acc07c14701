import {ChainConfig} from "@vouch/config";
import {EPOCHS_PER_SYNC_COMMITTEE_PERIOD, SLOTS_PER_EPOCH} from "@vouch/params";
import {Epoch, Slot, SyncPeriod} from "@vouch/types";

export function getCurrentSlot(config: Pick<ChainConfig, "SECONDS_PER_SLOT">, genesisTime: number): Slot {
  const diffInSeconds = Date.now() / 1000 - genesisTime;
  return Math.floor(diffInSeconds / config.SECONDS_PER_SLOT);
}

/** Returns the slot if the internal clock were advanced by `toleranceSec`. */
export function slotWithFutureTolerance(
  config: Pick<ChainConfig, "SECONDS_PER_SLOT">,
  genesisTime: number,
  toleranceSec: number
): Slot {
  // this is the same to getting slot at now + toleranceSec
  return getCurrentSlot(config, genesisTime - toleranceSec);
}

/**
 * Return the epoch number at the given slot.
 */
export function computeEpochAtSlot(slot: Slot): Epoch {
  return Math.floor(slot / SLOTS_PER_EPOCH);
}

/**
 * Return the sync committee period at slot
 */
export function computeSyncPeriodAtSlot(slot: Slot): SyncPeriod {
  return computeSyncPeriodAtEpoch(computeEpochAtSlot(slot));
}

/**
 * Return the sync committee period at epoch
 */
export function computeSyncPeriodAtEpoch(epoch: Epoch): SyncPeriod {
  return Math.floor(epoch / EPOCHS_PER_SYNC_COMMITTEE_PERIOD);
}

/** Milliseconds until the start of the next slot, the full slot duration before genesis */
export function timeUntilNextSlot(config: Pick<ChainConfig, "SECONDS_PER_SLOT">, genesisTime: number): number {
  const milliSecondsPerSlot = config.SECONDS_PER_SLOT * 1000;
  const msFromGenesis = Date.now() - genesisTime * 1000;
  if (msFromGenesis >= 0) {
    return milliSecondsPerSlot - (msFromGenesis % milliSecondsPerSlot);
  } else {
    return Math.abs(msFromGenesis % milliSecondsPerSlot);
  }
}
