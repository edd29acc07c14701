import {BeaconPreset} from "../interface.js";

export const mainnetPreset: BeaconPreset = {
  SLOTS_PER_EPOCH: 32,
  SYNC_COMMITTEE_SIZE: 512,
  EPOCHS_PER_SYNC_COMMITTEE_PERIOD: 256,
  MIN_SYNC_COMMITTEE_PARTICIPANTS: 1,
  // SLOTS_PER_EPOCH * EPOCHS_PER_SYNC_COMMITTEE_PERIOD
  UPDATE_TIMEOUT: 8192,
};
