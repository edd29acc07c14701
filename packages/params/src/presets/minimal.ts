import {BeaconPreset} from "../interface.js";

export const minimalPreset: BeaconPreset = {
  SLOTS_PER_EPOCH: 8,
  SYNC_COMMITTEE_SIZE: 32,
  EPOCHS_PER_SYNC_COMMITTEE_PERIOD: 8,
  MIN_SYNC_COMMITTEE_PARTICIPANTS: 1,
  UPDATE_TIMEOUT: 64,
};
