/**
 * Compile-time chain configuration, the subset the light client needs
 */
export type BeaconPreset = {
  SLOTS_PER_EPOCH: number;
  SYNC_COMMITTEE_SIZE: number;
  EPOCHS_PER_SYNC_COMMITTEE_PERIOD: number;
  MIN_SYNC_COMMITTEE_PARTICIPANTS: number;
  UPDATE_TIMEOUT: number;
};
