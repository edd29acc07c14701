import {PresetName, isPresetName} from "./presetName.js";
import {mainnetPreset} from "./presets/mainnet.js";
import {minimalPreset} from "./presets/minimal.js";
import {presetStatus} from "./presetStatus.js";
import {userSelectedPreset, userOverrides} from "./setPreset.js";
import {BeaconPreset} from "./interface.js";

export type {BeaconPreset} from "./interface.js";
export {
  ForkName,
  ForkSeq,
  forkAll,
  highestFork,
  isForkExecutionHeader,
  isForkBlobs,
  isForkPostElectra,
} from "./forkName.js";
export type {ForkExecutionHeader, ForkBlobs, ForkPostElectra} from "./forkName.js";
export {PresetName};

const presets: Record<PresetName, BeaconPreset> = {
  [PresetName.mainnet]: mainnetPreset,
  [PresetName.minimal]: minimalPreset,
};

// Once this file is imported, freeze the preset so calling setActivePreset() will throw an error
presetStatus.frozen = true;

function presetFromEnv(): PresetName | null {
  const name = process.env.VOUCH_PRESET;
  return name !== undefined && isPresetName(name) ? name : null;
}

/**
 * The preset name currently exported by this library
 *
 * The `VOUCH_PRESET` environment variable selects the active preset, `mainnet` when unset.
 * It can be overridden with `setActivePreset` from `@vouch/params/preset`.
 */
export const ACTIVE_PRESET: PresetName = userSelectedPreset ?? presetFromEnv() ?? PresetName.mainnet;
export const activePreset: BeaconPreset = {...presets[ACTIVE_PRESET], ...userOverrides};

export const {
  SLOTS_PER_EPOCH,
  SYNC_COMMITTEE_SIZE,
  EPOCHS_PER_SYNC_COMMITTEE_PERIOD,
  MIN_SYNC_COMMITTEE_PARTICIPANTS,
  UPDATE_TIMEOUT,
} = activePreset;

////////////////////////////////////////////////////////////////////////////////
// Constants

export const GENESIS_SLOT = 0;
export const GENESIS_EPOCH = 0;

export const DOMAIN_SYNC_COMMITTEE = Uint8Array.from([7, 0, 0, 0]);

/** Numerator and denominator of the participation required to accept a sync aggregate */
export const SYNC_COMMITTEE_SUPERMAJORITY_NUMERATOR = 2;
export const SYNC_COMMITTEE_SUPERMAJORITY_DENOMINATOR = 3;

// Lightclient pre-computed

/**
 * ```ts
 * config.types.altair.BeaconState.getPathGindex(["finalizedCheckpoint", "root"])
 * ```
 */
export const FINALIZED_ROOT_GINDEX = 105;
/**
 * ```ts
 * Math.floor(Math.log2(FINALIZED_ROOT_GINDEX))
 * ```
 */
export const FINALIZED_ROOT_DEPTH = 6;
export const FINALIZED_ROOT_INDEX = 41;

/**
 * ```ts
 * types.ssz.capella.BeaconBlockBody.getPathInfo(['executionPayload']).gindex
 * ```
 */
export const BLOCK_BODY_EXECUTION_PAYLOAD_GINDEX = 25;
export const BLOCK_BODY_EXECUTION_PAYLOAD_DEPTH = 4;
export const BLOCK_BODY_EXECUTION_PAYLOAD_INDEX = 9;

/**
 * ```ts
 * config.types.altair.BeaconState.getPathGindex(["nextSyncCommittee"])
 * ```
 */
export const NEXT_SYNC_COMMITTEE_GINDEX = 55;
export const NEXT_SYNC_COMMITTEE_DEPTH = 5;
export const NEXT_SYNC_COMMITTEE_INDEX = 23;

export const CURRENT_SYNC_COMMITTEE_GINDEX = 54;
export const CURRENT_SYNC_COMMITTEE_DEPTH = 5;
export const CURRENT_SYNC_COMMITTEE_INDEX = 22;

// Electra grows the BeaconState past 32 fields, adding one level to every state branch
export const FINALIZED_ROOT_GINDEX_ELECTRA = 169;
export const FINALIZED_ROOT_DEPTH_ELECTRA = 7;
export const FINALIZED_ROOT_INDEX_ELECTRA = 41;

export const NEXT_SYNC_COMMITTEE_GINDEX_ELECTRA = 87;
export const NEXT_SYNC_COMMITTEE_DEPTH_ELECTRA = 6;
export const NEXT_SYNC_COMMITTEE_INDEX_ELECTRA = 23;

export const CURRENT_SYNC_COMMITTEE_GINDEX_ELECTRA = 86;
export const CURRENT_SYNC_COMMITTEE_DEPTH_ELECTRA = 6;
export const CURRENT_SYNC_COMMITTEE_INDEX_ELECTRA = 22;
