import {PresetName} from "./presetName.js";
import {presetStatus} from "./presetStatus.js";
import {BeaconPreset} from "./interface.js";

export {PresetName};

/**
 * The preset selected with `setActivePreset`, if any. Takes precedence over the
 * `VOUCH_PRESET` environment variable.
 */
export let userSelectedPreset: PresetName | null = null;

export let userOverrides: Partial<BeaconPreset> | undefined = undefined;

/**
 * Override the active preset
 *
 * Preset values are read once, so this must run _before_ `@vouch/params` or any package
 * that imports it is loaded.
 *
 * ```ts
 * import {setActivePreset, PresetName} from "@vouch/params/preset";
 * setActivePreset(PresetName.minimal);
 * ```
 */
export function setActivePreset(presetName: PresetName, overrides?: Partial<BeaconPreset>): void {
  if (presetStatus.frozen) {
    throw Error(
      "Preset is already frozen. Call setActivePreset() at the top of the entry point, before importing @vouch/params"
    );
  }

  userSelectedPreset = presetName;
  userOverrides = overrides;
}
