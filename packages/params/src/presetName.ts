export enum PresetName {
  mainnet = "mainnet",
  minimal = "minimal",
}

export function isPresetName(name: string): name is PresetName {
  return name === PresetName.mainnet || name === PresetName.minimal;
}
