import {ForkName, ForkSeq} from "@vouch/params";
import {Epoch, LightClientForkTypes, Slot, Version} from "@vouch/types";

export type ForkInfo = {
  name: ForkName;
  seq: ForkSeq;
  /** Activation epoch, `Infinity` for a fork not scheduled */
  epoch: Epoch;
  version: Version;
  prevVersion: Version;
  prevForkName: ForkName;
};

/**
 * Fork schedule of a chain and lookups by slot
 */
export type ForkConfig = {
  forks: Record<ForkName, ForkInfo>;
  /** `phase0` first */
  forksAscendingEpochOrder: ForkInfo[];
  forksDescendingEpochOrder: ForkInfo[];

  /** Fork active at `slot` */
  getForkInfo(slot: Slot): ForkInfo;
  getForkInfoAtEpoch(epoch: Epoch): ForkInfo;
  getForkName(slot: Slot): ForkName;
  getForkSeq(slot: Slot): ForkSeq;
  getForkVersion(slot: Slot): Version;
  /** Light-client SSZ types of the fork at `slot`, only defined from capella on */
  getLightClientForkTypes(slot: Slot): LightClientForkTypes;
};
