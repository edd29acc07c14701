import {
  LightClientBootstrap,
  LightClientFinalityUpdate,
  LightClientOptimisticUpdate,
  LightClientUpdate,
  RootHex,
  SyncPeriod,
} from "@vouch/types";

/**
 * Untrusted source of light client data. Nothing returned is trusted before verification.
 */
export interface ConsensusProvider {
  /**
   * Fetch a bootstrapping state with a proof to a trusted block root.
   * The trusted block root should be fetched with similar means to a weak subjectivity checkpoint.
   */
  getBootstrap(blockRoot: RootHex): Promise<LightClientBootstrap>;
  /** Updates for `count` consecutive sync committee periods from `startPeriod` */
  getUpdates(startPeriod: SyncPeriod, count: number): Promise<LightClientUpdate[]>;
  getFinalityUpdate(): Promise<LightClientFinalityUpdate>;
  getOptimisticUpdate(): Promise<LightClientOptimisticUpdate>;
}
