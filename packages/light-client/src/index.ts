import mitt from "mitt";
import {BeaconConfig, ChainConfig, createBeaconConfig} from "@vouch/config";
import {getEmptyLogger} from "@vouch/logger/empty";
import {LightClientBootstrap, LightClientHeader, Root, Slot, SyncPeriod} from "@vouch/types";
import {fromHex, isErrorAborted, Logger, sleep, toError, toRootHex} from "@vouch/utils";
import {LightclientEmitter, LightclientEvent} from "./events.js";
import {ConsensusError, ConsensusErrorCode} from "./errors.js";
import {
  DEFAULT_MAX_CHECKPOINT_AGE_SEC,
  LightclientSpec,
  LightClientStore,
  LightClientStoreEvents,
  LightClientStoreJson,
  ProcessUpdateResult,
  getCheckpointAgeSec,
  initializeLightClientStore,
} from "./spec/index.js";
import {ConsensusProvider} from "./transport/interface.js";
import {GenesisData, LightClientHeads, LightClientMessage, LightClientSyncState, RunStatusCode} from "./types.js";
import {chunkifyInclusiveRange} from "./utils/chunkify.js";
import {computeSyncPeriodAtSlot, getCurrentSlot, slotWithFutureTolerance, timeUntilNextSlot} from "./utils/clock.js";
import {initBls} from "./utils/bls.js";

export * from "./errors.js";
export * from "./events.js";
export * from "./types.js";
export type {ConsensusProvider} from "./transport/interface.js";
export {verifyLightClientMessage, LightClientStore} from "./spec/index.js";
export type {LightClientStoreJson, ProcessUpdateResult} from "./spec/index.js";
export {initBls} from "./utils/bls.js";

export type LightclientOpts = {
  /** Provides some protection against a server sending header updates too far away in the future */
  allowedClockDisparitySec?: number;
  maxCheckpointAgeSec?: number;
  strictCheckpointAge?: boolean;
};

type LightclientBaseArgs = {
  config: ChainConfig;
  logger?: Logger;
  opts?: LightclientOpts;
  genesisData: GenesisData;
  transport: ConsensusProvider;
};

export type LightclientInitArgs = LightclientBaseArgs &
  ({checkpointRoot: Root; bootstrap: LightClientBootstrap} | {store: LightClientStoreJson});

const MAX_CLOCK_DISPARITY_SEC = 10;
/** Prevent responses that are too big and get truncated. No specific reasoning for 32 */
export const MAX_PERIODS_PER_REQUEST = 32;
/** Prevent infinite loops caused by sync errors */
const ON_ERROR_RETRY_MS = 1000;

type RunStatus = {code: RunStatusCode.started | RunStatusCode.syncing; controller: AbortController} | {code: RunStatusCode.stopped};

/**
 * Provider-based Lightclient. Starting from a trusted checkpoint it needs:
 * - Sync period updates: to advance to the next sync committee, `getUpdates` at least once per period.
 * - Header updates: a recent header signed by a known sync committee, polled once per slot.
 *
 * When to trigger a committee update sync:
 *
 *  period 0         period 1         period 2
 * -|----------------|----------------|----------------|-> time
 *              | now
 *               - active current_sync_committee
 *               - known next_sync_committee, signed by current_sync_committee
 *
 * The BLS implementation must be initialized with `initBls()` before constructing an instance,
 * the static initializers do it.
 */
export class Lightclient {
  readonly emitter: LightclientEmitter = mitt();
  readonly config: BeaconConfig;
  readonly logger: Logger;
  readonly genesisValidatorsRoot: Uint8Array;
  readonly genesisTime: number;
  private readonly transport: ConsensusProvider;
  private readonly opts: LightclientOpts;

  private readonly lightclientSpec: LightclientSpec;

  private status: RunStatus = {code: RunStatusCode.stopped};
  private _syncState = LightClientSyncState.bootstrapped;

  constructor(args: LightclientInitArgs) {
    const {config, logger, genesisData, transport, opts = {}} = args;
    this.genesisTime = genesisData.genesisTime;
    this.genesisValidatorsRoot =
      typeof genesisData.genesisValidatorsRoot === "string"
        ? fromHex(genesisData.genesisValidatorsRoot)
        : genesisData.genesisValidatorsRoot;

    this.config = createBeaconConfig(config, this.genesisValidatorsRoot);
    this.logger = logger ?? getEmptyLogger();
    this.transport = transport;
    this.opts = opts;

    const events: LightClientStoreEvents = {
      onSetFinalizedHeader: (header) => {
        this.emitter.emit(LightclientEvent.finalizedHeader, header);
        this.logger.debug("Updated store.finalizedHeader", {slot: header.beacon.slot});
      },
      onSetOptimisticHeader: (header) => {
        this.emitter.emit(LightclientEvent.optimisticHeader, header);
        this.logger.debug("Updated store.optimisticHeader", {slot: header.beacon.slot});
      },
    };

    let store: LightClientStore;
    if ("store" in args) {
      store = LightClientStore.fromJson(args.store, events);
    } else {
      const slot = args.bootstrap.header.beacon.slot;
      store = initializeLightClientStore(this.config, args.checkpointRoot, args.bootstrap, this.currentSlot, opts, events);

      const maxAgeSec = opts.maxCheckpointAgeSec ?? DEFAULT_MAX_CHECKPOINT_AGE_SEC;
      const ageSec = getCheckpointAgeSec(this.config, slot, this.currentSlot);
      if (ageSec > maxAgeSec) {
        this.logger.warn("Checkpoint is older than the weak subjectivity period", {slot, ageSec, maxAgeSec});
      }
    }

    this.lightclientSpec = new LightclientSpec(this.config, store);
  }

  // Embed lightweight clock. The slot cycles are handled with `this.runLoop()`
  get currentSlot(): number {
    return getCurrentSlot(this.config, this.genesisTime);
  }

  get syncState(): LightClientSyncState {
    return this._syncState;
  }

  get runStatus(): RunStatusCode {
    return this.status.code;
  }

  static async initializeFromCheckpointRoot(
    args: LightclientBaseArgs & {checkpointRoot: Root}
  ): Promise<Lightclient> {
    const {transport, checkpointRoot} = args;

    await initBls();

    // Fetch bootstrap state with proof at the trusted block root
    const bootstrap = await transport.getBootstrap(toRootHex(checkpointRoot));

    return new Lightclient({...args, bootstrap});
  }

  static async initializeFromStore(args: LightclientBaseArgs & {store: LightClientStoreJson}): Promise<Lightclient> {
    await initBls();
    return new Lightclient(args);
  }

  start(): void {
    if (this.status.code !== RunStatusCode.stopped) return;

    const controller = new AbortController();
    this.setStatus({code: RunStatusCode.started, controller});
    this.runLoop(controller.signal).catch((e) => {
      this.logger.error("Error on runLoop", {}, toError(e));
    });
  }

  stop(): void {
    if (this.status.code === RunStatusCode.stopped) return;

    this.status.controller.abort();
    this.setStatus({code: RunStatusCode.stopped});
  }

  getHead(): LightClientHeader {
    return this.lightclientSpec.store.optimisticHeader;
  }

  getFinalized(): LightClientHeader {
    return this.lightclientSpec.store.finalizedHeader;
  }

  getCurrentHead(): LightClientHeads {
    return {finalized: this.getFinalized(), optimistic: this.getHead()};
  }

  /** Snapshot of the store, to restore with `initializeFromStore` */
  toJson(): LightClientStoreJson {
    return this.lightclientSpec.store.toJson();
  }

  /**
   * Fetch and apply the sync committee updates of an inclusive period range.
   * Returns early once `signal` is aborted, nothing fetched afterwards touches the store.
   */
  async sync(fromPeriod: SyncPeriod, toPeriod: SyncPeriod, signal?: AbortSignal): Promise<void> {
    const periodRanges = chunkifyInclusiveRange(fromPeriod, toPeriod, MAX_PERIODS_PER_REQUEST);

    for (const [fromPeriodRng, toPeriodRng] of periodRanges) {
      const count = toPeriodRng + 1 - fromPeriodRng;
      const updates = await this.transport.getUpdates(fromPeriodRng, count);
      for (const update of updates) {
        if (signal?.aborted) return;
        this.processMessage({kind: "update", update});

        // Yield to the macro queue, verifying updates is somewhat expensive and we want responsiveness
        await sleep(0);
      }
    }
  }

  /**
   * Verify and apply one update. Invalid updates are logged and dropped, the store stays at its last trusted state.
   * Returns null if the update was dropped.
   */
  processMessage(message: Exclude<LightClientMessage, {kind: "bootstrap"}>): ProcessUpdateResult | null {
    try {
      const result = this.lightclientSpec.onMessage(this.currentSlotWithTolerance(), message);
      if (result.finalizedHeaderUpdated) {
        this._syncState = LightClientSyncState.finalized;
      } else if (result.optimisticHeaderUpdated) {
        this._syncState = LightClientSyncState.optimistic;
      }
      if (result.syncCommitteeRotated) {
        this.logger.info("Rotated sync committee", {slot: this.getFinalized().beacon.slot});
      }
      return result;
    } catch (e) {
      if (e instanceof ConsensusError) {
        if (e.type.code === ConsensusErrorCode.NOT_RELEVANT) {
          this.logger.debug("Ignored light client update", {kind: message.kind, ...e.getMetadata()});
        } else {
          this.logger.warn("Dropped invalid light client update", {kind: message.kind}, e);
        }
        return null;
      }
      throw e;
    }
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const currentPeriod = computeSyncPeriodAtSlot(this.currentSlot);
        const storePeriod = computeSyncPeriodAtSlot(this.getFinalized().beacon.slot);
        // Check if we have the sync committees for the current clock period
        if (storePeriod < currentPeriod || this.lightclientSpec.store.nextSyncCommittee === null) {
          this.setRunningStatus(RunStatusCode.syncing);
          this.logger.debug("Syncing", {storePeriod, currentPeriod});
          await this.sync(storePeriod, currentPeriod, signal);
          if (signal.aborted) return;
        }

        this.setRunningStatus(RunStatusCode.started);
        const finalityUpdate = await this.transport.getFinalityUpdate();
        if (signal.aborted) return;
        this.processMessage({kind: "finalityUpdate", update: finalityUpdate});

        const optimisticUpdate = await this.transport.getOptimisticUpdate();
        if (signal.aborted) return;
        this.processMessage({kind: "optimisticUpdate", update: optimisticUpdate});
      } catch (e) {
        if (isErrorAborted(e) || signal.aborted) return;
        this.logger.error("Error on sync loop", {}, toError(e));

        if (!(await sleepUnlessAborted(ON_ERROR_RETRY_MS, signal))) return;
        continue;
      }

      // Wait for the next slot
      if (!(await sleepUnlessAborted(timeUntilNextSlot(this.config, this.genesisTime), signal))) return;
    }
  }

  private setRunningStatus(code: RunStatusCode.started | RunStatusCode.syncing): void {
    if (this.status.code === RunStatusCode.stopped || this.status.code === code) return;
    this.setStatus({code, controller: this.status.controller});
  }

  private setStatus(status: RunStatus): void {
    const changed = status.code !== this.status.code;
    this.status = status;
    if (changed) {
      this.emitter.emit(LightclientEvent.statusChange, status.code);
    }
  }

  private currentSlotWithTolerance(): Slot {
    return slotWithFutureTolerance(
      this.config,
      this.genesisTime,
      this.opts.allowedClockDisparitySec ?? MAX_CLOCK_DISPARITY_SEC
    );
  }
}

/** Returns false if `signal` aborted the sleep */
async function sleepUnlessAborted(ms: number, signal: AbortSignal): Promise<boolean> {
  try {
    await sleep(ms, signal);
    return true;
  } catch (e) {
    if (isErrorAborted(e)) return false;
    throw e;
  }
}
