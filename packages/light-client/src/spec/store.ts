import {LightClientHeader, RootHex, ssz, SyncCommittee} from "@vouch/types";
import {toRootHex} from "@vouch/utils";
import {SyncCommitteeFast} from "../types.js";
import {deserializeSyncCommittee} from "../utils/utils.js";

/**
 * Headers the store has accepted, indexed by the root of their beacon header.
 * The store refers to entries by root only.
 */
export class HeaderArena {
  private readonly headers = new Map<RootHex, LightClientHeader>();

  insert(header: LightClientHeader): RootHex {
    const root = toRootHex(ssz.phase0.BeaconBlockHeader.hashTreeRoot(header.beacon));
    if (!this.headers.has(root)) {
      this.headers.set(root, header);
    }
    return root;
  }

  get(root: RootHex): LightClientHeader {
    const header = this.headers.get(root);
    if (header === undefined) {
      throw Error(`Unknown header root ${root}`);
    }
    return header;
  }

  has(root: RootHex): boolean {
    return this.headers.has(root);
  }

  /** Drop every header not in `roots` */
  retain(roots: RootHex[]): void {
    for (const root of this.headers.keys()) {
      if (!roots.includes(root)) {
        this.headers.delete(root);
      }
    }
  }

  get size(): number {
    return this.headers.size;
  }
}

export interface LightClientStoreEvents {
  onSetFinalizedHeader?: (header: LightClientHeader) => void;
  onSetOptimisticHeader?: (header: LightClientHeader) => void;
}

export type LightClientStoreInit = {
  finalizedHeader: LightClientHeader;
  optimisticHeader: LightClientHeader;
  currentSyncCommittee: SyncCommittee;
  nextSyncCommittee: SyncCommittee | null;
  previousMaxActiveParticipants: number;
  currentMaxActiveParticipants: number;
};

/** JSON form of the store, headers and committees use the SSZ JSON mapping */
export type LightClientStoreJson = {
  finalizedHeader: unknown;
  optimisticHeader: unknown;
  currentSyncCommittee: unknown;
  nextSyncCommittee: unknown;
  previousMaxActiveParticipants: number;
  currentMaxActiveParticipants: number;
};

type StoredSyncCommittee = {value: SyncCommittee; fast: SyncCommitteeFast};

export class LightClientStore {
  readonly headers = new HeaderArena();

  private finalizedRoot: RootHex;
  private optimisticRoot: RootHex;
  private currentCommittee: StoredSyncCommittee;
  private nextCommittee: StoredSyncCommittee | null;

  /** Max participation of the previous period, for the optimistic safety threshold */
  previousMaxActiveParticipants: number;
  /** Max participation seen in the current period */
  currentMaxActiveParticipants: number;

  constructor(
    init: LightClientStoreInit,
    private readonly events: LightClientStoreEvents = {}
  ) {
    this.finalizedRoot = this.headers.insert(init.finalizedHeader);
    this.optimisticRoot = this.headers.insert(init.optimisticHeader);
    this.currentCommittee = toStoredSyncCommittee(init.currentSyncCommittee);
    this.nextCommittee = init.nextSyncCommittee === null ? null : toStoredSyncCommittee(init.nextSyncCommittee);
    this.previousMaxActiveParticipants = init.previousMaxActiveParticipants;
    this.currentMaxActiveParticipants = init.currentMaxActiveParticipants;
  }

  get finalizedHeader(): LightClientHeader {
    return this.headers.get(this.finalizedRoot);
  }

  get optimisticHeader(): LightClientHeader {
    return this.headers.get(this.optimisticRoot);
  }

  get currentSyncCommittee(): SyncCommitteeFast {
    return this.currentCommittee.fast;
  }

  get nextSyncCommittee(): SyncCommitteeFast | null {
    return this.nextCommittee?.fast ?? null;
  }

  setFinalizedHeader(header: LightClientHeader): void {
    this.finalizedRoot = this.headers.insert(header);
    this.pruneHeaders();
    this.events.onSetFinalizedHeader?.(header);
  }

  setOptimisticHeader(header: LightClientHeader): void {
    this.optimisticRoot = this.headers.insert(header);
    this.pruneHeaders();
    this.events.onSetOptimisticHeader?.(header);
  }

  setNextSyncCommittee(syncCommittee: SyncCommittee | null): void {
    this.nextCommittee = syncCommittee === null ? null : toStoredSyncCommittee(syncCommittee);
  }

  /**
   * current <- next, then next <- `nextSyncCommittee`. Participation of the closing period becomes the previous.
   */
  rotateSyncCommittee(nextSyncCommittee: SyncCommittee | null): void {
    if (this.nextCommittee === null) {
      throw Error("Cannot rotate without a next sync committee");
    }
    const following = nextSyncCommittee === null ? null : toStoredSyncCommittee(nextSyncCommittee);
    this.currentCommittee = this.nextCommittee;
    this.nextCommittee = following;
    this.previousMaxActiveParticipants = this.currentMaxActiveParticipants;
    this.currentMaxActiveParticipants = 0;
  }

  toJson(): LightClientStoreJson {
    return {
      finalizedHeader: ssz.deneb.LightClientHeader.toJson(this.finalizedHeader),
      optimisticHeader: ssz.deneb.LightClientHeader.toJson(this.optimisticHeader),
      currentSyncCommittee: ssz.altair.SyncCommittee.toJson(this.currentCommittee.value),
      nextSyncCommittee: this.nextCommittee && ssz.altair.SyncCommittee.toJson(this.nextCommittee.value),
      previousMaxActiveParticipants: this.previousMaxActiveParticipants,
      currentMaxActiveParticipants: this.currentMaxActiveParticipants,
    };
  }

  static fromJson(json: LightClientStoreJson, events?: LightClientStoreEvents): LightClientStore {
    return new LightClientStore(
      {
        finalizedHeader: ssz.deneb.LightClientHeader.fromJson(json.finalizedHeader),
        optimisticHeader: ssz.deneb.LightClientHeader.fromJson(json.optimisticHeader),
        currentSyncCommittee: ssz.altair.SyncCommittee.fromJson(json.currentSyncCommittee),
        nextSyncCommittee:
          json.nextSyncCommittee === null ? null : ssz.altair.SyncCommittee.fromJson(json.nextSyncCommittee),
        previousMaxActiveParticipants: json.previousMaxActiveParticipants,
        currentMaxActiveParticipants: json.currentMaxActiveParticipants,
      },
      events
    );
  }

  private pruneHeaders(): void {
    this.headers.retain([this.finalizedRoot, this.optimisticRoot]);
  }
}

function toStoredSyncCommittee(value: SyncCommittee): StoredSyncCommittee {
  return {value, fast: deserializeSyncCommittee(value)};
}
