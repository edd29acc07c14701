import {ChainForkConfig} from "@vouch/config";
import {ForkSeq} from "@vouch/params";
import {LightClientHeader, Slot} from "@vouch/types";
import {Logger, toHex} from "@vouch/utils";
import {MAX_HEAD_HISTORY} from "../constants.js";
import {HexString, TrustedExecutionHead} from "../types.js";
import {hexToBigInt} from "../utils/conversion.js";
import {isBlockHash} from "../utils/validation.js";
import {OrderedMap} from "./ordered_map.js";

type BlockELRoot = HexString;

/**
 * The in-memory store of the execution payload headers the light client published,
 * used to resolve block tags to a trusted state root
 */
export class HeadStore {
  // Finalized heads by block number
  // As these blocks are finalized, so not to be worried about conflicting roots
  private finalizedRoots = new OrderedMap<BlockELRoot>();

  // Unfinalized heads by beacon slot, a re-org replaces the root of a slot
  private unfinalizedRoots = new Map<Slot, BlockELRoot>();

  private heads = new Map<BlockELRoot, TrustedExecutionHead>();

  private latestBlockRoot: BlockELRoot | null = null;

  private readonly maxHistory: number;

  constructor(private readonly opts: {config: ChainForkConfig; logger: Logger; maxHistory?: number}) {
    this.maxHistory = opts.maxHistory ?? MAX_HEAD_HISTORY;
  }

  get size(): number {
    return this.heads.size;
  }

  get finalized(): TrustedExecutionHead | undefined {
    const maxBlockNumberForFinalized = this.finalizedRoots.max;
    if (maxBlockNumberForFinalized === undefined) {
      return undefined;
    }

    const finalizedMaxRoot = this.finalizedRoots.get(maxBlockNumberForFinalized);
    return finalizedMaxRoot !== undefined ? this.heads.get(finalizedMaxRoot) : undefined;
  }

  get latest(): TrustedExecutionHead | undefined {
    return this.latestBlockRoot !== null ? this.heads.get(this.latestBlockRoot) : this.finalized;
  }

  /**
   * Head by block hash, or by block number (hex, decimal string or number)
   */
  get(blockId: number | bigint | HexString): TrustedExecutionHead | undefined {
    if (isBlockHash(blockId)) {
      return this.heads.get(blockId.toLowerCase());
    }

    let blockNumber: number;
    if (typeof blockId === "string") {
      if (!/^(0x[0-9a-fA-F]+|[0-9]+)$/.test(blockId)) {
        return undefined;
      }
      blockNumber = Number(blockId.startsWith("0x") ? hexToBigInt(blockId) : BigInt(blockId));
    } else {
      blockNumber = Number(blockId);
    }

    const finalizedRoot = this.finalizedRoots.get(blockNumber);
    if (finalizedRoot !== undefined) {
      return this.heads.get(finalizedRoot);
    }

    // Latest accepted head wins if a re-org left two heads with this number
    let found: TrustedExecutionHead | undefined;
    for (const head of this.heads.values()) {
      if (head.execution.blockNumber === blockNumber && (!found || head.beaconSlot > found.beaconSlot)) {
        found = head;
      }
    }
    return found;
  }

  /**
   * Store the execution header of a published light client header.
   * Returns null for headers of forks without execution state proofs.
   */
  processLCHeader(header: LightClientHeader, finalized = false): TrustedExecutionHead | null {
    const blockSlot = header.beacon.slot;
    if (this.opts.config.getForkSeq(blockSlot) < ForkSeq.capella) {
      this.opts.logger.debug("Ignored header without execution state", {slot: blockSlot});
      return null;
    }

    const blockELRoot = toHex(header.execution.blockHash);
    const head: TrustedExecutionHead = {
      fork: this.opts.config.getForkName(blockSlot),
      beaconSlot: blockSlot,
      parentBeaconBlockRoot: header.beacon.parentRoot,
      execution: header.execution,
      blockHash: blockELRoot,
      stateRoot: toHex(header.execution.stateRoot),
      finalized,
    };

    // ==== Finalized blocks ====
    if (finalized) {
      this.heads.set(blockELRoot, head);
      this.finalizedRoots.set(head.execution.blockNumber, blockELRoot);
      this.unfinalizedRoots.delete(blockSlot);
      this.prune();
      return head;
    }

    // ==== Unfinalized blocks ====
    const existingELRoot = this.unfinalizedRoots.get(blockSlot);
    const known = this.heads.get(blockELRoot);
    if (existingELRoot === blockELRoot && known) {
      this.setLatest(known);
      return known;
    }

    // Re-org happened, drop the replaced head unless it was finalized meanwhile
    if (existingELRoot !== undefined && existingELRoot !== blockELRoot && !this.heads.get(existingELRoot)?.finalized) {
      this.heads.delete(existingELRoot);
      if (this.latestBlockRoot === existingELRoot) {
        this.latestBlockRoot = null;
      }
    }

    this.unfinalizedRoots.set(blockSlot, blockELRoot);
    // A finalized head published again as optimistic keeps its finalized flag
    const stored = known?.finalized ? known : head;
    this.heads.set(blockELRoot, stored);
    this.setLatest(stored);
    this.prune();
    return stored;
  }

  /** State roots of the stored heads */
  liveStateRoots(): Set<HexString> {
    return new Set(Array.from(this.heads.values(), (head) => head.stateRoot));
  }

  prune(): void {
    if (this.heads.size <= this.maxHistory) return;

    const finalizedMaxRoot = this.finalized?.blockHash;
    const oldestFirst = Array.from(this.heads.values())
      .filter((head) => head.blockHash !== this.latestBlockRoot && head.blockHash !== finalizedMaxRoot)
      .sort((a, b) => a.beaconSlot - b.beaconSlot);

    for (const head of oldestFirst) {
      if (this.heads.size <= this.maxHistory) break;

      this.heads.delete(head.blockHash);
      if (this.finalizedRoots.get(head.execution.blockNumber) === head.blockHash) {
        this.finalizedRoots.delete(head.execution.blockNumber);
      }
      if (this.unfinalizedRoots.get(head.beaconSlot) === head.blockHash) {
        this.unfinalizedRoots.delete(head.beaconSlot);
      }
    }
  }

  private setLatest(head: TrustedExecutionHead): void {
    const latest = this.latestBlockRoot !== null ? this.heads.get(this.latestBlockRoot) : undefined;
    if (!latest || latest.beaconSlot <= head.beaconSlot) {
      this.latestBlockRoot = head.blockHash;
    }
  }
}
