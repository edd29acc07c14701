import {ChainConfig, ChainForkConfig} from "@vouch/config";
import {getEmptyLogger} from "@vouch/logger/empty";
import {
  ConsensusProvider,
  GenesisData,
  Lightclient,
  LightclientEvent,
  LightclientOpts,
  RunStatusCode,
} from "@vouch/light-client";
import {LightClientHeader, Root} from "@vouch/types";
import {ErrorAborted, Logger, toError, toHex} from "@vouch/utils";
import {MAX_STATE_LOAD_ROUNDS, ZERO_ADDRESS} from "./constants.js";
import {ExecutionError, ExecutionErrorCode} from "./errors.js";
import {ExecutionProvider, ProviderRetryOpts} from "./interfaces.js";
import {HeadStore} from "./proof_provider/head_store.js";
import {ProofCache} from "./proof_provider/proof_cache.js";
import {VerifiedStateView} from "./proof_provider/verified_state_view.js";
import {
  BlockTag,
  CallRequest,
  ELAccessList,
  ExecutionResult,
  HexString,
  SafeTagPolicy,
  TrustedExecutionHead,
} from "./types.js";
import {bigIntToWord} from "./utils/conversion.js";
import {
  RecordingStateManager,
  createVM,
  executeVMCall,
  getCallData,
  getVMBlockFromExecutionHead,
  updateStateManagerWithView,
} from "./utils/evm.js";
import {getChainCommon, getIntrinsicGas} from "./utils/execution.js";
import {RetryingExecutionProvider} from "./utils/rpc_provider.js";
import {isPresent} from "./utils/validation.js";

export type VerifiedExecutionClientOpts = ProviderRetryOpts & {
  /** Head the `safe` tag resolves to, `finalized` by default */
  safeTagPolicy?: SafeTagPolicy;
  maxHeadHistory?: number;
  maxStateLoadRounds?: number;
};

/** The part of the light client the execution client follows */
export type HeadSource = Pick<Lightclient, "emitter" | "getCurrentHead">;

export type VerifiedExecutionClientArgs = {
  config: ChainForkConfig;
  heads: HeadSource;
  /** Alternate providers, requests rotate across them on retries */
  providers: ExecutionProvider[];
  logger?: Logger;
  opts?: VerifiedExecutionClientOpts;
};

export type VerifiedExecutionClientInitArgs = {
  config: ChainConfig;
  genesisData: GenesisData;
  checkpointRoot: Root;
  transport: ConsensusProvider;
  providers: ExecutionProvider[];
  logger?: Logger;
  opts?: VerifiedExecutionClientOpts & LightclientOpts;
};

export type CallOpts = {signal?: AbortSignal};

/**
 * Serves execution layer reads and calls over state proven against the execution payload
 * headers published by a light client. Provider responses are never returned unverified.
 */
export class VerifiedExecutionClient {
  readonly config: ChainForkConfig;
  readonly headStore: HeadStore;
  readonly cache = new ProofCache();

  private readonly logger: Logger;
  private readonly provider: ExecutionProvider;
  private readonly safeTagPolicy: SafeTagPolicy;
  private readonly maxStateLoadRounds: number;
  private readonly heads: HeadSource;
  private lightclient: Lightclient | null = null;

  constructor({config, heads, providers, logger, opts}: VerifiedExecutionClientArgs) {
    this.config = config;
    this.heads = heads;
    this.logger = logger ?? getEmptyLogger();
    this.provider = new RetryingExecutionProvider(providers, {logger: this.logger, opts});
    this.safeTagPolicy = opts?.safeTagPolicy ?? "finalized";
    this.maxStateLoadRounds = opts?.maxStateLoadRounds ?? MAX_STATE_LOAD_ROUNDS;
    this.headStore = new HeadStore({config, logger: this.logger, maxHistory: opts?.maxHeadHistory});

    const {finalized, optimistic} = heads.getCurrentHead();
    this.onHeader(finalized, true);
    this.onHeader(optimistic, false);

    heads.emitter.on(LightclientEvent.finalizedHeader, this.onFinalizedHeader);
    heads.emitter.on(LightclientEvent.optimisticHeader, this.onOptimisticHeader);
  }

  /**
   * Bootstrap a light client from a trusted checkpoint, wait for it to sync and follow its heads
   */
  static async init(args: VerifiedExecutionClientInitArgs): Promise<VerifiedExecutionClient> {
    const {config, genesisData, checkpointRoot, transport, providers, opts} = args;
    const logger = args.logger ?? getEmptyLogger();

    logger.info("Initializing lightclient", {checkpointRoot: toHex(checkpointRoot)});
    const lightclient = await Lightclient.initializeFromCheckpointRoot({
      config,
      logger,
      opts,
      genesisData,
      transport,
      checkpointRoot,
    });

    // Wait for the lightclient to start
    await new Promise<void>((resolve) => {
      const lightClientStarted = (status: RunStatusCode): void => {
        if (status === RunStatusCode.started) {
          lightclient.emitter.off(LightclientEvent.statusChange, lightClientStarted);
          resolve();
        }
      };
      lightclient.emitter.on(LightclientEvent.statusChange, lightClientStarted);
      logger.info("Initiating lightclient");
      lightclient.start();
    });

    const client = new VerifiedExecutionClient({
      config: lightclient.config,
      heads: lightclient,
      providers,
      logger,
      opts,
    });
    client.lightclient = lightclient;
    logger.info("Verified execution client ready", {blockNumber: client.getBlockNumber()});
    return client;
  }

  /** Stop following heads, and stop the light client if this client started it */
  close(): void {
    this.heads.emitter.off(LightclientEvent.finalizedHeader, this.onFinalizedHeader);
    this.heads.emitter.off(LightclientEvent.optimisticHeader, this.onOptimisticHeader);
    this.lightclient?.stop();
  }

  getCurrentHead(): {finalized: TrustedExecutionHead | undefined; optimistic: TrustedExecutionHead | undefined} {
    return {finalized: this.headStore.finalized, optimistic: this.headStore.latest};
  }

  getBlockNumber(): number {
    return this.resolveBlock("latest").execution.blockNumber;
  }

  async getBalance(address: HexString, blockTag: BlockTag = "latest"): Promise<bigint> {
    const account = await this.createView(this.resolveBlock(blockTag)).getAccount(address);
    return account.balance;
  }

  async getTransactionCount(address: HexString, blockTag: BlockTag = "latest"): Promise<bigint> {
    const account = await this.createView(this.resolveBlock(blockTag)).getAccount(address);
    return account.nonce;
  }

  async getStorageAt(address: HexString, slot: HexString, blockTag: BlockTag = "latest"): Promise<HexString> {
    const value = await this.createView(this.resolveBlock(blockTag)).getStorage(address, slot);
    return bigIntToWord(value);
  }

  async getCode(address: HexString, blockTag: BlockTag = "latest"): Promise<HexString> {
    const code = await this.createView(this.resolveBlock(blockTag)).getCode(address);
    return toHex(code);
  }

  /**
   * Execute a call against the verified state of a block. Reverts and out of gas are results,
   * failed verification and unavailable state are errors.
   */
  async call(tx: CallRequest, blockTag: BlockTag = "latest", opts?: CallOpts): Promise<ExecutionResult> {
    const head = this.resolveBlock(blockTag);
    const common = getChainCommon(this.config.DEPOSIT_CHAIN_ID, head.fork);
    const view = this.createView(head);
    const signal = opts?.signal;

    await view.prefetch(await this.getAccessListHint(tx, head, signal));

    for (let round = 1; round <= this.maxStateLoadRounds; round++) {
      throwIfAborted(signal);

      const stateManager = new RecordingStateManager(view);
      await updateStateManagerWithView({stateManager, view});
      const vm = await createVM({common, stateManager});
      stateManager.startRecording();

      const result = await executeVMCall({vm, tx, block: getVMBlockFromExecutionHead(head, common)});
      const missing = stateManager.getMissingState();
      if (missing.length === 0) {
        this.logger.debug("Executed verified call", {
          blockNumber: head.execution.blockNumber,
          status: result.status,
          rounds: round,
        });
        return result;
      }

      this.logger.debug("Call read state not loaded yet", {round, accounts: missing.length});
      throwIfAborted(signal);
      await view.prefetch(missing);
    }

    throw new ExecutionError({code: ExecutionErrorCode.TOO_MANY_STATE_ROUNDS, rounds: this.maxStateLoadRounds});
  }

  /**
   * Gas used by the call plus the intrinsic gas of a transaction carrying it
   */
  async estimateGas(tx: CallRequest, blockTag: BlockTag = "latest", opts?: CallOpts): Promise<bigint> {
    const result = await this.call(tx, blockTag, opts);
    if (result.status !== "success") {
      throw new ExecutionError({
        code: ExecutionErrorCode.ESTIMATE_FAILED,
        status: result.status,
        error: result.error ?? null,
      });
    }
    return result.gasUsed + getIntrinsicGas(getCallData(tx), !isPresent(tx.to));
  }

  resolveBlock(blockTag: BlockTag): TrustedExecutionHead {
    let head: TrustedExecutionHead | undefined;
    switch (blockTag) {
      case "latest":
        head = this.headStore.latest;
        break;
      case "finalized":
        head = this.headStore.finalized;
        break;
      case "safe":
        head = this.safeTagPolicy === "finalized" ? this.headStore.finalized : this.headStore.latest;
        break;
      default:
        head = this.headStore.get(blockTag);
    }

    if (!head) {
      throw new ExecutionError({code: ExecutionErrorCode.BLOCK_NOT_AVAILABLE, blockTag: String(blockTag)});
    }
    return head;
  }

  private createView(head: TrustedExecutionHead): VerifiedStateView {
    return new VerifiedStateView({
      stateRoot: head.stateRoot,
      blockRef: head.blockHash,
      provider: this.provider,
      cache: this.cache,
    });
  }

  /**
   * Accounts and slots the provider expects the call to read, plus the sender, the target and the
   * fee recipient. Only a hint, whatever it misses is loaded on a later round.
   */
  private async getAccessListHint(
    tx: CallRequest,
    head: TrustedExecutionHead,
    signal?: AbortSignal
  ): Promise<ELAccessList[]> {
    const accessList: ELAccessList[] = [
      {address: tx.from ?? ZERO_ADDRESS, storageKeys: []},
      {address: toHex(head.execution.feeRecipient), storageKeys: []},
    ];
    if (isPresent(tx.to)) {
      accessList.push({address: tx.to, storageKeys: []});
    }

    try {
      const response = await this.provider.createAccessList(tx, head.blockHash, signal);
      accessList.push(...response.accessList);
    } catch (e) {
      if (e instanceof ErrorAborted) throw e;
      this.logger.debug("No access list hint for call", {blockNumber: head.execution.blockNumber}, toError(e));
    }
    return accessList;
  }

  private onHeader(header: LightClientHeader, finalized: boolean): void {
    const head = this.headStore.processLCHeader(header, finalized);
    if (head === null) return;

    const pruned = this.cache.prune(this.headStore.liveStateRoots());
    this.logger.debug("Tracking execution head", {
      blockNumber: head.execution.blockNumber,
      slot: head.beaconSlot,
      finalized,
      prunedProofs: pruned,
    });
  }

  private onFinalizedHeader = (header: LightClientHeader): void => this.onHeader(header, true);
  private onOptimisticHeader = (header: LightClientHeader): void => this.onHeader(header, false);
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new ErrorAborted("verified call");
  }
}
