import {Logger, isErrorAborted, retry, toError, withTimeout} from "@vouch/utils";
import {
  DEFAULT_PROVIDER_MAX_RETRY_DELAY_MS,
  DEFAULT_PROVIDER_RETRIES,
  DEFAULT_PROVIDER_RETRY_DELAY_MS,
  DEFAULT_REQUEST_TIMEOUT,
} from "../constants.js";
import {ExecutionError, ExecutionErrorCode} from "../errors.js";
import {ExecutionProvider, ProviderRetryOpts} from "../interfaces.js";
import {CallRequest, ELAccessListResponse, ELProof, HexString} from "../types.js";

/**
 * Execution provider that retries failed requests with exponential backoff, rotating across
 * the given providers on every attempt. Exhausted retries surface as `PROVIDER_FAILED`.
 */
export class RetryingExecutionProvider implements ExecutionProvider {
  private readonly providers: ExecutionProvider[];
  private readonly logger: Logger;
  private readonly opts: Required<ProviderRetryOpts>;

  constructor(providers: ExecutionProvider[], {logger, opts}: {logger: Logger; opts?: ProviderRetryOpts}) {
    if (providers.length === 0) {
      throw Error("At least one execution provider is required");
    }
    this.providers = providers;
    this.logger = logger;
    this.opts = {
      retries: opts?.retries ?? DEFAULT_PROVIDER_RETRIES,
      retryDelayMs: opts?.retryDelayMs ?? DEFAULT_PROVIDER_RETRY_DELAY_MS,
      maxRetryDelayMs: opts?.maxRetryDelayMs ?? DEFAULT_PROVIDER_MAX_RETRY_DELAY_MS,
      requestTimeoutMs: opts?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT,
    };
  }

  getProof(address: HexString, storageKeys: HexString[], block: HexString, signal?: AbortSignal): Promise<ELProof> {
    return this.request(
      "eth_getProof",
      (provider, requestSignal) => provider.getProof(address, storageKeys, block, requestSignal),
      signal
    );
  }

  getCode(address: HexString, block: HexString, signal?: AbortSignal): Promise<HexString> {
    return this.request("eth_getCode", (provider, requestSignal) => provider.getCode(address, block, requestSignal), signal);
  }

  /** Only a hint for calls, tried once on the first provider */
  createAccessList(tx: CallRequest, block: HexString, signal?: AbortSignal): Promise<ELAccessListResponse> {
    return this.request(
      "eth_createAccessList",
      (provider, requestSignal) => provider.createAccessList(tx, block, requestSignal),
      signal,
      0
    );
  }

  private async request<T>(
    method: string,
    fn: (provider: ExecutionProvider, signal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
    retries = this.opts.retries
  ): Promise<T> {
    let attempts = 0;
    try {
      return await retry(
        (attempt) => {
          attempts = attempt;
          const provider = this.providers[(attempt - 1) % this.providers.length];
          return withTimeout((requestSignal) => fn(provider, requestSignal), this.opts.requestTimeoutMs, signal);
        },
        {
          retries,
          retryDelay: this.opts.retryDelayMs,
          backoffFactor: 2,
          maxRetryDelay: this.opts.maxRetryDelayMs,
          signal,
          shouldRetry: (e) => !isErrorAborted(e),
          onRetry: (e, attempt) => {
            this.logger.debug("Retrying execution provider request", {method, attempt}, e);
          },
        }
      );
    } catch (e) {
      if (isErrorAborted(e)) {
        throw e;
      }
      throw new ExecutionError({code: ExecutionErrorCode.PROVIDER_FAILED, method, attempts, error: toError(e).message});
    }
  }
}
