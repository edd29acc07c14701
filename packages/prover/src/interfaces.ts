import {CallRequest, ELAccessListResponse, ELProof, HexString} from "./types.js";

/**
 * Untrusted source of execution layer state. Every response is verified against a state root
 * the light client accepted before it is used. `block` is the hash of that block.
 */
export interface ExecutionProvider {
  getProof(address: HexString, storageKeys: HexString[], block: HexString, signal?: AbortSignal): Promise<ELProof>;
  getCode(address: HexString, block: HexString, signal?: AbortSignal): Promise<HexString>;
  /** Only a hint of the state a call reads, its result is never trusted */
  createAccessList(tx: CallRequest, block: HexString, signal?: AbortSignal): Promise<ELAccessListResponse>;
}

export type ProviderRetryOpts = {
  /** Retries after the first attempt of a request */
  retries?: number;
  /** Delay before the first retry, doubled after every failed attempt */
  retryDelayMs?: number;
  maxRetryDelayMs?: number;
  /** Timeout of each attempt */
  requestTimeoutMs?: number;
};
