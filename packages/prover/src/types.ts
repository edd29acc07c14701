import {ForkName} from "@vouch/params";
import {ExecutionPayloadHeader, Root, Slot} from "@vouch/types";

export type HexString = string;

/**
 * `safe` resolves to the finalized or the optimistic head, following `SafeTagPolicy`.
 * Numbers and hashes must point at a header the light client accepted.
 */
export type BlockTag = "latest" | "finalized" | "safe" | number | bigint | HexString;

export type SafeTagPolicy = "finalized" | "optimistic";

export type Account = {
  nonce: bigint;
  balance: bigint;
  storageRoot: Uint8Array;
  codeHash: Uint8Array;
};

/** Response of `eth_getProof` (EIP-1186) */
export interface ELProof {
  readonly address: HexString;
  readonly balance: HexString;
  readonly codeHash: HexString;
  readonly nonce: HexString;
  readonly storageHash: HexString;
  readonly accountProof: HexString[];
  readonly storageProof: ELStorageProof[];
}

export interface ELStorageProof {
  readonly key: HexString;
  readonly value: HexString;
  readonly proof: HexString[];
}

export interface ELAccessList {
  readonly address: HexString;
  readonly storageKeys: HexString[];
}

export interface ELAccessListResponse {
  readonly error?: string;
  readonly gasUsed: HexString;
  readonly accessList: ELAccessList[];
}

/** Call parameters in the shape of `eth_call` */
export interface CallRequest {
  readonly from?: HexString;
  readonly to?: HexString | null;
  readonly gas?: HexString;
  readonly gasPrice?: HexString;
  readonly maxFeePerGas?: HexString;
  readonly maxPriorityFeePerGas?: HexString;
  readonly value?: HexString;
  readonly data?: HexString;
  readonly input?: HexString;
}

export type ExecutionStatus = "success" | "revert" | "outOfGas" | "halt";

export type ExecutionResult = {
  status: ExecutionStatus;
  returnData: HexString;
  gasUsed: bigint;
  /** EVM error for `revert`, `outOfGas` and `halt` */
  error?: string;
};

/** Execution payload header of a beacon header the light client accepted */
export type TrustedExecutionHead = {
  fork: ForkName;
  beaconSlot: Slot;
  parentBeaconBlockRoot: Root;
  execution: ExecutionPayloadHeader;
  blockHash: HexString;
  stateRoot: HexString;
  finalized: boolean;
};
