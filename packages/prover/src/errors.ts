import {ForkName} from "@vouch/params";
import {VouchError} from "@vouch/utils";
import {HexString} from "./types.js";

export enum ProofErrorCode {
  /** A proof node does not hash to the reference pointing at it */
  ROOT_MISMATCH = "PROOF_ERROR_ROOT_MISMATCH",
  MALFORMED_NODE = "PROOF_ERROR_MALFORMED_NODE",
  KEY_PATH_VIOLATION = "PROOF_ERROR_KEY_PATH_VIOLATION",
  CODE_HASH_MISMATCH = "PROOF_ERROR_CODE_HASH_MISMATCH",
}

export type ProofErrorType =
  | {code: ProofErrorCode.ROOT_MISMATCH; depth: number; expected: HexString; actual: HexString}
  | {code: ProofErrorCode.MALFORMED_NODE; depth: number; reason: string}
  | {code: ProofErrorCode.KEY_PATH_VIOLATION; depth: number; reason: string}
  | {code: ProofErrorCode.CODE_HASH_MISMATCH; expected: HexString; actual: HexString};

export class ProofError extends VouchError<ProofErrorType> {}

export enum ExecutionErrorCode {
  /** Block tag does not point at a header the light client accepted */
  BLOCK_NOT_AVAILABLE = "EXECUTION_ERROR_BLOCK_NOT_AVAILABLE",
  UNSUPPORTED_FORK = "EXECUTION_ERROR_UNSUPPORTED_FORK",
  PROVIDER_FAILED = "EXECUTION_ERROR_PROVIDER_FAILED",
  /** Provider response does not carry the proof that was asked for */
  PROOF_UNAVAILABLE = "EXECUTION_ERROR_PROOF_UNAVAILABLE",
  TOO_MANY_STATE_ROUNDS = "EXECUTION_ERROR_TOO_MANY_STATE_ROUNDS",
  /** Address or storage key that does not parse to its fixed width */
  INVALID_PARAM = "EXECUTION_ERROR_INVALID_PARAM",
  /** Gas estimation of a call that does not succeed */
  ESTIMATE_FAILED = "EXECUTION_ERROR_ESTIMATE_FAILED",
}

export type ExecutionErrorType =
  | {code: ExecutionErrorCode.BLOCK_NOT_AVAILABLE; blockTag: string}
  | {code: ExecutionErrorCode.UNSUPPORTED_FORK; fork: ForkName}
  | {code: ExecutionErrorCode.PROVIDER_FAILED; method: string; attempts: number; error: string}
  | {code: ExecutionErrorCode.PROOF_UNAVAILABLE; address: HexString; storageKey: HexString | null}
  | {code: ExecutionErrorCode.TOO_MANY_STATE_ROUNDS; rounds: number}
  | {code: ExecutionErrorCode.INVALID_PARAM; param: "address" | "storageKey"; value: string}
  | {code: ExecutionErrorCode.ESTIMATE_FAILED; status: string; error: string | null};

export class ExecutionError extends VouchError<ExecutionErrorType> {}
