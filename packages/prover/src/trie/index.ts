export {
  EMPTY_CODE_HASH,
  EMPTY_TRIE_ROOT,
  emptyAccount,
  verifyAccount,
  verifyCode,
  verifyProof,
  verifyStorage,
} from "./verify_proof.js";
export type {TrieProofResult} from "./verify_proof.js";
export {ProofError, ProofErrorCode} from "../errors.js";
export type {ProofErrorType} from "../errors.js";
export type {Account} from "../types.js";
