export * from "./errors.js";
export * from "./types.js";
export type {ExecutionProvider, ProviderRetryOpts} from "./interfaces.js";
export {MAX_HEAD_HISTORY, MAX_STATE_LOAD_ROUNDS} from "./constants.js";
export {VerifiedExecutionClient} from "./verified_execution_client.js";
export type {
  CallOpts,
  HeadSource,
  VerifiedExecutionClientArgs,
  VerifiedExecutionClientInitArgs,
  VerifiedExecutionClientOpts,
} from "./verified_execution_client.js";
export {VerifiedStateView} from "./proof_provider/verified_state_view.js";
export {HeadStore} from "./proof_provider/head_store.js";
export {ProofCache} from "./proof_provider/proof_cache.js";
export {RetryingExecutionProvider} from "./utils/rpc_provider.js";
export {verifyAccount, verifyCode, verifyProof, verifyStorage} from "./trie/index.js";
