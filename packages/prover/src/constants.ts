/** Execution headers kept by the head store, older ones are pruned along with their cached proofs */
export const MAX_HEAD_HISTORY = 32;
/** Re-runs of a call after its first execution read state that was not loaded yet */
export const MAX_STATE_LOAD_ROUNDS = 4;
export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000";
export const DEFAULT_REQUEST_TIMEOUT = 3000;

export const DEFAULT_PROVIDER_RETRIES = 5;
export const DEFAULT_PROVIDER_RETRY_DELAY_MS = 100;
export const DEFAULT_PROVIDER_MAX_RETRY_DELAY_MS = 5000;

export const TX_BASE_GAS = 21000n;
export const TX_CREATE_GAS = 32000n;
export const TX_DATA_ZERO_GAS = 4n;
export const TX_DATA_NON_ZERO_GAS = 16n;
