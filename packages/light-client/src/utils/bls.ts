import {init} from "@chainsafe/bls/switchable";

/**
 * Initialize the BLS implementation, a WebAssembly instance for herumi.
 * Must resolve once before any signature is verified.
 */
export async function initBls(): Promise<void> {
  await init("herumi");
}
