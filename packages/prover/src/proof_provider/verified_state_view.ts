import {bytesEqual, fromHex, toHex} from "@vouch/utils";
import {ExecutionError, ExecutionErrorCode} from "../errors.js";
import {ExecutionProvider} from "../interfaces.js";
import {EMPTY_CODE_HASH, verifyAccount, verifyCode, verifyStorage} from "../trie/verify_proof.js";
import {Account, ELAccessList, ELProof, HexString} from "../types.js";
import {normalizeAddress, normalizeStorageKey} from "../utils/conversion.js";
import {ProofCache, getAccountCacheKey, getStorageCacheKey} from "./proof_cache.js";

export type LoadedAccountState = {
  address: HexString;
  account: Account;
  code: Uint8Array;
  storage: Map<HexString, bigint>;
};

/**
 * Read-only view of the execution state at one verified state root. Every value it returns
 * was proven against that root, misses are fetched through the shared proof cache.
 * A view belongs to a single call and remembers what it loaded, so the call can be replayed on a VM.
 */
export class VerifiedStateView {
  readonly stateRoot: HexString;
  /** Hash of the block the state root belongs to, used to query providers */
  readonly blockRef: HexString;

  private readonly provider: ExecutionProvider;
  private readonly cache: ProofCache;
  private readonly accounts = new Map<HexString, Account>();
  private readonly storage = new Map<HexString, Map<HexString, bigint>>();
  private readonly code = new Map<HexString, Uint8Array>();

  constructor(opts: {stateRoot: HexString; blockRef: HexString; provider: ExecutionProvider; cache: ProofCache}) {
    this.stateRoot = opts.stateRoot;
    this.blockRef = opts.blockRef;
    this.provider = opts.provider;
    this.cache = opts.cache;
  }

  async getAccount(address: HexString): Promise<Account> {
    const addressHex = normalizeAddress(address);
    const account = await this.cache.accounts.getOrFetch(
      getAccountCacheKey(this.stateRoot, addressHex),
      this.stateRoot,
      async () => {
        const proof = await this.provider.getProof(addressHex, [], this.blockRef);
        return this.verifyAccountProof(addressHex, proof);
      }
    );
    this.accounts.set(addressHex, account);
    return account;
  }

  async getStorage(address: HexString, slot: HexString): Promise<bigint> {
    const addressHex = normalizeAddress(address);
    const storageKey = normalizeStorageKey(slot);
    const account = await this.getAccount(addressHex);
    const value = await this.cache.storage.getOrFetch(
      getStorageCacheKey(this.stateRoot, addressHex, storageKey),
      this.stateRoot,
      async () => {
        const proof = await this.provider.getProof(addressHex, [storageKey], this.blockRef);
        return verifyStorageProof(account, addressHex, storageKey, proof);
      }
    );
    this.getAccountStorage(addressHex).set(storageKey, value);
    return value;
  }

  async getCode(address: HexString): Promise<Uint8Array> {
    const addressHex = normalizeAddress(address);
    const account = await this.getAccount(addressHex);

    let code: Uint8Array;
    if (bytesEqual(account.codeHash, EMPTY_CODE_HASH)) {
      code = new Uint8Array();
    } else {
      code = await this.cache.code.getOrFetch(toHex(account.codeHash), this.stateRoot, async () => {
        const codeHex = await this.provider.getCode(addressHex, this.blockRef);
        const fetched = fromHex(codeHex);
        verifyCode(account.codeHash, fetched);
        return fetched;
      });
    }
    this.code.set(addressHex, code);
    return code;
  }

  /**
   * Load accounts, their code and the given storage slots. Each account takes at most one
   * `getProof` request covering the account and all of its slots not cached yet.
   */
  async prefetch(accessList: ELAccessList[]): Promise<void> {
    const keysByAddress = new Map<HexString, Set<HexString>>();
    for (const {address, storageKeys} of accessList) {
      const addressHex = normalizeAddress(address);
      let keys = keysByAddress.get(addressHex);
      if (!keys) {
        keys = new Set();
        keysByAddress.set(addressHex, keys);
      }
      for (const key of storageKeys) {
        keys.add(normalizeStorageKey(key));
      }
    }

    await Promise.all(Array.from(keysByAddress, ([address, keys]) => this.prefetchAccount(address, [...keys])));
  }

  hasAccount(address: HexString): boolean {
    return this.accounts.has(address.toLowerCase());
  }

  hasStorage(address: HexString, storageKey: HexString): boolean {
    return this.storage.get(address.toLowerCase())?.has(storageKey.toLowerCase()) ?? false;
  }

  /** Everything loaded so far, accounts with their code and the slots read */
  getLoadedState(): LoadedAccountState[] {
    return Array.from(this.accounts, ([address, account]) => ({
      address,
      account,
      code: this.code.get(address) ?? new Uint8Array(),
      storage: this.storage.get(address) ?? new Map<HexString, bigint>(),
    }));
  }

  private async prefetchAccount(address: HexString, storageKeys: HexString[]): Promise<void> {
    const accountKey = getAccountCacheKey(this.stateRoot, address);
    const missingKeys = storageKeys.filter(
      (key) => !this.cache.storage.has(getStorageCacheKey(this.stateRoot, address, key))
    );

    // Cache entries are registered before the first await, so a concurrent prefetch of the same
    // account and slots finds them in flight and issues no proof request of its own
    if (!this.cache.accounts.has(accountKey) || missingKeys.length > 0) {
      // Shared by the account and the slots, requested by whichever needs it first
      let proofPromise: Promise<ELProof> | null = null;
      const fetchProof = (): Promise<ELProof> => {
        if (proofPromise === null) {
          proofPromise = this.provider.getProof(address, missingKeys, this.blockRef);
        }
        return proofPromise;
      };

      const account = await this.cache.accounts.getOrFetch(accountKey, this.stateRoot, async () =>
        this.verifyAccountProof(address, await fetchProof())
      );
      await Promise.all(
        missingKeys.map((key) =>
          this.cache.storage.getOrFetch(getStorageCacheKey(this.stateRoot, address, key), this.stateRoot, async () =>
            verifyStorageProof(account, address, key, await fetchProof())
          )
        )
      );
    }

    // All cached by now, record them in the view
    await this.getAccount(address);
    await Promise.all(storageKeys.map((key) => this.getStorage(address, key)));
    await this.getCode(address);
  }

  private verifyAccountProof(address: HexString, proof: ELProof): Account {
    return verifyAccount(fromHex(this.stateRoot), fromHex(address), proof.accountProof.map(fromHex));
  }

  private getAccountStorage(address: HexString): Map<HexString, bigint> {
    let storage = this.storage.get(address);
    if (!storage) {
      storage = new Map();
      this.storage.set(address, storage);
    }
    return storage;
  }
}

function verifyStorageProof(account: Account, address: HexString, storageKey: HexString, proof: ELProof): bigint {
  const storageProof = proof.storageProof.find((sp) => normalizeStorageKey(sp.key) === storageKey);
  if (!storageProof) {
    throw new ExecutionError({code: ExecutionErrorCode.PROOF_UNAVAILABLE, address, storageKey});
  }
  return verifyStorage(account.storageRoot, fromHex(storageKey), storageProof.proof.map(fromHex));
}
