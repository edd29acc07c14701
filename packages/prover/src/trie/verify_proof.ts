import {RLP} from "@ethereumjs/rlp";
import {KECCAK256_NULL, KECCAK256_RLP, bytesToBigInt, setLengthLeft} from "@ethereumjs/util";
import {keccak256} from "ethereum-cryptography/keccak.js";
import {bytesEqual, toError, toHex} from "@vouch/utils";
import {ProofError, ProofErrorCode} from "../errors.js";
import {Account} from "../types.js";
import {bytesToNibbles, decodeHexPrefix, matchingNibbleLength} from "./nibbles.js";

export type TrieProofResult = {found: true; value: Uint8Array} | {found: false};

/** RLP decoded trie node or item */
type Decoded = Uint8Array | Decoded[];

/** Hash of a node the proof must provide, or a node shorter than 32 bytes embedded in its parent */
type NodeRef = {hash: Uint8Array} | {inline: Decoded[]};

const BRANCH_NODE_ITEMS = 17;
const SHORT_NODE_ITEMS = 2;
const HASH_LENGTH = 32;
const EMPTY_NODE = RLP.encode(new Uint8Array());

export const EMPTY_TRIE_ROOT = KECCAK256_RLP;
export const EMPTY_CODE_HASH = KECCAK256_NULL;

export function emptyAccount(): Account {
  return {nonce: 0n, balance: 0n, storageRoot: EMPTY_TRIE_ROOT, codeHash: EMPTY_CODE_HASH};
}

/**
 * Verify a Merkle-Patricia proof of `key` against `rootHash`.
 * `proof` lists the RLP encoded nodes from the root down, without the nodes inlined in their parents.
 * Returns the stored value, or `found: false` when the proof shows the key is absent.
 */
export function verifyProof(rootHash: Uint8Array, key: Uint8Array, proof: Uint8Array[]): TrieProofResult {
  if (proof.length === 0) {
    if (bytesEqual(rootHash, EMPTY_TRIE_ROOT)) {
      return {found: false};
    }
    throw new ProofError({code: ProofErrorCode.MALFORMED_NODE, depth: 0, reason: "Empty proof for a non empty root"});
  }

  const nibbles = bytesToNibbles(key);
  let keyIndex = 0;
  let proofIndex = 0;
  let depth = 0;
  let ref: NodeRef = {hash: rootHash};

  const done = (result: TrieProofResult): TrieProofResult => {
    if (proofIndex !== proof.length) {
      throw new ProofError({
        code: ProofErrorCode.MALFORMED_NODE,
        depth,
        reason: `${proof.length - proofIndex} surplus proof nodes`,
      });
    }
    return result;
  };

  for (;;) {
    let node: Decoded[];
    if ("hash" in ref) {
      const encoded = proof[proofIndex];
      if (encoded === undefined) {
        throw new ProofError({code: ProofErrorCode.MALFORMED_NODE, depth, reason: "Missing proof node"});
      }
      const nodeHash = keccak256(encoded);
      if (!bytesEqual(nodeHash, ref.hash)) {
        throw new ProofError({
          code: ProofErrorCode.ROOT_MISMATCH,
          depth,
          expected: toHex(ref.hash),
          actual: toHex(nodeHash),
        });
      }
      proofIndex++;
      // Some clients prove the empty trie with its single empty node
      if (depth === 0 && bytesEqual(encoded, EMPTY_NODE)) {
        return done({found: false});
      }
      node = decodeNode(encoded, depth);
    } else {
      node = ref.inline;
    }

    if (node.length === BRANCH_NODE_ITEMS) {
      if (keyIndex === nibbles.length) {
        throw new ProofError({
          code: ProofErrorCode.KEY_PATH_VIOLATION,
          depth,
          reason: "Key ends at a branch node",
        });
      }
      const child = toNodeRef(node[nibbles[keyIndex]], depth);
      keyIndex++;
      if (child === null) {
        return done({found: false});
      }
      ref = child;
    } else if (node.length === SHORT_NODE_ITEMS) {
      const [encodedPath, next] = node;
      const decoded = encodedPath instanceof Uint8Array ? decodeHexPrefix(encodedPath) : null;
      if (decoded === null) {
        throw new ProofError({code: ProofErrorCode.MALFORMED_NODE, depth, reason: "Invalid hex prefix path"});
      }

      const {path, isLeaf} = decoded;
      const remaining = nibbles.length - keyIndex;
      const matched = matchingNibbleLength(path, nibbles, keyIndex);

      if (isLeaf) {
        if (matched === path.length && matched === remaining) {
          if (!(next instanceof Uint8Array)) {
            throw new ProofError({code: ProofErrorCode.MALFORMED_NODE, depth, reason: "Leaf value is a list"});
          }
          return done({found: true, value: next});
        }
        if (matched < path.length && matched < remaining) {
          // Leaf of another key
          return done({found: false});
        }
        throw new ProofError({
          code: ProofErrorCode.KEY_PATH_VIOLATION,
          depth,
          reason: `Leaf path of ${path.length} nibbles against ${remaining} remaining key nibbles`,
        });
      }

      if (matched < path.length) {
        // Extension diverges from the key
        return done({found: false});
      }
      const child = toNodeRef(next, depth);
      if (child === null) {
        throw new ProofError({code: ProofErrorCode.MALFORMED_NODE, depth, reason: "Extension without child"});
      }
      keyIndex += path.length;
      ref = child;
    } else {
      throw new ProofError({
        code: ProofErrorCode.MALFORMED_NODE,
        depth,
        reason: `Unexpected node with ${node.length} items`,
      });
    }

    depth++;
  }
}

/**
 * Verify an account proof against a state root. An absent account is the empty account.
 */
export function verifyAccount(stateRoot: Uint8Array, address: Uint8Array, proof: Uint8Array[]): Account {
  const result = verifyProof(stateRoot, keccak256(address), proof);
  if (!result.found) {
    return emptyAccount();
  }

  const fields = decodeItem(result.value, proof.length);
  if (!Array.isArray(fields) || fields.length !== 4) {
    throw new ProofError({code: ProofErrorCode.MALFORMED_NODE, depth: proof.length, reason: "Invalid account"});
  }
  const [nonce, balance, storageRoot, codeHash] = fields;
  if (
    !(nonce instanceof Uint8Array) ||
    !(balance instanceof Uint8Array) ||
    !(storageRoot instanceof Uint8Array) ||
    !(codeHash instanceof Uint8Array) ||
    storageRoot.length !== HASH_LENGTH ||
    codeHash.length !== HASH_LENGTH
  ) {
    throw new ProofError({code: ProofErrorCode.MALFORMED_NODE, depth: proof.length, reason: "Invalid account fields"});
  }

  return {nonce: bytesToBigInt(nonce), balance: bytesToBigInt(balance), storageRoot, codeHash};
}

/**
 * Verify a storage proof against the storage root of a verified account. An absent slot holds zero.
 */
export function verifyStorage(storageRoot: Uint8Array, slot: Uint8Array, proof: Uint8Array[]): bigint {
  const result = verifyProof(storageRoot, keccak256(setLengthLeft(slot, 32)), proof);
  if (!result.found) {
    return 0n;
  }

  const value = decodeItem(result.value, proof.length);
  if (!(value instanceof Uint8Array)) {
    throw new ProofError({code: ProofErrorCode.MALFORMED_NODE, depth: proof.length, reason: "Invalid storage value"});
  }
  return bytesToBigInt(value);
}

export function verifyCode(codeHash: Uint8Array, code: Uint8Array): void {
  const actual = keccak256(code);
  if (!bytesEqual(actual, codeHash)) {
    throw new ProofError({code: ProofErrorCode.CODE_HASH_MISMATCH, expected: toHex(codeHash), actual: toHex(actual)});
  }
}

function decodeItem(encoded: Uint8Array, depth: number): Decoded {
  try {
    return RLP.decode(encoded);
  } catch (e) {
    throw new ProofError({
      code: ProofErrorCode.MALFORMED_NODE,
      depth,
      reason: `Undecodable RLP: ${toError(e).message}`,
    });
  }
}

function decodeNode(encoded: Uint8Array, depth: number): Decoded[] {
  const node = decodeItem(encoded, depth);
  if (!Array.isArray(node)) {
    throw new ProofError({code: ProofErrorCode.MALFORMED_NODE, depth, reason: "Node is not a list"});
  }
  return node;
}

/** Returns null for an empty slot */
function toNodeRef(item: Decoded | undefined, depth: number): NodeRef | null {
  if (item === undefined) {
    throw new ProofError({code: ProofErrorCode.MALFORMED_NODE, depth, reason: "Missing node item"});
  }
  if (Array.isArray(item)) {
    return {inline: item};
  }
  if (item.length === 0) {
    return null;
  }
  if (item.length !== HASH_LENGTH) {
    throw new ProofError({
      code: ProofErrorCode.MALFORMED_NODE,
      depth,
      reason: `Child reference of ${item.length} bytes`,
    });
  }
  return {hash: item};
}
