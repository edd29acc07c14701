import {bigIntToBytes, setLengthLeft} from "@ethereumjs/util";
import {fromHex, toHex} from "@vouch/utils";
import {ExecutionError, ExecutionErrorCode} from "../errors.js";
import {HexString} from "../types.js";

export function hexToBigInt(num: string): bigint {
  const digits = num.startsWith("0x") ? num.slice(2) : num;
  return digits.length === 0 ? 0n : BigInt(`0x${digits}`);
}

export function bytesToHex(bytes: Uint8Array): HexString {
  return toHex(bytes);
}

export function hexToBytes(val: string): Uint8Array {
  return fromHex(val);
}

/** 32 byte word as returned by `eth_getStorageAt` */
export function bigIntToWord(value: bigint): HexString {
  return toHex(setLengthLeft(bigIntToBytes(value), 32));
}

const ADDRESS_PATTERN = /^(0x)?[0-9a-fA-F]{40}$/;
const STORAGE_KEY_PATTERN = /^(0x)?[0-9a-fA-F]{0,64}$/;

export function normalizeAddress(address: HexString): HexString {
  if (!ADDRESS_PATTERN.test(address)) {
    throw new ExecutionError({code: ExecutionErrorCode.INVALID_PARAM, param: "address", value: address});
  }
  return toHex(fromHex(address));
}

/** Storage slots are keyed by their 32 byte big endian form */
export function normalizeStorageKey(key: HexString): HexString {
  if (!STORAGE_KEY_PATTERN.test(key)) {
    throw new ExecutionError({code: ExecutionErrorCode.INVALID_PARAM, param: "storageKey", value: key});
  }
  return toHex(setLengthLeft(fromHex(key), 32));
}
