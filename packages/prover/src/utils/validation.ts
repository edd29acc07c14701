import {HexString} from "../types.js";

export function isBlockHash(block: number | bigint | HexString): block is HexString {
  return typeof block === "string" && /^0x[0-9a-fA-F]{64}$/.test(block);
}

export function isNullish<T>(val: T | undefined | null): val is null | undefined {
  return val === null || val === undefined;
}

export function isPresent<T>(val: T | undefined | null): val is T {
  return !isNullish(val);
}
