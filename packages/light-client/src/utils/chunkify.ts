export type InclusiveRange = [from: number, to: number];

/**
 * Split an inclusive range into contiguous inclusive ranges of at most `itemsPerChunk` items
 * ```
 * chunkifyInclusiveRange(0, 70, 32) == [[0, 31], [32, 63], [64, 70]]
 * ```
 */
export function chunkifyInclusiveRange(from: number, to: number, itemsPerChunk: number): InclusiveRange[] {
  const chunkSize = Math.max(1, Math.floor(itemsPerChunk));
  if (to < from) return [];

  const chunks: InclusiveRange[] = [];
  for (let chunkFrom = from; chunkFrom <= to; chunkFrom += chunkSize) {
    chunks.push([chunkFrom, Math.min(chunkFrom + chunkSize - 1, to)]);
  }
  return chunks;
}
