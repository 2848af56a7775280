/**
 * Batch partitioner for bulk create requests.
 *
 * Splits items into consecutive batches bounded by both an item count and
 * an estimated encoded byte size. One greedy pass, input order preserved.
 */

import { Buffer } from "node:buffer";

/** Byte length of the empty request document `{"data":[]}`. */
export const REQUEST_ENVELOPE_BYTES = 11;
/** Byte length of the `,` between two items in the `data` array. */
export const ITEM_SEPARATOR_BYTES = 1;

export interface BatchLimits {
  maxCount: number;
  maxBytes: number;
  envelopeBytes?: number;
  separatorBytes?: number;
}

export interface Batch<T> {
  items: T[];
  /** Positions of `items` in the partitioned input. */
  indices: number[];
  /** Estimated size of the request body carrying this batch. */
  encodedSize: number;
}

export interface OversizedItem {
  index: number;
  size: number;
}

export interface PartitionResult<T> {
  batches: Batch<T>[];
  /** Items too large to fit even alone in a request; not part of any batch. */
  oversized: OversizedItem[];
}

export function encodedSize(value: unknown): number {
  return Buffer.byteLength(JSON.stringify(value) ?? "", "utf8");
}

export function partition<T>(
  items: readonly T[],
  sizeOf: (item: T) => number,
  limits: BatchLimits,
): PartitionResult<T> {
  const { maxCount, maxBytes } = limits;
  const envelope = limits.envelopeBytes ?? REQUEST_ENVELOPE_BYTES;
  const separator = limits.separatorBytes ?? ITEM_SEPARATOR_BYTES;
  if (!Number.isInteger(maxCount) || maxCount < 1) {
    throw new RangeError(`maxCount must be a positive integer, got ${maxCount}`);
  }

  const batches: Batch<T>[] = [];
  const oversized: OversizedItem[] = [];
  let current: Batch<T> = { items: [], indices: [], encodedSize: envelope };

  items.forEach((item, index) => {
    const size = sizeOf(item);
    if (envelope + size > maxBytes) {
      oversized.push({ index, size });
      return;
    }

    const added = current.items.length === 0 ? size : separator + size;
    if (current.items.length >= maxCount || current.encodedSize + added > maxBytes) {
      batches.push(current);
      current = { items: [], indices: [], encodedSize: envelope };
      current.items.push(item);
      current.indices.push(index);
      current.encodedSize += size;
      return;
    }

    current.items.push(item);
    current.indices.push(index);
    current.encodedSize += added;
  });

  if (current.items.length > 0) batches.push(current);
  return { batches, oversized };
}
