import * as crypto from 'crypto';

/**
 * Deterministic sample: records are ranked by sha256(seed + id) and the
 * first `sampleSize` are kept, returned in their original dataset order.
 * The same seed and dataset always give the same sample.
 */
export function selectSample<T extends { id: string }>(
  records: readonly T[],
  sampleSize: number | undefined,
  seed: string
): T[] {
  if (sampleSize === undefined || sampleSize >= records.length) {
    return [...records];
  }
  if (sampleSize <= 0) {
    return [];
  }

  const ranked = records
    .map((record, index) => ({
      index,
      rank: crypto.createHash('sha256').update(`${seed}${record.id}`).digest('hex'),
    }))
    .sort((a, b) => (a.rank < b.rank ? -1 : a.rank > b.rank ? 1 : a.index - b.index));

  const keep = new Set(ranked.slice(0, sampleSize).map(entry => entry.index));
  return records.filter((_, index) => keep.has(index));
}
