import { z } from 'zod';

import { splitList, toBool, toExact } from '../normalize';

// Drivers disagree on how catalog numbers arrive (number, bigint or text),
// so row schemas accept all three and convert once here.
const numeric = z.union([z.number(), z.bigint(), z.string()]);

export const text = z.string();

export const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

export const int = numeric.transform((value) => Number(value));

export const optionalInt = numeric.nullish().transform((value) => (value == null ? null : Number(value)));

export const exact = numeric.nullish().transform((value) => toExact(value));

export const flag = z
  .union([z.boolean(), z.number(), z.bigint(), z.string()])
  .nullish()
  .transform((value) => toBool(value));

/** A text array, or a delimited string as produced by GROUP_CONCAT / STRING_AGG / LISTAGG. */
export const textList = z
  .union([z.array(z.string()), z.string()])
  .nullish()
  .transform((value) => (Array.isArray(value) ? value : splitList(value)));

/** Folds one-row-per-column catalog output into one record per key, keeping first-seen order. */
export function collect<R, T>(
  rows: readonly R[],
  keyOf: (row: R) => string,
  create: (row: R) => T,
  add: (record: T, row: R) => void,
): T[] {
  const records = new Map<string, T>();
  for (const row of rows) {
    const key = keyOf(row);
    let record = records.get(key);
    if (record === undefined) {
      record = create(row);
      records.set(key, record);
    }
    add(record, row);
  }
  return Array.from(records.values());
}
