import { ConnectionError } from '../errors';
import type { Row } from '../discovery/types';
import type { DatabaseKind } from '../types';

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Keeps the object rows of a driver result; anything else (OK packets, metadata) is dropped. */
export function toRows(value: unknown): Row[] {
  return Array.isArray(value) ? value.filter(isRow) : [];
}

/** Runs a driver's connect step, reporting any failure as a `ConnectionError`. */
export async function connecting<T>(dialect: DatabaseKind, open: () => Promise<T>): Promise<T> {
  try {
    return await open();
  } catch (error) {
    throw new ConnectionError(dialect, error);
  }
}
