import type { DatabaseKind } from '../types';
import { mssqlDialect } from './mssql';
import { mysqlDialect } from './mysql';
import { oracleDialect } from './oracle';
import { postgresDialect } from './postgres';
import { sqliteDialect } from './sqlite';
import type { DialectAdapter } from './types';

export type DialectRegistry = ReadonlyMap<DatabaseKind, DialectAdapter>;

/** Registry of the built-in adapters. Callers may pass their own map to `extract`. */
export function createDialectRegistry(overrides: readonly DialectAdapter[] = []): DialectRegistry {
  const registry = new Map<DatabaseKind, DialectAdapter>();
  for (const adapter of [mssqlDialect, postgresDialect, mysqlDialect, oracleDialect, sqliteDialect, ...overrides]) {
    registry.set(adapter.dialect, adapter);
  }
  return registry;
}
