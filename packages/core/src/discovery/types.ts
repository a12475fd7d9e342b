import { z } from 'zod';

import { QueryFailure } from '../errors';
import type { SequenceDraft } from '../model';
import type {
  CheckConstraint,
  Column,
  DatabaseKind,
  ExactNumber,
  ForeignKey,
  Identifier,
  Index,
  PrimaryKey,
  Routine,
  SecurityPrincipal,
  Synonym,
  Trigger,
  UniqueConstraint,
  UserDefinedType,
  View,
} from '../types';

export type Row = Record<string, unknown>;

/** One open connection; catalog calls on it are issued one at a time. */
export interface QueryRunner {
  readonly dialect: DatabaseKind;
  query(sql: string, params?: readonly unknown[]): Promise<Row[]>;
  close(): Promise<void>;
}

/** Returned by a capability the engine has no concept of (e.g. synonyms on PostgreSQL). */
export const NOT_APPLICABLE: unique symbol = Symbol('dbatlas.not-applicable');
export type NotApplicable = typeof NOT_APPLICABLE;

export interface TableInfo {
  id: Identifier;
  rowCount?: ExactNumber;
  sizeKb?: ExactNumber;
  description: string | null;
}

export interface ColumnRecord {
  table: Identifier;
  column: Column;
}

export interface PrimaryKeyRecord {
  table: Identifier;
  primaryKey: PrimaryKey;
}

export interface IndexRecord {
  table: Identifier;
  index: Index;
}

export interface ForeignKeyRecord {
  table: Identifier;
  foreignKey: ForeignKey;
}

export interface CheckRecord {
  table: Identifier;
  check: CheckConstraint;
}

export interface UniqueConstraintRecord {
  table: Identifier;
  constraint: UniqueConstraint;
}

export interface CatalogRecords {
  schemas: string;
  tables: TableInfo;
  columns: ColumnRecord;
  primaryKeys: PrimaryKeyRecord;
  indexes: IndexRecord;
  foreignKeys: ForeignKeyRecord;
  checks: CheckRecord;
  uniqueConstraints: UniqueConstraintRecord;
  views: View;
  routines: Routine;
  triggers: Trigger;
  types: UserDefinedType;
  sequences: SequenceDraft;
  synonyms: Synonym;
  security: SecurityPrincipal;
}

export type Capability = keyof CatalogRecords;

export const CAPABILITIES: readonly Capability[] = [
  'schemas',
  'tables',
  'columns',
  'primaryKeys',
  'indexes',
  'foreignKeys',
  'checks',
  'uniqueConstraints',
  'views',
  'routines',
  'triggers',
  'types',
  'sequences',
  'synonyms',
  'security',
];

export type CatalogQuery<T> = (runner: QueryRunner) => Promise<T[]>;

/** Dialect SQL plus row mapping, one entry per capability. */
export type CatalogReader = {
  [C in Capability]: CatalogQuery<CatalogRecords[C]> | NotApplicable;
};

export interface DialectDefinition {
  dialect: DatabaseKind;
  label: string;
  version: (runner: QueryRunner) => Promise<string | null>;
  catalog: CatalogReader;
}

export type CatalogResult<T> = Promise<T[] | NotApplicable>;

export interface DialectAdapter {
  readonly dialect: DatabaseKind;
  readonly label: string;
  supports(capability: Capability): boolean;
  version(runner: QueryRunner): Promise<string | null>;
  listSchemas(runner: QueryRunner): CatalogResult<string>;
  listTables(runner: QueryRunner): CatalogResult<TableInfo>;
  listColumns(runner: QueryRunner): CatalogResult<ColumnRecord>;
  listPrimaryKeys(runner: QueryRunner): CatalogResult<PrimaryKeyRecord>;
  listIndexes(runner: QueryRunner): CatalogResult<IndexRecord>;
  listForeignKeys(runner: QueryRunner): CatalogResult<ForeignKeyRecord>;
  listChecks(runner: QueryRunner): CatalogResult<CheckRecord>;
  listUniqueConstraints(runner: QueryRunner): CatalogResult<UniqueConstraintRecord>;
  listViews(runner: QueryRunner): CatalogResult<View>;
  listRoutines(runner: QueryRunner): CatalogResult<Routine>;
  listTriggers(runner: QueryRunner): CatalogResult<Trigger>;
  listTypes(runner: QueryRunner): CatalogResult<UserDefinedType>;
  listSequences(runner: QueryRunner): CatalogResult<SequenceDraft>;
  listSynonyms(runner: QueryRunner): CatalogResult<Synonym>;
  listSecurity(runner: QueryRunner): CatalogResult<SecurityPrincipal>;
}

function bind<T>(
  dialect: DatabaseKind,
  capability: Capability,
  read: CatalogQuery<T> | NotApplicable,
): (runner: QueryRunner) => CatalogResult<T> {
  return async (runner) => {
    if (read === NOT_APPLICABLE) return NOT_APPLICABLE;
    try {
      return await read(runner);
    } catch (error) {
      throw new QueryFailure(capability, dialect, error);
    }
  };
}

export function defineDialect(definition: DialectDefinition): DialectAdapter {
  const { dialect, catalog } = definition;
  return {
    dialect,
    label: definition.label,
    supports: (capability) => catalog[capability] !== NOT_APPLICABLE,
    version: async (runner) => {
      try {
        return await definition.version(runner);
      } catch (error) {
        throw new QueryFailure('version', dialect, error);
      }
    },
    listSchemas: bind(dialect, 'schemas', catalog.schemas),
    listTables: bind(dialect, 'tables', catalog.tables),
    listColumns: bind(dialect, 'columns', catalog.columns),
    listPrimaryKeys: bind(dialect, 'primaryKeys', catalog.primaryKeys),
    listIndexes: bind(dialect, 'indexes', catalog.indexes),
    listForeignKeys: bind(dialect, 'foreignKeys', catalog.foreignKeys),
    listChecks: bind(dialect, 'checks', catalog.checks),
    listUniqueConstraints: bind(dialect, 'uniqueConstraints', catalog.uniqueConstraints),
    listViews: bind(dialect, 'views', catalog.views),
    listRoutines: bind(dialect, 'routines', catalog.routines),
    listTriggers: bind(dialect, 'triggers', catalog.triggers),
    listTypes: bind(dialect, 'types', catalog.types),
    listSequences: bind(dialect, 'sequences', catalog.sequences),
    listSynonyms: bind(dialect, 'synonyms', catalog.synonyms),
    listSecurity: bind(dialect, 'security', catalog.security),
  };
}

/** Runs one catalog query and validates every returned row. */
export async function fetchRows<S extends z.ZodTypeAny>(
  runner: QueryRunner,
  sql: string,
  row: S,
  params: readonly unknown[] = [],
): Promise<z.output<S>[]> {
  const rows = await runner.query(sql, params);
  return z.array(row).parse(rows);
}
