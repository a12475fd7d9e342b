import groupBy from 'lodash/groupBy.js';
import { z } from 'zod';

import { identifier, normalizeReferentialAction, normalizeType, tidyText, toStatistic } from '../normalize';
import type { CheckConstraint, DataType, Trigger, TriggerEvent, TriggerTiming, View } from '../types';
import { collect, exact, flag, int, optionalText, text } from './rows';
import {
  NOT_APPLICABLE,
  defineDialect,
  fetchRows,
  type CheckRecord,
  type ColumnRecord,
  type ForeignKeyRecord,
  type IndexRecord,
  type PrimaryKeyRecord,
  type QueryRunner,
  type TableInfo,
  type UniqueConstraintRecord,
} from './types';

const SCHEMA = 'main';

const USER_TABLES = `m.type = 'table' AND m.name NOT LIKE 'sqlite\\_%' ESCAPE '\\'`;

const tableRow = z.object({ table_name: text });

const rowCountRow = z.object({ row_count: exact });

const columnRow = z.object({
  table_name: text,
  column_name: text,
  declared_type: optionalText,
  not_null: flag,
  column_default: optionalText,
  pk_position: int,
  hidden: int,
  create_sql: optionalText,
});

const indexRow = z.object({
  table_name: text,
  index_name: text,
  is_unique: flag,
  origin: text,
  is_partial: flag,
  index_sql: optionalText,
  column_name: optionalText,
});

const foreignKeyRow = z.object({
  table_name: text,
  fk_id: int,
  referenced_table: text,
  column_name: text,
  referenced_column: optionalText,
  on_update: optionalText,
  on_delete: optionalText,
});

const createSqlRow = z.object({ table_name: text, create_sql: optionalText });

const viewRow = z.object({ view_name: text, definition: optionalText });

const viewColumnRow = z.object({
  view_name: text,
  column_name: text,
  declared_type: optionalText,
  not_null: flag,
});

const triggerRow = z.object({
  trigger_name: text,
  table_name: text,
  definition: optionalText,
});

const DECLARED_TYPE = /^(.*?)\s*\(\s*(\d+)\s*(?:,\s*(\d+)\s*)?\)\s*$/;

/** Maps a declared column type such as `VARCHAR(255)` or `DECIMAL(10,2)`. */
export function declaredType(declared: string | null): DataType {
  const display = (declared ?? '').trim();
  const match = DECLARED_TYPE.exec(display);
  if (!match) return normalizeType('sqlite', { name: display, display });
  const [, name = '', first, second] = match;
  if (second != null) {
    return normalizeType('sqlite', { name, precision: Number(first), scale: Number(second), display });
  }
  return normalizeType('sqlite', { name, length: Number(first), precision: Number(first), display });
}

function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Returns the text inside the parenthesis that opens at `start`, or `null` when unbalanced. */
function balanced(sql: string, start: number): string | null {
  let depth = 0;
  for (let i = start; i < sql.length; i += 1) {
    const char = sql[i];
    if (char === '(') depth += 1;
    else if (char === ')') {
      depth -= 1;
      if (depth === 0) return sql.slice(start + 1, i).trim();
    }
  }
  return null;
}

/** Finds the `AS (...)` expression of a generated column in its CREATE TABLE text. */
export function generatedExpression(createSql: string, column: string): string | null {
  const name = escapeRegExp(column);
  const pattern = new RegExp(`(?:^|[(,\\s])["\`\\[]?${name}["\`\\]]?\\s[^,]*?\\bAS\\s*\\(`, 'i');
  const match = pattern.exec(createSql);
  if (!match) return null;
  return balanced(createSql, match.index + match[0].length - 1);
}

/** Reads named and unnamed CHECK clauses out of a CREATE TABLE statement. */
export function parseChecks(table: string, createSql: string): CheckConstraint[] {
  const checks: CheckConstraint[] = [];
  const pattern = /(?:CONSTRAINT\s+("[^"]+"|`[^`]+`|\[[^\]]+\]|\w+)\s+)?CHECK\s*\(/gi;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(createSql)) !== null) {
    const expression = balanced(createSql, match.index + match[0].length - 1);
    if (expression == null) break;
    const name = match[1]?.replace(/^["`[]|["`\]]$/g, '') ?? `ck_${table}_${checks.length + 1}`;
    checks.push({ name, expression });
  }
  return checks;
}

function triggerHeader(sql: string): string {
  const begin = /\bBEGIN\b/i.exec(sql);
  return (begin ? sql.slice(0, begin.index) : sql).toUpperCase();
}

/** Timing and event of a trigger, read from the part of its CREATE statement before BEGIN. */
export function parseTriggerHeader(sql: string): { timing: TriggerTiming; events: TriggerEvent[] } {
  const header = triggerHeader(sql);
  const timing: TriggerTiming = /\bINSTEAD\s+OF\b/.test(header)
    ? 'INSTEAD_OF'
    : /\bBEFORE\b/.test(header)
      ? 'BEFORE'
      : 'AFTER';
  const events: TriggerEvent[] = [];
  if (/\bINSERT\b/.test(header)) events.push('INSERT');
  if (/\bUPDATE\b/.test(header)) events.push('UPDATE');
  if (/\bDELETE\b/.test(header)) events.push('DELETE');
  return { timing, events };
}

async function listSchemas(): Promise<string[]> {
  return [SCHEMA];
}

async function listTables(runner: QueryRunner): Promise<TableInfo[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Tables */
      SELECT m.name AS table_name
      FROM sqlite_master m
      WHERE ${USER_TABLES}
      ORDER BY m.name
    `,
    tableRow,
  );
  const tables: TableInfo[] = [];
  for (const row of rows) {
    const [count] = await fetchRows(
      runner,
      `/* Row count */ SELECT COUNT(*) AS row_count FROM ${quoteIdentifier(row.table_name)}`,
      rowCountRow,
    );
    const table: TableInfo = { id: identifier(SCHEMA, row.table_name), description: null };
    const rowCount = toStatistic(count?.row_count);
    if (rowCount !== undefined) table.rowCount = rowCount;
    tables.push(table);
  }
  return tables;
}

async function fetchColumns(runner: QueryRunner) {
  const rows = await fetchRows(
    runner,
    `
      /* Column metadata */
      SELECT
        m.name AS table_name,
        c.name AS column_name,
        c.type AS declared_type,
        c."notnull" AS not_null,
        c.dflt_value AS column_default,
        c.pk AS pk_position,
        c.hidden AS hidden,
        m.sql AS create_sql
      FROM sqlite_master m
      JOIN pragma_table_xinfo(m.name) c
      WHERE ${USER_TABLES}
      ORDER BY m.name, c.cid
    `,
    columnRow,
  );
  // hidden = 1 marks virtual-table hidden columns; 2 and 3 are generated columns
  return rows.filter((row) => row.hidden !== 1);
}

async function listColumns(runner: QueryRunner): Promise<ColumnRecord[]> {
  const rows = await fetchColumns(runner);
  return Object.values(groupBy(rows, (row) => row.table_name)).flatMap((tableRows) => {
    const keyColumns = tableRows.filter((row) => row.pk_position > 0).length;
    return tableRows.map((row, index) => {
      const createSql = row.create_sql ?? '';
      const generated = row.hidden === 2 || row.hidden === 3;
      return {
        table: identifier(SCHEMA, row.table_name),
        column: {
          name: row.column_name,
          ordinal: index + 1,
          dataType: declaredType(row.declared_type),
          nullable: !row.not_null,
          default: row.column_default,
          autoIncrement: row.pk_position > 0 && keyColumns === 1 && /\bAUTOINCREMENT\b/i.test(createSql),
          computed: generated ? generatedExpression(createSql, row.column_name) : null,
          description: null,
        },
      };
    });
  });
}

async function listPrimaryKeys(runner: QueryRunner): Promise<PrimaryKeyRecord[]> {
  const rows = await fetchColumns(runner);
  return Object.values(groupBy(rows, (row) => row.table_name)).flatMap((tableRows) => {
    const keyRows = tableRows.filter((row) => row.pk_position > 0).sort((a, b) => a.pk_position - b.pk_position);
    const [first] = keyRows;
    if (!first) return [];
    return [
      {
        table: identifier(SCHEMA, first.table_name),
        primaryKey: { name: null, columns: keyRows.map((row) => row.column_name), clustered: null },
      },
    ];
  });
}

async function fetchIndexes(runner: QueryRunner) {
  return fetchRows(
    runner,
    `
      /* Index definitions */
      SELECT
        m.name AS table_name,
        il.name AS index_name,
        il."unique" AS is_unique,
        il.origin AS origin,
        il.partial AS is_partial,
        s.sql AS index_sql,
        ix.name AS column_name
      FROM sqlite_master m
      JOIN pragma_index_list(m.name) il
      JOIN pragma_index_xinfo(il.name) ix
      LEFT JOIN sqlite_master s ON s.type = 'index' AND s.name = il.name
      WHERE ${USER_TABLES} AND ix.key = 1
      ORDER BY m.name, il.name, ix.seqno
    `,
    indexRow,
  );
}

function partialFilter(sql: string | null): string | null {
  if (!sql) return null;
  const where = /\bWHERE\b/i.exec(sql);
  return where ? tidyText(sql.slice(where.index + where[0].length)) : null;
}

async function listIndexes(runner: QueryRunner): Promise<IndexRecord[]> {
  const rows = await fetchIndexes(runner);
  return collect<z.output<typeof indexRow>, IndexRecord>(
    rows,
    (row) => `${row.table_name}.${row.index_name}`,
    (row) => ({
      table: identifier(SCHEMA, row.table_name),
      index: {
        name: row.index_name,
        unique: row.is_unique,
        primary: row.origin === 'pk',
        clustered: null,
        columns: [],
        expressions: [],
        includedColumns: [],
        method: 'BTREE',
        filter: row.is_partial ? partialFilter(row.index_sql) : null,
      },
    }),
    (record, row) => {
      if (row.column_name == null) record.index.expressions.push('expression');
      else record.index.columns.push(row.column_name);
    },
  );
}

async function listUniqueConstraints(runner: QueryRunner): Promise<UniqueConstraintRecord[]> {
  const rows = await fetchIndexes(runner);
  return collect<z.output<typeof indexRow>, UniqueConstraintRecord>(
    rows.filter((row) => row.origin === 'u' && row.column_name != null),
    (row) => `${row.table_name}.${row.index_name}`,
    (row) => ({
      table: identifier(SCHEMA, row.table_name),
      constraint: { name: row.index_name, columns: [] },
    }),
    (record, row) => {
      if (row.column_name != null) record.constraint.columns.push(row.column_name);
    },
  );
}

async function listForeignKeys(runner: QueryRunner): Promise<ForeignKeyRecord[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Foreign key metadata */
      SELECT
        m.name AS table_name,
        fk.id AS fk_id,
        fk."table" AS referenced_table,
        fk."from" AS column_name,
        COALESCE(
          fk."to",
          (SELECT p.name FROM pragma_table_info(fk."table") p WHERE p.pk = fk.seq + 1)
        ) AS referenced_column,
        fk.on_update AS on_update,
        fk.on_delete AS on_delete
      FROM sqlite_master m
      JOIN pragma_foreign_key_list(m.name) fk
      WHERE ${USER_TABLES}
      ORDER BY m.name, fk.id, fk.seq
    `,
    foreignKeyRow,
  );
  return collect<z.output<typeof foreignKeyRow>, ForeignKeyRecord>(
    rows,
    (row) => `${row.table_name}.${row.fk_id}`,
    (row) => ({
      table: identifier(SCHEMA, row.table_name),
      foreignKey: {
        // SQLite foreign keys are unnamed
        name: `fk_${row.table_name}_${row.fk_id}`,
        columns: [],
        target: identifier(SCHEMA, row.referenced_table),
        targetColumns: [],
        onDelete: normalizeReferentialAction(row.on_delete),
        onUpdate: normalizeReferentialAction(row.on_update),
      },
    }),
    (record, row) => {
      record.foreignKey.columns.push(row.column_name);
      record.foreignKey.targetColumns.push(row.referenced_column ?? '');
    },
  );
}

async function listChecks(runner: QueryRunner): Promise<CheckRecord[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Table definitions */
      SELECT m.name AS table_name, m.sql AS create_sql
      FROM sqlite_master m
      WHERE ${USER_TABLES}
      ORDER BY m.name
    `,
    createSqlRow,
  );
  return rows.flatMap((row) =>
    parseChecks(row.table_name, row.create_sql ?? '').map((check) => ({
      table: identifier(SCHEMA, row.table_name),
      check,
    })),
  );
}

async function listViews(runner: QueryRunner): Promise<View[]> {
  const views = await fetchRows(
    runner,
    `
      /* View definitions */
      SELECT m.name AS view_name, m.sql AS definition
      FROM sqlite_master m
      WHERE m.type = 'view'
      ORDER BY m.name
    `,
    viewRow,
  );
  const columns = await fetchRows(
    runner,
    `
      /* View columns */
      SELECT
        m.name AS view_name,
        c.name AS column_name,
        c.type AS declared_type,
        c."notnull" AS not_null
      FROM sqlite_master m
      JOIN pragma_table_info(m.name) c
      WHERE m.type = 'view'
      ORDER BY m.name, c.cid
    `,
    viewColumnRow,
  );
  const columnsByView = groupBy(columns, (row) => row.view_name);

  return views.map((row) => ({
    id: identifier(SCHEMA, row.view_name),
    columns: (columnsByView[row.view_name] ?? []).map((column) => ({
      name: column.column_name,
      dataType: declaredType(column.declared_type),
      nullable: !column.not_null,
      description: null,
    })),
    definition: tidyText(row.definition),
    baseTables: [],
    materialized: false,
    description: null,
  }));
}

async function listTriggers(runner: QueryRunner): Promise<Trigger[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Trigger metadata */
      SELECT m.name AS trigger_name, m.tbl_name AS table_name, m.sql AS definition
      FROM sqlite_master m
      WHERE m.type = 'trigger'
      ORDER BY m.name
    `,
    triggerRow,
  );
  return rows.map((row) => ({
    id: identifier(SCHEMA, row.trigger_name),
    table: identifier(SCHEMA, row.table_name),
    ...parseTriggerHeader(row.definition ?? ''),
    enabled: true,
    definition: tidyText(row.definition),
    description: null,
  }));
}

async function version(runner: QueryRunner): Promise<string | null> {
  const rows = await fetchRows(runner, 'SELECT sqlite_version() AS version', z.object({ version: optionalText }));
  const value = rows[0]?.version;
  return value ? `SQLite ${value}` : null;
}

export const sqliteDialect = defineDialect({
  dialect: 'sqlite',
  label: 'SQLite',
  version,
  catalog: {
    schemas: listSchemas,
    tables: listTables,
    columns: listColumns,
    primaryKeys: listPrimaryKeys,
    indexes: listIndexes,
    foreignKeys: listForeignKeys,
    checks: listChecks,
    uniqueConstraints: listUniqueConstraints,
    views: listViews,
    routines: NOT_APPLICABLE,
    triggers: listTriggers,
    types: NOT_APPLICABLE,
    sequences: NOT_APPLICABLE,
    synonyms: NOT_APPLICABLE,
    security: NOT_APPLICABLE,
  },
});
