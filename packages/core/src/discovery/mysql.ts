import groupBy from 'lodash/groupBy.js';
import { z } from 'zod';

import {
  identifier,
  normalizeReferentialAction,
  normalizeType,
  tidyText,
  toStatistic,
} from '../normalize';
import type {
  DataType,
  ParameterDirection,
  Routine,
  SecurityPrincipal,
  Trigger,
  TriggerEvent,
  TriggerTiming,
  View,
} from '../types';
import { collect, exact, flag, int, optionalInt, optionalText, text } from './rows';
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

const SYSTEM_SCHEMAS = `('information_schema', 'performance_schema', 'mysql', 'sys')`;

const schemaRow = z.object({ schema_name: text });

const tableRow = z.object({
  schema_name: text,
  table_name: text,
  row_count: exact,
  size_kb: exact,
  description: optionalText,
});

const columnRow = z.object({
  schema_name: text,
  table_name: text,
  column_name: text,
  ordinal: int,
  data_type: text,
  column_type: text,
  char_length: optionalInt,
  numeric_precision: optionalInt,
  numeric_scale: optionalInt,
  is_nullable: flag,
  column_default: optionalText,
  extra: optionalText,
  generation_expression: optionalText,
  collation_name: optionalText,
  description: optionalText,
});

const keyColumnRow = z.object({
  schema_name: text,
  table_name: text,
  constraint_name: text,
  column_name: text,
});

const foreignKeyRow = z.object({
  schema_name: text,
  table_name: text,
  constraint_name: text,
  column_name: text,
  referenced_schema: text,
  referenced_table: text,
  referenced_column: text,
  delete_rule: optionalText,
  update_rule: optionalText,
});

const checkRow = z.object({
  schema_name: text,
  table_name: text,
  constraint_name: text,
  check_clause: text,
});

const indexRow = z.object({
  schema_name: text,
  table_name: text,
  index_name: text,
  non_unique: flag,
  index_type: optionalText,
  column_name: optionalText,
});

const viewRow = z.object({
  schema_name: text,
  view_name: text,
  definition: optionalText,
});

const routineRow = z.object({
  schema_name: text,
  specific_name: text,
  routine_name: text,
  routine_type: text,
  data_type: optionalText,
  return_type: optionalText,
  language: optionalText,
  definition: optionalText,
  description: optionalText,
});

const parameterRow = z.object({
  schema_name: text,
  specific_name: text,
  ordinal: int,
  parameter_name: optionalText,
  parameter_mode: optionalText,
  data_type: text,
  display_type: optionalText,
  char_length: optionalInt,
  numeric_precision: optionalInt,
  numeric_scale: optionalInt,
});

const triggerRow = z.object({
  schema_name: text,
  trigger_name: text,
  table_schema: text,
  table_name: text,
  action_timing: text,
  event_manipulation: text,
  definition: optionalText,
});

const userRow = z.object({ user_name: text, host_name: text, is_locked: flag });

const roleEdgeRow = z.object({
  role_name: text,
  role_host: text,
  member_name: text,
  member_host: text,
});

const grantRow = z.object({
  grantee: text,
  schema_name: text,
  object_name: text,
  privilege: text,
  is_grantable: flag,
});

type ColumnRow = z.output<typeof columnRow>;

function tableKey(row: { schema_name: string; table_name: string }): string {
  return `${row.schema_name}.${row.table_name}`;
}

function columnType(row: ColumnRow): DataType {
  return normalizeType('mysql', {
    name: row.data_type,
    length: row.char_length,
    precision: row.numeric_precision,
    scale: row.numeric_scale,
    display: row.column_type,
  });
}

async function listSchemas(runner: QueryRunner): Promise<string[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Schemas */
      SELECT s.schema_name AS schema_name
      FROM information_schema.schemata s
      WHERE s.schema_name NOT IN ${SYSTEM_SCHEMAS}
      ORDER BY s.schema_name
    `,
    schemaRow,
  );
  return rows.map((row) => row.schema_name);
}

async function listTables(runner: QueryRunner): Promise<TableInfo[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Tables */
      SELECT
        t.table_schema AS schema_name,
        t.table_name AS table_name,
        t.table_rows AS row_count,
        FLOOR((t.data_length + t.index_length) / 1024) AS size_kb,
        t.table_comment AS description
      FROM information_schema.tables t
      WHERE t.table_type = 'BASE TABLE' AND t.table_schema NOT IN ${SYSTEM_SCHEMAS}
      ORDER BY t.table_schema, t.table_name
    `,
    tableRow,
  );
  return rows.map((row) => ({
    id: identifier(row.schema_name, row.table_name),
    rowCount: toStatistic(row.row_count),
    sizeKb: toStatistic(row.size_kb),
    description: tidyText(row.description),
  }));
}

function columnSql(tableType: string): string {
  return `
    /* Column metadata */
    SELECT
      c.table_schema AS schema_name,
      c.table_name AS table_name,
      c.column_name AS column_name,
      c.ordinal_position AS ordinal,
      c.data_type AS data_type,
      c.column_type AS column_type,
      c.character_maximum_length AS char_length,
      c.numeric_precision AS numeric_precision,
      c.numeric_scale AS numeric_scale,
      c.is_nullable = 'YES' AS is_nullable,
      c.column_default AS column_default,
      c.extra AS extra,
      c.generation_expression AS generation_expression,
      c.collation_name AS collation_name,
      c.column_comment AS description
    FROM information_schema.columns c
    JOIN information_schema.tables t
      ON t.table_schema = c.table_schema AND t.table_name = c.table_name
    WHERE t.table_type = '${tableType}' AND c.table_schema NOT IN ${SYSTEM_SCHEMAS}
    ORDER BY c.table_schema, c.table_name, c.ordinal_position
  `;
}

async function listColumns(runner: QueryRunner): Promise<ColumnRecord[]> {
  const rows = await fetchRows(runner, columnSql('BASE TABLE'), columnRow);
  return rows.map((row) => ({
    table: identifier(row.schema_name, row.table_name),
    column: {
      name: row.column_name,
      ordinal: row.ordinal,
      dataType: columnType(row),
      nullable: row.is_nullable,
      default: row.column_default,
      autoIncrement: (row.extra ?? '').toLowerCase().includes('auto_increment'),
      computed: tidyText(row.generation_expression),
      collation: row.collation_name,
      description: tidyText(row.description),
    },
  }));
}

async function listPrimaryKeys(runner: QueryRunner): Promise<PrimaryKeyRecord[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Primary key columns */
      SELECT
        s.table_schema AS schema_name,
        s.table_name AS table_name,
        s.index_name AS constraint_name,
        s.column_name AS column_name
      FROM information_schema.statistics s
      WHERE s.index_name = 'PRIMARY' AND s.table_schema NOT IN ${SYSTEM_SCHEMAS}
      ORDER BY s.table_schema, s.table_name, s.seq_in_index
    `,
    keyColumnRow,
  );
  return collect<z.output<typeof keyColumnRow>, PrimaryKeyRecord>(
    rows,
    tableKey,
    (row) => ({
      table: identifier(row.schema_name, row.table_name),
      primaryKey: { name: row.constraint_name, columns: [], clustered: null },
    }),
    (record, row) => record.primaryKey.columns.push(row.column_name),
  );
}

async function listUniqueConstraints(runner: QueryRunner): Promise<UniqueConstraintRecord[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Unique constraints */
      SELECT
        tc.table_schema AS schema_name,
        tc.table_name AS table_name,
        tc.constraint_name AS constraint_name,
        kcu.column_name AS column_name
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage kcu
        ON kcu.constraint_schema = tc.constraint_schema
        AND kcu.constraint_name = tc.constraint_name
        AND kcu.table_name = tc.table_name
      WHERE tc.constraint_type = 'UNIQUE' AND tc.table_schema NOT IN ${SYSTEM_SCHEMAS}
      ORDER BY tc.table_schema, tc.table_name, tc.constraint_name, kcu.ordinal_position
    `,
    keyColumnRow,
  );
  return collect<z.output<typeof keyColumnRow>, UniqueConstraintRecord>(
    rows,
    (row) => `${tableKey(row)}.${row.constraint_name}`,
    (row) => ({
      table: identifier(row.schema_name, row.table_name),
      constraint: { name: row.constraint_name, columns: [] },
    }),
    (record, row) => record.constraint.columns.push(row.column_name),
  );
}

async function listForeignKeys(runner: QueryRunner): Promise<ForeignKeyRecord[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Foreign key metadata */
      SELECT
        kcu.table_schema AS schema_name,
        kcu.table_name AS table_name,
        kcu.constraint_name AS constraint_name,
        kcu.column_name AS column_name,
        kcu.referenced_table_schema AS referenced_schema,
        kcu.referenced_table_name AS referenced_table,
        kcu.referenced_column_name AS referenced_column,
        rc.delete_rule AS delete_rule,
        rc.update_rule AS update_rule
      FROM information_schema.key_column_usage kcu
      JOIN information_schema.referential_constraints rc
        ON rc.constraint_schema = kcu.constraint_schema
        AND rc.constraint_name = kcu.constraint_name
        AND rc.table_name = kcu.table_name
      WHERE kcu.referenced_table_name IS NOT NULL AND kcu.table_schema NOT IN ${SYSTEM_SCHEMAS}
      ORDER BY kcu.table_schema, kcu.table_name, kcu.constraint_name, kcu.ordinal_position
    `,
    foreignKeyRow,
  );
  return collect<z.output<typeof foreignKeyRow>, ForeignKeyRecord>(
    rows,
    (row) => `${tableKey(row)}.${row.constraint_name}`,
    (row) => ({
      table: identifier(row.schema_name, row.table_name),
      foreignKey: {
        name: row.constraint_name,
        columns: [],
        target: identifier(row.referenced_schema, row.referenced_table),
        targetColumns: [],
        onDelete: normalizeReferentialAction(row.delete_rule),
        onUpdate: normalizeReferentialAction(row.update_rule),
      },
    }),
    (record, row) => {
      record.foreignKey.columns.push(row.column_name);
      record.foreignKey.targetColumns.push(row.referenced_column);
    },
  );
}

async function listChecks(runner: QueryRunner): Promise<CheckRecord[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Check constraints */
      SELECT
        tc.table_schema AS schema_name,
        tc.table_name AS table_name,
        tc.constraint_name AS constraint_name,
        cc.check_clause AS check_clause
      FROM information_schema.table_constraints tc
      JOIN information_schema.check_constraints cc
        ON cc.constraint_schema = tc.constraint_schema
        AND cc.constraint_name = tc.constraint_name
      WHERE tc.constraint_type = 'CHECK' AND tc.table_schema NOT IN ${SYSTEM_SCHEMAS}
      ORDER BY tc.table_schema, tc.table_name, tc.constraint_name
    `,
    checkRow,
  );
  return rows.map((row) => ({
    table: identifier(row.schema_name, row.table_name),
    check: { name: row.constraint_name, expression: row.check_clause },
  }));
}

async function listIndexes(runner: QueryRunner): Promise<IndexRecord[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Index definitions */
      SELECT
        s.table_schema AS schema_name,
        s.table_name AS table_name,
        s.index_name AS index_name,
        s.non_unique AS non_unique,
        s.index_type AS index_type,
        s.column_name AS column_name
      FROM information_schema.statistics s
      WHERE s.table_schema NOT IN ${SYSTEM_SCHEMAS}
      ORDER BY s.table_schema, s.table_name, s.index_name, s.seq_in_index
    `,
    indexRow,
  );
  return collect<z.output<typeof indexRow>, IndexRecord>(
    rows,
    (row) => `${tableKey(row)}.${row.index_name}`,
    (row) => ({
      table: identifier(row.schema_name, row.table_name),
      index: {
        name: row.index_name,
        unique: !row.non_unique,
        primary: row.index_name === 'PRIMARY',
        clustered: null,
        columns: [],
        expressions: [],
        includedColumns: [],
        method: row.index_type,
        filter: null,
      },
    }),
    (record, row) => {
      // Functional key parts have no column; statistics only exposes their text on MySQL 8.
      if (row.column_name == null) record.index.expressions.push('expression');
      else record.index.columns.push(row.column_name);
    },
  );
}

async function listViews(runner: QueryRunner): Promise<View[]> {
  const views = await fetchRows(
    runner,
    `
      /* View definitions */
      SELECT
        v.table_schema AS schema_name,
        v.table_name AS view_name,
        v.view_definition AS definition
      FROM information_schema.views v
      WHERE v.table_schema NOT IN ${SYSTEM_SCHEMAS}
      ORDER BY v.table_schema, v.table_name
    `,
    viewRow,
  );
  const columns = await fetchRows(runner, columnSql('VIEW'), columnRow);
  const columnsByView = groupBy(columns, tableKey);

  return views.map((row) => ({
    id: identifier(row.schema_name, row.view_name),
    columns: (columnsByView[`${row.schema_name}.${row.view_name}`] ?? []).map((column) => ({
      name: column.column_name,
      dataType: columnType(column),
      nullable: column.is_nullable,
      description: tidyText(column.description),
    })),
    definition: tidyText(row.definition),
    baseTables: [],
    materialized: false,
    description: null,
  }));
}

function direction(mode: string | null): ParameterDirection {
  if (mode === 'OUT') return 'OUT';
  if (mode === 'INOUT') return 'INOUT';
  return 'IN';
}

async function listRoutines(runner: QueryRunner): Promise<Routine[]> {
  const routines = await fetchRows(
    runner,
    `
      /* Routine source code */
      SELECT
        r.routine_schema AS schema_name,
        r.specific_name AS specific_name,
        r.routine_name AS routine_name,
        r.routine_type AS routine_type,
        r.data_type AS data_type,
        r.dtd_identifier AS return_type,
        r.routine_body AS language,
        r.routine_definition AS definition,
        r.routine_comment AS description
      FROM information_schema.routines r
      WHERE r.routine_schema NOT IN ${SYSTEM_SCHEMAS}
      ORDER BY r.routine_schema, r.routine_name
    `,
    routineRow,
  );
  const parameters = await fetchRows(
    runner,
    `
      /* Routine parameters */
      SELECT
        p.specific_schema AS schema_name,
        p.specific_name AS specific_name,
        p.ordinal_position AS ordinal,
        p.parameter_name AS parameter_name,
        p.parameter_mode AS parameter_mode,
        p.data_type AS data_type,
        p.dtd_identifier AS display_type,
        p.character_maximum_length AS char_length,
        p.numeric_precision AS numeric_precision,
        p.numeric_scale AS numeric_scale
      FROM information_schema.parameters p
      WHERE p.ordinal_position > 0 AND p.specific_schema NOT IN ${SYSTEM_SCHEMAS}
      ORDER BY p.specific_schema, p.specific_name, p.ordinal_position
    `,
    parameterRow,
  );
  const paramsByRoutine = groupBy(parameters, (row) => `${row.schema_name}.${row.specific_name}`);

  return routines.map((row) => {
    const isProcedure = row.routine_type === 'PROCEDURE';
    return {
      id: identifier(row.schema_name, row.routine_name),
      kind: isProcedure ? 'procedure' : 'function',
      parameters: (paramsByRoutine[`${row.schema_name}.${row.specific_name}`] ?? []).map((param) => ({
        name: param.parameter_name ?? `p${param.ordinal}`,
        dataType: normalizeType('mysql', {
          name: param.data_type,
          length: param.char_length,
          precision: param.numeric_precision,
          scale: param.numeric_scale,
          display: param.display_type,
        }),
        direction: direction(param.parameter_mode),
        default: null,
      })),
      returns:
        isProcedure || !row.data_type
          ? null
          : { kind: 'scalar', dataType: normalizeType('mysql', { name: row.data_type, display: row.return_type }) },
      language: row.language,
      definition: tidyText(row.definition),
      description: tidyText(row.description),
    };
  });
}

function triggerTiming(value: string): TriggerTiming {
  const upper = value.toUpperCase();
  if (upper === 'BEFORE') return 'BEFORE';
  if (upper === 'INSTEAD OF') return 'INSTEAD_OF';
  return 'AFTER';
}

function triggerEvents(value: string): TriggerEvent[] {
  const upper = value.toUpperCase();
  return (['INSERT', 'UPDATE', 'DELETE'] as const).filter((event) => upper.includes(event));
}

async function listTriggers(runner: QueryRunner): Promise<Trigger[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Trigger metadata */
      SELECT
        t.trigger_schema AS schema_name,
        t.trigger_name AS trigger_name,
        t.event_object_schema AS table_schema,
        t.event_object_table AS table_name,
        t.action_timing AS action_timing,
        t.event_manipulation AS event_manipulation,
        t.action_statement AS definition
      FROM information_schema.triggers t
      WHERE t.trigger_schema NOT IN ${SYSTEM_SCHEMAS}
      ORDER BY t.trigger_schema, t.trigger_name
    `,
    triggerRow,
  );
  return rows.map((row) => ({
    id: identifier(row.schema_name, row.trigger_name),
    table: identifier(row.table_schema, row.table_name),
    timing: triggerTiming(row.action_timing),
    events: triggerEvents(row.event_manipulation),
    enabled: true,
    definition: tidyText(row.definition),
    description: null,
  }));
}

/** `'app'@'%'` → `app@%` */
export function accountName(value: string): string {
  return value.replace(/'/g, '').replace(/`/g, '');
}

async function listSecurity(runner: QueryRunner): Promise<SecurityPrincipal[]> {
  const users = await fetchRows(
    runner,
    `
      /* Accounts */
      SELECT u.user AS user_name, u.host AS host_name, u.account_locked = 'Y' AS is_locked
      FROM mysql.user u
      WHERE u.user NOT LIKE 'mysql.%'
      ORDER BY u.user, u.host
    `,
    userRow,
  );
  const edges = await fetchRows(
    runner,
    `
      /* Role grants */
      SELECT
        e.from_user AS role_name,
        e.from_host AS role_host,
        e.to_user AS member_name,
        e.to_host AS member_host
      FROM mysql.role_edges e
      ORDER BY e.to_user, e.to_host, e.from_user
    `,
    roleEdgeRow,
  );
  const grants = await fetchRows(
    runner,
    `
      /* Object privileges */
      SELECT
        tp.grantee AS grantee,
        tp.table_schema AS schema_name,
        tp.table_name AS object_name,
        tp.privilege_type AS privilege,
        tp.is_grantable = 'YES' AS is_grantable
      FROM information_schema.table_privileges tp
      WHERE tp.table_schema NOT IN ${SYSTEM_SCHEMAS}
      ORDER BY tp.grantee, tp.table_schema, tp.table_name, tp.privilege_type
    `,
    grantRow,
  );

  const edgesByMember = groupBy(edges, (row) => `${row.member_name}@${row.member_host}`);
  const grantsByGrantee = groupBy(grants, (row) => accountName(row.grantee));

  return users.map((row) => {
    const name = `${row.user_name}@${row.host_name}`;
    return {
      kind: row.is_locked ? 'ROLE' : 'USER',
      name,
      permissions: (grantsByGrantee[name] ?? []).map((grant) => ({
        privilege: grant.privilege,
        object: identifier(grant.schema_name, grant.object_name),
        state: grant.is_grantable ? 'GRANT_WITH_GRANT_OPTION' : 'GRANT',
      })),
      memberOf: (edgesByMember[name] ?? []).map((edge) => `${edge.role_name}@${edge.role_host}`),
    };
  });
}

async function version(runner: QueryRunner): Promise<string | null> {
  const rows = await fetchRows(runner, 'SELECT VERSION() AS version', z.object({ version: optionalText }));
  return rows[0]?.version ?? null;
}

export const mysqlDialect = defineDialect({
  dialect: 'mysql',
  label: 'MySQL / MariaDB',
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
    routines: listRoutines,
    triggers: listTriggers,
    types: NOT_APPLICABLE,
    sequences: NOT_APPLICABLE,
    synonyms: NOT_APPLICABLE,
    security: listSecurity,
  },
});
