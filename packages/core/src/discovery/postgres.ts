import groupBy from 'lodash/groupBy.js';
import { z } from 'zod';

import { identifier, normalizeType, tidyText, toStatistic } from '../normalize';
import type {
  Column,
  Parameter,
  ParameterDirection,
  ReferentialAction,
  ResultColumn,
  ReturnShape,
  Routine,
  SecurityPrincipal,
  Trigger,
  TriggerEvent,
  TriggerTiming,
  TypeCategory,
  UserDefinedType,
  View,
} from '../types';
import type { SequenceDraft } from '../model';
import { exact, flag, int, optionalInt, optionalText, text, textList } from './rows';
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

const USER_NAMESPACE = `
  n.nspname NOT IN ('pg_catalog', 'information_schema')
  AND n.nspname NOT LIKE 'pg\\_toast%'
  AND n.nspname NOT LIKE 'pg\\_temp\\_%'
`;

const NOT_EXTENSION_MEMBER = (oid: string) => `
  NOT EXISTS (
    SELECT 1 FROM pg_catalog.pg_depend dep
    WHERE dep.objid = ${oid} AND dep.deptype = 'e'
  )
`;

const ACTIONS: Record<string, ReferentialAction> = {
  a: 'NO_ACTION',
  r: 'RESTRICT',
  c: 'CASCADE',
  n: 'SET_NULL',
  d: 'SET_DEFAULT',
};

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
  type_name: text,
  type_kind: optionalText,
  display_type: text,
  char_length: optionalInt,
  numeric_precision: optionalInt,
  numeric_scale: optionalInt,
  is_nullable: flag,
  column_default: optionalText,
  identity_generation: optionalText,
  generation_expression: optionalText,
  collation_name: optionalText,
  description: optionalText,
});

const constraintRow = z.object({
  schema_name: text,
  table_name: text,
  constraint_name: text,
  columns: textList,
});

const foreignKeyRow = z.object({
  schema_name: text,
  table_name: text,
  constraint_name: text,
  columns: textList,
  referenced_schema: text,
  referenced_table: text,
  referenced_columns: textList,
  delete_action: optionalText,
  update_action: optionalText,
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
  is_unique: flag,
  is_primary: flag,
  index_method: optionalText,
  filter_definition: optionalText,
  is_included: flag,
  column_name: optionalText,
  expression: optionalText,
});

const viewRow = z.object({
  schema_name: text,
  view_name: text,
  is_materialized: flag,
  definition: optionalText,
  description: optionalText,
});

const viewDependencyRow = z.object({
  view_schema: text,
  view_name: text,
  table_schema: text,
  table_name: text,
});

const routineRow = z.object({
  specific_name: text,
  schema_name: text,
  routine_name: text,
  identity_arguments: optionalText,
  routine_kind: text,
  returns_set: flag,
  return_type: optionalText,
  return_base_type: optionalText,
  language: optionalText,
  definition: optionalText,
  description: optionalText,
});

const parameterRow = z.object({
  specific_name: text,
  ordinal: int,
  parameter_name: optionalText,
  parameter_mode: optionalText,
  data_type: text,
  char_length: optionalInt,
  numeric_precision: optionalInt,
  numeric_scale: optionalInt,
  parameter_default: optionalText,
});

const triggerRow = z.object({
  schema_name: text,
  table_name: text,
  trigger_name: text,
  trigger_type: int,
  is_enabled: flag,
  definition: optionalText,
  description: optionalText,
});

const typeRow = z.object({
  schema_name: text,
  type_name: text,
  type_kind: text,
  base_type: optionalText,
  base_type_name: optionalText,
  is_nullable: flag,
  check_clause: optionalText,
  enum_values: textList,
  description: optionalText,
});

const typeMemberRow = z.object({
  schema_name: text,
  type_name: text,
  member_name: text,
  type_base: text,
  display_type: text,
  is_nullable: flag,
});

const sequenceRow = z.object({
  schema_name: text,
  sequence_name: text,
  data_type: text,
  start_value: exact,
  increment: exact,
  min_value: exact,
  max_value: exact,
  is_cycling: flag,
  cache_size: exact,
  current_value: exact,
  description: optionalText,
});

const roleRow = z.object({ role_name: text, can_login: flag });

const membershipRow = z.object({ member_name: text, role_name: text });

const grantRow = z.object({
  grantee: text,
  schema_name: text,
  object_name: text,
  privilege: text,
  is_grantable: flag,
});

type ColumnRow = z.output<typeof columnRow>;
type RoutineRow = z.output<typeof routineRow>;
type ParameterRow = z.output<typeof parameterRow>;

async function listSchemas(runner: QueryRunner): Promise<string[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Schemas */
      SELECT n.nspname AS schema_name
      FROM pg_catalog.pg_namespace n
      WHERE ${USER_NAMESPACE}
      ORDER BY n.nspname
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
        n.nspname AS schema_name,
        c.relname AS table_name,
        c.reltuples::bigint AS row_count,
        pg_total_relation_size(c.oid) / 1024 AS size_kb,
        obj_description(c.oid, 'pg_class') AS description
      FROM pg_catalog.pg_class c
      JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
      WHERE c.relkind IN ('r', 'p') AND NOT c.relispartition AND ${USER_NAMESPACE}
      ORDER BY n.nspname, c.relname
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

function columnSql(relkinds: string): string {
  return `
    /* Column metadata */
    SELECT
      n.nspname AS schema_name,
      c.relname AS table_name,
      a.attname AS column_name,
      row_number() OVER (PARTITION BY c.oid ORDER BY a.attnum) AS ordinal,
      format_type(a.atttypid, NULL) AS type_name,
      t.typtype AS type_kind,
      format_type(a.atttypid, a.atttypmod) AS display_type,
      CASE
        WHEN a.atttypid IN (1042, 1043) AND a.atttypmod > 0 THEN a.atttypmod - 4
        WHEN a.atttypid IN (1560, 1562) AND a.atttypmod > 0 THEN a.atttypmod
      END AS char_length,
      CASE WHEN a.atttypid = 1700 AND a.atttypmod > 0 THEN ((a.atttypmod - 4) >> 16) & 65535 END AS numeric_precision,
      CASE WHEN a.atttypid = 1700 AND a.atttypmod > 0 THEN (a.atttypmod - 4) & 65535 END AS numeric_scale,
      NOT a.attnotnull AS is_nullable,
      CASE WHEN a.attgenerated = '' THEN pg_get_expr(ad.adbin, ad.adrelid) END AS column_default,
      CASE a.attidentity WHEN 'a' THEN 'ALWAYS' WHEN 'd' THEN 'BY DEFAULT' END AS identity_generation,
      CASE WHEN a.attgenerated <> '' THEN pg_get_expr(ad.adbin, ad.adrelid) END AS generation_expression,
      co.collname AS collation_name,
      col_description(c.oid, a.attnum) AS description
    FROM pg_catalog.pg_attribute a
    JOIN pg_catalog.pg_class c ON c.oid = a.attrelid
    JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
    JOIN pg_catalog.pg_type t ON t.oid = a.atttypid
    LEFT JOIN pg_catalog.pg_attrdef ad ON ad.adrelid = a.attrelid AND ad.adnum = a.attnum
    LEFT JOIN pg_catalog.pg_collation co ON co.oid = a.attcollation AND a.attcollation <> t.typcollation
    WHERE a.attnum > 0 AND NOT a.attisdropped AND c.relkind IN (${relkinds}) AND ${USER_NAMESPACE}
    ORDER BY n.nspname, c.relname, a.attnum
  `;
}

function columnType(row: ColumnRow) {
  return normalizeType('postgres', {
    name: row.type_kind === 'e' ? 'enum' : row.type_name,
    length: row.char_length,
    precision: row.numeric_precision,
    scale: row.numeric_scale,
    display: row.display_type,
  });
}

function normalizeColumn(row: ColumnRow): Column {
  const defaultValue = row.column_default;
  return {
    name: row.column_name,
    ordinal: row.ordinal,
    dataType: columnType(row),
    nullable: row.is_nullable,
    default: defaultValue,
    autoIncrement: row.identity_generation != null || (defaultValue?.startsWith('nextval(') ?? false),
    computed: row.generation_expression,
    collation: row.collation_name,
    description: tidyText(row.description),
  };
}

async function listColumns(runner: QueryRunner): Promise<ColumnRecord[]> {
  const rows = await fetchRows(runner, columnSql(`'r', 'p'`), columnRow);
  return rows.map((row) => ({
    table: identifier(row.schema_name, row.table_name),
    column: normalizeColumn(row),
  }));
}

function constraintSql(contype: string, label: string): string {
  return `
    /* ${label} */
    SELECT
      n.nspname AS schema_name,
      c.relname AS table_name,
      con.conname AS constraint_name,
      array_agg(a.attname::text ORDER BY k.ord) AS columns
    FROM pg_catalog.pg_constraint con
    JOIN pg_catalog.pg_class c ON c.oid = con.conrelid
    JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
    CROSS JOIN LATERAL unnest(con.conkey) WITH ORDINALITY AS k(attnum, ord)
    JOIN pg_catalog.pg_attribute a ON a.attrelid = c.oid AND a.attnum = k.attnum
    WHERE con.contype = '${contype}' AND ${USER_NAMESPACE}
    GROUP BY n.nspname, c.relname, con.conname
    ORDER BY n.nspname, c.relname, con.conname
  `;
}

async function listPrimaryKeys(runner: QueryRunner): Promise<PrimaryKeyRecord[]> {
  const rows = await fetchRows(runner, constraintSql('p', 'Primary key columns'), constraintRow);
  return rows.map((row) => ({
    table: identifier(row.schema_name, row.table_name),
    primaryKey: { name: row.constraint_name, columns: row.columns, clustered: null },
  }));
}

async function listUniqueConstraints(runner: QueryRunner): Promise<UniqueConstraintRecord[]> {
  const rows = await fetchRows(runner, constraintSql('u', 'Unique constraints'), constraintRow);
  return rows.map((row) => ({
    table: identifier(row.schema_name, row.table_name),
    constraint: { name: row.constraint_name, columns: row.columns },
  }));
}

async function listForeignKeys(runner: QueryRunner): Promise<ForeignKeyRecord[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Foreign key metadata */
      SELECT
        n.nspname AS schema_name,
        c.relname AS table_name,
        con.conname AS constraint_name,
        array_agg(a.attname::text ORDER BY k.ord) AS columns,
        rn.nspname AS referenced_schema,
        rc.relname AS referenced_table,
        array_agg(ra.attname::text ORDER BY k.ord) AS referenced_columns,
        con.confdeltype AS delete_action,
        con.confupdtype AS update_action
      FROM pg_catalog.pg_constraint con
      JOIN pg_catalog.pg_class c ON c.oid = con.conrelid
      JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
      JOIN pg_catalog.pg_class rc ON rc.oid = con.confrelid
      JOIN pg_catalog.pg_namespace rn ON rn.oid = rc.relnamespace
      CROSS JOIN LATERAL unnest(con.conkey, con.confkey) WITH ORDINALITY AS k(attnum, refattnum, ord)
      JOIN pg_catalog.pg_attribute a ON a.attrelid = con.conrelid AND a.attnum = k.attnum
      JOIN pg_catalog.pg_attribute ra ON ra.attrelid = con.confrelid AND ra.attnum = k.refattnum
      WHERE con.contype = 'f' AND ${USER_NAMESPACE}
      GROUP BY n.nspname, c.relname, con.conname, rn.nspname, rc.relname, con.confdeltype, con.confupdtype
      ORDER BY n.nspname, c.relname, con.conname
    `,
    foreignKeyRow,
  );
  return rows.map((row) => ({
    table: identifier(row.schema_name, row.table_name),
    foreignKey: {
      name: row.constraint_name,
      columns: row.columns,
      target: identifier(row.referenced_schema, row.referenced_table),
      targetColumns: row.referenced_columns,
      onDelete: ACTIONS[row.delete_action ?? ''] ?? null,
      onUpdate: ACTIONS[row.update_action ?? ''] ?? null,
    },
  }));
}

async function listChecks(runner: QueryRunner): Promise<CheckRecord[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Check constraints */
      SELECT
        n.nspname AS schema_name,
        c.relname AS table_name,
        con.conname AS constraint_name,
        pg_get_expr(con.conbin, con.conrelid) AS check_clause
      FROM pg_catalog.pg_constraint con
      JOIN pg_catalog.pg_class c ON c.oid = con.conrelid
      JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
      WHERE con.contype = 'c' AND c.relkind IN ('r', 'p') AND ${USER_NAMESPACE}
      ORDER BY n.nspname, c.relname, con.conname
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
        n.nspname AS schema_name,
        t.relname AS table_name,
        i.relname AS index_name,
        ix.indisunique AS is_unique,
        ix.indisprimary AS is_primary,
        am.amname AS index_method,
        pg_get_expr(ix.indpred, ix.indrelid) AS filter_definition,
        k.ord > ix.indnkeyatts AS is_included,
        a.attname AS column_name,
        CASE WHEN k.attnum = 0 THEN pg_get_indexdef(ix.indexrelid, k.ord::int, true) END AS expression
      FROM pg_catalog.pg_index ix
      JOIN pg_catalog.pg_class i ON i.oid = ix.indexrelid
      JOIN pg_catalog.pg_class t ON t.oid = ix.indrelid
      JOIN pg_catalog.pg_namespace n ON n.oid = t.relnamespace
      JOIN pg_catalog.pg_am am ON am.oid = i.relam
      CROSS JOIN LATERAL unnest(ix.indkey::int2[]) WITH ORDINALITY AS k(attnum, ord)
      LEFT JOIN pg_catalog.pg_attribute a ON a.attrelid = t.oid AND a.attnum = k.attnum AND k.attnum > 0
      WHERE t.relkind IN ('r', 'p') AND ${USER_NAMESPACE}
      ORDER BY n.nspname, t.relname, i.relname, k.ord
    `,
    indexRow,
  );

  const indexes = new Map<string, IndexRecord>();
  for (const row of rows) {
    const key = `${row.schema_name}.${row.table_name}.${row.index_name}`;
    let record = indexes.get(key);
    if (!record) {
      record = {
        table: identifier(row.schema_name, row.table_name),
        index: {
          name: row.index_name,
          unique: row.is_unique,
          primary: row.is_primary,
          clustered: null,
          columns: [],
          expressions: [],
          includedColumns: [],
          method: row.index_method,
          filter: row.filter_definition,
        },
      };
      indexes.set(key, record);
    }
    if (row.column_name == null) {
      if (row.expression) record.index.expressions.push(row.expression);
    } else if (row.is_included) {
      record.index.includedColumns.push(row.column_name);
    } else {
      record.index.columns.push(row.column_name);
    }
  }
  return Array.from(indexes.values());
}

async function listViews(runner: QueryRunner): Promise<View[]> {
  const views = await fetchRows(
    runner,
    `
      /* View definitions */
      SELECT
        n.nspname AS schema_name,
        c.relname AS view_name,
        c.relkind = 'm' AS is_materialized,
        pg_get_viewdef(c.oid, true) AS definition,
        obj_description(c.oid, 'pg_class') AS description
      FROM pg_catalog.pg_class c
      JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
      WHERE c.relkind IN ('v', 'm') AND ${USER_NAMESPACE}
      ORDER BY n.nspname, c.relname
    `,
    viewRow,
  );
  const columns = await fetchRows(runner, columnSql(`'v', 'm'`), columnRow);
  const dependencies = await fetchRows(
    runner,
    `
      /* View dependencies */
      SELECT DISTINCT
        vn.nspname AS view_schema,
        v.relname AS view_name,
        tn.nspname AS table_schema,
        t.relname AS table_name
      FROM pg_catalog.pg_depend d
      JOIN pg_catalog.pg_rewrite r ON r.oid = d.objid
      JOIN pg_catalog.pg_class v ON v.oid = r.ev_class
      JOIN pg_catalog.pg_namespace vn ON vn.oid = v.relnamespace
      JOIN pg_catalog.pg_class t ON t.oid = d.refobjid
      JOIN pg_catalog.pg_namespace tn ON tn.oid = t.relnamespace
      WHERE d.classid = 'pg_catalog.pg_rewrite'::regclass
        AND d.refclassid = 'pg_catalog.pg_class'::regclass
        AND v.relkind IN ('v', 'm')
        AND t.relkind IN ('r', 'p', 'v', 'm', 'f')
        AND t.oid <> v.oid
        AND vn.nspname NOT IN ('pg_catalog', 'information_schema')
    `,
    viewDependencyRow,
  );

  const columnsByView = groupBy(columns, (row) => `${row.schema_name}.${row.table_name}`);
  const dependenciesByView = groupBy(dependencies, (row) => `${row.view_schema}.${row.view_name}`);

  return views.map((row) => {
    const key = `${row.schema_name}.${row.view_name}`;
    return {
      id: identifier(row.schema_name, row.view_name),
      columns: (columnsByView[key] ?? []).map((column) => ({
        name: column.column_name,
        dataType: columnType(column),
        nullable: column.is_nullable,
        description: tidyText(column.description),
      })),
      definition: tidyText(row.definition),
      baseTables: (dependenciesByView[key] ?? []).map((dep) => identifier(dep.table_schema, dep.table_name)),
      materialized: row.is_materialized,
      description: tidyText(row.description),
    };
  });
}

function parameterType(row: ParameterRow) {
  return normalizeType('postgres', {
    name: row.data_type,
    length: row.char_length,
    precision: row.numeric_precision,
    scale: row.numeric_scale,
  });
}

function parameterDirection(mode: string | null): ParameterDirection {
  if (mode === 'OUT') return 'OUT';
  if (mode === 'INOUT') return 'INOUT';
  return 'IN';
}

function routineReturns(row: RoutineRow, outputs: ParameterRow[]): ReturnShape | null {
  if (row.routine_kind === 'p') return null;
  if (row.returns_set && outputs.length > 0) {
    const columns: ResultColumn[] = outputs.map((param) => ({
      name: param.parameter_name ?? `column${param.ordinal}`,
      dataType: parameterType(param),
      nullable: true,
    }));
    return { kind: 'table', columns };
  }
  if (!row.return_base_type || row.return_base_type === 'void') return null;
  return {
    kind: 'scalar',
    dataType: normalizeType('postgres', { name: row.return_base_type, display: row.return_type }),
  };
}

function normalizeRoutines(routines: RoutineRow[], parameters: ParameterRow[]): Routine[] {
  const paramsByRoutine = groupBy(parameters, (row) => row.specific_name);
  const overloads = groupBy(routines, (row) => `${row.schema_name}.${row.routine_name}`);

  return routines.map((row) => {
    const params = paramsByRoutine[row.specific_name] ?? [];
    const tableResult = row.returns_set && row.routine_kind !== 'p';
    const outputs = tableResult ? params.filter((param) => param.parameter_mode === 'OUT') : [];
    const inputs = tableResult ? params.filter((param) => param.parameter_mode !== 'OUT') : params;
    const overloaded = (overloads[`${row.schema_name}.${row.routine_name}`] ?? []).length > 1;
    const name = overloaded ? `${row.routine_name}(${row.identity_arguments ?? ''})` : row.routine_name;

    const parameterList: Parameter[] = inputs.map((param) => ({
      name: param.parameter_name ?? `$${param.ordinal}`,
      dataType: parameterType(param),
      direction: parameterDirection(param.parameter_mode),
      default: param.parameter_default,
    }));

    return {
      id: identifier(row.schema_name, name),
      kind: row.routine_kind === 'p' ? 'procedure' : 'function',
      parameters: parameterList,
      returns: routineReturns(row, outputs),
      language: row.language,
      definition: tidyText(row.definition),
      description: tidyText(row.description),
    };
  });
}

async function listRoutines(runner: QueryRunner): Promise<Routine[]> {
  const routines = await fetchRows(
    runner,
    `
      /* Routine source code */
      SELECT
        p.proname || '_' || p.oid AS specific_name,
        n.nspname AS schema_name,
        p.proname AS routine_name,
        pg_get_function_identity_arguments(p.oid) AS identity_arguments,
        p.prokind AS routine_kind,
        p.proretset AS returns_set,
        pg_get_function_result(p.oid) AS return_type,
        format_type(p.prorettype, NULL) AS return_base_type,
        l.lanname AS language,
        CASE WHEN p.prokind IN ('f', 'p') THEN pg_get_functiondef(p.oid) END AS definition,
        obj_description(p.oid, 'pg_proc') AS description
      FROM pg_catalog.pg_proc p
      JOIN pg_catalog.pg_namespace n ON n.oid = p.pronamespace
      JOIN pg_catalog.pg_language l ON l.oid = p.prolang
      WHERE ${USER_NAMESPACE} AND ${NOT_EXTENSION_MEMBER('p.oid')}
      ORDER BY n.nspname, p.proname, p.oid
    `,
    routineRow,
  );
  const parameters = await fetchRows(
    runner,
    `
      /* Routine parameters */
      SELECT
        p.specific_name,
        p.ordinal_position AS ordinal,
        p.parameter_name,
        p.parameter_mode,
        p.data_type,
        p.character_maximum_length AS char_length,
        p.numeric_precision,
        p.numeric_scale,
        p.parameter_default
      FROM information_schema.parameters p
      WHERE p.specific_schema NOT IN ('pg_catalog', 'information_schema')
      ORDER BY p.specific_schema, p.specific_name, p.ordinal_position
    `,
    parameterRow,
  );
  return normalizeRoutines(routines, parameters);
}

/** Decodes pg_trigger.tgtype: bit 2 BEFORE, 64 INSTEAD OF, else AFTER; 4/8/16 insert/delete/update. */
export function decodeTriggerType(tgtype: number): { timing: TriggerTiming; events: TriggerEvent[] } {
  const timing: TriggerTiming = tgtype & 2 ? 'BEFORE' : tgtype & 64 ? 'INSTEAD_OF' : 'AFTER';
  const events: TriggerEvent[] = [];
  if (tgtype & 4) events.push('INSERT');
  if (tgtype & 16) events.push('UPDATE');
  if (tgtype & 8) events.push('DELETE');
  return { timing, events };
}

async function listTriggers(runner: QueryRunner): Promise<Trigger[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Trigger metadata */
      SELECT
        n.nspname AS schema_name,
        c.relname AS table_name,
        t.tgname AS trigger_name,
        t.tgtype::int AS trigger_type,
        t.tgenabled <> 'D' AS is_enabled,
        pg_get_triggerdef(t.oid, true) AS definition,
        obj_description(t.oid, 'pg_trigger') AS description
      FROM pg_catalog.pg_trigger t
      JOIN pg_catalog.pg_class c ON c.oid = t.tgrelid
      JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
      WHERE NOT t.tgisinternal AND ${USER_NAMESPACE}
      ORDER BY n.nspname, c.relname, t.tgname
    `,
    triggerRow,
  );
  // trigger names are only unique per table; repeated names carry their table
  const shared = groupBy(rows, (row) => `${row.schema_name}.${row.trigger_name}`);
  return rows.map((row) => ({
    id: identifier(
      row.schema_name,
      (shared[`${row.schema_name}.${row.trigger_name}`] ?? []).length > 1
        ? `${row.trigger_name}(${row.table_name})`
        : row.trigger_name,
    ),
    table: identifier(row.schema_name, row.table_name),
    ...decodeTriggerType(row.trigger_type),
    enabled: row.is_enabled,
    definition: tidyText(row.definition),
    description: tidyText(row.description),
  }));
}

const TYPE_CATEGORIES: Record<string, TypeCategory> = {
  c: 'COMPOSITE',
  e: 'ENUM',
  d: 'DOMAIN',
  r: 'RANGE',
};

async function listTypes(runner: QueryRunner): Promise<UserDefinedType[]> {
  const types = await fetchRows(
    runner,
    `
      /* User-defined types */
      SELECT
        n.nspname AS schema_name,
        t.typname AS type_name,
        t.typtype AS type_kind,
        CASE
          WHEN t.typtype = 'd' THEN format_type(t.typbasetype, t.typtypmod)
          WHEN t.typtype = 'r' THEN (SELECT format_type(r.rngsubtype, NULL) FROM pg_catalog.pg_range r WHERE r.rngtypid = t.oid)
        END AS base_type,
        CASE
          WHEN t.typtype = 'd' THEN format_type(t.typbasetype, NULL)
          WHEN t.typtype = 'r' THEN (SELECT format_type(r.rngsubtype, NULL) FROM pg_catalog.pg_range r WHERE r.rngtypid = t.oid)
        END AS base_type_name,
        NOT t.typnotnull AS is_nullable,
        (
          SELECT string_agg(pg_get_constraintdef(con.oid), ' AND ' ORDER BY con.conname)
          FROM pg_catalog.pg_constraint con
          WHERE con.contypid = t.oid AND con.contype = 'c'
        ) AS check_clause,
        (
          SELECT array_agg(e.enumlabel::text ORDER BY e.enumsortorder)
          FROM pg_catalog.pg_enum e
          WHERE e.enumtypid = t.oid
        ) AS enum_values,
        obj_description(t.oid, 'pg_type') AS description
      FROM pg_catalog.pg_type t
      JOIN pg_catalog.pg_namespace n ON n.oid = t.typnamespace
      LEFT JOIN pg_catalog.pg_class c ON c.oid = t.typrelid
      WHERE t.typtype IN ('c', 'e', 'd', 'r')
        AND (t.typtype <> 'c' OR c.relkind = 'c')
        AND ${USER_NAMESPACE}
        AND ${NOT_EXTENSION_MEMBER('t.oid')}
      ORDER BY n.nspname, t.typname
    `,
    typeRow,
  );
  const members = await fetchRows(
    runner,
    `
      /* Composite type attributes */
      SELECT
        n.nspname AS schema_name,
        t.typname AS type_name,
        a.attname AS member_name,
        format_type(a.atttypid, NULL) AS type_base,
        format_type(a.atttypid, a.atttypmod) AS display_type,
        NOT a.attnotnull AS is_nullable
      FROM pg_catalog.pg_type t
      JOIN pg_catalog.pg_namespace n ON n.oid = t.typnamespace
      JOIN pg_catalog.pg_class c ON c.oid = t.typrelid AND c.relkind = 'c'
      JOIN pg_catalog.pg_attribute a ON a.attrelid = c.oid AND a.attnum > 0 AND NOT a.attisdropped
      WHERE ${USER_NAMESPACE}
      ORDER BY n.nspname, t.typname, a.attnum
    `,
    typeMemberRow,
  );

  const membersByType = groupBy(members, (row) => `${row.schema_name}.${row.type_name}`);
  return types.flatMap((row) => {
    const category = TYPE_CATEGORIES[row.type_kind];
    if (!category) return [];
    return [
      {
        id: identifier(row.schema_name, row.type_name),
        category,
        baseType: row.base_type_name
          ? normalizeType('postgres', { name: row.base_type_name, display: row.base_type })
          : null,
        nullable: row.is_nullable,
        members: (membersByType[`${row.schema_name}.${row.type_name}`] ?? []).map((member) => ({
          name: member.member_name,
          dataType: normalizeType('postgres', { name: member.type_base, display: member.display_type }),
          nullable: member.is_nullable,
        })),
        enumValues: row.enum_values,
        check: row.check_clause,
        description: tidyText(row.description),
      },
    ];
  });
}

async function listSequences(runner: QueryRunner): Promise<SequenceDraft[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Sequences */
      SELECT
        s.schemaname AS schema_name,
        s.sequencename AS sequence_name,
        s.data_type::text AS data_type,
        s.start_value::text AS start_value,
        s.increment_by::text AS increment,
        s.min_value::text AS min_value,
        s.max_value::text AS max_value,
        s.cycle AS is_cycling,
        s.cache_size::text AS cache_size,
        s.last_value::text AS current_value,
        obj_description(c.oid, 'pg_class') AS description
      FROM pg_catalog.pg_sequences s
      JOIN pg_catalog.pg_namespace n ON n.nspname = s.schemaname
      JOIN pg_catalog.pg_class c ON c.relnamespace = n.oid AND c.relname = s.sequencename
      WHERE ${USER_NAMESPACE}
      ORDER BY s.schemaname, s.sequencename
    `,
    sequenceRow,
  );
  return rows.map((row) => ({
    id: identifier(row.schema_name, row.sequence_name),
    dataType: row.data_type,
    start: row.start_value,
    increment: row.increment,
    min: row.min_value,
    max: row.max_value,
    cycle: row.is_cycling,
    cache: row.cache_size,
    current: row.current_value,
    description: tidyText(row.description),
  }));
}

async function listSecurity(runner: QueryRunner): Promise<SecurityPrincipal[]> {
  const roles = await fetchRows(
    runner,
    `
      /* Roles */
      SELECT r.rolname AS role_name, r.rolcanlogin AS can_login
      FROM pg_catalog.pg_roles r
      WHERE r.rolname NOT LIKE 'pg\\_%'
      ORDER BY r.rolname
    `,
    roleRow,
  );
  const memberships = await fetchRows(
    runner,
    `
      /* Role memberships */
      SELECT m.rolname AS member_name, r.rolname AS role_name
      FROM pg_catalog.pg_auth_members am
      JOIN pg_catalog.pg_roles m ON m.oid = am.member
      JOIN pg_catalog.pg_roles r ON r.oid = am.roleid
      ORDER BY m.rolname, r.rolname
    `,
    membershipRow,
  );
  const grants = await fetchRows(
    runner,
    `
      /* Object privileges */
      SELECT
        r.rolname AS grantee,
        n.nspname AS schema_name,
        c.relname AS object_name,
        acl.privilege_type AS privilege,
        acl.is_grantable
      FROM pg_catalog.pg_class c
      JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
      CROSS JOIN LATERAL aclexplode(c.relacl) AS acl
      JOIN pg_catalog.pg_roles r ON r.oid = acl.grantee
      WHERE c.relkind IN ('r', 'p', 'v', 'm', 'S') AND c.relacl IS NOT NULL AND ${USER_NAMESPACE}
      ORDER BY r.rolname, n.nspname, c.relname, acl.privilege_type
    `,
    grantRow,
  );

  const membershipsByMember = groupBy(memberships, (row) => row.member_name);
  const grantsByGrantee = groupBy(grants, (row) => row.grantee);

  return roles.map((row) => ({
    kind: row.can_login ? 'USER' : 'ROLE',
    name: row.role_name,
    permissions: (grantsByGrantee[row.role_name] ?? []).map((grant) => ({
      privilege: grant.privilege,
      object: identifier(grant.schema_name, grant.object_name),
      state: grant.is_grantable ? 'GRANT_WITH_GRANT_OPTION' : 'GRANT',
    })),
    memberOf: (membershipsByMember[row.role_name] ?? []).map((membership) => membership.role_name),
  }));
}

async function version(runner: QueryRunner): Promise<string | null> {
  const rows = await fetchRows(runner, 'SELECT version() AS version', z.object({ version: optionalText }));
  return rows[0]?.version ?? null;
}

export const postgresDialect = defineDialect({
  dialect: 'postgres',
  label: 'PostgreSQL',
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
    types: listTypes,
    sequences: listSequences,
    synonyms: NOT_APPLICABLE,
    security: listSecurity,
  },
});
