import groupBy from 'lodash/groupBy.js';
import { z } from 'zod';

import {
  identifier,
  normalizeReferentialAction,
  normalizeType,
  tidyText,
  toStatistic,
} from '../normalize';
import type { SequenceDraft } from '../model';
import type {
  DataType,
  ParameterDirection,
  Routine,
  SecurityPrincipal,
  Synonym,
  Trigger,
  TriggerEvent,
  TriggerTiming,
  UserDefinedType,
  View,
} from '../types';
import { collect, exact, flag, int, optionalInt, optionalText, text } from './rows';
import {
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

// Oracle upper-cases unquoted aliases, so every alias below is quoted.

const userOwner = (column: string) =>
  `${column} IN (SELECT u.username FROM all_users u WHERE u.oracle_maintained = 'N')`;

const USER_TABLES = `(
  SELECT t.owner, t.table_name, t.num_rows, t.blocks
  FROM all_tables t
  WHERE t.nested = 'NO'
    AND t.secondary = 'N'
    AND t.dropped = 'NO'
    AND (t.iot_type IS NULL OR t.iot_type = 'IOT')
    AND NOT EXISTS (SELECT 1 FROM all_mviews m WHERE m.owner = t.owner AND m.mview_name = t.table_name)
    AND ${userOwner('t.owner')}
)`;

const USER_VIEWS = `(
  SELECT v.owner, v.view_name AS table_name FROM all_views v WHERE ${userOwner('v.owner')}
  UNION ALL
  SELECT m.owner, m.mview_name FROM all_mviews m WHERE ${userOwner('m.owner')}
)`;

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
  data_length: optionalInt,
  data_precision: optionalInt,
  data_scale: optionalInt,
  nullable: flag,
  data_default: optionalText,
  identity_column: flag,
  virtual_column: flag,
  identity_seed: exact,
  identity_increment: exact,
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
});

const checkRow = z.object({
  schema_name: text,
  table_name: text,
  constraint_name: text,
  search_condition: text,
});

const indexRow = z.object({
  schema_name: text,
  table_name: text,
  index_name: text,
  uniqueness: text,
  is_primary: flag,
  index_type: optionalText,
  column_name: text,
  expression: optionalText,
});

const viewRow = z.object({
  schema_name: text,
  view_name: text,
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
  schema_name: text,
  routine_name: text,
  object_type: text,
});

const sourceRow = z.object({
  schema_name: text,
  object_name: text,
  object_type: text,
  line_text: optionalText,
});

const argumentRow = z.object({
  schema_name: text,
  routine_name: text,
  position: int,
  argument_name: optionalText,
  data_type: optionalText,
  data_length: optionalInt,
  data_precision: optionalInt,
  data_scale: optionalInt,
  in_out: optionalText,
  default_value: optionalText,
});

const triggerRow = z.object({
  schema_name: text,
  trigger_name: text,
  table_schema: text,
  table_name: text,
  trigger_type: text,
  triggering_event: text,
  status: text,
  header: optionalText,
  body: optionalText,
});

const typeRow = z.object({
  schema_name: text,
  type_name: text,
  typecode: text,
  element_type: optionalText,
  element_length: optionalInt,
  element_precision: optionalInt,
  element_scale: optionalInt,
});

const typeMemberRow = z.object({
  schema_name: text,
  type_name: text,
  attr_name: text,
  attr_type: text,
  attr_length: optionalInt,
  attr_precision: optionalInt,
  attr_scale: optionalInt,
});

const sequenceRow = z.object({
  schema_name: text,
  sequence_name: text,
  start_value: exact,
  increment: exact,
  min_value: exact,
  max_value: exact,
  cycle_flag: flag,
  cache_size: exact,
  last_number: exact,
});

const synonymRow = z.object({
  schema_name: text,
  synonym_name: text,
  table_owner: optionalText,
  table_name: text,
  db_link: optionalText,
});

const principalRow = z.object({ principal_name: text, principal_kind: text });

const membershipRow = z.object({ member_name: text, role_name: text });

const privilegeRow = z.object({
  grantee: text,
  schema_name: text,
  object_name: text,
  privilege: text,
  grantable: flag,
});

function oracleType(name: string, length: number | null, precision: number | null, scale: number | null): DataType {
  return normalizeType('oracle', { name, length, precision, scale });
}

function tableKey(row: { schema_name: string; table_name: string }): string {
  return `${row.schema_name}.${row.table_name}`;
}

async function listSchemas(runner: QueryRunner): Promise<string[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Schemas */
      SELECT u.username AS "schema_name"
      FROM all_users u
      WHERE u.oracle_maintained = 'N'
      ORDER BY u.username
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
        t.owner AS "schema_name",
        t.table_name AS "table_name",
        TO_CHAR(t.num_rows) AS "row_count",
        TO_CHAR(t.blocks * 8) AS "size_kb",
        tc.comments AS "description"
      FROM ${USER_TABLES} t
      LEFT JOIN all_tab_comments tc ON tc.owner = t.owner AND tc.table_name = t.table_name
      ORDER BY t.owner, t.table_name
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

function columnSql(objects: string): string {
  return `
    /* Column metadata */
    SELECT
      c.owner AS "schema_name",
      c.table_name AS "table_name",
      c.column_name AS "column_name",
      ROW_NUMBER() OVER (PARTITION BY c.owner, c.table_name ORDER BY c.column_id) AS "ordinal",
      c.data_type AS "data_type",
      CASE WHEN c.char_used IS NOT NULL THEN c.char_length ELSE c.data_length END AS "data_length",
      c.data_precision AS "data_precision",
      c.data_scale AS "data_scale",
      c.nullable AS "nullable",
      c.data_default AS "data_default",
      c.identity_column AS "identity_column",
      c.virtual_column AS "virtual_column",
      REGEXP_SUBSTR(i.identity_options, 'START WITH: (-?[0-9]+)', 1, 1, NULL, 1) AS "identity_seed",
      REGEXP_SUBSTR(i.identity_options, 'INCREMENT BY: (-?[0-9]+)', 1, 1, NULL, 1) AS "identity_increment",
      cc.comments AS "description"
    FROM all_tab_cols c
    JOIN ${objects} o ON o.owner = c.owner AND o.table_name = c.table_name
    LEFT JOIN all_tab_identity_cols i
      ON i.owner = c.owner AND i.table_name = c.table_name AND i.column_name = c.column_name
    LEFT JOIN all_col_comments cc
      ON cc.owner = c.owner AND cc.table_name = c.table_name AND cc.column_name = c.column_name
    WHERE c.hidden_column = 'NO'
    ORDER BY c.owner, c.table_name, c.column_id
  `;
}

async function listColumns(runner: QueryRunner): Promise<ColumnRecord[]> {
  const rows = await fetchRows(runner, columnSql(USER_TABLES), columnRow);
  return rows.map((row) => {
    const expression = tidyText(row.data_default);
    const column: ColumnRecord['column'] = {
      name: row.column_name,
      ordinal: row.ordinal,
      dataType: oracleType(row.data_type, row.data_length, row.data_precision, row.data_scale),
      nullable: row.nullable,
      // identity columns report the backing sequence call as their default
      default: row.virtual_column || row.identity_column ? null : expression,
      autoIncrement: row.identity_column,
      computed: row.virtual_column ? expression : null,
      description: tidyText(row.description),
    };
    if (row.identity_column) {
      if (row.identity_seed != null) column.identitySeed = row.identity_seed;
      if (row.identity_increment != null) column.identityIncrement = row.identity_increment;
    }
    return { table: identifier(row.schema_name, row.table_name), column };
  });
}

function keyConstraintSql(type: 'P' | 'U', label: string): string {
  return `
    /* ${label} */
    SELECT
      c.owner AS "schema_name",
      c.table_name AS "table_name",
      c.constraint_name AS "constraint_name",
      cc.column_name AS "column_name"
    FROM all_constraints c
    JOIN ${USER_TABLES} t ON t.owner = c.owner AND t.table_name = c.table_name
    JOIN all_cons_columns cc
      ON cc.owner = c.owner AND cc.constraint_name = c.constraint_name AND cc.table_name = c.table_name
    WHERE c.constraint_type = '${type}'
    ORDER BY c.owner, c.table_name, c.constraint_name, cc.position
  `;
}

type KeyColumnRow = z.output<typeof keyColumnRow>;

async function listPrimaryKeys(runner: QueryRunner): Promise<PrimaryKeyRecord[]> {
  const rows = await fetchRows(runner, keyConstraintSql('P', 'Primary key columns'), keyColumnRow);
  return collect<KeyColumnRow, PrimaryKeyRecord>(
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
  const rows = await fetchRows(runner, keyConstraintSql('U', 'Unique constraints'), keyColumnRow);
  return collect<KeyColumnRow, UniqueConstraintRecord>(
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
        c.owner AS "schema_name",
        c.table_name AS "table_name",
        c.constraint_name AS "constraint_name",
        cc.column_name AS "column_name",
        rc.owner AS "referenced_schema",
        rc.table_name AS "referenced_table",
        rcc.column_name AS "referenced_column",
        c.delete_rule AS "delete_rule"
      FROM all_constraints c
      JOIN ${USER_TABLES} t ON t.owner = c.owner AND t.table_name = c.table_name
      JOIN all_constraints rc ON rc.owner = c.r_owner AND rc.constraint_name = c.r_constraint_name
      JOIN all_cons_columns cc ON cc.owner = c.owner AND cc.constraint_name = c.constraint_name
      JOIN all_cons_columns rcc
        ON rcc.owner = rc.owner AND rcc.constraint_name = rc.constraint_name AND rcc.position = cc.position
      WHERE c.constraint_type = 'R'
      ORDER BY c.owner, c.table_name, c.constraint_name, cc.position
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
        onUpdate: null,
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
        c.owner AS "schema_name",
        c.table_name AS "table_name",
        c.constraint_name AS "constraint_name",
        c.search_condition_vc AS "search_condition"
      FROM all_constraints c
      JOIN ${USER_TABLES} t ON t.owner = c.owner AND t.table_name = c.table_name
      WHERE c.constraint_type = 'C' AND c.search_condition_vc NOT LIKE '"%" IS NOT NULL'
      ORDER BY c.owner, c.table_name, c.constraint_name
    `,
    checkRow,
  );
  return rows.map((row) => ({
    table: identifier(row.schema_name, row.table_name),
    check: { name: row.constraint_name, expression: row.search_condition },
  }));
}

async function listIndexes(runner: QueryRunner): Promise<IndexRecord[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Index definitions */
      SELECT
        i.table_owner AS "schema_name",
        i.table_name AS "table_name",
        i.index_name AS "index_name",
        i.uniqueness AS "uniqueness",
        CASE WHEN EXISTS (
          SELECT 1 FROM all_constraints c
          WHERE c.owner = i.table_owner AND c.table_name = i.table_name
            AND c.index_name = i.index_name AND c.constraint_type = 'P'
        ) THEN 1 ELSE 0 END AS "is_primary",
        i.index_type AS "index_type",
        ic.column_name AS "column_name",
        e.column_expression AS "expression"
      FROM all_indexes i
      JOIN ${USER_TABLES} t ON t.owner = i.table_owner AND t.table_name = i.table_name
      JOIN all_ind_columns ic ON ic.index_owner = i.owner AND ic.index_name = i.index_name
      LEFT JOIN all_ind_expressions e
        ON e.index_owner = ic.index_owner AND e.index_name = ic.index_name AND e.column_position = ic.column_position
      WHERE i.index_type <> 'LOB'
      ORDER BY i.table_owner, i.table_name, i.index_name, ic.column_position
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
        unique: row.uniqueness === 'UNIQUE',
        primary: row.is_primary,
        clustered: null,
        columns: [],
        expressions: [],
        includedColumns: [],
        method: row.index_type,
        filter: null,
      },
    }),
    (record, row) => {
      // function-based key parts appear as hidden SYS_NC columns with an expression
      const expression = tidyText(row.expression);
      if (expression) record.index.expressions.push(expression);
      else record.index.columns.push(row.column_name);
    },
  );
}

async function listViews(runner: QueryRunner): Promise<View[]> {
  // LONG columns cannot appear in a UNION, so plain and materialized views are read separately
  const plain = await fetchRows(
    runner,
    `
      /* View definitions */
      SELECT
        v.owner AS "schema_name",
        v.view_name AS "view_name",
        v.text AS "definition",
        tc.comments AS "description"
      FROM all_views v
      LEFT JOIN all_tab_comments tc ON tc.owner = v.owner AND tc.table_name = v.view_name
      WHERE ${userOwner('v.owner')}
      ORDER BY v.owner, v.view_name
    `,
    viewRow,
  );
  const materialized = await fetchRows(
    runner,
    `
      /* Materialized view definitions */
      SELECT
        m.owner AS "schema_name",
        m.mview_name AS "view_name",
        m.query AS "definition",
        mc.comments AS "description"
      FROM all_mviews m
      LEFT JOIN all_mview_comments mc ON mc.owner = m.owner AND mc.mview_name = m.mview_name
      WHERE ${userOwner('m.owner')}
      ORDER BY m.owner, m.mview_name
    `,
    viewRow,
  );
  const columns = await fetchRows(runner, columnSql(USER_VIEWS), columnRow);
  const dependencies = await fetchRows(
    runner,
    `
      /* View dependencies */
      SELECT DISTINCT
        d.owner AS "view_schema",
        d.name AS "view_name",
        d.referenced_owner AS "table_schema",
        d.referenced_name AS "table_name"
      FROM all_dependencies d
      WHERE d.type IN ('VIEW', 'MATERIALIZED VIEW')
        AND d.referenced_type IN ('TABLE', 'VIEW', 'MATERIALIZED VIEW')
        AND ${userOwner('d.owner')}
    `,
    viewDependencyRow,
  );

  const columnsByView = groupBy(columns, tableKey);
  const dependenciesByView = groupBy(dependencies, (row) => `${row.view_schema}.${row.view_name}`);

  const toView = (row: z.output<typeof viewRow>, isMaterialized: boolean): View => {
    const key = `${row.schema_name}.${row.view_name}`;
    return {
      id: identifier(row.schema_name, row.view_name),
      columns: (columnsByView[key] ?? []).map((column) => ({
        name: column.column_name,
        dataType: oracleType(column.data_type, column.data_length, column.data_precision, column.data_scale),
        nullable: column.nullable,
        description: tidyText(column.description),
      })),
      definition: tidyText(row.definition),
      baseTables: (dependenciesByView[key] ?? []).map((dep) => identifier(dep.table_schema, dep.table_name)),
      materialized: isMaterialized,
      description: tidyText(row.description),
    };
  };

  return [...plain.map((row) => toView(row, false)), ...materialized.map((row) => toView(row, true))];
}

function direction(inOut: string | null): ParameterDirection {
  if (inOut === 'OUT') return 'OUT';
  if (inOut === 'IN/OUT') return 'INOUT';
  return 'IN';
}

/** Concatenates ALL_SOURCE lines, keyed by `owner.name.type`. */
async function readSource(runner: QueryRunner, types: string): Promise<Map<string, string>> {
  const rows = await fetchRows(
    runner,
    `
      /* Source lines */
      SELECT
        s.owner AS "schema_name",
        s.name AS "object_name",
        s.type AS "object_type",
        s.text AS "line_text"
      FROM all_source s
      WHERE s.type IN (${types}) AND ${userOwner('s.owner')}
      ORDER BY s.owner, s.name, s.type, s.line
    `,
    sourceRow,
  );
  const source = new Map<string, string>();
  for (const row of rows) {
    const key = `${row.schema_name}.${row.object_name}.${row.object_type}`;
    source.set(key, (source.get(key) ?? '') + (row.line_text ?? ''));
  }
  return source;
}

async function listRoutines(runner: QueryRunner): Promise<Routine[]> {
  const routines = await fetchRows(
    runner,
    `
      /* Routine source code */
      SELECT
        p.owner AS "schema_name",
        p.object_name AS "routine_name",
        p.object_type AS "object_type"
      FROM all_procedures p
      WHERE p.object_type IN ('PROCEDURE', 'FUNCTION') AND ${userOwner('p.owner')}
      ORDER BY p.owner, p.object_name
    `,
    routineRow,
  );
  const source = await readSource(runner, `'PROCEDURE', 'FUNCTION'`);
  const args = await fetchRows(
    runner,
    `
      /* Routine parameters */
      SELECT
        a.owner AS "schema_name",
        a.object_name AS "routine_name",
        a.position AS "position",
        a.argument_name AS "argument_name",
        NVL(a.type_name, a.data_type) AS "data_type",
        a.data_length AS "data_length",
        a.data_precision AS "data_precision",
        a.data_scale AS "data_scale",
        a.in_out AS "in_out",
        a.default_value AS "default_value"
      FROM all_arguments a
      WHERE a.package_name IS NULL AND a.data_level = 0 AND ${userOwner('a.owner')}
      ORDER BY a.owner, a.object_name, a.position
    `,
    argumentRow,
  );
  const argsByRoutine = groupBy(args, (row) => `${row.schema_name}.${row.routine_name}`);

  return routines.map((row) => {
    const routineArgs = argsByRoutine[`${row.schema_name}.${row.routine_name}`] ?? [];
    const isFunction = row.object_type === 'FUNCTION';
    const result = isFunction ? routineArgs.find((arg) => arg.position === 0) : undefined;
    return {
      id: identifier(row.schema_name, row.routine_name),
      kind: isFunction ? 'function' : 'procedure',
      parameters: routineArgs
        .filter((arg) => arg.position > 0 && arg.argument_name != null && arg.data_type != null)
        .map((arg) => ({
          name: arg.argument_name ?? `P${arg.position}`,
          dataType: oracleType(arg.data_type ?? '', arg.data_length, arg.data_precision, arg.data_scale),
          direction: direction(arg.in_out),
          default: tidyText(arg.default_value),
        })),
      returns:
        result?.data_type != null
          ? {
              kind: 'scalar',
              dataType: oracleType(result.data_type, result.data_length, result.data_precision, result.data_scale),
            }
          : null,
      language: 'PL/SQL',
      definition: tidyText(source.get(`${row.schema_name}.${row.routine_name}.${row.object_type}`)),
      description: null,
    };
  });
}

/** Reads the timing out of ALL_TRIGGERS.TRIGGER_TYPE (`BEFORE EACH ROW`, `INSTEAD OF`, ...). */
export function triggerTiming(triggerType: string): TriggerTiming {
  const upper = triggerType.toUpperCase();
  if (upper.includes('BEFORE')) return 'BEFORE';
  if (upper.includes('INSTEAD OF')) return 'INSTEAD_OF';
  return 'AFTER';
}

/** Splits ALL_TRIGGERS.TRIGGERING_EVENT (`INSERT OR UPDATE`) into DML events. */
export function triggerEvents(triggeringEvent: string): TriggerEvent[] {
  const events: TriggerEvent[] = [];
  for (const part of triggeringEvent.toUpperCase().split(/\s+OR\s+/)) {
    const event = part.trim();
    if (event === 'INSERT' || event === 'UPDATE' || event === 'DELETE') events.push(event);
  }
  return events;
}

async function listTriggers(runner: QueryRunner): Promise<Trigger[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Trigger metadata */
      SELECT
        t.owner AS "schema_name",
        t.trigger_name AS "trigger_name",
        t.table_owner AS "table_schema",
        t.table_name AS "table_name",
        t.trigger_type AS "trigger_type",
        t.triggering_event AS "triggering_event",
        t.status AS "status",
        t.description AS "header",
        t.trigger_body AS "body"
      FROM all_triggers t
      WHERE t.base_object_type IN ('TABLE', 'VIEW') AND ${userOwner('t.owner')}
      ORDER BY t.owner, t.trigger_name
    `,
    triggerRow,
  );
  return rows.map((row) => ({
    id: identifier(row.schema_name, row.trigger_name),
    table: identifier(row.table_schema, row.table_name),
    timing: triggerTiming(row.trigger_type),
    events: triggerEvents(row.triggering_event),
    enabled: row.status === 'ENABLED',
    definition: tidyText([row.header, row.body].filter((part) => part != null).join('')),
    description: null,
  }));
}

async function listTypes(runner: QueryRunner): Promise<UserDefinedType[]> {
  const types = await fetchRows(
    runner,
    `
      /* User-defined types */
      SELECT
        t.owner AS "schema_name",
        t.type_name AS "type_name",
        t.typecode AS "typecode",
        ct.elem_type_name AS "element_type",
        ct.length AS "element_length",
        ct.precision AS "element_precision",
        ct.scale AS "element_scale"
      FROM all_types t
      LEFT JOIN all_coll_types ct ON ct.owner = t.owner AND ct.type_name = t.type_name
      WHERE t.typecode IN ('OBJECT', 'COLLECTION') AND ${userOwner('t.owner')}
      ORDER BY t.owner, t.type_name
    `,
    typeRow,
  );
  const members = await fetchRows(
    runner,
    `
      /* Object type attributes */
      SELECT
        a.owner AS "schema_name",
        a.type_name AS "type_name",
        a.attr_name AS "attr_name",
        a.attr_type_name AS "attr_type",
        a.length AS "attr_length",
        a.precision AS "attr_precision",
        a.scale AS "attr_scale"
      FROM all_type_attrs a
      WHERE ${userOwner('a.owner')}
      ORDER BY a.owner, a.type_name, a.attr_no
    `,
    typeMemberRow,
  );
  const membersByType = groupBy(members, (row) => `${row.schema_name}.${row.type_name}`);

  return types.map((row) => {
    const isCollection = row.typecode === 'COLLECTION';
    return {
      id: identifier(row.schema_name, row.type_name),
      category: isCollection ? 'TABLE_TYPE' : 'COMPOSITE',
      baseType:
        isCollection && row.element_type
          ? oracleType(row.element_type, row.element_length, row.element_precision, row.element_scale)
          : null,
      nullable: true,
      members: (membersByType[`${row.schema_name}.${row.type_name}`] ?? []).map((member) => ({
        name: member.attr_name,
        dataType: oracleType(member.attr_type, member.attr_length, member.attr_precision, member.attr_scale),
        nullable: true,
      })),
      enumValues: [],
      check: null,
      description: null,
    };
  });
}

async function listSequences(runner: QueryRunner): Promise<SequenceDraft[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Sequences */
      SELECT
        s.sequence_owner AS "schema_name",
        s.sequence_name AS "sequence_name",
        TO_CHAR(CASE WHEN s.increment_by > 0 THEN s.min_value ELSE s.max_value END) AS "start_value",
        TO_CHAR(s.increment_by) AS "increment",
        TO_CHAR(s.min_value) AS "min_value",
        TO_CHAR(s.max_value) AS "max_value",
        s.cycle_flag AS "cycle_flag",
        TO_CHAR(s.cache_size) AS "cache_size",
        TO_CHAR(s.last_number) AS "last_number"
      FROM all_sequences s
      WHERE ${userOwner('s.sequence_owner')}
        AND s.sequence_name NOT LIKE 'ISEQ$$%'
      ORDER BY s.sequence_owner, s.sequence_name
    `,
    sequenceRow,
  );
  return rows.map((row) => ({
    id: identifier(row.schema_name, row.sequence_name),
    dataType: 'NUMBER',
    start: row.start_value,
    increment: row.increment,
    min: row.min_value,
    max: row.max_value,
    cycle: row.cycle_flag,
    cache: row.cache_size,
    current: row.last_number,
    description: null,
  }));
}

async function listSynonyms(runner: QueryRunner): Promise<Synonym[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Synonyms */
      SELECT
        s.owner AS "schema_name",
        s.synonym_name AS "synonym_name",
        s.table_owner AS "table_owner",
        s.table_name AS "table_name",
        s.db_link AS "db_link"
      FROM all_synonyms s
      WHERE ${userOwner('s.owner')}
      ORDER BY s.owner, s.synonym_name
    `,
    synonymRow,
  );
  return rows.map((row) => {
    const targetSchema = row.table_owner ?? row.schema_name;
    const base = `${targetSchema}.${row.table_name}`;
    return {
      id: identifier(row.schema_name, row.synonym_name),
      target: identifier(targetSchema, row.table_name),
      targetServer: row.db_link,
      targetDatabase: null,
      baseObject: row.db_link ? `${base}@${row.db_link}` : base,
      description: null,
    };
  });
}

async function listSecurity(runner: QueryRunner): Promise<SecurityPrincipal[]> {
  const principals = await fetchRows(
    runner,
    `
      /* Database principals */
      SELECT u.username AS "principal_name", 'USER' AS "principal_kind"
      FROM all_users u
      WHERE u.oracle_maintained = 'N'
      UNION
      SELECT DISTINCT p.grantee, 'ROLE'
      FROM all_tab_privs p
      WHERE p.grantee <> 'PUBLIC'
        AND NOT EXISTS (SELECT 1 FROM all_users u WHERE u.username = p.grantee)
        AND ${userOwner('p.table_schema')}
    `,
    principalRow,
  );
  const memberships = await fetchRows(
    runner,
    `
      /* Role memberships */
      SELECT r.username AS "member_name", r.granted_role AS "role_name"
      FROM user_role_privs r
      ORDER BY r.username, r.granted_role
    `,
    membershipRow,
  );
  const privileges = await fetchRows(
    runner,
    `
      /* Object privileges */
      SELECT
        p.grantee AS "grantee",
        p.table_schema AS "schema_name",
        p.table_name AS "object_name",
        p.privilege AS "privilege",
        p.grantable AS "grantable"
      FROM all_tab_privs p
      WHERE ${userOwner('p.table_schema')}
      ORDER BY p.grantee, p.table_schema, p.table_name, p.privilege
    `,
    privilegeRow,
  );

  const membershipsByMember = groupBy(memberships, (row) => row.member_name);
  const privilegesByGrantee = groupBy(privileges, (row) => row.grantee);

  return principals.map((row) => ({
    kind: row.principal_kind === 'ROLE' ? 'ROLE' : 'USER',
    name: row.principal_name,
    permissions: (privilegesByGrantee[row.principal_name] ?? []).map((grant) => ({
      privilege: grant.privilege,
      object: identifier(grant.schema_name, grant.object_name),
      state: grant.grantable ? 'GRANT_WITH_GRANT_OPTION' : 'GRANT',
    })),
    memberOf: (membershipsByMember[row.principal_name] ?? []).map((membership) => membership.role_name),
  }));
}

async function version(runner: QueryRunner): Promise<string | null> {
  const rows = await fetchRows(
    runner,
    `SELECT product || ' ' || version AS "version" FROM product_component_version WHERE product LIKE 'Oracle%' AND ROWNUM = 1`,
    z.object({ version: optionalText }),
  );
  return rows[0]?.version ?? null;
}

export const oracleDialect = defineDialect({
  dialect: 'oracle',
  label: 'Oracle Database',
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
    synonyms: listSynonyms,
    security: listSecurity,
  },
});
