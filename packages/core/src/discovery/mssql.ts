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
  ReturnShape,
  Routine,
  SecurityPrincipal,
  Synonym,
  Trigger,
  TriggerEvent,
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

const USER_SCHEMA = `s.name NOT IN ('sys', 'INFORMATION_SCHEMA', 'guest') AND s.schema_id < 16384`;

const descriptionOf = (majorId: string, minorId = '0') => `
  (
    SELECT CAST(ep.value AS nvarchar(max))
    FROM sys.extended_properties ep
    WHERE ep.class = 1 AND ep.major_id = ${majorId} AND ep.minor_id = ${minorId} AND ep.name = 'MS_Description'
  )
`;

const typed = {
  type_name: text,
  system_type: optionalText,
  is_user_defined: flag,
  max_length: optionalInt,
  precision: optionalInt,
  scale: optionalInt,
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
  ...typed,
  is_nullable: flag,
  column_default: optionalText,
  is_identity: flag,
  identity_seed: exact,
  identity_increment: exact,
  computed_definition: optionalText,
  collation_name: optionalText,
  description: optionalText,
});

const keyColumnRow = z.object({
  schema_name: text,
  table_name: text,
  constraint_name: text,
  index_type: optionalText,
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
  delete_action: optionalText,
  update_action: optionalText,
});

const checkRow = z.object({
  schema_name: text,
  table_name: text,
  constraint_name: text,
  definition: text,
});

const indexRow = z.object({
  schema_name: text,
  table_name: text,
  index_name: text,
  is_unique: flag,
  is_primary: flag,
  is_clustered: flag,
  index_type: optionalText,
  filter_definition: optionalText,
  is_included: flag,
  column_name: text,
});

const viewRow = z.object({
  schema_name: text,
  view_name: text,
  is_indexed: flag,
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
  definition: optionalText,
  description: optionalText,
});

const parameterRow = z.object({
  schema_name: text,
  routine_name: text,
  parameter_id: int,
  parameter_name: optionalText,
  ...typed,
  is_output: flag,
  default_value: optionalText,
});

const resultColumnRow = z.object({
  schema_name: text,
  routine_name: text,
  column_name: text,
  ...typed,
  is_nullable: flag,
});

const triggerRow = z.object({
  schema_name: text,
  trigger_name: text,
  table_name: text,
  is_instead_of: flag,
  is_insert: flag,
  is_update: flag,
  is_delete: flag,
  is_disabled: flag,
  definition: optionalText,
  description: optionalText,
});

const typeRow = z.object({
  schema_name: text,
  type_name: text,
  is_table_type: flag,
  base_type: optionalText,
  max_length: optionalInt,
  precision: optionalInt,
  scale: optionalInt,
  is_nullable: flag,
  description: optionalText,
});

const typeMemberRow = z.object({
  schema_name: text,
  type_name: text,
  column_name: text,
  member_type: text,
  system_type: optionalText,
  is_user_defined: flag,
  max_length: optionalInt,
  precision: optionalInt,
  scale: optionalInt,
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

const synonymRow = z.object({
  schema_name: text,
  synonym_name: text,
  base_object_name: text,
  description: optionalText,
});

const principalRow = z.object({ principal_name: text, principal_type: text });

const membershipRow = z.object({ member_name: text, role_name: text });

const permissionRow = z.object({
  grantee: text,
  schema_name: text,
  object_name: text,
  permission_name: text,
  state: text,
});

interface TypedRow {
  type_name: string;
  system_type: string | null;
  is_user_defined: boolean;
  max_length: number | null;
  precision: number | null;
  scale: number | null;
}

function dataType(row: TypedRow): DataType {
  const spec = {
    name: row.is_user_defined && row.system_type ? row.system_type : row.type_name,
    length: row.max_length,
    precision: row.precision,
    scale: row.scale,
  };
  const normalized = normalizeType('mssql', spec);
  return row.is_user_defined ? { ...normalized, native: row.type_name } : normalized;
}

function tableKey(row: { schema_name: string; table_name: string }): string {
  return `${row.schema_name}.${row.table_name}`;
}

async function listSchemas(runner: QueryRunner): Promise<string[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Schemas */
      SELECT s.name AS schema_name
      FROM sys.schemas s
      WHERE ${USER_SCHEMA}
      ORDER BY s.name
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
        s.name AS schema_name,
        t.name AS table_name,
        (
          SELECT SUM(p.rows) FROM sys.partitions p
          WHERE p.object_id = t.object_id AND p.index_id IN (0, 1)
        ) AS row_count,
        (
          SELECT SUM(a.total_pages) * 8 FROM sys.partitions p
          JOIN sys.allocation_units a ON a.container_id = p.partition_id
          WHERE p.object_id = t.object_id
        ) AS size_kb,
        ${descriptionOf('t.object_id')} AS description
      FROM sys.tables t
      JOIN sys.schemas s ON s.schema_id = t.schema_id
      WHERE t.is_ms_shipped = 0 AND ${USER_SCHEMA}
      ORDER BY s.name, t.name
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

function columnSql(source: 'sys.tables' | 'sys.views'): string {
  return `
    /* Column metadata */
    SELECT
      s.name AS schema_name,
      o.name AS table_name,
      c.name AS column_name,
      ROW_NUMBER() OVER (PARTITION BY c.object_id ORDER BY c.column_id) AS ordinal,
      ty.name AS type_name,
      TYPE_NAME(c.system_type_id) AS system_type,
      ty.is_user_defined,
      c.max_length,
      c.precision,
      c.scale,
      c.is_nullable,
      dc.definition AS column_default,
      c.is_identity,
      CAST(ic.seed_value AS nvarchar(40)) AS identity_seed,
      CAST(ic.increment_value AS nvarchar(40)) AS identity_increment,
      cc.definition AS computed_definition,
      c.collation_name,
      ${descriptionOf('c.object_id', 'c.column_id')} AS description
    FROM sys.columns c
    JOIN ${source} o ON o.object_id = c.object_id
    JOIN sys.schemas s ON s.schema_id = o.schema_id
    JOIN sys.types ty ON ty.user_type_id = c.user_type_id
    LEFT JOIN sys.default_constraints dc ON dc.object_id = c.default_object_id
    LEFT JOIN sys.identity_columns ic ON ic.object_id = c.object_id AND ic.column_id = c.column_id
    LEFT JOIN sys.computed_columns cc ON cc.object_id = c.object_id AND cc.column_id = c.column_id
    WHERE o.is_ms_shipped = 0 AND ${USER_SCHEMA}
    ORDER BY s.name, o.name, c.column_id
  `;
}

async function listColumns(runner: QueryRunner): Promise<ColumnRecord[]> {
  const rows = await fetchRows(runner, columnSql('sys.tables'), columnRow);
  return rows.map((row) => {
    const column: ColumnRecord['column'] = {
      name: row.column_name,
      ordinal: row.ordinal,
      dataType: dataType(row),
      nullable: row.is_nullable,
      default: row.column_default,
      autoIncrement: row.is_identity,
      computed: row.computed_definition,
      collation: row.collation_name,
      description: tidyText(row.description),
    };
    if (row.is_identity) {
      if (row.identity_seed != null) column.identitySeed = row.identity_seed;
      if (row.identity_increment != null) column.identityIncrement = row.identity_increment;
    }
    return { table: identifier(row.schema_name, row.table_name), column };
  });
}

function keyConstraintSql(type: 'PK' | 'UQ', label: string): string {
  return `
    /* ${label} */
    SELECT
      s.name AS schema_name,
      t.name AS table_name,
      kc.name AS constraint_name,
      i.type_desc AS index_type,
      c.name AS column_name
    FROM sys.key_constraints kc
    JOIN sys.tables t ON t.object_id = kc.parent_object_id
    JOIN sys.schemas s ON s.schema_id = t.schema_id
    JOIN sys.indexes i ON i.object_id = kc.parent_object_id AND i.index_id = kc.unique_index_id
    JOIN sys.index_columns ic ON ic.object_id = i.object_id AND ic.index_id = i.index_id
    JOIN sys.columns c ON c.object_id = ic.object_id AND c.column_id = ic.column_id
    WHERE kc.type = '${type}' AND t.is_ms_shipped = 0 AND ${USER_SCHEMA}
    ORDER BY s.name, t.name, kc.name, ic.key_ordinal
  `;
}

type KeyColumnRow = z.output<typeof keyColumnRow>;

async function listPrimaryKeys(runner: QueryRunner): Promise<PrimaryKeyRecord[]> {
  const rows = await fetchRows(runner, keyConstraintSql('PK', 'Primary key columns'), keyColumnRow);
  return collect<KeyColumnRow, PrimaryKeyRecord>(
    rows,
    tableKey,
    (row) => ({
      table: identifier(row.schema_name, row.table_name),
      primaryKey: { name: row.constraint_name, columns: [], clustered: row.index_type === 'CLUSTERED' },
    }),
    (record, row) => record.primaryKey.columns.push(row.column_name),
  );
}

async function listUniqueConstraints(runner: QueryRunner): Promise<UniqueConstraintRecord[]> {
  const rows = await fetchRows(runner, keyConstraintSql('UQ', 'Unique constraints'), keyColumnRow);
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
        s.name AS schema_name,
        t.name AS table_name,
        fk.name AS constraint_name,
        pc.name AS column_name,
        OBJECT_SCHEMA_NAME(fk.referenced_object_id) AS referenced_schema,
        OBJECT_NAME(fk.referenced_object_id) AS referenced_table,
        rc.name AS referenced_column,
        fk.delete_referential_action_desc AS delete_action,
        fk.update_referential_action_desc AS update_action
      FROM sys.foreign_keys fk
      JOIN sys.tables t ON t.object_id = fk.parent_object_id
      JOIN sys.schemas s ON s.schema_id = t.schema_id
      JOIN sys.foreign_key_columns fkc ON fkc.constraint_object_id = fk.object_id
      JOIN sys.columns pc ON pc.object_id = fkc.parent_object_id AND pc.column_id = fkc.parent_column_id
      JOIN sys.columns rc ON rc.object_id = fkc.referenced_object_id AND rc.column_id = fkc.referenced_column_id
      WHERE t.is_ms_shipped = 0 AND ${USER_SCHEMA}
      ORDER BY s.name, t.name, fk.name, fkc.constraint_column_id
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
        onDelete: normalizeReferentialAction(row.delete_action),
        onUpdate: normalizeReferentialAction(row.update_action),
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
        s.name AS schema_name,
        t.name AS table_name,
        cc.name AS constraint_name,
        cc.definition
      FROM sys.check_constraints cc
      JOIN sys.tables t ON t.object_id = cc.parent_object_id
      JOIN sys.schemas s ON s.schema_id = t.schema_id
      WHERE t.is_ms_shipped = 0 AND ${USER_SCHEMA}
      ORDER BY s.name, t.name, cc.name
    `,
    checkRow,
  );
  return rows.map((row) => ({
    table: identifier(row.schema_name, row.table_name),
    check: { name: row.constraint_name, expression: row.definition },
  }));
}

async function listIndexes(runner: QueryRunner): Promise<IndexRecord[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Index definitions */
      SELECT
        s.name AS schema_name,
        t.name AS table_name,
        i.name AS index_name,
        i.is_unique,
        i.is_primary_key AS is_primary,
        CASE WHEN i.type IN (1, 5) THEN 1 ELSE 0 END AS is_clustered,
        i.type_desc AS index_type,
        i.filter_definition,
        ic.is_included_column AS is_included,
        c.name AS column_name
      FROM sys.indexes i
      JOIN sys.tables t ON t.object_id = i.object_id
      JOIN sys.schemas s ON s.schema_id = t.schema_id
      JOIN sys.index_columns ic ON ic.object_id = i.object_id AND ic.index_id = i.index_id
      JOIN sys.columns c ON c.object_id = ic.object_id AND c.column_id = ic.column_id
      WHERE i.type > 0 AND i.is_hypothetical = 0 AND t.is_ms_shipped = 0 AND ${USER_SCHEMA}
      ORDER BY s.name, t.name, i.name, ic.is_included_column, ic.key_ordinal, ic.index_column_id
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
        unique: row.is_unique,
        primary: row.is_primary,
        clustered: row.is_clustered,
        columns: [],
        expressions: [],
        includedColumns: [],
        method: row.index_type,
        filter: row.filter_definition,
      },
    }),
    (record, row) => {
      if (row.is_included) record.index.includedColumns.push(row.column_name);
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
        s.name AS schema_name,
        v.name AS view_name,
        OBJECTPROPERTY(v.object_id, 'IsIndexed') AS is_indexed,
        OBJECT_DEFINITION(v.object_id) AS definition,
        ${descriptionOf('v.object_id')} AS description
      FROM sys.views v
      JOIN sys.schemas s ON s.schema_id = v.schema_id
      WHERE v.is_ms_shipped = 0 AND ${USER_SCHEMA}
      ORDER BY s.name, v.name
    `,
    viewRow,
  );
  const columns = await fetchRows(runner, columnSql('sys.views'), columnRow);
  const dependencies = await fetchRows(
    runner,
    `
      /* View dependencies */
      SELECT DISTINCT
        s.name AS view_schema,
        v.name AS view_name,
        OBJECT_SCHEMA_NAME(o.object_id) AS table_schema,
        o.name AS table_name
      FROM sys.sql_expression_dependencies d
      JOIN sys.views v ON v.object_id = d.referencing_id
      JOIN sys.schemas s ON s.schema_id = v.schema_id
      JOIN sys.objects o ON o.object_id = d.referenced_id
      WHERE o.type IN ('U', 'V') AND ${USER_SCHEMA}
    `,
    viewDependencyRow,
  );

  const columnsByView = groupBy(columns, tableKey);
  const dependenciesByView = groupBy(dependencies, (row) => `${row.view_schema}.${row.view_name}`);

  return views.map((row) => {
    const key = `${row.schema_name}.${row.view_name}`;
    return {
      id: identifier(row.schema_name, row.view_name),
      columns: (columnsByView[key] ?? []).map((column) => ({
        name: column.column_name,
        dataType: dataType(column),
        nullable: column.is_nullable,
        description: tidyText(column.description),
      })),
      definition: tidyText(row.definition),
      baseTables: (dependenciesByView[key] ?? []).map((dep) => identifier(dep.table_schema, dep.table_name)),
      materialized: row.is_indexed,
      description: tidyText(row.description),
    };
  });
}

const PROCEDURE_TYPES = new Set(['P', 'PC']);
const TABLE_FUNCTION_TYPES = new Set(['IF', 'TF', 'FT']);
const CLR_TYPES = new Set(['PC', 'FS', 'FT']);

async function listRoutines(runner: QueryRunner): Promise<Routine[]> {
  const routines = await fetchRows(
    runner,
    `
      /* Routine source code */
      SELECT
        s.name AS schema_name,
        o.name AS routine_name,
        RTRIM(o.type) AS object_type,
        OBJECT_DEFINITION(o.object_id) AS definition,
        ${descriptionOf('o.object_id')} AS description
      FROM sys.objects o
      JOIN sys.schemas s ON s.schema_id = o.schema_id
      WHERE o.type IN ('P', 'PC', 'FN', 'IF', 'TF', 'FS', 'FT') AND o.is_ms_shipped = 0 AND ${USER_SCHEMA}
      ORDER BY s.name, o.name
    `,
    routineRow,
  );
  const parameters = await fetchRows(
    runner,
    `
      /* Routine parameters */
      SELECT
        s.name AS schema_name,
        o.name AS routine_name,
        p.parameter_id,
        p.name AS parameter_name,
        ty.name AS type_name,
        TYPE_NAME(p.system_type_id) AS system_type,
        ty.is_user_defined,
        p.max_length,
        p.precision,
        p.scale,
        p.is_output,
        CASE WHEN p.has_default_value = 1 THEN CAST(p.default_value AS nvarchar(4000)) END AS default_value
      FROM sys.parameters p
      JOIN sys.objects o ON o.object_id = p.object_id
      JOIN sys.schemas s ON s.schema_id = o.schema_id
      JOIN sys.types ty ON ty.user_type_id = p.user_type_id
      WHERE o.type IN ('P', 'PC', 'FN', 'IF', 'TF', 'FS', 'FT') AND o.is_ms_shipped = 0 AND ${USER_SCHEMA}
      ORDER BY s.name, o.name, p.parameter_id
    `,
    parameterRow,
  );
  const resultColumns = await fetchRows(
    runner,
    `
      /* Table-valued function columns */
      SELECT
        s.name AS schema_name,
        o.name AS routine_name,
        c.name AS column_name,
        ty.name AS type_name,
        TYPE_NAME(c.system_type_id) AS system_type,
        ty.is_user_defined,
        c.max_length,
        c.precision,
        c.scale,
        c.is_nullable
      FROM sys.columns c
      JOIN sys.objects o ON o.object_id = c.object_id
      JOIN sys.schemas s ON s.schema_id = o.schema_id
      JOIN sys.types ty ON ty.user_type_id = c.user_type_id
      WHERE o.type IN ('IF', 'TF', 'FT') AND o.is_ms_shipped = 0 AND ${USER_SCHEMA}
      ORDER BY s.name, o.name, c.column_id
    `,
    resultColumnRow,
  );

  const routineKey = (row: { schema_name: string; routine_name: string }) => `${row.schema_name}.${row.routine_name}`;
  const paramsByRoutine = groupBy(parameters, routineKey);
  const columnsByRoutine = groupBy(resultColumns, routineKey);

  return routines.map((row) => {
    const key = routineKey(row);
    const params = paramsByRoutine[key] ?? [];
    const isProcedure = PROCEDURE_TYPES.has(row.object_type);

    let returns: ReturnShape | null = null;
    if (TABLE_FUNCTION_TYPES.has(row.object_type)) {
      returns = {
        kind: 'table',
        columns: (columnsByRoutine[key] ?? []).map((column) => ({
          name: column.column_name,
          dataType: dataType(column),
          nullable: column.is_nullable,
        })),
      };
    } else if (!isProcedure) {
      const result = params.find((param) => param.parameter_id === 0);
      if (result) returns = { kind: 'scalar', dataType: dataType(result) };
    }

    return {
      id: identifier(row.schema_name, row.routine_name),
      kind: isProcedure ? 'procedure' : 'function',
      parameters: params
        .filter((param) => param.parameter_id > 0)
        .map((param) => ({
          name: param.parameter_name ?? `@p${param.parameter_id}`,
          dataType: dataType(param),
          direction: param.is_output ? 'OUT' : 'IN',
          default: param.default_value,
        })),
      returns,
      language: CLR_TYPES.has(row.object_type) ? 'CLR' : 'SQL',
      definition: tidyText(row.definition),
      description: tidyText(row.description),
    };
  });
}

async function listTriggers(runner: QueryRunner): Promise<Trigger[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Trigger metadata */
      SELECT
        s.name AS schema_name,
        tr.name AS trigger_name,
        parent.name AS table_name,
        tr.is_instead_of_trigger AS is_instead_of,
        OBJECTPROPERTY(tr.object_id, 'ExecIsInsertTrigger') AS is_insert,
        OBJECTPROPERTY(tr.object_id, 'ExecIsUpdateTrigger') AS is_update,
        OBJECTPROPERTY(tr.object_id, 'ExecIsDeleteTrigger') AS is_delete,
        tr.is_disabled,
        OBJECT_DEFINITION(tr.object_id) AS definition,
        ${descriptionOf('tr.object_id')} AS description
      FROM sys.triggers tr
      JOIN sys.objects parent ON parent.object_id = tr.parent_id
      JOIN sys.schemas s ON s.schema_id = parent.schema_id
      WHERE tr.parent_class = 1 AND tr.is_ms_shipped = 0 AND ${USER_SCHEMA}
      ORDER BY s.name, tr.name
    `,
    triggerRow,
  );
  return rows.map((row) => {
    const events: TriggerEvent[] = [];
    if (row.is_insert) events.push('INSERT');
    if (row.is_update) events.push('UPDATE');
    if (row.is_delete) events.push('DELETE');
    return {
      id: identifier(row.schema_name, row.trigger_name),
      table: identifier(row.schema_name, row.table_name),
      timing: row.is_instead_of ? 'INSTEAD_OF' : 'AFTER',
      events,
      enabled: !row.is_disabled,
      definition: tidyText(row.definition),
      description: tidyText(row.description),
    };
  });
}

async function listTypes(runner: QueryRunner): Promise<UserDefinedType[]> {
  const types = await fetchRows(
    runner,
    `
      /* User-defined types */
      SELECT
        s.name AS schema_name,
        t.name AS type_name,
        t.is_table_type,
        TYPE_NAME(t.system_type_id) AS base_type,
        t.max_length,
        t.precision,
        t.scale,
        t.is_nullable,
        (
          SELECT CAST(ep.value AS nvarchar(max))
          FROM sys.extended_properties ep
          WHERE ep.class = 6 AND ep.major_id = t.user_type_id AND ep.minor_id = 0 AND ep.name = 'MS_Description'
        ) AS description
      FROM sys.types t
      JOIN sys.schemas s ON s.schema_id = t.schema_id
      WHERE t.is_user_defined = 1 AND t.is_assembly_type = 0 AND ${USER_SCHEMA}
      ORDER BY s.name, t.name
    `,
    typeRow,
  );
  const members = await fetchRows(
    runner,
    `
      /* Table type columns */
      SELECT
        s.name AS schema_name,
        tt.name AS type_name,
        c.name AS column_name,
        ty.name AS member_type,
        TYPE_NAME(c.system_type_id) AS system_type,
        ty.is_user_defined,
        c.max_length,
        c.precision,
        c.scale,
        c.is_nullable
      FROM sys.table_types tt
      JOIN sys.schemas s ON s.schema_id = tt.schema_id
      JOIN sys.columns c ON c.object_id = tt.type_table_object_id
      JOIN sys.types ty ON ty.user_type_id = c.user_type_id
      WHERE ${USER_SCHEMA}
      ORDER BY s.name, tt.name, c.column_id
    `,
    typeMemberRow,
  );
  const membersByType = groupBy(members, (row) => `${row.schema_name}.${row.type_name}`);

  return types.map((row) => ({
    id: identifier(row.schema_name, row.type_name),
    category: row.is_table_type ? 'TABLE_TYPE' : 'ALIAS',
    baseType:
      row.is_table_type || !row.base_type
        ? null
        : normalizeType('mssql', {
            name: row.base_type,
            length: row.max_length,
            precision: row.precision,
            scale: row.scale,
          }),
    nullable: row.is_nullable,
    members: (membersByType[`${row.schema_name}.${row.type_name}`] ?? []).map((member) => ({
      name: member.column_name,
      dataType: dataType({ ...member, type_name: member.member_type }),
      nullable: member.is_nullable,
    })),
    enumValues: [],
    check: null,
    description: tidyText(row.description),
  }));
}

async function listSequences(runner: QueryRunner): Promise<SequenceDraft[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Sequences */
      SELECT
        s.name AS schema_name,
        seq.name AS sequence_name,
        TYPE_NAME(seq.user_type_id) AS data_type,
        CAST(seq.start_value AS nvarchar(40)) AS start_value,
        CAST(seq.increment AS nvarchar(40)) AS increment,
        CAST(seq.minimum_value AS nvarchar(40)) AS min_value,
        CAST(seq.maximum_value AS nvarchar(40)) AS max_value,
        seq.is_cycling,
        CASE WHEN seq.is_cached = 1 THEN seq.cache_size END AS cache_size,
        CAST(seq.current_value AS nvarchar(40)) AS current_value,
        ${descriptionOf('seq.object_id')} AS description
      FROM sys.sequences seq
      JOIN sys.schemas s ON s.schema_id = seq.schema_id
      WHERE ${USER_SCHEMA}
      ORDER BY s.name, seq.name
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

export interface BaseObjectName {
  server: string | null;
  database: string | null;
  schema: string | null;
  object: string;
}

/** Splits a multi-part name on the dots outside `[...]` or `"..."` quoting; `]]` and `""` are escapes. */
function splitNameParts(value: string): string[] {
  const parts: string[] = [];
  let current = '';
  let closing: string | null = null;
  for (let i = 0; i < value.length; i += 1) {
    const char = value.charAt(i);
    if (closing !== null) {
      if (char !== closing) {
        current += char;
      } else if (value.charAt(i + 1) === closing) {
        current += char;
        i += 1;
      } else {
        closing = null;
      }
    } else if (char === '[') {
      closing = ']';
    } else if (char === '"') {
      closing = '"';
    } else if (char === '.') {
      parts.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  parts.push(current);
  return parts;
}

/** Splits a synonym's `[server].[database].[schema].[object]` text into its parts. */
export function parseBaseObject(value: string): BaseObjectName {
  const parts = splitNameParts(value);
  const part = (index: number) => parts[index] || null;
  const object = parts[parts.length - 1] || value;
  switch (parts.length) {
    case 1:
      return { server: null, database: null, schema: null, object };
    case 2:
      return { server: null, database: null, schema: part(0), object };
    case 3:
      return { server: null, database: part(0), schema: part(1), object };
    default:
      return { server: part(0), database: part(1), schema: part(2), object: parts[3] || value };
  }
}

async function listSynonyms(runner: QueryRunner): Promise<Synonym[]> {
  const rows = await fetchRows(
    runner,
    `
      /* Synonyms */
      SELECT
        s.name AS schema_name,
        syn.name AS synonym_name,
        syn.base_object_name,
        ${descriptionOf('syn.object_id')} AS description
      FROM sys.synonyms syn
      JOIN sys.schemas s ON s.schema_id = syn.schema_id
      WHERE ${USER_SCHEMA}
      ORDER BY s.name, syn.name
    `,
    synonymRow,
  );
  return rows.map((row) => {
    const parsed = parseBaseObject(row.base_object_name);
    return {
      id: identifier(row.schema_name, row.synonym_name),
      target: identifier(parsed.schema ?? row.schema_name, parsed.object),
      targetServer: parsed.server,
      targetDatabase: parsed.database,
      baseObject: row.base_object_name,
      description: tidyText(row.description),
    };
  });
}

async function listSecurity(runner: QueryRunner): Promise<SecurityPrincipal[]> {
  const principals = await fetchRows(
    runner,
    `
      /* Database principals */
      SELECT dp.name AS principal_name, dp.type AS principal_type
      FROM sys.database_principals dp
      WHERE dp.type IN ('S', 'U', 'G', 'E', 'X', 'R') AND dp.name NOT IN ('sys', 'INFORMATION_SCHEMA')
      ORDER BY dp.name
    `,
    principalRow,
  );
  const memberships = await fetchRows(
    runner,
    `
      /* Role memberships */
      SELECT m.name AS member_name, r.name AS role_name
      FROM sys.database_role_members rm
      JOIN sys.database_principals r ON r.principal_id = rm.role_principal_id
      JOIN sys.database_principals m ON m.principal_id = rm.member_principal_id
      ORDER BY m.name, r.name
    `,
    membershipRow,
  );
  const permissions = await fetchRows(
    runner,
    `
      /* Object permissions */
      SELECT
        dp.name AS grantee,
        s.name AS schema_name,
        o.name AS object_name,
        p.permission_name,
        p.state_desc AS state
      FROM sys.database_permissions p
      JOIN sys.database_principals dp ON dp.principal_id = p.grantee_principal_id
      JOIN sys.objects o ON o.object_id = p.major_id
      JOIN sys.schemas s ON s.schema_id = o.schema_id
      WHERE p.class = 1 AND ${USER_SCHEMA}
      ORDER BY dp.name, s.name, o.name, p.permission_name
    `,
    permissionRow,
  );

  const membershipsByMember = groupBy(memberships, (row) => row.member_name);
  const permissionsByGrantee = groupBy(permissions, (row) => row.grantee);

  return principals.map((row) => ({
    kind: row.principal_type.trim() === 'R' ? 'ROLE' : 'USER',
    name: row.principal_name,
    permissions: (permissionsByGrantee[row.principal_name] ?? []).map((permission) => ({
      privilege: permission.permission_name,
      object: identifier(permission.schema_name, permission.object_name),
      state: permission.state,
    })),
    memberOf: (membershipsByMember[row.principal_name] ?? []).map((membership) => membership.role_name),
  }));
}

async function version(runner: QueryRunner): Promise<string | null> {
  const rows = await fetchRows(runner, 'SELECT @@VERSION AS version', z.object({ version: optionalText }));
  return rows[0]?.version ?? null;
}

export const mssqlDialect = defineDialect({
  dialect: 'mssql',
  label: 'Microsoft SQL Server',
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
