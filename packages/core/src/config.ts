import { z } from 'zod';

import { ConfigurationError, FilterConflictError } from './errors';
import { foldCase } from './normalize';
import { DATABASE_KINDS, OBJECT_TYPES, type DatabaseKind, type ObjectType } from './types';

export const DEFAULT_PORTS: Record<DatabaseKind, number | null> = {
  mssql: 1433,
  postgres: 5432,
  mysql: 3306,
  oracle: 1521,
  sqlite: null,
};

export const DEFAULT_EXCLUDED_SCHEMAS: Record<DatabaseKind, readonly string[]> = {
  mssql: ['sys', 'INFORMATION_SCHEMA', 'guest'],
  postgres: ['pg_catalog', 'information_schema', 'pg_toast'],
  mysql: ['information_schema', 'performance_schema', 'mysql', 'sys'],
  oracle: [
    'SYS',
    'SYSTEM',
    'OUTLN',
    'DIP',
    'ORACLE_OCM',
    'DBSNMP',
    'APPQOSSYS',
    'WMSYS',
    'EXFSYS',
    'CTXSYS',
    'XDB',
    'ORDDATA',
    'ORDSYS',
    'MDSYS',
    'OLAPSYS',
    'ANONYMOUS',
    'FLOWS_FILES',
  ],
  sqlite: [],
};

const databaseKindSchema = z.enum(['postgres', 'mysql', 'mssql', 'oracle', 'sqlite']);

const objectTypeSchema = z.enum([
  'tables',
  'views',
  'procedures',
  'functions',
  'triggers',
  'types',
  'sequences',
  'synonyms',
  'security',
  'all',
]);

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

export const connectionInputSchema = z.object({
  dialect: databaseKindSchema,
  host: optionalText,
  port: z.coerce.number().int().positive().max(65535).optional(),
  database: optionalText,
  user: optionalText,
  password: z.string().optional(),
  connectionString: optionalText,
  trusted: z.boolean().default(false),
  serviceName: optionalText,
  sid: optionalText,
  path: optionalText,
});

export type ConnectionInput = z.input<typeof connectionInputSchema>;

export interface ConnectionConfig {
  dialect: DatabaseKind;
  host: string;
  port: number | null;
  database: string;
  user?: string;
  password?: string;
  connectionString?: string;
  trusted: boolean;
  serviceName?: string;
  sid?: string;
  path?: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Database name used for the output directory and the snapshot title. */
function databaseLabel(input: z.output<typeof connectionInputSchema>): string {
  if (input.database) return input.database;
  if (input.dialect === 'sqlite' && input.path) {
    const base = input.path.split(/[\\/]/).pop() ?? input.path;
    return base.replace(/\.[^.]+$/, '') || base;
  }
  if (input.dialect === 'oracle') return input.serviceName ?? input.sid ?? '';
  if (input.connectionString) {
    try {
      return decodeURIComponent(new URL(input.connectionString).pathname.replace(/^\//, ''));
    } catch {
      return '';
    }
  }
  return '';
}

function requirementErrors(input: z.output<typeof connectionInputSchema>): string[] {
  const errors: string[] = [];
  switch (input.dialect) {
    case 'sqlite':
      if (!input.path && !input.database) errors.push('SQLite requires a database file path');
      break;
    case 'mssql':
      if (input.connectionString) break;
      if (!input.host) errors.push('SQL Server requires a host');
      if (!input.database) errors.push('SQL Server requires a database');
      if (!input.trusted && (!input.user || input.password == null)) {
        errors.push('SQL Server requires a username and password, or trusted authentication');
      }
      break;
    case 'oracle':
      if (!input.host) errors.push('Oracle requires a host');
      if (!input.serviceName && !input.sid) errors.push('Oracle requires a service name or SID');
      if (!input.user || input.password == null) errors.push('Oracle requires a username and password');
      break;
    case 'postgres':
    case 'mysql':
      if (input.connectionString) break;
      if (!input.host) errors.push(`${input.dialect} requires a host`);
      if (!input.database) errors.push(`${input.dialect} requires a database`);
      if (!input.user) errors.push(`${input.dialect} requires a username`);
      break;
  }
  return errors;
}

export function resolveConnectionConfig(input: ConnectionInput): ConnectionConfig {
  const parsed = connectionInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid connection configuration: ${formatIssues(parsed.error)}`);
  }
  const value = parsed.data;
  const errors = requirementErrors(value);
  if (errors.length > 0) {
    throw new ConfigurationError(errors.join('; '));
  }

  const config: ConnectionConfig = {
    dialect: value.dialect,
    host: value.host ?? 'localhost',
    port: value.port ?? DEFAULT_PORTS[value.dialect],
    database: databaseLabel(value),
    trusted: value.trusted,
  };
  if (value.user) config.user = value.user;
  if (value.password != null) config.password = value.password;
  if (value.connectionString) config.connectionString = value.connectionString;
  if (value.serviceName) config.serviceName = value.serviceName;
  if (value.sid) config.sid = value.sid;
  if (value.dialect === 'sqlite') config.path = value.path ?? value.database;
  return config;
}

export const selectionInputSchema = z.object({
  schemas: z.array(z.string().trim().min(1)).optional(),
  excludeSchemas: z.array(z.string().trim().min(1)).optional(),
  objectTypes: z.array(objectTypeSchema).optional(),
});

export type SelectionInput = Omit<z.input<typeof selectionInputSchema>, 'objectTypes'> & {
  objectTypes?: string[];
};

export interface Selection {
  /** Case-folded names; `null` means every schema not excluded. */
  include: ReadonlySet<string> | null;
  exclude: ReadonlySet<string>;
  objectTypes: ReadonlySet<ObjectType>;
}

export function expandObjectTypes(values: readonly string[] | undefined): Set<ObjectType> {
  if (!values || values.length === 0 || values.includes('all')) {
    return new Set(OBJECT_TYPES);
  }
  return new Set(OBJECT_TYPES.filter((type) => values.includes(type)));
}

/**
 * Validates a schema/object-type selection. Overlapping include and exclude
 * lists are rejected before any catalog query runs; without an explicit
 * exclude list the engine's system schemas are excluded.
 */
export function validateSelection(dialect: DatabaseKind, input: SelectionInput = {}): Selection {
  const parsed = selectionInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid selection: ${formatIssues(parsed.error)}`);
  }
  const { schemas, excludeSchemas, objectTypes } = parsed.data;

  const include = schemas && schemas.length > 0 ? new Set(schemas.map(foldCase)) : null;
  const explicitExclude = excludeSchemas ?? [];
  if (include) {
    const overlap = explicitExclude.filter((name) => include.has(foldCase(name)));
    if (overlap.length > 0) {
      throw new FilterConflictError(overlap);
    }
  }

  const excluded = excludeSchemas ?? DEFAULT_EXCLUDED_SCHEMAS[dialect];
  return {
    include,
    exclude: new Set(excluded.map(foldCase)),
    objectTypes: expandObjectTypes(objectTypes),
  };
}

export function isDatabaseKind(value: string): value is DatabaseKind {
  return DATABASE_KINDS.some((kind) => kind === value);
}
