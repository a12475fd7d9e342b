import fs from 'node:fs';
import path from 'node:path';

import chalk from 'chalk';
import { z } from 'zod';
import {
  CAPABILITIES,
  ConfigurationError,
  ConnectionError,
  DATABASE_KINDS,
  DEFAULT_PORTS,
  ExtractionError,
  FilterConflictError,
  describeCause,
  type ConnectionInput,
  type DialectRegistry,
  type RenderedDocument,
  type SchemaSnapshot,
  type SelectionInput,
} from '@dbatlas/core';

const optionalFlag = z.string().optional();

/** Options as commander hands them over (flags already merged with their environment variables). */
export const cliOptionsSchema = z.object({
  dbType: z.enum(['postgres', 'mysql', 'mssql', 'oracle', 'sqlite']),
  host: optionalFlag,
  port: optionalFlag,
  database: optionalFlag,
  username: optionalFlag,
  password: optionalFlag,
  connectionString: optionalFlag,
  trusted: z.boolean().default(false),
  serviceName: optionalFlag,
  sid: optionalFlag,
  output: z.string().default('./schema_docs'),
  schemas: optionalFlag,
  excludeSchemas: optionalFlag,
  objectTypes: optionalFlag,
  verbose: z.number().int().nonnegative().default(0),
  dryRun: z.boolean().default(false),
});

export type CliOptions = z.output<typeof cliOptionsSchema>;

export function parseCliOptions(value: unknown): CliOptions {
  const parsed = cliOptionsSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid options: ${detail}`);
  }
  return parsed.data;
}

/** Splits a comma-separated flag value, dropping blanks. */
export function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

export function toConnectionInput(options: CliOptions): ConnectionInput {
  const input: ConnectionInput = {
    dialect: options.dbType,
    host: options.host,
    database: options.database,
    user: options.username,
    password: options.password,
    connectionString: options.connectionString,
    trusted: options.trusted,
    serviceName: options.serviceName,
    sid: options.sid,
  };
  if (options.port !== undefined) input.port = Number(options.port);
  if (options.dbType === 'sqlite') input.path = options.database;
  return input;
}

export function toSelectionInput(options: CliOptions): SelectionInput {
  return {
    schemas: parseList(options.schemas),
    excludeSchemas: parseList(options.excludeSchemas),
    objectTypes: parseList(options.objectTypes),
  };
}

export function sanitizeDatabaseName(name: string): string {
  const cleaned = name.trim().replace(/[^A-Za-z0-9_.-]+/g, '_').replace(/^\.+/, '');
  return cleaned.length > 0 ? cleaned : 'database';
}

export function outputDirectory(base: string, database: string): string {
  return path.resolve(process.cwd(), base, sanitizeDatabaseName(database));
}

export function writeDocuments(directory: string, documents: readonly RenderedDocument[]): string[] {
  return documents.map((document) => {
    const filePath = path.join(directory, ...document.path.split('/'));
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, document.content, 'utf-8');
    return filePath;
  });
}

export function formatError(error: unknown): string {
  const message = describeCause(error);
  if (error instanceof FilterConflictError) return `Filter conflict: ${message}`;
  if (error instanceof ConfigurationError) return `Configuration error: ${message}`;
  if (error instanceof ConnectionError) return `Connection failed: ${message}`;
  if (error instanceof ExtractionError) return `Extraction failed: ${message}`;
  return `Unexpected error: ${message}`;
}

export function renderSnapshotSummary(snapshot: SchemaSnapshot, directory: string, written: number): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`${snapshot.database} (${snapshot.engine})`));
  if (snapshot.engineVersion) lines.push(`  Version: ${snapshot.engineVersion}`);
  lines.push(`  Schemas: ${snapshot.schemas.length}`);
  const count = (pick: (group: SchemaSnapshot['schemas'][number]) => readonly unknown[]) =>
    snapshot.schemas.reduce((total, group) => total + pick(group).length, 0);
  lines.push(`  Tables: ${count((group) => group.tables)}`);
  lines.push(`  Views: ${count((group) => group.views)}`);
  lines.push(`  Routines: ${count((group) => [...group.procedures, ...group.functions])}`);
  lines.push(`  Relationships: ${snapshot.graph.edges.length}`);
  if (snapshot.warnings.length > 0) {
    lines.push(chalk.yellow(`  Warnings: ${snapshot.warnings.length}`));
  }
  lines.push(`${chalk.green('Wrote')} ${written} documents to ${directory}`);
  return lines.join('\n');
}

export function renderDialectTable(registry: DialectRegistry): string {
  const lines: string[] = [];
  DATABASE_KINDS.forEach((kind) => {
    const adapter = registry.get(kind);
    if (!adapter) return;
    const port = DEFAULT_PORTS[kind];
    lines.push(`${chalk.bold(kind)}  ${adapter.label}${port === null ? '' : ` (port ${port})`}`);
    const unsupported = CAPABILITIES.filter((capability) => !adapter.supports(capability));
    lines.push(`  not applicable: ${unsupported.length > 0 ? unsupported.join(', ') : 'none'}`);
  });
  return lines.join('\n');
}
