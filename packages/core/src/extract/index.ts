import sortBy from 'lodash/sortBy.js';

import { validateSelection, type SelectionInput } from '../config';
import type { DialectRegistry } from '../discovery/registry';
import { NOT_APPLICABLE, type CatalogResult, type QueryRunner } from '../discovery/types';
import { ConfigurationError, describeCause, ExtractionError, ModelIntegrityError } from '../errors';
import { buildRelationshipGraph, unresolvedReferences } from '../graph';
import { createLogger, type Logger } from '../logger';
import {
  buildForeignKey,
  buildIndex,
  buildPrincipal,
  buildRoutine,
  buildSequence,
  buildSynonym,
  buildTable,
  buildTrigger,
  buildType,
  buildView,
  type TableDraft,
} from '../model';
import { compareIdentifiers, foldCase, qualifiedName } from '../normalize';
import { applySelection, emptySchemaGroup, selectsType } from '../selection';
import type {
  Availability,
  DatabaseKind,
  ExtractionWarning,
  Identifier,
  ObjectType,
  SchemaGroup,
  SchemaSnapshot,
} from '../types';

export interface ExtractRequest {
  runner: QueryRunner;
  /** Label recorded on the snapshot; the runner is already bound to it. */
  database: string;
  selection?: SelectionInput;
}

export interface ExtractDependencies {
  dialects: DialectRegistry;
  logger?: Logger;
  now?: () => Date;
}

interface Outcome<T> {
  availability: Availability;
  records: T[];
}

class ExtractionContext {
  readonly warnings: ExtractionWarning[] = [];

  constructor(
    readonly dialect: DatabaseKind,
    readonly logger: Logger,
  ) {}

  /** Schemas and tables: without them nothing else can be assembled. */
  async required<T>(operation: string, call: () => CatalogResult<T>): Promise<T[]> {
    try {
      const result = await call();
      const records = result === NOT_APPLICABLE ? [] : result;
      this.logger.info({ dialect: this.dialect, capability: operation, count: records.length }, 'catalog read');
      return records;
    } catch (error) {
      throw new ExtractionError(
        `Extraction from ${this.dialect} aborted while listing ${operation}: ${describeCause(error)}`,
        { cause: error },
      );
    }
  }

  async optional<T>(operation: string, requested: boolean, call: () => CatalogResult<T>): Promise<Outcome<T>> {
    if (!requested) return { availability: 'not-requested', records: [] };
    try {
      const result = await call();
      if (result === NOT_APPLICABLE) {
        this.logger.debug({ dialect: this.dialect, capability: operation }, 'capability not applicable');
        return { availability: 'not-applicable', records: [] };
      }
      this.logger.info({ dialect: this.dialect, capability: operation, count: result.length }, 'catalog read');
      return { availability: 'available', records: result };
    } catch (error) {
      const message = describeCause(error);
      this.logger.warn({ dialect: this.dialect, capability: operation, err: message }, 'catalog query failed');
      this.warnings.push({ kind: 'query-failure', objectType: operation, message });
      return { availability: 'failed', records: [] };
    }
  }

  /** Runs a model constructor, turning integrity violations into skip-and-warn. */
  build<R>(objectType: string, name: string, create: () => R): R | undefined {
    try {
      return create();
    } catch (error) {
      if (!(error instanceof ModelIntegrityError)) throw error;
      this.skip(objectType, name, error);
      return undefined;
    }
  }

  private skip(objectType: string, name: string, error: ModelIntegrityError): void {
    this.logger.warn({ dialect: this.dialect, objectType, object: name, err: error.message }, 'skipping object');
    this.warnings.push({ kind: 'model-integrity', objectType, object: name, message: error.message });
  }

  /** Keeps the first object per folded key; later objects whose names differ only in case are skipped. */
  distinct<T extends { id: Identifier }>(objectType: string, items: readonly T[]): T[] {
    const kept = new Map<string, Identifier>();
    const result: T[] = [];
    for (const item of sortBy(items, (candidate) => qualifiedName(candidate.id))) {
      const first = kept.get(item.id.key);
      if (first) {
        if (!sameName(first, item.id)) {
          const name = qualifiedName(item.id);
          this.skip(objectType, name, new ModelIntegrityError(objectType, name, `name collides with ${qualifiedName(first)}`));
        }
        continue;
      }
      kept.set(item.id.key, item.id);
      result.push(item);
    }
    return result;
  }

  buildAll<T, R>(objectType: string, items: readonly T[], nameOf: (item: T) => string, create: (item: T) => R): R[] {
    const built: R[] = [];
    for (const item of items) {
      const result = this.build(objectType, nameOf(item), () => create(item));
      if (result !== undefined) built.push(result);
    }
    return built;
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) deepFreeze(child);
  }
  return value;
}

function sameName(a: Identifier, b: Identifier): boolean {
  return a.schema === b.schema && a.name === b.name;
}

function byId<T extends { id: Identifier }>(items: T[]): T[] {
  return [...items].sort((a, b) => compareIdentifiers(a.id, b.id));
}

/**
 * Reads the catalog through the registered adapter, assembles the canonical
 * model, filters it and builds the relationship graph. Capability calls are
 * issued one at a time on the request's runner; the runner is left open.
 */
export async function extract(request: ExtractRequest, deps: ExtractDependencies): Promise<SchemaSnapshot> {
  const { runner } = request;
  const adapter = deps.dialects.get(runner.dialect);
  if (!adapter) {
    throw new ConfigurationError(`No dialect adapter registered for ${runner.dialect}`);
  }
  const selection = validateSelection(runner.dialect, request.selection);
  const logger = (deps.logger ?? createLogger({ silent: true })).child({ database: request.database });
  const context = new ExtractionContext(runner.dialect, logger);
  const wants = (type: ObjectType) => selectsType(selection, type);
  const extractedAt = (deps.now ?? (() => new Date()))().toISOString();

  let engineVersion: string | null = null;
  try {
    engineVersion = await adapter.version(runner);
  } catch (error) {
    const message = describeCause(error);
    logger.warn({ dialect: runner.dialect, err: message }, 'could not read server version');
    context.warnings.push({ kind: 'query-failure', objectType: 'version', message });
  }

  const schemaNames = await context.required('schemas', () => adapter.listSchemas(runner));
  const tableInfos = await context.required('tables', () => adapter.listTables(runner));

  const withTables = wants('tables');
  // columns and primary keys belong to the table read; failing either aborts
  const columns = withTables ? await context.required('columns', () => adapter.listColumns(runner)) : [];
  const primaryKeys = withTables ? await context.required('primaryKeys', () => adapter.listPrimaryKeys(runner)) : [];
  const indexes = await context.optional('indexes', withTables, () => adapter.listIndexes(runner));
  const foreignKeys = await context.optional('foreignKeys', withTables, () => adapter.listForeignKeys(runner));
  const checks = await context.optional('checks', withTables, () => adapter.listChecks(runner));
  const uniques = await context.optional('uniqueConstraints', withTables, () =>
    adapter.listUniqueConstraints(runner),
  );
  const views = await context.optional('views', wants('views'), () => adapter.listViews(runner));
  const routines = await context.optional('routines', wants('procedures') || wants('functions'), () =>
    adapter.listRoutines(runner),
  );
  const triggers = await context.optional('triggers', withTables || wants('triggers'), () =>
    adapter.listTriggers(runner),
  );
  const types = await context.optional('types', wants('types'), () => adapter.listTypes(runner));
  const sequences = await context.optional('sequences', wants('sequences'), () => adapter.listSequences(runner));
  const synonyms = await context.optional('synonyms', wants('synonyms'), () => adapter.listSynonyms(runner));
  const security = await context.optional('security', wants('security'), () => adapter.listSecurity(runner));

  const builtTriggers = context.buildAll(
    'trigger',
    context.distinct('trigger', triggers.records),
    (trigger) => qualifiedName(trigger.id),
    buildTrigger,
  );

  const drafts = new Map<string, TableDraft>();
  const firstByKey = new Map<string, Identifier>();
  const collisions = new Set<string>();
  for (const info of tableInfos) {
    const first = firstByKey.get(info.id.key);
    if (!first) firstByKey.set(info.id.key, info.id);
    else if (!sameName(first, info.id)) collisions.add(info.id.key);
  }
  for (const info of context.distinct('table', tableInfos)) {
    const draft: TableDraft = { id: info.id, columns: [], description: info.description };
    if (info.rowCount !== undefined) draft.rowCount = info.rowCount;
    if (info.sizeKb !== undefined) draft.sizeKb = info.sizeKb;
    drafts.set(info.id.key, draft);
  }
  // after a case collision only rows naming the kept table exactly belong to it
  const draftFor = (table: Identifier) => {
    const draft = drafts.get(table.key);
    if (draft && collisions.has(table.key) && !sameName(draft.id, table)) return undefined;
    return draft;
  };

  for (const record of columns) {
    draftFor(record.table)?.columns.push(record.column);
  }
  for (const record of primaryKeys) {
    const draft = draftFor(record.table);
    if (draft) draft.primaryKey = record.primaryKey;
  }
  for (const record of foreignKeys.records) {
    const draft = draftFor(record.table);
    if (!draft) continue;
    const fk = context.build('foreign key', `${qualifiedName(record.table)}.${record.foreignKey.name}`, () =>
      buildForeignKey(record.table, record.foreignKey),
    );
    if (fk) (draft.foreignKeys ??= []).push(fk);
  }
  for (const record of indexes.records) {
    const draft = draftFor(record.table);
    if (!draft) continue;
    const index = context.build('index', `${qualifiedName(record.table)}.${record.index.name}`, () =>
      buildIndex(record.table, record.index),
    );
    if (index) (draft.indexes ??= []).push(index);
  }
  for (const record of checks.records) {
    const draft = draftFor(record.table);
    if (draft) (draft.checks ??= []).push(record.check);
  }
  for (const record of uniques.records) {
    const draft = draftFor(record.table);
    if (draft) (draft.uniqueConstraints ??= []).push(record.constraint);
  }
  for (const trigger of builtTriggers) {
    const draft = draftFor(trigger.table);
    if (draft) (draft.triggers ??= []).push(trigger.id);
  }

  const groups = new Map<string, SchemaGroup>();
  const groupFor = (schema: string): SchemaGroup => {
    const key = foldCase(schema);
    let group = groups.get(key);
    if (!group) {
      group = emptySchemaGroup(schema);
      groups.set(key, group);
    }
    return group;
  };
  schemaNames.forEach(groupFor);

  const tables = context.buildAll('table', Array.from(drafts.values()), (draft) => qualifiedName(draft.id), buildTable);
  for (const table of tables) groupFor(table.id.schema).tables.push(table);
  for (const view of context.buildAll('view', context.distinct('view', views.records), (item) => qualifiedName(item.id), buildView)) {
    groupFor(view.id.schema).views.push(view);
  }
  for (const routine of context.buildAll('routine', context.distinct('routine', routines.records), (item) => qualifiedName(item.id), buildRoutine)) {
    const group = groupFor(routine.id.schema);
    if (routine.kind === 'procedure') group.procedures.push(routine);
    else group.functions.push(routine);
  }
  for (const trigger of builtTriggers) groupFor(trigger.id.schema).triggers.push(trigger);
  for (const type of context.buildAll('type', context.distinct('type', types.records), (item) => qualifiedName(item.id), buildType)) {
    groupFor(type.id.schema).types.push(type);
  }
  for (const sequence of context.buildAll('sequence', context.distinct('sequence', sequences.records), (item) => qualifiedName(item.id), buildSequence)) {
    groupFor(sequence.id.schema).sequences.push(sequence);
  }
  for (const synonym of context.buildAll('synonym', context.distinct('synonym', synonyms.records), (item) => qualifiedName(item.id), buildSynonym)) {
    groupFor(synonym.id.schema).synonyms.push(synonym);
  }
  const principals = context.buildAll('principal', security.records, (item) => item.name, buildPrincipal);

  const ordered = sortBy(Array.from(groups.values()), (group) => foldCase(group.name)).map((group) => ({
    name: group.name,
    tables: byId(group.tables),
    views: byId(group.views),
    procedures: byId(group.procedures),
    functions: byId(group.functions),
    triggers: byId(group.triggers),
    types: byId(group.types),
    sequences: byId(group.sequences),
    synonyms: byId(group.synonyms),
  }));

  const selected = applySelection(
    { schemas: ordered, security: sortBy(principals, [(item) => item.kind, (item) => foldCase(item.name)]) },
    selection,
  );
  const graph = buildRelationshipGraph(selected.schemas);
  const unresolved = unresolvedReferences(selected.schemas, graph);
  for (const warning of unresolved) {
    logger.debug({ source: warning.source.key, target: warning.target.key, via: warning.via }, 'unresolved reference');
  }

  const routineAvailability = (type: ObjectType) => (wants(type) ? routines.availability : 'not-requested');
  const availability: Record<ObjectType, Availability> = {
    tables: withTables ? 'available' : 'not-requested',
    views: views.availability,
    procedures: routineAvailability('procedures'),
    functions: routineAvailability('functions'),
    triggers: wants('triggers') ? triggers.availability : 'not-requested',
    types: types.availability,
    sequences: sequences.availability,
    synonyms: synonyms.availability,
    security: security.availability,
  };

  logger.info(
    { dialect: runner.dialect, schemas: selected.schemas.length, edges: graph.edges.length, unresolved: unresolved.length },
    'extraction finished',
  );

  return deepFreeze({
    database: request.database,
    engine: runner.dialect,
    engineVersion,
    extractedAt,
    schemas: selected.schemas,
    security: selected.security,
    availability,
    graph,
    warnings: [...context.warnings, ...unresolved],
  });
}

/** Extracts several databases concurrently; each request carries its own runner. */
export function extractAll(
  requests: readonly ExtractRequest[],
  deps: ExtractDependencies,
): Promise<SchemaSnapshot[]> {
  return Promise.all(requests.map((request) => extract(request, deps)));
}
