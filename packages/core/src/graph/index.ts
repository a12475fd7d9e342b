import sortBy from 'lodash/sortBy.js';

import { foldCase } from '../normalize';
import type {
  Identifier,
  ObjectType,
  RelationshipEdge,
  RelationshipGraph,
  SchemaCollection,
  SchemaGroup,
  UnresolvedReferenceWarning,
  ViewDependency,
} from '../types';

interface Resolved {
  id: Identifier;
  type: ObjectType;
}

type ObjectIndex = Map<string, Resolved>;

const COLLECTION_ORDER: readonly SchemaCollection[] = [
  'tables',
  'views',
  'procedures',
  'functions',
  'triggers',
  'types',
  'sequences',
  'synonyms',
];

function indexObjects(groups: readonly SchemaGroup[], collections: readonly SchemaCollection[]): ObjectIndex {
  const index: ObjectIndex = new Map();
  for (const group of groups) {
    for (const collection of collections) {
      for (const object of group[collection]) {
        if (!index.has(object.id.key)) index.set(object.id.key, { id: object.id, type: collection });
      }
    }
  }
  return index;
}

function sortEdges(edges: RelationshipEdge[]): RelationshipEdge[] {
  return sortBy(edges, [(edge) => edge.source.key, (edge) => foldCase(edge.via), (edge) => edge.target.key]);
}

function push<T>(record: Record<string, T[]>, key: string, value: T) {
  const list = record[key];
  if (list) list.push(value);
  else record[key] = [value];
}

/**
 * Emits one edge per foreign key of every retained table and one per synonym.
 * Foreign keys resolve against tables; synonyms resolve against any retained
 * object unless they point at another server or database.
 */
export function buildRelationshipGraph(groups: readonly SchemaGroup[]): RelationshipGraph {
  const tables = indexObjects(groups, ['tables']);
  const everything = indexObjects(groups, COLLECTION_ORDER);
  const relations = indexObjects(groups, ['tables', 'views']);

  const edges: RelationshipEdge[] = [];
  for (const group of groups) {
    for (const table of group.tables) {
      for (const fk of table.foreignKeys) {
        const hit = tables.get(fk.target.key);
        edges.push({
          kind: 'foreign-key',
          source: table.id,
          target: hit?.id ?? fk.target,
          via: fk.name,
          columns: fk.columns,
          targetColumns: fk.targetColumns,
          onDelete: fk.onDelete,
          onUpdate: fk.onUpdate,
          resolved: hit !== undefined,
          targetType: hit?.type ?? null,
        });
      }
    }
    for (const synonym of group.synonyms) {
      const remote = synonym.targetServer != null || synonym.targetDatabase != null;
      const hit = remote ? undefined : everything.get(synonym.target.key);
      edges.push({
        kind: 'synonym',
        source: synonym.id,
        target: hit?.id ?? synonym.target,
        via: synonym.id.name,
        columns: [],
        targetColumns: [],
        onDelete: null,
        onUpdate: null,
        resolved: hit !== undefined,
        targetType: hit?.type ?? null,
      });
    }
  }

  const sorted = sortEdges(edges);
  const outgoing: Record<string, RelationshipEdge[]> = {};
  const incoming: Record<string, RelationshipEdge[]> = {};
  for (const edge of sorted) {
    push(outgoing, edge.source.key, edge);
    push(incoming, edge.target.key, edge);
  }

  const dependencies: ViewDependency[] = [];
  for (const group of groups) {
    for (const view of group.views) {
      for (const base of view.baseTables) {
        const hit = relations.get(base.key);
        dependencies.push({
          view: view.id,
          target: hit?.id ?? base,
          resolved: hit !== undefined,
          targetType: hit?.type ?? null,
        });
      }
    }
  }

  return {
    edges: sorted,
    outgoing,
    incoming,
    dependencies: sortBy(dependencies, [(dep) => dep.view.key, (dep) => dep.target.key]),
  };
}

export function outgoingEdges(graph: RelationshipGraph, id: Identifier): readonly RelationshipEdge[] {
  return graph.outgoing[id.key] ?? [];
}

export function incomingEdges(graph: RelationshipGraph, id: Identifier): readonly RelationshipEdge[] {
  return graph.incoming[id.key] ?? [];
}

/** Base tables and views a view reads from. */
export function dependenciesOf(graph: RelationshipGraph, view: Identifier): ViewDependency[] {
  return graph.dependencies.filter((dep) => dep.view.key === view.key);
}

/** Views that read from the given table or view. */
export function dependentsOf(graph: RelationshipGraph, target: Identifier): ViewDependency[] {
  return graph.dependencies.filter((dep) => dep.target.key === target.key);
}

/** Unresolved edges plus triggers whose parent table or view was not retained. */
export function unresolvedReferences(
  groups: readonly SchemaGroup[],
  graph: RelationshipGraph,
): UnresolvedReferenceWarning[] {
  const warnings: UnresolvedReferenceWarning[] = graph.edges
    .filter((edge) => !edge.resolved)
    .map((edge) => ({
      kind: 'unresolved-reference',
      source: edge.source,
      target: edge.target,
      via: edge.via,
      reference: edge.kind,
    }));

  const parents = indexObjects(groups, ['tables', 'views']);
  const triggers = groups.flatMap((group) => group.triggers);
  for (const trigger of sortBy(triggers, (item) => item.id.key)) {
    if (!parents.has(trigger.table.key)) {
      warnings.push({
        kind: 'unresolved-reference',
        source: trigger.id,
        target: trigger.table,
        via: trigger.id.name,
        reference: 'trigger-parent',
      });
    }
  }
  return warnings;
}
