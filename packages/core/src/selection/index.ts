import type { Selection } from '../config';
import { foldCase } from '../normalize';
import type { ObjectType, SchemaCollection, SchemaGroup, SecurityPrincipal } from '../types';

/** Schema groups and principals before the relationship graph is built. */
export interface SnapshotDraft {
  schemas: SchemaGroup[];
  security: SecurityPrincipal[];
}

export const SCHEMA_COLLECTIONS: readonly SchemaCollection[] = [
  'tables',
  'views',
  'procedures',
  'functions',
  'triggers',
  'types',
  'sequences',
  'synonyms',
];

/** Include list wins when present; otherwise every schema not excluded is kept. */
export function selectSchema(selection: Selection, name: string): boolean {
  const folded = foldCase(name);
  if (selection.include) return selection.include.has(folded);
  return !selection.exclude.has(folded);
}

export function selectsType(selection: Selection, type: ObjectType): boolean {
  return selection.objectTypes.has(type);
}

export function emptySchemaGroup(name: string): SchemaGroup {
  return {
    name,
    tables: [],
    views: [],
    procedures: [],
    functions: [],
    triggers: [],
    types: [],
    sequences: [],
    synonyms: [],
  };
}

/**
 * Drops unselected schemas and empties the collections of unselected object
 * types. Cross-references into removed objects are left in place; the graph
 * builder reports them as unresolved.
 */
export function applySelection(draft: SnapshotDraft, selection: Selection): SnapshotDraft {
  const schemas = draft.schemas
    .filter((group) => selectSchema(selection, group.name))
    .map((group) => {
      const kept = emptySchemaGroup(group.name);
      for (const collection of SCHEMA_COLLECTIONS) {
        if (selectsType(selection, collection)) {
          copyCollection(kept, group, collection);
        }
      }
      return kept;
    });
  return {
    schemas,
    security: selectsType(selection, 'security') ? draft.security : [],
  };
}

function copyCollection<K extends SchemaCollection>(target: SchemaGroup, source: SchemaGroup, key: K) {
  target[key] = source[key];
}
