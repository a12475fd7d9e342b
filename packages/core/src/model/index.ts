import sortBy from 'lodash/sortBy.js';
import uniq from 'lodash/uniq.js';

import { ModelIntegrityError } from '../errors';
import { compareIdentifiers, foldCase, qualifiedName } from '../normalize';
import type {
  CheckConstraint,
  Column,
  ExactNumber,
  ForeignKey,
  Identifier,
  Index,
  Permission,
  PrimaryKey,
  Routine,
  SecurityPrincipal,
  Sequence,
  Synonym,
  Table,
  Trigger,
  TriggerEvent,
  UniqueConstraint,
  UserDefinedType,
  View,
} from '../types';

export interface TableDraft {
  id: Identifier;
  columns: Column[];
  primaryKey?: PrimaryKey | null;
  foreignKeys?: ForeignKey[];
  indexes?: Index[];
  checks?: CheckConstraint[];
  uniqueConstraints?: UniqueConstraint[];
  triggers?: Identifier[];
  rowCount?: ExactNumber;
  sizeKb?: ExactNumber;
  description?: string | null;
}

/** Sequence values arrive as `null` when the catalog value was not an exact integer. */
export interface SequenceDraft extends Omit<Sequence, 'start' | 'increment' | 'min' | 'max'> {
  start: ExactNumber | null;
  increment: ExactNumber | null;
  min: ExactNumber | null;
  max: ExactNumber | null;
}

const EVENT_ORDER: TriggerEvent[] = ['INSERT', 'UPDATE', 'DELETE'];

function requireName(kind: string, label: string, value: string) {
  if (value.trim().length === 0) {
    throw new ModelIntegrityError(kind, label || '(unnamed)', 'name is empty');
  }
}

function requireIdentifier(kind: string, id: Identifier) {
  requireName(kind, qualifiedName(id), id.name);
}

function missingColumns(known: Set<string>, names: string[]): string[] {
  return names.filter((name) => !known.has(foldCase(name)));
}

function checkOrdinals(label: string, columns: Column[]) {
  const seen = new Set<string>();
  columns.forEach((column, index) => {
    requireName('column', `${label}.${column.name}`, column.name);
    const folded = foldCase(column.name);
    if (seen.has(folded)) {
      throw new ModelIntegrityError('table', label, `duplicate column ${column.name}`);
    }
    seen.add(folded);
    if (column.ordinal !== index + 1) {
      throw new ModelIntegrityError(
        'table',
        label,
        `column ordinals are not contiguous (expected ${index + 1}, found ${column.ordinal} for ${column.name})`,
      );
    }
  });
}

export function buildForeignKey(table: Identifier, draft: ForeignKey): ForeignKey {
  const label = `${qualifiedName(table)}.${draft.name}`;
  requireName('foreign key', label, draft.name);
  requireIdentifier('foreign key target', draft.target);
  if (draft.columns.length === 0) {
    throw new ModelIntegrityError('foreign key', label, 'no columns');
  }
  if (draft.columns.length !== draft.targetColumns.length) {
    throw new ModelIntegrityError(
      'foreign key',
      label,
      `${draft.columns.length} local columns but ${draft.targetColumns.length} referenced columns`,
    );
  }
  return { ...draft, columns: [...draft.columns], targetColumns: [...draft.targetColumns] };
}

export function buildIndex(table: Identifier, draft: Index): Index {
  const label = `${qualifiedName(table)}.${draft.name}`;
  requireName('index', label, draft.name);
  if (draft.columns.length === 0 && draft.expressions.length === 0) {
    throw new ModelIntegrityError('index', label, 'no key columns');
  }
  return {
    ...draft,
    method: draft.method ? draft.method.toUpperCase() : null,
  };
}

export function buildTable(draft: TableDraft): Table {
  const label = qualifiedName(draft.id);
  requireIdentifier('table', draft.id);

  const columns = sortBy(draft.columns, (column) => column.ordinal);
  checkOrdinals(label, columns);
  const known = new Set(columns.map((column) => foldCase(column.name)));

  const primaryKey = draft.primaryKey ?? null;
  if (primaryKey) {
    if (primaryKey.columns.length === 0) {
      throw new ModelIntegrityError('table', label, 'primary key has no columns');
    }
    const missing = missingColumns(known, primaryKey.columns);
    if (missing.length > 0) {
      throw new ModelIntegrityError('table', label, `primary key references unknown columns ${missing.join(', ')}`);
    }
  }

  const foreignKeys = draft.foreignKeys ?? [];
  for (const fk of foreignKeys) {
    const missing = missingColumns(known, fk.columns);
    if (missing.length > 0) {
      throw new ModelIntegrityError('table', label, `foreign key ${fk.name} references unknown columns ${missing.join(', ')}`);
    }
  }

  const indexes = draft.indexes ?? [];
  for (const index of indexes) {
    const missing = missingColumns(known, [...index.columns, ...index.includedColumns]);
    if (missing.length > 0) {
      throw new ModelIntegrityError('table', label, `index ${index.name} references unknown columns ${missing.join(', ')}`);
    }
  }

  const uniqueConstraints = draft.uniqueConstraints ?? [];
  for (const constraint of uniqueConstraints) {
    const missing = missingColumns(known, constraint.columns);
    if (missing.length > 0) {
      throw new ModelIntegrityError(
        'table',
        label,
        `unique constraint ${constraint.name} references unknown columns ${missing.join(', ')}`,
      );
    }
  }

  const table: Table = {
    id: draft.id,
    columns,
    primaryKey,
    foreignKeys: sortBy(foreignKeys, (fk) => foldCase(fk.name)),
    indexes: sortBy(indexes, (index) => foldCase(index.name)),
    checks: sortBy(draft.checks ?? [], (check) => foldCase(check.name)),
    uniqueConstraints: sortBy(uniqueConstraints, (constraint) => foldCase(constraint.name)),
    triggers: [...(draft.triggers ?? [])].sort(compareIdentifiers),
    description: draft.description ?? null,
  };
  if (draft.rowCount !== undefined) table.rowCount = draft.rowCount;
  if (draft.sizeKb !== undefined) table.sizeKb = draft.sizeKb;
  return table;
}

export function buildView(draft: View): View {
  const label = qualifiedName(draft.id);
  requireIdentifier('view', draft.id);
  draft.columns.forEach((column) => requireName('view column', `${label}.${column.name}`, column.name));
  const baseTables = new Map<string, Identifier>();
  for (const base of draft.baseTables) {
    baseTables.set(base.key, base);
  }
  return {
    ...draft,
    baseTables: Array.from(baseTables.values()).sort(compareIdentifiers),
  };
}

export function buildRoutine(draft: Routine): Routine {
  const label = qualifiedName(draft.id);
  requireIdentifier(draft.kind, draft.id);
  draft.parameters.forEach((parameter) => requireName('parameter', `${label}.${parameter.name}`, parameter.name));
  if (draft.returns?.kind === 'table' && draft.returns.columns.length === 0) {
    throw new ModelIntegrityError(draft.kind, label, 'table result has no columns');
  }
  return draft;
}

export function buildTrigger(draft: Trigger): Trigger {
  const label = qualifiedName(draft.id);
  requireIdentifier('trigger', draft.id);
  requireIdentifier('trigger table', draft.table);
  const events = EVENT_ORDER.filter((event) => draft.events.includes(event));
  if (events.length === 0) {
    throw new ModelIntegrityError('trigger', label, 'no triggering events');
  }
  return { ...draft, events };
}

export function buildType(draft: UserDefinedType): UserDefinedType {
  const label = qualifiedName(draft.id);
  requireIdentifier('type', draft.id);
  if ((draft.category === 'DOMAIN' || draft.category === 'ALIAS') && !draft.baseType) {
    throw new ModelIntegrityError('type', label, `${draft.category.toLowerCase()} has no base type`);
  }
  draft.members.forEach((member) => requireName('type member', `${label}.${member.name}`, member.name));
  return draft;
}

function requireExact(label: string, field: string, value: ExactNumber | null): ExactNumber {
  if (value == null) {
    throw new ModelIntegrityError('sequence', label, `${field} is not an exact integer`);
  }
  return value;
}

export function buildSequence(draft: SequenceDraft): Sequence {
  const label = qualifiedName(draft.id);
  requireIdentifier('sequence', draft.id);
  const increment = requireExact(label, 'increment', draft.increment);
  if (/^-?0+$/.test(increment)) {
    throw new ModelIntegrityError('sequence', label, 'increment is zero');
  }
  return {
    ...draft,
    start: requireExact(label, 'start', draft.start),
    increment,
    min: requireExact(label, 'min', draft.min),
    max: requireExact(label, 'max', draft.max),
  };
}

export function buildSynonym(draft: Synonym): Synonym {
  const label = qualifiedName(draft.id);
  requireIdentifier('synonym', draft.id);
  if (draft.baseObject.trim().length === 0) {
    throw new ModelIntegrityError('synonym', label, 'base object is empty');
  }
  requireName('synonym', label, draft.target.name);
  return draft;
}

function permissionKey(permission: Permission): string {
  return `${permission.object.key}\u0000${permission.privilege}\u0000${permission.state}`;
}

export function buildPrincipal(draft: SecurityPrincipal): SecurityPrincipal {
  requireName(draft.kind === 'USER' ? 'user' : 'role', draft.name, draft.name);
  const permissions = new Map<string, Permission>();
  for (const permission of draft.permissions) {
    permissions.set(permissionKey(permission), permission);
  }
  return {
    kind: draft.kind,
    name: draft.name,
    permissions: sortBy(Array.from(permissions.values()), permissionKey),
    memberOf: uniq(draft.memberOf).sort(),
  };
}
