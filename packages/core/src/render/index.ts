import sortBy from 'lodash/sortBy.js';

import { dependenciesOf, dependentsOf, incomingEdges, outgoingEdges } from '../graph';
import { qualifiedName } from '../normalize';
import type {
  Column,
  DatabaseKind,
  ExtractionWarning,
  Identifier,
  ObjectType,
  RelationshipEdge,
  Routine,
  SchemaCollection,
  SchemaGroup,
  SchemaSnapshot,
  SecurityPrincipal,
  Sequence,
  Synonym,
  Table,
  Trigger,
  UserDefinedType,
  View,
  ViewDependency,
} from '../types';

export interface RenderedDocument {
  /** Forward-slash path relative to the output directory. */
  path: string;
  content: string;
}

const ENGINE_NAMES: Record<DatabaseKind, string> = {
  mssql: 'Microsoft SQL Server',
  postgres: 'PostgreSQL',
  mysql: 'MySQL / MariaDB',
  oracle: 'Oracle Database',
  sqlite: 'SQLite',
};

const TITLES: Record<ObjectType, string> = {
  tables: 'Tables',
  views: 'Views',
  procedures: 'Stored Procedures',
  functions: 'Functions',
  triggers: 'Triggers',
  types: 'User-Defined Types',
  sequences: 'Sequences',
  synonyms: 'Synonyms',
  security: 'Security',
};

const COLLECTIONS: readonly SchemaCollection[] = [
  'tables',
  'views',
  'procedures',
  'functions',
  'triggers',
  'types',
  'sequences',
  'synonyms',
];

const SUMMARY_ORDER: readonly ObjectType[] = [...COLLECTIONS, 'security'];

/** Escapes a value for a Markdown table cell. */
export function cell(value: string | null | undefined): string {
  if (value == null) return '';
  return value.replace(/\s*\r?\n\s*/g, ' ').replace(/\|/g, '\\|');
}

function row(cells: Array<string | null | undefined>): string {
  return `| ${cells.map(cell).join(' | ')} |`;
}

function header(...names: string[]): string[] {
  return [`| ${names.join(' | ')} |`, `|${names.map((name) => '-'.repeat(name.length + 2)).join('|')}|`];
}

/** Path segment for a catalog name; separators in names must not create directories. */
function safeSegment(name: string): string {
  return name.replace(/[\\/]/g, '_');
}

function fileName(id: Identifier): string {
  return safeSegment(`${id.schema}.${id.name}`);
}

export function documentPath(type: ObjectType, id: Identifier): string {
  return `${type}/${fileName(id)}.md`;
}

function link(label: string, path: string): string {
  return `[${label}](${encodeURI(path)})`;
}

function yesNo(value: boolean): string {
  return value ? 'Yes' : 'No';
}

function truncate(value: string | null, limit = 50): string {
  if (!value) return '';
  return value.length > limit ? `${value.slice(0, limit)}...` : value;
}

function codeBlock(body: string): string[] {
  return ['```sql', body, '```', ''];
}

function finish(lines: string[]): string {
  while (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return `${lines.join('\n')}\n`;
}

/** Linked reference from a document one directory below the root. */
function reference(target: Identifier, targetType: ObjectType | null, resolved: boolean): string {
  if (resolved && targetType) return link(qualifiedName(target), `../${documentPath(targetType, target)}`);
  return `\`${qualifiedName(target)}\` *(unresolved)*`;
}

function edgeSourceType(edge: RelationshipEdge): ObjectType {
  return edge.kind === 'synonym' ? 'synonyms' : 'tables';
}

function relationshipLines(outgoing: readonly RelationshipEdge[], incoming: readonly RelationshipEdge[]): string[] {
  if (outgoing.length === 0 && incoming.length === 0) return [];
  const lines = ['## Relationships', ''];
  if (outgoing.length > 0) {
    lines.push('### References', '');
    outgoing.forEach((edge) => {
      lines.push(`- ${reference(edge.target, edge.targetType, edge.resolved)} via \`${edge.via}\``);
    });
    lines.push('');
  }
  if (incoming.length > 0) {
    lines.push('### Referenced By', '');
    incoming.forEach((edge) => {
      lines.push(`- ${reference(edge.source, edgeSourceType(edge), true)} via \`${edge.via}\``);
    });
    lines.push('');
  }
  return lines;
}

function relationships(snapshot: SchemaSnapshot, id: Identifier): string[] {
  return relationshipLines(outgoingEdges(snapshot.graph, id), incomingEdges(snapshot.graph, id));
}

function dependencyLines(title: string, dependencies: readonly ViewDependency[], pick: 'view' | 'target'): string[] {
  if (dependencies.length === 0) return [];
  const lines = [`## ${title}`, ''];
  dependencies.forEach((dependency) => {
    lines.push(
      pick === 'target'
        ? `- ${reference(dependency.target, dependency.targetType, dependency.resolved)}`
        : `- ${reference(dependency.view, 'views', true)}`,
    );
  });
  lines.push('');
  return lines;
}

function columnDefault(column: Column): string {
  if (column.computed) return `COMPUTED: ${column.computed}`;
  if (column.autoIncrement) {
    if (column.identitySeed !== undefined) {
      return `IDENTITY(${column.identitySeed},${column.identityIncrement ?? '1'})`;
    }
    return 'AUTO INCREMENT';
  }
  return column.default ?? '';
}

function renderTable(snapshot: SchemaSnapshot, table: Table): string {
  const lines = [`# ${qualifiedName(table.id)}`, ''];
  if (table.description) lines.push(table.description, '');

  if (table.rowCount !== undefined || table.sizeKb !== undefined) {
    lines.push('## Statistics', '');
    if (table.rowCount !== undefined) lines.push(`- **Rows:** ${table.rowCount}`);
    if (table.sizeKb !== undefined) lines.push(`- **Total Space:** ${table.sizeKb} KB`);
    lines.push('');
  }

  lines.push('## Columns', '', ...header('Column', 'Type', 'Nullable', 'Default', 'Description'));
  table.columns.forEach((column) => {
    lines.push(
      row([column.name, column.dataType.native, column.nullable ? 'YES' : 'NO', columnDefault(column), column.description]),
    );
  });
  lines.push('');

  const pk = table.primaryKey;
  if (pk) {
    const clustering = pk.clustered === null ? '' : pk.clustered ? ' (CLUSTERED)' : ' (NONCLUSTERED)';
    lines.push(
      '## Primary Key',
      '',
      `**${pk.name ?? '(unnamed)'}**${clustering}`,
      '',
      `Columns: ${pk.columns.map((name) => `\`${name}\``).join(', ')}`,
      '',
    );
  }

  if (table.foreignKeys.length > 0) {
    lines.push('## Foreign Keys', '', ...header('Name', 'Columns', 'References', 'On Delete', 'On Update'));
    table.foreignKeys.forEach((fk) => {
      lines.push(
        row([
          fk.name,
          fk.columns.join(', '),
          `${qualifiedName(fk.target)}(${fk.targetColumns.join(', ')})`,
          fk.onDelete ?? '-',
          fk.onUpdate ?? '-',
        ]),
      );
    });
    lines.push('');
  }

  const indexes = table.indexes.filter((index) => !index.primary);
  if (indexes.length > 0) {
    lines.push('## Indexes', '', ...header('Name', 'Type', 'Columns', 'Filter'));
    indexes.forEach((index) => {
      const kind: string[] = [];
      if (index.unique) kind.push('UNIQUE');
      if (index.clustered !== null) kind.push(index.clustered ? 'CLUSTERED' : 'NONCLUSTERED');
      if (index.method && !kind.includes(index.method)) kind.push(index.method);
      let keys = [...index.columns, ...index.expressions].join(', ');
      if (index.includedColumns.length > 0) keys += ` INCLUDE (${index.includedColumns.join(', ')})`;
      lines.push(row([index.name, kind.join(' '), keys, index.filter]));
    });
    lines.push('');
  }

  if (table.uniqueConstraints.length > 0) {
    lines.push('## Unique Constraints', '', ...header('Name', 'Columns'));
    table.uniqueConstraints.forEach((constraint) => lines.push(row([constraint.name, constraint.columns.join(', ')])));
    lines.push('');
  }

  if (table.checks.length > 0) {
    lines.push('## Check Constraints', '');
    table.checks.forEach((check) => lines.push(`### ${check.name}`, '', ...codeBlock(check.expression)));
  }

  if (table.triggers.length > 0) {
    lines.push('## Triggers', '');
    const linked = available(snapshot, 'triggers');
    table.triggers.forEach((trigger) => lines.push(`- ${reference(trigger, 'triggers', linked)}`));
    lines.push('');
  }

  lines.push(
    ...relationships(snapshot, table.id),
    ...dependencyLines('Dependent Views', dependentsOf(snapshot.graph, table.id), 'view'),
  );
  return finish(lines);
}

function renderView(snapshot: SchemaSnapshot, view: View): string {
  const lines = [`# ${qualifiedName(view.id)}`, ''];
  if (view.description) lines.push(view.description, '');
  if (view.materialized) lines.push('*This is a materialized view.*', '');

  lines.push('## Columns', '', ...header('Column', 'Type', 'Nullable', 'Description'));
  view.columns.forEach((column) => {
    lines.push(row([column.name, column.dataType.native, column.nullable ? 'YES' : 'NO', column.description]));
  });
  lines.push('');

  lines.push(
    ...dependencyLines('Base Tables', dependenciesOf(snapshot.graph, view.id), 'target'),
    ...dependencyLines('Dependent Views', dependentsOf(snapshot.graph, view.id), 'view'),
    ...relationships(snapshot, view.id),
  );
  if (view.definition) lines.push('## Definition', '', ...codeBlock(view.definition));
  return finish(lines);
}

function renderRoutine(snapshot: SchemaSnapshot, routine: Routine): string {
  const lines = [`# ${qualifiedName(routine.id)}`, ''];
  if (routine.language) lines.push(`**Language:** ${routine.language}`, '');
  if (routine.description) lines.push(routine.description, '');

  if (routine.parameters.length > 0) {
    lines.push('## Parameters', '', ...header('Name', 'Type', 'Direction', 'Default'));
    routine.parameters.forEach((parameter) => {
      lines.push(row([parameter.name, parameter.dataType.native, parameter.direction, parameter.default]));
    });
    lines.push('');
  }

  const returns = routine.returns;
  if (returns?.kind === 'scalar') {
    lines.push('## Returns', '', `\`${returns.dataType.native}\``, '');
  } else if (returns?.kind === 'table') {
    lines.push('## Return Columns', '', ...header('Column', 'Type', 'Nullable'));
    returns.columns.forEach((column) => {
      lines.push(row([column.name, column.dataType.native, column.nullable ? 'YES' : 'NO']));
    });
    lines.push('');
  }

  lines.push(...relationships(snapshot, routine.id));
  if (routine.definition) lines.push('## Definition', '', ...codeBlock(routine.definition));
  return finish(lines);
}

function renderTrigger(snapshot: SchemaSnapshot, trigger: Trigger): string {
  const parent = snapshot.schemas
    .flatMap((group) => [
      ...group.tables.map((table) => ({ id: table.id, type: 'tables' as const })),
      ...group.views.map((view) => ({ id: view.id, type: 'views' as const })),
    ])
    .find((candidate) => candidate.id.key === trigger.table.key);

  const lines = [
    `# ${qualifiedName(trigger.id)}`,
    '',
    `**Table:** ${reference(parent?.id ?? trigger.table, parent?.type ?? null, parent !== undefined)}`,
    `**Timing:** ${trigger.timing.replace('_', ' ')}`,
    `**Events:** ${trigger.events.join(', ')}`,
    `**Enabled:** ${yesNo(trigger.enabled)}`,
    '',
  ];
  if (trigger.description) lines.push(trigger.description, '');
  lines.push(...relationships(snapshot, trigger.id));
  if (trigger.definition) lines.push('## Definition', '', ...codeBlock(trigger.definition));
  return finish(lines);
}

function renderType(snapshot: SchemaSnapshot, type: UserDefinedType): string {
  const category = type.category.replace('_', ' ');
  const lines = [`# ${qualifiedName(type.id)}`, '', `**Category:** ${category}`, ''];
  if (type.description) lines.push(type.description, '');
  if (type.baseType) {
    lines.push('## Definition', '', `Base type: \`${type.baseType.native}\` ${type.nullable ? 'NULL' : 'NOT NULL'}`, '');
  }
  if (type.members.length > 0) {
    lines.push('## Columns', '', ...header('Column', 'Type', 'Nullable'));
    type.members.forEach((member) => {
      lines.push(row([member.name, member.dataType.native, member.nullable ? 'YES' : 'NO']));
    });
    lines.push('');
  }
  if (type.enumValues.length > 0) {
    lines.push('## Values', '', ...type.enumValues.map((value) => `- \`${value}\``), '');
  }
  if (type.check) lines.push('## Check Constraint', '', ...codeBlock(type.check));
  lines.push(...relationships(snapshot, type.id));
  return finish(lines);
}

function renderSequence(snapshot: SchemaSnapshot, sequence: Sequence): string {
  const lines = [`# ${qualifiedName(sequence.id)}`, ''];
  if (sequence.description) lines.push(sequence.description, '');
  lines.push(
    '## Properties',
    '',
    `- **Data Type:** ${sequence.dataType}`,
    `- **Start Value:** ${sequence.start}`,
    `- **Increment:** ${sequence.increment}`,
    `- **Minimum Value:** ${sequence.min}`,
    `- **Maximum Value:** ${sequence.max}`,
    `- **Current Value:** ${sequence.current ?? '-'}`,
    `- **Cycling:** ${yesNo(sequence.cycle)}`,
    `- **Cache:** ${sequence.cache ?? 'No cache'}`,
    '',
    ...relationships(snapshot, sequence.id),
  );
  return finish(lines);
}

function renderSynonym(snapshot: SchemaSnapshot, synonym: Synonym): string {
  const lines = [`# ${qualifiedName(synonym.id)}`, ''];
  if (synonym.description) lines.push(synonym.description, '');
  lines.push('## Target', '', `**Base Object:** \`${synonym.baseObject}\``, '');
  const remote: string[] = [];
  if (synonym.targetServer) remote.push(`- **Server:** ${synonym.targetServer}`);
  if (synonym.targetDatabase) remote.push(`- **Database:** ${synonym.targetDatabase}`);
  if (remote.length > 0) lines.push(...remote, '');
  lines.push(...relationships(snapshot, synonym.id));
  return finish(lines);
}

interface IndexLayout<T> {
  columns: string[];
  cells: (item: T) => Array<string | null | undefined>;
}

function renderIndex<T extends { id: Identifier }>(type: ObjectType, items: readonly T[], layout: IndexLayout<T>): string {
  const lines = [`# ${TITLES[type]}`, '', `Total: ${items.length}`, ''];
  if (items.length > 0) {
    lines.push(...header('Schema', 'Name', ...layout.columns));
    items.forEach((item) => {
      const name = link(item.id.name, `${fileName(item.id)}.md`);
      lines.push(`| ${[cell(item.id.schema), name, ...layout.cells(item).map(cell)].join(' | ')} |`);
    });
  }
  return finish(lines);
}

function collect<T extends { id: Identifier }>(
  schemas: readonly SchemaGroup[],
  pick: (group: SchemaGroup) => readonly T[],
): T[] {
  return sortBy(schemas.flatMap(pick), (item) => item.id.key);
}

function countOf(snapshot: SchemaSnapshot, type: ObjectType): number {
  if (type === 'security') return snapshot.security.length;
  return snapshot.schemas.reduce((total, group) => total + group[type].length, 0);
}

function summaryValue(snapshot: SchemaSnapshot, type: ObjectType): string {
  const availability = snapshot.availability[type];
  if (availability === 'failed') return 'extraction failed';
  if (availability === 'not-requested') return '0';
  return String(countOf(snapshot, type));
}

function warningLine(warning: ExtractionWarning): string {
  switch (warning.kind) {
    case 'unresolved-reference':
      return `- Unresolved ${warning.reference} \`${warning.via}\`: \`${qualifiedName(warning.source)}\` -> \`${qualifiedName(warning.target)}\``;
    case 'model-integrity':
      return `- Skipped ${warning.objectType} \`${warning.object}\`: ${cell(warning.message)}`;
    case 'query-failure':
      return `- Could not read ${warning.objectType}: ${cell(warning.message)}`;
  }
}

function available(snapshot: SchemaSnapshot, type: ObjectType): boolean {
  return snapshot.availability[type] === 'available';
}

function renderRoot(snapshot: SchemaSnapshot): string {
  const lines = [
    `# ${snapshot.database} Database Schema`,
    '',
    `*Generated on ${snapshot.extractedAt}*`,
    '',
    `**Database Type:** ${ENGINE_NAMES[snapshot.engine]}`,
  ];
  if (snapshot.engineVersion) lines.push(`**Version:** ${snapshot.engineVersion}`);
  lines.push('', '## Summary', '', ...header('Object Type', 'Count'));
  SUMMARY_ORDER.filter((type) => snapshot.availability[type] !== 'not-applicable').forEach((type) => {
    lines.push(row([TITLES[type], summaryValue(snapshot, type)]));
  });
  lines.push('');

  if (snapshot.schemas.length > 0) {
    lines.push('## Schemas', '');
    snapshot.schemas.forEach((group) => lines.push(`- ${link(group.name, `schemas/${safeSegment(group.name)}.md`)}`));
    lines.push('');
  }

  lines.push('## Object Directories', '');
  SUMMARY_ORDER.filter((type) => available(snapshot, type)).forEach((type) => {
    lines.push(`- ${link(TITLES[type], `${type}/README.md`)}`);
  });
  lines.push(`- ${link('Schemas', 'schemas/README.md')}`, '');

  if (snapshot.warnings.length > 0) {
    lines.push('## Warnings', '', ...snapshot.warnings.map(warningLine), '');
  }
  return finish(lines);
}

function renderSchemas(schemas: readonly SchemaGroup[]): RenderedDocument[] {
  const index = ['# Schemas', '', `Total: ${schemas.length}`, ''];
  if (schemas.length > 0) {
    index.push(...header('Schema', ...COLLECTIONS.map((type) => TITLES[type])));
    schemas.forEach((group) => {
      const counts = COLLECTIONS.map((type) => String(group[type].length));
      index.push(`| ${[link(group.name, `${safeSegment(group.name)}.md`), ...counts].join(' | ')} |`);
    });
  }

  const documents: RenderedDocument[] = [{ path: 'schemas/README.md', content: finish(index) }];
  schemas.forEach((group) => {
    const lines = [`# Schema: ${group.name}`, ''];
    COLLECTIONS.forEach((type) => {
      const items: readonly { id: Identifier }[] = group[type];
      if (items.length === 0) return;
      lines.push(`## ${TITLES[type]}`, '');
      items.forEach((item) => lines.push(`- ${link(item.id.name, `../${documentPath(type, item.id)}`)}`));
      lines.push('');
    });
    documents.push({ path: `schemas/${safeSegment(group.name)}.md`, content: finish(lines) });
  });
  return documents;
}

function principalPath(principal: SecurityPrincipal): string {
  const folder = principal.kind === 'USER' ? 'users' : 'roles';
  return `${folder}.${safeSegment(principal.name)}.md`;
}

function renderSecurity(principals: readonly SecurityPrincipal[]): RenderedDocument[] {
  const index = ['# Security', ''];
  const sections: Array<[string, SecurityPrincipal['kind']]> = [
    ['Users', 'USER'],
    ['Roles', 'ROLE'],
  ];
  sections.forEach(([title, kind]) => {
    const members = principals.filter((principal) => principal.kind === kind);
    index.push(`## ${title}`, '');
    if (members.length === 0) {
      index.push('None', '');
      return;
    }
    index.push(...header('Name', 'Member Of', 'Permissions'));
    members.forEach((principal) => {
      index.push(
        `| ${[link(principal.name, principalPath(principal)), cell(principal.memberOf.join(', ')), String(principal.permissions.length)].join(' | ')} |`,
      );
    });
    index.push('');
  });

  const documents: RenderedDocument[] = [{ path: 'security/README.md', content: finish(index) }];
  principals.forEach((principal) => {
    const lines = [`# ${principal.name}`, '', `**Kind:** ${principal.kind}`, ''];
    if (principal.memberOf.length > 0) {
      lines.push('## Member Of', '', ...principal.memberOf.map((role) => `- ${role}`), '');
    }
    if (principal.permissions.length > 0) {
      lines.push('## Permissions', '', ...header('Object', 'Privilege', 'State'));
      principal.permissions.forEach((permission) => {
        lines.push(row([qualifiedName(permission.object), permission.privilege, permission.state]));
      });
    }
    documents.push({ path: `security/${principalPath(principal)}`, content: finish(lines) });
  });
  return documents;
}

function category<T extends { id: Identifier }>(
  snapshot: SchemaSnapshot,
  type: SchemaCollection,
  items: readonly T[],
  layout: IndexLayout<T>,
  render: (item: T) => string,
): RenderedDocument[] {
  if (!available(snapshot, type)) return [];
  return [
    { path: `${type}/README.md`, content: renderIndex(type, items, layout) },
    ...items.map((item) => ({ path: documentPath(type, item.id), content: render(item) })),
  ];
}

/**
 * Renders a snapshot into an ordered set of Markdown documents. Output
 * depends only on the snapshot, so two renders of the same snapshot are
 * byte-identical.
 */
export function renderSnapshot(snapshot: SchemaSnapshot): RenderedDocument[] {
  const { schemas } = snapshot;
  return [
    { path: 'README.md', content: renderRoot(snapshot) },
    ...category(
      snapshot,
      'tables',
      collect(schemas, (group) => group.tables),
      { columns: ['Rows', 'Description'], cells: (table) => [table.rowCount ?? '-', truncate(table.description)] },
      (table) => renderTable(snapshot, table),
    ),
    ...category(
      snapshot,
      'views',
      collect(schemas, (group) => group.views),
      { columns: ['Materialized', 'Description'], cells: (view) => [yesNo(view.materialized), truncate(view.description)] },
      (view) => renderView(snapshot, view),
    ),
    ...category(
      snapshot,
      'procedures',
      collect(schemas, (group) => group.procedures),
      { columns: ['Language', 'Description'], cells: (routine) => [routine.language, truncate(routine.description)] },
      (routine) => renderRoutine(snapshot, routine),
    ),
    ...category(
      snapshot,
      'functions',
      collect(schemas, (group) => group.functions),
      {
        columns: ['Returns', 'Description'],
        cells: (routine) => [
          routine.returns?.kind === 'scalar' ? routine.returns.dataType.native : routine.returns ? 'TABLE' : '',
          truncate(routine.description),
        ],
      },
      (routine) => renderRoutine(snapshot, routine),
    ),
    ...category(
      snapshot,
      'triggers',
      collect(schemas, (group) => group.triggers),
      {
        columns: ['Table', 'Timing', 'Events'],
        cells: (trigger) => [qualifiedName(trigger.table), trigger.timing.replace('_', ' '), trigger.events.join(', ')],
      },
      (trigger) => renderTrigger(snapshot, trigger),
    ),
    ...category(
      snapshot,
      'types',
      collect(schemas, (group) => group.types),
      { columns: ['Category', 'Base Type'], cells: (type) => [type.category.replace('_', ' '), type.baseType?.native] },
      (type) => renderType(snapshot, type),
    ),
    ...category(
      snapshot,
      'sequences',
      collect(schemas, (group) => group.sequences),
      {
        columns: ['Type', 'Start', 'Increment', 'Cycling'],
        cells: (sequence) => [sequence.dataType, sequence.start, sequence.increment, yesNo(sequence.cycle)],
      },
      (sequence) => renderSequence(snapshot, sequence),
    ),
    ...category(
      snapshot,
      'synonyms',
      collect(schemas, (group) => group.synonyms),
      { columns: ['Base Object'], cells: (synonym) => [synonym.baseObject] },
      (synonym) => renderSynonym(snapshot, synonym),
    ),
    ...renderSchemas(schemas),
    ...(available(snapshot, 'security') ? renderSecurity(snapshot.security) : []),
  ];
}
