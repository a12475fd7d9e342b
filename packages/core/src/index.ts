export * from './types';
export * from './errors';
export {
  DEFAULT_EXCLUDED_SCHEMAS,
  DEFAULT_PORTS,
  connectionInputSchema,
  expandObjectTypes,
  isDatabaseKind,
  resolveConnectionConfig,
  selectionInputSchema,
  validateSelection,
  type ConnectionConfig,
  type ConnectionInput,
  type Selection,
  type SelectionInput,
} from './config';
export { createLogger, levelForVerbosity, type Logger, type LoggerOptions } from './logger';
export {
  baseTypeName,
  compareIdentifiers,
  foldCase,
  formatNativeType,
  identifier,
  normalizeReferentialAction,
  normalizeType,
  qualifiedName,
  type TypeSpec,
} from './normalize';
export * from './model';
export {
  CAPABILITIES,
  NOT_APPLICABLE,
  defineDialect,
  type Capability,
  type DialectAdapter,
  type DialectDefinition,
  type NotApplicable,
  type QueryRunner,
  type Row,
} from './discovery/types';
export { createDialectRegistry, type DialectRegistry } from './discovery/registry';
export { openConnection, oracleConnectString, parseAdoConnectionString, toConnectorUrl } from './connection';
export { applySelection, selectSchema, selectsType, type SnapshotDraft } from './selection';
export {
  buildRelationshipGraph,
  dependenciesOf,
  dependentsOf,
  incomingEdges,
  outgoingEdges,
  unresolvedReferences,
} from './graph';
export { extract, extractAll, type ExtractDependencies, type ExtractRequest } from './extract';
export { documentPath, renderSnapshot, type RenderedDocument } from './render';
