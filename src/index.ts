export type * from './types';

export { synthesizeSchema } from './synthesizer';
export { mergeValues, type MergeOptions } from './merge';
export {
  appendIndex,
  appendKey,
  lastSegment,
  normalizeFieldPath,
  ROOT_PATH,
  type FieldPath
} from './utils/field-path';
export { deriveItemTitle, deriveTitle } from './utils/title';
export { classifyValue } from './value-kind';
export { isValuesMapping, isValuesSequence } from './guards';

export * from './descriptor';

export { deriveUiSchema, type UiSchema, type UiSchemaOptions } from './ui-schema';
export { formatSkipSummary, type SkipSummaryOptions } from './report';

export {
  createValuesEditor,
  summarizeDescriptor,
  type DescriptorSummary,
  type FetchResult,
  type UpdateResult,
  type ValuesEditor,
  type ValuesEditorOptions
} from './editor';
export {
  createYamlFileValuesSource,
  parseValuesDocument,
  serializeValuesDocument,
  updateValuesDocument,
  type ValuesSource
} from './values-source';
export {
  runSyncStep,
  type PublishContext,
  type SyncOutcome,
  type ValuesSync
} from './sync';

export { InvalidUpdateError, ValuesReadError, ValuesWriteError } from './errors';
export { createLogger, silentLogger, type EngineLogger, type LoggerConfig } from './logger';
export { resolveEditorConfig, type EditorConfig } from './config';
