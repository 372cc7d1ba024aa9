// @jtd-validate/core entry point
//
// Public API:
// - resolveOptions() turns raw flag strings into a frozen ResolvedOptions.
// - createSchemaModel() picks a validation engine (jtd or ajv).
// - runValidation() drives schema ingestion, the instance stream and the
//   error reporter for one run; exitCodeFor() maps its outcome to a status.
// - Lower-level pieces (InstanceStream, DocumentScanner, parseSchemaText,
//   ErrorReporter, JSON Pointer helpers) are exported for embedding.

// Errors
export {
  ErrorCode,
  type Severity,
  CLEAN_EXIT_CODE,
  VALIDATION_FAILED_EXIT_CODE,
  EXIT_CODES,
  getExitCode,
} from './errors/codes.js';
export { ErrorPresenter, type CLIErrorView } from './errors/presenter.js';
export {
  JtdValidateError,
  InvalidOptionError,
  SchemaParseError,
  SchemaInvalidError,
  InstanceParseError,
  MaxDepthExceededError,
  SourceReadError,
  InternalError,
  isJtdValidateError,
  toJtdValidateError,
  type ErrorContext,
  type SerializedError,
} from './types/errors.js';

export { Ok, Err, ok, err, type Result } from './types/result.js';

// Options
export {
  parseLimit,
  resolveOptions,
  resolveValidationOptions,
  resolveOutputFormat,
  resolveEngineName,
  limitToNumber,
  OUTPUT_FORMATS,
  ENGINE_NAMES,
  type Limit,
  type ValidationOptions,
  type OutputFormat,
  type EngineName,
  type RawOptions,
  type ResolvedOptions,
} from './types/options.js';

// Engines
export {
  createSchemaModel,
  createAjvSchemaModel,
  jtdSchemaModel,
  internalFault,
  type EngineFault,
  type SchemaModel,
  type TypedefSchema,
  type ValidationError,
} from './validator/index.js';

// Inputs
export {
  STDIN_LABEL,
  resolveInputSource,
  assertSingleStdinConsumer,
  readSourceText,
  type InputSource,
} from './io/sources.js';
export {
  parseSchemaText,
  ingestSchema,
  type SchemaIngestError,
} from './parser/schema-ingestor.js';
export {
  InstanceStream,
  type Instance,
  type InstancePull,
} from './parser/instance-stream.js';
export {
  DocumentScanner,
  type ScannedDocument,
  type ScanEvent,
} from './parser/document-scanner.js';

// Output
export {
  ErrorReporter,
  formatIndicators,
  toErrorIndicator,
  type ErrorIndicator,
  type ErrorReporterOptions,
  type OutputSink,
} from './report/error-reporter.js';
export {
  toJsonPointer,
  parseJsonPointer,
  escapeToken,
  unescapeToken,
  type PathSegment,
} from './util/json-pointer.js';

// Driver
export {
  runValidation,
  validateInstance,
  assertEngineSupports,
  faultToError,
  exitCodeFor,
} from './pipeline/driver.js';
export type {
  RunOutcome,
  RunSummary,
  RunHooks,
  ValidationRequest,
} from './pipeline/types.js';
