/**
 * @ventasql/core — barrel export
 *
 * Question pipeline shared by the CLI and any other front end.
 */

// Database types and stores
export type {
  DbType,
  Scalar,
  Row,
  ResultSet,
  ConnectionConfig,
  SqliteConnectionConfig,
  PgConnectionConfig,
  DataStore,
} from './db/types.js';
export { SAFE_DEFAULTS } from './db/defaults.js';
export { createDataStore, testDbConnection } from './db/index.js';
export { SqliteDataStore } from './db/adapters/sqlite.js';
export { PostgresDataStore } from './db/adapters/postgres.js';
export { seedDemoDatabase, parseVentaRecords } from './db/seed.js';
export type { VentaRecord } from './db/seed.js';

// Query validation
export {
  DenylistValidator,
  AstValidator,
  FORBIDDEN_KEYWORDS,
  UnsafeQueryError,
  describeReason,
  createValidator,
} from './sanitize/index.js';
export type {
  QueryValidator,
  SafeQuery,
  UnsafeQueryReason,
  ValidatorName,
  DenylistValidatorOptions,
  AstValidatorOptions,
} from './sanitize/index.js';

// Intent routing
export { DEFAULT_ROUTE_TABLE, matchRoute, routeQuestion } from './route/index.js';
export type { RouteDecision, RouteMatch, RouteRule } from './route/index.js';

// Rendering
export {
  ResultRenderer,
  DEFAULT_EXPORT_FILE,
  formatTable,
  renderTable,
  HtmlChartBackend,
  planChart,
  buildChartHtml,
  CsvFileBackend,
  toCsv,
} from './render/index.js';
export type { ResultRendererOptions, BarChartSpec, ChartBackend, FileBackend, RenderedArtifact } from './render/index.js';

// Translation
export {
  OpenAITranslationClient,
  DEFAULT_MODEL,
  buildMessages,
  extractSql,
  withTimeout,
} from './llm/index.js';
export type { TranslationClient, OpenAITranslationOptions, PromptOptions } from './llm/index.js';

// Orchestration
export { QueryOrchestrator } from './orchestrator.js';
export type { QueryOrchestratorDeps, AskOutcome } from './orchestrator.js';

// Errors
export {
  TranslationError,
  ExecutionError,
  NotPlottableError,
  ConfigError,
  toErrorResult,
  errorMessage,
} from './errors.js';
export type { ErrorKind, ErrorResult } from './errors.js';

// Configuration and logging
export { loadConfig } from './config.js';
export type { VentasqlConfig } from './config.js';
export { createLogger, silentLogger, LOG_LEVELS } from './util/logger.js';
export type { LogLevel, LoggerOptions } from './util/logger.js';
