export type {
  DateBind,
  BoundQuery,
  QueryResult,
  SqlDialect,
  QueryExecutionOptions,
  QueryHandle,
} from './query-handle-port.js';
export type { ExportObserver } from './export-observer-port.js';
