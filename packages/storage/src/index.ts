/**
 * @wexport/storage - Warehouse connections and artifact output
 */

export {
  SnowflakeQueryHandle,
  connectSnowflake,
  snowflakeDialect,
} from './warehouse/snowflake-query-handle.js';
export {
  ClickHouseQueryHandle,
  connectClickHouse,
  clickHouseDialect,
  isClickHouseConnectionFailure,
} from './warehouse/clickhouse-query-handle.js';
export { DiskArtifactStore } from './warehouse/disk-artifact-store.js';
export type { PrepareOptions } from './warehouse/disk-artifact-store.js';
