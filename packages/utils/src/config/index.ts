/**
 * Configuration loading from environment variables
 *
 * Provides typed connection settings for the supported warehouses.
 */

import { ConfigurationError } from '../errors.js';

export type SnowflakeAuthenticator = 'SNOWFLAKE' | 'EXTERNALBROWSER';

export interface SnowflakeConfig {
  account: string;
  username: string;
  role: string;
  warehouse: string;
  authenticator: SnowflakeAuthenticator;
  password?: string;
}

export interface ClickHouseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value || value.trim() === '') {
    throw new ConfigurationError(`${name} environment variable is required`, name);
  }
  return value.trim();
}

/**
 * Load Snowflake configuration from environment variables
 *
 * @param overrides.externalBrowser - force browser-delegated SSO regardless of SNOWFLAKE_AUTHENTICATOR
 */
export function getSnowflakeConfig(
  env: Env = process.env,
  overrides: { externalBrowser?: boolean } = {}
): SnowflakeConfig {
  const rawAuthenticator = (env.SNOWFLAKE_AUTHENTICATOR || 'SNOWFLAKE').toUpperCase();
  if (rawAuthenticator !== 'SNOWFLAKE' && rawAuthenticator !== 'EXTERNALBROWSER') {
    throw new ConfigurationError(
      `Unsupported SNOWFLAKE_AUTHENTICATOR: ${rawAuthenticator}`,
      'SNOWFLAKE_AUTHENTICATOR',
      { allowed: ['SNOWFLAKE', 'EXTERNALBROWSER'] }
    );
  }
  const authenticator: SnowflakeAuthenticator = overrides.externalBrowser
    ? 'EXTERNALBROWSER'
    : rawAuthenticator;

  const config: SnowflakeConfig = {
    account: requireEnv(env, 'SNOWFLAKE_ACCOUNT'),
    username: requireEnv(env, 'SNOWFLAKE_USER'),
    role: requireEnv(env, 'SNOWFLAKE_ROLE'),
    warehouse: requireEnv(env, 'SNOWFLAKE_WAREHOUSE'),
    authenticator,
  };

  if (authenticator === 'SNOWFLAKE') {
    config.password = requireEnv(env, 'SNOWFLAKE_PASSWORD');
  }

  return config;
}

/**
 * Load ClickHouse configuration from environment variables
 */
export function getClickHouseConfig(env: Env = process.env): ClickHouseConfig {
  const { CLICKHOUSE_HOST, CLICKHOUSE_PORT, CLICKHOUSE_USER, CLICKHOUSE_PASSWORD, CLICKHOUSE_DATABASE } =
    env;

  const port = CLICKHOUSE_PORT ? Number(CLICKHOUSE_PORT) : 8123;
  if (!Number.isInteger(port) || port <= 0) {
    throw new ConfigurationError('CLICKHOUSE_PORT must be a positive integer', 'CLICKHOUSE_PORT', {
      value: CLICKHOUSE_PORT,
    });
  }

  return {
    host: CLICKHOUSE_HOST || 'localhost',
    port,
    user: CLICKHOUSE_USER || 'default',
    password: CLICKHOUSE_PASSWORD || '',
    database: CLICKHOUSE_DATABASE || 'default',
  };
}
