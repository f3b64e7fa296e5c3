export type SalesSourceKind = 'database' | 'csv';

export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent';

export interface AppConfig {
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;
  databasePath: string;
  salesSource: SalesSourceKind;
  salesCsvPath: string;
  seedSampleData: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

const SALES_SOURCES: readonly SalesSourceKind[] = ['database', 'csv'];

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  return value.trim();
}

function oneOf<T extends string>(
  name: string,
  value: string,
  allowed: readonly T[],
): T {
  const match = allowed.find((candidate) => candidate === value.toLowerCase());
  if (!match) {
    throw new Error(
      `Invalid environment variable ${name}: '${value}' (expected one of ${allowed.join(', ')})`,
    );
  }
  return match;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid environment variable PORT: '${value}'`);
  }
  return port;
}

function parseFlag(name: string, value: string): boolean {
  switch (value.toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new Error(`Invalid environment variable ${name}: '${value}'`);
  }
}

function defaultLogLevel(nodeEnv: string): LogLevel {
  if (nodeEnv === 'test') return 'silent';
  if (nodeEnv === 'production') return 'info';
  return 'debug';
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  const nodeEnv = readEnv(env, 'NODE_ENV') ?? 'development';
  const port = readEnv(env, 'PORT');
  const logLevel = readEnv(env, 'LOG_LEVEL');
  const salesSource = readEnv(env, 'SALES_SOURCE');
  const seed = readEnv(env, 'SEED_SAMPLE_DATA');

  return {
    port: port ? parsePort(port) : 3000,
    nodeEnv,
    logLevel: logLevel
      ? oneOf('LOG_LEVEL', logLevel, LOG_LEVELS)
      : defaultLogLevel(nodeEnv),
    databasePath: readEnv(env, 'DATABASE_PATH') ?? './data/smart_store.db',
    salesSource: salesSource
      ? oneOf('SALES_SOURCE', salesSource, SALES_SOURCES)
      : 'database',
    salesCsvPath:
      readEnv(env, 'SALES_CSV_PATH') ??
      './data/prepared/sales_data_prepared.csv',
    seedSampleData: seed ? parseFlag('SEED_SAMPLE_DATA', seed) : true,
  };
}
