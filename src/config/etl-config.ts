import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError, describeError } from '../core/errors';
import type { BulkMode } from '../pipeline/pg-trip-sink';
import { resolveCleaningRules, type CleaningRules } from './cleaning-rules';
import { isValidTableName, type DatabaseConnection } from './database';

export interface EtlConfig {
  input: string;
  table: string;
  chunkSize: number;
  batchSize: number;
  exclusionLogPath: string;
  overwriteExclusionLog: boolean;
  connection: DatabaseConnection;
  startOffset: number;
  maxAttempts: number;
  baseBackoffMs: number;
  bulkMode: BulkMode;
  rules: CleaningRules;
  logDir: string | null;
}

type Env = Record<string, string | undefined>;

const required = (what: string) =>
  z.string({ required_error: `${what} is required` }).trim().min(1, `${what} is required`);

const positiveInt = (what: string) =>
  required(what)
    .regex(/^\d+$/, `${what} must be a positive integer`)
    .transform(Number)
    .pipe(z.number().int().positive(`${what} must be a positive integer`));

const nonNegativeInt = (what: string) =>
  z
    .string()
    .regex(/^\d+$/, `${what} must be a non-negative integer`)
    .transform(Number);

const InvocationSchema = z.object({
  input: required('--input (ETL_INPUT)'),
  table: required('--table (ETL_TABLE)').refine(isValidTableName, {
    message: '--table must be a lower-case SQL identifier',
  }),
  chunkSize: positiveInt('--chunk-size (ETL_CHUNK_SIZE)'),
  batchSize: positiveInt('--batch-size (ETL_BATCH_SIZE)'),
  exclusionLogPath: required('--exclusion-log (ETL_EXCLUSION_LOG)'),
  startOffset: nonNegativeInt('--offset').default('0'),
  maxAttempts: positiveInt('--max-attempts').default('3'),
  baseBackoffMs: nonNegativeInt('--backoff-ms').default('1000'),
  bulkMode: z.enum(['values', 'copy']).default('values'),
});

const ConnectionSchema = z.union([
  z.object({ connectionString: z.string().trim().min(1) }),
  z.object({
    host: required('--db-host (PGHOST)'),
    port: positiveInt('--db-port (PGPORT)'),
    database: required('--db-name (PGDATABASE)'),
    user: required('--db-user (PGUSER)'),
    password: z.string({ required_error: '--db-password (PGPASSWORD) is required' }),
  }),
]);

/** Reads `--name=value` from the argument list; bare `--name` reads as "true". */
export function argValue(args: readonly string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const arg = args.find((a) => a === `--${name}` || a.startsWith(prefix));
  if (arg === undefined) return undefined;
  return arg === `--${name}` ? 'true' : arg.slice(prefix.length);
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => issue.message);
}

function readRules(rulesPath: string | undefined): { rules?: CleaningRules; issues: string[] } {
  let override: unknown = {};
  if (rulesPath) {
    try {
      override = JSON.parse(fs.readFileSync(rulesPath, 'utf8'));
    } catch (error) {
      const { message } = describeError(error);
      return { issues: [`--rules file ${rulesPath} cannot be read: ${message}`] };
    }
  }
  const resolved = resolveCleaningRules(override);
  return resolved.ok ? { rules: resolved.rules, issues: [] } : { issues: resolved.issues };
}

/**
 * Builds the run configuration from CLI flags, falling back to environment
 * variables. Every invocation parameter must be given explicitly; all
 * problems are reported together in one ConfigurationError.
 */
export function loadEtlConfig(args: readonly string[], env: Env): EtlConfig {
  const pick = (flag: string, variable?: string) => argValue(args, flag) ?? (variable ? env[variable] : undefined);
  const issues: string[] = [];

  const invocation = InvocationSchema.safeParse({
    input: pick('input', 'ETL_INPUT'),
    table: pick('table', 'ETL_TABLE'),
    chunkSize: pick('chunk-size', 'ETL_CHUNK_SIZE'),
    batchSize: pick('batch-size', 'ETL_BATCH_SIZE'),
    exclusionLogPath: pick('exclusion-log', 'ETL_EXCLUSION_LOG'),
    startOffset: pick('offset'),
    maxAttempts: pick('max-attempts', 'ETL_MAX_ATTEMPTS'),
    baseBackoffMs: pick('backoff-ms', 'ETL_BACKOFF_MS'),
    bulkMode: pick('bulk-mode', 'ETL_BULK_MODE'),
  });
  if (!invocation.success) issues.push(...issuesOf(invocation.error));

  const databaseUrl = pick('database-url', 'DATABASE_URL');
  const connection = ConnectionSchema.safeParse(
    databaseUrl
      ? { connectionString: databaseUrl }
      : {
          host: pick('db-host', 'PGHOST'),
          port: pick('db-port', 'PGPORT'),
          database: pick('db-name', 'PGDATABASE'),
          user: pick('db-user', 'PGUSER'),
          password: pick('db-password', 'PGPASSWORD'),
        }
  );
  if (!connection.success) {
    // the union reports each branch; the field-level branch is the useful one
    const branchIssues = connection.error.issues.flatMap((issue) =>
      issue.code === 'invalid_union' ? issue.unionErrors.slice(-1).flatMap(issuesOf) : [issue.message]
    );
    issues.push(...branchIssues);
  }

  const rules = readRules(pick('rules', 'ETL_RULES'));
  issues.push(...rules.issues);

  if (!invocation.success || !connection.success || !rules.rules) {
    throw new ConfigurationError(issues);
  }

  const logDir = pick('log-dir', 'ETL_LOG_DIR');
  return {
    ...invocation.data,
    input: path.resolve(invocation.data.input),
    overwriteExclusionLog: pick('overwrite-log') === 'true',
    connection: connection.data,
    rules: rules.rules,
    logDir: logDir === 'none' ? null : path.resolve(logDir ?? 'etl_logs'),
  };
}
