import pg, { type PoolConfig } from 'pg';
import { errorMessage } from '@/utils/errors';
import type { Logger } from '@/utils/logger';
import type { WarehouseSettings } from '../config/chatbot.config';

const { Pool } = pg;

export type Row = Record<string, unknown>;

export interface QueryResult {
  success: boolean;
  rows: Row[];
  columns: string[];
  error?: string;
  query: string;
  executionTimeSec: number;
  rowCount: number;
}

/** Read access to the data warehouse. `executeQuery` reports failures in the result. */
export interface Warehouse {
  executeQuery(sql: string, params?: unknown[]): Promise<QueryResult>;
  close(): Promise<void>;
}

/** The part of a `pg.Pool` the warehouse talks to. */
export interface Queryable {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: Row[]; fields: Array<{ name: string }>; rowCount: number | null }>;
  end(): Promise<void>;
}

export const READ_ONLY_ERROR = 'Only read-only SELECT statements are allowed';

const WRITE_KEYWORDS =
  /\b(insert|update|delete|merge|drop|alter|create|truncate|grant|revoke|copy|call|vacuum|into)\b/i;

// functions that change session settings or server state
const SIDE_EFFECT_FUNCTIONS =
  /\b(set_config|nextval|setval|pg_sleep\w*|pg_terminate_backend|pg_cancel_backend|pg_reload_conf|pg_rotate_logfile|pg_advisory\w*|pg_notify|pg_read_\w*file|pg_ls_\w+|lo_\w+|dblink\w*)\s*\(/i;

const MASKED_TOKENS =
  /\$([A-Za-z_]\w*)?\$[\s\S]*?\$\1\$|'(?:[^']|'')*'|"(?:[^"]|"")*"|--[^\n]*|\/\*[\s\S]*?\*\//g;

/**
 * Replaces string literals with `0`, quoted identifiers with `_q` and comments
 * with a space, so that only SQL keywords are left to inspect.
 */
export function maskLiterals(sql: string): string {
  return sql.replace(MASKED_TOKENS, (token) => {
    if (token.startsWith('--') || token.startsWith('/*')) return ' ';
    if (token.startsWith('"')) return '_q';
    return '0';
  });
}

export function isReadOnlyQuery(sql: string): boolean {
  const statement = maskLiterals(sql).trim().replace(/;\s*$/, '').trim();
  // an unmatched quote means the masking could not follow the statement
  if (!statement || statement.includes(';') || /['"$]/.test(statement.replace(/\$\d+/g, ''))) {
    return false;
  }

  const keyword = statement.split(/\s+/, 1)[0]?.toLowerCase();
  if (keyword !== 'select' && keyword !== 'with') return false;
  return !WRITE_KEYWORDS.test(statement) && !SIDE_EFFECT_FUNCTIONS.test(statement);
}

/** Pool settings; every session starts read-only. */
export function poolConfig(settings: WarehouseSettings): PoolConfig {
  return {
    connectionString: settings.connectionString,
    max: settings.poolMax,
    statement_timeout: settings.statementTimeoutMs,
    options: '-c default_transaction_read_only=on'
  };
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function elapsedSec(start: number): number {
  return (Date.now() - start) / 1000;
}

export class PgWarehouse implements Warehouse {
  private readonly pool: Queryable;

  constructor(
    settings: WarehouseSettings,
    private readonly logger?: Logger,
    pool?: Queryable
  ) {
    this.pool = pool ?? new Pool(poolConfig(settings));
  }

  async executeQuery(sql: string, params: unknown[] = []): Promise<QueryResult> {
    const start = Date.now();
    if (!isReadOnlyQuery(sql)) {
      this.logger?.warn({ query: sql }, 'Rejected non read-only query');
      return {
        success: false,
        rows: [],
        columns: [],
        error: READ_ONLY_ERROR,
        query: sql,
        executionTimeSec: 0,
        rowCount: 0
      };
    }

    try {
      const result = await this.pool.query(sql, params);
      const executionTimeSec = elapsedSec(start);
      this.logger?.debug({ rows: result.rows.length, executionTimeSec }, 'Query executed');
      return {
        success: true,
        rows: result.rows,
        columns: result.fields.map((field) => field.name),
        query: sql,
        executionTimeSec,
        rowCount: result.rows.length
      };
    } catch (err) {
      const error = errorMessage(err);
      this.logger?.error({ err: error, query: sql }, 'Query execution failed');
      return {
        success: false,
        rows: [],
        columns: [],
        error,
        query: sql,
        executionTimeSec: elapsedSec(start),
        rowCount: 0
      };
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger?.info('Database connection closed');
  }
}
