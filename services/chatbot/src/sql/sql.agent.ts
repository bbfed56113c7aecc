import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { errorMessage } from '@/utils/errors';
import type { Logger } from '@/utils/logger';
import { formatTimestamp } from '@/utils/timestamps';
import type { WarehouseSettings } from '../config/chatbot.config';
import { systemMessage, userMessage, type LlmClient } from '../llm/llm.client';
import { formatTable, toCsv } from './tabular';
import { quoteIdentifier, type QueryResult, type Row, type Warehouse } from './warehouse';

export interface ColumnInfo {
  name: string;
  dataType: string;
  nullable: boolean;
  characterMaximumLength: number | null;
  numericPrecision: number | null;
  numericScale: number | null;
}

export interface TableInfo {
  tableName: string;
  columns: ColumnInfo[];
  sampleColumns: string[];
  sampleRows: Row[];
  rowCount: number | null;
}

export interface QueryValidation {
  valid: boolean;
  message: string;
  query: string;
}

const columnRowSchema = z.object({
  column_name: z.string(),
  data_type: z.string(),
  is_nullable: z.string(),
  character_maximum_length: z.coerce.number().nullable(),
  numeric_precision: z.coerce.number().nullable(),
  numeric_scale: z.coerce.number().nullable()
});

export const PREVIEW_ROWS = 10;
const MAX_RELEVANT_TABLES = 5;

export function stripCodeFences(text: string): string {
  let sql = text.trim();
  if (sql.startsWith('```sql')) {
    sql = sql.slice(6);
  } else if (sql.startsWith('```')) {
    sql = sql.slice(3);
  }
  if (sql.endsWith('```')) {
    sql = sql.slice(0, -3);
  }
  return sql.trim();
}

export function describeColumn(column: ColumnInfo): string {
  let description = `${column.name} (${column.dataType}`;
  if (column.characterMaximumLength) {
    description += `(${column.characterMaximumLength})`;
  } else if (column.numericPrecision) {
    description += column.numericScale
      ? `(${column.numericPrecision},${column.numericScale})`
      : `(${column.numericPrecision})`;
  }
  description += ')';
  return column.nullable ? description : `${description} NOT NULL`;
}

/** Words longer than three characters that appear inside a table name. */
function tablesMatchingWords(question: string, tables: string[]): string[] {
  const words = question
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 3);
  return tables.filter((table) => {
    const lower = table.toLowerCase();
    return words.some((word) => lower.includes(word));
  });
}

interface SqlAgentOptions {
  llm: LlmClient;
  warehouse: Warehouse;
  settings: Pick<WarehouseSettings, 'schema' | 'allowedTables' | 'tablePattern'>;
  staticDir: string;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Answers data questions by picking tables, generating PostgreSQL with the LLM,
 * running it read-only and summarising the rows.
 */
export class SqlAgent {
  private readonly tableCache = new Map<string, TableInfo>();
  private readonly now: () => Date;

  constructor(private readonly options: SqlAgentOptions) {
    this.now = options.now ?? (() => new Date());
  }

  private qualified(table: string): string {
    return `${quoteIdentifier(this.options.settings.schema)}.${quoteIdentifier(table)}`;
  }

  async getAvailableTables(): Promise<string[]> {
    const { settings, warehouse, logger } = this.options;
    if (settings.allowedTables.length > 0) {
      return settings.allowedTables;
    }

    const params: unknown[] = [settings.schema];
    let sql =
      "SELECT table_name FROM information_schema.tables WHERE table_schema = $1 AND table_type = 'BASE TABLE'";
    if (settings.tablePattern) {
      params.push(settings.tablePattern);
      sql += ' AND table_name LIKE $2';
    }
    sql += ' ORDER BY table_name';

    const result = await warehouse.executeQuery(sql, params);
    if (!result.success) {
      logger?.warn({ err: result.error }, 'No tables found or query failed');
      return [];
    }
    const tables = result.rows
      .map((row) => row.table_name)
      .filter((name): name is string => typeof name === 'string');
    logger?.info({ count: tables.length }, 'Found tables');
    return tables;
  }

  async determineRelevantTables(question: string, availableTables: string[]): Promise<string[]> {
    const { llm, logger } = this.options;
    if (availableTables.length === 0) return [];

    const prompt = [
      'Given the following question and list of available tables, determine which tables are most relevant to answer the question.',
      '',
      `Question: ${question}`,
      '',
      'Available Tables:',
      ...availableTables.map((table) => `- ${table}`),
      '',
      'Return only the table names that are relevant, one per line, without any additional text or explanation.',
      'If no tables seem relevant, return "NONE".'
    ].join('\n');

    let relevant: string[];
    try {
      const response = await llm.generateResponse([
        systemMessage('You are a database expert. Analyze the question and return only relevant table names.'),
        userMessage(prompt)
      ]);
      relevant = response
        .trim()
        .split('\n')
        .map((line) => line.trim().replace(/^-+|-+$/g, '').trim())
        .filter((name) => name !== '' && name !== 'NONE' && availableTables.includes(name));
      if (relevant.length === 0) {
        relevant = tablesMatchingWords(question, availableTables);
      }
    } catch (err) {
      logger?.error({ err: errorMessage(err) }, 'Error determining relevant tables');
      relevant = tablesMatchingWords(question, availableTables);
    }

    logger?.info({ tables: relevant }, 'Relevant tables identified');
    return relevant.slice(0, MAX_RELEVANT_TABLES);
  }

  async getTableInfo(tableName: string): Promise<TableInfo> {
    const cached = this.tableCache.get(tableName);
    if (cached) return cached;

    const { warehouse, settings, logger } = this.options;
    const empty: TableInfo = { tableName, columns: [], sampleColumns: [], sampleRows: [], rowCount: null };

    const columnsResult = await warehouse.executeQuery(
      `SELECT column_name, data_type, is_nullable, character_maximum_length, numeric_precision, numeric_scale
FROM information_schema.columns
WHERE table_schema = $1 AND table_name = $2
ORDER BY ordinal_position`,
      [settings.schema, tableName]
    );
    if (!columnsResult.success) {
      logger?.error({ table: tableName, err: columnsResult.error }, 'Failed to get columns for table');
      return empty;
    }

    const columns: ColumnInfo[] = [];
    for (const row of columnsResult.rows) {
      const parsed = columnRowSchema.safeParse(row);
      if (!parsed.success) continue;
      columns.push({
        name: parsed.data.column_name,
        dataType: parsed.data.data_type,
        nullable: parsed.data.is_nullable !== 'NO',
        characterMaximumLength: parsed.data.character_maximum_length,
        numericPrecision: parsed.data.numeric_precision,
        numericScale: parsed.data.numeric_scale
      });
    }
    if (columns.length === 0) {
      return empty;
    }

    const sample = await warehouse.executeQuery(`SELECT * FROM ${this.qualified(tableName)} LIMIT 5`);
    const count = await warehouse.executeQuery(`SELECT COUNT(*) AS row_count FROM ${this.qualified(tableName)}`);
    const rawCount = count.success ? count.rows[0]?.row_count : undefined;
    const rowCount = rawCount === undefined || rawCount === null ? null : Number(rawCount);

    const info: TableInfo = {
      tableName,
      columns,
      sampleColumns: sample.success ? sample.columns : [],
      sampleRows: sample.success ? sample.rows : [],
      rowCount: rowCount !== null && Number.isFinite(rowCount) ? rowCount : null
    };
    this.tableCache.set(tableName, info);
    return info;
  }

  async generateSqlQuery(question: string, tableInfos: TableInfo[]): Promise<string> {
    const { llm, logger } = this.options;
    const schemas = tableInfos.map((info) => {
      const lines = [
        `Table: ${info.tableName}`,
        `Columns: ${info.columns.map(describeColumn).join(', ')}`,
        `Row Count: ${info.rowCount ?? 'Unknown'}`
      ];
      if (info.sampleRows.length > 0) {
        lines.push(`Sample Data:\n${formatTable(info.sampleColumns, info.sampleRows)}`);
      }
      return lines.join('\n');
    });

    const prompt = `You are an expert SQL developer working with PostgreSQL. Generate a SQL query to answer the following question.

Question: ${question}

Available Tables and Schema:
${schemas.join('\n\n')}

Guidelines:
1. Use proper PostgreSQL syntax
2. Include appropriate JOINs if multiple tables are needed
3. Use proper aggregation functions when needed
4. Include ORDER BY clauses for better results
5. Use LIMIT when appropriate to avoid large result sets
6. Handle NULL values appropriately
7. Use proper date/time functions for PostgreSQL
8. Table names and column names should be properly quoted if needed

Return only the SQL query without any explanation or additional text.`;

    try {
      const response = await llm.generateResponse([
        systemMessage('You are an expert SQL developer. Generate only valid PostgreSQL queries.'),
        userMessage(prompt)
      ]);
      const sql = stripCodeFences(response);
      logger?.info({ sql }, 'Generated SQL query');
      return sql;
    } catch (err) {
      logger?.error({ err: errorMessage(err) }, 'Error generating SQL query');
      return '';
    }
  }

  async validateQuery(query: string, tableInfos: TableInfo[]): Promise<QueryValidation> {
    const { llm, logger } = this.options;
    const schemas = tableInfos
      .map((info) => `${info.tableName}: ${info.columns.map((column) => column.name).join(', ')}`)
      .join('\n');

    const prompt = `Review the following SQL query for common mistakes and issues:

SQL Query:
${query}

Available Tables and Columns:
${schemas}

Check for:
1. Syntax errors
2. Invalid table or column names
3. Missing JOIN conditions
4. Incorrect aggregation usage
5. Data type mismatches
6. Performance issues (missing WHERE clauses, etc.)
7. PostgreSQL-specific syntax correctness

If the query is correct, respond with: "VALID"
If there are issues, respond with: "INVALID: [description of issues]"
If you can suggest a corrected query, also include: "CORRECTED: [corrected SQL query]"`;

    try {
      const response = await llm.generateResponse([
        systemMessage('You are a SQL expert reviewer. Validate queries for correctness and performance.'),
        userMessage(prompt)
      ]);

      if (response.trim().startsWith('VALID')) {
        return { valid: true, message: 'Query is valid', query };
      }
      if (!response.includes('INVALID:')) {
        return { valid: true, message: 'Query validation completed', query };
      }

      const [issues = '', corrected] = response.split('CORRECTED:');
      const message = issues.replace('INVALID:', '').trim();
      return { valid: false, message, query: corrected === undefined ? query : stripCodeFences(corrected) };
    } catch (err) {
      logger?.error({ err: errorMessage(err) }, 'Error validating query');
      return { valid: true, message: `Validation error: ${errorMessage(err)}`, query };
    }
  }

  async correctQueryErrors(query: string, error: string, tableInfos: TableInfo[]): Promise<string> {
    const { llm, logger } = this.options;
    const schemas = tableInfos
      .map(
        (info) =>
          `${info.tableName}: ${info.columns.map((column) => `${column.name} (${column.dataType})`).join(', ')}`
      )
      .join('\n');

    const prompt = `The following SQL query failed with an error. Please correct it:

Original Query:
${query}

Error Message:
${error}

Available Tables and Columns:
${schemas}

Please provide a corrected SQL query that fixes the error. Return only the corrected SQL query without any explanation.`;

    try {
      const response = await llm.generateResponse([
        systemMessage('You are a SQL expert. Fix broken queries based on error messages.'),
        userMessage(prompt)
      ]);
      const corrected = stripCodeFences(response);
      logger?.info({ sql: corrected }, 'Corrected query');
      return corrected;
    } catch (err) {
      logger?.error({ err: errorMessage(err) }, 'Error correcting query');
      return query;
    }
  }

  private async exportCsv(result: QueryResult): Promise<string | null> {
    const { staticDir, logger } = this.options;
    const fileName = `results_${formatTimestamp(this.now())}_${crypto.randomBytes(4).toString('hex')}.csv`;
    try {
      await fs.writeFile(path.join(staticDir, fileName), toCsv(result.columns, result.rows), 'utf-8');
      return `/static/${fileName}`;
    } catch (err) {
      logger?.warn({ err: errorMessage(err), fileName }, 'Could not write CSV export');
      return null;
    }
  }

  async formatResponse(question: string, result: QueryResult, query: string): Promise<string> {
    const timing = `Query executed: ${query}\nExecution time: ${result.executionTimeSec.toFixed(2)} seconds`;

    if (!result.success) {
      return `I apologize, but I encountered an error while executing the query for your question: "${question}"

Error: ${result.error ?? 'Unknown error'}

Query attempted: ${query}

Please try rephrasing your question or check if the requested data exists in the database.`;
    }

    if (result.rows.length === 0) {
      return `I successfully executed your query for: "${question}"

However, no data was returned. This could mean:
- The data you're looking for doesn't exist
- The filtering conditions are too restrictive
- The tables might be empty

${timing}`;
    }

    const preview = formatTable(result.columns, result.rows.slice(0, PREVIEW_ROWS));
    const csvLink = await this.exportCsv(result);

    const prompt = `You are a data analyst. Summarize the following SQL query results in plain English for the user, highlighting key findings, trends, or insights. If the data is tabular, mention notable values, counts, or patterns. Be concise and user-friendly.

User Question:
${question}

SQL Query Executed:
${query}

Results (showing up to ${PREVIEW_ROWS} rows):
${preview}

If the data is too large, summarize only what is shown. If the data is simple, provide a brief summary.`;

    let summary: string;
    try {
      summary = await this.options.llm.generateResponse([
        systemMessage('You are a helpful data analyst who summarizes SQL results for business users.'),
        userMessage(prompt)
      ]);
    } catch (err) {
      summary = `(Could not generate summary: ${errorMessage(err)})\n${preview}`;
    }

    let response = `Summary for your question: "${question}"\n\n${summary.trim()}`;
    if (result.rowCount > PREVIEW_ROWS) {
      response += `\n\n(Showing first ${PREVIEW_ROWS} rows out of ${result.rowCount} total rows)`;
    }
    if (csvLink) {
      response += `\n\nYou can also download the attached CSV with all relevant records: [Download CSV](${csvLink})`;
    }
    return `${response}\n\n${timing}`;
  }

  async processQuestion(question: string, maxRetries = 2): Promise<string> {
    const { warehouse, logger } = this.options;
    logger?.info({ question }, 'Processing question');

    try {
      const availableTables = await this.getAvailableTables();
      if (availableTables.length === 0) {
        return "I couldn't find any tables in the database. Please check the database connection and permissions.";
      }

      const relevantTables = await this.determineRelevantTables(question, availableTables);
      if (relevantTables.length === 0) {
        return `I couldn't find any tables relevant to your question: '${question}'. Available tables: ${availableTables.slice(0, 10).join(', ')}`;
      }

      const tableInfos: TableInfo[] = [];
      for (const table of relevantTables) {
        const info = await this.getTableInfo(table);
        if (info.columns.length > 0) tableInfos.push(info);
      }
      if (tableInfos.length === 0) {
        return `I couldn't retrieve schema information for the relevant tables: ${relevantTables.join(', ')}`;
      }

      let query = await this.generateSqlQuery(question, tableInfos);
      if (!query) {
        return "I couldn't generate a SQL query for your question. Please try rephrasing it.";
      }

      const validation = await this.validateQuery(query, tableInfos);
      if (!validation.valid) {
        logger?.info({ issues: validation.message }, 'Query validation issues');
        query = validation.query;
      }

      for (let attempt = 0; ; attempt++) {
        const result = await warehouse.executeQuery(query);
        if (result.success) {
          return await this.formatResponse(question, result, query);
        }
        if (attempt < maxRetries) {
          logger?.info({ attempt: attempt + 1 }, 'Query failed, attempting correction');
          const corrected = await this.correctQueryErrors(query, result.error ?? 'Unknown error', tableInfos);
          if (corrected !== query) {
            query = corrected;
            continue;
          }
        }
        return await this.formatResponse(question, result, query);
      }
    } catch (err) {
      logger?.error({ err: errorMessage(err) }, 'Error processing question');
      return `I encountered an unexpected error while processing your question: ${errorMessage(err)}`;
    }
  }

  close(): Promise<void> {
    return this.options.warehouse.close();
  }
}
