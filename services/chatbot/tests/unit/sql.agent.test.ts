/**
 * SQL Agent Unit Tests
 *
 * Tests for: src/sql/sql.agent.ts
 *
 * - Table discovery and selection
 * - Query generation, review and correction
 * - Answer formatting and CSV export
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqlAgent, describeColumn, stripCodeFences } from '../../src/sql/sql.agent';
import type { Row } from '../../src/sql/warehouse';
import {
  createFakeLlm,
  createFakeWarehouse,
  failedResult,
  okResult,
  type FakeTable,
  type LlmTask,
  type LlmReply
} from '../fixtures/fakes';

const regionRows: Row[] = Array.from({ length: 12 }, (_, i) => ({ region: `r${i}`, total: i }));

const TABLES: Record<string, FakeTable> = {
  orders: {
    columns: [
      { name: 'region', type: 'text' },
      { name: 'total', type: 'numeric', nullable: false }
    ],
    rows: regionRows
  },
  customers: {
    columns: [{ name: 'name', type: 'text' }],
    rows: [{ name: 'Ada' }]
  }
};

describe('SqlAgent', () => {
  let staticDir: string;

  beforeEach(async () => {
    staticDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sql-agent-'));
  });

  afterEach(async () => {
    await fs.rm(staticDir, { recursive: true, force: true });
  });

  function createAgent(
    replies: Partial<Record<LlmTask, LlmReply | LlmReply[]>>,
    warehouse = createFakeWarehouse(TABLES),
    allowedTables: string[] = [],
    tablePattern?: string
  ) {
    const llm = createFakeLlm(replies);
    const agent = new SqlAgent({
      llm,
      warehouse,
      settings: { schema: 'public', allowedTables, tablePattern },
      staticDir,
      now: () => new Date(2024, 0, 15, 9, 30, 5)
    });
    return { agent, llm, warehouse };
  }

  describe('helpers', () => {
    it('strips code fences', () => {
      expect(stripCodeFences('```sql\nSELECT 1\n```')).toBe('SELECT 1');
      expect(stripCodeFences('```\nSELECT 2```')).toBe('SELECT 2');
      expect(stripCodeFences('  SELECT 3  ')).toBe('SELECT 3');
    });

    it('describes columns with their sizes', () => {
      const base = { nullable: true, characterMaximumLength: null, numericPrecision: null, numericScale: null };
      expect(describeColumn({ ...base, name: 'code', dataType: 'character varying', characterMaximumLength: 8 })).toBe(
        'code (character varying(8))'
      );
      expect(describeColumn({ ...base, name: 'total', dataType: 'numeric', numericPrecision: 10, numericScale: 2 })).toBe(
        'total (numeric(10,2))'
      );
      expect(describeColumn({ ...base, name: 'id', dataType: 'integer', numericPrecision: 32, nullable: false })).toBe(
        'id (integer(32)) NOT NULL'
      );
    });
  });

  describe('getAvailableTables', () => {
    it('prefers the configured table list', async () => {
      const { agent, warehouse } = createAgent({}, undefined, ['orders']);
      expect(await agent.getAvailableTables()).toEqual(['orders']);
      expect(warehouse.executeQuery).not.toHaveBeenCalled();
    });

    it('filters the information schema by pattern', async () => {
      const { agent, warehouse } = createAgent({}, undefined, [], 'ord%');
      expect(await agent.getAvailableTables()).toEqual(['orders', 'customers']);

      const call = warehouse.executeQuery.mock.calls[0];
      expect(call?.[0]).toContain('AND table_name LIKE $2');
      expect(call?.[1]).toEqual(['public', 'ord%']);
    });

    it('returns nothing when the catalogue query fails', async () => {
      const warehouse = createFakeWarehouse({});
      warehouse.executeQuery.mockResolvedValueOnce(failedResult('catalogue', 'permission denied'));
      const { agent } = createAgent({}, warehouse);
      expect(await agent.getAvailableTables()).toEqual([]);
    });
  });

  describe('determineRelevantTables', () => {
    it('keeps only known table names from the model', async () => {
      const { agent } = createAgent({ tables: '- orders\n- invoices\nNONE' });
      expect(await agent.determineRelevantTables('Totals?', ['orders', 'customers'])).toEqual(['orders']);
    });

    it('falls back to words that appear in table names', async () => {
      const { agent } = createAgent({ tables: 'NONE' });
      expect(await agent.determineRelevantTables('Show customers by region', ['orders', 'customers'])).toEqual([
        'customers'
      ]);
    });

    it('falls back when the model fails', async () => {
      const { agent } = createAgent({ tables: new Error('timeout') });
      expect(await agent.determineRelevantTables('List orders', ['orders', 'customers'])).toEqual(['orders']);
    });

    it('returns at most five tables', async () => {
      const tables = ['t1', 't2', 't3', 't4', 't5', 't6'];
      const { agent } = createAgent({ tables: tables.join('\n') });
      expect(await agent.determineRelevantTables('Everything', tables)).toEqual(tables.slice(0, 5));
    });
  });

  describe('getTableInfo', () => {
    it('loads columns, samples and the row count once', async () => {
      const { agent, warehouse } = createAgent({});

      const info = await agent.getTableInfo('orders');
      await agent.getTableInfo('orders');

      expect(warehouse.executeQuery).toHaveBeenCalledTimes(3);
      expect(info.columns.map((column) => column.name)).toEqual(['region', 'total']);
      expect(info.columns[1]?.nullable).toBe(false);
      expect(info.sampleRows).toHaveLength(5);
      expect(info.sampleColumns).toEqual(['region', 'total']);
      expect(info.rowCount).toBe(12);
    });

    it('returns an empty description for unknown tables', async () => {
      const { agent } = createAgent({});
      const info = await agent.getTableInfo('missing');
      expect(info.columns).toEqual([]);
      expect(info.rowCount).toBeNull();
    });
  });

  describe('validateQuery', () => {
    it.each<[string, { valid: boolean; message: string; query: string }]>([
      ['VALID', { valid: true, message: 'Query is valid', query: 'SELECT 1' }],
      [
        'INVALID: wrong column\nCORRECTED: ```sql\nSELECT 2\n```',
        { valid: false, message: 'wrong column', query: 'SELECT 2' }
      ],
      ['INVALID: missing join', { valid: false, message: 'missing join', query: 'SELECT 1' }],
      ['Looks fine to me', { valid: true, message: 'Query validation completed', query: 'SELECT 1' }]
    ])('interprets %j', async (reply, expected) => {
      const { agent } = createAgent({ validate: reply });
      expect(await agent.validateQuery('SELECT 1', [])).toEqual(expected);
    });

    it('treats review failures as valid', async () => {
      const { agent } = createAgent({ validate: new Error('busy') });
      expect(await agent.validateQuery('SELECT 1', [])).toEqual({
        valid: true,
        message: 'Validation error: busy',
        query: 'SELECT 1'
      });
    });
  });

  describe('processQuestion', () => {
    const QUERY = 'SELECT region, total FROM orders';

    it('answers with a summary, a CSV export and timing', async () => {
      const warehouse = createFakeWarehouse(TABLES, (sql) =>
        sql === QUERY ? okResult(sql, ['region', 'total'], regionRows) : failedResult(sql, 'unexpected')
      );
      const { agent } = createAgent(
        {
          tables: 'orders',
          generate: `\`\`\`sql\n${QUERY}\n\`\`\``,
          validate: 'VALID',
          summarize: '  North leads.  '
        },
        warehouse
      );

      const answer = await agent.processQuestion('Total by region?');

      const link = /\[Download CSV\]\(\/static\/(results_20240115_093005_[0-9a-f]{8}\.csv)\)/.exec(answer);
      expect(link?.[1]).toBeDefined();
      expect(answer).toBe(
        [
          'Summary for your question: "Total by region?"',
          '',
          'North leads.',
          '',
          '(Showing first 10 rows out of 12 total rows)',
          '',
          `You can also download the attached CSV with all relevant records: [Download CSV](/static/${link?.[1]})`,
          '',
          `Query executed: ${QUERY}`,
          'Execution time: 0.25 seconds'
        ].join('\n')
      );

      const csv = await fs.readFile(path.join(staticDir, link?.[1] ?? ''), 'utf-8');
      const lines = csv.trimEnd().split('\n');
      expect(lines).toHaveLength(13);
      expect(lines[0]).toBe('region,total');
      expect(lines[12]).toBe('r11,11');
    });

    it('uses the corrected query from the review', async () => {
      const warehouse = createFakeWarehouse(TABLES, (sql) =>
        sql === QUERY ? okResult(sql, ['region', 'total'], []) : failedResult(sql, 'unexpected')
      );
      const { agent } = createAgent(
        {
          tables: 'orders',
          generate: 'SELECT regoin FROM orders',
          validate: `INVALID: typo\nCORRECTED: ${QUERY}`
        },
        warehouse
      );

      const answer = await agent.processQuestion('Regions?');

      expect(answer.startsWith('I successfully executed your query for: "Regions?"')).toBe(true);
      expect(answer.endsWith(`Query executed: ${QUERY}\nExecution time: 0.25 seconds`)).toBe(true);
    });

    it('corrects failing queries up to the retry limit', async () => {
      const warehouse = createFakeWarehouse(TABLES, (sql) => failedResult(sql, `failed: ${sql}`));
      const { agent, llm } = createAgent(
        {
          tables: 'orders',
          generate: 'SELECT 1',
          validate: 'VALID',
          correct: ['SELECT 2', 'SELECT 3', 'SELECT 4']
        },
        warehouse
      );

      const answer = await agent.processQuestion('Anything?');

      const executed = warehouse.executeQuery.mock.calls.map(([sql]) => sql).filter((sql) => /^SELECT \d$/.test(sql));
      expect(executed).toEqual(['SELECT 1', 'SELECT 2', 'SELECT 3']);
      const corrections = llm.generateResponse.mock.calls.filter(([messages]) =>
        (messages[0]?.content ?? '').includes('Fix broken queries')
      );
      expect(corrections).toHaveLength(2);
      expect(answer).toBe(
        [
          'I apologize, but I encountered an error while executing the query for your question: "Anything?"',
          '',
          'Error: failed: SELECT 3',
          '',
          'Query attempted: SELECT 3',
          '',
          'Please try rephrasing your question or check if the requested data exists in the database.'
        ].join('\n')
      );
    });

    it('stops retrying when the correction changes nothing', async () => {
      const warehouse = createFakeWarehouse(TABLES, (sql) => failedResult(sql, 'boom'));
      const { agent } = createAgent(
        { tables: 'orders', generate: 'SELECT 1', validate: 'VALID', correct: 'SELECT 1' },
        warehouse
      );

      const answer = await agent.processQuestion('Anything?');

      const executed = warehouse.executeQuery.mock.calls.filter(([sql]) => sql === 'SELECT 1');
      expect(executed).toHaveLength(1);
      expect(answer).toContain('Error: boom');
    });

    it('explains when no tables exist', async () => {
      const { agent } = createAgent({}, createFakeWarehouse({}));
      expect(await agent.processQuestion('Anything?')).toBe(
        "I couldn't find any tables in the database. Please check the database connection and permissions."
      );
    });

    it('lists the tables when none look relevant', async () => {
      const { agent } = createAgent({ tables: 'NONE' });
      expect(await agent.processQuestion('Weather?')).toBe(
        "I couldn't find any tables relevant to your question: 'Weather?'. Available tables: orders, customers"
      );
    });

    it('explains when no query could be generated', async () => {
      const { agent } = createAgent({ tables: 'orders', generate: new Error('model offline') });
      expect(await agent.processQuestion('Totals?')).toBe(
        "I couldn't generate a SQL query for your question. Please try rephrasing it."
      );
    });
  });
});
