import { z } from 'zod';
import { errorMessage } from '@/utils/errors';
import type { Logger } from '@/utils/logger';
import { systemMessage, userMessage, type LlmClient } from '../llm/llm.client';
import type { SqlAgent } from '../sql/sql.agent';
import keywordTables from './keywords.json';

export type QueryType = 'sql' | 'rag' | 'ambiguous';

export const SQL_ROUTE = 'SQL Database Agent';
export const RAG_ROUTE = 'RAG Knowledge Agent';
export const REVIEW_ROUTE = 'Manual Review Required';

export interface Classification {
  type: QueryType;
  confidence: number;
  reasoning: string;
  suggestedRoute: string;
}

export interface RouteScores {
  sql: number;
  rag: number;
}

export interface ClassificationResult extends Classification {
  scores: RouteScores;
}

export interface LlmVerdict {
  type: QueryType;
  confidence: number;
  reasoning: string;
}

const keywordsSchema = z.object({
  sql: z.record(z.number()),
  rag: z.record(z.number()),
  dbTerms: z.array(z.string())
});

const KEYWORDS = keywordsSchema.parse(keywordTables);

const SQL_PATTERNS = [
  /\b(show|list|get|find|retrieve)\s+(all|top|first|\d+)?\s*\w+/,
  /\b(how many|count of|number of|total)\b/,
  /\b(sum|average|max|min|count)\s+of\b/,
  /\b(greater than|less than|between|equals?)\s+\d+/,
  /\b(last|previous|recent|current)\s+(year|month|week|day)/,
  /\b(compare|versus|vs)\b/,
  /\b(group by|order by|sort by)\b/,
  /\bwhere\s+\w+\s*(=|>|<|>=|<=)/,
  /\b(join|inner join|left join|right join)\b/
];

const RAG_PATTERNS = [
  /\b(what is|what are|what does)\b/,
  /\b(explain|describe|define)\b/,
  /\b(how to|how do|how can)\b/,
  /\b(why|because|reason)\b/,
  /\b(tell me about|information about)\b/,
  /\b(concept of|meaning of|definition of)\b/,
  /\b(best practice|recommendation|advice)\b/,
  /\b(generally|typically|usually|commonly)\b/
];

const WEIGHTS = { keyword: 0.25, context: 0.25, pattern: 0.25, llm: 0.25 };
const SCHEMA_TABLE_LIMIT = 18;
const PROMPT_TABLE_LIMIT = 10;

function meanWeight(table: Record<string, number>, query: string): number {
  let total = 0;
  let matches = 0;
  for (const [keyword, weight] of Object.entries(table)) {
    if (query.includes(keyword)) {
      total += weight;
      matches += 1;
    }
  }
  return matches > 0 ? total / matches : 0;
}

function patternShare(patterns: RegExp[], query: string): number {
  const matches = patterns.filter((pattern) => pattern.test(query)).length;
  return Math.min(matches / patterns.length, 1);
}

export function parseLlmVerdict(response: string): LlmVerdict {
  const verdict: LlmVerdict = { type: 'ambiguous', confidence: 0.5, reasoning: 'Could not parse LLM response' };
  for (const rawLine of response.trim().split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith('CLASSIFICATION:')) {
      const value = line.slice('CLASSIFICATION:'.length).trim().toUpperCase();
      if (value.includes('SQL')) verdict.type = 'sql';
      else if (value.includes('RAG')) verdict.type = 'rag';
    } else if (line.startsWith('CONFIDENCE:')) {
      const raw = line.slice('CONFIDENCE:'.length).trim();
      const value = raw === '' ? Number.NaN : Number(raw);
      verdict.confidence = Number.isNaN(value) ? 0.5 : Math.max(0, Math.min(1, value));
    } else if (line.startsWith('REASONING:')) {
      verdict.reasoning = line.slice('REASONING:'.length).trim();
    }
  }
  return verdict;
}

interface QueryClassifierOptions {
  llm: LlmClient;
  schema: Pick<SqlAgent, 'getAvailableTables' | 'getTableInfo'>;
  logger?: Logger;
}

/**
 * Scores a question as a data query or a knowledge question by combining
 * keyword, schema, regex and LLM signals with equal weight.
 */
export class QueryClassifier {
  private tables: string[] = [];
  private tableColumns = new Map<string, string[]>();

  constructor(private readonly options: QueryClassifierOptions) {}

  /** Loads table and column names used by the context score. */
  async initialize(): Promise<void> {
    const { schema, logger } = this.options;
    try {
      this.tables = await schema.getAvailableTables();
      for (const table of this.tables.slice(0, SCHEMA_TABLE_LIMIT)) {
        try {
          const info = await schema.getTableInfo(table);
          if (info.columns.length > 0) {
            this.tableColumns.set(
              table.toLowerCase(),
              info.columns.map((column) => column.name.toLowerCase())
            );
          }
        } catch (err) {
          logger?.warn({ table, err: errorMessage(err) }, 'Could not get schema for table');
        }
      }
      logger?.info({ tables: this.tableColumns.size }, 'Initialized schema for classification');
    } catch (err) {
      logger?.error({ err: errorMessage(err) }, 'Error initializing database schema');
      this.tables = [];
      this.tableColumns = new Map();
    }
  }

  keywordScores(query: string): RouteScores {
    const lower = query.toLowerCase();
    return { sql: meanWeight(KEYWORDS.sql, lower), rag: meanWeight(KEYWORDS.rag, lower) };
  }

  contextScore(query: string): number {
    const lower = query.toLowerCase();
    let score = 0;
    let matches = 0;

    for (const table of this.tables) {
      if (lower.includes(table.toLowerCase())) {
        score += 0.8;
        matches += 1;
      }
    }
    for (const columns of this.tableColumns.values()) {
      for (const column of columns) {
        if (column.length > 3 && lower.includes(column)) {
          score += 0.6;
          matches += 1;
        }
      }
    }
    for (const term of KEYWORDS.dbTerms) {
      if (lower.includes(term)) {
        score += 0.3;
        matches += 1;
      }
    }

    return matches > 0 ? Math.min(score / matches, 1) : 0;
  }

  patternScores(query: string): RouteScores {
    const lower = query.toLowerCase();
    return { sql: patternShare(SQL_PATTERNS, lower), rag: patternShare(RAG_PATTERNS, lower) };
  }

  buildClassificationPrompt(query: string): string {
    let tablesContext = '';
    if (this.tables.length > 0) {
      tablesContext = `Available database tables include: ${this.tables.slice(0, PROMPT_TABLE_LIMIT).join(', ')}`;
      if (this.tables.length > PROMPT_TABLE_LIMIT) {
        tablesContext += ` (and ${this.tables.length - PROMPT_TABLE_LIMIT} more)`;
      }
    }

    return `You are a query classifier that determines whether a user question should be routed to a SQL database agent or a RAG knowledge base agent.

${tablesContext}

Classification Guidelines:

SQL DATABASE AGENT - Route here if the query:
- Requests specific data from tables/databases
- Asks for counts, sums, averages, or other calculations
- Needs filtering, sorting, or aggregation of structured data
- Asks "how many", "show me", "list", "find records"
- Requests comparisons between data points
- Asks for trends, reports, or analytics from data
- References table names or data fields
- Needs real-time or current data from the database

RAG KNOWLEDGE AGENT - Route here if the query:
- Asks for explanations, definitions, or concepts
- Requests "what is", "explain", "describe", "define"
- Asks "how to" or procedural questions
- Seeks general knowledge or background information
- Asks for recommendations, best practices, or advice
- Requests analysis or interpretation (not raw data)
- Asks about policies, regulations, or guidelines
- Seeks opinions or subjective information

User Query: "${query}"

Respond with exactly this format:
CLASSIFICATION: [SQL or RAG]
CONFIDENCE: [0.0-1.0]
REASONING: [Brief explanation of why this classification was chosen]

Examples:
- "How many customers do we have?" → SQL (requests count from database)
- "What is customer segmentation?" → RAG (asks for concept explanation)
- "Show me top 10 sales by region" → SQL (requests specific data with sorting)
- "Explain how to improve customer retention" → RAG (asks for advice/strategy)`;
  }

  async llmClassification(query: string): Promise<LlmVerdict> {
    const { llm, logger } = this.options;
    try {
      const response = await llm.generateResponse(
        [
          systemMessage('You are an expert query classifier. Analyze queries and determine the best routing.'),
          userMessage(this.buildClassificationPrompt(query))
        ],
        0.1
      );
      return parseLlmVerdict(response);
    } catch (err) {
      logger?.error({ err: errorMessage(err) }, 'LLM classification failed');
      return { type: 'ambiguous', confidence: 0.5, reasoning: `LLM classification error: ${errorMessage(err)}` };
    }
  }

  async classify(query: string): Promise<ClassificationResult> {
    const keywords = this.keywordScores(query);
    const context = this.contextScore(query);
    const patterns = this.patternScores(query);
    const verdict = await this.llmClassification(query);

    const scores: RouteScores = {
      sql:
        WEIGHTS.keyword * keywords.sql +
        WEIGHTS.context * context +
        WEIGHTS.pattern * patterns.sql +
        WEIGHTS.llm * (verdict.type === 'sql' ? verdict.confidence : 0),
      rag:
        WEIGHTS.keyword * keywords.rag +
        WEIGHTS.context * (1 - context) +
        WEIGHTS.pattern * patterns.rag +
        WEIGHTS.llm * (verdict.type === 'rag' ? verdict.confidence : 0)
    };
    const summary = `SQL: ${scores.sql.toFixed(2)}, RAG: ${scores.rag.toFixed(2)}`;

    let result: ClassificationResult;
    if (Math.abs(scores.sql - scores.rag) < 0.1) {
      result = {
        type: 'ambiguous',
        confidence: 0.5,
        reasoning: `Ambiguous query. SQL score: ${scores.sql.toFixed(2)}, RAG score: ${scores.rag.toFixed(2)}`,
        suggestedRoute: REVIEW_ROUTE,
        scores
      };
    } else if (scores.sql > scores.rag) {
      result = {
        type: 'sql',
        confidence: Math.min(scores.sql, 0.95),
        reasoning: `SQL classification. Scores - ${summary}. ${verdict.reasoning}`,
        suggestedRoute: SQL_ROUTE,
        scores
      };
    } else {
      result = {
        type: 'rag',
        confidence: Math.min(scores.rag, 0.95),
        reasoning: `RAG classification. Scores - ${summary}. ${verdict.reasoning}`,
        suggestedRoute: RAG_ROUTE,
        scores
      };
    }

    this.options.logger?.info({ type: result.type, confidence: result.confidence }, 'Classification result');
    return result;
  }
}
