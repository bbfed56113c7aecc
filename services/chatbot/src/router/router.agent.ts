import { errorMessage } from '@/utils/errors';
import type { Logger } from '@/utils/logger';
import type { KnowledgeAgent } from '../knowledge/knowledge.agent';
import type { SqlAgent } from '../sql/sql.agent';
import {
  RAG_ROUTE,
  SQL_ROUTE,
  type Classification,
  type ClassificationResult,
  type QueryClassifier
} from './classifier.service';

export type ForcedRoute = 'sql' | 'rag';

export const CLARIFICATION_AGENT = 'Router (Clarification)';
export const ROUTING_FAILED_RESPONSE =
  'I encountered an error while processing your query. Please try again or rephrase your question.';

/** Serialised as is into the chatbot's `debug_info`. */
export interface RouteResult {
  query: string;
  timestamp: string;
  classification: {
    type: string;
    confidence: number;
    reasoning: string;
    suggested_route: string;
  } | null;
  response: string | null;
  agent_used: string | null;
  execution_time: number;
  success: boolean;
  error: string | null;
}

const FORCE_PREFIXES: Array<[string, ForcedRoute]> = [
  ['force sql ', 'sql'],
  ['force rag ', 'rag']
];

function forcedClassification(route: ForcedRoute): ClassificationResult {
  return route === 'sql'
    ? {
        type: 'sql',
        confidence: 1,
        reasoning: 'Forced SQL routing',
        suggestedRoute: SQL_ROUTE,
        scores: { sql: 1, rag: 0 }
      }
    : {
        type: 'rag',
        confidence: 1,
        reasoning: 'Forced RAG routing',
        suggestedRoute: RAG_ROUTE,
        scores: { sql: 0, rag: 1 }
      };
}

export function clarificationMessage(query: string, classification: Classification): string {
  return `I'm not entirely sure how to best answer your question: "${query}"

Based on my analysis, I think you might be looking for:
- ${classification.suggestedRoute} (confidence: ${(classification.confidence * 100).toFixed(1)}%)

To help me provide the best answer, could you clarify:

If you want specific data from our database, try rephrasing like:
• "Show me [specific data] from [table/category]"
• "How many [items] are there?"
• "List the top [number] [items] by [criteria]"

If you want explanations or general information, try:
• "Explain what [concept] means"
• "What is the definition of [term]?"
• "How does [process] work?"

Or you can specify your preference:
• Start with "force sql" to query our data
• Start with "force rag" to get conceptual information

Classification reasoning: ${classification.reasoning}`;
}

export function ambiguityNote(agent: string): string {
  return (
    `\n\nThis query was ambiguous. I chose the route with the highest confidence (${agent}).\n` +
    'If this is not what you expected, please clarify your intent or provide more details.\n'
  );
}

interface RouterAgentOptions {
  classifier: Pick<QueryClassifier, 'classify'>;
  sqlAgent: Pick<SqlAgent, 'processQuestion'>;
  knowledgeAgent: Pick<KnowledgeAgent, 'answer'>;
  confidenceThreshold: number;
  logger?: Logger;
  now?: () => Date;
}

export class RouterAgent {
  private readonly now: () => Date;

  constructor(private readonly options: RouterAgentOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /** Minimum confidence for knowledge answers; SQL uses the threshold itself. */
  get ragThreshold(): number {
    return Math.max(0.4, this.options.confidenceThreshold * 0.6);
  }

  async route(rawQuery: string, forceRoute?: ForcedRoute): Promise<RouteResult> {
    const { classifier, sqlAgent, knowledgeAgent, confidenceThreshold, logger } = this.options;
    const result: RouteResult = {
      query: rawQuery,
      timestamp: this.now().toISOString(),
      classification: null,
      response: null,
      agent_used: null,
      execution_time: 0,
      success: false,
      error: null
    };
    const start = Date.now();

    try {
      let query = rawQuery;
      let forced = forceRoute;
      const lower = query.toLowerCase();
      for (const [prefix, route] of FORCE_PREFIXES) {
        if (lower.startsWith(prefix)) {
          forced = route;
          query = query.slice(prefix.length).trim();
          break;
        }
      }

      const classification = forced ? forcedClassification(forced) : await classifier.classify(query);
      result.classification = {
        type: classification.type,
        confidence: classification.confidence,
        reasoning: classification.reasoning,
        suggested_route: classification.suggestedRoute
      };

      if (classification.type === 'sql') {
        if (forced || classification.confidence >= confidenceThreshold) {
          result.response = await sqlAgent.processQuestion(query);
          result.agent_used = SQL_ROUTE;
        } else {
          result.response = clarificationMessage(query, classification);
          result.agent_used = CLARIFICATION_AGENT;
        }
      } else if (classification.type === 'rag') {
        if (forced || classification.confidence >= this.ragThreshold) {
          result.response = await knowledgeAgent.answer(query);
          result.agent_used = RAG_ROUTE;
        } else {
          result.response = clarificationMessage(query, classification);
          result.agent_used = CLARIFICATION_AGENT;
        }
      } else {
        const useSql = classification.scores.sql > classification.scores.rag;
        const agent = useSql ? SQL_ROUTE : RAG_ROUTE;
        const response = useSql ? await sqlAgent.processQuestion(query) : await knowledgeAgent.answer(query);
        result.response = response + ambiguityNote(agent);
        result.agent_used = agent;
      }
      result.success = true;
    } catch (err) {
      result.error = `Error routing query: ${errorMessage(err)}`;
      logger?.error({ err: errorMessage(err) }, 'Error routing query');
      result.response = ROUTING_FAILED_RESPONSE;
      result.success = false;
    } finally {
      result.execution_time = (Date.now() - start) / 1000;
    }

    logger?.info(
      { agent: result.agent_used, success: result.success, executionTime: result.execution_time },
      'Query routed'
    );
    return result;
  }
}
