import type { ChatPlatform } from '@/services/platform/platformClient';
import { errorMessage } from '@/utils/errors';
import type { Logger } from '@/utils/logger';
import { stripAnalysisMarkers } from '../format/response.formatter';

export const NO_KNOWLEDGE_ANSWER = "I couldn't generate a response. Please try again.";

interface KnowledgeAgentOptions {
  platform: ChatPlatform;
  workflowId: string;
  logger?: Logger;
}

/** Conversational answers from the platform's knowledge workflow. */
export class KnowledgeAgent {
  constructor(private readonly options: KnowledgeAgentOptions) {}

  async answer(query: string): Promise<string> {
    const { platform, workflowId, logger } = this.options;
    try {
      const response = await platform.chat({ workflowId, query });
      if (!response.answer) {
        return NO_KNOWLEDGE_ANSWER;
      }
      return stripAnalysisMarkers(response.answer);
    } catch (err) {
      logger?.error({ err: errorMessage(err) }, 'Knowledge workflow request failed');
      return `Error processing regular query: ${errorMessage(err)}`;
    }
  }
}
