import type { ChatPlatform } from '@/services/platform/platformClient';
import { errorMessage } from '@/utils/errors';
import type { Logger } from '@/utils/logger';

export const NO_RESPONSE = 'No response received from the AI service.';

export function buildDiaQuery(hasFile: boolean, text?: string): string {
  if (text && hasFile) {
    return `Based on the uploaded document and the following description, provide a detailed analysis and answer: ${text}`;
  }
  if (text) {
    return `Based on the following description, provide a detailed analysis and answer: ${text}`;
  }
  if (hasFile) {
    return 'Provide a detailed analysis of the uploaded document.';
  }
  return 'Provide a detailed answer.';
}

export class DiaProcessingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DiaProcessingError';
  }
}

interface DiaAnalyzerOptions {
  platform: ChatPlatform;
  workflowId: string;
  logger?: Logger;
}

export class DiaAnalyzer {
  constructor(private readonly options: DiaAnalyzerOptions) {}

  async process(filePath?: string, text?: string): Promise<string> {
    const { platform, workflowId, logger } = this.options;
    try {
      const fileUuids: string[] = [];
      if (filePath) {
        fileUuids.push(await platform.uploadFile(filePath, workflowId));
      }

      const query = buildDiaQuery(filePath !== undefined, text);
      logger?.debug({ workflowId, files: fileUuids.length, queryLength: query.length }, 'Sending DIA query');
      const response = await platform.chat({ workflowId, query, fileUuids });
      return response.answer ?? NO_RESPONSE;
    } catch (err) {
      throw new DiaProcessingError(`Error processing DIA request: ${errorMessage(err)}`);
    }
  }
}
