import type { ChatPlatform } from '@/services/platform/platformClient';
import { isMessageTooBig } from '@/services/platform/errors';
import type { Logger } from '@/utils/logger';
import { consolidateProject, convertSize, type SizeLimits } from './consolidator';
import { cleanLlmOutput } from './templates';

/** Tried in order; the next tier is used only when the platform rejects the payload size. */
export const SIZE_TIERS: readonly SizeLimits[] = [
  { maxFileSizeKb: 100, maxTotalSizeMb: 5 },
  { maxFileSizeKb: 50, maxTotalSizeMb: 2 },
  { maxFileSizeKb: 20, maxTotalSizeMb: 1 }
];

export interface GenerationPreferences {
  chat_history_length: number;
  enable_reasoning: boolean;
}

export interface GenerationRequest {
  folderPath: string;
  templateText: string;
  projectName?: string;
  preferences: GenerationPreferences;
  workflowId: string;
}

/** Raised when the model answer is empty or opens with an error message. */
export class InvalidDocumentationError extends Error {
  constructor() {
    super('The model did not return a valid response');
    this.name = 'InvalidDocumentationError';
  }
}

export function looksInvalid(documentation: string): boolean {
  return documentation.trim() === '' || documentation.slice(0, 100).includes('Error');
}

interface DocumentationGeneratorOptions {
  platform: ChatPlatform;
  logger?: Logger;
  tiers?: readonly SizeLimits[];
}

export function buildSystemPrompt(request: GenerationRequest, projectFiles: string): string {
  let prompt =
    'You are an expert documentation generator. Analyze the following project and fill the following template. ' +
    'Return the filled template as markdown or plain text.';
  if (request.projectName) {
    prompt += `\n\nPROJECT_NAME: ${request.projectName}`;
  }
  prompt += `\n\nTEMPLATE:\n${request.templateText}\n\nPROJECT_PATH: ${request.folderPath}`;
  prompt += `\n\nPROJECT_FILES:\n${projectFiles}`;
  return prompt;
}

export function buildQuery(folderPath: string, projectName?: string): string {
  const named = projectName ? ` named '${projectName}'` : '';
  return `Fill the template for the project${named} at ${folderPath}. Return the completed document as markdown or plain text.`;
}

export class DocumentationGenerator {
  private readonly tiers: readonly SizeLimits[];

  constructor(private readonly options: DocumentationGeneratorOptions) {
    this.tiers = options.tiers ?? SIZE_TIERS;
  }

  async generate(request: GenerationRequest, limits: SizeLimits): Promise<string> {
    const { platform, logger } = this.options;
    const project = await consolidateProject(request.folderPath, limits, logger);
    logger?.info(
      {
        project: request.projectName ?? 'Unnamed',
        files: project.included.length,
        skipped: project.skipped.length,
        size: convertSize(project.totalBytes),
        limits
      },
      'Consolidated project files'
    );

    const response = await platform.chat({
      workflowId: request.workflowId,
      query: buildQuery(request.folderPath, request.projectName),
      modelParams: {
        system_prompt: buildSystemPrompt(request, project.text),
        enable_reasoning: JSON.stringify(request.preferences.enable_reasoning)
      },
      maxHistory: request.preferences.chat_history_length
    });

    if (response.answer === undefined) {
      throw new Error('The platform response did not contain an answer');
    }

    const documentation = cleanLlmOutput(response.answer);
    // checked before the heading so a project name cannot trip it
    if (looksInvalid(documentation)) {
      throw new InvalidDocumentationError();
    }
    return request.projectName ? `# ${request.projectName}\n\n${documentation}` : documentation;
  }

  async generateWithSizeTiers(request: GenerationRequest): Promise<string> {
    const { logger } = this.options;
    for (const [index, limits] of this.tiers.entries()) {
      try {
        return await this.generate(request, limits);
      } catch (err) {
        const next = this.tiers[index + 1];
        if (!next || !isMessageTooBig(err)) throw err;
        logger?.warn({ err, next }, 'Message too big, retrying with smaller file size limits');
      }
    }
    throw new Error('No size tiers configured');
  }
}
