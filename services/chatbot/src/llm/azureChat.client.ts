import axios from 'axios';
import { z } from 'zod';
import type { HttpPoster } from '@/services/platform/http';
import { errorMessage } from '@/utils/errors';
import type { Logger } from '@/utils/logger';
import type { OpenAiSettings } from '../config/chatbot.config';
import { LlmError, type ChatMessage, type LlmClient } from './llm.client';

const credentialsSchema = z.object({
  openai_key: z.string().min(1),
  azure_deployment: z.string().min(1),
  openai_api_version: z.string().min(1),
  token: z.string().optional()
});

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() })
      })
    )
    .min(1)
});

interface AzureCredentials {
  apiKey: string;
  deployment: string;
  apiVersion: string;
  token?: string;
}

interface AzureChatClientOptions {
  settings: OpenAiSettings;
  http?: HttpPoster;
  logger?: Logger;
}

/**
 * Chat completions against an Azure OpenAI deployment. Credentials come from the
 * configuration or, when absent, from the workspace credentials endpoint.
 */
export class AzureChatClient implements LlmClient {
  private readonly http: HttpPoster;
  private credentials: Promise<AzureCredentials> | null = null;

  constructor(private readonly options: AzureChatClientOptions) {
    this.http = options.http ?? axios;
  }

  private async fetchCredentials(): Promise<AzureCredentials> {
    const { settings, logger } = this.options;
    if (settings.apiKey && settings.deployment) {
      return { apiKey: settings.apiKey, deployment: settings.deployment, apiVersion: settings.apiVersion };
    }
    if (!settings.credentialsUrl) {
      throw new LlmError('OpenAI credentials are not configured');
    }

    try {
      const res = await this.http.post(settings.credentialsUrl, {
        workspace_id: settings.workspaceId,
        model_name: settings.modelName
      });
      const parsed = credentialsSchema.parse(res.data);
      logger?.info({ deployment: parsed.azure_deployment }, 'OpenAI credentials retrieved');
      return {
        apiKey: parsed.openai_key,
        deployment: parsed.azure_deployment,
        apiVersion: parsed.openai_api_version,
        token: parsed.token
      };
    } catch (err) {
      throw new LlmError(`Failed to get OpenAI credentials: ${errorMessage(err)}`);
    }
  }

  private getCredentials(): Promise<AzureCredentials> {
    if (!this.credentials) {
      this.credentials = this.fetchCredentials().catch((err: unknown) => {
        this.credentials = null;
        throw err;
      });
    }
    return this.credentials;
  }

  async generateResponse(messages: ChatMessage[], temperature = 0.1): Promise<string> {
    const { settings, logger } = this.options;
    const credentials = await this.getCredentials();
    const url =
      `${settings.baseUrl}/openai/deployments/${encodeURIComponent(credentials.deployment)}` +
      `/chat/completions?api-version=${encodeURIComponent(credentials.apiVersion)}`;

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'api-key': credentials.apiKey
    };
    if (credentials.token) {
      headers.Authorization = `Bearer ${credentials.token}`;
    }

    try {
      const res = await this.http.post(url, { messages, temperature }, { headers, timeout: settings.timeoutMs });
      const completion = completionSchema.parse(res.data);
      return completion.choices[0]?.message.content ?? '';
    } catch (err) {
      logger?.error({ err: errorMessage(err) }, 'OpenAI API call failed');
      if (axios.isAxiosError(err)) {
        throw new LlmError(`OpenAI API call failed: ${err.message}`, err.response?.status);
      }
      throw new LlmError(`OpenAI API call failed: ${errorMessage(err)}`);
    }
  }
}
