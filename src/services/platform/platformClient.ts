import fs from 'fs/promises';
import path from 'path';
import axios from 'axios';
import type { PlatformConfig } from '../../config/env';
import type { Logger } from '../../utils/logger';
import { toPlatformError } from './errors';
import type { HttpPoster } from './http';
import { createTokenProvider, type TokenProvider } from './tokenProvider';

export interface ChatRequest {
  workflowId: string;
  query: string;
  fileUuids?: string[];
  modelParams?: Record<string, unknown>;
  maxHistory?: number;
}

export interface ChatResponse {
  answer?: string;
}

/** What the services need from the LLM platform. */
export interface ChatPlatform {
  uploadFile(filePath: string, workflowId: string): Promise<string>;
  chat(request: ChatRequest): Promise<ChatResponse>;
}

interface PlatformClientOptions {
  config: PlatformConfig;
  tokenProvider?: TokenProvider;
  http?: HttpPoster;
  logger?: Logger;
}

function readField(data: unknown, field: string): unknown {
  return typeof data === 'object' && data !== null ? Reflect.get(data, field) : undefined;
}

export class PlatformClient implements ChatPlatform {
  private readonly http: HttpPoster;
  private readonly tokenProvider: TokenProvider;

  constructor(private readonly options: PlatformClientOptions) {
    this.http = options.http ?? axios;
    this.tokenProvider =
      options.tokenProvider ??
      createTokenProvider(options.config.auth, { http: this.http, logger: options.logger });
  }

  private async headers(extra: Record<string, string> = {}) {
    const token = await this.tokenProvider();
    return { Authorization: `Bearer ${token}`, ...extra };
  }

  async uploadFile(filePath: string, workflowId: string): Promise<string> {
    const content = await fs.readFile(filePath);
    const form = new FormData();
    form.append('file', new Blob([content]), path.basename(filePath));
    form.append('workflow_id', workflowId);

    try {
      const res = await this.http.post(`${this.options.config.baseUrl}/v1/files`, form, {
        headers: await this.headers(),
        timeout: this.options.config.timeoutMs
      });
      const fileUuid = readField(res.data, 'file_uuid');
      if (typeof fileUuid !== 'string' || fileUuid === '') {
        throw new Error("'file_uuid' missing from upload response");
      }
      this.options.logger?.info({ file: path.basename(filePath), fileUuid, workflowId }, 'Uploaded file to platform');
      return fileUuid;
    } catch (err) {
      throw toPlatformError(err, 'File upload failed');
    }
  }

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const payload = {
      workflow_id: request.workflowId,
      query: request.query,
      file_uuids: request.fileUuids ?? [],
      model_params: request.modelParams ?? {},
      max_history: request.maxHistory
    };

    try {
      const res = await this.http.post(`${this.options.config.baseUrl}/v1/chat`, payload, {
        headers: await this.headers({ 'Content-Type': 'application/json' }),
        timeout: this.options.config.timeoutMs
      });
      const answer = readField(res.data, 'answer');
      this.options.logger?.debug(
        { workflowId: request.workflowId, queryLength: request.query.length },
        'Platform chat completed'
      );
      return typeof answer === 'string' ? { answer } : {};
    } catch (err) {
      throw toPlatformError(err);
    }
  }
}
