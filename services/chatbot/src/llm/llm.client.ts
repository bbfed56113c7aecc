export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface LlmClient {
  generateResponse(messages: ChatMessage[], temperature?: number): Promise<string>;
}

export const systemMessage = (content: string): ChatMessage => ({ role: 'system', content });
export const userMessage = (content: string): ChatMessage => ({ role: 'user', content });

export class LlmError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'LlmError';
  }
}
