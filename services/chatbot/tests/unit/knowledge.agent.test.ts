import { describe, expect, it, vi } from 'vitest';
import type { ChatRequest, ChatResponse } from '@/services/platform/platformClient';
import { KnowledgeAgent, NO_KNOWLEDGE_ANSWER } from '../../src/knowledge/knowledge.agent';

function createPlatform(reply: () => Promise<ChatResponse>) {
  return {
    uploadFile: vi.fn(async () => 'unused'),
    chat: vi.fn(async (_request: ChatRequest) => reply())
  };
}

describe('KnowledgeAgent', () => {
  it('asks the knowledge workflow and cleans the answer', async () => {
    const platform = createPlatform(async () => ({ answer: 'ANALYSIS RESULT:\n===\nRetention is...\n===' }));
    const agent = new KnowledgeAgent({ platform, workflowId: 'wf-knowledge' });

    expect(await agent.answer('What is retention?')).toBe('Retention is...');
    expect(platform.chat).toHaveBeenCalledWith({ workflowId: 'wf-knowledge', query: 'What is retention?' });
  });

  it('apologises when no answer comes back', async () => {
    const agent = new KnowledgeAgent({ platform: createPlatform(async () => ({})), workflowId: 'wf' });
    expect(await agent.answer('Anything')).toBe(NO_KNOWLEDGE_ANSWER);
  });

  it('returns the failure as text', async () => {
    const platform = createPlatform(async () => {
      throw new Error('Platform request failed (503): unavailable');
    });
    const agent = new KnowledgeAgent({ platform, workflowId: 'wf' });

    expect(await agent.answer('Anything')).toBe(
      'Error processing regular query: Platform request failed (503): unavailable'
    );
  });
});
