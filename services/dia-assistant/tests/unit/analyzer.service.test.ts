/**
 * DIA Analyzer Unit Tests
 *
 * Tests for: src/dia/analyzer.service.ts
 */

import { describe, it, expect, vi } from 'vitest';
import type { ChatResponse } from '@/services/platform/platformClient';
import { PlatformError } from '@/services/platform/errors';
import { DiaAnalyzer, DiaProcessingError, NO_RESPONSE, buildDiaQuery } from '../../src/dia/analyzer.service';

describe('buildDiaQuery', () => {
  it('combines the document and the description', () => {
    expect(buildDiaQuery(true, 'customer emails')).toBe(
      'Based on the uploaded document and the following description, provide a detailed analysis and answer: customer emails'
    );
  });

  it('uses the description alone when no file is attached', () => {
    expect(buildDiaQuery(false, 'payroll export')).toBe(
      'Based on the following description, provide a detailed analysis and answer: payroll export'
    );
  });

  it('asks for a document analysis when only a file is attached', () => {
    expect(buildDiaQuery(true)).toBe('Provide a detailed analysis of the uploaded document.');
  });

  it('falls back to a generic request', () => {
    expect(buildDiaQuery(false)).toBe('Provide a detailed answer.');
    expect(buildDiaQuery(false, '')).toBe('Provide a detailed answer.');
  });
});

describe('DiaAnalyzer', () => {
  function createPlatform() {
    return {
      uploadFile: vi.fn(async () => 'file-uuid-1'),
      chat: vi.fn(async (): Promise<ChatResponse> => ({ answer: 'Low impact.' }))
    };
  }

  it('uploads the file and attaches it to the chat', async () => {
    const platform = createPlatform();
    const analyzer = new DiaAnalyzer({ platform, workflowId: 'wf-dia' });

    const result = await analyzer.process('/tmp/upload.pdf', 'vendor data');

    expect(result).toBe('Low impact.');
    expect(platform.uploadFile).toHaveBeenCalledWith('/tmp/upload.pdf', 'wf-dia');
    expect(platform.chat).toHaveBeenCalledWith({
      workflowId: 'wf-dia',
      query:
        'Based on the uploaded document and the following description, provide a detailed analysis and answer: vendor data',
      fileUuids: ['file-uuid-1']
    });
  });

  it('skips the upload for text-only requests', async () => {
    const platform = createPlatform();
    const analyzer = new DiaAnalyzer({ platform, workflowId: 'wf-dia' });

    await analyzer.process(undefined, 'vendor data');

    expect(platform.uploadFile).not.toHaveBeenCalled();
    expect(platform.chat).toHaveBeenCalledWith(expect.objectContaining({ fileUuids: [] }));
  });

  it('reports a missing answer', async () => {
    const platform = createPlatform();
    platform.chat.mockResolvedValueOnce({});
    const analyzer = new DiaAnalyzer({ platform, workflowId: 'wf-dia' });

    await expect(analyzer.process(undefined, 'anything')).resolves.toBe(NO_RESPONSE);
  });

  it('wraps platform failures', async () => {
    const platform = createPlatform();
    platform.uploadFile.mockRejectedValueOnce(new PlatformError('File upload failed (500): boom', 500));
    const analyzer = new DiaAnalyzer({ platform, workflowId: 'wf-dia' });

    const failure = analyzer.process('/tmp/upload.pdf');
    await expect(failure).rejects.toBeInstanceOf(DiaProcessingError);
    await expect(failure).rejects.toThrow('Error processing DIA request: File upload failed (500): boom');
    expect(platform.chat).not.toHaveBeenCalled();
  });
});
