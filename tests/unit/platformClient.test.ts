/**
 * Platform Client Unit Tests
 *
 * Tests for: src/services/platform/platformClient.ts, src/services/platform/errors.ts
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { AxiosError, AxiosHeaders } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PlatformClient } from '@/services/platform/platformClient';
import { isMessageTooBig, toPlatformError } from '@/services/platform/errors';

const config = {
  baseUrl: 'https://platform.example.test',
  timeoutMs: 5000,
  auth: { personalToken: 'test-token', grantType: 'client_credentials' }
};

function axiosFailure(status: number, data: unknown): AxiosError {
  const requestConfig = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', requestConfig, undefined, {
    data,
    status,
    statusText: '',
    headers: {},
    config: requestConfig
  });
}

function createHttp(data: unknown) {
  return {
    post: vi.fn(async (_url: string, _data?: unknown, _config?: unknown): Promise<{ data: unknown }> => ({ data }))
  };
}

describe('PlatformClient', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'platform-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('posts chat requests with defaults and a bearer token', async () => {
    const http = createHttp({ answer: 'Hello' });
    const client = new PlatformClient({ config, http });

    expect(await client.chat({ workflowId: 'wf-1', query: 'Hi', maxHistory: 5 })).toEqual({ answer: 'Hello' });
    expect(http.post).toHaveBeenCalledWith(
      'https://platform.example.test/v1/chat',
      { workflow_id: 'wf-1', query: 'Hi', file_uuids: [], model_params: {}, max_history: 5 },
      {
        headers: { Authorization: 'Bearer test-token', 'Content-Type': 'application/json' },
        timeout: 5000
      }
    );
  });

  it('returns an empty response when no answer is present', async () => {
    const client = new PlatformClient({ config, http: createHttp({ status: 'ok' }) });
    expect(await client.chat({ workflowId: 'wf-1', query: 'Hi' })).toEqual({});
  });

  it('uploads files as multipart form data', async () => {
    const filePath = path.join(workDir, 'notes.txt');
    await fs.writeFile(filePath, 'hello');
    const http = createHttp({ file_uuid: 'file-123' });
    const client = new PlatformClient({ config, http });

    expect(await client.uploadFile(filePath, 'wf-1')).toBe('file-123');

    const call = http.post.mock.calls[0];
    expect(call?.[0]).toBe('https://platform.example.test/v1/files');
    const form = call?.[1];
    if (!(form instanceof FormData)) throw new Error('expected a FormData body');
    expect(form.get('workflow_id')).toBe('wf-1');
    const file = form.get('file');
    if (!(file instanceof Blob)) throw new Error('expected a file part');
    expect(Reflect.get(file, 'name')).toBe('notes.txt');
    expect(await file.text()).toBe('hello');
  });

  it('rejects uploads without a file id', async () => {
    const filePath = path.join(workDir, 'notes.txt');
    await fs.writeFile(filePath, 'hello');
    const client = new PlatformClient({ config, http: createHttp({}) });

    await expect(client.uploadFile(filePath, 'wf-1')).rejects.toThrow(
      "File upload failed: 'file_uuid' missing from upload response"
    );
  });

  it('turns HTTP failures into platform errors', async () => {
    const http = createHttp({});
    http.post.mockRejectedValueOnce(axiosFailure(500, { error: 'boom' }));
    const client = new PlatformClient({ config, http });

    await expect(client.chat({ workflowId: 'wf-1', query: 'Hi' })).rejects.toThrow(
      'Platform request failed (500): {"error":"boom"}'
    );
  });
});

describe('toPlatformError', () => {
  it('marks oversized payloads', () => {
    const err = toPlatformError(axiosFailure(413, 'Request Entity Too Large'));
    expect(err.message).toBe('Platform rejected the request: message too big');
    expect(err.status).toBe(413);
    expect(isMessageTooBig(err)).toBe(true);
  });

  it('falls back to the axios message without a body', () => {
    expect(toPlatformError(axiosFailure(502, '')).message).toBe(
      'Platform request failed (502): Request failed with status code 502'
    );
  });

  it('truncates long bodies', () => {
    const err = toPlatformError(axiosFailure(500, 'x'.repeat(400)));
    expect(err.message).toBe(`Platform request failed (500): ${'x'.repeat(300)}...`);
  });

  it('wraps other errors with the context', () => {
    expect(toPlatformError(new Error('socket hang up'), 'File upload failed').message).toBe(
      'File upload failed: socket hang up'
    );
    expect(isMessageTooBig(new Error('socket hang up'))).toBe(false);
  });
});
