import axios from 'axios';
import { errorMessage } from '../../utils/errors';

export const MESSAGE_TOO_BIG = 'message too big';

export class PlatformError extends Error {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = 'PlatformError';
  }
}

export function isMessageTooBig(err: unknown): boolean {
  return errorMessage(err).toLowerCase().includes(MESSAGE_TOO_BIG);
}

function excerpt(body: unknown, max = 300): string {
  if (body === undefined || body === null || body === '') return '';
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function toPlatformError(err: unknown, context = 'Platform request failed'): PlatformError {
  if (err instanceof PlatformError) return err;
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status === 413) {
      return new PlatformError(`Platform rejected the request: ${MESSAGE_TOO_BIG}`, status);
    }
    if (status !== undefined) {
      const body = excerpt(err.response?.data);
      return new PlatformError(`${context} (${status}): ${body || err.message}`, status);
    }
    return new PlatformError(`${context}: ${err.message}`);
  }
  return new PlatformError(`${context}: ${errorMessage(err)}`);
}
