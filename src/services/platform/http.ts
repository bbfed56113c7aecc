import type { AxiosRequestConfig } from 'axios';

/** The slice of an axios instance the platform clients need; tests pass a fake. */
export interface HttpPoster {
  post(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}
