/**
 * HTTP Utility Module
 *
 * Thin wrapper around axios that never throws on HTTP status codes, so callers
 * decide what a 4xx or 5xx means for them. Network-level failures (DNS,
 * connection refused, timeout) are raised as ApiError.
 */

import axios from 'axios';
import { ApiError, toError } from '../errors/index.js';
import { logger } from '../core/logger.js';

/**
 * HTTP response structure
 *
 * @template T - Type of the response data
 */
export interface HttpResponse<T> {
  status: number; // HTTP status code
  data?: T; // Response body
  contentType?: string; // Content-Type header value
}

export interface HttpGetOptions {
  headers?: Record<string, string>;
  /** 'text' keeps the body as an unparsed string */
  responseType?: 'json' | 'text';
  timeoutMs?: number;
}

/**
 * Performs an HTTP GET request
 *
 * @param url - Full URL to request
 * @returns Promise resolving to HttpResponse with status, data and content type
 *
 * @example
 * const res = await httpGet<string>('https://example.com/export.csv', { responseType: 'text' });
 * if (res.status === 200) parse(res.data);
 */
export async function httpGet<T>(url: string, options: HttpGetOptions = {}): Promise<HttpResponse<T>> {
  try {
    const res = await axios.get<T>(url, {
      headers: options.headers,
      responseType: options.responseType ?? 'json',
      timeout: options.timeoutMs,
      validateStatus: () => true
    });

    if (res.status >= 400) {
      logger.warn({ url, status: res.status }, 'HTTP request failed');
    }

    const contentType = res.headers['content-type'];
    return {
      status: res.status,
      data: res.data,
      contentType: typeof contentType === 'string' ? contentType : undefined
    };
  } catch (err) {
    const error = toError(err);
    throw new ApiError(`HTTP request failed: ${error.message}`, url, 0, error);
  }
}
