/**
 * HTTP Utility Module
 *
 * Thin axios wrappers for the two kinds of payload the league site serves:
 * HTML pages (decoded as UTF-8 text) and the XLSX schedule feed (raw bytes).
 * Non-2xx statuses and transport failures both surface as FetchError.
 */

import axios, { type ResponseType } from 'axios';
import { FetchError, toError } from '../errors/index.js';

/**
 * HTTP response structure
 *
 * @template T - Type of the response data
 */
export interface HttpResponse<T> {
  status: number; // HTTP status code
  data: T; // Response body
}

export interface HttpGetOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

async function request<T>(url: string, responseType: ResponseType, options: HttpGetOptions): Promise<HttpResponse<T>> {
  let res;
  try {
    res = await axios.get<T>(url, {
      headers: options.headers,
      timeout: options.timeoutMs,
      responseType,
      responseEncoding: 'utf8',
      validateStatus: () => true
    });
  } catch (err) {
    const error = toError(err);
    throw new FetchError(`HTTP request failed: ${error.message}`, url, 0, error);
  }

  if (res.status < 200 || res.status >= 300) {
    throw new FetchError(`HTTP request failed with status ${res.status}`, url, res.status);
  }
  return { status: res.status, data: res.data };
}

/**
 * Performs an HTTP GET and returns the body as text
 *
 * @throws FetchError on network failure, timeout or a non-2xx status
 *
 * @example
 * const res = await httpGetText('https://example.org/league/2025-2/', { timeoutMs: 10000 });
 */
export async function httpGetText(url: string, options: HttpGetOptions): Promise<HttpResponse<string>> {
  return request<string>(url, 'text', options);
}

/**
 * Performs an HTTP GET and returns the body as a Buffer
 *
 * @throws FetchError on network failure, timeout or a non-2xx status
 */
export async function httpGetBinary(url: string, options: HttpGetOptions): Promise<HttpResponse<Buffer>> {
  const res = await request<ArrayBuffer>(url, 'arraybuffer', options);
  return { status: res.status, data: Buffer.from(res.data) };
}
