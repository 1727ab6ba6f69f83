import fetch, { Response } from 'node-fetch';
import { NetworkError, ServiceError } from './errors';

export interface RequestOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
}

interface Deadline {
  signal: AbortSignal;
  /** Rejects with a NetworkError once the deadline passes; never resolves. */
  expired: Promise<never>;
  clear(): void;
}

function timeoutError(url: string, timeoutMs: number, cause?: unknown): NetworkError {
  return new NetworkError(`Request to ${url} timed out after ${timeoutMs}ms`, { cause });
}

function startDeadline(url: string, timeoutMs: number): Deadline {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  const expired = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener('abort', () => reject(timeoutError(url, timeoutMs)), {
      once: true,
    });
  });

  return { signal: controller.signal, expired, clear: () => clearTimeout(timer) };
}

async function send(url: string, options: RequestOptions, signal: AbortSignal): Promise<Response> {
  try {
    return await fetch(url, { headers: options.headers, signal });
  } catch (error) {
    if (signal.aborted) {
      throw timeoutError(url, options.timeoutMs, error);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new NetworkError(`Request to ${url} failed: ${reason}`, { cause: error });
  }
}

/**
 * GET with a deadline on the response headers. Any failure to obtain a
 * response (refused connection, DNS, abort on timeout) becomes a NetworkError;
 * the status code is left for the caller to judge. Body streaming is the
 * caller's to time.
 */
export async function httpGet(url: string, options: RequestOptions): Promise<Response> {
  const deadline = startDeadline(url, options.timeoutMs);
  try {
    return await Promise.race([send(url, options, deadline.signal), deadline.expired]);
  } finally {
    deadline.clear();
  }
}

async function readJson(url: string, options: RequestOptions, signal: AbortSignal): Promise<unknown> {
  const response = await send(url, options, signal);

  if (!response.ok) {
    throw new ServiceError(`HTTP ${response.status}: ${response.statusText}`, {
      status: response.status,
      url,
    });
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    if (signal.aborted) {
      throw timeoutError(url, options.timeoutMs, error);
    }
    throw new NetworkError(`Failed to read response body from ${url}`, { cause: error });
  }

  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (error) {
    throw new ServiceError(`Invalid JSON response from ${url}`, {
      status: response.status,
      url,
      cause: error,
    });
  }
}

/** GET and decode a JSON document; the deadline covers headers and body. */
export async function getJson(url: string, options: RequestOptions): Promise<unknown> {
  const deadline = startDeadline(url, options.timeoutMs);
  try {
    return await Promise.race([readJson(url, options, deadline.signal), deadline.expired]);
  } finally {
    deadline.clear();
  }
}
