import { config } from '../config/env';

export interface JsonRequest {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
}

export async function fetchJson(url: string, request: JsonRequest, caller: string): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.HTTP_TIMEOUT_MS);
  try {
    const res = await fetch(url, {
      method: request.method ?? 'POST',
      headers: { 'Content-Type': 'application/json', ...request.headers },
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: controller.signal
    });
    if (!res.ok) {
      const text = await res.text();
      throw new Error(`${caller} failed (${res.status}): ${text}`);
    }
    return await res.json();
  } finally {
    clearTimeout(timeout);
  }
}
