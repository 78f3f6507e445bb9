import axios from 'axios';
import type { FetchOptions } from './types';

// ── Browser-like request headers ─────────────────────────────────────────────

export const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': USER_AGENT,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
  Connection: 'keep-alive',
};

// ── Pacing ───────────────────────────────────────────────────────────────────

/** Fixed delay between requests */
export function delay(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ── Main HTTP fetch ──────────────────────────────────────────────────────────

const DEFAULT_TIMEOUT_MS = 10000;
const DEFAULT_RETRY_BASE_MS = 2000;

const PERMANENT_FAILURES = ['status code 4', 'ENOTFOUND', 'ECONNREFUSED', 'ERR_TLS_CERT'];

/** Client errors, DNS misses, refused connections and bad certificates are not retried */
function isPermanentFailure(message: string): boolean {
  return PERMANENT_FAILURES.some((marker) => message.includes(marker));
}

/**
 * Fetch a listing page as HTML text.
 * Statuses >= 400 are errors. Retries with exponential backoff only when
 * maxAttempts > 1.
 */
export async function fetchPage(url: string, options: FetchOptions = {}): Promise<string> {
  const client = options.client ?? axios;
  const maxAttempts = Math.max(1, options.maxAttempts ?? 1);
  const retryBaseMs = options.retryBaseMs ?? DEFAULT_RETRY_BASE_MS;

  let lastError: Error | null = null;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (attempt > 0) {
      const backoff = retryBaseMs * Math.pow(2, attempt - 1);
      console.log(`[HTTP] Retry ${attempt}/${maxAttempts - 1} for ${url} (waiting ${backoff}ms)`);
      await delay(backoff);
    }

    try {
      const response = await client.get<unknown>(url, {
        headers: { ...BROWSER_HEADERS },
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        responseType: 'text',
        validateStatus: () => true,
      });

      if (response.status >= 400) {
        throw new Error(`Request failed with status code ${response.status}`);
      }

      return typeof response.data === 'string' ? response.data : '';
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (isPermanentFailure(lastError.message)) break;
    }
  }

  throw lastError ?? new Error(`Failed to fetch ${url}`);
}
