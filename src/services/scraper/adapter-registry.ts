import type { ListingAdapter } from './types';
import { hostnameOf, normalizeDomain } from './utils/url';

import { LivWellAdapter } from './adapters/livwell';
import { GenericAdapter } from './adapters/generic';

// ── Singleton adapter instances ──────────────────────────────────────────────

const adapters: Record<string, ListingAdapter> = {
  livwell: new LivWellAdapter(),
  generic: new GenericAdapter(),
};

// Known dispensary domains → adapter type
const KNOWN_DOMAINS: Record<string, string> = {
  'livwell.com': 'livwell',
};

// ── Public API ───────────────────────────────────────────────────────────────

export interface AdapterLookupResult {
  adapter: ListingAdapter;
  adapterType: string;
}

function lookup(adapterType: string): AdapterLookupResult {
  const adapter = adapters[adapterType];
  if (adapter) return { adapter, adapterType };
  return { adapter: adapters.generic, adapterType: 'generic' };
}

/**
 * Look up the best adapter for a listing URL (or URL template).
 * Checks the known-domain table, then parent domains, then falls back to 'generic'.
 */
export function getAdapterForUrl(url: string): AdapterLookupResult {
  const hostname = hostnameOf(url);
  if (!hostname) return lookup('generic');

  const domain = normalizeDomain(hostname);

  // Exact domain match
  const exact = KNOWN_DOMAINS[domain];
  if (exact) return lookup(exact);

  // Subdomain match (e.g. "shop.livwell.com" → check "livwell.com")
  const parts = domain.split('.');
  for (let i = 1; i < parts.length - 1; i++) {
    const parentType = KNOWN_DOMAINS[parts.slice(i).join('.')];
    if (parentType) return lookup(parentType);
  }

  // Unknown domain → generic
  return lookup('generic');
}

/**
 * Get an adapter instance by type name.
 */
export function getAdapterByType(adapterType: string): ListingAdapter {
  return lookup(adapterType).adapter;
}

/**
 * Register a new adapter type at runtime, optionally binding domains to it.
 */
export function registerAdapter(type: string, adapter: ListingAdapter, domains: string[] = []): void {
  adapters[type] = adapter;
  for (const domain of domains) {
    KNOWN_DOMAINS[normalizeDomain(domain)] = type;
  }
}
