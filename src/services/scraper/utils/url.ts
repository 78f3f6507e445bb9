/** Fill the page number into a listing URL template ("{page}", or the bare "{}" form) */
export function formatPageUrl(template: string, page: number): string {
  const value = String(page);
  if (template.includes('{page}')) return template.split('{page}').join(value);
  if (template.includes('{}')) return template.split('{}').join(value);
  return template;
}

/** Strip www. prefix from a hostname for normalization */
export function normalizeDomain(hostname: string): string {
  return hostname.replace(/^www\./, '').toLowerCase();
}

/** Hostname of a URL or listing template, or null when it doesn't parse */
export function hostnameOf(url: string): string | null {
  try {
    return new URL(formatPageUrl(url, 1)).hostname.toLowerCase();
  } catch {
    return null;
  }
}
