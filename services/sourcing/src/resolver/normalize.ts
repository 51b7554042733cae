/**
 * Name and website normalization for organization lookups
 */

const LEGAL_SUFFIXES: RegExp[] = [
  /\s+inc\.?$/,
  /\s+incorporated$/,
  /\s+llc\.?$/,
  /\s+ltd\.?$/,
  /\s+limited$/,
  /\s+corp\.?$/,
  /\s+corporation$/,
  /\s+co\.?$/,
  /\s+company$/,
  /\s+gmbh$/,
  /\s+ag$/,
  /\s+pte\.?$/,
  /\s+pty\.?$/,
];

/**
 * Reduce a website to its bare host: no scheme, `www.`, credentials,
 * port, path, query or trailing dot. Returns null when nothing is left.
 */
export function normalizeWebsite(website: string | undefined): string | null {
  if (!website) return null;

  let host = website.trim().toLowerCase();
  host = host.replace(/^[a-z][a-z0-9+.-]*:\/\//, "");
  host = host.replace(/^[^@/]*@/, "");
  host = host.split(/[/?#]/, 1)[0] ?? "";
  host = host.replace(/:\d+$/, "");
  host = host.replace(/^www\./, "");
  host = host.replace(/\.+$/, "");

  return host.length > 0 ? host : null;
}

/**
 * Case-insensitive, whitespace-collapsed form used for exact name matching
 */
export function normalizeForExactMatch(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * Canonical cache key for an organization name: lowercase, legal suffixes
 * removed, punctuation other than hyphens removed, whitespace collapsed.
 */
export function normalizeCompanyName(name: string): string {
  if (!name) return "";

  let normalized = name.trim().toLowerCase();
  for (const suffix of LEGAL_SUFFIXES) {
    normalized = normalized.replace(suffix, "");
  }

  normalized = normalized.replace(/[^\w\s-]/g, "");
  return normalized.split(/\s+/).filter(Boolean).join(" ");
}
