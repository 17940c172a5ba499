export const DNS_LABEL_MAX = 63;

/** Prefixes of every derived name. The longest one bounds the slug length. */
export const NAME_PREFIXES = {
  namespace: 'env-',
  quota: 'quota-',
  volume: 'pvc-',
  workload: 'ide-',
  service: 'svc-',
  ingress: 'ing-',
} as const;

export const MAX_SLUG_LENGTH =
  DNS_LABEL_MAX - Math.max(...Object.values(NAME_PREFIXES).map((prefix) => prefix.length));

export const MANAGED_LABELS = {
  managed: 'sandbox-orchestrator.io/managed',
  environmentId: 'sandbox-orchestrator.io/environment-id',
  userId: 'sandbox-orchestrator.io/user-id',
  templateId: 'sandbox-orchestrator.io/template-id',
} as const;

/**
 * Lowercases and replaces anything outside [a-z0-9-] with a dash, collapsing
 * runs and trimming the ends. Returns an empty string when nothing survives.
 */
export function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9-]+/g, '-')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/-+$/g, '');
}

export type ResourceNames = {
  namespace: string;
  quota: string;
  volume: string;
  workload: string;
  service: string;
  ingress: string;
};

export const resourceNames = (slug: string): ResourceNames => ({
  namespace: `${NAME_PREFIXES.namespace}${slug}`,
  quota: `${NAME_PREFIXES.quota}${slug}`,
  volume: `${NAME_PREFIXES.volume}${slug}`,
  workload: `${NAME_PREFIXES.workload}${slug}`,
  service: `${NAME_PREFIXES.service}${slug}`,
  ingress: `${NAME_PREFIXES.ingress}${slug}`,
});

export const namespaceFor = (identityName: string): string =>
  resourceNames(slugify(identityName)).namespace;

/** Label values allow [A-Za-z0-9_.-], at most 63 chars, alphanumeric at both ends. */
export function toLabelValue(value: string): string {
  return value
    .replace(/[^A-Za-z0-9_.-]+/g, '-')
    .slice(0, DNS_LABEL_MAX)
    .replace(/^[^A-Za-z0-9]+|[^A-Za-z0-9]+$/g, '');
}
