import { InvalidParameterError } from '../common/errors/knowledge-graph.errors';

/**
 * Names that refer to one logical domain. The first entry of each group is
 * the canonical key the store files the graph under.
 */
const ALIAS_GROUPS: readonly (readonly string[])[] = [
  ['cancer health care', 'cancer_care', 'cancer care'],
];

const aliasIndex = new Map<string, readonly string[]>();
for (const group of ALIAS_GROUPS) {
  for (const name of group) {
    aliasIndex.set(name, group);
  }
}

export interface ResolvedDomain {
  /** Canonical store key. */
  key: string;
  /** Every name that resolves to `key`, the key included. */
  aliases: readonly string[];
  /** File-system safe form of `key`. */
  slug: string;
}

/**
 * Trim, lower-case and collapse internal whitespace.
 */
export function normalizeDomainName(domain: string): string {
  return domain.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function domainSlug(key: string): string {
  return key.replace(/[^\p{L}\p{N}]+/gu, '_').replace(/^_+|_+$/g, '');
}

export function resolveDomainName(domain: string): ResolvedDomain {
  const normalized = normalizeDomainName(domain);
  if (normalized.length === 0) {
    throw new InvalidParameterError('domain must be a non-empty string');
  }

  const group = aliasIndex.get(normalized);
  const key = group ? group[0] : normalized;
  const slug = domainSlug(key);
  if (slug.length === 0) {
    throw new InvalidParameterError(
      `domain "${domain}" has no letters or digits`,
    );
  }

  return { key, aliases: group ?? [key], slug };
}
