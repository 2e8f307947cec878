import type { BrandMention, BrandSpec, NormalizedDocument } from '../../shared/api.js';
import { InvalidInputError } from '../errors.js';

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export function toBrandSpecs(brands: Array<string | BrandSpec>): BrandSpec[] {
  const specs = brands
    .map(b => (typeof b === 'string' ? { name: b } : b))
    .map(b => ({
      name: b.name.trim(),
      aliases: (b.aliases ?? []).map(a => a.trim()).filter(Boolean),
    }));

  const seen = new Set<string>();
  for (const spec of specs) {
    if (!spec.name) throw new InvalidInputError('Brand names must not be empty', 'brands');
    const key = spec.name.toLowerCase();
    if (seen.has(key)) throw new InvalidInputError(`Brand "${spec.name}" is listed more than once`, 'brands');
    seen.add(key);
  }
  return specs;
}

/**
 * One case-insensitive alternation per brand, longest term first so that an
 * alias containing the brand name ("Acme Corp" vs "Acme") matches once.
 */
export function brandPattern(spec: BrandSpec): RegExp {
  const terms = [...new Set([spec.name, ...(spec.aliases ?? [])].map(t => t.toLowerCase()))]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp);
  return new RegExp(`(?<![\\p{L}\\p{N}_])(?:${terms.join('|')})(?![\\p{L}\\p{N}_])`, 'giu');
}

export class BrandMentionTracker {
  track(doc: NormalizedDocument, brands: Array<string | BrandSpec>): BrandMention[] {
    return toBrandSpecs(brands).map(spec => ({
      brand: spec.name,
      mentions: doc.text.match(brandPattern(spec))?.length ?? 0,
    }));
  }
}
