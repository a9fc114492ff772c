import type { SourceInfo, SourceMap } from '../types/citation.js';

const CITE_MARKER = /\[cite:\s*([\d,\s]+)\]/g;
const BARE_REFERENCE = /\[(\d+)\](?!\()/g;
const DUPLICATE_URL = /(\[\d+\]\([^)]+\))\(https?:\/\/[^)]+\)/g;

export function effectiveUrl(source: SourceInfo): string {
  return source.finalUrl ?? source.url;
}

function linkFor(ordinal: string, sources: SourceMap): string {
  const source = sources.get(ordinal);
  return source ? `[${ordinal}](${effectiveUrl(source)})` : `[${ordinal}]`;
}

/**
 * Rewrite inline markers into markdown links:
 *
 * - `[cite: 3, 7]` becomes `[3](url3), [7](url7)`; unknown ordinals stay `[N]`
 * - a bare `[N]` not followed by `(` is linked when N is a known source
 * - `[N](url)(url2)` collapses to `[N](url)`
 */
export function normalizeInlineCitations(text: string, sources: SourceMap): string {
  let result = text.replace(CITE_MARKER, (marker: string, list: string) => {
    const ordinals = list
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    if (ordinals.length === 0) {
      return marker;
    }
    return ordinals.map((ordinal) => linkFor(ordinal, sources)).join(', ');
  });

  result = result.replace(BARE_REFERENCE, (reference: string, ordinal: string) =>
    sources.has(ordinal) ? linkFor(ordinal, sources) : reference
  );

  return result.replace(DUPLICATE_URL, '$1');
}
