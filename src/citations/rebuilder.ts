import type { SourceMap } from '../types/citation.js';
import { effectiveUrl } from './normalizer.js';

export function compareOrdinals(a: string, b: string): number {
  return Number.parseInt(a, 10) - Number.parseInt(b, 10);
}

/**
 * Render a canonical `## Sources` section, ordered by numeric ordinal.
 * Empty map renders nothing.
 */
export function rebuildSourcesSection(sources: SourceMap): string {
  if (sources.size === 0) {
    return '';
  }

  const lines = [...sources.keys()].sort(compareOrdinals).map((ordinal) => {
    const source = sources.get(ordinal);
    return source ? `${ordinal}. [${source.title}](${effectiveUrl(source)})` : '';
  });

  return `\n\n## Sources\n\n${lines.join('\n')}\n`;
}
