/**
 * Sources-section parsing.
 *
 * Accepted headings: `**Sources:**`, `## Sources` and a plain `Sources:` line,
 * matched case-insensitively at the start of the text or of a line. The block
 * ends at the next `##` heading, the next bold heading or the end of the text.
 */

import type { SourceMap } from '../types/citation.js';

const SOURCES_SECTION =
  /(?:^|\n)(?:\*\*Sources:\*\*|## Sources|Sources:)\s*\n([\s\S]*?)(?:\n##|\n\*\*[A-Z]|$)/i;

const SOURCE_ENTRY = /(\d+)\.\s*\[([^\]]+)\]\(([^)]+)\)/g;

const SECTION_TAILS: RegExp[] = [
  /\n\*\*Sources:\*\*\s*\n[\s\S]*$/i,
  /\n## Sources\s*\n[\s\S]*$/i,
  /\nSources:\s*\n[\s\S]*$/i,
];

/**
 * Extract `N. [Title](URL)` entries of the sources section. A repeated
 * ordinal keeps its last entry. Returns an empty map when there is no section.
 */
export function parseSources(text: string): SourceMap {
  const sources: SourceMap = new Map();

  const section = SOURCES_SECTION.exec(text);
  const body = section?.[1];
  if (body === undefined) {
    return sources;
  }

  for (const entry of body.matchAll(SOURCE_ENTRY)) {
    const [, ordinal, title, url] = entry;
    if (ordinal === undefined || title === undefined || url === undefined) {
      continue;
    }
    sources.set(ordinal, { title, url });
  }

  return sources;
}

/**
 * Remove every sources section from the tail of the document and trim
 * trailing whitespace.
 */
export function removeSourcesSection(text: string): string {
  let result = text;
  for (const pattern of SECTION_TAILS) {
    result = result.replace(pattern, '');
  }
  return result.trimEnd();
}
