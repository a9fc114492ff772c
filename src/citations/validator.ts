import {
  CitationFindingCode,
  type CitationFinding,
  type SourceMap,
} from '../types/citation.js';
import { removeSourcesSection } from './parser.js';
import { compareOrdinals } from './rebuilder.js';

const REFERENCE = /\[(\d+)\]/g;

/**
 * Cross-check body references against the source map. Only the body is
 * scanned, so bibliography titles never count as references.
 */
export function validateCitations(text: string, sources: SourceMap): CitationFinding[] {
  const findings: CitationFinding[] = [];
  const body = removeSourcesSection(text);

  const referenced = new Set<string>();
  for (const match of body.matchAll(REFERENCE)) {
    const ordinal = match[1];
    if (ordinal !== undefined) {
      referenced.add(ordinal);
    }
  }

  for (const ordinal of [...referenced].sort(compareOrdinals)) {
    if (!sources.has(ordinal)) {
      findings.push({
        severity: 'error',
        code: CitationFindingCode.MISSING_SOURCE,
        message: `Citation [${ordinal}] references missing source`,
        ordinals: [ordinal],
      });
    }
  }

  for (const [ordinal, source] of sources) {
    if (source.url.trim().length === 0) {
      findings.push({
        severity: 'error',
        code: CitationFindingCode.MISSING_URL,
        message: `Source ${ordinal} missing URL`,
        ordinals: [ordinal],
      });
    }
  }

  const unused = [...sources.keys()]
    .filter((ordinal) => !referenced.has(ordinal))
    .sort(compareOrdinals);
  if (unused.length > 0) {
    findings.push({
      severity: 'warning',
      code: CitationFindingCode.UNUSED_SOURCES,
      message: `Unused sources: ${unused.join(', ')}`,
      ordinals: unused,
    });
  }

  return findings;
}
