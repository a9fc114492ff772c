/**
 * Citation engine
 *
 * Turns the agent's raw markdown into a document whose inline citations are
 * links and whose bibliography is a canonical `## Sources` list. All findings
 * are advisory; processing never throws on malformed input.
 */

import {
  CitationFindingCode,
  type ProcessedReport,
} from '../types/citation.js';
import { createLogger } from '../utils/logger.js';
import { parseSources, removeSourcesSection } from './parser.js';
import { normalizeInlineCitations } from './normalizer.js';
import { rebuildSourcesSection } from './rebuilder.js';
import { resolveAllRedirects, type RedirectOptions } from './redirects.js';
import { validateCitations } from './validator.js';

const log = createLogger('citations');

export interface ProcessReportOptions extends RedirectOptions {
  /** Follow redirect-wrapped source URLs (default: true) */
  resolveRedirects?: boolean;
}

export async function processReport(
  reportText: string,
  options: ProcessReportOptions = {}
): Promise<ProcessedReport> {
  const sources = parseSources(reportText);

  if (sources.size === 0) {
    return {
      text: reportText,
      sources,
      errors: [
        {
          severity: 'error',
          code: CitationFindingCode.NO_SOURCES_SECTION,
          message: 'no sources section found',
        },
      ],
    };
  }

  if (options.resolveRedirects ?? true) {
    await resolveAllRedirects(sources, options);
  }

  const normalized = normalizeInlineCitations(reportText, sources);
  const text = removeSourcesSection(normalized) + rebuildSourcesSection(sources);
  const errors = validateCitations(text, sources);

  log.debug({ sources: sources.size, findings: errors.length }, 'Report processed');

  return { text, sources, errors };
}

export { parseSources, removeSourcesSection } from './parser.js';
export { normalizeInlineCitations, effectiveUrl } from './normalizer.js';
export { rebuildSourcesSection } from './rebuilder.js';
export {
  resolveRedirect,
  resolveAllRedirects,
  isRedirectUrl,
  DEFAULT_REDIRECT_INDICATORS,
  type RedirectOptions,
} from './redirects.js';
export { validateCitations } from './validator.js';
