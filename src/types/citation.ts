export interface SourceInfo {
  title: string;
  url: string;
  /** Resolved destination when `url` was a redirect wrapper */
  finalUrl?: string;
}

/**
 * Ordinal (as written in the document, e.g. "3") to source.
 */
export type SourceMap = Map<string, SourceInfo>;

export const CitationFindingCode = {
  NO_SOURCES_SECTION: 'no_sources_section',
  MISSING_SOURCE: 'missing_source',
  MISSING_URL: 'missing_url',
  UNUSED_SOURCES: 'unused_sources',
} as const;

export type CitationFindingCode = (typeof CitationFindingCode)[keyof typeof CitationFindingCode];

export interface CitationFinding {
  severity: 'error' | 'warning';
  code: CitationFindingCode;
  message: string;
  ordinals?: string[];
}

export interface ProcessedReport {
  text: string;
  sources: SourceMap;
  errors: CitationFinding[];
}
