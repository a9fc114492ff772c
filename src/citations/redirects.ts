import type { SourceMap } from '../types/citation.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('redirects');

export const DEFAULT_REDIRECT_INDICATORS = ['grounding-api-redirect'] as const;

export interface RedirectOptions {
  /** Per-request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Substrings that mark a URL as a redirect wrapper */
  indicators?: readonly string[];
  fetch?: typeof fetch;
}

export function isRedirectUrl(
  url: string,
  indicators: readonly string[] = DEFAULT_REDIRECT_INDICATORS
): boolean {
  return indicators.some((indicator) => url.includes(indicator));
}

/**
 * Follow a redirect wrapper with a HEAD request. Returns null on any failure.
 */
export async function resolveRedirect(
  url: string,
  options: RedirectOptions = {}
): Promise<string | null> {
  const fetchFn = options.fetch ?? fetch;
  const timeoutMs = options.timeoutMs ?? 10_000;

  try {
    const response = await fetchFn(url, {
      method: 'HEAD',
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
    });
    return response.url || null;
  } catch (error) {
    log.debug({ url, err: error }, 'Redirect resolution failed');
    return null;
  }
}

/**
 * Resolve every redirect-wrapped source URL in place. Lookups run in
 * parallel and fail independently; a failed lookup leaves `finalUrl` unset.
 */
export async function resolveAllRedirects(
  sources: SourceMap,
  options: RedirectOptions = {}
): Promise<void> {
  const indicators = options.indicators ?? DEFAULT_REDIRECT_INDICATORS;
  const pending = [...sources.values()].filter((source) =>
    isRedirectUrl(source.url, indicators)
  );

  await Promise.all(
    pending.map(async (source) => {
      const finalUrl = await resolveRedirect(source.url, options);
      if (finalUrl !== null && finalUrl !== source.url) {
        source.finalUrl = finalUrl;
      }
    })
  );

  log.debug(
    {
      candidates: pending.length,
      resolved: pending.filter((source) => source.finalUrl !== undefined).length,
    },
    'Redirects resolved'
  );
}
