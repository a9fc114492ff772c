/**
 * Citation Engine Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  processReport,
  parseSources,
  removeSourcesSection,
  normalizeInlineCitations,
  rebuildSourcesSection,
  validateCitations,
} from '../src/citations/index.js';
import type { SourceMap } from '../src/types/citation.js';

function sourceMap(entries: Record<string, { title: string; url: string; finalUrl?: string }>): SourceMap {
  return new Map(Object.entries(entries));
}

describe('parseSources', () => {
  it('should parse a ## Sources section', () => {
    const text =
      'Intro [cite: 1]\n\n## Sources\n1. [Alpha](https://a.example)\n2. [Beta](https://b.example)\n';

    const sources = parseSources(text);

    expect([...sources.keys()]).toEqual(['1', '2']);
    expect(sources.get('1')).toEqual({ title: 'Alpha', url: 'https://a.example' });
    expect(sources.get('2')).toEqual({ title: 'Beta', url: 'https://b.example' });
  });

  it('should parse a bold Sources heading and stop at the next bold heading', () => {
    const text =
      'Body\n\n**Sources:**\n1. [Alpha](https://a.example)\n\n**Notes**\n2. [Stray](https://stray.example)';

    const sources = parseSources(text);

    expect([...sources.keys()]).toEqual(['1']);
  });

  it('should parse a plain Sources: heading case-insensitively', () => {
    const text = 'Body\nsources:\n3. [Gamma](https://g.example)';

    expect(parseSources(text).get('3')).toEqual({ title: 'Gamma', url: 'https://g.example' });
  });

  it('should stop at the next ## heading', () => {
    const text =
      '## Sources\n1. [Alpha](https://a.example)\n## Appendix\n2. [Other](https://o.example)';

    expect([...parseSources(text).keys()]).toEqual(['1']);
  });

  it('should return an empty map without a sources section', () => {
    expect(parseSources('Just text with [1] in it.').size).toBe(0);
  });

  it('should keep the last entry for a repeated ordinal', () => {
    const text = '## Sources\n1. [First](https://first.example)\n1. [Second](https://second.example)';

    expect(parseSources(text).get('1')).toEqual({ title: 'Second', url: 'https://second.example' });
  });
});

describe('normalizeInlineCitations', () => {
  const sources = sourceMap({
    '3': { title: 'Three', url: 'https://three.example' },
    '7': { title: 'Seven', url: 'https://seven.example' },
  });

  it('should expand a multi-ordinal cite marker into links', () => {
    expect(normalizeInlineCitations('See [cite: 3, 7].', sources)).toBe(
      'See [3](https://three.example), [7](https://seven.example).'
    );
  });

  it('should keep unknown ordinals of a cite marker as bare references', () => {
    const partial = sourceMap({ '3': { title: 'Three', url: 'https://three.example' } });

    expect(normalizeInlineCitations('See [cite: 3, 7].', partial)).toBe(
      'See [3](https://three.example), [7].'
    );
  });

  it('should link bare references to known sources only', () => {
    expect(normalizeInlineCitations('Fact [3]; other [4].', sources)).toBe(
      'Fact [3](https://three.example); other [4].'
    );
  });

  it('should leave existing links untouched', () => {
    expect(normalizeInlineCitations('Already [3](http://x)', sources)).toBe('Already [3](http://x)');
  });

  it('should collapse a duplicated parenthetical URL', () => {
    expect(
      normalizeInlineCitations('Claim [7](https://seven.example)(https://seven.example/dup).', sources)
    ).toBe('Claim [7](https://seven.example).');
  });

  it('should prefer the resolved URL', () => {
    const resolved = sourceMap({
      '1': { title: 'One', url: 'https://wrapped.example', finalUrl: 'https://final.example' },
    });

    expect(normalizeInlineCitations('[cite: 1]', resolved)).toBe('[1](https://final.example)');
  });
});

describe('removeSourcesSection', () => {
  it('should remove a bold sources section and trailing whitespace', () => {
    expect(removeSourcesSection('Body text\n\n**Sources:**\n1. [A](https://a.example)\n')).toBe(
      'Body text'
    );
  });

  it('should remove a markdown sources section', () => {
    expect(removeSourcesSection('Body\n\n## Sources\n\n1. [A](https://a.example)\n')).toBe('Body');
  });

  it('should leave text without a sources section unchanged apart from trailing whitespace', () => {
    expect(removeSourcesSection('Body only\n\n')).toBe('Body only');
  });
});

describe('rebuildSourcesSection', () => {
  it('should order entries numerically', () => {
    const sources = sourceMap({
      '10': { title: 'Ten', url: 'https://ten.example' },
      '2': { title: 'Two', url: 'https://two.example' },
    });

    expect(rebuildSourcesSection(sources)).toBe(
      '\n\n## Sources\n\n2. [Two](https://two.example)\n10. [Ten](https://ten.example)\n'
    );
  });

  it('should render nothing for an empty map', () => {
    expect(rebuildSourcesSection(new Map())).toBe('');
  });
});

describe('validateCitations', () => {
  it('should report missing sources as errors and unused sources as a warning', () => {
    const sources = sourceMap({
      '1': { title: 'One', url: 'https://one.example' },
      '2': { title: 'Two', url: 'https://two.example' },
    });

    const findings = validateCitations('A [1](https://one.example) and [9].', sources);

    expect(findings).toEqual([
      {
        severity: 'error',
        code: 'missing_source',
        message: 'Citation [9] references missing source',
        ordinals: ['9'],
      },
      {
        severity: 'warning',
        code: 'unused_sources',
        message: 'Unused sources: 2',
        ordinals: ['2'],
      },
    ]);
  });

  it('should report a source with a blank URL', () => {
    const sources = sourceMap({ '1': { title: 'One', url: ' ' } });

    const findings = validateCitations('Uses [1].', sources);

    expect(findings).toEqual([
      { severity: 'error', code: 'missing_url', message: 'Source 1 missing URL', ordinals: ['1'] },
    ]);
  });

  it('should ignore numeric titles inside the bibliography', () => {
    const sources = sourceMap({ '1': { title: 'One', url: 'https://one.example' } });
    const text = 'Uses [1](https://one.example).\n\n## Sources\n\n1. [2024](https://one.example)\n';

    expect(validateCitations(text, sources)).toEqual([]);
  });
});

describe('processReport', () => {
  const report =
    'Solar output rose [cite: 2] while costs fell [1].\n\n' +
    '## Sources\n' +
    '1. [Cost Study](https://cost.example/study)\n' +
    '2. [Output Data](https://output.example/data)\n';

  const expected =
    'Solar output rose [2](https://output.example/data) while costs fell [1](https://cost.example/study).\n\n' +
    '## Sources\n\n' +
    '1. [Cost Study](https://cost.example/study)\n' +
    '2. [Output Data](https://output.example/data)\n';

  it('should rewrite citations and rebuild the bibliography', async () => {
    const result = await processReport(report, { resolveRedirects: false });

    expect(result.text).toBe(expected);
    expect(result.errors).toEqual([]);
    expect(result.sources.size).toBe(2);
  });

  it('should be idempotent on its own output', async () => {
    const first = await processReport(report, { resolveRedirects: false });
    const second = await processReport(first.text, { resolveRedirects: false });

    expect(second.text).toBe(first.text);
  });

  it('should return the input unchanged when there is no sources section', async () => {
    const result = await processReport('No bibliography here [1].');

    expect(result.text).toBe('No bibliography here [1].');
    expect(result.sources.size).toBe(0);
    expect(result.errors).toEqual([
      { severity: 'error', code: 'no_sources_section', message: 'no sources section found' },
    ]);
  });

  it('should not call fetch when redirect resolution is off', async () => {
    const mockFetch = vi.fn();

    await processReport(
      'A [1].\n\n## Sources\n1. [Wrapped](https://redirect.example/grounding-api-redirect/abc)\n',
      { resolveRedirects: false, fetch: mockFetch as unknown as typeof fetch }
    );

    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should use resolved redirect URLs in the rewritten text', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ url: 'https://final.example/page' });

    const result = await processReport(
      'A [1].\n\n## Sources\n1. [Wrapped](https://redirect.example/grounding-api-redirect/abc)\n',
      { fetch: mockFetch as unknown as typeof fetch }
    );

    expect(result.text).toBe(
      'A [1](https://final.example/page).\n\n## Sources\n\n1. [Wrapped](https://final.example/page)\n'
    );
    expect(result.sources.get('1')).toEqual({
      title: 'Wrapped',
      url: 'https://redirect.example/grounding-api-redirect/abc',
      finalUrl: 'https://final.example/page',
    });
  });

  it('should fall back to the original URL when resolution fails', async () => {
    const mockFetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));

    const result = await processReport(
      'A [1].\n\n## Sources\n1. [Wrapped](https://redirect.example/grounding-api-redirect/abc)\n',
      { fetch: mockFetch as unknown as typeof fetch }
    );

    expect(result.sources.get('1')?.finalUrl).toBeUndefined();
    expect(result.text).toBe(
      'A [1](https://redirect.example/grounding-api-redirect/abc).\n\n' +
        '## Sources\n\n1. [Wrapped](https://redirect.example/grounding-api-redirect/abc)\n'
    );
  });
});
