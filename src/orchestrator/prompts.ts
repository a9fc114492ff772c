/**
 * Prompt templates for initial research and revisions.
 *
 * Both templates end with the same citation contract, which is what the
 * citation engine parses on the way back.
 */

import type { ResearchConstraints } from '../types/run.js';

export const CITATION_CONTRACT = `## Citation Format (required)
- Cite sources inline with markers of the form [cite: N] or [cite: N, M], where N is the source number.
- End the report with a section headed exactly "## Sources".
- List every cited source there, one per line, as: N. [Title](URL)
- Number sources consecutively starting at 1, with no gaps, and use the same numbers inline.`;

const INITIAL_RESEARCH_TEMPLATE = `Act as an expert research analyst. Plan, search, read, and synthesize multiple sources to answer the following research query.

## Research Topic
{topic}

## Research Questions
{questions}

## Constraints
{constraints}

## Output Format
Produce a single, self-contained Markdown document with these sections:
1. Executive Summary (2-3 paragraphs)
2. Key Questions Addressed
3. Main Findings (with subsections as needed)
4. Evidence and Citations
5. Limitations and Open Questions

Use Markdown tables where helpful for comparing data or sources.
Do not include commentary about your research process; output only the report.

{citations}
`;

const REVISION_TEMPLATE = `You previously produced a research report in the preceding interaction.

The user has provided the following feedback:
---
{feedback}
---
{constraints}
Please produce a complete revised Markdown report that:
1. Incorporates this feedback
2. Preserves correct facts and citations from the original
3. Maintains the same document structure unless the feedback requests changes
4. Clearly indicates any new research or sources added

Output only the revised report in Markdown format.

{citations}
`;

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => values[key] ?? placeholder);
}

/**
 * One `- Label: value` line per constraint that is set.
 */
export function formatConstraints(constraints: ResearchConstraints): string[] {
  const lines: string[] = [];
  if (constraints.timeframe) {
    lines.push(`- Time period: ${constraints.timeframe}`);
  }
  if (constraints.region) {
    lines.push(`- Geographic focus: ${constraints.region}`);
  }
  if (constraints.maxWords) {
    lines.push(`- Maximum length: ${constraints.maxWords} words`);
  }
  if (constraints.focusAreas && constraints.focusAreas.length > 0) {
    lines.push(`- Focus areas: ${constraints.focusAreas.join(', ')}`);
  }
  if (constraints.depth) {
    lines.push(`- Depth: ${constraints.depth}`);
  }
  return lines;
}

export function buildInitialPrompt(
  topic: string,
  questions: string[] | undefined,
  constraints: ResearchConstraints = {}
): string {
  const questionLines =
    questions && questions.length > 0
      ? questions.map((question) => `- ${question}`)
      : [`- What is ${topic}?`];
  const constraintLines = formatConstraints(constraints);

  return fill(INITIAL_RESEARCH_TEMPLATE, {
    topic,
    questions: questionLines.join('\n'),
    constraints: constraintLines.length > 0 ? constraintLines.join('\n') : 'None specified',
    citations: CITATION_CONTRACT,
  });
}

export function buildRevisionPrompt(feedback: string, constraints?: ResearchConstraints): string {
  const constraintLines = constraints ? formatConstraints(constraints) : [];
  const constraintsBlock =
    constraintLines.length > 0
      ? `\n## Updated Constraints\n${constraintLines.join('\n')}\n`
      : '';

  return fill(REVISION_TEMPLATE, {
    feedback: feedback.trim(),
    constraints: constraintsBlock,
    citations: CITATION_CONTRACT,
  });
}
