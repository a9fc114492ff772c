import type { ResearchRun, RunMetadata, RunStatus, VersionRecord } from '../types/run.js';
import type { SourceMap } from '../types/citation.js';
import type { PricingConfig } from '../config/index.js';
import { calculateCost, formatUsage } from '../orchestrator/usage.js';
import { formatConstraints } from '../orchestrator/prompts.js';
import { effectiveUrl } from '../citations/normalizer.js';
import { compareOrdinals } from '../citations/rebuilder.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
} as const;

/**
 * Check if colors should be enabled.
 */
function useColors(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  if (process.env['FORCE_COLOR'] !== undefined) {
    return true;
  }
  return process.stdout.isTTY ?? false;
}

function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors()) {
    return text;
  }
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, 'bold');
}

export function dim(text: string): string {
  return colorize(text, 'dim');
}

export function red(text: string): string {
  return colorize(text, 'red');
}

export function green(text: string): string {
  return colorize(text, 'green');
}

export function yellow(text: string): string {
  return colorize(text, 'yellow');
}

export function blue(text: string): string {
  return colorize(text, 'blue');
}

export function cyan(text: string): string {
  return colorize(text, 'cyan');
}

/**
 * Format a run status with appropriate color.
 */
export function formatStatus(status: RunStatus): string {
  const statusColors: Record<RunStatus, keyof typeof colors> = {
    pending: 'yellow',
    running: 'blue',
    completed: 'green',
    failed: 'red',
    cancelled: 'gray',
    interrupted: 'magenta',
  };

  return colorize(status.toUpperCase(), statusColors[status]);
}

/**
 * Format a date for display.
 */
export function formatDate(date: Date): string {
  return date.toLocaleString('en-US', {
    year: 'numeric',
    month: 'short',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  });
}

/**
 * Format a relative time (e.g., "2 hours ago").
 */
export function formatRelativeTime(date: Date, now: number = Date.now()): string {
  const diff = now - date.getTime();

  const seconds = Math.floor(diff / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);

  if (days > 0) {
    return `${days} day${days > 1 ? 's' : ''} ago`;
  }
  if (hours > 0) {
    return `${hours} hour${hours > 1 ? 's' : ''} ago`;
  }
  if (minutes > 0) {
    return `${minutes} minute${minutes > 1 ? 's' : ''} ago`;
  }
  return 'just now';
}

/**
 * Truncate a string to a maximum length.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength - 3)}...`;
}

export function padRight(text: string, width: number): string {
  return text.padEnd(width);
}

export function padLeft(text: string, width: number): string {
  return text.padStart(width);
}

/**
 * Table column definition.
 */
interface TableColumn<T> {
  header: string;
  width: number;
  align?: 'left' | 'right';
  value: (item: T) => string;
}

/**
 * Format data as a table.
 */
export function formatTable<T>(items: T[], columns: TableColumn<T>[]): string {
  const lines: string[] = [];

  const headerRow = columns
    .map(col => {
      const header = col.align === 'right'
        ? padLeft(col.header, col.width)
        : padRight(col.header, col.width);
      return bold(header);
    })
    .join('  ');
  lines.push(headerRow);

  const separator = columns.map(col => '-'.repeat(col.width)).join('  ');
  lines.push(dim(separator));

  for (const item of items) {
    const row = columns
      .map(col => {
        const value = truncate(col.value(item), col.width);
        return col.align === 'right'
          ? padLeft(value, col.width)
          : padRight(value, col.width);
      })
      .join('  ');
    lines.push(row.trimEnd());
  }

  return lines.join('\n');
}

function latestRecord(meta: RunMetadata): VersionRecord | undefined {
  return meta.versions.find(v => v.version === meta.latestVersion);
}

/**
 * Format the run index as a table, newest first.
 */
export function formatRunList(runs: RunMetadata[], pricing?: PricingConfig): string {
  if (runs.length === 0) {
    return dim('No runs found.');
  }

  const columns: TableColumn<RunMetadata>[] = [
    {
      header: 'RUN',
      width: 8,
      value: m => m.runId,
    },
    {
      header: 'VER',
      width: 3,
      align: 'right',
      value: m => `v${m.latestVersion}`,
    },
    {
      header: 'STATUS',
      width: 11,
      value: m => latestRecord(m)?.status ?? 'unknown',
    },
    {
      header: 'CREATED',
      width: 16,
      value: m => formatRelativeTime(m.createdAt),
    },
    {
      header: 'COST',
      width: 9,
      align: 'right',
      value: m => {
        const usage = latestRecord(m)?.usage;
        return usage ? `$${calculateCost(usage, pricing).toFixed(4)}` : '-';
      },
    },
    {
      header: 'TOPIC',
      width: 60,
      value: m => m.topic,
    },
  ];

  return formatTable(runs, columns);
}

/**
 * Format a run version for detailed display.
 */
export function formatRunDetail(run: ResearchRun, pricing?: PricingConfig): string {
  const lines: string[] = [];

  lines.push(bold(`Run ${run.runId} (v${run.version})`));
  lines.push('');
  lines.push(`${bold('Status:')}       ${formatStatus(run.status)}`);
  lines.push(`${bold('Created:')}      ${formatDate(run.createdAt)} (${dim(formatRelativeTime(run.createdAt))})`);
  lines.push(`${bold('Job:')}          ${run.jobId ?? dim('none')}`);

  if (run.previousJobId) {
    lines.push(`${bold('Continues:')}    ${run.previousJobId}`);
  }

  if (run.inputs) {
    lines.push('');
    lines.push(bold('Topic:'));
    lines.push(`  ${run.inputs.topic}`);
    const constraints = formatConstraints(run.inputs.constraints);
    if (constraints.length > 0) {
      lines.push('');
      lines.push(bold('Constraints:'));
      lines.push(...constraints.map(line => `  ${line}`));
    }
  }

  if (run.feedback) {
    lines.push('');
    lines.push(bold('Feedback:'));
    lines.push(`  ${run.feedback}`);
  }

  if (run.usage) {
    lines.push('');
    lines.push(dim(formatUsage(run.usage, pricing)));
  }

  if (run.error) {
    lines.push('');
    lines.push(`${bold(red('Error:'))}`);
    lines.push(`  ${red(run.error)}`);
  }

  return lines.join('\n');
}

/**
 * Numbered bibliography, resolved URLs shown after the original.
 */
export function formatSources(sources: SourceMap): string {
  if (sources.size === 0) {
    return dim('No sources recorded.');
  }

  return [...sources.keys()]
    .sort(compareOrdinals)
    .map(ordinal => {
      const source = sources.get(ordinal);
      if (!source) {
        return '';
      }
      const resolved = effectiveUrl(source) !== source.url ? ` ${dim(`-> ${effectiveUrl(source)}`)}` : '';
      return `${padLeft(ordinal, 3)}. ${source.title}\n     ${cyan(source.url)}${resolved}`;
    })
    .join('\n');
}

/**
 * Format success message.
 */
export function formatSuccess(message: string): string {
  return `${green('✓')} ${message}`;
}

/**
 * Format error message.
 */
export function formatError(message: string): string {
  return `${red('✗')} ${red(message)}`;
}

/**
 * Format warning message.
 */
export function formatWarning(message: string): string {
  return `${yellow('!')} ${yellow(message)}`;
}

/**
 * Format info message.
 */
export function formatInfo(message: string): string {
  return `${blue('i')} ${message}`;
}

/**
 * Format JSON output.
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Format a run as JSON (with Date serialization).
 */
export function formatRunJson(run: ResearchRun, sources?: SourceMap | null): string {
  return formatJson({
    ...run,
    createdAt: run.createdAt.toISOString(),
    ...(sources ? { sources: Object.fromEntries(sources) } : {}),
  });
}

/**
 * Format the run index as JSON.
 */
export function formatRunListJson(runs: RunMetadata[]): string {
  return formatJson(
    runs.map(meta => ({
      ...meta,
      createdAt: meta.createdAt.toISOString(),
      versions: meta.versions.map(v => ({ ...v, createdAt: v.createdAt.toISOString() })),
    }))
  );
}

/**
 * Print to stdout.
 */
export function print(text: string): void {
  // eslint-disable-next-line no-console -- CLI output function
  console.log(text);
}

/**
 * Print error to stderr.
 */
export function printError(text: string): void {
  // eslint-disable-next-line no-console -- CLI error output function
  console.error(text);
}

/**
 * Format and print validation errors.
 */
export function formatValidationErrors(
  errors: Array<{ path: string; message: string }>
): string {
  const lines = errors.map(e => {
    const path = e.path ? `${bold(e.path)}: ` : '';
    return `  ${red('•')} ${path}${e.message}`;
  });

  return [formatError('Validation failed:'), ...lines].join('\n');
}
