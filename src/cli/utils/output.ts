/**
 * CLI Output Formatting
 *
 * Provides JSON and table output formatting for CLI commands.
 */

export type OutputFormat = 'json' | 'table';

/** Widest a table column gets before values are cut */
const MAX_COLUMN_WIDTH = 60;

/**
 * Format result based on output mode
 */
export function formatOutput(result: unknown, format: OutputFormat = 'json'): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }

  // Table format
  return formatAsTable(result);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatAsTable(result: unknown): string {
  if (Array.isArray(result)) {
    return formatArrayAsTable(result);
  }
  if (isRecord(result)) {
    return formatObjectAsKeyValue(result);
  }
  return String(result);
}

function formatArrayAsTable(items: unknown[]): string {
  if (items.length === 0) return '(no results)';

  const rows = items.filter(isRecord);
  const first = rows[0];
  if (!first || rows.length !== items.length) {
    return items.map(String).join('\n');
  }

  const keys = Object.keys(first);
  const maxWidths = calculateColumnWidths(rows, keys);

  // Header
  const header = keys.map((k, i) => k.padEnd(maxWidths[i] ?? k.length)).join(' | ');
  const separator = keys.map((k, i) => '-'.repeat(maxWidths[i] ?? k.length)).join('-+-');

  // Rows
  const lines = rows.map((row) =>
    keys
      .map((k, i) => {
        const val = formatValue(row[k]);
        const width = maxWidths[i] ?? k.length;
        return val.slice(0, width).padEnd(width);
      })
      .join(' | ')
      .trimEnd()
  );

  return [header.trimEnd(), separator, ...lines].join('\n');
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function calculateColumnWidths(items: Record<string, unknown>[], keys: string[]): number[] {
  return keys.map((key) => {
    const maxValue = Math.max(...items.map((item) => formatValue(item[key]).length));
    return Math.max(key.length, Math.min(maxValue, MAX_COLUMN_WIDTH));
  });
}

function formatObjectAsKeyValue(obj: Record<string, unknown>): string {
  const lines: string[] = [];
  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) continue; // Skip undefined values
    if (isRecord(value)) {
      lines.push(`${key}:`);
      for (const [innerKey, innerValue] of Object.entries(value)) {
        lines.push(`  ${innerKey}: ${formatValue(innerValue)}`);
      }
      continue;
    }
    lines.push(`${key}: ${formatValue(value)}`);
  }
  return lines.join('\n');
}
