/**
 * Definition Schema & Documentation Helpers
 *
 * Validates setting definitions with zod before they enter the registry,
 * normalizes their documentation and renders settings for reference output.
 */

import { z } from 'zod';
import { createDefinitionError } from '../../core/errors.js';
import type { SettingDefinition, SettingDescriptor } from './types.js';

// =============================================================================
// DEFINITION SCHEMA
// =============================================================================

const CLI_FLAG = /^(?:-[A-Za-z]|--[a-z][a-z0-9-]*)$/;

export const settingDefinitionSchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/, 'Name must be snake_case'),
  section: z.string().min(1, 'Section must not be empty'),
  cli: z.array(z.string().regex(CLI_FLAG, 'Flag must look like -x or --long-name')).optional(),
  meta: z.string().min(1).optional(),
  action: z.enum(['store', 'store_true']).optional(),
  type: z.enum(['string', 'int', 'bool', 'callable']).optional(),
  validator: z.custom<(raw: unknown) => unknown>(
    (value) => typeof value === 'function',
    'Validator must be a function'
  ),
  desc: z.string().refine((desc) => desc.trim().length > 0, 'Description must not be empty'),
});

/**
 * Format zod issues into human-readable lines
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.map(String).join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Check a definition's shape, throwing INVALID_DEFINITION with every issue
 */
export function validateDefinition<T>(definition: SettingDefinition<T>): void {
  const result = settingDefinitionSchema.safeParse(definition);
  if (!result.success) {
    throw createDefinitionError(definition.name || '<unnamed>', formatZodErrors(result.error));
  }
}

// =============================================================================
// DOCUMENTATION
// =============================================================================

/**
 * Remove the whitespace prefix shared by every non-blank line.
 * Whitespace-only lines are emptied and ignored when finding the prefix.
 */
export function dedent(text: string): string {
  const lines = text.split('\n').map((line) => (line.trim() === '' ? '' : line));

  let margin: string | undefined;
  for (const line of lines) {
    if (line === '') continue;
    const indent = /^[ \t]*/.exec(line)?.[0] ?? '';
    margin = margin === undefined ? indent : commonPrefix(margin, indent);
  }

  if (!margin) return lines.join('\n');
  const width = margin.length;
  return lines.map((line) => line.slice(width)).join('\n');
}

function commonPrefix(a: string, b: string): string {
  let i = 0;
  while (i < a.length && i < b.length && a[i] === b[i]) i++;
  return a.slice(0, i);
}

/**
 * Split a declared description into its short (first line) and long forms
 */
export function normalizeDoc(desc: string): { shortDoc: string; longDoc: string } {
  const longDoc = dedent(desc).trim();
  const shortDoc = longDoc.split('\n')[0] ?? '';
  return { shortDoc, longDoc };
}

// =============================================================================
// REFERENCE OUTPUT
// =============================================================================

/**
 * Render a setting value for help text and listings
 */
export function formatValue(value: unknown): string {
  if (value === undefined || value === null) return 'none';
  if (typeof value === 'function') return `[function ${value.name || 'anonymous'}]`;
  return String(value);
}

export interface SettingSummary {
  name: string;
  section: string;
  flags: string;
  type: string;
  default: string;
  description: string;
}

/**
 * One summary row per setting, in the order given
 */
export function describeSettings(descriptors: Iterable<SettingDescriptor>): SettingSummary[] {
  const rows: SettingSummary[] = [];
  for (const descriptor of descriptors) {
    rows.push({
      name: descriptor.name,
      section: descriptor.section,
      flags: descriptor.cli.join(', '),
      type: descriptor.type,
      default: formatValue(descriptor.default),
      description: descriptor.shortDoc,
    });
  }
  return rows;
}
