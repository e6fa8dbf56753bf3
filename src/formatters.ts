// Response formatters for MCP tool handlers.
//
// Pure functions: each takes structured data and returns the text of a tool
// response.

import type { AggregatedMatch, CategoryMetric, CategoryResponse } from './types.js';
import type { ResolvedBehavior } from './config.js';
import type { ProjectSummary } from './project.js';
import {
  DEFAULT_MATCH_THRESHOLD, DEFAULT_MAX_MATCH_RESULTS,
  DEFAULT_MULTI_MODE_CLEARS_UNCATEGORIZED, DEFAULT_INCLUDE_MISSING_DATA,
  MAX_CATEGORY_RESPONSES_SHOWN,
} from './thresholds.js';

/** Aggregated matches as a score table, capped at maxResults rows */
export function formatMatchResults(opts: {
  readonly query: string;
  readonly matches: readonly AggregatedMatch[];
  readonly threshold: number;
  readonly maxResults: number;
}): string {
  const { query, matches, threshold, maxResults } = opts;
  if (matches.length === 0) {
    return [
      `No uncategorized responses match "${query}" at threshold ${threshold}.`,
      'Lower the threshold or try a different query.',
    ].join('\n');
  }

  const shown = matches.slice(0, maxResults);
  const occurrences = matches.reduce((sum, m) => sum + m.count, 0);
  const lines = [
    `## Matches for "${query}" (threshold ${threshold})`,
    ``,
    `${matches.length} distinct response(s), ${occurrences} occurrence(s)`,
    ``,
    `| Score | Count | Response |`,
    `|------:|------:|----------|`,
    ...shown.map(m => `| ${m.score} | ${m.count} | ${m.value} |`),
  ];
  if (matches.length > shown.length) {
    lines.push('');
    lines.push(`... ${matches.length - shown.length} more. Raise the threshold or maxResults to see them.`);
  }
  return lines.join('\n');
}

/** Category table with counts and shares */
export function formatCategoryMetrics(metrics: readonly CategoryMetric[], includeMissingData: boolean): string {
  const lines = [
    `| Category | Count | Share |`,
    `|----------|------:|------:|`,
    ...metrics.map(m => `| ${m.category} | ${m.count} | ${m.percentage} |`),
    ``,
    includeMissingData
      ? 'Shares include missing responses in the denominator.'
      : 'Shares exclude missing responses from the denominator.',
  ];
  return lines.join('\n');
}

export function formatCategoryResponses(category: string, responses: readonly CategoryResponse[]): string {
  if (responses.length === 0) {
    return `Category "${category}" has no responses yet.`;
  }
  const shown = responses.slice(0, MAX_CATEGORY_RESPONSES_SHOWN);
  const lines = [
    `## ${category} (${responses.length} response${responses.length === 1 ? '' : 's'})`,
    ``,
    ...shown.map(r => `- ${r.value} (${r.count})`),
  ];
  if (responses.length > shown.length) {
    lines.push(`... ${responses.length - shown.length} more`);
  }
  return lines.join('\n');
}

export function formatProjectSummary(name: string, summary: ProjectSummary): string {
  if (summary.rows === 0) {
    return `- ${name}: empty (no dataset loaded)`;
  }
  return [
    `- ${name}: ${summary.rows} rows, ${summary.responseColumns.length} response column(s) [${summary.responseColumns.join(', ')}]`,
    `  mode ${summary.mode}, ${summary.categories} categories, ${summary.uncategorizedValues} distinct uncategorized response(s)`,
    `  missing data ${summary.includeMissingData ? 'included in' : 'excluded from'} shares` +
      (summary.lastQuery ? `, last query "${summary.lastQuery}"` : ''),
  ].join('\n');
}

/** Active behavior config for diagnostics. Marks overrides vs defaults. */
export function formatBehaviorConfigSection(behavior: ResolvedBehavior): string {
  const tag = (val: number | boolean, def: number | boolean) => val !== def ? ' (overridden)' : ' (default)';

  const lines = [
    `- matchThreshold: ${behavior.matchThreshold}${tag(behavior.matchThreshold, DEFAULT_MATCH_THRESHOLD)}`,
    `- maxMatchResults: ${behavior.maxMatchResults}${tag(behavior.maxMatchResults, DEFAULT_MAX_MATCH_RESULTS)}`,
    `- multiModeClearsUncategorized: ${behavior.multiModeClearsUncategorized}` +
      tag(behavior.multiModeClearsUncategorized, DEFAULT_MULTI_MODE_CLEARS_UNCATEGORIZED),
    `- includeMissingDataByDefault: ${behavior.includeMissingDataByDefault}` +
      tag(behavior.includeMissingDataByDefault, DEFAULT_INCLUDE_MISSING_DATA),
  ];

  const hasOverrides =
    behavior.matchThreshold !== DEFAULT_MATCH_THRESHOLD ||
    behavior.maxMatchResults !== DEFAULT_MAX_MATCH_RESULTS ||
    behavior.multiModeClearsUncategorized !== DEFAULT_MULTI_MODE_CLEARS_UNCATEGORIZED ||
    behavior.includeMissingDataByDefault !== DEFAULT_INCLUDE_MISSING_DATA;

  if (!hasOverrides) {
    lines.push('');
    lines.push('All defaults active. To customize, add a "behavior" block to survey-coder-config.json:');
    lines.push('  { "behavior": { "matchThreshold": 70, "maxMatchResults": 100 } }');
  }

  return lines.join('\n');
}
