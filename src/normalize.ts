// Argument normalization for MCP tool calls.
//
// Agents frequently guess wrong param names. This module resolves common aliases
// and applies defaults to avoid wasted round-trips from validation errors.
// Pure functions, no state.

import { parseCategorizationMode } from './types.js';

export const DEFAULT_PROJECT = 'default';

/** Aliases valid for every tool */
const GLOBAL_ALIASES: Record<string, string> = {
  workspace: 'project',
  session: 'project',
  file: 'path',
  filePath: 'path',
  filename: 'path',
};

/** Per-tool aliases: "category" means different things to different tools */
const TOOL_ALIASES: Record<string, Record<string, string>> = {
  coder_new_project: { categorizationMode: 'mode', type: 'mode' },
  coder_append_data: { categorizationMode: 'mode', type: 'mode' },
  coder_match: {
    text: 'query', search: 'query', string: 'query',
    minScore: 'threshold', score: 'threshold',
    limit: 'maxResults',
  },
  coder_categorize: {
    responses: 'values', response: 'values', value: 'values',
    category: 'categories', targets: 'categories',
  },
  coder_recategorize: {
    responses: 'values', response: 'values', value: 'values',
    category: 'categories', targets: 'categories', to: 'categories',
    from: 'fromCategory', source: 'fromCategory',
  },
  coder_create_category: { category: 'name' },
  coder_rename_category: { from: 'oldName', old: 'oldName', to: 'newName', name: 'newName' },
  coder_delete_categories: { categories: 'names', category: 'names', name: 'names' },
  coder_category_responses: { name: 'category' },
  coder_set_missing_data: { includeMissingData: 'include', value: 'include' },
};

/** Params that take a list; a lone string is wrapped */
const LIST_PARAMS = ['values', 'categories', 'names'];

function moveAliases(args: Record<string, unknown>, aliases: Record<string, string>): void {
  for (const [alias, canonical] of Object.entries(aliases)) {
    if (alias in args && !(canonical in args)) {
      args[canonical] = args[alias];
      delete args[alias];
    }
  }
}

/** Normalize args before Zod validation: resolve aliases, default the project, coerce shapes */
export function normalizeArgs(
  toolName: string,
  raw: Record<string, unknown> | undefined,
  projectNames: readonly string[],
): Record<string, unknown> {
  const args: Record<string, unknown> = { ...(raw ?? {}) };

  // 1. Resolve param aliases, tool-specific first
  moveAliases(args, TOOL_ALIASES[toolName] ?? {});
  moveAliases(args, GLOBAL_ALIASES);

  // 2. Default project: the only open one, else "default"
  if (!('project' in args) || args['project'] === undefined || args['project'] === '') {
    args['project'] = projectNames.length === 1 ? projectNames[0] : DEFAULT_PROJECT;
  }

  // 3. Wrap single values in lists
  for (const key of LIST_PARAMS) {
    if (typeof args[key] === 'string') {
      args[key] = [args[key]];
    }
  }

  // 4. Case-insensitive categorization mode
  const mode = args['mode'];
  if (typeof mode === 'string') {
    args['mode'] = parseCategorizationMode(mode) ?? mode;
  }

  // 5. Booleans that arrive as strings
  const include = args['include'];
  if (include === 'true' || include === 'false') {
    args['include'] = include === 'true';
  }

  return args;
}
