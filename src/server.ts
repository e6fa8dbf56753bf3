// MCP tool surface for survey coding.
//
// One CodingProject per project name, created on first use. Every handler
// resolves its project through resolveToolContext, validates arguments with
// zod, and turns OpResult failures into isError text. Nothing a caller sends
// can take the server down; thrown errors become isError responses too.

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { OpResult } from './types.js';
import { CodingProject, type ProjectPolicy } from './project.js';
import type { ConfigManager } from './config-manager.js';
import { resolveWorkspacePath, type ResolvedBehavior } from './config.js';
import { normalizeArgs, DEFAULT_PROJECT } from './normalize.js';
import { readTableFile, readProjectFile, writeProjectFile, writeExportFile } from './project-files.js';
import {
  formatMatchResults, formatCategoryMetrics, formatCategoryResponses,
  formatProjectSummary, formatBehaviorConfigSection,
} from './formatters.js';
import {
  readLatestCrash, readCrashHistory, clearLatestCrash, formatCrashReport,
} from './crash-journal.js';

export const SERVER_NAME = 'survey-coder';
export const SERVER_VERSION = '0.1.0';

type ToolResponse = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function text(body: string): ToolResponse {
  return { content: [{ type: 'text', text: body }] };
}

function errorText(body: string): ToolResponse {
  return { content: [{ type: 'text', text: body }], isError: true };
}

function fromResult(result: OpResult, extra?: string): ToolResponse {
  if (!result.ok) return errorText(`${result.message} (${result.code})`);
  return text(extra ? `${result.message}\n\n${extra}` : result.message);
}

export function projectPolicy(behavior: ResolvedBehavior): ProjectPolicy {
  return {
    multiModeClearsUncategorized: behavior.multiModeClearsUncategorized,
    includeMissingDataByDefault: behavior.includeMissingDataByDefault,
  };
}

/** Open projects by name */
export class ProjectRegistry {
  private readonly projects = new Map<string, CodingProject>();
  private policy: ProjectPolicy;

  constructor(policy: ProjectPolicy) {
    this.policy = policy;
  }

  /** The named project, if it is open */
  find(name: string): CodingProject | undefined {
    return this.projects.get(name);
  }

  /** The named project, or a fresh one that only joins the registry through keep() */
  draft(name: string): CodingProject {
    return this.projects.get(name) ?? new CodingProject(this.policy);
  }

  keep(name: string, project: CodingProject): void {
    this.projects.set(name, project);
  }

  entries(): [string, CodingProject][] {
    return Array.from(this.projects.entries());
  }

  names(): readonly string[] {
    return Array.from(this.projects.keys());
  }

  applyPolicy(policy: ProjectPolicy): void {
    this.policy = policy;
    for (const project of this.projects.values()) project.applyPolicy(policy);
  }
}

/** Resolved tool context: after resolution, handlers only see the project and its label */
type ToolContext =
  | { readonly ok: true; readonly project: CodingProject; readonly label: string }
  | { readonly ok: false; readonly error: string };

const projectArg = z.string().min(1).default(DEFAULT_PROJECT);
const modeArg = z.enum(['Single', 'Multi']);
const listArg = z.array(z.string()).min(1);

const projectProperty = {
  type: 'string' as const,
  description: `Project name (defaults to "${DEFAULT_PROJECT}", or to the only open project)`,
};

const pathProperty = (what: string) => ({
  type: 'string' as const,
  description: `${what}. Relative paths resolve against the workspace root.`,
});

/** Short usage lines, appended to validation errors */
const TOOL_USAGE: Record<string, string> = {
  coder_new_project: 'coder_new_project(path: "responses.csv", mode: "Single" | "Multi")',
  coder_append_data: 'coder_append_data(path: "more.csv")',
  coder_load_project: 'coder_load_project(path: "project.json")',
  coder_save_project: 'coder_save_project(path: "project.json")',
  coder_export_csv: 'coder_export_csv(path: "coded.csv")',
  coder_match: 'coder_match(query: "price", threshold?: 60, maxResults?: 50)',
  coder_match_results: 'coder_match_results(threshold?: 60, maxResults?: 50)',
  coder_categorize: 'coder_categorize(values: ["too expensive"], categories: ["Price"])',
  coder_recategorize: 'coder_recategorize(values: ["too expensive"], categories: ["Value"], fromCategory: "Price")',
  coder_create_category: 'coder_create_category(name: "Price")',
  coder_rename_category: 'coder_rename_category(oldName: "Price", newName: "Cost")',
  coder_delete_categories: 'coder_delete_categories(names: ["Price"])',
  coder_category_responses: 'coder_category_responses(category: "Price")',
  coder_set_missing_data: 'coder_set_missing_data(include: true)',
  coder_diagnose: 'coder_diagnose(showCrashHistory?: false)',
};

export interface CoderServerOptions {
  readonly configManager: ConfigManager;
  readonly projects?: ProjectRegistry;
  readonly startedAt?: number;
}

export interface CoderServer {
  readonly server: Server;
  readonly projects: ProjectRegistry;
  /** Last tool name, for crash context */
  lastToolCall(): string | undefined;
}

export function createCoderServer(options: CoderServerOptions): CoderServer {
  const { configManager } = options;
  const projects = options.projects ?? new ProjectRegistry(projectPolicy(configManager.getBehavior()));
  const startedAt = options.startedAt ?? Date.now();
  let lastToolCall: string | undefined;

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  function openProjectList(): string {
    return projects.names().join(', ') || '(none)';
  }

  /** Only coder_new_project and coder_load_project may name a project that is not open yet */
  function resolveToolContext(rawProject: string, allowNew = false): ToolContext {
    const label = rawProject.trim();
    if (label.length === 0) {
      return { ok: false, error: `Project name is required. Open projects: ${openProjectList()}` };
    }
    if (allowNew) return { ok: true, project: projects.draft(label), label };
    const project = projects.find(label);
    if (!project) {
      return {
        ok: false,
        error: `Project "${label}" is not open. Open projects: ${openProjectList()}. Start one with coder_new_project or load one with coder_load_project.`,
      };
    }
    return { ok: true, project, label };
  }

  function requireDataset(ctx: ToolContext & { ok: true }): ToolResponse | null {
    if (ctx.project.hasDataset()) return null;
    return errorText(
      `Project "${ctx.label}" has no dataset. Start one with coder_new_project or load one with coder_load_project. (NoDataset)`,
    );
  }

  function configFileDisplay(): string {
    const origin = configManager.getConfigOrigin();
    return origin.source === 'file' ? origin.path : '(not using config file)';
  }

  // --- Tool definitions ---
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: 'coder_new_project',
        description: 'Start a project from a CSV or XLSX file. First column: respondent id; other columns: free-text responses. All responses start in "Uncategorized". Example: coder_new_project(path: "wave1.csv", mode: "Single")',
        inputSchema: {
          type: 'object' as const,
          properties: {
            project: projectProperty,
            path: pathProperty('Dataset file (.csv or .xlsx)'),
            mode: {
              type: 'string',
              enum: ['Single', 'Multi'],
              description: 'Single: a response belongs to one category per column. Multi: to any number.',
            },
          },
          required: ['path', 'mode'],
        },
      },
      {
        name: 'coder_append_data',
        description: 'Append rows from a file with the same columns. The current codeframe is reapplied to the new rows.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            project: projectProperty,
            path: pathProperty('Dataset file (.csv or .xlsx)'),
            mode: { type: 'string', enum: ['Single', 'Multi'], description: 'Becomes the project mode; defaults to the current one' },
          },
          required: ['path'],
        },
      },
      {
        name: 'coder_load_project',
        description: 'Load a saved project (.json). The current state is only replaced if the file is valid.',
        inputSchema: {
          type: 'object' as const,
          properties: { project: projectProperty, path: pathProperty('Project file (.json)') },
          required: ['path'],
        },
      },
      {
        name: 'coder_save_project',
        description: 'Save the project, including categories and membership, to a .json file.',
        inputSchema: {
          type: 'object' as const,
          properties: { project: projectProperty, path: pathProperty('Project file (.json)') },
          required: ['path'],
        },
      },
      {
        name: 'coder_export_csv',
        description: 'Export the coded data: respondent id plus one 1/0 column per category and response column.',
        inputSchema: {
          type: 'object' as const,
          properties: { project: projectProperty, path: pathProperty('Export file (.csv)') },
          required: ['path'],
        },
      },
      {
        name: 'coder_match',
        description: 'Fuzzy-match uncategorized responses against a query. Shows score, occurrence count and response. Example: coder_match(query: "too expensive", threshold: 70)',
        inputSchema: {
          type: 'object' as const,
          properties: {
            project: projectProperty,
            query: { type: 'string', description: 'Text to match' },
            threshold: { type: 'number', description: 'Minimum score 0-100 (default from config)' },
            maxResults: { type: 'number', description: 'Maximum rows shown (default from config)' },
          },
          required: ['query'],
        },
      },
      {
        name: 'coder_match_results',
        description: 'Show the last match again at a different threshold, without re-running it.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            project: projectProperty,
            threshold: { type: 'number', description: 'Minimum score 0-100' },
            maxResults: { type: 'number', description: 'Maximum rows shown' },
          },
        },
      },
      {
        name: 'coder_categorize',
        description: 'Assign responses to categories in every response column where they occur. Single mode takes exactly one category.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            project: projectProperty,
            values: { type: 'array', items: { type: 'string' }, description: 'Responses, as shown by coder_match' },
            categories: { type: 'array', items: { type: 'string' }, description: 'Target categories' },
          },
          required: ['values', 'categories'],
        },
      },
      {
        name: 'coder_recategorize',
        description: 'Move responses out of one category into others.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            project: projectProperty,
            values: { type: 'array', items: { type: 'string' } },
            categories: { type: 'array', items: { type: 'string' }, description: 'New categories' },
            fromCategory: { type: 'string', description: 'Category the responses leave' },
          },
          required: ['values', 'categories', 'fromCategory'],
        },
      },
      {
        name: 'coder_create_category',
        description: 'Create an empty category.',
        inputSchema: {
          type: 'object' as const,
          properties: { project: projectProperty, name: { type: 'string' } },
          required: ['name'],
        },
      },
      {
        name: 'coder_rename_category',
        description: 'Rename a category. Its responses stay with it. "Uncategorized" cannot be renamed.',
        inputSchema: {
          type: 'object' as const,
          properties: { project: projectProperty, oldName: { type: 'string' }, newName: { type: 'string' } },
          required: ['oldName', 'newName'],
        },
      },
      {
        name: 'coder_delete_categories',
        description: 'Delete categories. Their responses return to "Uncategorized" unless another category still holds them (Multi mode).',
        inputSchema: {
          type: 'object' as const,
          properties: { project: projectProperty, names: { type: 'array', items: { type: 'string' } } },
          required: ['names'],
        },
      },
      {
        name: 'coder_list_categories',
        description: 'List categories with occurrence counts and percentages.',
        inputSchema: { type: 'object' as const, properties: { project: projectProperty } },
      },
      {
        name: 'coder_category_responses',
        description: 'List the responses in a category with their counts.',
        inputSchema: {
          type: 'object' as const,
          properties: { project: projectProperty, category: { type: 'string' } },
          required: ['category'],
        },
      },
      {
        name: 'coder_set_missing_data',
        description: 'Whether missing responses count towards the percentage denominator.',
        inputSchema: {
          type: 'object' as const,
          properties: { project: projectProperty, include: { type: 'boolean' } },
          required: ['include'],
        },
      },
      {
        name: 'coder_list_projects',
        description: 'List open projects with row counts, mode and category counts.',
        inputSchema: { type: 'object' as const, properties: {} },
      },
      {
        name: 'coder_diagnose',
        description: 'Server diagnostics: config, open projects, latest crash report.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            showCrashHistory: { type: 'boolean', description: 'Include the last 10 crash reports', default: false },
          },
        },
      },
    ],
  }));

  // --- Tool handlers ---
  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<ToolResponse> => {
    const { name, arguments: rawArgs } = request.params;
    lastToolCall = name;
    const args = normalizeArgs(name, rawArgs, projects.names());

    try {
      await configManager.ensureFresh();
      const behavior = configManager.getBehavior();
      const config = configManager.getConfig();

      switch (name) {
        case 'coder_new_project': {
          const { project: rawProject, path: filePath, mode } = z.object({
            project: projectArg,
            path: z.string().min(1),
            mode: modeArg,
          }).parse(args);

          const ctx = resolveToolContext(rawProject, true);
          if (!ctx.ok) return errorText(ctx.error);

          const resolved = resolveWorkspacePath(config, filePath);
          const table = await readTableFile(resolved);
          if (!table.ok) return errorText(`${table.message} (${table.code})`);

          const result = ctx.project.startNew(table.value, mode);
          if (result.ok) {
            projects.keep(ctx.label, ctx.project);
            process.stderr.write(`[survey-coder] [${ctx.label}] New project from ${resolved} (${mode})\n`);
          }
          return fromResult(result, result.ok ? formatCategoryMetrics(ctx.project.categoryMetrics(), ctx.project.includesMissingData()) : undefined);
        }

        case 'coder_append_data': {
          const { project: rawProject, path: filePath, mode } = z.object({
            project: projectArg,
            path: z.string().min(1),
            mode: modeArg.optional(),
          }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);

          const resolved = resolveWorkspacePath(config, filePath);
          const table = await readTableFile(resolved);
          if (!table.ok) return errorText(`${table.message} (${table.code})`);

          const result = ctx.project.appendData(table.value, mode);
          if (result.ok) {
            process.stderr.write(`[survey-coder] [${ctx.label}] Appended data from ${resolved}\n`);
          }
          return fromResult(result);
        }

        case 'coder_load_project': {
          const { project: rawProject, path: filePath } = z.object({
            project: projectArg,
            path: z.string().min(1),
          }).parse(args);

          const ctx = resolveToolContext(rawProject, true);
          if (!ctx.ok) return errorText(ctx.error);

          const resolved = resolveWorkspacePath(config, filePath);
          const loaded = await readProjectFile(resolved);
          if (!loaded.ok) {
            process.stderr.write(`[survey-coder] [${ctx.label}] Load rejected for ${resolved}: ${loaded.message}\n`);
            return errorText(`Failed to load project: ${loaded.message} (${loaded.code})`);
          }

          ctx.project.restore(loaded.snapshot);
          projects.keep(ctx.label, ctx.project);
          process.stderr.write(`[survey-coder] [${ctx.label}] Loaded project from ${resolved}\n`);
          return text([
            `Project loaded from ${resolved}`,
            '',
            formatProjectSummary(ctx.label, ctx.project.summary()),
          ].join('\n'));
        }

        case 'coder_save_project': {
          const { project: rawProject, path: filePath } = z.object({
            project: projectArg,
            path: z.string().min(1),
          }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);
          const missing = requireDataset(ctx);
          if (missing) return missing;

          const resolved = resolveWorkspacePath(config, filePath);
          const result = await writeProjectFile(resolved, ctx.project.toSnapshot());
          if (result.ok) process.stderr.write(`[survey-coder] [${ctx.label}] Saved to ${resolved}\n`);
          return fromResult(result);
        }

        case 'coder_export_csv': {
          const { project: rawProject, path: filePath } = z.object({
            project: projectArg,
            path: z.string().min(1),
          }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);

          const table = ctx.project.exportTable();
          if (!table.ok) return errorText(`${table.message} (${table.code})`);

          const resolved = resolveWorkspacePath(config, filePath);
          const result = await writeExportFile(resolved, table.value);
          if (result.ok) process.stderr.write(`[survey-coder] [${ctx.label}] Exported to ${resolved}\n`);
          return fromResult(result);
        }

        case 'coder_match': {
          const { project: rawProject, query, threshold, maxResults } = z.object({
            project: projectArg,
            query: z.string(),
            threshold: z.number().min(0).max(100).optional(),
            maxResults: z.number().int().min(1).optional(),
          }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);

          const outcome = ctx.project.match(query);
          if (!outcome.ok) return errorText(`${outcome.message} (${outcome.code})`);

          const effectiveThreshold = threshold ?? behavior.matchThreshold;
          return text(formatMatchResults({
            query: query.trim(),
            matches: ctx.project.matchResults(effectiveThreshold),
            threshold: effectiveThreshold,
            maxResults: maxResults ?? behavior.maxMatchResults,
          }));
        }

        case 'coder_match_results': {
          const { project: rawProject, threshold, maxResults } = z.object({
            project: projectArg,
            threshold: z.number().min(0).max(100).optional(),
            maxResults: z.number().int().min(1).optional(),
          }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);

          const query = ctx.project.summary().lastQuery;
          if (query === null) {
            return errorText('No match has been run yet. Use coder_match first.');
          }

          const effectiveThreshold = threshold ?? behavior.matchThreshold;
          return text(formatMatchResults({
            query,
            matches: ctx.project.matchResults(effectiveThreshold),
            threshold: effectiveThreshold,
            maxResults: maxResults ?? behavior.maxMatchResults,
          }));
        }

        case 'coder_categorize': {
          const { project: rawProject, values, categories } = z.object({
            project: projectArg,
            values: listArg,
            categories: z.array(z.string()),
          }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);

          const result = ctx.project.categorize(values, categories);
          return fromResult(result, result.ok ? formatCategoryMetrics(ctx.project.categoryMetrics(), ctx.project.includesMissingData()) : undefined);
        }

        case 'coder_recategorize': {
          const { project: rawProject, values, categories, fromCategory } = z.object({
            project: projectArg,
            values: listArg,
            categories: z.array(z.string()),
            fromCategory: z.string().min(1),
          }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);

          const result = ctx.project.recategorize(values, categories, fromCategory);
          return fromResult(result, result.ok ? formatCategoryMetrics(ctx.project.categoryMetrics(), ctx.project.includesMissingData()) : undefined);
        }

        case 'coder_create_category': {
          const { project: rawProject, name: categoryName } = z.object({
            project: projectArg,
            name: z.string(),
          }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);
          return fromResult(ctx.project.createCategory(categoryName));
        }

        case 'coder_rename_category': {
          const { project: rawProject, oldName, newName } = z.object({
            project: projectArg,
            oldName: z.string().min(1),
            newName: z.string(),
          }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);
          return fromResult(ctx.project.renameCategory(oldName, newName));
        }

        case 'coder_delete_categories': {
          const { project: rawProject, names } = z.object({
            project: projectArg,
            names: z.array(z.string()),
          }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);

          const result = ctx.project.deleteCategories(names);
          return fromResult(result, result.ok ? formatCategoryMetrics(ctx.project.categoryMetrics(), ctx.project.includesMissingData()) : undefined);
        }

        case 'coder_list_categories': {
          const { project: rawProject } = z.object({ project: projectArg }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);
          const missing = requireDataset(ctx);
          if (missing) return missing;

          return text([
            `## [${ctx.label}] Categories (${ctx.project.categorizationMode()} mode)`,
            '',
            formatCategoryMetrics(ctx.project.categoryMetrics(), ctx.project.includesMissingData()),
          ].join('\n'));
        }

        case 'coder_category_responses': {
          const { project: rawProject, category } = z.object({
            project: projectArg,
            category: z.string().min(1),
          }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);

          const responses = ctx.project.categoryResponses(category);
          if (!responses.ok) return errorText(`${responses.message} (${responses.code})`);
          return text(formatCategoryResponses(category, responses.value));
        }

        case 'coder_set_missing_data': {
          const { project: rawProject, include } = z.object({
            project: projectArg,
            include: z.boolean(),
          }).parse(args);

          const ctx = resolveToolContext(rawProject);
          if (!ctx.ok) return errorText(ctx.error);

          const result = ctx.project.setIncludeMissingData(include);
          return fromResult(result, ctx.project.hasDataset()
            ? formatCategoryMetrics(ctx.project.categoryMetrics(), include)
            : undefined);
        }

        case 'coder_list_projects': {
          const names = projects.names();
          const lines = [
            `## Open Projects (${names.length})`,
            '',
            ...(names.length === 0
              ? ['None yet. Start one with coder_new_project or coder_load_project.']
              : projects.entries().map(([n, project]) => formatProjectSummary(n, project.summary()))),
            '',
            `**Workspace:** ${config.workspaceRoot}`,
            `**Config file:** ${configFileDisplay()}`,
          ];
          return text(lines.join('\n'));
        }

        case 'coder_diagnose': {
          const { showCrashHistory } = z.object({
            showCrashHistory: z.boolean().default(false),
          }).parse(args);

          return text(await buildDiagnosticsText(showCrashHistory));
        }

        default:
          return errorText(`Unknown tool: ${name}`);
      }
    } catch (error) {
      if (error instanceof z.ZodError) {
        const issues = error.issues
          .map(i => `${i.path.join('.') || '(arguments)'}: ${i.message}`)
          .join('; ');
        const usage = TOOL_USAGE[name];
        return errorText(`Invalid arguments for ${name}: ${issues}${usage ? `\n\nHint: ${usage}` : ''}`);
      }

      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[survey-coder] ${name} failed: ${message}\n`);
      return errorText(`Error: ${message}`);
    }
  });

  async function buildDiagnosticsText(showFullCrashHistory: boolean): Promise<string> {
    const sections: string[] = [];
    const origin = configManager.getConfigOrigin();
    const names = projects.names();

    sections.push(`## Survey Coder Diagnostics`);
    sections.push('');
    sections.push(`**Version:** ${SERVER_VERSION}`);
    sections.push(`**Uptime:** ${Math.round((Date.now() - startedAt) / 1000)}s`);
    sections.push(`**Config source:** ${origin.source}`);
    sections.push(`**Config file:** ${configFileDisplay()}`);
    sections.push(`**Workspace:** ${configManager.getConfig().workspaceRoot}`);
    sections.push(`**Open projects:** ${names.length}`);
    for (const [n, project] of projects.entries()) {
      sections.push(formatProjectSummary(n, project.summary()));
    }
    sections.push('');

    sections.push('### Active Behavior Config');
    sections.push(formatBehaviorConfigSection(configManager.getBehavior()));
    sections.push('');

    const latestCrash = await readLatestCrash();
    if (latestCrash) {
      sections.push('### Latest Crash');
      sections.push(formatCrashReport(latestCrash));
      sections.push('');
      await clearLatestCrash();
    } else {
      sections.push('### Crash History');
      sections.push('No recent crashes recorded.');
      sections.push('');
    }

    if (showFullCrashHistory) {
      const history = await readCrashHistory(10);
      if (history.length > 0) {
        sections.push('### Full Crash History (last 10)');
        for (const crash of history) {
          sections.push(`- **${crash.timestamp}** [${crash.type}]: ${crash.error.substring(0, 100)}`);
          sections.push(`  Phase: ${crash.context.phase}, Uptime: ${crash.serverUptime}s`);
        }
        sections.push('');
      }
    }

    return sections.join('\n');
  }

  return { server, projects, lastToolCall: () => lastToolCall };
}
