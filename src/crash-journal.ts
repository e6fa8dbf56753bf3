// Crash journal: persistent, human-readable record of server failures.
//
// Crashes become structured records, visible through coder_diagnose on the
// next start. Journal, then exit.
//
// Location: ~/.survey-coder/crashes/ (or $SURVEY_CODER_HOME/crashes/)
//   crash-<timestamp>.json  one file per crash
//   LATEST.json             copy of the most recent crash

import { promises as fs, mkdirSync, writeFileSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';

export type CrashType =
  | 'uncaught-exception'
  | 'unhandled-rejection'
  | 'startup-failure'
  | 'transport-error'
  | 'unknown';

/** What the server was doing when it crashed */
export interface CrashContext {
  readonly phase: 'startup' | 'running' | 'shutdown';
  readonly lastToolCall?: string;
  readonly activeProject?: string;
  readonly configSource?: string;
  readonly projectCount?: number;
}

export interface CrashReport {
  readonly timestamp: string;         // ISO 8601
  readonly pid: number;
  readonly error: string;
  readonly stack?: string;
  readonly type: CrashType;
  readonly context: CrashContext;
  readonly recovery: string[];
  readonly serverUptime: number;      // seconds since startup
}

const crashReportSchema = z.object({
  timestamp: z.string(),
  pid: z.number(),
  error: z.string(),
  stack: z.string().optional(),
  type: z.enum(['uncaught-exception', 'unhandled-rejection', 'startup-failure', 'transport-error', 'unknown']),
  context: z.object({
    phase: z.enum(['startup', 'running', 'shutdown']),
    lastToolCall: z.string().optional(),
    activeProject: z.string().optional(),
    configSource: z.string().optional(),
    projectCount: z.number().optional(),
  }),
  recovery: z.array(z.string()),
  serverUptime: z.number(),
});

const MAX_CRASH_FILES = 20;

/** Resolved on every call so SURVEY_CODER_HOME can move it */
export function crashDir(): string {
  const home = process.env.SURVEY_CODER_HOME ?? path.join(os.homedir(), '.survey-coder');
  return path.join(home, 'crashes');
}

function latestFile(): string {
  return path.join(crashDir(), 'LATEST.json');
}

function crashFileName(report: CrashReport): string {
  return `crash-${report.timestamp.replace(/[:.]/g, '-')}.json`;
}

let serverStartTime = Date.now();

export function markServerStarted(): void {
  serverStartTime = Date.now();
}

export async function writeCrashReport(report: CrashReport): Promise<string> {
  const dir = crashDir();
  await fs.mkdir(dir, { recursive: true });

  const filepath = path.join(dir, crashFileName(report));
  const content = JSON.stringify(report, null, 2);

  await fs.writeFile(filepath, content, 'utf-8');
  await fs.writeFile(latestFile(), content, 'utf-8');

  // Prune old crash files (keep newest MAX_CRASH_FILES)
  try {
    const files = (await fs.readdir(dir))
      .filter(f => f.startsWith('crash-') && f.endsWith('.json'))
      .sort()
      .reverse();

    for (const old of files.slice(MAX_CRASH_FILES)) {
      await fs.unlink(path.join(dir, old));
    }
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[survey-coder] Crash journal pruning failed: ${message}\n`);
  }

  return filepath;
}

/** For process exit handlers, where async work may never finish */
export function writeCrashReportSync(report: CrashReport): string | null {
  try {
    const dir = crashDir();
    mkdirSync(dir, { recursive: true });
    const filepath = path.join(dir, crashFileName(report));
    const content = JSON.stringify(report, null, 2);
    writeFileSync(filepath, content, 'utf-8');
    writeFileSync(latestFile(), content, 'utf-8');
    return filepath;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[survey-coder] Could not write crash report: ${message}\n`);
    return null;
  }
}

export function buildCrashReport(
  error: unknown,
  type: CrashType,
  context: CrashContext,
): CrashReport {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return {
    timestamp: new Date().toISOString(),
    pid: process.pid,
    error: message,
    stack,
    type,
    context,
    recovery: generateRecoverySteps(type, message),
    serverUptime: Math.round((Date.now() - serverStartTime) / 1000),
  };
}

function generateRecoverySteps(type: CrashType, message: string): string[] {
  const steps: string[] = ['Restart the survey coder server from your MCP client.'];

  switch (type) {
    case 'startup-failure':
      if (message.includes('survey-coder-config.json')) {
        steps.push('Check survey-coder-config.json for syntax errors (invalid JSON).');
        steps.push('Verify the "workspaceRoot" path exists on disk.');
      }
      if (message.includes('ENOENT') || message.includes('not found')) {
        steps.push('Verify the path exists: check if the directory referenced in the error is accessible.');
      }
      steps.push('Run the server directly (node dist/index.js) to see its stderr output.');
      break;

    case 'uncaught-exception':
    case 'unhandled-rejection':
      steps.push('This is likely a bug in the survey coder server.');
      steps.push('Unsaved coding work is lost. Reload the last saved project with coder_load_project.');
      if (message.includes('ENOSPC')) {
        steps.push('Disk is full. Free space and restart.');
      }
      if (message.includes('EACCES') || message.includes('EPERM')) {
        steps.push('Permission error. Check file permissions on the workspace and ~/.survey-coder/.');
      }
      break;

    case 'transport-error':
      steps.push('The connection between the MCP client and the server broke.');
      steps.push('This usually happens when the client restarts.');
      break;

    default:
      steps.push('Check the stack trace for details.');
  }

  return steps;
}

async function readReport(filepath: string): Promise<CrashReport | null> {
  const content = await fs.readFile(filepath, 'utf-8');
  const parsed = crashReportSchema.safeParse(JSON.parse(content));
  return parsed.success ? parsed.data : null;
}

function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function readLatestCrash(): Promise<CrashReport | null> {
  try {
    return await readReport(latestFile());
  } catch (error: unknown) {
    if (!isFileNotFound(error)) {
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[survey-coder] Could not read latest crash: ${message}\n`);
    }
    return null;
  }
}

/** Newest first. Unreadable files are skipped. */
export async function readCrashHistory(limit: number = 10): Promise<CrashReport[]> {
  let files: string[];
  try {
    files = (await fs.readdir(crashDir()))
      .filter(f => f.startsWith('crash-') && f.endsWith('.json'))
      .sort()
      .reverse()
      .slice(0, limit);
  } catch (error: unknown) {
    if (isFileNotFound(error)) return [];
    throw error;
  }

  const reports: CrashReport[] = [];
  for (const file of files) {
    try {
      const report = await readReport(path.join(crashDir(), file));
      if (report) reports.push(report);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[survey-coder] Skipping corrupt crash file ${file}: ${message}\n`);
    }
  }
  return reports;
}

/** Call after the crash has been shown to the user */
export async function clearLatestCrash(): Promise<void> {
  try {
    await fs.unlink(latestFile());
  } catch (error: unknown) {
    if (!isFileNotFound(error)) throw error;
  }
}

export function formatCrashReport(report: CrashReport): string {
  const lines: string[] = [
    `## Survey Coder Crash Report`,
    ``,
    `**When:** ${report.timestamp}`,
    `**Type:** ${report.type}`,
    `**Phase:** ${report.context.phase}`,
    `**Uptime:** ${report.serverUptime}s before crash`,
    `**Error:** ${report.error}`,
  ];

  if (report.context.lastToolCall) {
    lines.push(`**Last tool call:** ${report.context.lastToolCall}`);
  }
  if (report.context.activeProject) {
    lines.push(`**Project:** ${report.context.activeProject}`);
  }

  lines.push('');
  lines.push('### Recovery Steps');
  for (const step of report.recovery) {
    lines.push(`- ${step}`);
  }

  if (report.stack) {
    const stackLines = report.stack.split('\n');
    lines.push('');
    lines.push('### Stack Trace');
    lines.push('```');
    lines.push(stackLines.slice(0, 10).join('\n'));
    if (stackLines.length > 10) {
      lines.push('... (truncated)');
    }
    lines.push('```');
  }

  return lines.join('\n');
}

/** One line for the project summary */
export function formatCrashSummary(report: CrashReport): string {
  const age = Math.round((Date.now() - new Date(report.timestamp).getTime()) / 1000 / 60);
  const ageStr = age < 60 ? `${age}m ago` : `${Math.round(age / 60)}h ago`;
  return `[!] Server crashed ${ageStr}: ${report.type}: ${report.error.substring(0, 100)}`;
}
