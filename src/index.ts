#!/usr/bin/env node

// Survey Coder MCP Server
// Fuzzy-match free-text survey responses and code them into categories

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { DEFAULT_CONFIG_PATH, getCoderConfig } from './config.js';
import { ConfigManager } from './config-manager.js';
import { createCoderServer, projectPolicy, ProjectRegistry, type CoderServer } from './server.js';
import {
  buildCrashReport, writeCrashReportSync, readLatestCrash,
  markServerStarted, type CrashContext,
} from './crash-journal.js';

// --- Configuration ---
const loaded = getCoderConfig();
const projects = new ProjectRegistry(projectPolicy(loaded.behavior));
const configManager = new ConfigManager(
  loaded.origin.source === 'file' ? loaded.origin.path : DEFAULT_CONFIG_PATH,
  loaded,
  (next) => projects.applyPolicy(projectPolicy(next.behavior)),
);

let coder: CoderServer | undefined;

function currentCrashContext(phase: CrashContext['phase']): CrashContext {
  return {
    phase,
    lastToolCall: coder?.lastToolCall(),
    configSource: configManager.getConfigOrigin().source,
    projectCount: projects.names().length,
  };
}

// --- Process-level crash protection ---
// Journal the crash to disk, then exit. The next start reports it through coder_diagnose.

function journalAndExit(error: Error, type: 'uncaught-exception' | 'unhandled-rejection'): never {
  process.stderr.write(`[survey-coder] FATAL: ${type}, journaling and exiting.\n`);
  process.stderr.write(`[survey-coder] Error: ${error.message}\n`);
  if (error.stack) process.stderr.write(`[survey-coder] Stack: ${error.stack}\n`);

  const filepath = writeCrashReportSync(buildCrashReport(error, type, currentCrashContext('running')));
  if (filepath) {
    process.stderr.write(`[survey-coder] Crash report saved: ${filepath}\n`);
  }
  process.exit(1);
}

process.on('uncaughtException', (error) => journalAndExit(error, 'uncaught-exception'));
process.on('unhandledRejection', (reason) => {
  journalAndExit(reason instanceof Error ? reason : new Error(String(reason)), 'unhandled-rejection');
});

// --- Startup ---
async function main() {
  markServerStarted();

  const previousCrash = await readLatestCrash();
  if (previousCrash) {
    const age = Math.round((Date.now() - new Date(previousCrash.timestamp).getTime()) / 1000);
    process.stderr.write(`[survey-coder] Previous crash detected (${age}s ago): ${previousCrash.type}: ${previousCrash.error}\n`);
    process.stderr.write(`[survey-coder] Crash report will be shown in coder_diagnose.\n`);
  }

  coder = createCoderServer({ configManager, projects });
  const { server } = coder;
  const transport = new StdioServerTransport();

  transport.onerror = (error) => {
    process.stderr.write(`[survey-coder] Transport error: ${error.message}\n`);
    writeCrashReportSync(buildCrashReport(error, 'transport-error', currentCrashContext('running')));
  };

  server.onerror = (error) => {
    process.stderr.write(`[survey-coder] Server error: ${error.message}\n`);
  };

  // Host went away
  process.stdin.on('end', () => {
    process.stderr.write('[survey-coder] stdin closed, host disconnected. Exiting.\n');
    process.exit(0);
  });
  process.stdout.on('error', (error) => {
    process.stderr.write(`[survey-coder] stdout error (pipe broken?): ${error.message}\n`);
    process.exit(0);
  });

  await server.connect(transport);
  process.stderr.write(`[survey-coder] Server started (workspace: ${configManager.getConfig().workspaceRoot})\n`);

  const shutdown = () => {
    process.stderr.write('[survey-coder] Shutting down. Unsaved project state is discarded.\n');
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  process.stderr.write(`[survey-coder] Fatal startup error: ${String(error)}\n`);
  if (error instanceof Error && error.stack) {
    process.stderr.write(`[survey-coder] Stack: ${error.stack}\n`);
  }

  writeCrashReportSync(buildCrashReport(error, 'startup-failure', currentCrashContext('startup')));
  process.exit(1);
});
