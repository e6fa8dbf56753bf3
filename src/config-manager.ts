// ConfigManager: config hot-reload with stat-based freshness checking
//
// Holds the loaded config and the config file's mtime. Tool handlers call
// ensureFresh() at entry; a changed file is re-read and its behavior block
// pushed to the open projects through the onReload callback.

import { stat } from 'fs/promises';
import type { CoderConfig } from './types.js';
import { getCoderConfig, type LoadedConfig, type ConfigOrigin, type ResolvedBehavior } from './config.js';

export type ReloadListener = (loaded: LoadedConfig) => void;

/**
 * Design:
 * - Constructor takes configPath + initial LoadedConfig from startup
 * - ensureFresh() stats the config file, reloads if mtime changed
 * - Any error keeps the old config and logs to stderr
 */
export class ConfigManager {
  private configPath: string;
  private loaded: LoadedConfig;
  private configMtime: number;
  private readonly onReload: ReloadListener | undefined;

  // Tests override this to control mtimes
  protected async statFile(path: string): Promise<{ mtimeMs: number }> {
    return stat(path);
  }

  // Tests override this to avoid touching the filesystem
  protected loadConfig(path: string): LoadedConfig {
    return getCoderConfig(path);
  }

  constructor(configPath: string, initial: LoadedConfig, onReload?: ReloadListener) {
    this.configPath = configPath;
    this.loaded = initial;
    this.onReload = onReload;
    this.configMtime = Date.now();
  }

  /** Call at the start of every tool handler */
  async ensureFresh(): Promise<void> {
    // Env and default configs cannot change at runtime
    if (this.loaded.origin.source !== 'file') {
      return;
    }

    try {
      const stats = await this.statFile(this.configPath);
      if (stats.mtimeMs > this.configMtime) {
        this.reload(stats.mtimeMs);
      }
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[survey-coder] Config stat failed: ${message}. Keeping current config.\n`);
    }
  }

  private reload(newMtime: number): void {
    try {
      const next = this.loadConfig(this.configPath);

      // getCoderConfig falls through to env/default when the file no longer parses
      if (next.origin.source !== 'file') {
        process.stderr.write(`[survey-coder] Config reload failed (parse error). Keeping current config.\n`);
        return;
      }

      this.loaded = next;
      this.configMtime = newMtime;
      this.onReload?.(next);

      const timestamp = new Date().toISOString();
      process.stderr.write(
        `[survey-coder] [${timestamp}] Config reloaded: threshold ${next.behavior.matchThreshold}, ` +
        `max results ${next.behavior.maxMatchResults}\n`
      );
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`[survey-coder] Config reload failed: ${message}. Keeping current config.\n`);
    }
  }

  // Accessors

  getConfig(): CoderConfig {
    return this.loaded.config;
  }

  getBehavior(): ResolvedBehavior {
    return this.loaded.behavior;
  }

  getConfigOrigin(): ConfigOrigin {
    return this.loaded.origin;
  }
}
