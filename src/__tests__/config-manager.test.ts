import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigManager } from '../config-manager.js';
import { parseBehaviorConfig, type LoadedConfig } from '../config.js';

function fileConfig(path: string, matchThreshold: number): LoadedConfig {
  const behavior = parseBehaviorConfig({ matchThreshold });
  return {
    config: { workspaceRoot: '/fake/surveys', behavior },
    origin: { source: 'file', path },
    behavior,
  };
}

// Test helper: ConfigManager with injectable stat and load functions
class TestableConfigManager extends ConfigManager {
  statImplementation: (path: string) => Promise<{ mtimeMs: number }> = async () => {
    return { mtimeMs: Date.now() - 1000 };
  };
  loadImplementation: (path: string) => LoadedConfig = path => fileConfig(path, 60);
  loadCalls = 0;

  protected override statFile(path: string): Promise<{ mtimeMs: number }> {
    return this.statImplementation(path);
  }

  protected override loadConfig(path: string): LoadedConfig {
    this.loadCalls++;
    return this.loadImplementation(path);
  }
}

describe('ConfigManager', () => {
  const configPath = '/fake/survey-coder-config.json';
  let initial: LoadedConfig;

  beforeEach(() => {
    initial = fileConfig(configPath, 60);
  });

  describe('ensureFresh', () => {
    it('does not reload when mtime unchanged', async () => {
      const manager = new TestableConfigManager(configPath, initial);

      let statCallCount = 0;
      manager.statImplementation = async () => {
        statCallCount++;
        return { mtimeMs: Date.now() - 1000 };
      };

      await manager.ensureFresh();
      await manager.ensureFresh();

      assert.equal(statCallCount, 2, 'stat should be called twice');
      assert.equal(manager.loadCalls, 0);
    });

    it('reloads when mtime moves forward and notifies the listener', async () => {
      const seen: number[] = [];
      const manager = new TestableConfigManager(configPath, initial, loaded => {
        seen.push(loaded.behavior.matchThreshold);
      });
      manager.statImplementation = async () => ({ mtimeMs: Date.now() + 60_000 });
      manager.loadImplementation = path => fileConfig(path, 85);

      await manager.ensureFresh();

      assert.equal(manager.getBehavior().matchThreshold, 85);
      assert.deepEqual(seen, [85]);
    });

    it('reloads only once for the same mtime', async () => {
      const manager = new TestableConfigManager(configPath, initial);
      const future = Date.now() + 60_000;
      manager.statImplementation = async () => ({ mtimeMs: future });

      await manager.ensureFresh();
      await manager.ensureFresh();

      assert.equal(manager.loadCalls, 1);
    });

    it('keeps the old config when stat fails', async () => {
      const manager = new TestableConfigManager(configPath, initial);
      manager.statImplementation = async () => {
        throw Object.assign(new Error('ENOENT: no such file'), { code: 'ENOENT' });
      };

      await manager.ensureFresh();

      assert.equal(manager.getConfig(), initial.config);
      assert.equal(manager.loadCalls, 0);
    });

    it('keeps the old config when the file no longer parses', async () => {
      const manager = new TestableConfigManager(configPath, initial);
      manager.statImplementation = async () => ({ mtimeMs: Date.now() + 60_000 });
      manager.loadImplementation = () => {
        const behavior = parseBehaviorConfig();
        return { config: { workspaceRoot: '/elsewhere', behavior }, origin: { source: 'default' }, behavior };
      };

      await manager.ensureFresh();

      assert.equal(manager.getConfig().workspaceRoot, '/fake/surveys');
      assert.deepEqual(manager.getConfigOrigin(), { source: 'file', path: configPath });
    });

    it('keeps the old config when loading throws', async () => {
      const manager = new TestableConfigManager(configPath, initial);
      manager.statImplementation = async () => ({ mtimeMs: Date.now() + 60_000 });
      manager.loadImplementation = () => {
        throw new Error('disk on fire');
      };

      await manager.ensureFresh();

      assert.equal(manager.getBehavior(), initial.behavior);
    });

    it('never stats env or default configs', async () => {
      const behavior = parseBehaviorConfig();
      const manager = new TestableConfigManager(configPath, {
        config: { workspaceRoot: '/fake', behavior },
        origin: { source: 'env' },
        behavior,
      });
      let statCallCount = 0;
      manager.statImplementation = async () => {
        statCallCount++;
        return { mtimeMs: Date.now() + 60_000 };
      };

      await manager.ensureFresh();

      assert.equal(statCallCount, 0);
    });
  });
});
