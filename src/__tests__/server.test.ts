// End-to-end test of the MCP tool surface: a real Client talks to the real
// server over the SDK's in-memory transport pair, against CSV and JSON files
// in a temp workspace. Crash reports go to a temp SURVEY_CODER_HOME.

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createCoderServer, type CoderServer } from '../server.js';
import { ConfigManager } from '../config-manager.js';
import { parseBehaviorConfig } from '../config.js';

interface ToolReply {
  readonly text: string;
  readonly isError: boolean;
}

const WAVE_1 = [
  'id,q1',
  '1,Too expensive',
  '2,too expensive!',
  '3,Great service',
  '4,',
  '5,price is high',
].join('\n');

describe('E2E: survey coder server', () => {
  let tempDir: string;
  let previousHome: string | undefined;
  let client: Client;
  let coder: CoderServer;

  async function call(name: string, args: Record<string, unknown> = {}): Promise<ToolReply> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    return { text: first?.type === 'text' ? first.text : '', isError: result.isError === true };
  }

  before(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'survey-coder-e2e-'));
    previousHome = process.env.SURVEY_CODER_HOME;
    process.env.SURVEY_CODER_HOME = path.join(tempDir, '.home');
    await fs.writeFile(path.join(tempDir, 'wave1.csv'), WAVE_1, 'utf-8');

    const behavior = parseBehaviorConfig();
    const configManager = new ConfigManager(path.join(tempDir, 'survey-coder-config.json'), {
      config: { workspaceRoot: tempDir, behavior },
      origin: { source: 'default' },
      behavior,
    });
    coder = createCoderServer({ configManager });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'survey-coder-test', version: '0.0.0' });
    await Promise.all([coder.server.connect(serverTransport), client.connect(clientTransport)]);
  });

  after(async () => {
    await client.close();
    if (previousHome === undefined) delete process.env.SURVEY_CODER_HOME;
    else process.env.SURVEY_CODER_HOME = previousHome;
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('tool listing', () => {
    it('lists every tool', async () => {
      const { tools } = await client.listTools();
      assert.deepStrictEqual(tools.map(t => t.name).sort(), [
        'coder_append_data',
        'coder_categorize',
        'coder_category_responses',
        'coder_create_category',
        'coder_delete_categories',
        'coder_diagnose',
        'coder_export_csv',
        'coder_list_categories',
        'coder_list_projects',
        'coder_load_project',
        'coder_match',
        'coder_match_results',
        'coder_new_project',
        'coder_recategorize',
        'coder_rename_category',
        'coder_save_project',
        'coder_set_missing_data',
      ]);
    });
  });

  describe('before any dataset', () => {
    it('reports no open projects', async () => {
      const reply = await call('coder_list_projects');
      assert.ok(reply.text.includes('None yet. Start one with coder_new_project or coder_load_project.'));
      assert.ok(reply.text.includes(`**Workspace:** ${tempDir}`));
    });

    it('refuses to match in a project that is not open', async () => {
      const reply = await call('coder_match', { query: 'price' });
      assert.strictEqual(reply.isError, true);
      assert.strictEqual(
        reply.text,
        'Project "default" is not open. Open projects: (none). Start one with coder_new_project or load one with coder_load_project.',
      );
    });

    it('rejects an unsupported dataset file without opening the project', async () => {
      const reply = await call('coder_new_project', { path: 'notes.txt', mode: 'Single' });
      assert.strictEqual(reply.isError, true);
      assert.strictEqual(
        reply.text,
        `Unsupported file "${path.join(tempDir, 'notes.txt')}". Expected .csv or .xlsx (UnsupportedFile)`,
      );

      const listed = await call('coder_list_projects');
      assert.ok(listed.text.startsWith('## Open Projects (0)'), listed.text);
    });
  });

  describe('import -> match -> categorize -> export lifecycle', () => {
    it('starts a project from a CSV file', async () => {
      const reply = await call('coder_new_project', { file: 'wave1.csv', mode: 'single' });
      assert.strictEqual(reply.isError, false, reply.text);
      assert.ok(reply.text.startsWith('Loaded 5 rows with 1 response column(s). Categorization mode: Single'));
      assert.ok(reply.text.includes('| Uncategorized | 4 | 100.00% |'));
    });

    it('creates a category', async () => {
      const reply = await call('coder_create_category', { category: 'Price' });
      assert.deepStrictEqual(reply, { text: 'Category "Price" created', isError: false });
    });

    it('matches uncategorized responses', async () => {
      const reply = await call('coder_match', { text: 'expensive' });
      assert.strictEqual(reply.isError, false, reply.text);
      assert.ok(reply.text.startsWith('## Matches for "expensive" (threshold 60)'));
      assert.ok(reply.text.includes('1 distinct response(s), 2 occurrence(s)'));
      assert.ok(reply.text.includes('| 95 | 2 | too expensive |'));
    });

    it('categorizes a response and reports shares', async () => {
      const reply = await call('coder_categorize', { values: 'too expensive', category: 'Price' });
      assert.strictEqual(reply.isError, false, reply.text);
      assert.ok(reply.text.startsWith('Categorized 1 response(s) into Price'));
      assert.ok(reply.text.includes('| Price | 2 | 50.00% |'));
      assert.ok(reply.text.includes('| Uncategorized | 2 | 50.00% |'));
    });

    it('drops categorized responses from the last match', async () => {
      const reply = await call('coder_match_results', { threshold: 0 });
      assert.ok(reply.text.includes('2 distinct response(s), 2 occurrence(s)'));
      assert.ok(!reply.text.includes('| too expensive |'));
    });

    it('lists the responses in a category', async () => {
      const reply = await call('coder_category_responses', { name: 'Price' });
      assert.strictEqual(reply.text, '## Price (1 response)\n\n- too expensive (2)');
    });

    it('rejects unknown and protected categories', async () => {
      const unknown = await call('coder_categorize', { values: ['great service'], categories: ['Ghost'] });
      assert.deepStrictEqual(unknown, { text: 'Unknown category: Ghost (UnknownCategory)', isError: true });

      const protectedName = await call('coder_delete_categories', { name: 'Uncategorized' });
      assert.deepStrictEqual(protectedName, {
        text: 'You may not delete the category "Uncategorized" (Protected)',
        isError: true,
      });
    });

    it('exports the coded data as CSV', async () => {
      const reply = await call('coder_export_csv', { path: 'out/coded.csv' });
      const file = path.join(tempDir, 'out', 'coded.csv');
      assert.strictEqual(reply.text, `Exported 5 rows to ${file}`);
      assert.strictEqual(
        await fs.readFile(file, 'utf-8'),
        'id,Price_q1,Uncategorized_q1\r\n1,1,0\r\n2,1,0\r\n3,0,1\r\n4,,\r\n5,0,1\n',
      );
    });
  });

  describe('save and load', () => {
    it('saves the project and loads it under another name', async () => {
      const file = path.join(tempDir, 'wave1.json');
      const saved = await call('coder_save_project', { path: 'wave1.json' });
      assert.strictEqual(saved.text, `Project saved to ${file}`);

      const loaded = await call('coder_load_project', { project: 'copy', path: 'wave1.json' });
      assert.strictEqual(loaded.isError, false, loaded.text);
      assert.ok(loaded.text.startsWith(`Project loaded from ${file}`));

      const categories = await call('coder_list_categories', { project: 'copy' });
      assert.ok(categories.text.startsWith('## [copy] Categories (Single mode)'));
      assert.ok(categories.text.includes('| Price | 2 | 50.00% |'));
    });

    it('does not open a project under a misspelled name', async () => {
      const reply = await call('coder_list_categories', { project: 'cpoy' });
      assert.deepStrictEqual(reply, {
        text: 'Project "cpoy" is not open. Open projects: default, copy. Start one with coder_new_project or load one with coder_load_project.',
        isError: true,
      });

      const listed = await call('coder_list_projects');
      assert.ok(listed.text.startsWith('## Open Projects (2)'), listed.text);
    });

    it('keeps the project when the file is not a valid project', async () => {
      await fs.writeFile(path.join(tempDir, 'broken.json'), JSON.stringify({ rawData: 1 }), 'utf-8');
      const reply = await call('coder_load_project', { project: 'copy', path: 'broken.json' });
      assert.strictEqual(reply.isError, true);
      assert.ok(reply.text.startsWith('Failed to load project: '));

      const categories = await call('coder_list_categories', { project: 'copy' });
      assert.ok(categories.text.includes('| Price | 2 | 50.00% |'));
    });

    it('surfaces filesystem errors as tool errors', async () => {
      const reply = await call('coder_load_project', { path: 'missing.json' });
      assert.strictEqual(reply.isError, true);
      assert.ok(reply.text.startsWith('Error: ENOENT'), reply.text);
    });
  });

  describe('argument handling', () => {
    it('explains invalid arguments with a usage hint', async () => {
      const reply = await call('coder_new_project', { path: 'wave1.csv' });
      assert.strictEqual(reply.isError, true);
      assert.ok(reply.text.startsWith('Invalid arguments for coder_new_project: mode: '), reply.text);
      assert.ok(reply.text.endsWith('Hint: coder_new_project(path: "responses.csv", mode: "Single" | "Multi")'));
    });

    it('rejects unknown tools', async () => {
      assert.deepStrictEqual(await call('coder_nope'), { text: 'Unknown tool: coder_nope', isError: true });
    });
  });

  describe('coder_diagnose', () => {
    it('reports config, projects and crash state', async () => {
      const reply = await call('coder_diagnose');
      assert.ok(reply.text.startsWith('## Survey Coder Diagnostics'));
      assert.ok(reply.text.includes('**Config source:** default'));
      assert.ok(reply.text.includes('**Open projects:** 2'));
      assert.ok(reply.text.includes('No recent crashes recorded.'));
      assert.strictEqual(coder.lastToolCall(), 'coder_diagnose');
    });
  });
});
