import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { once } from 'events';
import type { Server } from 'http';
import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import type { Content } from '@google/genai';
import { createApp } from '../app';
import { BuilderSession } from '../services/builderSession';
import { FileStore } from '../services/fileStore';
import type { ModelClient } from '../services/geminiService';

class ScriptedModel implements ModelClient {
  readonly modelName = 'scripted-model';
  nextReply = '[]';

  async generate(_contents: Content[]): Promise<string> {
    return this.nextReply;
  }
}

let root: string;
let store: FileStore;
let model: ScriptedModel;
let session: BuilderSession;
let server: Server;
let baseUrl: string;

beforeAll(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'sitesmith-app-'));
  store = new FileStore(root);
  model = new ScriptedModel();
  session = new BuilderSession(store, model);

  const app = createApp({ session, modelName: model.modelName, workspaceDir: store.root });
  server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('server did not bind a TCP port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.close();
  await once(server, 'close');
  await fs.rm(root, { recursive: true, force: true });
});

beforeEach(async () => {
  await session.selectFile(null);
  session.clearHistory();
  for (const entry of await fs.readdir(root)) {
    await fs.rm(path.join(root, entry), { recursive: true, force: true });
  }
});

function post(route: string, body: unknown) {
  return fetch(`${baseUrl}${route}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('HTTP API', () => {
  it('reports health with the configured model', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: 'ok', model: 'scripted-model', workspace: root });
  });

  it('runs a chat turn and applies its operations', async () => {
    model.nextReply = '[{"action":"create_update","filename":"index.html","content":"<h1>x</h1>"}]';

    const res = await post('/api/chat', { prompt: 'make a page' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      records: [{ index: 0, action: 'create_update', filename: 'index.html', content: '<h1>x</h1>', status: 'ok' }],
      summary: 'Created/updated `index.html`',
    });
    const files = await fetch(`${baseUrl}/api/files`);
    expect(await files.json()).toEqual({ files: ['index.html'] });
  });

  it('validates the chat body', async () => {
    const missing = await post('/api/chat', {});
    expect(missing.status).toBe(400);
    expect(await missing.json()).toMatchObject({ error: 'VALIDATION_ERROR' });

    const blank = await post('/api/chat', { prompt: '   ' });
    expect(blank.status).toBe(400);
    expect(await blank.json()).toMatchObject({ error: 'INVALID_INPUT', message: 'Prompt cannot be empty', retryable: false });
  });

  it('reads files and maps store failures to status codes', async () => {
    await store.write('notes.txt', 'hello');

    const ok = await fetch(`${baseUrl}/api/files/content?filename=notes.txt`);
    expect(await ok.json()).toEqual({ filename: 'notes.txt', content: 'hello' });

    const missing = await fetch(`${baseUrl}/api/files/content?filename=nope.txt`);
    expect(missing.status).toBe(404);
    expect(await missing.json()).toMatchObject({ error: 'RESOURCE_NOT_FOUND' });

    const escaped = await fetch(`${baseUrl}/api/files/content?filename=${encodeURIComponent('../secret.txt')}`);
    expect(escaped.status).toBe(400);
    expect(await escaped.json()).toMatchObject({ error: 'PATH_REJECTED' });
  });

  it('selects, saves and previews a page with the shared stylesheet', async () => {
    await store.write('index.html', '<html><head></head><body></body></html>');
    await store.write('style.css', 'p{}');

    const selected = await post('/api/session/select', { filename: 'index.html' });
    expect(await selected.json()).toEqual({ selectedFile: 'index.html', fileContent: '<html><head></head><body></body></html>' });

    const saved = await post('/api/session/save', { content: '<html><head><title>T</title></head></html>' });
    expect(saved.status).toBe(200);

    const page = await fetch(`${baseUrl}/preview`);
    expect(page.headers.get('content-type')).toMatch(/^text\/html/);
    expect(await page.text()).toBe('<html><head><title>T</title>\n<style>\np{}\n</style>\n</head></html>');

    const meta = await fetch(`${baseUrl}/api/preview`);
    expect(await meta.json()).toMatchObject({
      kind: 'ready',
      stylesheetInjected: true,
      caption: 'Basic HTML preview. Injected `style.css`.',
      cached: true,
    });
  });

  it('explains why there is no preview', async () => {
    const res = await fetch(`${baseUrl}/preview`);
    expect(res.status).toBe(404);
    expect(await res.text()).toBe('Select an HTML file to see a preview.');
  });

  it('deletes the selected file and clears the selection', async () => {
    await store.write('a.html', '<p>a</p>');
    await post('/api/session/select', { filename: 'a.html' });

    const res = await fetch(`${baseUrl}/api/files?filename=a.html`, { method: 'DELETE' });

    expect(await res.json()).toEqual({ filename: 'a.html', deleted: true });
    const state = await fetch(`${baseUrl}/api/session`);
    expect(await state.json()).toEqual({ selectedFile: null, fileContent: '', files: [] });
  });

  it('answers unknown routes with 404', async () => {
    const res = await fetch(`${baseUrl}/api/unknown`);
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: 'NOT_FOUND', retryable: false });
  });
});
