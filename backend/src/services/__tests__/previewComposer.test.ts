import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FileStore } from '../fileStore';
import {
  CAPTION_BASIC,
  CAPTION_REACT_CDN,
  REACT_CDN_MARKER,
  composePreview,
  injectStylesheet,
  isHtmlFilename,
  toDataUri,
} from '../previewComposer';

const PAGE = '<html><head><title>T</title></HEAD><body><h1>Hi</h1></body></html>';
const CSS = 'body { color: red; }';

let root: string;
let store: FileStore;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'sitesmith-preview-'));
  store = new FileStore(root);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(root, { recursive: true, force: true });
});

describe('isHtmlFilename', () => {
  it('matches .html and .htm in any case', () => {
    expect(isHtmlFilename('index.html')).toBe(true);
    expect(isHtmlFilename('pages/ABOUT.HTM')).toBe(true);
    expect(isHtmlFilename('style.css')).toBe(false);
    expect(isHtmlFilename('html')).toBe(false);
  });
});

describe('injectStylesheet', () => {
  it('inserts one style block before the first closing head tag', () => {
    const html = '<head></head><template></head></template>';
    expect(injectStylesheet(html, 'p{}')).toBe('<head>\n<style>\np{}\n</style>\n</head><template></head></template>');
  });

  it('returns null without a closing head tag', () => {
    expect(injectStylesheet('<body>plain</body>', 'p{}')).toBeNull();
  });
});

describe('toDataUri', () => {
  it('percent-encodes the document', () => {
    expect(toDataUri('<p>a b</p>')).toEqual({ ok: true, uri: 'data:text/html;charset=utf-8,%3Cp%3Ea%20b%3C%2Fp%3E' });
  });

  it('reports encoding failures', () => {
    const link = toDataUri('broken \uD800 surrogate');
    expect(link.ok).toBe(false);
    expect(link.ok ? '' : link.error).toMatch(/^Could not create 'Open in New Window' link: /);
  });
});

describe('composePreview', () => {
  it('shows nothing without a selection', async () => {
    expect(await composePreview(store, null, null)).toEqual({ view: { kind: 'empty' }, cache: null });
  });

  it('skips non-HTML files and clears the cache', async () => {
    await store.write('index.html', PAGE);
    const first = await composePreview(store, 'index.html', null);
    expect(first.cache).not.toBeNull();

    const result = await composePreview(store, 'script.js', first.cache);
    expect(result).toEqual({ view: { kind: 'not_html', filename: 'script.js' }, cache: null });
  });

  it('reports unreadable files', async () => {
    const result = await composePreview(store, 'missing.html', null);
    expect(result.cache).toBeNull();
    expect(result.view).toEqual({
      kind: 'error',
      filename: 'missing.html',
      message: "Could not read `missing.html` for preview: File 'missing.html' not found",
    });
  });

  it('injects style.css before </head>', async () => {
    await store.write('index.html', PAGE);
    await store.write('style.css', CSS);

    const { view } = await composePreview(store, 'index.html', null);

    expect(view).toMatchObject({
      kind: 'ready',
      filename: 'index.html',
      html: `<html><head><title>T</title>\n<style>\n${CSS}\n</style>\n</HEAD><body><h1>Hi</h1></body></html>`,
      isReactCdn: false,
      stylesheetInjected: true,
      caption: `${CAPTION_BASIC} Injected \`style.css\`.`,
      cached: false,
    });
    expect(view.kind === 'ready' ? view.html.split('<style>').length - 1 : 0).toBe(1);
  });

  it('never injects into React CDN previews', async () => {
    const page = `<html><head>${REACT_CDN_MARKER}/babel.min.js"></script></head><body><div id="root"></div></body></html>`;
    await store.write('react_preview.html', page);
    await store.write('style.css', CSS);

    const { view } = await composePreview(store, 'react_preview.html', null);

    expect(view).toMatchObject({
      kind: 'ready',
      html: page,
      isReactCdn: true,
      stylesheetInjected: false,
      caption: CAPTION_REACT_CDN,
    });
  });

  it('leaves documents without </head> unmodified', async () => {
    const page = '<body><p>no head</p></body>';
    await store.write('bare.html', page);
    await store.write('style.css', CSS);

    const { view } = await composePreview(store, 'bare.html', null);

    expect(view).toMatchObject({ kind: 'ready', html: page, stylesheetInjected: false, caption: CAPTION_BASIC });
  });

  it('does not inject an empty stylesheet', async () => {
    await store.write('index.html', PAGE);
    await store.write('style.css', '');

    const { view } = await composePreview(store, 'index.html', null);

    expect(view).toMatchObject({ html: PAGE, stylesheetInjected: false });
  });

  it('reuses the cached render while the source is unchanged', async () => {
    await store.write('index.html', PAGE);
    await store.write('style.css', CSS);

    const first = await composePreview(store, 'index.html', null);
    const read = vi.spyOn(store, 'read');
    const second = await composePreview(store, 'index.html', first.cache);

    expect(second.cache).toBe(first.cache);
    expect(second.view).toEqual({ ...first.view, cached: true });
    expect(read).toHaveBeenCalledTimes(1);
    expect(read).toHaveBeenCalledWith('index.html');
  });

  it('recomposes when the file changes on disk', async () => {
    await store.write('index.html', PAGE);
    const first = await composePreview(store, 'index.html', null);

    await store.write('index.html', '<p>changed</p>');
    const second = await composePreview(store, 'index.html', first.cache);

    expect(second.view).toMatchObject({ html: '<p>changed</p>', cached: false });
    expect(second.cache?.source).toBe('<p>changed</p>');
  });

  it('recomposes when the selection changes to a file with identical content', async () => {
    await store.write('a.html', PAGE);
    await store.write('b.html', PAGE);
    const first = await composePreview(store, 'a.html', null);

    const second = await composePreview(store, 'b.html', first.cache);

    expect(second.view).toMatchObject({ filename: 'b.html', cached: false });
  });
});
