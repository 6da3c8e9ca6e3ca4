import path from 'path';
import logger from '../utils/logger';
import { STYLESHEET_FILENAME } from '../config';
import type { ExportLink, PreviewCache, PreviewView, ReadyPreview } from '../types/index';
import type { FileStore } from './fileStore';

/** Present in single-file React previews that transpile JSX in the browser. */
export const REACT_CDN_MARKER = '<script src="https://unpkg.com/@babel/standalone';

const HTML_EXTENSIONS = new Set(['.html', '.htm']);

export const CAPTION_BASIC = 'Basic HTML preview.';
export const CAPTION_REACT_CDN = 'Preview uses CDN links and in-browser transpiling for simple React demos.';

export function isHtmlFilename(filename: string): boolean {
    return HTML_EXTENSIONS.has(path.extname(filename).toLowerCase());
}

export function isReactCdnPreview(html: string): boolean {
    return html.includes(REACT_CDN_MARKER);
}

/**
 * Splices a <style> block before the first `</head>` (any case).
 * Returns null when the document has no closing head tag.
 */
export function injectStylesheet(html: string, css: string): string | null {
    const match = /<\/head>/i.exec(html);
    if (!match) return null;
    const styleTag = `\n<style>\n${css}\n</style>\n`;
    return html.slice(0, match.index) + styleTag + html.slice(match.index);
}

export function toDataUri(html: string): ExportLink {
    try {
        return { ok: true, uri: `data:text/html;charset=utf-8,${encodeURIComponent(html)}` };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('Could not create export link', { message });
        return { ok: false, error: `Could not create 'Open in New Window' link: ${message}` };
    }
}

export interface ComposeResult {
    view: PreviewView;
    cache: PreviewCache | null;
}

async function render(store: FileStore, filename: string, source: string): Promise<ReadyPreview> {
    const isReactCdn = isReactCdnPreview(source);
    let html = source;
    let stylesheetInjected = false;

    if (!isReactCdn) {
        const css = await store.read(STYLESHEET_FILENAME);
        if (css.ok && css.value) {
            const injected = injectStylesheet(source, css.value);
            if (injected !== null) {
                html = injected;
                stylesheetInjected = true;
            }
        }
    }

    let caption = isReactCdn ? CAPTION_REACT_CDN : CAPTION_BASIC;
    if (stylesheetInjected) {
        caption += ` Injected \`${STYLESHEET_FILENAME}\`.`;
    }

    return {
        kind: 'ready',
        filename,
        html,
        isReactCdn,
        stylesheetInjected,
        caption,
        exportLink: toDataUri(html),
        cached: false,
    };
}

/**
 * Decides what the preview pane shows for the selected file.
 * The returned cache replaces the caller's; it is reused only while the
 * selection and the file's on-disk content are unchanged.
 */
export async function composePreview(
    store: FileStore,
    filename: string | null,
    cache: PreviewCache | null
): Promise<ComposeResult> {
    if (!filename) {
        return { view: { kind: 'empty' }, cache: null };
    }
    if (!isHtmlFilename(filename)) {
        return { view: { kind: 'not_html', filename }, cache: null };
    }

    const source = await store.read(filename);
    if (!source.ok) {
        return {
            view: { kind: 'error', filename, message: `Could not read \`${filename}\` for preview: ${source.message}` },
            cache: null,
        };
    }

    if (cache && cache.filename === filename && cache.source === source.value) {
        return { view: { ...cache.view, cached: true }, cache };
    }

    const view = await render(store, filename, source.value);
    logger.debug('Preview composed', { filename, stylesheetInjected: view.stylesheetInjected, isReactCdn: view.isReactCdn });
    return { view, cache: { filename, source: source.value, view } };
}
