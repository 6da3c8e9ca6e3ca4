import fs from 'fs/promises';
import path from 'path';
import logger from '../utils/logger';
import type { StoreFailureReason, StoreResult } from '../types/index';

/**
 * Containment rule for workspace filenames. Applied before every read, write and delete.
 * Rejects empty names, any `..`, and names starting with `/`, `\` or a drive letter.
 */
export function isContainedFilename(filename: unknown): filename is string {
    if (typeof filename !== 'string' || filename.length === 0) return false;
    if (filename.includes('..')) return false;
    if (filename.startsWith('/') || filename.startsWith('\\')) return false;
    if (/^[A-Za-z]:/.test(filename)) return false;
    return true;
}

function failure<T>(reason: StoreFailureReason, message: string): StoreResult<T> {
    return { ok: false, reason, message };
}

function isMissing(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class FileStore {
    readonly root: string;

    constructor(root: string) {
        this.root = path.resolve(root);
    }

    async ensureRoot(): Promise<StoreResult<void>> {
        try {
            await fs.mkdir(this.root, { recursive: true });
            return { ok: true, value: undefined };
        } catch (error) {
            logger.error('Failed to create workspace directory', error, { root: this.root });
            return failure('io_error', `Could not create workspace '${this.root}': ${describe(error)}`);
        }
    }

    /**
     * Live scan of the workspace. Nested files are listed with `/` separators,
     * sorted by code unit so the order matches what a model sees in the prompt.
     */
    async listFiles(): Promise<StoreResult<string[]>> {
        try {
            const files = await this.walk('');
            files.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
            return { ok: true, value: files };
        } catch (error) {
            logger.error('Error listing workspace files', error, { root: this.root });
            return failure('io_error', `Error listing workspace files: ${describe(error)}`);
        }
    }

    private async walk(relativeDir: string): Promise<string[]> {
        const entries = await fs.readdir(path.join(this.root, relativeDir), { withFileTypes: true });
        const files: string[] = [];
        for (const entry of entries) {
            const relative = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
            if (entry.isDirectory()) {
                files.push(...(await this.walk(relative)));
            } else if (entry.isFile()) {
                files.push(relative);
            }
        }
        return files;
    }

    async read(filename: string): Promise<StoreResult<string>> {
        if (!isContainedFilename(filename)) {
            return failure('rejected', `Rejected filename '${filename}'`);
        }
        try {
            const content = await fs.readFile(this.resolve(filename), 'utf-8');
            return { ok: true, value: content };
        } catch (error) {
            if (isMissing(error)) {
                return failure('not_found', `File '${filename}' not found`);
            }
            logger.error(`Error reading file '${filename}'`, error);
            return failure('io_error', `Error reading file '${filename}': ${describe(error)}`);
        }
    }

    /** Overwrites unconditionally, creating intermediate directories. */
    async write(filename: string, content: string): Promise<StoreResult<void>> {
        if (!isContainedFilename(filename)) {
            return failure('rejected', `Rejected filename '${filename}'`);
        }
        const target = this.resolve(filename);
        try {
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.writeFile(target, content, 'utf-8');
            logger.debug('File written', { filename, bytes: Buffer.byteLength(content, 'utf-8') });
            return { ok: true, value: undefined };
        } catch (error) {
            logger.error(`Error saving file '${filename}'`, error);
            return failure('io_error', `Error saving file '${filename}': ${describe(error)}`);
        }
    }

    async delete(filename: string): Promise<StoreResult<void>> {
        if (!isContainedFilename(filename)) {
            return failure('rejected', `Rejected filename '${filename}'`);
        }
        try {
            await fs.unlink(this.resolve(filename));
            logger.debug('File deleted', { filename });
            return { ok: true, value: undefined };
        } catch (error) {
            if (isMissing(error)) {
                logger.warn(`File '${filename}' not found for deletion`);
                return failure('not_found', `File '${filename}' not found for deletion`);
            }
            logger.error(`Error deleting file '${filename}'`, error);
            return failure('io_error', `Error deleting file '${filename}': ${describe(error)}`);
        }
    }

    private resolve(filename: string): string {
        return path.join(this.root, filename);
    }
}
