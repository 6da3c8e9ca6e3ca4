import logger from '../utils/logger';
import type { ChildLogger } from '../utils/logger';
import errorHandler, { ErrorCode } from '../utils/errorHandler';
import InputValidator from '../utils/inputValidator';
import type { AppState, ChatOutcome, OperationRecord, PreviewView, StoreResult } from '../types/index';
import type { FileStore } from './fileStore';
import { executeModelReply, summarizeRecords } from './commandInterpreter';
import { composePreview } from './previewComposer';
import { requestModelReply } from './geminiService';
import type { ModelClient } from './geminiService';
import { buildModelContents } from './systemPrompt';

export interface SelectionView {
    selectedFile: string | null;
    fileContent: string;
    warning?: string;
}

export interface FileListing {
    files: string[];
    error?: string;
}

export interface DeleteOutcome {
    filename: string;
    deleted: boolean;
    warning?: string;
}

export type HistoryEntry =
    | { role: 'user'; content: string }
    | { role: 'assistant'; records: OperationRecord[]; summary: string };

export function createInitialState(): AppState {
    return {
        history: [],
        selection: { selectedFile: null, fileContent: '' },
        preview: null,
    };
}

function storeFailure(result: Exclude<StoreResult<unknown>, { ok: true }>, filename: string) {
    switch (result.reason) {
        case 'rejected':
            return errorHandler.createError(ErrorCode.PATH_REJECTED, result.message, { filename });
        case 'not_found':
            return errorHandler.createError(ErrorCode.RESOURCE_NOT_FOUND, result.message, { filename });
        case 'io_error':
            return errorHandler.createError(ErrorCode.FILE_SYSTEM_ERROR, result.message, { filename });
    }
}

/**
 * Handles one user interaction at a time against the explicit application state.
 *
 * Invalidation rules:
 * - selecting a different file, or saving the selected one, drops the preview cache
 * - deleting the selected file (manually or from a model batch) clears the selection,
 *   its cached content and the preview cache
 * - the preview cache is otherwise reused only while the selected file's content is unchanged
 */
export class BuilderSession {
    readonly state: AppState;

    constructor(
        private readonly store: FileStore,
        private readonly model: ModelClient,
        state: AppState = createInitialState()
    ) {
        this.state = state;
    }

    async listFiles(): Promise<FileListing> {
        const result = await this.store.listFiles();
        return result.ok ? { files: result.value } : { files: [], error: result.message };
    }

    async readFile(filename: string): Promise<string> {
        const result = await this.store.read(filename);
        if (!result.ok) throw storeFailure(result, filename);
        return result.value;
    }

    async submitPrompt(prompt: string, log: ChildLogger = logger): Promise<ChatOutcome> {
        const text = InputValidator.validatePrompt(prompt);
        this.state.history.push({ role: 'user', content: text });

        // A failed listing still lets the model answer; the user sees why it saw no files.
        const listing = await this.listFiles();
        if (listing.error) {
            log.warn('Sending prompt without a file listing', { error: listing.error });
        }

        const contents = buildModelContents(this.state.history, listing.files);
        const reply = await requestModelReply(this.model, contents, log);
        const records = await executeModelReply(reply, this.store);

        this.state.history.push({ role: 'assistant', records });
        this.reconcileSelection(records);

        log.info('Chat batch applied', {
            operations: records.length,
            warnings: records.filter((r) => r.status === 'warning').length
        });

        const summary = summarizeRecords(records);
        if (listing.error) {
            return { records, summary: `Warning: ${listing.error}\n${summary}`, warning: listing.error };
        }
        return { records, summary };
    }

    // Replays the batch's effects on the selected file in order.
    private reconcileSelection(records: OperationRecord[]): void {
        for (const record of records) {
            const selected = this.state.selection.selectedFile;
            if (!selected || record.status !== 'ok' || record.filename !== selected) continue;

            if (record.action === 'delete') {
                this.clearSelection();
            } else if (record.action === 'create_update') {
                this.state.selection.fileContent = record.content ?? '';
            }
        }
    }

    private clearSelection(): void {
        this.state.selection = { selectedFile: null, fileContent: '' };
        this.state.preview = null;
    }

    selectionView(): SelectionView {
        return { ...this.state.selection };
    }

    async selectFile(filename: string | null): Promise<SelectionView> {
        if (filename === this.state.selection.selectedFile) {
            return this.selectionView();
        }
        if (filename === null) {
            this.clearSelection();
            return this.selectionView();
        }

        InputValidator.validateFilename(filename);
        const result = await this.store.read(filename);
        this.state.selection = {
            selectedFile: filename,
            fileContent: result.ok ? result.value : '',
        };
        this.state.preview = null;

        return result.ok ? this.selectionView() : { ...this.selectionView(), warning: result.message };
    }

    async saveSelectedFile(content: string): Promise<SelectionView> {
        const selected = this.state.selection.selectedFile;
        if (!selected) {
            throw errorHandler.createError(ErrorCode.INVALID_STATE, 'No file is selected');
        }

        const result = await this.store.write(selected, content);
        if (!result.ok) throw storeFailure(result, selected);

        this.state.selection.fileContent = content;
        this.state.preview = null;
        logger.info('Saved manual changes', { filename: selected });
        return this.selectionView();
    }

    async deleteFile(filename: string): Promise<DeleteOutcome> {
        const result = await this.store.delete(filename);
        if (!result.ok) {
            if (result.reason === 'not_found') {
                return { filename, deleted: false, warning: result.message };
            }
            throw storeFailure(result, filename);
        }

        if (this.state.selection.selectedFile === filename) {
            this.clearSelection();
        }
        return { filename, deleted: true };
    }

    async preview(): Promise<PreviewView> {
        const { view, cache } = await composePreview(this.store, this.state.selection.selectedFile, this.state.preview);
        this.state.preview = cache;
        return view;
    }

    historyView(): HistoryEntry[] {
        return this.state.history.map((turn): HistoryEntry =>
            turn.role === 'user'
                ? { role: 'user', content: turn.content }
                : { role: 'assistant', records: turn.records, summary: summarizeRecords(turn.records) }
        );
    }

    clearHistory(): void {
        this.state.history = [];
    }
}
