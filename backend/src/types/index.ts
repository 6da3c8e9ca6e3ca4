export type StoreFailureReason = 'rejected' | 'not_found' | 'io_error';

export type StoreResult<T> =
    | { ok: true; value: T }
    | { ok: false; reason: StoreFailureReason; message: string };

export type Operation =
    | { action: 'create_update'; filename: string; content: string }
    | { action: 'delete'; filename: string }
    | { action: 'chat'; content: string };

export type RecordStatus = 'ok' | 'warning';

/**
 * One element of a model reply after it has been interpreted.
 * `action` is whatever the model sent, so it is not limited to Operation['action'].
 */
export interface OperationRecord {
    index: number;
    action: string;
    filename?: string;
    content?: string;
    status: RecordStatus;
    warning?: string;
}

export type ConversationTurn =
    | { role: 'user'; content: string }
    | { role: 'assistant'; records: OperationRecord[] };

export type ExportLink =
    | { ok: true; uri: string }
    | { ok: false; error: string };

export type PreviewView =
    | { kind: 'empty' }
    | { kind: 'not_html'; filename: string }
    | { kind: 'error'; filename: string; message: string }
    | {
        kind: 'ready';
        filename: string;
        html: string;
        isReactCdn: boolean;
        stylesheetInjected: boolean;
        caption: string;
        exportLink: ExportLink;
        cached: boolean;
    };

export type ReadyPreview = Extract<PreviewView, { kind: 'ready' }>;

export interface PreviewCache {
    filename: string;
    source: string;
    view: ReadyPreview;
}

export interface SelectionState {
    selectedFile: string | null;
    fileContent: string;
}

export interface AppState {
    history: ConversationTurn[];
    selection: SelectionState;
    preview: PreviewCache | null;
}

export interface ChatOutcome {
    records: OperationRecord[];
    summary: string;
    /** Set when the workspace could not be listed for the model request. */
    warning?: string;
}

export interface ApiErrorResponse {
    error: string;
    message: string;
    requestId: string;
    retryable: boolean;
    details?: unknown;
}
