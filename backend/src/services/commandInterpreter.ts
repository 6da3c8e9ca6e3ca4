import logger from '../utils/logger';
import type { Operation, OperationRecord } from '../types/index';
import type { FileStore } from './fileStore';

export const RAW_PREVIEW_LIMIT = 500;

type ParsedElement =
    | { kind: 'operation'; operation: Operation }
    | { kind: 'invalid'; action: Operation['action']; filename?: string; content?: string }
    | { kind: 'unknown'; action: string; filename?: string; content?: string }
    | { kind: 'not_object'; element: unknown };

/**
 * Removes a surrounding ``` fence, with or without a language tag.
 */
export function stripCodeFence(text: string): string {
    const trimmed = text.trim();
    if (!trimmed.startsWith('```')) return trimmed;

    let body = trimmed.replace(/^```[A-Za-z0-9_+-]*/, '');
    if (body.endsWith('```')) {
        body = body.slice(0, -3);
    }
    return body.trim();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(source: Record<string, unknown>, key: string): string | undefined {
    const value = source[key];
    return typeof value === 'string' ? value : undefined;
}

function describeElement(element: unknown): string {
    const json = JSON.stringify(element);
    return json === undefined ? String(element) : json;
}

export function parseElement(element: unknown): ParsedElement {
    if (!isPlainObject(element)) {
        return { kind: 'not_object', element };
    }

    const action = typeof element.action === 'string' ? element.action : undefined;
    const filename = stringField(element, 'filename');
    const content = stringField(element, 'content');

    switch (action) {
        case 'create_update':
            if (filename && content !== undefined) {
                return { kind: 'operation', operation: { action, filename, content } };
            }
            return { kind: 'invalid', action, filename, content };
        case 'delete':
            if (filename) {
                return { kind: 'operation', operation: { action, filename } };
            }
            return { kind: 'invalid', action, filename };
        case 'chat':
            return { kind: 'operation', operation: { action, content: content ?? '...' } };
        default:
            return { kind: 'unknown', action: action ?? String(element.action), filename, content };
    }
}

async function applyOperation(operation: Operation, index: number, store: FileStore): Promise<OperationRecord> {
    switch (operation.action) {
        case 'create_update': {
            const result = await store.write(operation.filename, operation.content);
            const record: OperationRecord = { index, ...operation, status: 'ok' };
            if (!result.ok) {
                record.status = 'warning';
                record.warning = `Failed to save '${operation.filename}': ${result.message}`;
            }
            return record;
        }
        case 'delete': {
            const result = await store.delete(operation.filename);
            const record: OperationRecord = { index, ...operation, status: 'ok' };
            if (!result.ok) {
                record.status = 'warning';
                record.warning = result.message;
            }
            return record;
        }
        case 'chat':
            return { index, ...operation, status: 'ok' };
    }
}

function toRecord(parsed: Exclude<ParsedElement, { kind: 'operation' }>, index: number): OperationRecord {
    switch (parsed.kind) {
        case 'not_object':
            return {
                index,
                action: 'chat',
                content: `Skipped non-object element: ${describeElement(parsed.element)}`,
                status: 'warning',
                warning: 'Element is not an object',
            };
        case 'invalid':
            return {
                index,
                action: parsed.action,
                filename: parsed.filename,
                content: parsed.content,
                status: 'warning',
                warning: parsed.action === 'create_update'
                    ? `Invalid 'create_update': filename and content are required`
                    : `Invalid 'delete': filename is required`,
            };
        case 'unknown':
            return {
                index,
                action: parsed.action,
                filename: parsed.filename,
                content: parsed.content,
                status: 'warning',
                warning: `Unknown action '${parsed.action}'`,
            };
    }
}

function diagnostic(content: string, warning: string): OperationRecord {
    return { index: 0, action: 'chat', content, status: 'warning', warning };
}

/**
 * Interprets one model reply and applies its operations to the workspace in order.
 * Side effects are eager and never rolled back; every element yields a record.
 */
export async function executeModelReply(replyText: string, store: FileStore): Promise<OperationRecord[]> {
    const cleaned = stripCodeFence(replyText);

    let parsed: unknown;
    try {
        parsed = JSON.parse(cleaned);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        const prefix = replyText.length > RAW_PREVIEW_LIMIT
            ? `${replyText.slice(0, RAW_PREVIEW_LIMIT)}...`
            : replyText;
        logger.warn('Model reply is not valid JSON', { reason, length: replyText.length });
        return [diagnostic(`AI reply was not valid JSON (${reason}): ${prefix}`, 'Invalid JSON reply')];
    }

    if (!Array.isArray(parsed)) {
        logger.warn('Model reply is JSON but not an array');
        return [diagnostic(`AI reply was not a JSON array: ${replyText}`, 'Reply is not a JSON array')];
    }

    const elements: unknown[] = parsed;
    const records: OperationRecord[] = [];
    for (const [index, element] of elements.entries()) {
        const item = parseElement(element);
        const record = item.kind === 'operation'
            ? await applyOperation(item.operation, index, store)
            : toRecord(item, index);
        if (record.warning) {
            logger.warn(record.warning, { index, action: record.action });
        }
        records.push(record);
    }
    return records;
}

/**
 * Objects echoed back to the model as the assistant turn, in the reply format it was asked for.
 */
export function toWireOperations(records: OperationRecord[]): Array<Record<string, string>> {
    return records.map((record) => {
        const wire: Record<string, string> = { action: record.action };
        if (record.filename !== undefined) wire.filename = record.filename;
        if (record.content !== undefined) wire.content = record.content;
        return wire;
    });
}

export function summarizeRecords(records: OperationRecord[]): string {
    const lines: string[] = [];
    const chatMessages: string[] = [];

    for (const record of records) {
        if (record.action === 'chat') {
            chatMessages.push(record.content ?? '...');
            continue;
        }
        if (record.status === 'warning') {
            lines.push(`Warning: ${record.warning ?? `Unknown action: ${record.action}`}`);
        } else if (record.action === 'create_update') {
            lines.push(`Created/updated \`${record.filename}\``);
        } else if (record.action === 'delete') {
            lines.push(`Deleted \`${record.filename}\``);
        }
    }

    const text = [...lines, ...chatMessages].join('\n').trim();
    return text || '(No action)';
}
