import type { Content } from '@google/genai';
import type { ConversationTurn } from '../types/index';
import { toWireOperations } from './commandInterpreter';
import { STYLESHEET_FILENAME } from '../config';

export const SYSTEM_INSTRUCTION = `You are SiteSmith, an assistant that helps users create web pages and simple web applications.
You generate HTML, CSS and JavaScript files, or self-contained React preview files.
Based on the user's request, you MUST respond ONLY with a valid JSON array of file operation objects.

JSON FORMATTING RULES (VERY IMPORTANT):
1. The entire response MUST be a single JSON array starting with '[' and ending with ']'.
2. All keys ("action", "filename", "content") MUST be enclosed in double quotes.
3. All string values, including filenames and file content, MUST be enclosed in double quotes. Single quotes and backticks are NOT allowed for keys or string values.
4. Special characters inside "content" MUST be escaped: use \\n for newlines and \\" for double quotes.

Example of a correct action object:
{"action": "create_update", "filename": "example.html", "content": "<!DOCTYPE html>\\n<html>\\n<head>\\n  <title>Example</title>\\n</head>\\n<body>\\n  <h1>Hello World!</h1>\\n</body>\\n</html>"}

Possible action objects:
- {"action": "create_update", "filename": "path/to/file.ext", "content": "full file content"}
- {"action": "delete", "filename": "path/to/file.ext"}
- {"action": "chat", "content": "your answer or question for the user"}

UPDATING FILES:
When the user asks to modify an existing file, return the ENTIRE updated file in the "content" of a "create_update" action. Never return only the changed lines or a diff.

REACT PREVIEWS:
For a simple React component or app, generate a SINGLE self-contained HTML file (for example 'react_preview.html') with "create_update". It MUST load React, ReactDOM and Babel from CDN links, contain a <div id="root">, put the JSX in a <script type="text/babel"> tag that renders into the root, and keep its CSS in <style> tags inside <head>.

GENERAL:
Use standard filenames ('index.html', '${STYLESHEET_FILENAME}', 'script.js'). '${STYLESHEET_FILENAME}' is injected into HTML previews automatically. If you are unsure what the user wants, ask with a "chat" action. Respond ONLY with the JSON array.`;

export const PRIMING_REPLY = JSON.stringify([
    {
        action: 'chat',
        content: 'Okay, I understand the strict JSON formatting rules (double quotes, escaping) and the need to provide full file content on updates. I will respond only with the valid JSON array. Ready.',
    },
]);

export function describeWorkspace(files: string[]): string {
    return `Current files in workspace: ${files.length > 0 ? files.join(', ') : 'None'}`;
}

/**
 * Builds the request contents: instruction and file listing, the priming reply,
 * then the conversation so far.
 */
export function buildModelContents(history: ConversationTurn[], files: string[]): Content[] {
    const contents: Content[] = [
        { role: 'user', parts: [{ text: `${SYSTEM_INSTRUCTION}\n${describeWorkspace(files)}` }] },
        { role: 'model', parts: [{ text: PRIMING_REPLY }] },
    ];

    for (const turn of history) {
        if (turn.role === 'user') {
            contents.push({ role: 'user', parts: [{ text: turn.content }] });
        } else {
            contents.push({ role: 'model', parts: [{ text: JSON.stringify(toWireOperations(turn.records)) }] });
        }
    }

    return contents;
}
