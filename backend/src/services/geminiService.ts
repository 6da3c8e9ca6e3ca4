import { GoogleGenAI } from '@google/genai';
import type { Content } from '@google/genai';
import logger from '../utils/logger';
import type { ChildLogger } from '../utils/logger';
import errorHandler, { ErrorCode } from '../utils/errorHandler';

/**
 * Black-box text generator. The session only ever sees the reply text.
 */
export interface ModelClient {
    readonly modelName: string;
    generate(contents: Content[]): Promise<string>;
}

export class GeminiModelClient implements ModelClient {
    readonly modelName: string;
    private readonly ai: GoogleGenAI;

    constructor(apiKey: string, modelName: string) {
        if (!apiKey.trim()) {
            throw errorHandler.createError(ErrorCode.CONFIG_ERROR, 'GOOGLE_API_KEY is not set');
        }
        this.ai = new GoogleGenAI({ apiKey });
        this.modelName = modelName;
    }

    async generate(contents: Content[]): Promise<string> {
        const response = await this.ai.models.generateContent({
            model: this.modelName,
            contents,
        });

        const responseText = response.text;
        if (!responseText) {
            throw errorHandler.createError(ErrorCode.LLM_API_ERROR, 'Received an empty response from the AI.');
        }
        return responseText;
    }
}

function chatReply(content: string): string {
    return JSON.stringify([{ action: 'chat', content }]);
}

/**
 * Calls the model once. Any failure comes back as a chat-only reply carrying the
 * error text, so the interpreter shows it like any other answer.
 */
export async function requestModelReply(
    client: ModelClient,
    contents: Content[],
    log: ChildLogger = logger
): Promise<string> {
    const startTime = Date.now();
    try {
        const reply = await client.generate(contents);
        log.info('Model reply received', {
            model: client.modelName,
            turns: contents.length,
            length: reply.length,
            duration: Date.now() - startTime
        });
        return reply;
    } catch (error) {
        if (errorHandler.isRateLimitError(error)) {
            log.error('Model quota or rate limit exceeded', error, { model: client.modelName });
            return chatReply('Error calling AI: Model quota or rate limit exceeded.');
        }
        log.error('Model call failed', error, { model: client.modelName });
        const message = error instanceof Error ? error.message : String(error);
        return chatReply(`Error calling AI: ${message}`);
    }
}
