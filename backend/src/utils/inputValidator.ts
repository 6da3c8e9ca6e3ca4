/**
 * Input Validation
 * Request body schemas and checks shared by the controllers and the session
 */

import { z } from 'zod';
import errorHandler, { ErrorCode } from './errorHandler';
import { isContainedFilename } from '../services/fileStore';

export const MAX_PROMPT_LENGTH = 10000;

export const chatRequestSchema = z.object({
    prompt: z.string(),
});

export const selectRequestSchema = z.object({
    filename: z.string().min(1).nullable(),
});

export const saveRequestSchema = z.object({
    content: z.string(),
});

export const filenameQuerySchema = z.object({
    filename: z.string({ required_error: 'filename query parameter is required' }),
});

export class InputValidator {
    /**
     * Apply the workspace containment rule, throwing for the HTTP layer.
     */
    static validateFilename(filename: string): string {
        if (!isContainedFilename(filename)) {
            throw errorHandler.createError(
                ErrorCode.PATH_REJECTED,
                `Rejected filename '${filename}': names must be relative and stay inside the workspace`,
                { filename }
            );
        }
        return filename;
    }

    static validatePrompt(prompt: string, maxLength: number = MAX_PROMPT_LENGTH): string {
        const sanitized = prompt.trim();

        if (sanitized.length === 0) {
            throw errorHandler.createError(
                ErrorCode.INVALID_INPUT,
                'Prompt cannot be empty'
            );
        }

        if (sanitized.length > maxLength) {
            throw errorHandler.createError(
                ErrorCode.INVALID_INPUT,
                `Prompt too long (${sanitized.length} characters, max ${maxLength})`,
                { length: sanitized.length, maxLength }
            );
        }

        return sanitized;
    }
}

export default InputValidator;
