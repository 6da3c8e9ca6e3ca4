/**
 * Centralized Error Handling
 * Error classification, status mapping, and user-facing messages
 */

import { ZodError } from 'zod';
import logger from './logger';

export enum ErrorCode {
    // Client errors (400-499)
    VALIDATION_ERROR = 'VALIDATION_ERROR',
    INVALID_INPUT = 'INVALID_INPUT',
    PATH_REJECTED = 'PATH_REJECTED',
    RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
    INVALID_STATE = 'INVALID_STATE',
    RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',

    // Server errors (500-599)
    INTERNAL_ERROR = 'INTERNAL_ERROR',
    CONFIG_ERROR = 'CONFIG_ERROR',
    FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
    LLM_API_ERROR = 'LLM_API_ERROR',
    NETWORK_ERROR = 'NETWORK_ERROR',
}

export class AppError extends Error {
    readonly code: ErrorCode;
    readonly statusCode: number;
    readonly userMessage: string;
    readonly isRetryable: boolean;
    readonly details?: unknown;

    constructor(code: ErrorCode, message: string, details?: unknown, isRetryable: boolean = false) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.statusCode = STATUS_CODES[code];
        this.userMessage = USER_MESSAGES[code] ?? message;
        this.isRetryable = isRetryable;
        this.details = details;
    }
}

const STATUS_CODES: Record<ErrorCode, number> = {
    [ErrorCode.VALIDATION_ERROR]: 400,
    [ErrorCode.INVALID_INPUT]: 400,
    [ErrorCode.PATH_REJECTED]: 400,
    [ErrorCode.RESOURCE_NOT_FOUND]: 404,
    [ErrorCode.INVALID_STATE]: 409,
    [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
    [ErrorCode.INTERNAL_ERROR]: 500,
    [ErrorCode.CONFIG_ERROR]: 500,
    [ErrorCode.FILE_SYSTEM_ERROR]: 500,
    [ErrorCode.LLM_API_ERROR]: 502,
    [ErrorCode.NETWORK_ERROR]: 503,
};

// Codes without an entry show the technical message to the user.
const USER_MESSAGES: Partial<Record<ErrorCode, string>> = {
    [ErrorCode.VALIDATION_ERROR]: 'The request contains invalid data. Please check your input.',
    [ErrorCode.RATE_LIMIT_EXCEEDED]: 'Model quota or rate limit exceeded. Please wait a moment and try again.',
    [ErrorCode.INTERNAL_ERROR]: 'An unexpected error occurred.',
    [ErrorCode.LLM_API_ERROR]: 'The AI service is temporarily unavailable. Please try again shortly.',
    [ErrorCode.NETWORK_ERROR]: 'Network connection failed. Please check your connection and try again.',
};

function messageOf(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}

function propertyOf(error: unknown, key: 'status' | 'code'): unknown {
    if (typeof error === 'object' && error !== null && key in error) {
        return Reflect.get(error, key);
    }
    return undefined;
}

class ErrorHandler {
    /**
     * Create standardized error object
     */
    createError(code: ErrorCode, message: string, details?: unknown, isRetryable: boolean = false): AppError {
        return new AppError(code, message, details, isRetryable);
    }

    /**
     * Handle and classify errors
     */
    handleError(error: unknown, requestId?: string): AppError {
        if (error instanceof AppError) {
            if (error.statusCode >= 500) {
                logger.error(error.message, error, { code: error.code }, requestId);
            } else {
                logger.warn(error.message, { code: error.code, details: error.details }, requestId);
            }
            return error;
        }

        if (this.isRateLimitError(error)) {
            logger.warn('Rate limit exceeded', { originalMessage: messageOf(error) }, requestId);
            return this.createError(
                ErrorCode.RATE_LIMIT_EXCEEDED,
                'API rate limit exceeded',
                { originalMessage: messageOf(error) },
                true
            );
        }

        if (this.isNetworkError(error)) {
            logger.error('Network error occurred', error, undefined, requestId);
            return this.createError(
                ErrorCode.NETWORK_ERROR,
                'Network communication failed',
                { originalMessage: messageOf(error) },
                true
            );
        }

        if (error instanceof ZodError) {
            logger.warn('Validation error', { errors: error.errors }, requestId);
            return this.createError(
                ErrorCode.VALIDATION_ERROR,
                'Invalid request data',
                { errors: error.errors }
            );
        }

        if (this.isLLMError(error)) {
            logger.error('LLM API error', error, undefined, requestId);
            return this.createError(
                ErrorCode.LLM_API_ERROR,
                'AI service error',
                { originalMessage: messageOf(error) },
                true
            );
        }

        logger.error('Unhandled error', error, undefined, requestId);
        return this.createError(
            ErrorCode.INTERNAL_ERROR,
            messageOf(error) || 'An unexpected error occurred'
        );
    }

    isRateLimitError(error: unknown): boolean {
        const message = messageOf(error).toLowerCase();
        return (
            propertyOf(error, 'status') === 429 ||
            propertyOf(error, 'code') === 429 ||
            message.includes('429') ||
            message.includes('rate limit') ||
            message.includes('resource exhausted') ||
            message.includes('resource_exhausted')
        );
    }

    isNetworkError(error: unknown): boolean {
        const code = propertyOf(error, 'code');
        return (
            code === 'ECONNREFUSED' ||
            code === 'ENOTFOUND' ||
            code === 'ETIMEDOUT' ||
            code === 'ECONNRESET' ||
            messageOf(error).toLowerCase().includes('fetch failed')
        );
    }

    private isLLMError(error: unknown): boolean {
        const message = messageOf(error).toLowerCase();
        return (
            propertyOf(error, 'code') === 'LLM_ERROR' ||
            message.includes('gemini') ||
            message.includes('model')
        );
    }
}

// Singleton instance
const errorHandler = new ErrorHandler();

export default errorHandler;
