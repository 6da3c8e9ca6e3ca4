import path from 'path';
import { z } from 'zod';
import errorHandler, { ErrorCode } from './utils/errorHandler';

export const DEFAULT_MODEL = 'gemini-2.5-pro-exp-03-25';
export const STYLESHEET_FILENAME = 'style.css';

const envSchema = z.object({
    GOOGLE_API_KEY: z
        .string({ required_error: 'GOOGLE_API_KEY is not set' })
        .trim()
        .min(1, 'GOOGLE_API_KEY is empty'),
    GEMINI_MODEL: z.string().trim().min(1).default(DEFAULT_MODEL),
    WORKSPACE_DIR: z.string().trim().min(1).default('workspace'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3001),
});

export interface AppConfig {
    apiKey: string;
    modelName: string;
    /** Absolute path of the workspace root. */
    workspaceDir: string;
    port: number;
}

/**
 * Read configuration from environment variables (after dotenv has loaded `.env`).
 * Throws a CONFIG_ERROR AppError when the credential is missing or a value is malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
    // Blank optional values fall back to their defaults.
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );
    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        const issues = parsed.error.errors.map((issue) => issue.message);
        throw errorHandler.createError(
            ErrorCode.CONFIG_ERROR,
            `Invalid configuration: ${issues.join('; ')}`,
            { issues }
        );
    }

    return {
        apiKey: parsed.data.GOOGLE_API_KEY,
        modelName: parsed.data.GEMINI_MODEL,
        workspaceDir: path.resolve(cwd, parsed.data.WORKSPACE_DIR),
        port: parsed.data.PORT,
    };
}
