import type { NextFunction, Request, Response } from 'express';
import type { BuilderSession } from '../services/builderSession';
import { chatRequestSchema } from '../utils/inputValidator';

export function createChatController(session: BuilderSession) {
    /**
     * POST /api/chat
     * Send a prompt to the model and apply the returned operation batch
     */
    const handleChat = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { prompt } = chatRequestSchema.parse(req.body);
            const outcome = await session.submitPrompt(prompt, req.log);
            res.json(outcome);
        } catch (error) {
            next(error);
        }
    };

    const handleGetHistory = (_req: Request, res: Response) => {
        res.json({ history: session.historyView() });
    };

    const handleClearHistory = (_req: Request, res: Response) => {
        session.clearHistory();
        res.status(204).end();
    };

    return { handleChat, handleGetHistory, handleClearHistory };
}
