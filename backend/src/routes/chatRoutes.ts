import { Router } from 'express';
import type { BuilderSession } from '../services/builderSession';
import { createChatController } from '../controllers/chatController';

export function createChatRouter(session: BuilderSession): Router {
    const router = Router();
    const controller = createChatController(session);

    // POST /api/chat - Prompt the model and apply its operations
    router.post('/', controller.handleChat);

    // GET /api/chat/history - Conversation with per-turn summaries
    router.get('/history', controller.handleGetHistory);

    // DELETE /api/chat/history - Start a fresh conversation
    router.delete('/history', controller.handleClearHistory);

    return router;
}
