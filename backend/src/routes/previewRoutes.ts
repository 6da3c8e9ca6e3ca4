import { Router } from 'express';
import type { BuilderSession } from '../services/builderSession';
import { createPreviewController } from '../controllers/previewController';

export function createPreviewRouter(session: BuilderSession): Router {
    const router = Router();
    const controller = createPreviewController(session);

    // GET /api/preview - Preview metadata and export link
    router.get('/api/preview', controller.handleGetPreview);

    // GET /preview - Composed HTML for an iframe
    router.get('/preview', controller.handleRenderPreview);

    return router;
}
