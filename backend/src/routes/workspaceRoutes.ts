import { Router } from 'express';
import type { BuilderSession } from '../services/builderSession';
import { createWorkspaceController } from '../controllers/workspaceController';

export function createFilesRouter(session: BuilderSession): Router {
    const router = Router();
    const controller = createWorkspaceController(session);

    // GET /api/files - Live listing of the workspace
    router.get('/', controller.handleListFiles);

    // GET /api/files/content?filename= - Read one file
    router.get('/content', controller.handleReadFile);

    // DELETE /api/files?filename= - Delete one file
    router.delete('/', controller.handleDeleteFile);

    return router;
}

export function createSessionRouter(session: BuilderSession): Router {
    const router = Router();
    const controller = createWorkspaceController(session);

    // GET /api/session - Selection and file listing
    router.get('/', controller.handleGetSession);

    // POST /api/session/select - Change the selected file
    router.post('/select', controller.handleSelectFile);

    // POST /api/session/save - Save editor content to the selected file
    router.post('/save', controller.handleSaveFile);

    return router;
}
