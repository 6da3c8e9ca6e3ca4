import type { NextFunction, Request, Response } from 'express';
import type { BuilderSession } from '../services/builderSession';

export function createPreviewController(session: BuilderSession) {
    /**
     * GET /api/preview
     * Preview state for the selected file, including caption and export link
     */
    const handleGetPreview = async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await session.preview());
        } catch (error) {
            next(error);
        }
    };

    /**
     * GET /preview
     * The composed document itself, for an embedded frame
     */
    const handleRenderPreview = async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const view = await session.preview();
            switch (view.kind) {
                case 'ready':
                    res.type('html').send(view.html);
                    return;
                case 'error':
                    res.status(500).type('text').send(view.message);
                    return;
                case 'not_html':
                    res.status(404).type('text').send(`Preview is available for HTML files only. Selected: ${view.filename}`);
                    return;
                case 'empty':
                    res.status(404).type('text').send('Select an HTML file to see a preview.');
                    return;
            }
        } catch (error) {
            next(error);
        }
    };

    return { handleGetPreview, handleRenderPreview };
}
