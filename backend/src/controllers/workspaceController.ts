import type { NextFunction, Request, Response } from 'express';
import type { BuilderSession } from '../services/builderSession';
import InputValidator, { filenameQuerySchema, saveRequestSchema, selectRequestSchema } from '../utils/inputValidator';

export function createWorkspaceController(session: BuilderSession) {
    const handleListFiles = async (_req: Request, res: Response, next: NextFunction) => {
        try {
            res.json(await session.listFiles());
        } catch (error) {
            next(error);
        }
    };

    const handleReadFile = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { filename } = filenameQuerySchema.parse(req.query);
            const content = await session.readFile(InputValidator.validateFilename(filename));
            res.json({ filename, content });
        } catch (error) {
            next(error);
        }
    };

    const handleDeleteFile = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { filename } = filenameQuerySchema.parse(req.query);
            const outcome = await session.deleteFile(InputValidator.validateFilename(filename));
            res.json(outcome);
        } catch (error) {
            next(error);
        }
    };

    const handleGetSession = async (_req: Request, res: Response, next: NextFunction) => {
        try {
            const listing = await session.listFiles();
            res.json({ ...session.selectionView(), ...listing });
        } catch (error) {
            next(error);
        }
    };

    const handleSelectFile = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { filename } = selectRequestSchema.parse(req.body);
            res.json(await session.selectFile(filename));
        } catch (error) {
            next(error);
        }
    };

    /**
     * POST /api/session/save
     * Manual edit-save of the selected file
     */
    const handleSaveFile = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const { content } = saveRequestSchema.parse(req.body);
            res.json(await session.saveSelectedFile(content));
        } catch (error) {
            next(error);
        }
    };

    return {
        handleListFiles,
        handleReadFile,
        handleDeleteFile,
        handleGetSession,
        handleSelectFile,
        handleSaveFile,
    };
}
