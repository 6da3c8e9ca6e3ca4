import express from 'express';
import cors from 'cors';
import type { BuilderSession } from './services/builderSession';
import { createChatRouter } from './routes/chatRoutes';
import { createFilesRouter, createSessionRouter } from './routes/workspaceRoutes';
import { createPreviewRouter } from './routes/previewRoutes';
import { loggingMiddleware } from './middlewares/loggingMiddleware';
import { errorMiddleware, notFoundHandler } from './middlewares/errorHandler';

export interface AppDependencies {
  session: BuilderSession;
  modelName: string;
  workspaceDir: string;
}

export function createApp({ session, modelName, workspaceDir }: AppDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '10mb' })); // whole files travel in request bodies
  app.use(loggingMiddleware);

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      model: modelName,
      workspace: workspaceDir
    });
  });

  // API Routes
  app.use('/api/chat', createChatRouter(session));
  app.use('/api/files', createFilesRouter(session));
  app.use('/api/session', createSessionRouter(session));
  app.use(createPreviewRouter(session));

  app.use(notFoundHandler);
  app.use(errorMiddleware);

  return app;
}
