import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import type { AppConfig } from './config';
import { FileStore } from './services/fileStore';
import { GeminiModelClient } from './services/geminiService';
import { BuilderSession } from './services/builderSession';
import logger from './utils/logger';

dotenv.config();

// Missing credentials or a client that cannot be built stop the process before any interaction.
function configure(): { config: AppConfig; model: GeminiModelClient } {
  try {
    const config = loadConfig();
    return { config, model: new GeminiModelClient(config.apiKey, config.modelName) };
  } catch (error) {
    logger.critical('Startup failed: could not configure the model client', error);
    process.exit(1);
  }
}

async function main() {
  const { config, model } = configure();

  const store = new FileStore(config.workspaceDir);
  const created = await store.ensureRoot();
  if (!created.ok) {
    logger.critical(created.message);
    process.exit(1);
  }

  const session = new BuilderSession(store, model);
  const app = createApp({ session, modelName: model.modelName, workspaceDir: store.root });

  logger.info('======= SiteSmith Startup Config =======', {
    port: config.port,
    model: config.modelName,
    workspace: store.root,
    apiKey: '[SET]'
  });

  app.listen(config.port, () => {
    logger.info(`SiteSmith backend running at http://localhost:${config.port}`);
  });
}

main().catch((error) => {
  logger.critical('Unexpected startup failure', error);
  process.exit(1);
});
