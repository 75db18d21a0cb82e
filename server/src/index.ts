import { createApp } from './app';
import { loadConfig } from './config/env';
import { languageName } from './config/languages';
import { TranslationEngine } from './core/translation-engine';
import { JobRegistry } from './services/job-registry';
import { loadDefaultPrompt } from './services/prompt-loader';
import { TranslationService } from './services/translation-service';
import { errorLog, infoLog } from './utils/logger';

const SWEEP_INTERVAL_MS = 60000;

async function main(): Promise<void> {
  const config = loadConfig();

  if (!config.backend.apiKey) {
    throw new Error('Clé du service de traduction absente. Définir TRANSLATION_API_KEY.');
  }

  const engine = new TranslationEngine(config.backend);
  const defaultInstructions = await loadDefaultPrompt(config.defaultPromptPath, languageName(config.targetLanguage));

  const registry = new JobRegistry({ retentionMs: config.pipeline.retentionMs });
  registry.startSweeper(Math.min(SWEEP_INTERVAL_MS, config.pipeline.retentionMs));

  const service = new TranslationService({
    registry,
    translator: engine,
    defaultInstructions,
    targetLanguage: config.targetLanguage,
    pipeline: config.pipeline
  });

  const app = createApp({
    service,
    corsOrigins: config.corsOrigins,
    maxUploadBytes: config.maxUploadBytes,
    exposeErrorDetails: config.env === 'development'
  });

  const server = app.listen(config.port, () => {
    infoLog(`Server running at http://localhost:${config.port}`);
    infoLog('Environment:', config.env, '- niveau de log:', config.logLevel);
    infoLog('Modèle:', config.backend.model, '- langue cible:', service.targetLanguage);
    infoLog('Requêtes parallèles max par job:', config.pipeline.concurrency);
  });

  const shutdown = (signal: string) => {
    infoLog(`${signal} reçu, arrêt du serveur`);
    registry.stop();
    engine.shutdown();
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  errorLog('Échec du démarrage:', error instanceof Error ? error.message : error);
  process.exit(1);
});
