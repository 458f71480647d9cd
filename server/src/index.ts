import type { Logger } from 'pino';

import { GeminiClient, OllamaClient, type ModelClient } from './agent.js';
import { createApp } from './app.js';
import { loadConfig, type AppConfig } from './config.js';
import { readCalculatorDir } from './configSource.js';
import { CalculationEngine } from './engine.js';
import { createLogger } from './logger.js';
import { CalculatorRegistry } from './registry.js';
import { SheetsApiWorkbookStore, staticToken } from './store/sheetsApiStore.js';
import type { WorkbookStore } from './store/store.js';
import { XlsxWorkbookStore } from './store/xlsxStore.js';

function createStore(config: AppConfig, logger: Logger): WorkbookStore {
  if (config.backend === 'remote') {
    if (!config.sheetsAccessToken) throw new Error('SHEETS_ACCESS_TOKEN is required for the remote backend');
    return new SheetsApiWorkbookStore({
      baseUrl: config.sheetsApiBaseUrl,
      token: staticToken(config.sheetsAccessToken),
      maxRetries: config.backendMaxRetries,
      retryBaseMs: config.backendRetryBaseMs,
      logger: logger.child({ module: 'store' })
    });
  }
  return new XlsxWorkbookStore({ baseDir: config.workbooksDir, logger: logger.child({ module: 'store' }) });
}

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const store = createStore(config, logger);
  const registry = new CalculatorRegistry(logger.child({ module: 'registry' }));
  const engine = new CalculationEngine({
    registry,
    store,
    cacheTtlMs: config.cacheTtlMs,
    lockTimeoutMs: config.callTimeoutMs,
    logger: logger.child({ module: 'engine' })
  });

  const loadRecords = () => readCalculatorDir(config.calculatorsDir);
  const { records, errors } = await loadRecords();
  for (const e of errors) logger.warn({ calculator: e.calculator, reason: e.reason }, 'calculator file unreadable');
  engine.reload(records);

  const models: Record<string, ModelClient> = {
    ollama: new OllamaClient({ baseUrl: config.ollamaBaseUrl, model: config.ollamaModel })
  };
  if (config.geminiApiKey) {
    models.gemini = new GeminiClient({ apiKey: config.geminiApiKey, model: config.geminiModel });
  } else {
    logger.warn('GEMINI_API_KEY not set; the Gemini model will not be available');
  }

  const app = createApp({ engine, store, logger, loadRecords, models, defaultTimeoutMs: config.callTimeoutMs });
  app.listen(config.port, () => {
    logger.info({ port: config.port, backend: store.kind, calculators: registry.names().length }, `calculation engine listening on http://localhost:${config.port}`);
  });
}

main().catch(e => {
  // Startup failures (bad configuration, unreadable calculator dir) end the process here
  console.error(e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
