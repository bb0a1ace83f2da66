// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { createApp } from '@/app';
import { ConfigError, loadConfig, type AppConfig } from '@/config/app.config';
import { createRuntime } from '@/runtime';
import { logger } from '@/services/logger';
import {
  onShutdown,
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from '@/stability/errorHandlers';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      err.issues.forEach((issue) => logger.fatal(`config ${issue.path}: ${issue.message}`));
    }
    throw err;
  }
}

const config = readConfig();

setupUnhandledRejectionHandler(config.nodeEnv);
setupUncaughtExceptionHandler();
setupGracefulShutdown();

const runtime = createRuntime(config);
const app = createApp(config, runtime);

const server = app.listen(config.port, () => {
  logger.info(`Server running on http://localhost:${config.port}`);
  logger.info(`Environment: ${config.nodeEnv}`);
  logger.info(`Health check: http://localhost:${config.port}/health`);
});

setServerInstance(server);
onShutdown(() => runtime.shutdown());
