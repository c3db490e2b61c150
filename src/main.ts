import 'dotenv/config';
import { createLogger } from '@/observability/logger.js';
import { loadTimerConfig, parseTimerConfig } from '@/config/loader.js';
import { createServiceContainer } from '@/services/service-container.js';

async function start(): Promise<void> {
  const configPath = process.env['TIMER_CONFIG'];
  const configResult = configPath !== undefined
    ? await loadTimerConfig(configPath)
    : parseTimerConfig({});

  if (!configResult.ok) {
    const bootLogger = createLogger();
    bootLogger.fatal(configResult.error.message, {
      component: 'main',
      code: configResult.error.code,
      ...configResult.error.context,
    });
    process.exit(1);
    return;
  }

  const config = configResult.value;
  const logger = createLogger({ level: process.env['LOG_LEVEL'] ?? config.logLevel });

  try {
    const services = createServiceContainer({ config, logger });
    const scheduler = services.getTaskScheduler();

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', {
        component: 'main',
        queued: await scheduler.countQueued(),
      });
      await services.shutdown();
      process.exit(0);
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    logger.info('Timer services running', {
      component: 'main',
      configPath: configPath ?? '<defaults>',
      taskSetStrategy: config.taskScheduler.taskSetStrategy,
    });
  } catch (err: unknown) {
    logger.fatal('Failed to start timer services', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
