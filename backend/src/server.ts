/**
 * Taskpilot API server
 *
 * Startup: validate configuration, build the application context, start
 * the follow-up job and listen. SIGINT/SIGTERM close the server and drop
 * open streams (aborting their runs), stop the job and the checkpointer,
 * then close database connections.
 */

import { env, describeConfig, validateRequiredSecrets } from '@/infrastructure/config/environment';
import { logger } from '@/shared/utils/logger';
import { closeServer } from '@/shared/utils/http-server';
import { createAppContext, type AppContext } from './appContext';
import { createApp } from './app';

async function startServer(): Promise<void> {
  validateRequiredSecrets(env);
  logger.info(describeConfig(env), 'Starting Taskpilot API');

  const ctx: AppContext = await createAppContext(env);
  const app = createApp(ctx);

  const server = app.listen(env.PORT, () => {
    logger.info({ port: env.PORT }, 'Server listening');
  });

  ctx.followUpJob?.start();

  let shuttingDown = false;
  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    try {
      await closeServer(server);
      await ctx.close();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during graceful shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
}

process.on('unhandledRejection', (reason: unknown) => {
  logger.error({ err: reason }, 'Unhandled rejection');
});

startServer().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
