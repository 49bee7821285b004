import { buildServer } from './app';
import { getConfig } from './config';
import { closeDb } from './database/connection';
import { getLogger } from './logger';

async function start(): Promise<void> {
  const config = getConfig();
  const server = await buildServer();

  const shutdown = (signal: string) => {
    server.log.info({ signal }, 'Shutting down');
    server
      .close()
      .then(() => closeDb())
      .then(
        () => process.exit(0),
        (error: unknown) => {
          server.log.error({ err: error }, 'Shutdown failed');
          process.exit(1);
        },
      );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await server.listen({ port: config.API_PORT, host: config.API_HOST });
}

start().catch((error: unknown) => {
  getLogger('main').fatal({ err: error }, 'Failed to start server');
  process.exit(1);
});
