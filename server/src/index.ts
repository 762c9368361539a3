import { Severity } from '@shared/logging/index.ts';
import { buildServer } from './app.js';

const PORT = Number(process.env.PORT ?? 4000);
const HOST = process.env.HOST ?? '0.0.0.0';

async function start() {
  const server = await buildServer({ logger: true });
  const hostLog = server.overlayLogger.forContext({ name: 'OverlayHost' });

  const shutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.close();
      server.log.info('Server closed successfully');
      process.exit(0);
    } catch (error) {
      server.log.error(error, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGHUP', () => void shutdown('SIGHUP'));

  try {
    await server.listen({ port: PORT, host: HOST });
    server.overlayLoop.start();
    const displayHost = HOST.includes(':') ? `[${HOST}]` : HOST;
    hostLog.log(`Listening on http://${displayHost}:${PORT}`, Severity.Log);
  } catch (error) {
    server.log.error(error);
    process.exit(1);
  }
}

void start();
