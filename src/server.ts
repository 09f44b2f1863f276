import http from 'http';
import path from 'path';
import env from './config/env';
import { buildExpressApp } from './app';
import { connectDB, disconnectDB } from './config/db';
import { getRedis, closeRedis } from './redis/client';
import { redisRefreshStore } from './auth/refreshStore';
import { MongoRepositories } from './repositories/mongo.repository';
import { DiskBlobStore } from './storage/blobStore';
import { createServices } from './services';
import logger from './utils/logger';

/**
 * Process entrypoint: connect storage, make sure an admin can log in,
 * then serve HTTP until SIGINT/SIGTERM.
 */
async function bootstrap() {
  await connectDB();

  const services = createServices({
    repos: new MongoRepositories(),
    blobs: new DiskBlobStore(path.resolve(env.UPLOAD_DIR)),
  });

  const { created } = await services.identity.ensureAdminExists({
    name: env.ADMIN_NAME,
    email: env.ADMIN_EMAIL,
    password: env.ADMIN_PASSWORD,
  });
  if (!created) logger.debug('admin account present');

  const app = buildExpressApp({ services, refreshStore: redisRefreshStore(getRedis()) });
  const server = http.createServer(app);

  server.listen(env.PORT, () => {
    logger.info(`✅ HTTP server running at http://localhost:${env.PORT}`);
  });

  const closeAll = async () => {
    await closeRedis();
    await disconnectDB();
  };

  const shutdown = (signal: string) => {
    logger.info(`${signal} received: closing server, redis and DB...`);
    server.close(() => {
      closeAll()
        .then(() => {
          logger.info('Clean shutdown complete. 👋');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'shutdown failed');
          process.exit(1);
        });
    });

    setTimeout(() => {
      logger.warn('Forcing shutdown...');
      closeAll()
        .catch((err: unknown) => logger.error({ err }, 'forced shutdown cleanup failed'))
        .finally(() => process.exit(1));
    }, 10_000).unref();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((err) => {
  logger.fatal({ err }, 'Fatal startup error');
  process.exit(1);
});
