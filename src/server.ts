// Server entry point
// Bootstrap and start the HTTP server

import 'dotenv/config';
import { createContactBook } from '@/bootstrap.js';
import { buildAppConfig, validateConfig } from '@/utils/config.js';
import { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import { createMailer } from '@/infrastructure/mail/Mailer.js';
import { S3AvatarStore, createS3Client } from '@/infrastructure/avatar/S3AvatarStore.js';
import { GravatarProvider } from '@/infrastructure/avatar/GravatarProvider.js';
import { serverLogger as logger, describeError } from '@/utils/logger.js';

async function main(): Promise<void> {
  // Build configuration from environment
  const config = buildAppConfig(process.env);

  const errors = validateConfig(config, process.env);
  if (errors.length > 0) {
    errors.forEach((err) => logger.error('Configuration error', { error: err }));
    process.exit(1);
  }

  logger.info('Initializing database', { path: config.dbPath });
  const db = await DatabaseService.open({ path: config.dbPath });
  const stats = db.getStats();
  logger.info('Database ready', { users: stats.users, contacts: stats.contacts });

  const contactBook = createContactBook({
    db,
    auth: config.auth,
    publicUrl: config.server.publicUrl,
    mailer: createMailer(config.mail),
    avatars: new S3AvatarStore(createS3Client(config.avatars), config.avatars.bucket, config.avatars.publicUrl),
    defaultAvatars: new GravatarProvider(),
    http: {
      corsOrigins: config.server.corsOrigins,
      trustProxy: config.server.nodeEnv === 'production',
      logFormat: config.server.nodeEnv === 'production' ? 'combined' : 'dev',
    },
  });

  const server = contactBook.app.listen(config.server.port, config.server.host, () => {
    logger.info('Server running', {
      url: `http://${config.server.host}:${config.server.port}`,
      nodeEnv: config.server.nodeEnv,
      mailer: config.mail.driver,
    });
  });

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Starting graceful shutdown', { signal });

    server.close(() => {
      contactBook
        .shutdown()
        .then(() => db.close())
        .then(() => {
          logger.info('Server closed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error: describeError(error) });
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('uncaughtException', (err) => {
    logger.error('Uncaught exception', { error: err.message, stack: err.stack });
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { error: describeError(reason) });
  });
}

main().catch((error: unknown) => {
  logger.error('Fatal error during startup', { error: describeError(error) });
  process.exit(1);
});
