import { loadConfig, validateConfig } from './infrastructure/config/Config.js';
import { PinoLogger } from './infrastructure/logging/PinoLogger.js';
import { InMemorySessionStore } from './infrastructure/session/InMemorySessionStore.js';
import { StaticNameDirectory } from './infrastructure/directory/StaticNameDirectory.js';
import { SocketNotificationChannel } from './infrastructure/notification/SocketNotificationChannel.js';
import { LoggingNotificationChannel } from './infrastructure/notification/LoggingNotificationChannel.js';
import { Receptionist } from './presentation/Receptionist.js';
import { HttpServer } from './presentation/HttpServer.js';

/**
 * Main entry point for the visitor desk
 */
async function main(): Promise<void> {
  const config = loadConfig();
  validateConfig(config);

  const logger = new PinoLogger({
    name: config.desk.id,
    level: config.logging.level,
    pretty: config.logging.pretty,
  });

  logger.info('Visitor desk starting', {
    office: config.desk.officeName,
    notifications: config.notification.enabled ? 'relay' : 'log only',
  });

  const directory = StaticNameDirectory.fromFile(
    config.desk.directoryFile,
    logger.child({ component: 'StaticNameDirectory' })
  );

  const socketChannel = config.notification.enabled
    ? new SocketNotificationChannel(
        {
          socketUrl: config.notification.socketUrl,
          apiKey: config.notification.apiKey,
          deskId: config.desk.id,
          timeoutMs: config.notification.timeoutMs,
        },
        logger.child({ component: 'SocketNotificationChannel' })
      )
    : null;

  const receptionist = new Receptionist(
    {
      sessions: new InMemorySessionStore(logger.child({ component: 'InMemorySessionStore' }), {
        idleTtlMs: config.session.idleTtlMs,
      }),
      channel:
        socketChannel ?? new LoggingNotificationChannel(logger.child({ component: 'LoggingNotificationChannel' })),
      directory,
    },
    logger.child({ component: 'Receptionist' }),
    {
      officeName: config.desk.officeName,
      cardTitle: config.desk.cardTitle,
      oneShotSessionFallback: config.dialog.oneShotSessionFallback,
      notifyOncePerSession: config.dialog.notifyOncePerSession,
    }
  );

  const httpServer = new HttpServer(receptionist, logger.child({ component: 'HttpServer' }), {
    port: config.server.port,
    host: config.server.host,
  });

  // Handle graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    await httpServer.stop();
    await socketChannel?.disconnect();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown().catch((error) => {
      logger.error('Shutdown failed', error);
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown().catch((error) => {
      logger.error('Shutdown failed', error);
      process.exit(1);
    });
  });

  await httpServer.start();
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
