import 'dotenv/config';
import Fastify from 'fastify';
import { registerRoutes } from './routes.js';
import { config } from './config.js';
import { AnthropicCardExtractor, testAIConfiguration } from './modules/ai.js';
import { PostgresCardRepository, closeDatabasePool, testDatabaseConnection } from './modules/database/index.js';
import { SessionMaintenanceManager } from './modules/maintenance/index.js';
import { CardPipeline } from './modules/pipeline/index.js';
import {
  BatchCoordinator,
  RateLimiter,
  RedisKeyValueBackend,
  SessionStore,
  closeRedisClient,
  getRedisClient,
  getSessionConfig
} from './modules/session/index.js';
import { WhatsAppMessenger, testConfiguration } from './modules/whatsapp/index.js';

// Start server function
const startServer = async () => {
  try {
    // Resolve the session backend once; everything downstream receives the store
    const sessionConfig = getSessionConfig();
    const redisClient = await getRedisClient(sessionConfig.redisOptions);
    const sessions = new SessionStore(
      sessionConfig,
      redisClient ? new RedisKeyValueBackend(redisClient) : null
    );
    console.log(`🗄️  Session store using ${sessions.mode} backend`);

    const pipeline = new CardPipeline({
      sessions,
      rateLimiter: new RateLimiter(sessions, sessionConfig.dailyLimit),
      batches: new BatchCoordinator(sessions),
      extractor: new AnthropicCardExtractor(),
      repository: new PostgresCardRepository(),
      messenger: new WhatsAppMessenger(),
      maxImageBytes: config.MAX_IMAGE_BYTES
    });

    const maintenance = new SessionMaintenanceManager(sessions, sessionConfig.inactivityHorizonMs);
    maintenance.startMaintenance(config.MAINTENANCE_INTERVAL_HOURS);

    const fastify = Fastify({
      logger: true,
      bodyLimit: 1048576 // 1MB
    });

    registerRoutes(fastify, {
      webhookEndpoint: config.WEBHOOK_ENDPOINT,
      verificationToken: config.WEBHOOK_VERIFICATION_TOKEN,
      appSecret: config.WA_APP_SECRET,
      sessionBackend: sessions.mode,
      handleMessage: (message) => pipeline.handleMessage(message)
    });

    fastify.addHook('onClose', async () => {
      maintenance.stopMaintenance();
      await closeRedisClient();
      await closeDatabasePool();
    });

    const port = config.LISTENER_PORT;
    const host = process.env.HOST || '0.0.0.0';

    await fastify.listen({ port, host });

    fastify.log.info(`🚀 Server listening on http://${host}:${port}`);
    fastify.log.info('Available routes:');
    fastify.log.info('  GET  /health');
    fastify.log.info(`  GET  /${config.WEBHOOK_ENDPOINT} (webhook verification)`);
    fastify.log.info(`  POST /${config.WEBHOOK_ENDPOINT} (receive messages)`);
    if (!config.WA_APP_SECRET) {
      fastify.log.warn('WA_APP_SECRET is not set, webhook signatures are NOT checked');
    }

    // Test configurations
    testConfiguration();
    testAIConfiguration();
    await testDatabaseConnection();

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        fastify.log.info(`${signal} received, shutting down`);
        fastify.close().then(
          () => process.exit(0),
          (error: unknown) => {
            console.error('Error during shutdown:', error);
            process.exit(1);
          }
        );
      });
    }

  } catch (error) {
    console.error('Error starting server:', error);
    process.exit(1);
  }
};

// Start the server if this file is run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  void startServer();
}
