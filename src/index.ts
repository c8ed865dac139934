import express, { NextFunction, Request, Response } from 'express';
import { testConnection } from './config/database';
import { env } from './config/environment';
import { ServiceContainer } from './core/container/ServiceContainer';
import { createWhatsAppWebhook } from './routes/webhook';
import { logger } from './utils/logger';

// Local date arithmetic runs in the calendar's time zone
process.env.TZ = env.DEFAULT_TIMEZONE;

const container = ServiceContainer.getInstance();
const app = express();

app.use(express.json());

app.get('/health', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

app.use(
  '/webhook',
  createWhatsAppWebhook({
    engine: container.engine,
    transport: container.transport,
    verifyToken: env.WHATSAPP_WEBHOOK_VERIFY_TOKEN,
    logger
  })
);

app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  logger.error('Unhandled error:', err);
  res.status(500).json({ error: 'Internal server error' });
});

async function startServer(): Promise<void> {
  const dbConnected = await testConnection();
  if (dbConnected) {
    logger.info('✅ Database connected successfully');
  } else {
    logger.warn('⚠️  Database unavailable - local contact lookups will fall through');
  }

  app.listen(env.PORT, () => {
    logger.info(`🚀 Server running on port ${env.PORT}`);
    logger.info(`📱 Webhook URL: http://localhost:${env.PORT}/webhook/whatsapp`);
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});

export default app;
