/**
 * Server Entry Point
 * Starts the HTTP API and stops running crawls on shutdown
 */

import { createServer } from 'http';
import { createApp } from './app';
import { env } from './config/env';
import { crawlerService } from './modules/crawler/crawler.service';

const startServer = async (): Promise<void> => {
  const app = createApp(crawlerService);
  const httpServer = createServer(app);

  await new Promise<void>((resolve) => {
    httpServer.listen(env.PORT, resolve);
  });

  console.log('');
  console.log('🚀 ═══════════════════════════════════════════════════════');
  console.log('🚀 Site crawler server is running');
  console.log(`🚀 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`🚀 Target: ${env.TARGET_WEBSITE_URL}`);
  console.log(`🚀 API: http://localhost:${env.PORT}/health`);
  console.log('🚀 ═══════════════════════════════════════════════════════');
  console.log('');

  const shutdown = (signal: string): void => {
    console.log(`${signal} signal received: closing HTTP server`);
    httpServer.close(() => {
      console.log('HTTP server closed');
      crawlerService
        .shutdown()
        .then(() => {
          console.log('Running crawls stopped');
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('Failed to stop running crawls:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

startServer().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
