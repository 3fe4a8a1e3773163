/**
 * Server Entry Point
 * Initializes Express server, MongoDB, and Socket.IO
 */

import { createServer } from 'http';
import { createApp } from './app';
import { connectDB, disconnectDB } from './lib/mongo';
import { disconnectAllSockets, initializeSocket } from './lib/socket';
import { registerCrawlSocketHandlers } from './modules/crawl/crawl.socket';
import { crawlService } from './modules/crawl/crawl.service';
import { env } from './config/env';

const startServer = async (): Promise<void> => {
  try {
    // Connect to MongoDB
    await connectDB();

    // Jobs a previous process left running can never finish
    console.log('🔁 Recovering interrupted crawl jobs...');
    await crawlService.recoverInterruptedJobs();

    // Create Express app
    const app = createApp();

    // Create HTTP server
    const httpServer = createServer(app);

    // Initialize Socket.IO
    const io = initializeSocket(httpServer);

    // Register Socket.IO handlers
    io.on('connection', (socket) => {
      console.log(`✅ Socket connected: ${socket.id}`);

      registerCrawlSocketHandlers(socket);

      socket.on('disconnect', () => {
        console.log(`❌ Socket disconnected: ${socket.id}`);
      });
    });

    // Start server
    httpServer.listen(env.PORT, () => {
      console.log('');
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log(`🚀 Open-data crawler is running`);
      console.log(`🚀 Environment: ${env.NODE_ENV}`);
      console.log(`🚀 Port: ${env.PORT}`);
      console.log(`🚀 Max concurrent crawls: ${env.MAX_CONCURRENT_CRAWLS}`);
      console.log(`🚀 API: http://localhost:${env.PORT}/health`);
      console.log(`🚀 Socket.IO: ws://localhost:${env.PORT}`);
      console.log('🚀 ═══════════════════════════════════════════════════════');
      console.log('');
    });

    // Graceful shutdown
    const shutdown = (signal: string): void => {
      console.log(`${signal} signal received: closing HTTP server`);
      disconnectAllSockets();
      httpServer.close(() => {
        console.log('HTTP server closed');
        disconnectDB()
          .then(() => {
            console.log('MongoDB disconnected');
            process.exit(0);
          })
          .catch((error: unknown) => {
            console.error('Error during MongoDB disconnect:', error);
            process.exit(1);
          });
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));

  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Start the server
void startServer();
