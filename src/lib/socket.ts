/**
 * Socket.IO server holder
 * Connection handling is done in server.ts, job rooms in the crawl module
 */

import { Server as HTTPServer } from 'http';
import { Server } from 'socket.io';
import { env } from '../config/env';

let io: Server | null = null;

export const initializeSocket = (httpServer: HTTPServer): Server => {
  io = new Server(httpServer, {
    cors: {
      origin: env.CLIENT_URL,
      methods: ['GET', 'POST'],
      credentials: true,
    },
  });

  return io;
};

export const getIO = (): Server => {
  if (!io) {
    throw new Error('Socket.IO is not initialized; call initializeSocket before pushing job updates');
  }
  return io;
};

/**
 * Drop every client so the HTTP server can close
 */
export const disconnectAllSockets = (): void => {
  io?.disconnectSockets(true);
};
