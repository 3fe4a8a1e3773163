/**
 * Crawl Socket Handlers
 * Real-time WebSocket event handlers for crawl jobs
 */

import { Socket } from 'socket.io';
import { getErrorMessage } from '../../lib/errors/crawl.errors';
import { jobRoom } from './crawl.notifier';
import { CrawlService, crawlService } from './crawl.service';
import { toJobSnapshot } from './crawl.snapshot';

/**
 * Register crawl socket event handlers
 */
export const registerCrawlSocketHandlers = (socket: Socket, service: CrawlService = crawlService): void => {
  /**
   * Join a job room for real-time updates
   */
  socket.on('crawl:join', (jobId: string) => {
    void socket.join(jobRoom(jobId));
    console.log(`Socket ${socket.id} joined job room: ${jobId}`);
  });

  /**
   * Leave a job room
   */
  socket.on('crawl:leave', (jobId: string) => {
    void socket.leave(jobRoom(jobId));
    console.log(`Socket ${socket.id} left job room: ${jobId}`);
  });

  /**
   * Request current job status
   */
  socket.on('crawl:status', async (jobId: string) => {
    try {
      const job = await service.getJob(jobId);
      socket.emit('crawl:status:response', {
        success: true,
        job: toJobSnapshot(job),
      });
    } catch (error) {
      socket.emit('crawl:status:response', {
        success: false,
        error: getErrorMessage(error),
      });
    }
  });

  /**
   * Cancel a job via socket
   */
  socket.on('crawl:cancel', async (jobId: string) => {
    try {
      const job = await service.cancelCrawl(jobId);
      socket.emit('crawl:cancel:response', {
        success: true,
        job: toJobSnapshot(job),
      });
    } catch (error) {
      socket.emit('crawl:cancel:response', {
        success: false,
        error: getErrorMessage(error),
      });
    }
  });
};
