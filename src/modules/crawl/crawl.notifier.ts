/**
 * Crawl Job Notifier
 * Pushes job snapshots to the job's Socket.IO room
 */

import { getIO } from '../../lib/socket';
import { CrawlJobNotifier, CrawlJobSnapshot } from './crawl.types';

export const jobRoom = (jobId: string): string => `job:${jobId}`;

export class SocketJobNotifier implements CrawlJobNotifier {
  progress(job: CrawlJobSnapshot): void {
    this.emit('crawl:progress', job);
  }

  complete(job: CrawlJobSnapshot): void {
    this.emit('crawl:complete', job);
  }

  private emit(event: string, job: CrawlJobSnapshot): void {
    try {
      getIO().to(jobRoom(job.jobId)).emit(event, job);
    } catch (error) {
      console.error(`Error emitting ${event} for job ${job.jobId}:`, error);
    }
  }
}

export const socketJobNotifier = new SocketJobNotifier();
