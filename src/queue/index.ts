/**
 * Queue Module
 */

import { ConfigurationError } from '../core/errors.js';
import { filePathFromUrl } from '../store/persistence.js';
import { FileJobQueue, type FileJobQueueOptions } from './FileJobQueue.js';
import { MemoryJobQueue, type JobQueue } from './JobQueue.js';

export { MemoryJobQueue } from './JobQueue.js';
export type { JobQueue, QueueJob } from './JobQueue.js';
export { FileJobQueue } from './FileJobQueue.js';
export type { FileJobQueueOptions } from './FileJobQueue.js';

/**
 * Create a job queue from a broker URL (`memory://` or `file://<path>`)
 */
export async function createJobQueue(url: string, options: FileJobQueueOptions = {}): Promise<JobQueue> {
  if (url.startsWith('memory://')) {
    return new MemoryJobQueue();
  }
  if (url.startsWith('file://')) {
    return FileJobQueue.open(filePathFromUrl(url), options);
  }
  throw new ConfigurationError(`Unsupported QUEUE_BROKER_URL: ${url}`);
}
