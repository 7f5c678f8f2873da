import { TILE_QUEUE_CONFIG } from './config';
import { errorMessage } from './errors';
import {
  RequestQueueLogger,
  NoOpRequestQueueLogger
} from './request-queue-logger';

export interface QueuedRequest<T> {
  id: string;
  // The signal aborts when the attempt times out
  execute: (signal: AbortSignal) => Promise<T>;
  retryCount: number;
  createdAt: number;
  url?: string;
  method?: string;
  onError?: (error: Error) => void;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export interface RequestQueueConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayBase: number;
  retryDelayMax: number;
  timeout: number;
}

export interface QueueStats {
  queued: number;
  active: number;
  retrying: number;
}

export const DEFAULT_REQUEST_QUEUE_CONFIG: RequestQueueConfig = { ...TILE_QUEUE_CONFIG };

/**
 * Bounded-concurrency request queue. At most maxConcurrent requests execute
 * at once; each attempt is raced against a timeout and failed attempts are
 * retried with exponential backoff.
 */
export class RequestQueue<T = unknown> {
  private queue: QueuedRequest<T>[] = [];
  private activeRequests: Map<string, QueuedRequest<T>> = new Map();
  private retrying: Map<string, { timerId: NodeJS.Timeout; request: QueuedRequest<T> }> = new Map();
  private config: RequestQueueConfig;
  private logger: RequestQueueLogger;

  constructor(config: Partial<RequestQueueConfig> = {}, logger?: RequestQueueLogger) {
    this.config = { ...DEFAULT_REQUEST_QUEUE_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxConcurrent) || this.config.maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be an integer of at least 1, got ${this.config.maxConcurrent}`);
    }
    this.logger = logger || new NoOpRequestQueueLogger();
  }

  public add(
    request: Omit<QueuedRequest<T>, 'id' | 'createdAt' | 'retryCount' | 'resolve' | 'reject'>
  ): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const id = this.logger.getNextRequestId();
      const queuedRequest: QueuedRequest<T> = {
        ...request,
        id,
        retryCount: 0,
        createdAt: Date.now(),
        resolve,
        reject
      };

      this.logger.log({
        timestamp: new Date(),
        eventType: 'QUEUED',
        requestId: id,
        method: request.method || 'GET',
        path: request.url || 'unknown'
      });

      this.queue.push(queuedRequest);
      this.processQueue();
    });
  }

  private processQueue(): void {
    while (this.queue.length > 0 && this.activeRequests.size < this.config.maxConcurrent) {
      const request = this.queue.shift();
      if (!request) break;
      this.activeRequests.set(request.id, request);
      void this.processRequest(request);
    }
  }

  private async processRequest(request: QueuedRequest<T>): Promise<void> {
    const startTime = Date.now();
    const controller = new AbortController();
    let timeoutId: NodeJS.Timeout | undefined;

    this.logger.log({
      timestamp: new Date(),
      eventType: 'STARTED',
      requestId: request.id,
      method: request.method || 'GET',
      path: request.url || 'unknown',
      attempt: request.retryCount + 1,
      maxAttempts: this.config.maxRetries + 1
    });

    try {
      const timeoutPromise = new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
          const error = new Error('Request timeout');
          controller.abort(error);
          reject(error);
        }, this.config.timeout);
      });

      // Promise.resolve().then turns a synchronous throw into a rejection
      const executePromise = Promise.resolve().then(() => request.execute(controller.signal));
      const result = await Promise.race([executePromise, timeoutPromise]);

      clearTimeout(timeoutId);
      this.activeRequests.delete(request.id);

      this.logger.log({
        timestamp: new Date(),
        eventType: 'COMPLETED',
        requestId: request.id,
        method: request.method || 'GET',
        path: request.url || 'unknown',
        duration: Date.now() - startTime
      });

      request.resolve(result);
    } catch (caught) {
      clearTimeout(timeoutId);
      this.activeRequests.delete(request.id);
      const error = caught instanceof Error ? caught : new Error(errorMessage(caught));

      this.logger.log({
        timestamp: new Date(),
        eventType: 'FAILED',
        requestId: request.id,
        method: request.method || 'GET',
        path: request.url || 'unknown',
        duration: Date.now() - startTime,
        error: error.message
      });

      if (request.retryCount < this.config.maxRetries) {
        this.scheduleRetry(request);
      } else {
        if (request.onError) {
          request.onError(error);
        }
        request.reject(error);
      }
    }

    this.processQueue();
  }

  private scheduleRetry(request: QueuedRequest<T>): void {
    request.retryCount++;

    const delay = Math.min(
      this.config.retryDelayBase * Math.pow(2, request.retryCount - 1),
      this.config.retryDelayMax
    );

    this.logger.log({
      timestamp: new Date(),
      eventType: 'RETRY',
      requestId: request.id,
      method: request.method || 'GET',
      path: request.url || 'unknown',
      attempt: request.retryCount + 1,
      maxAttempts: this.config.maxRetries + 1,
      delay
    });

    const timerId = setTimeout(() => {
      this.retrying.delete(request.id);
      this.queue.unshift(request); // Front of the queue to keep submission order
      this.processQueue();
    }, delay);
    this.retrying.set(request.id, { timerId, request });
  }

  public getStats(): QueueStats {
    return {
      queued: this.queue.length,
      active: this.activeRequests.size,
      retrying: this.retrying.size
    };
  }

  /**
   * Reject every request that has not started yet, including those waiting
   * to retry. Requests already executing are left to finish.
   */
  public clear(): void {
    const dropped = [...this.queue];
    for (const { timerId, request } of this.retrying.values()) {
      clearTimeout(timerId);
      dropped.push(request);
    }
    this.queue = [];
    this.retrying.clear();

    dropped.forEach(request => {
      request.reject(new Error('Queue cleared'));
    });

    this.logger.log({
      timestamp: new Date(),
      eventType: 'CLEARED',
      dropped: dropped.length
    });
  }
}
