import type { Logger } from '@actionlog/logging';
import pLimit from 'p-limit';

export type BackgroundTask = () => Promise<unknown>;

export interface BackgroundQueueConfig {
	/** Tasks running at once */
	readonly concurrency: number;
	/** Tasks allowed to wait for a free slot before new ones are dropped */
	readonly backlog: number;
}

export type BackgroundQueueState = 'RUNNING' | 'DRAINING' | 'STOPPED';

export interface BackgroundQueueStats {
	readonly state: BackgroundQueueState;
	readonly active: number;
	readonly waiting: number;
	readonly completed: number;
	readonly failed: number;
	readonly dropped: number;
}

/**
 * Bounded fire-and-forget executor for action log writes.
 * Producers never wait on it; when it is full new work is dropped.
 */
export class BackgroundQueue {
	private readonly logger: Logger;
	private readonly capacity: number;
	private readonly concurrencyLimiter: ReturnType<typeof pLimit>;
	private readonly inFlight = new Set<Promise<void>>();

	private state: BackgroundQueueState = 'RUNNING';
	private completed = 0;
	private failed = 0;
	private dropped = 0;

	constructor(config: BackgroundQueueConfig, logger: Logger) {
		if (config.concurrency < 1) {
			throw new Error(`Background queue concurrency must be at least 1, got ${config.concurrency}`);
		}
		this.logger = logger.child({ component: 'BackgroundQueue' });
		this.capacity = config.concurrency + Math.max(config.backlog, 0);
		this.concurrencyLimiter = pLimit(config.concurrency);
	}

	/**
	 * Submit a task.
	 * Returns false if the queue is at capacity or no longer running.
	 */
	submit(task: BackgroundTask): boolean {
		if (this.state !== 'RUNNING') {
			this.dropped++;
			this.logger.warn({ state: this.state }, 'Queue not accepting work, action log entry dropped');
			return false;
		}

		if (this.inFlight.size >= this.capacity) {
			this.dropped++;
			this.logger.warn({ queued: this.inFlight.size, capacity: this.capacity }, 'Queue at capacity, action log entry dropped');
			return false;
		}

		const run: Promise<void> = this.concurrencyLimiter(task)
			.then(
				() => {
					this.completed++;
				},
				(error: unknown) => {
					this.failed++;
					this.logger.debug({ err: error }, 'Background task failed');
				},
			)
			.finally(() => {
				this.inFlight.delete(run);
			});
		this.inFlight.add(run);
		return true;
	}

	/**
	 * Resolves once every submitted task has settled, including tasks
	 * submitted while waiting.
	 */
	async flush(): Promise<void> {
		while (this.inFlight.size > 0) {
			await Promise.all([...this.inFlight]);
		}
	}

	/**
	 * Stop accepting work and wait for what is already queued.
	 */
	async drain(): Promise<void> {
		if (this.state === 'STOPPED') {
			return;
		}
		this.state = 'DRAINING';
		this.logger.info({ pending: this.inFlight.size }, 'Draining background queue');
		await this.flush();
		this.state = 'STOPPED';
	}

	getStats(): BackgroundQueueStats {
		return {
			state: this.state,
			active: this.concurrencyLimiter.activeCount,
			waiting: this.concurrencyLimiter.pendingCount,
			completed: this.completed,
			failed: this.failed,
			dropped: this.dropped,
		};
	}
}
