import type { ProgressEvent } from "@/@types";
import { DOWNLOAD_CONFIG } from "../config/constants";

type Waiter = (event: ProgressEvent | null) => void;

/**
 * Bounded FIFO shared by one sender and one receiver
 */
class ProgressQueue {
	private readonly events: ProgressEvent[] = [];
	private waiter: Waiter | null = null;
	private closed = false;
	private dropped = 0;

	constructor(readonly capacity: number) {}

	get pending(): number {
		return this.events.length;
	}

	get droppedCount(): number {
		return this.dropped;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	push(event: ProgressEvent): boolean {
		if (this.closed) {
			return false;
		}

		if (this.waiter) {
			const waiter = this.waiter;
			this.waiter = null;
			waiter(event);
			return true;
		}

		if (this.events.length >= this.capacity) {
			this.dropped++;
			return false;
		}

		this.events.push(event);
		return true;
	}

	shift(): ProgressEvent | undefined {
		return this.events.shift();
	}

	wait(): Promise<ProgressEvent | null> {
		if (this.waiter) {
			return Promise.reject(
				new Error("Progress channel already has a pending receive"),
			);
		}

		return new Promise((resolve) => {
			this.waiter = resolve;
		});
	}

	close(): void {
		this.closed = true;
		if (this.waiter) {
			const waiter = this.waiter;
			this.waiter = null;
			waiter(null);
		}
	}
}

/**
 * Producer handle held by the download task
 */
export class ProgressSender {
	constructor(private readonly queue: ProgressQueue) {}

	/**
	 * Queue an event without waiting. When the channel is full or closed the
	 * event is dropped and false is returned.
	 */
	trySend(event: ProgressEvent): boolean {
		return this.queue.push(event);
	}

	/** Events dropped because the channel was full */
	get dropped(): number {
		return this.queue.droppedCount;
	}

	close(): void {
		this.queue.close();
	}
}

/**
 * Consumer handle held by the event loop that renders progress
 */
export class ProgressReceiver implements AsyncIterable<ProgressEvent> {
	constructor(private readonly queue: ProgressQueue) {}

	get pending(): number {
		return this.queue.pending;
	}

	/**
	 * Next event in send order, or null once the channel is closed and drained
	 */
	receive(): Promise<ProgressEvent | null> {
		const next = this.queue.shift();
		if (next) {
			return Promise.resolve(next);
		}

		if (this.queue.isClosed) {
			return Promise.resolve(null);
		}

		return this.queue.wait();
	}

	/**
	 * Next event if one is already queued
	 */
	tryReceive(): ProgressEvent | undefined {
		return this.queue.shift();
	}

	async *[Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
		while (true) {
			const event = await this.receive();
			if (event === null) {
				return;
			}
			yield event;
		}
	}
}

export interface ProgressChannel {
	sender: ProgressSender;
	receiver: ProgressReceiver;
}

/**
 * Create a bounded, drop-on-overflow channel of progress events
 */
export function createProgressChannel(
	capacity: number = DOWNLOAD_CONFIG.PROGRESS_CHANNEL_CAPACITY,
): ProgressChannel {
	if (!Number.isInteger(capacity) || capacity < 1) {
		throw new RangeError(
			`Progress channel capacity must be a positive integer, got ${capacity}`,
		);
	}

	const queue = new ProgressQueue(capacity);
	return {
		sender: new ProgressSender(queue),
		receiver: new ProgressReceiver(queue),
	};
}
