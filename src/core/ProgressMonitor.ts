import type { ILogger, ProgressEvent } from "@/@types";
import { DOWNLOAD_CONFIG } from "@/download/config/constants";
import type { ProgressReceiver } from "@/download/core/ProgressChannel";
import { describeError } from "@/errors";
import { getLogger } from "@/logging";
import type { LauncherEventEmitter } from "./EventEmitter";

export interface ProgressMonitorOptions {
	/** Delay before a finished download resets to idle */
	cooldownMs?: number | undefined;
	logger?: ILogger | undefined;
}

const IDLE: ProgressEvent = { kind: "idle" };

/**
 * Consumer side of the progress channel. Keeps the latest event as the
 * UI-visible state and re-emits every change as a `progress` event.
 */
export class ProgressMonitor {
	private current: ProgressEvent = IDLE;
	private resetTimer: NodeJS.Timeout | null = null;
	private loop: Promise<void> | null = null;
	private readonly cooldownMs: number;
	private readonly logger: ILogger;

	constructor(
		private readonly receiver: ProgressReceiver,
		private readonly events: LauncherEventEmitter,
		options: ProgressMonitorOptions = {},
	) {
		this.cooldownMs =
			options.cooldownMs ?? DOWNLOAD_CONFIG.FINISHED_BANNER_COOLDOWN_MS;
		this.logger = options.logger ?? getLogger();
	}

	get state(): ProgressEvent {
		return this.current;
	}

	/**
	 * Start draining the channel. Resolves once the channel is closed.
	 */
	start(): Promise<void> {
		if (!this.loop) {
			this.loop = this.consume();
		}
		return this.loop;
	}

	/**
	 * Apply one event to the state
	 */
	handle(event: ProgressEvent): void {
		this.clearResetTimer();
		this.update(event);

		if (event.kind === "finished") {
			this.resetTimer = setTimeout(() => {
				this.resetTimer = null;
				this.update(IDLE);
			}, this.cooldownMs);
		}
	}

	/**
	 * Cancel a pending reset to idle
	 */
	stop(): void {
		this.clearResetTimer();
	}

	private async consume(): Promise<void> {
		for await (const event of this.receiver) {
			this.handle(event);
		}
		this.logger.debug("Progress channel closed");
	}

	private update(event: ProgressEvent): void {
		this.current = event;
		try {
			this.events.emit("progress", event);
		} catch (error) {
			this.logger.error("Progress listener failed", {
				kind: event.kind,
				error: describeError(error),
			});
		}
	}

	private clearResetTimer(): void {
		if (this.resetTimer) {
			clearTimeout(this.resetTimer);
			this.resetTimer = null;
		}
	}
}
