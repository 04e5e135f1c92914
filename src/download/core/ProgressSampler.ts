import type { DownloadProgressEvent } from "@/@types";
import { DOWNLOAD_CONFIG } from "../config/constants";

export interface ProgressSamplerOptions {
	/** Content length, or null when the server did not announce one */
	totalBytes: number | null;
	intervalMs?: number | undefined;
	now?: (() => number) | undefined;
}

/**
 * Turns a stream of chunk sizes into throughput samples over a rolling
 * window. Samples are only produced when the total size is known.
 */
export class ProgressSampler {
	private readonly totalBytes: number | null;
	private readonly intervalMs: number;
	private readonly now: () => number;
	private downloaded = 0;
	private windowStart: number;
	private windowBytes = 0;

	constructor(options: ProgressSamplerOptions) {
		this.totalBytes =
			options.totalBytes !== null && options.totalBytes > 0
				? options.totalBytes
				: null;
		this.intervalMs = options.intervalMs ?? DOWNLOAD_CONFIG.SAMPLE_INTERVAL_MS;
		this.now = options.now ?? Date.now;
		this.windowStart = this.now();
	}

	get bytesDownloaded(): number {
		return this.downloaded;
	}

	get isSilent(): boolean {
		return this.totalBytes === null;
	}

	/**
	 * Account for a chunk; returns a sample when the window elapsed
	 */
	record(chunkBytes: number): DownloadProgressEvent | null {
		this.downloaded += chunkBytes;
		this.windowBytes += chunkBytes;

		const now = this.now();
		const elapsedMs = now - this.windowStart;
		if (elapsedMs < this.intervalMs || this.totalBytes === null) {
			return null;
		}

		const sample: DownloadProgressEvent = {
			kind: "progress",
			fraction: Math.min(this.downloaded / this.totalBytes, 1),
			bytesPerSecond:
				elapsedMs > 0 ? this.windowBytes / (elapsedMs / 1000) : 0,
		};

		this.windowStart = now;
		this.windowBytes = 0;
		return sample;
	}
}

/**
 * Content length announced by a response, or null when absent or unusable
 */
export function getContentLength(headers: Headers): number | null {
	const raw = headers.get("content-length");
	if (raw === null) {
		return null;
	}

	const value = Number.parseInt(raw, 10);
	return Number.isFinite(value) && value > 0 ? value : null;
}
