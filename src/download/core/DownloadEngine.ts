import { chmod, mkdir } from "node:fs/promises";
import path from "node:path";
import type {
	DownloadEngineOptions,
	DownloadPhase,
	ILogger,
	PlatformTarget,
} from "@/@types";
import type { LauncherEventEmitter } from "@/core/EventEmitter";
import {
	describeError,
	FileSystemError,
	type LauncherError,
	ProgressChannelError,
	ResolutionError,
	toLauncherError,
} from "@/errors";
import { getLogger } from "@/logging";
import { isPosixPlatform } from "@/utils/platform";
import type { Version } from "@/version/Version";
import { DOWNLOAD_CONFIG, USER_AGENT } from "../config/constants";
import { AssetResolver } from "./AssetResolver";
import { DependencyInstaller } from "./DependencyInstaller";
import type { ProgressSender } from "./ProgressChannel";
import { getContentLength, ProgressSampler } from "./ProgressSampler";
import { requestOrThrow, streamToFile } from "./streamToFile";

export interface DownloadEngineDependencies {
	events?: LauncherEventEmitter | undefined;
	resolver?: AssetResolver | undefined;
	dependencyInstaller?: DependencyInstaller | undefined;
}

/**
 * Installs one game build per call:
 * fetch release metadata, pick the asset for this platform, stream it into
 * `<gameDir>/versions`, add the runtime library if needed, mark it
 * executable.
 *
 * Progress samples go through the progress channel; phase changes are
 * emitted as `phase` events. The engine has no notion of which versions are
 * already installed, callers decide whether to start a download.
 */
export class DownloadEngine {
	readonly gameDir: string;
	readonly versionsDir: string;
	readonly target: PlatformTarget;
	readonly resolver: AssetResolver;

	private readonly userAgent: string;
	private readonly sampleIntervalMs: number;
	private readonly now: () => number;
	private readonly logger: ILogger;
	private readonly events: LauncherEventEmitter | undefined;
	private readonly dependencyInstaller: DependencyInstaller;
	private progressSender: ProgressSender | null = null;

	constructor(
		options: DownloadEngineOptions,
		dependencies: DownloadEngineDependencies = {},
	) {
		this.gameDir = path.resolve(options.gameDir);
		this.versionsDir = path.join(this.gameDir, DOWNLOAD_CONFIG.VERSIONS_DIR);
		this.target = options.target;
		this.userAgent = options.userAgent ?? USER_AGENT;
		this.sampleIntervalMs =
			options.sampleIntervalMs ?? DOWNLOAD_CONFIG.SAMPLE_INTERVAL_MS;
		this.now = options.now ?? Date.now;
		this.logger = options.logger ?? getLogger();
		this.events = dependencies.events;
		this.resolver =
			dependencies.resolver ??
			new AssetResolver(options.target, options.releaseSource);
		this.dependencyInstaller =
			dependencies.dependencyInstaller ??
			new DependencyInstaller({
				target: options.target,
				userAgent: this.userAgent,
				logger: this.logger,
			});
	}

	/**
	 * Wire the producer side of the progress channel. Must happen before the
	 * first download.
	 */
	setProgressSender(sender: ProgressSender): void {
		this.progressSender = sender;
	}

	binaryPath(version: Version): string {
		return this.resolver.installedBinaryPath(this.versionsDir, version);
	}

	/**
	 * Download and install `version`.
	 *
	 * @returns the installed version
	 * @throws LauncherError naming the version and the failing step
	 */
	async downloadVersion(version: Version): Promise<Version> {
		const sender = this.progressSender;
		if (sender === null) {
			throw new ProgressChannelError(
				`Progress sender not set; cannot download version ${version.tag}`,
			);
		}

		const startTime = this.now();
		this.logger.info("Starting download", {
			version: version.toString(),
			target: `${this.target.platform}-${this.target.arch}`,
		});

		try {
			this.setPhase(version, "fetching-metadata");
			const metadata = await this.fetchReleaseMetadata(version);

			this.setPhase(version, "resolving-asset");
			const downloadUrl = this.resolver.selectAssetUrl(metadata, version);

			this.setPhase(version, "streaming");
			const binaryPath = await this.streamAsset(
				version,
				downloadUrl,
				sender,
			);

			if (!this.dependencyInstaller.isInstalled(this.versionsDir)) {
				this.setPhase(version, "installing-dependency");
				await this.dependencyInstaller.ensureInstalled(
					this.versionsDir,
					version,
				);
			}

			this.setPhase(version, "finalizing");
			await this.finalize(binaryPath);

			this.setPhase(version, "succeeded");
			this.logger.info("Download completed", {
				version: version.toString(),
				binaryPath,
				duration: this.now() - startTime,
			});

			return version;
		} catch (error) {
			const failure: LauncherError = toLauncherError(
				error,
				`Failed to download version ${version.tag}`,
			);
			this.setPhase(version, "failed");
			this.logger.error("Download failed", {
				version: version.toString(),
				error: failure.message,
			});
			throw failure;
		}
	}

	private async fetchReleaseMetadata(version: Version): Promise<unknown> {
		const url = this.resolver.releaseMetadataUrl(version);
		this.logger.debug("Fetching release metadata", { url });

		const response = await requestOrThrow(url, {
			userAgent: this.userAgent,
			accept: "application/vnd.github+json",
			failureMessage: `Failed to fetch release info for version ${version.tag}`,
			statusMessage: (status) =>
				`Release for version ${version.tag} not found (HTTP ${status})`,
		});

		try {
			return await response.json();
		} catch (error) {
			throw new ResolutionError(
				`Failed to parse release info for version ${version.tag}: ${describeError(error)}`,
				{ cause: error },
			);
		}
	}

	private async streamAsset(
		version: Version,
		downloadUrl: string,
		sender: ProgressSender,
	): Promise<string> {
		const failureMessage = `Failed to download asset for version ${version.tag}`;
		const response = await requestOrThrow(downloadUrl, {
			userAgent: this.userAgent,
			failureMessage,
			statusMessage: (status) => `${failureMessage} (HTTP ${status})`,
		});

		try {
			await mkdir(this.versionsDir, { recursive: true });
		} catch (error) {
			await response.body?.cancel().catch(() => undefined);
			throw new FileSystemError(
				`Failed to create versions directory ${this.versionsDir}: ${describeError(error)}`,
				this.versionsDir,
				error,
			);
		}

		const binaryPath = this.binaryPath(version);
		const sampler = new ProgressSampler({
			totalBytes: getContentLength(response.headers),
			intervalMs: this.sampleIntervalMs,
			now: this.now,
		});

		if (sampler.isSilent) {
			this.logger.debug("Content length unknown, streaming without progress", {
				version: version.toString(),
			});
		}

		this.logger.info("Writing executable", { path: binaryPath });

		await streamToFile(response, binaryPath, {
			failureMessage,
			onChunk: (bytes) => {
				const sample = sampler.record(bytes);
				if (sample) {
					sender.trySend(sample);
				}
			},
		});

		sender.trySend({ kind: "finished" });
		return binaryPath;
	}

	private async finalize(binaryPath: string): Promise<void> {
		if (!isPosixPlatform(this.target.platform)) {
			return;
		}

		try {
			await chmod(binaryPath, DOWNLOAD_CONFIG.EXECUTABLE_MODE);
		} catch (error) {
			throw new FileSystemError(
				`Failed to set permissions for ${binaryPath}: ${describeError(error)}`,
				binaryPath,
				error,
			);
		}
	}

	private setPhase(version: Version, phase: DownloadPhase): void {
		this.logger.debug("Download phase changed", {
			version: version.toString(),
			phase,
		});
		this.events?.emit("phase", { version, phase, timestamp: new Date() });
	}
}
