import { mkdir } from "node:fs/promises";
import path from "node:path";
import type {
	DownloadRequestResult,
	ILogger,
	LauncherEvents,
	LauncherOptions,
	LoggerConfig,
	PlatformTarget,
	ProgressEvent,
	RunResult,
	VersionRegistry,
} from "@/@types";
import { DOWNLOAD_CONFIG } from "@/download/config/constants";
import { DownloadEngine } from "@/download/core/DownloadEngine";
import {
	createProgressChannel,
	type ProgressChannel,
} from "@/download/core/ProgressChannel";
import {
	FileSystemError,
	LaunchError,
	toLauncherError,
	VersionParseError,
} from "@/errors";
import { initializeLogging, Logger, shutdownLogging } from "@/logging";
import { JsonVersionRegistry } from "@/registry/JsonVersionRegistry";
import { getPlatformTarget } from "@/utils/platform";
import { Version } from "@/version/Version";
import { LauncherEventEmitter } from "./EventEmitter";
import { ProgressMonitor } from "./ProgressMonitor";
import { VersionRunner } from "./VersionRunner";

export interface LauncherDependencies {
	engine?: DownloadEngine | undefined;
	runner?: VersionRunner | undefined;
}

/**
 * Entry point for a launcher front end: owns the installed-version registry,
 * starts downloads one at a time and runs installed builds.
 */
export class Launcher {
	readonly gameDir: string;
	readonly versionsDir: string;
	readonly target: PlatformTarget;

	private readonly eventEmitter: LauncherEventEmitter;
	private readonly registry: VersionRegistry;
	private readonly engine: DownloadEngine;
	private readonly runner: VersionRunner;
	private readonly channel: ProgressChannel;
	private readonly monitor: ProgressMonitor;
	private readonly logger: ILogger;
	private downloading = false;
	private initialized = false;
	private monitorLoop: Promise<void> | null = null;

	constructor(
		options: LauncherOptions,
		dependencies: LauncherDependencies = {},
	) {
		this.gameDir = path.resolve(options.gameDir);
		this.versionsDir = path.join(this.gameDir, DOWNLOAD_CONFIG.VERSIONS_DIR);
		this.target = options.target ?? getPlatformTarget();

		this.logger = this.createLogger(options);

		this.eventEmitter = new LauncherEventEmitter();
		this.registry =
			options.registry ??
			JsonVersionRegistry.forGameDir(this.gameDir, this.logger);

		this.engine =
			dependencies.engine ??
			new DownloadEngine(
				{
					gameDir: this.gameDir,
					target: this.target,
					releaseSource: options.releaseSource,
					now: options.now,
					logger: this.logger,
				},
				{ events: this.eventEmitter },
			);

		this.runner =
			dependencies.runner ??
			new VersionRunner({
				gameDir: this.gameDir,
				versionsDir: this.versionsDir,
				target: this.target,
				resolver: this.engine.resolver,
				logger: this.logger,
			});

		this.channel = createProgressChannel(
			options.progressCapacity ?? DOWNLOAD_CONFIG.PROGRESS_CHANNEL_CAPACITY,
		);
		this.monitor = new ProgressMonitor(
			this.channel.receiver,
			this.eventEmitter,
			{
				cooldownMs: options.finishedBannerCooldownMs,
				logger: this.logger,
			},
		);

		this.logger.info("Launcher created", {
			gameDir: this.gameDir,
			target: `${this.target.platform}-${this.target.arch}`,
		});
	}

	private createLogger(options: LauncherOptions): ILogger {
		const logging = options.logging;

		if (logging?.customLogger) {
			return logging.customLogger;
		}

		const config: Partial<LoggerConfig> = {
			logFilePath: path.join(this.gameDir, "logs", "launcher.log"),
			...logging?.config,
		};
		if (logging?.enabled === false) {
			config.enableConsole = false;
			config.enableFile = false;
		}

		return initializeLogging(config);
	}

	/**
	 * Create the versions directory, load the registry and start listening
	 * for progress. Must be awaited before the first download.
	 */
	async initialize(): Promise<void> {
		if (this.initialized) {
			return;
		}

		try {
			await mkdir(this.versionsDir, { recursive: true });
		} catch (error) {
			throw new FileSystemError(
				`Failed to create versions directory ${this.versionsDir}`,
				this.versionsDir,
				error,
			);
		}

		await this.registry.load();

		this.engine.setProgressSender(this.channel.sender);
		this.monitorLoop = this.monitor.start().catch((error: unknown) => {
			this.logger.error("Progress monitor stopped", {
				error: toLauncherError(error, "Progress monitor failed").message,
			});
		});

		this.initialized = true;
		this.logger.info("Launcher initialized", {
			installedVersions: this.registry.list().map(String),
		});
	}

	get isDownloading(): boolean {
		return this.downloading;
	}

	/**
	 * Installed versions, most recent first
	 */
	get installedVersions(): Version[] {
		return this.registry.list();
	}

	get progressState(): ProgressEvent {
		return this.monitor.state;
	}

	isInstalled(version: Version): boolean {
		return this.registry.has(version);
	}

	/**
	 * Download and install a version entered by the user.
	 *
	 * Invalid input is rejected, installed versions are left alone and only
	 * one download runs at a time.
	 */
	async downloadVersion(input: string | Version): Promise<DownloadRequestResult> {
		const parsed = this.parseInput(input);
		if (!(parsed instanceof Version)) {
			this.logger.warn("Invalid version format", {
				input: parsed.input,
				field: parsed.field,
			});
			return { status: "rejected", input: parsed.input, error: parsed };
		}

		const version = parsed;
		if (this.registry.has(version)) {
			this.logger.debug("Version already installed", {
				version: version.toString(),
			});
			return { status: "already-installed", version };
		}

		if (this.downloading) {
			this.logger.warn("Download already in progress", {
				requested: version.toString(),
			});
			return { status: "busy" };
		}

		this.downloading = true;
		const startTime = Date.now();

		try {
			await this.engine.downloadVersion(version);

			this.registry.add(version);
			try {
				await this.registry.save();
			} catch (error) {
				// the set must not claim a version versions.json does not list
				this.registry.remove(version);
				throw error;
			}

			const binaryPath = this.engine.binaryPath(version);
			this.eventEmitter.emit("installed", {
				version,
				binaryPath,
				duration: Date.now() - startTime,
			});
			this.logger.info(`Version ${version.tag} downloaded successfully`);

			return { status: "installed", version, binaryPath };
		} catch (error) {
			const failure = toLauncherError(
				error,
				`Failed to download version ${version.tag}`,
			);
			this.eventEmitter.emit("failed", { version, error: failure });
			this.logger.error("Version download failed", {
				version: version.toString(),
				error: failure.message,
			});

			return { status: "failed", version, error: failure };
		} finally {
			this.downloading = false;
		}
	}

	/**
	 * Start an installed version
	 */
	async runVersion(input: string | Version): Promise<RunResult> {
		const parsed = this.parseInput(input);
		if (!(parsed instanceof Version)) {
			return { success: false, error: parsed };
		}

		const version = parsed;
		if (!this.registry.has(version)) {
			return {
				success: false,
				error: new LaunchError(`Version ${version.tag} is not available`),
			};
		}

		try {
			const pid = await this.runner.run(version);
			return { success: true, version, pid };
		} catch (error) {
			const failure =
				error instanceof LaunchError
					? error
					: new LaunchError(
							`Failed to launch version ${version.tag}: ${toLauncherError(error, "Launch failed").message}`,
							error,
						);
			this.logger.error("Error running version", { error: failure.message });
			return { success: false, error: failure };
		}
	}

	on<K extends keyof LauncherEvents>(event: K, listener: LauncherEvents[K]): this {
		this.eventEmitter.on(event, listener);
		return this;
	}

	off<K extends keyof LauncherEvents>(event: K, listener: LauncherEvents[K]): this {
		this.eventEmitter.off(event, listener);
		return this;
	}

	/**
	 * Close the progress channel and wait for pending log writes
	 */
	async dispose(): Promise<void> {
		this.channel.sender.close();
		if (this.monitorLoop) {
			await this.monitorLoop;
		}
		this.monitor.stop();
		this.eventEmitter.removeAllListeners();
		if (this.logger instanceof Logger) {
			await this.logger.flush();
		}
		await shutdownLogging();
	}

	private parseInput(input: string | Version): Version | VersionParseError {
		if (input instanceof Version) {
			return input;
		}

		try {
			return Version.parse(input);
		} catch (error) {
			if (error instanceof VersionParseError) {
				return error;
			}
			throw error;
		}
	}
}
