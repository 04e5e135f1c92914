import { type ChildProcess, type SpawnOptions, spawn } from "node:child_process";
import { existsSync } from "node:fs";
import type { ILogger, PlatformTarget } from "@/@types";
import { GAME_DIR_ENV, SDL2_LIBRARY } from "@/download/config/constants";
import type { AssetResolver } from "@/download/core/AssetResolver";
import { checkRuntimeLibrary } from "@/download/core/DependencyInstaller";
import { describeError, LaunchError } from "@/errors";
import { getLogger } from "@/logging";
import type { Version } from "@/version/Version";

export interface LaunchCommand {
	command: string;
	args: string[];
	env: NodeJS.ProcessEnv;
}

export type SpawnFunction = (
	command: string,
	args: string[],
	options: SpawnOptions,
) => ChildProcess;

export interface VersionRunnerOptions {
	gameDir: string;
	versionsDir: string;
	target: PlatformTarget;
	resolver: AssetResolver;
	logger?: ILogger | undefined;
	/** Replaces `checkRuntimeLibrary` */
	runtimeLibraryCheck?:
		| ((target: PlatformTarget, versionsDir: string) => boolean)
		| undefined;
	spawn?: SpawnFunction | undefined;
}

/**
 * Starts an installed build as a detached process
 */
export class VersionRunner {
	private readonly options: VersionRunnerOptions;
	private readonly logger: ILogger;

	constructor(options: VersionRunnerOptions) {
		this.options = options;
		this.logger = options.logger ?? getLogger();
	}

	/**
	 * Command line for a build; app bundles go through `open` on macOS
	 */
	buildLaunchCommand(version: Version): LaunchCommand {
		const { gameDir, versionsDir, resolver, target } = this.options;
		const binaryPath = resolver.installedBinaryPath(versionsDir, version);
		const env = { ...process.env, [GAME_DIR_ENV]: gameDir };

		if (target.platform === "macos") {
			return { command: "open", args: [binaryPath], env };
		}

		return { command: binaryPath, args: [], env };
	}

	/**
	 * Start `version`, which must already be installed
	 *
	 * @returns pid of the started process
	 */
	async run(version: Version): Promise<number | undefined> {
		const { target, versionsDir, resolver } = this.options;
		const checkLibrary = this.options.runtimeLibraryCheck ?? checkRuntimeLibrary;

		if (!checkLibrary(target, versionsDir)) {
			throw new LaunchError(runtimeLibraryHint(target, versionsDir));
		}

		const binaryPath = resolver.installedBinaryPath(versionsDir, version);
		if (!existsSync(binaryPath)) {
			throw new LaunchError(
				`Failed to launch version ${version.tag}: ${binaryPath} does not exist`,
			);
		}

		const { command, args, env } = this.buildLaunchCommand(version);
		const spawnOptions: SpawnOptions = {
			env,
			detached: true,
			stdio: "ignore",
		};

		this.logger.info("Launching version", {
			version: version.toString(),
			command,
			args,
		});

		const spawnProcess: SpawnFunction = this.options.spawn ?? spawn;

		return new Promise((resolve, reject) => {
			let child: ChildProcess;
			try {
				child = spawnProcess(command, args, spawnOptions);
			} catch (error) {
				reject(launchFailure(version, binaryPath, error));
				return;
			}

			child.once("error", (error) => {
				reject(launchFailure(version, binaryPath, error));
			});
			child.once("spawn", () => {
				child.unref();
				resolve(child.pid);
			});
		});
	}
}

function launchFailure(
	version: Version,
	binaryPath: string,
	error: unknown,
): LaunchError {
	return new LaunchError(
		`Failed to launch version ${version.tag} at ${binaryPath}: ${describeError(error)}`,
		error,
	);
}

function runtimeLibraryHint(target: PlatformTarget, versionsDir: string): string {
	switch (target.platform) {
		case "windows":
			return `SDL2 library is not installed. Please put the correct ${SDL2_LIBRARY} depending on your architecture into ${versionsDir} to run the game.`;
		case "linux":
			return "SDL2 library is not installed. Please install sdl2-compat using your package manager to run the game.";
		default:
			return `SDL2 library is not available on ${target.platform}-${target.arch}.`;
	}
}
