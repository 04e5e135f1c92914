import { spawnSync } from "node:child_process";
import { existsSync } from "node:fs";
import { copyFile, mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import extract from "extract-zip";
import type {
	DependencyInstallerOptions,
	ILogger,
	PlatformTarget,
	RuntimeDependency,
} from "@/@types";
import { ArchiveError, describeError, FileSystemError } from "@/errors";
import { getLogger } from "@/logging";
import type { Version } from "@/version/Version";
import {
	RUNTIME_DEPENDENCIES,
	SDL2_LIBRARY,
	SDL2_TEMP_ARCHIVE,
	USER_AGENT,
} from "../config/constants";
import { requestOrThrow, streamToFile } from "./streamToFile";

/**
 * Fetches the shared library a game build needs at runtime when the
 * platform does not provide it. Only Windows builds need one (SDL2.dll),
 * placed next to the installed executables.
 */
export class DependencyInstaller {
	private readonly target: PlatformTarget;
	private readonly userAgent: string;
	private readonly logger: ILogger;

	constructor(options: DependencyInstallerOptions) {
		this.target = options.target;
		this.userAgent = options.userAgent ?? USER_AGENT;
		this.logger = options.logger ?? getLogger();
	}

	/**
	 * Archive to install from on this platform, or null when nothing is needed
	 */
	getRequirement(): RuntimeDependency | null {
		const { platform, arch } = this.target;
		return RUNTIME_DEPENDENCIES[`${platform}-${arch}`] ?? null;
	}

	isInstalled(versionsDir: string): boolean {
		const requirement = this.getRequirement();
		return (
			requirement === null ||
			existsSync(path.join(versionsDir, requirement.fileName))
		);
	}

	/**
	 * Download and unpack the runtime library into `versionsDir` if it is
	 * required and missing.
	 *
	 * @returns path of the installed library, or null when nothing was done
	 */
	async ensureInstalled(
		versionsDir: string,
		version: Version,
	): Promise<string | null> {
		const requirement = this.getRequirement();
		if (requirement === null || this.isInstalled(versionsDir)) {
			return null;
		}

		const { fileName, archiveUrl } = requirement;
		const libraryPath = path.join(versionsDir, fileName);
		const archivePath = path.join(versionsDir, SDL2_TEMP_ARCHIVE);

		this.logger.info(`Installing ${fileName}`, {
			version: version.toString(),
			archiveUrl,
		});

		const response = await requestOrThrow(archiveUrl, {
			userAgent: this.userAgent,
			failureMessage: `Failed to download ${fileName} for version ${version.tag}`,
			statusMessage: (status) =>
				`Failed to download ${fileName} for version ${version.tag} (HTTP ${status})`,
		});

		await streamToFile(response, archivePath, {
			failureMessage: `Failed to download ${fileName} for version ${version.tag}`,
		});

		const stagingDir = await mkdtemp(path.join(os.tmpdir(), "mineplace3d-deps-"));
		try {
			await this.extractArchive(archivePath, stagingDir, fileName);

			const extracted = path.join(stagingDir, fileName);
			if (!existsSync(extracted)) {
				throw new ArchiveError(
					`Failed to find ${fileName} in zip archive ${archiveUrl}`,
					"member-not-found",
				);
			}

			try {
				await copyFile(extracted, libraryPath);
			} catch (error) {
				throw new FileSystemError(
					`Failed to write ${fileName} file: ${describeError(error)}`,
					libraryPath,
					error,
				);
			}
		} finally {
			await rm(stagingDir, { recursive: true, force: true });
		}

		try {
			await rm(archivePath);
		} catch (error) {
			throw new ArchiveError(
				`Failed to remove temporary ${fileName} zip file: ${describeError(error)}`,
				"cleanup",
				error,
			);
		}

		this.logger.info(`Installed ${fileName}`, { path: libraryPath });
		return libraryPath;
	}

	private async extractArchive(
		archivePath: string,
		destDir: string,
		fileName: string,
	): Promise<void> {
		try {
			await extract(archivePath, { dir: destDir });
		} catch (error) {
			const message = describeError(error);
			// yauzl rejects files without a central directory before writing anything
			const step = /end of central directory/i.test(message) ? "open" : "extract";
			throw new ArchiveError(
				`Failed to ${step} ${fileName} zip archive: ${message}`,
				step,
				error,
			);
		}
	}
}

/**
 * Whether the runtime library a build needs can be found.
 *
 * Windows looks next to the installed builds, Linux asks the dynamic linker
 * cache, macOS app bundles ship the framework themselves.
 */
export function checkRuntimeLibrary(
	target: PlatformTarget,
	versionsDir: string,
): boolean {
	switch (target.platform) {
		case "windows":
			return existsSync(path.join(versionsDir, SDL2_LIBRARY));
		case "linux": {
			const result = spawnSync("ldconfig", ["-p"], { encoding: "utf8" });
			if (result.error || result.status !== 0) {
				return false;
			}
			return result.stdout.includes("libSDL2");
		}
		case "macos":
			return true;
		default:
			return false;
	}
}
