import { mkdir, readFile, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import type { ILogger, TargetPlatform } from "@/@types";
import { DOWNLOAD_CONFIG, PRODUCT_PREFIX, USER_AGENT } from "@/download/config/constants";
import { describeError, FileSystemError } from "@/errors";
import { getLogger } from "@/logging";
import { getPlatformTarget } from "@/utils/platform";

export const SETTINGS_FILE = "launcher_settings.json";

export interface LauncherSettings {
	/** Directory holding installed builds and game data */
	gameDir: string;
}

/**
 * Where the platform keeps per-user data and configuration
 */
export interface SettingsEnvironment {
	platform: TargetPlatform;
	env: NodeJS.ProcessEnv;
	homeDir: string;
}

export interface SettingsOptions {
	/** Defaults to `<config dir>/mineplace3d-launcher/launcher_settings.json` */
	settingsPath?: string | undefined;
	environment?: SettingsEnvironment | undefined;
	logger?: ILogger | undefined;
}

const settingsFileSchema = z.object({
	game_dir: z.string().min(1),
});

export function currentEnvironment(): SettingsEnvironment {
	return {
		platform: getPlatformTarget().platform,
		env: process.env,
		homeDir: os.homedir(),
	};
}

export function resolveDataDir({ platform, env, homeDir }: SettingsEnvironment): string {
	switch (platform) {
		case "windows":
			return env.APPDATA ?? path.join(homeDir, "AppData", "Roaming");
		case "macos":
			return path.join(homeDir, "Library", "Application Support");
		default:
			return env.XDG_DATA_HOME || path.join(homeDir, ".local", "share");
	}
}

export function resolveConfigDir({ platform, env, homeDir }: SettingsEnvironment): string {
	switch (platform) {
		case "windows":
			return env.APPDATA ?? path.join(homeDir, "AppData", "Roaming");
		case "macos":
			return path.join(homeDir, "Library", "Application Support");
		default:
			return env.XDG_CONFIG_HOME || path.join(homeDir, ".config");
	}
}

export function resolveDefaultGameDir(
	environment: SettingsEnvironment = currentEnvironment(),
): string {
	return path.join(resolveDataDir(environment), PRODUCT_PREFIX);
}

export function getSettingsPath(
	environment: SettingsEnvironment = currentEnvironment(),
): string {
	return path.join(resolveConfigDir(environment), USER_AGENT, SETTINGS_FILE);
}

export function defaultSettings(
	environment: SettingsEnvironment = currentEnvironment(),
): LauncherSettings {
	return { gameDir: resolveDefaultGameDir(environment) };
}

/**
 * Read the settings file. A missing or unreadable file yields the defaults.
 */
export async function loadLauncherSettings(
	options: SettingsOptions = {},
): Promise<LauncherSettings> {
	const environment = options.environment ?? currentEnvironment();
	const settingsPath = options.settingsPath ?? getSettingsPath(environment);
	const logger = options.logger ?? getLogger();

	let raw: string;
	try {
		raw = await readFile(settingsPath, "utf8");
	} catch (error) {
		if (!isMissingFile(error)) {
			logger.warn("Failed to read launcher settings, using defaults", {
				path: settingsPath,
				error: describeError(error),
			});
		}
		return defaultSettings(environment);
	}

	let data: unknown;
	try {
		data = JSON.parse(raw);
	} catch (error) {
		logger.warn("Launcher settings are not valid JSON, using defaults", {
			path: settingsPath,
			error: describeError(error),
		});
		return defaultSettings(environment);
	}

	const result = settingsFileSchema.safeParse(data);
	if (!result.success) {
		logger.warn("Launcher settings are malformed, using defaults", {
			path: settingsPath,
			issues: result.error.issues.map((issue) => issue.message),
		});
		return defaultSettings(environment);
	}

	return { gameDir: result.data.game_dir };
}

export async function saveLauncherSettings(
	settings: LauncherSettings,
	options: SettingsOptions = {},
): Promise<void> {
	const settingsPath =
		options.settingsPath ??
		getSettingsPath(options.environment ?? currentEnvironment());

	try {
		await mkdir(path.dirname(settingsPath), { recursive: true });
		await writeFile(
			settingsPath,
			`${JSON.stringify({ game_dir: settings.gameDir }, null, 2)}\n`,
			"utf8",
		);
	} catch (error) {
		throw new FileSystemError(
			`Failed to save launcher settings to ${settingsPath}: ${describeError(error)}`,
			settingsPath,
			error,
		);
	}
}

/**
 * Create the game directory and its `versions` directory
 *
 * @returns the versions directory
 */
export async function setupFolderStructure(gameDir: string): Promise<string> {
	const versionsDir = path.join(gameDir, DOWNLOAD_CONFIG.VERSIONS_DIR);
	try {
		await mkdir(versionsDir, { recursive: true });
	} catch (error) {
		throw new FileSystemError(
			`Failed to create versions directory ${versionsDir}: ${describeError(error)}`,
			versionsDir,
			error,
		);
	}
	return versionsDir;
}

function isMissingFile(error: unknown): boolean {
	return (
		error instanceof Error &&
		"code" in error &&
		error.code === "ENOENT"
	);
}
