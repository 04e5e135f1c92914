/**
 * Constants for release lookup and download
 */

import type {
	PlatformTarget,
	ReleaseSource,
	RuntimeDependency,
} from "../../@types/download";

/** Prefix of every release asset name */
export const PRODUCT_PREFIX = "mineplace3d";

/** User-Agent sent with every request */
export const USER_AGENT = "mineplace3d-launcher";

/** Environment variable carrying the game directory into the game process */
export const GAME_DIR_ENV = "MINEPLACE3D_GAME_DIR";

/**
 * GitHub repository the game is released from
 */
export const DEFAULT_RELEASE_SOURCE: ReleaseSource = {
	apiBaseUrl: "https://api.github.com",
	owner: "Muhtasim-Rasheed",
	repo: "mineplace3d",
};

export const DOWNLOAD_CONFIG = {
	/** Minimum time between two progress samples */
	SAMPLE_INTERVAL_MS: 250,

	/** Pending progress events before new ones are dropped */
	PROGRESS_CHANNEL_CAPACITY: 100,

	/** Time a finished download stays visible before resetting to idle */
	FINISHED_BANNER_COOLDOWN_MS: 3000,

	/** rwxr-xr-x */
	EXECUTABLE_MODE: 0o755,

	/** Directory under the game directory holding installed builds */
	VERSIONS_DIR: "versions",

	/** Installed version list inside the versions directory */
	VERSIONS_FILE: "versions.json",
} as const;

/** Shared library every Windows build links against */
export const SDL2_LIBRARY = "SDL2.dll";

/** Where the SDL2 archive is kept while it is unpacked */
export const SDL2_TEMP_ARCHIVE = "sdl2_temp.zip";

/**
 * Vendor archives for the SDL2 runtime, keyed by `<platform>-<arch>`
 */
export const RUNTIME_DEPENDENCIES: Readonly<
	Partial<Record<`${PlatformTarget["platform"]}-${PlatformTarget["arch"]}`, RuntimeDependency>>
> = {
	"windows-x86_64": {
		fileName: SDL2_LIBRARY,
		archiveUrl: "https://www.libsdl.org/release/SDL2-2.0.14-win32-x64.zip",
	},
	// No official SDL2 builds exist for Windows on ARM64; this one is community-maintained
	"windows-aarch64": {
		fileName: SDL2_LIBRARY,
		archiveUrl:
			"https://www.github.com/mmozeiko/build-sdl2/releases/download/2025-12-28/SDL2-arm64-2025-12-28.zip",
	},
};
