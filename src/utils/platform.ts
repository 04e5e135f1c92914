import type {
	PlatformTarget,
	TargetArch,
	TargetPlatform,
} from "../@types/download/platform";

// Resolved once per process
let cachedTarget: PlatformTarget | null = null;

export function mapPlatform(platform: NodeJS.Platform): TargetPlatform {
	if (platform === "win32") return "windows";
	if (platform === "darwin") return "macos";
	if (platform === "linux") return "linux";
	return "unknown";
}

export function mapArch(arch: string): TargetArch {
	if (arch === "x64") return "x86_64";
	if (arch === "arm64") return "aarch64";
	return "unknown";
}

/**
 * Platform and architecture of the running process
 */
export function getPlatformTarget(): PlatformTarget {
	if (cachedTarget === null) {
		cachedTarget = {
			platform: mapPlatform(process.platform),
			arch: mapArch(process.arch),
		};
	}

	return cachedTarget;
}

/**
 * File name suffix of game builds on the given platform
 */
export function getExecutableSuffix(platform: TargetPlatform): string {
	switch (platform) {
		case "windows":
			return ".exe";
		case "macos":
			return ".app";
		default:
			return "";
	}
}

/**
 * Whether installed builds need the executable bit set
 */
export function isPosixPlatform(platform: TargetPlatform): boolean {
	return platform !== "windows";
}
