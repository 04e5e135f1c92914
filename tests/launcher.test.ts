import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type {
	DownloadFailedEvent,
	PlatformTarget,
	ProgressEvent,
	VersionInstalledEvent,
} from "@/@types";
import { Launcher } from "@/core/Launcher";
import { getLogger } from "@/logging";
import { AssetResolver } from "@/download/core/AssetResolver";
import { FileSystemError, LaunchError, StatusError, VersionParseError } from "@/errors";
import { JsonVersionRegistry } from "@/registry/JsonVersionRegistry";
import { Version } from "@/version/Version";
import {
	bodyResponse,
	bytes,
	createTempDir,
	jsonResponse,
	releaseMetadata,
	removeTempDir,
	silentLogger,
	steppingClock,
	stubFetch,
} from "./helpers";

const LINUX: PlatformTarget = { platform: "linux", arch: "x86_64" };
const ASSET_URL = "https://downloads.example.test/mineplace3d-linux-x86_64";
const version = Version.parse("1.2.3");
const metadataUrl = new AssetResolver(LINUX).releaseMetadataUrl(version);

class FullDiskRegistry extends JsonVersionRegistry {
	override async save(): Promise<void> {
		throw new FileSystemError(`Failed to write ${this.filePath}: disk full`, this.filePath);
	}
}

function releaseRoutes() {
	return {
		[metadataUrl]: () =>
			jsonResponse(releaseMetadata({ "mineplace3d-linux-x86_64": ASSET_URL })),
		[ASSET_URL]: () => bodyResponse([bytes("game"), bytes("data")]),
	};
}

describe("Launcher", () => {
	let gameDir: string;
	let launcher: Launcher;

	function createLauncher(): Launcher {
		return new Launcher({
			gameDir,
			target: LINUX,
			now: steppingClock(300),
			logging: { customLogger: silentLogger() },
		});
	}

	beforeEach(async () => {
		gameDir = await createTempDir();
		launcher = createLauncher();
		await launcher.initialize();
	});

	afterEach(async () => {
		await launcher.dispose();
		vi.unstubAllGlobals();
		await removeTempDir(gameDir);
	});

	it("creates the versions directory on initialize", () => {
		expect(existsSync(path.join(gameDir, "versions"))).toBe(true);
		expect(launcher.installedVersions).toEqual([]);
		expect(launcher.progressState).toEqual({ kind: "idle" });
	});

	it("installs a version and records it", async () => {
		stubFetch(releaseRoutes());
		const installed: VersionInstalledEvent[] = [];
		launcher.on("installed", (event) => installed.push(event));

		const result = await launcher.downloadVersion("v1.2.3");

		const binaryPath = path.join(gameDir, "versions", "1.2.3");
		expect(result).toEqual({ status: "installed", version, binaryPath });
		expect(await readFile(binaryPath, "utf8")).toBe("gamedata");
		expect(
			JSON.parse(await readFile(path.join(gameDir, "versions", "versions.json"), "utf8")),
		).toEqual(["1.2.3"]);
		expect(launcher.installedVersions.map(String)).toEqual(["1.2.3"]);
		expect(launcher.isInstalled(version)).toBe(true);
		expect(installed).toHaveLength(1);
		expect(installed[0]?.binaryPath).toBe(binaryPath);
		expect(launcher.isDownloading).toBe(false);
	});

	it("does not download an installed version again", async () => {
		const fetchMock = stubFetch(releaseRoutes());
		await launcher.downloadVersion("1.2.3");
		expect(fetchMock).toHaveBeenCalledTimes(2);

		const again = await launcher.downloadVersion(" v1.2.3 ");

		expect(again).toEqual({ status: "already-installed", version });
		expect(fetchMock).toHaveBeenCalledTimes(2);
	});

	it("remembers installed versions across restarts", async () => {
		await writeFile(
			path.join(gameDir, "versions", "versions.json"),
			JSON.stringify(["1.2.3", "0.9.0-beta.2"]),
		);
		const fetchMock = stubFetch({});
		const restarted = createLauncher();
		await restarted.initialize();

		try {
			expect(restarted.installedVersions.map(String)).toEqual(["1.2.3", "0.9.0-beta.2"]);
			expect(await restarted.downloadVersion("1.2.3")).toEqual({
				status: "already-installed",
				version,
			});
			expect(fetchMock).not.toHaveBeenCalled();
		} finally {
			await restarted.dispose();
		}
	});

	it("rejects input that is not a version without any request", async () => {
		const fetchMock = stubFetch(releaseRoutes());

		const result = await launcher.downloadVersion("1.2");

		expect(result.status).toBe("rejected");
		if (result.status === "rejected") {
			expect(result.input).toBe("1.2");
			expect(result.error).toBeInstanceOf(VersionParseError);
			expect(result.error.field).toBe("core");
		}
		expect(fetchMock).not.toHaveBeenCalled();
	});

	it("answers busy while a download is running", async () => {
		let releaseMetadataResponse: (response: Response) => void = () => undefined;
		const metadataResponse = new Promise<Response>((resolve) => {
			releaseMetadataResponse = resolve;
		});
		stubFetch({ ...releaseRoutes(), [metadataUrl]: () => metadataResponse });

		const first = launcher.downloadVersion("1.2.3");
		expect(launcher.isDownloading).toBe(true);

		expect(await launcher.downloadVersion("2.0.0")).toEqual({ status: "busy" });

		releaseMetadataResponse(
			jsonResponse(releaseMetadata({ "mineplace3d-linux-x86_64": ASSET_URL })),
		);
		expect((await first).status).toBe("installed");
		expect(launcher.isDownloading).toBe(false);
	});

	it("reports a failed download and keeps the registry unchanged", async () => {
		stubFetch({});
		const failures: DownloadFailedEvent[] = [];
		launcher.on("failed", (event) => failures.push(event));

		const result = await launcher.downloadVersion("1.2.3");

		expect(result.status).toBe("failed");
		if (result.status === "failed") {
			expect(result.error).toBeInstanceOf(StatusError);
			expect(result.error.message).toBe("Release for version v1.2.3 not found (HTTP 404)");
		}
		expect(failures.map((event) => event.version.toString())).toEqual(["1.2.3"]);
		expect(launcher.installedVersions).toEqual([]);
		expect(existsSync(path.join(gameDir, "versions", "versions.json"))).toBe(false);
		expect(launcher.isDownloading).toBe(false);
	});

	it("does not record a version whose registry entry could not be saved", async () => {
		const fetchMock = stubFetch(releaseRoutes());
		const registry = new FullDiskRegistry(path.join(gameDir, "versions"), silentLogger());
		const fullDisk = new Launcher({
			gameDir,
			target: LINUX,
			now: steppingClock(300),
			registry,
			logging: { customLogger: silentLogger() },
		});
		await fullDisk.initialize();

		try {
			const first = await fullDisk.downloadVersion("1.2.3");
			const second = await fullDisk.downloadVersion("1.2.3");

			for (const result of [first, second]) {
				expect(result.status).toBe("failed");
				if (result.status === "failed") {
					expect(result.error).toBeInstanceOf(FileSystemError);
					expect(result.error.message).toBe(`Failed to write ${registry.filePath}: disk full`);
				}
			}
			expect(fetchMock).toHaveBeenCalledTimes(4);
			expect(fullDisk.isInstalled(version)).toBe(false);
			expect(fullDisk.installedVersions).toEqual([]);
		} finally {
			await fullDisk.dispose();
		}
	});

	it("forwards progress to listeners", async () => {
		stubFetch(releaseRoutes());
		const seen: ProgressEvent[] = [];
		launcher.on("progress", (event) => seen.push(event));

		await launcher.downloadVersion("1.2.3");
		await launcher.dispose();

		expect(seen).toEqual([
			{ kind: "progress", fraction: 0.5, bytesPerSecond: 4 / 0.3 },
			{ kind: "progress", fraction: 1, bytesPerSecond: 4 / 0.3 },
			{ kind: "finished" },
		]);
		expect(launcher.progressState).toEqual({ kind: "finished" });
	});

	it("refuses to run a version that is not installed", async () => {
		const result = await launcher.runVersion("9.9.9");

		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.error).toBeInstanceOf(LaunchError);
			expect(result.error.message).toBe("Version v9.9.9 is not available");
		}
	});

	it("refuses to run malformed input", async () => {
		const result = await launcher.runVersion("latest");

		expect(result.success).toBe(false);
		if (!result.success) {
			expect(result.error).toBeInstanceOf(VersionParseError);
		}
	});
});

describe("Launcher logging", () => {
	it("writes its own and shared log entries to the game directory log", async () => {
		const gameDir = await createTempDir();
		const launcher = new Launcher({
			gameDir,
			target: LINUX,
			logging: { config: { enableConsole: false, enableFile: true } },
		});

		try {
			const shared = getLogger();
			shared.warn("written through the shared logger");
			await launcher.initialize();
			await launcher.dispose();

			const lines = (
				await readFile(path.join(gameDir, "logs", "launcher.log"), "utf8")
			)
				.trimEnd()
				.split("\n");
			expect(lines).toHaveLength(3);
			expect(lines[0]).toMatch(/\] INFO: Launcher created \{/);
			expect(lines[1]).toMatch(/\] WARN: written through the shared logger$/);
			expect(lines[2]).toMatch(/\] INFO: Launcher initialized \{"installedVersions":\[\]\}$/);
			expect(getLogger()).not.toBe(shared);
		} finally {
			await removeTempDir(gameDir);
		}
	});
});

describe("Launcher without initialize", () => {
	it("fails the download instead of streaming without a progress sender", async () => {
		const gameDir = await createTempDir();
		await mkdir(path.join(gameDir, "versions"), { recursive: true });
		const fetchMock = stubFetch(releaseRoutes());
		const launcher = new Launcher({
			gameDir,
			target: LINUX,
			logging: { customLogger: silentLogger() },
		});

		try {
			const result = await launcher.downloadVersion("1.2.3");

			expect(result.status).toBe("failed");
			expect(fetchMock).not.toHaveBeenCalled();
		} finally {
			await launcher.dispose();
			vi.unstubAllGlobals();
			await removeTempDir(gameDir);
		}
	});
});
