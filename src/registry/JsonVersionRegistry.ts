import { existsSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { ILogger, VersionRegistry } from "@/@types";
import { DOWNLOAD_CONFIG } from "@/download/config/constants";
import { describeError, FileSystemError } from "@/errors";
import { getLogger } from "@/logging";
import { Version } from "@/version/Version";

const versionsFileSchema = z.array(z.string());

/**
 * Installed versions kept as a JSON array of version strings in
 * `<gameDir>/versions/versions.json`
 */
export class JsonVersionRegistry implements VersionRegistry {
	readonly filePath: string;
	private readonly versions = new Map<string, Version>();
	private readonly logger: ILogger;

	constructor(versionsDir: string, logger: ILogger = getLogger()) {
		this.filePath = path.join(versionsDir, DOWNLOAD_CONFIG.VERSIONS_FILE);
		this.logger = logger;
	}

	static forGameDir(gameDir: string, logger?: ILogger): JsonVersionRegistry {
		return new JsonVersionRegistry(
			path.join(gameDir, DOWNLOAD_CONFIG.VERSIONS_DIR),
			logger,
		);
	}

	async load(): Promise<void> {
		this.versions.clear();

		if (!existsSync(this.filePath)) {
			return;
		}

		let raw: string;
		try {
			raw = await readFile(this.filePath, "utf8");
		} catch (error) {
			throw new FileSystemError(
				`Failed to read ${this.filePath}: ${describeError(error)}`,
				this.filePath,
				error,
			);
		}

		const parsed = versionsFileSchema.safeParse(parseJsonSafe(raw));
		if (!parsed.success) {
			this.logger.warn("Ignoring malformed versions file", {
				path: this.filePath,
			});
			return;
		}

		for (const entry of parsed.data) {
			const version = Version.tryParse(entry);
			if (version === null) {
				this.logger.warn("Skipping invalid version entry", { entry });
				continue;
			}
			this.versions.set(version.key, version);
		}
	}

	async save(): Promise<void> {
		const data = JSON.stringify(
			this.list().map((version) => version.toString()),
			null,
			2,
		);

		try {
			await mkdir(path.dirname(this.filePath), { recursive: true });
			await writeFile(this.filePath, data, "utf8");
		} catch (error) {
			throw new FileSystemError(
				`Failed to write versions file ${this.filePath}: ${describeError(error)}`,
				this.filePath,
				error,
			);
		}
	}

	has(version: Version): boolean {
		return this.versions.has(version.key);
	}

	add(version: Version): void {
		this.versions.set(version.key, version);
	}

	remove(version: Version): boolean {
		return this.versions.delete(version.key);
	}

	list(): Version[] {
		return Version.sortDescending(this.versions.values());
	}
}

function parseJsonSafe(value: string): unknown {
	try {
		return JSON.parse(value);
	} catch {
		return null;
	}
}
