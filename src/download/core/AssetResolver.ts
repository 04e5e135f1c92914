import path from "node:path";
import { z } from "zod";
import type { PlatformTarget, ReleaseSource } from "@/@types";
import { ResolutionError } from "@/errors";
import { getExecutableSuffix } from "@/utils/platform";
import type { Version } from "@/version/Version";
import { DEFAULT_RELEASE_SOURCE, PRODUCT_PREFIX } from "../config/constants";

const releaseMetadataSchema = z.object({
	assets: z.array(
		z.object({
			name: z.unknown(),
			browser_download_url: z.unknown(),
		}),
	),
});

const downloadUrlSchema = z
	.string()
	.url()
	.refine((value) => /^https?:\/\//i.test(value), "must be an http(s) URL");

/**
 * Maps a version and the running platform onto release host names:
 * the release tag, the metadata URL and the asset to download.
 */
export class AssetResolver {
	readonly target: PlatformTarget;
	readonly source: ReleaseSource;

	constructor(target: PlatformTarget, source: Partial<ReleaseSource> = {}) {
		this.target = target;
		this.source = {
			...DEFAULT_RELEASE_SOURCE,
			...source,
			apiBaseUrl: (source.apiBaseUrl ?? DEFAULT_RELEASE_SOURCE.apiBaseUrl).replace(
				/\/+$/,
				"",
			),
		};
	}

	releaseTag(version: Version): string {
		return version.tag;
	}

	releaseMetadataUrl(version: Version): string {
		const { apiBaseUrl, owner, repo } = this.source;
		return `${apiBaseUrl}/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/releases/tags/${encodeURIComponent(this.releaseTag(version))}`;
	}

	/**
	 * Name of the release asset built for this platform, e.g.
	 * `mineplace3d-linux-x86_64` or `mineplace3d-windows-aarch64.exe`
	 */
	assetFileName(): string {
		const { platform, arch } = this.target;
		return `${PRODUCT_PREFIX}-${platform}-${arch}${getExecutableSuffix(platform)}`;
	}

	/**
	 * File name of an installed build inside the versions directory
	 */
	installedFileName(version: Version): string {
		return `${version.toString()}${getExecutableSuffix(this.target.platform)}`;
	}

	installedBinaryPath(versionsDir: string, version: Version): string {
		return path.join(versionsDir, this.installedFileName(version));
	}

	/**
	 * Find this platform's asset in a release metadata body and return its
	 * download URL
	 */
	selectAssetUrl(metadata: unknown, version: Version): string {
		const parsed = releaseMetadataSchema.safeParse(metadata);
		if (!parsed.success) {
			throw new ResolutionError(
				`No suitable asset found for version ${version.tag}: release metadata has no assets list`,
			);
		}

		const expectedName = this.assetFileName();
		const asset = parsed.data.assets.find((item) => item.name === expectedName);
		if (!asset) {
			throw new ResolutionError(
				`No suitable asset found for version ${version.tag} (expected ${expectedName})`,
			);
		}

		const url = downloadUrlSchema.safeParse(asset.browser_download_url);
		if (!url.success) {
			throw new ResolutionError(
				`Invalid asset download URL for version ${version.tag}`,
			);
		}

		return url.data;
	}
}
