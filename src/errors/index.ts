/**
 * Launcher error hierarchy
 *
 * Every failure surfaced by the download pipeline, the registry or the runner
 * is a `LauncherError`, so callers can tell request-scoped failures apart
 * from programming errors with a single `instanceof` check.
 */

import type { VersionField } from "../@types/version";

/**
 * Base error class for all launcher errors
 */
export class LauncherError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = this.constructor.name;
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}
}

/**
 * Malformed version string
 */
export class VersionParseError extends LauncherError {
	constructor(
		message: string,
		public readonly field: VersionField,
		public readonly input: string,
	) {
		super(message);
	}
}

/**
 * No matching release asset, or release metadata that cannot be read
 */
export class ResolutionError extends LauncherError {}

/**
 * Network failure before or while a response body was read
 */
export class TransportError extends LauncherError {
	constructor(
		message: string,
		public readonly url: string,
		cause?: unknown,
	) {
		super(message, { cause });
	}
}

/**
 * Non-success HTTP response
 */
export class StatusError extends LauncherError {
	constructor(
		message: string,
		public readonly url: string,
		public readonly status: number,
	) {
		super(message);
	}
}

/**
 * File create, write or permission failure
 */
export class FileSystemError extends LauncherError {
	constructor(
		message: string,
		public readonly path: string,
		cause?: unknown,
	) {
		super(message, { cause });
	}
}

export type ArchiveStep = "open" | "extract" | "member-not-found" | "cleanup";

/**
 * Failure while unpacking a runtime dependency archive
 */
export class ArchiveError extends LauncherError {
	constructor(
		message: string,
		public readonly step: ArchiveStep,
		cause?: unknown,
	) {
		super(message, { cause });
	}
}

/**
 * The progress channel was used before it was wired up
 */
export class ProgressChannelError extends LauncherError {}

/**
 * An installed version could not be started
 */
export class LaunchError extends LauncherError {
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
	}
}

/**
 * Type guard helper to check if an error is a known launcher error
 */
export function isLauncherError(error: unknown): error is LauncherError {
	return error instanceof LauncherError;
}

/**
 * Message of any thrown value
 */
export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Keep launcher errors as they are, wrap anything else
 */
export function toLauncherError(
	error: unknown,
	fallbackMessage: string,
): LauncherError {
	if (isLauncherError(error)) {
		return error;
	}

	return new LauncherError(`${fallbackMessage}: ${describeError(error)}`, {
		cause: error,
	});
}
