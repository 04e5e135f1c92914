import { type FileHandle, open } from "node:fs/promises";
import {
	describeError,
	FileSystemError,
	StatusError,
	TransportError,
} from "@/errors";

export interface RequestOptions {
	userAgent: string;
	accept?: string | undefined;
	/** Prefix of the TransportError message, e.g. "Failed to download asset" */
	failureMessage: string;
	/** Message of the StatusError raised for a non-success status */
	statusMessage: (status: number) => string;
}

/**
 * GET `url`, turning network failures into TransportError and non-success
 * responses into StatusError
 */
export async function requestOrThrow(
	url: string,
	options: RequestOptions,
): Promise<Response> {
	let response: Response;
	try {
		response = await fetch(url, {
			method: "GET",
			headers: {
				Accept: options.accept ?? "*/*",
				"User-Agent": options.userAgent,
			},
		});
	} catch (error) {
		throw new TransportError(
			`${options.failureMessage}: ${describeError(error)}`,
			url,
			error,
		);
	}

	if (!response.ok) {
		throw new StatusError(
			options.statusMessage(response.status),
			url,
			response.status,
		);
	}

	return response;
}

export interface StreamToFileOptions {
	/** Called after each chunk reached the file */
	onChunk?: ((bytes: number) => void) | undefined;
	/** Prefix of the error messages, e.g. "Failed to download asset for version v1.0.0" */
	failureMessage: string;
}

/**
 * Write a response body to `destPath` chunk by chunk without holding the
 * whole payload in memory. An existing file at `destPath` is truncated.
 * A failed stream leaves the partial file in place.
 *
 * @returns number of bytes written
 */
export async function streamToFile(
	response: Response,
	destPath: string,
	options: StreamToFileOptions,
): Promise<number> {
	const body = response.body;
	if (!body) {
		throw new TransportError(
			`${options.failureMessage}: response has no body`,
			response.url,
		);
	}

	let file: FileHandle;
	try {
		file = await open(destPath, "w");
	} catch (error) {
		await body.cancel().catch(() => undefined);
		throw new FileSystemError(
			`${options.failureMessage}: cannot create ${destPath}: ${describeError(error)}`,
			destPath,
			error,
		);
	}

	const reader = body.getReader();
	let written = 0;

	try {
		while (true) {
			const chunk = await reader.read().catch((error: unknown) => {
				throw new TransportError(
					`${options.failureMessage}: ${describeError(error)}`,
					response.url,
					error,
				);
			});

			if (chunk.done) {
				break;
			}

			try {
				await file.write(chunk.value);
			} catch (error) {
				await reader.cancel().catch(() => undefined);
				throw new FileSystemError(
					`${options.failureMessage}: cannot write ${destPath}: ${describeError(error)}`,
					destPath,
					error,
				);
			}

			written += chunk.value.byteLength;
			options.onChunk?.(chunk.value.byteLength);
		}
	} finally {
		reader.releaseLock();
		await file.close();
	}

	return written;
}
