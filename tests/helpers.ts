import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { vi } from "vitest";
import type { ProgressEvent } from "@/@types";
import type { ProgressReceiver } from "@/download/core/ProgressChannel";
import { Logger } from "@/logging";

export type Route = (init: RequestInit | undefined) => Response | Promise<Response>;

/**
 * Replace the global fetch with a router over exact URLs. Unknown URLs
 * answer 404.
 */
export function stubFetch(routes: Record<string, Route>) {
	const fetchMock = vi.fn(
		async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
			const url =
				typeof input === "string"
					? input
					: input instanceof URL
						? input.href
						: input.url;
			const route = routes[url];
			if (!route) {
				return new Response("Not Found", { status: 404 });
			}
			return route(init);
		},
	);
	vi.stubGlobal("fetch", fetchMock);
	return fetchMock;
}

export function streamOf(chunks: Uint8Array[]): ReadableStream<Uint8Array> {
	let index = 0;
	return new ReadableStream<Uint8Array>({
		pull(controller) {
			const chunk = chunks[index++];
			if (chunk === undefined) {
				controller.close();
			} else {
				controller.enqueue(chunk);
			}
		},
	});
}

/**
 * Streamed body; `contentLength` null leaves the header out
 */
export function bodyResponse(
	chunks: Uint8Array[],
	contentLength: number | null = chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0),
): Response {
	const headers = new Headers();
	if (contentLength !== null) {
		headers.set("content-length", String(contentLength));
	}
	return new Response(streamOf(chunks), { status: 200, headers });
}

export function jsonResponse(data: unknown, status = 200): Response {
	return new Response(JSON.stringify(data), {
		status,
		headers: { "content-type": "application/json" },
	});
}

export function releaseMetadata(
	assets: Record<string, string>,
): { assets: Array<{ name: string; browser_download_url: string }> } {
	return {
		assets: Object.entries(assets).map(([name, url]) => ({
			name,
			browser_download_url: url,
		})),
	};
}

export function bytes(text: string): Uint8Array {
	return new TextEncoder().encode(text);
}

export function fixturePath(name: string): string {
	return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export async function fixtureResponse(name: string): Promise<Response> {
	const data = await readFile(fixturePath(name));
	return new Response(new Uint8Array(data), { status: 200 });
}

export async function createTempDir(prefix = "launcher-test-"): Promise<string> {
	return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
	await rm(dir, { recursive: true, force: true });
}

export function silentLogger(): Logger {
	return new Logger({ enableConsole: false, enableFile: false });
}

export function drain(receiver: ProgressReceiver): ProgressEvent[] {
	const events: ProgressEvent[] = [];
	let event = receiver.tryReceive();
	while (event !== undefined) {
		events.push(event);
		event = receiver.tryReceive();
	}
	return events;
}

/**
 * Clock advancing by `step` milliseconds on every read
 */
export function steppingClock(step: number): () => number {
	let now = 0;
	return () => {
		const current = now;
		now += step;
		return current;
	};
}

/**
 * Await a promise expected to reject with an instance of `type`
 */
export async function rejectionOf<T extends Error>(
	promise: Promise<unknown>,
	type: new (...args: never[]) => T,
): Promise<T> {
	try {
		await promise;
	} catch (error) {
		if (error instanceof type) {
			return error;
		}
		throw error;
	}
	throw new Error(`expected a ${type.name}`);
}
