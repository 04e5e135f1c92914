import { describe, expect, it } from "vitest";
import type { ProgressEvent } from "@/@types";
import { createProgressChannel } from "@/download/core/ProgressChannel";

function progress(fraction: number): ProgressEvent {
	return { kind: "progress", fraction, bytesPerSecond: 100 };
}

describe("createProgressChannel", () => {
	it("delivers events in send order", async () => {
		const { sender, receiver } = createProgressChannel(10);

		sender.trySend(progress(0.25));
		sender.trySend(progress(0.5));
		sender.trySend({ kind: "finished" });

		expect(await receiver.receive()).toEqual(progress(0.25));
		expect(await receiver.receive()).toEqual(progress(0.5));
		expect(await receiver.receive()).toEqual({ kind: "finished" });
	});

	it("drops events when the buffer is full", () => {
		const { sender, receiver } = createProgressChannel(2);

		expect(sender.trySend(progress(0.1))).toBe(true);
		expect(sender.trySend(progress(0.2))).toBe(true);
		expect(sender.trySend(progress(0.3))).toBe(false);

		expect(sender.dropped).toBe(1);
		expect(receiver.pending).toBe(2);
		expect(receiver.tryReceive()).toEqual(progress(0.1));
		expect(receiver.tryReceive()).toEqual(progress(0.2));
		expect(receiver.tryReceive()).toBeUndefined();
	});

	it("hands an event straight to a waiting receiver", async () => {
		const { sender, receiver } = createProgressChannel(1);

		const next = receiver.receive();
		expect(sender.trySend(progress(0.75))).toBe(true);

		expect(await next).toEqual(progress(0.75));
		expect(receiver.pending).toBe(0);
	});

	it("drains queued events before reporting close", async () => {
		const { sender, receiver } = createProgressChannel(4);

		sender.trySend(progress(0.5));
		sender.close();

		expect(sender.trySend(progress(0.9))).toBe(false);
		expect(await receiver.receive()).toEqual(progress(0.5));
		expect(await receiver.receive()).toBeNull();
	});

	it("wakes a waiting receiver on close", async () => {
		const { sender, receiver } = createProgressChannel();

		const next = receiver.receive();
		sender.close();

		expect(await next).toBeNull();
	});

	it("iterates until the channel closes", async () => {
		const { sender, receiver } = createProgressChannel(4);
		const seen: ProgressEvent[] = [];

		const consumer = (async () => {
			for await (const event of receiver) {
				seen.push(event);
			}
		})();

		sender.trySend(progress(0.5));
		sender.trySend({ kind: "finished" });
		sender.close();
		await consumer;

		expect(seen).toEqual([progress(0.5), { kind: "finished" }]);
	});

	it("rejects a non-positive capacity", () => {
		expect(() => createProgressChannel(0)).toThrow(RangeError);
		expect(() => createProgressChannel(1.5)).toThrow(RangeError);
	});
});
