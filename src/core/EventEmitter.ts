import { EventEmitter as NodeEventEmitter } from "node:events";
import type { LauncherEvents } from "../@types";

export class LauncherEventEmitter extends NodeEventEmitter {
	override on<K extends keyof LauncherEvents>(
		event: K,
		listener: LauncherEvents[K],
	): this {
		return super.on(event, listener);
	}

	override once<K extends keyof LauncherEvents>(
		event: K,
		listener: LauncherEvents[K],
	): this {
		return super.once(event, listener);
	}

	override off<K extends keyof LauncherEvents>(
		event: K,
		listener: LauncherEvents[K],
	): this {
		return super.off(event, listener);
	}

	override emit<K extends keyof LauncherEvents>(
		event: K,
		...args: Parameters<LauncherEvents[K]>
	): boolean {
		return super.emit(event, ...args);
	}

	override removeAllListeners(event?: keyof LauncherEvents): this {
		return super.removeAllListeners(event);
	}
}
