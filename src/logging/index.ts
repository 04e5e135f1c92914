import type { LoggerConfig } from "@/@types";
import { Logger } from "./Logger";

export * from "./Logger";

let loggerInstance: Logger | null = null;

/**
 * Get the singleton logger instance
 */
export function getLogger(config?: Partial<LoggerConfig>): Logger {
	if (!loggerInstance) {
		loggerInstance = new Logger(config);
	} else if (config) {
		loggerInstance.updateConfig(config);
	}
	return loggerInstance;
}

/**
 * Replace the singleton logger with one built from `config`
 */
export function initializeLogging(config: Partial<LoggerConfig> = {}): Logger {
	loggerInstance = new Logger(config);
	return loggerInstance;
}

/**
 * Flush all pending log entries
 */
export async function flushLogs(): Promise<void> {
	if (loggerInstance) {
		await loggerInstance.flush();
	}
}

/**
 * Shutdown logging system gracefully
 */
export async function shutdownLogging(): Promise<void> {
	await flushLogs();
	loggerInstance = null;
}
