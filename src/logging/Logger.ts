import { existsSync } from "node:fs";
import { appendFile, mkdir, rename, stat, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import {
	type ILogger,
	type LogContext,
	type LogEntry,
	type LoggerConfig,
	LogLevel,
} from "@/@types";

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB
const DEFAULT_MAX_FILES = 5;

/**
 * Structured logger with console output and a rotated log file
 */
export class Logger implements ILogger {
	private config: LoggerConfig;
	private logQueue: LogEntry[] = [];
	private isWriting = false;
	private ready: Promise<void>;

	constructor(config: Partial<LoggerConfig> = {}) {
		this.config = {
			level: LogLevel.INFO,
			enableConsole: true,
			enableFile: false,
			maxFileSize: DEFAULT_MAX_FILE_SIZE,
			maxFiles: DEFAULT_MAX_FILES,
			...config,
		};

		this.ready = this.ensureLogDirectory();
	}

	private async ensureLogDirectory(): Promise<void> {
		try {
			if (this.config.enableFile && this.config.logFilePath) {
				const logDir = dirname(this.config.logFilePath);
				if (!existsSync(logDir)) {
					await mkdir(logDir, { recursive: true });
				}
			}
		} catch (error) {
			console.error("Failed to create log directory:", error);
		}
	}

	debug(message: string, context?: LogContext): void {
		this.log(LogLevel.DEBUG, message, context);
	}

	info(message: string, context?: LogContext): void {
		this.log(LogLevel.INFO, message, context);
	}

	warn(message: string, context?: LogContext): void {
		this.log(LogLevel.WARN, message, context);
	}

	error(message: string, context?: LogContext): void {
		this.log(LogLevel.ERROR, message, context);
	}

	private log(level: LogLevel, message: string, context?: LogContext): void {
		if (level < this.config.level) {
			return;
		}

		const entry: LogEntry = {
			timestamp: new Date(),
			level,
			message,
			...(context && { context }),
		};

		if (this.config.enableConsole) {
			this.logToConsole(entry);
		}

		if (this.config.enableFile && this.config.logFilePath) {
			this.logQueue.push(entry);
			void this.processLogQueue();
		}
	}

	private logToConsole(entry: LogEntry): void {
		const line = formatLogEntry(entry);

		switch (entry.level) {
			case LogLevel.DEBUG:
				console.debug(line);
				break;
			case LogLevel.INFO:
				console.info(line);
				break;
			case LogLevel.WARN:
				console.warn(line);
				break;
			case LogLevel.ERROR:
				console.error(line);
				break;
		}
	}

	private async processLogQueue(): Promise<void> {
		if (this.isWriting || this.logQueue.length === 0) {
			return;
		}

		this.isWriting = true;

		try {
			await this.ready;

			const entries = this.logQueue;
			this.logQueue = [];

			const logLines = `${entries.map(formatLogEntry).join("\n")}\n`;
			if (this.config.logFilePath) {
				await this.writeToFile(this.config.logFilePath, logLines);
			}
		} catch (error) {
			console.error("Failed to write log entries:", error);
		} finally {
			this.isWriting = false;

			// Entries queued while writing
			if (this.logQueue.length > 0) {
				setImmediate(() => void this.processLogQueue());
			}
		}
	}

	private async writeToFile(filePath: string, content: string): Promise<void> {
		try {
			if (existsSync(filePath)) {
				const stats = await stat(filePath);
				if (stats.size > (this.config.maxFileSize ?? DEFAULT_MAX_FILE_SIZE)) {
					await this.rotateLogFile(filePath);
				}
			}

			await appendFile(filePath, content, "utf8");
		} catch (error) {
			console.error(`Failed to write to log file ${filePath}:`, error);
		}
	}

	private async rotateLogFile(filePath: string): Promise<void> {
		try {
			const maxFiles = this.config.maxFiles ?? DEFAULT_MAX_FILES;

			for (let i = maxFiles - 1; i >= 1; i--) {
				const oldFile = `${filePath}.${i}`;
				if (!existsSync(oldFile)) {
					continue;
				}

				if (i === maxFiles - 1) {
					await unlink(oldFile);
				} else {
					await rename(oldFile, `${filePath}.${i + 1}`);
				}
			}

			if (existsSync(filePath)) {
				await rename(filePath, `${filePath}.1`);
			}
		} catch (error) {
			console.error("Failed to rotate log file:", error);
		}
	}

	/**
	 * Wait until every queued entry reached the log file
	 */
	async flush(): Promise<void> {
		while (this.logQueue.length > 0 || this.isWriting) {
			await new Promise((resolve) => setTimeout(resolve, 10));
		}
	}

	updateConfig(config: Partial<LoggerConfig>): void {
		this.config = { ...this.config, ...config };
		this.ready = this.ensureLogDirectory();
	}
}

export function getLevelName(level: LogLevel): string {
	switch (level) {
		case LogLevel.DEBUG:
			return "DEBUG";
		case LogLevel.INFO:
			return "INFO";
		case LogLevel.WARN:
			return "WARN";
		case LogLevel.ERROR:
			return "ERROR";
		default:
			return "UNKNOWN";
	}
}

export function formatLogEntry(entry: LogEntry): string {
	const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
	return `[${entry.timestamp.toISOString()}] ${getLevelName(entry.level)}: ${entry.message}${contextStr}`;
}
