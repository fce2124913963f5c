import type { DestinationStream, Logger as PinoLogger, StreamEntry } from "pino";
import pino from "pino";

/**
 * Log stream type - using pino's native streams.
 */
export type LogStreamType = "console" | "file";

/**
 * Log level type - using pino's native levels
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: ReadonlyArray<LogLevel> = ["trace", "debug", "info", "warn", "error", "fatal"];

interface LoggingTransportConfig {
	type: LogStreamType;
	level: LogLevel;
	/** Only applies to the console transport. */
	pretty: boolean;
}

/**
 * File transport configuration. Files are rotated daily by pino-roll as
 * `${fileDirectoryPath}/${filenamePrefix}.<date>.log`.
 */
export interface FileTransportConfig extends LoggingTransportConfig {
	type: "file";
	filenamePrefix: string;
	fileDirectoryPath: string;
	/** e.g. "yyyy-MM-dd" */
	datePattern: string;
	maxFiles: number;
	/** e.g. "500m"; units can be "k", "m", "g". */
	maxSize: string;
}

export interface ConsoleTransportConfig extends LoggingTransportConfig {
	type: "console";
}

export type TransportConfig = FileTransportConfig | ConsoleTransportConfig;

export interface LoggingConfig {
	/** When false a disabled logger is returned. */
	enabled: boolean;
	level: LogLevel;
	transports: Array<TransportConfig>;
	/**
	 * Module-specific level overrides, keyed by file name without extension.
	 * Parsed from "Module1:debug,Module2:warn".
	 */
	moduleOverrides: Record<string, LogLevel>;
}

const streams = new Map<LogStreamType, DestinationStream>();

function getStream(transportConfig: TransportConfig): DestinationStream {
	const existing = streams.get(transportConfig.type);
	if (existing) {
		return existing;
	}

	let stream: DestinationStream;
	if (transportConfig.type === "file") {
		const { datePattern, filenamePrefix, fileDirectoryPath, maxFiles, maxSize, level } = transportConfig;
		stream = pino.transport({
			targets: [
				{
					target: "pino-roll",
					level,
					options: {
						file: `${fileDirectoryPath}/${filenamePrefix}`,
						frequency: "daily",
						size: maxSize,
						dateFormat: datePattern,
						extension: ".log",
						mkdir: true,
						limit: { count: maxFiles },
					},
				},
			],
		});
	} else if (transportConfig.pretty) {
		stream = pino.transport({
			target: "pino-pretty",
			level: transportConfig.level,
			options: {
				colorize: true,
				translateTime: "yyyy-mm-dd HH:MM:ss",
				ignore: "pid,hostname",
				messageFormat: "{module} - {msg}",
				singleLine: true,
			},
		});
	} else {
		stream = process.stdout;
	}
	streams.set(transportConfig.type, stream);
	return stream;
}

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(level => level === value);
}

/**
 * Parses "Module1:debug,Module2:warn" into a map. Pairs with an unknown level are dropped.
 */
export function parseModuleOverrides(moduleOverrides: string): Record<string, LogLevel> {
	const overrides: Record<string, LogLevel> = {};
	for (const pair of moduleOverrides.split(",")) {
		const [module, level] = pair.split(":").map(part => part.trim());
		if (module && level && isLogLevel(level)) {
			overrides[module] = level;
		}
	}
	return overrides;
}

/**
 * Create a logging configuration.
 *
 * @param transportNames comma-separated transport names, e.g. "console,file"
 * @param moduleOverrides module level overrides in the form "Module1:level1,Module2:level2"
 */
export function createLoggingConfig(
	enabled: boolean,
	filenamePrefix: string,
	level: LogLevel,
	pretty: boolean,
	transportNames: string,
	moduleOverrides: string,
	fileDirectoryPath: string,
	datePattern = "yyyy-MM-dd",
	maxFiles = 14,
	maxSize = "500m",
): LoggingConfig {
	const transports: Array<TransportConfig> = [];
	for (const name of transportNames.split(",").map(t => t.trim())) {
		if (name === "file") {
			transports.push({
				type: "file",
				filenamePrefix,
				fileDirectoryPath,
				datePattern,
				maxFiles,
				maxSize,
				level,
				pretty,
			});
		} else if (name === "console") {
			transports.push({ type: "console", level, pretty });
		}
	}
	return {
		enabled,
		level,
		transports,
		moduleOverrides: parseModuleOverrides(moduleOverrides),
	};
}

/**
 * Reads the logging configuration from the environment:
 * - DISABLE_LOGGING: "true" disables logging entirely.
 * - LOG_LEVEL: default level, "info" when unset.
 * - LOG_PRETTY: pretty console output, defaults to true in development.
 * - LOG_TRANSPORTS: e.g. "console,file"; console in development, file otherwise.
 * - LOG_LEVEL_OVERRIDES: e.g. "TenantConnectionCache:debug".
 * - LOG_FILE_NAME_PREFIX, LOG_FILE_DIRECTORY_PATH, LOG_FILE_DATE_PATTERN, LOG_FILE_MAX_FILES.
 */
export function getLoggingConfig(): LoggingConfig {
	const isDevelopment = process.env.NODE_ENV === "development";
	const envLevel = process.env.LOG_LEVEL ?? "info";
	return createLoggingConfig(
		process.env.DISABLE_LOGGING !== "true",
		process.env.LOG_FILE_NAME_PREFIX ?? "application",
		isLogLevel(envLevel) ? envLevel : "info",
		(process.env.LOG_PRETTY ?? (isDevelopment ? "true" : "false")) === "true",
		process.env.LOG_TRANSPORTS ?? (isDevelopment ? "console" : "file"),
		process.env.LOG_LEVEL_OVERRIDES ?? "",
		process.env.LOG_FILE_DIRECTORY_PATH ?? "./logs",
		process.env.LOG_FILE_DATE_PATTERN ?? "yyyy-MM-dd",
		Number(process.env.LOG_FILE_MAX_FILES ?? "14"),
	);
}

function createDefaultLogger(config: LoggingConfig): PinoLogger {
	const entries: Array<StreamEntry> = config.transports.map(transport => ({
		level: config.level,
		stream: getStream(transport),
	}));
	if (entries.length > 1) {
		return pino({ level: config.level }, pino.multistream(entries));
	}
	if (entries.length === 1) {
		return pino({ level: config.level }, entries[0].stream);
	}
	return pino({ level: config.level });
}

// Lower number is more verbose
function getMinimumLevel(level1: LogLevel, level2: LogLevel): LogLevel {
	const { values } = pino.levels;
	return values[level1] < values[level2] ? level1 : level2;
}

export function getModuleName(module: string | ImportMeta): string {
	const moduleUrl = typeof module === "string" ? module : module.url;
	const fileName = moduleUrl.substring(moduleUrl.lastIndexOf("/") + 1);
	const parts = fileName.split(".");
	return parts.length > 1 ? parts.slice(0, -1).join(".") : fileName;
}

export type Logger = PinoLogger;

let disabledLogger: Logger | undefined;

/**
 * Get a logger for the specified module. The module name is derived from the file name.
 * Call `createLog(import.meta)` near the top of the file (after imports).
 *
 * @param loggingConfigProvider replaces the environment-based configuration
 * @param defaultLoggerProvider replaces the pino root logger factory
 */
export function createLog(
	module: string | ImportMeta,
	loggingConfigProvider: () => LoggingConfig = getLoggingConfig,
	defaultLoggerProvider: (config: LoggingConfig) => PinoLogger = createDefaultLogger,
): Logger {
	const config = loggingConfigProvider();
	if (!config.enabled) {
		disabledLogger ??= pino({ enabled: false });
		return disabledLogger;
	}

	const moduleName = getModuleName(module);
	const effectiveLevel = config.moduleOverrides[moduleName] ?? config.level;
	// The root logger must be at least as verbose as the module override, or the child never sees the records
	const rootLevel = getMinimumLevel(effectiveLevel, config.level);
	const root = defaultLoggerProvider({
		...config,
		level: rootLevel,
		transports: config.transports.map(transport => ({ ...transport, level: rootLevel })),
	});
	return root.child({ module: moduleName }, { level: effectiveLevel });
}
