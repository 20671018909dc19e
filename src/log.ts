export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100
};

export function isLogLevel(value: string): value is LogLevel {
	return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** Console logger with a threshold; warnings and errors go to stderr. */
export function createLogger(level: LogLevel = "info", sink: Pick<Console, "log" | "warn" | "error"> = console): Logger {
	const threshold = LEVEL_ORDER[level];
	const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= threshold;
	return {
		debug: (message) => {
			if (enabled("debug")) sink.log(message);
		},
		info: (message) => {
			if (enabled("info")) sink.log(message);
		},
		warn: (message) => {
			if (enabled("warn")) sink.warn(`Warning: ${message}`);
		},
		error: (message) => {
			if (enabled("error")) sink.error(`Error: ${message}`);
		}
	};
}

export const silentLogger: Logger = createLogger("silent");
