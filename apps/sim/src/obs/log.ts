export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
	value === "debug" || value === "info" || value === "warn" || value === "error";

const envLevel = process.env.RPS_LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export const setLogLevel = (level: LogLevel) => {
	threshold = level;
};

export const getLogLevel = (): LogLevel => threshold;

export const log = (
	level: LogLevel,
	message: string,
	fields?: Record<string, unknown>,
) => {
	if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;

	const payload = {
		timestamp: new Date().toISOString(),
		level,
		message,
		...(fields ?? {}),
	};

	// eslint-disable-next-line no-console
	const fn = console[level] ?? console.log;
	fn(JSON.stringify(payload));
};
