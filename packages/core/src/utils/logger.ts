export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	if (prettyEnabled) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			console.log(JSON.stringify(sanitize(base)));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

/** Logger that drops everything; handy default for library classes. */
export const silentLogger: ModuleLogger = {
	log: () => {},
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

const sanitize = (payload: BaseLogPayload): unknown => {
	const seen = new WeakSet<object>();
	return sanitizeValue(payload, seen);
};

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

const wallTime = (value: unknown): string =>
	typeof value === "number" && Number.isFinite(value)
		? new Date(value).toISOString().slice(0, 19).replace("T", " ")
		: "-";

/**
 * Human-readable rendering of one log record. Bar times are exchange wall
 * time, so they print without a zone suffix.
 */
export const formatPretty = (base: BaseLogPayload): string[] => {
	const { level, event, module, ts, ...rest } = base;
	const header = `[${ts ?? "-"}] [${level.toUpperCase()}] ${module}:${event}`;

	switch (event) {
		case "feed_bar":
			return [
				header,
				`  ${String(rest.feed ?? "-")} ${wallTime(rest.openTime)} ` +
					`O=${String(rest.open)} H=${String(rest.high)} ` +
					`L=${String(rest.low)} C=${String(rest.close)} ` +
					`V=${String(rest.volume)}${rest.isFinal === false ? " (forming)" : ""}`,
			];
		case "feed_status":
			return [
				header,
				`  ${String(rest.feed ?? "-")} -> ${String(rest.status)}`,
			];
		case "bar_rejected":
			return [
				header,
				`  ${wallTime(rest.openTime)} rejected: ${String(rest.reason)}`,
			];
		case "bar_out_of_order":
			return [
				header,
				`  ${wallTime(rest.openTime)} not after ${wallTime(rest.lastOpenTime)}`,
			];
		case "poller_waiting":
			return [
				header,
				`  bar ${wallTime(rest.barOpen)} due ${wallTime(rest.requestAt)}, ` +
					`sleeping ${(Number(rest.waitMs) / 1_000).toFixed(1)}s`,
			];
		default:
			if (Object.keys(rest).length === 0) {
				return [header];
			}
			return [
				header,
				`  ${JSON.stringify(sanitizeValue(rest, new WeakSet<object>()))}`,
			];
	}
};

function printPretty(base: BaseLogPayload): void {
	for (const line of formatPretty(base)) {
		console.log(line);
	}
}
