import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import { parseTimeOfDay, parseTimeframe } from "./time";
import { assertTimeZone } from "./time/zone";
import type { SessionWindow, TimeframeSpec } from "./types";

export interface ProviderConfig {
	name: string;
	exchangeId: string;
	timeZone: string;
	streamEndpoint?: string;
	credentials: {
		apiKey: string;
		apiSecret: string;
	};
}

export interface FeedSettings {
	dataname: string;
	timeframe: TimeframeSpec;
	session: SessionWindow;
	liveBars: boolean;
	fromDate?: number;
	toDate?: number;
}

export interface TradingSession {
	start: number;
	end: number;
}

export interface ScheduleSettings {
	timeZone: string;
	sessions: TradingSession[];
	/** 0 = Sunday … 6 = Saturday */
	tradingDays: number[];
	safetyMarginMs: number;
}

export interface FeedConfig {
	profile: string;
	path: string;
	provider: ProviderConfig;
	feed: FeedSettings;
	schedule?: ScheduleSettings;
}

export interface FeedConfigLoadOptions {
	profile?: string;
	configDir?: string;
	envPath?: string;
}

type JsonObject = Record<string, unknown>;

const WORKSPACE_SENTINELS = ["package-lock.json", ".git", "vitest.config.ts"];

let cachedWorkspaceRoot: string | undefined;

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

const isJsonObject = (value: unknown): value is JsonObject =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readJsonObject = (filePath: string): JsonObject => {
	if (!fs.existsSync(filePath)) {
		throw new Error(`Feed config not found at ${filePath}`);
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	if (!isJsonObject(parsed)) {
		throw new Error(`Feed config at ${filePath} must be a JSON object`);
	}
	return parsed;
};

const readSection = (source: JsonObject, field: string): JsonObject => {
	const value = source[field];
	if (!isJsonObject(value)) {
		throw new Error(`Required object field missing in ${field}`);
	}
	return value;
};

const readString = (source: JsonObject, field: string, label: string): string => {
	const value = source[field];
	if (typeof value !== "string" || value.trim() === "") {
		throw new Error(`Required string field missing in ${label}`);
	}
	return value.trim();
};

const readOptionalString = (
	source: JsonObject,
	field: string,
	label: string
): string | undefined => {
	const value = source[field];
	if (value === undefined || value === null) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new Error(`Field ${label} must be a string or null`);
	}
	return value.trim() || undefined;
};

const readBoolean = (
	source: JsonObject,
	field: string,
	label: string,
	fallback: boolean
): boolean => {
	const value = source[field];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "boolean") {
		throw new Error(`Field ${label} must be a boolean`);
	}
	return value;
};

const readNumber = (
	source: JsonObject,
	field: string,
	label: string,
	fallback: number
): number => {
	const value = source[field];
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new Error(`Field ${label} must be a number`);
	}
	return value;
};

const parseDate = (value: string | undefined, label: string): number | undefined => {
	if (value === undefined) {
		return undefined;
	}
	const parsed = Date.parse(value);
	if (Number.isNaN(parsed)) {
		throw new Error(`Field ${label} is not a valid ISO date: "${value}"`);
	}
	return parsed;
};

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const parseBooleanEnv = (key: string): boolean | undefined => {
	const value = readOptionalEnvVar(key)?.toLowerCase();
	if (value === undefined) {
		return undefined;
	}
	if (value === "true" || value === "1") {
		return true;
	}
	if (value === "false" || value === "0") {
		return false;
	}
	throw new Error(`Environment variable ${key} must be true or false`);
};

const loadProvider = (file: JsonObject): ProviderConfig => {
	const section = readSection(file, "provider");
	const exchangeId = readString(section, "exchangeId", "provider.exchangeId");
	const timeZone = readOptionalString(section, "timeZone", "provider.timeZone") ?? "UTC";
	assertTimeZone(timeZone);
	return {
		name: readOptionalString(section, "name", "provider.name") ?? exchangeId,
		exchangeId,
		timeZone,
		streamEndpoint: readOptionalString(
			section,
			"streamEndpoint",
			"provider.streamEndpoint"
		),
		credentials: {
			apiKey: readOptionalEnvVar("EXCHANGE_API_KEY") ?? "",
			apiSecret: readOptionalEnvVar("EXCHANGE_API_SECRET") ?? "",
		},
	};
};

const loadFeedSettings = (file: JsonObject): FeedSettings => {
	const section = readSection(file, "feed");
	const sessionStart = readOptionalString(section, "sessionStart", "feed.sessionStart");
	const sessionEnd = readOptionalString(section, "sessionEnd", "feed.sessionEnd");
	const timeframe =
		readOptionalEnvVar("FEED_TIMEFRAME") ??
		readString(section, "timeframe", "feed.timeframe");
	return {
		dataname:
			readOptionalEnvVar("FEED_DATANAME") ??
			readString(section, "dataname", "feed.dataname"),
		timeframe: parseTimeframe(timeframe),
		session: {
			start: sessionStart === undefined ? null : parseTimeOfDay(sessionStart),
			end: sessionEnd === undefined ? null : parseTimeOfDay(sessionEnd),
			allowFourPriceDoji: readBoolean(
				section,
				"allowFourPriceDoji",
				"feed.allowFourPriceDoji",
				false
			),
		},
		liveBars:
			parseBooleanEnv("FEED_LIVE_BARS") ??
			readBoolean(section, "liveBars", "feed.liveBars", false),
		fromDate: parseDate(
			readOptionalString(section, "fromDate", "feed.fromDate"),
			"feed.fromDate"
		),
		toDate: parseDate(
			readOptionalString(section, "toDate", "feed.toDate"),
			"feed.toDate"
		),
	};
};

const loadSchedule = (file: JsonObject): ScheduleSettings | undefined => {
	const raw = file.schedule;
	if (raw === undefined || raw === null) {
		return undefined;
	}
	const section = readSection(file, "schedule");
	const timeZone = readString(section, "timeZone", "schedule.timeZone");
	assertTimeZone(timeZone);

	const rawSessions = section.sessions;
	if (!Array.isArray(rawSessions) || rawSessions.length === 0) {
		throw new Error("Field schedule.sessions must be a non-empty array");
	}
	const sessions = rawSessions.map((entry: unknown, index): TradingSession => {
		const label = `schedule.sessions[${index}]`;
		if (!isJsonObject(entry)) {
			throw new Error(`Field ${label} must be an object`);
		}
		const start = parseTimeOfDay(readString(entry, "start", `${label}.start`));
		const end = parseTimeOfDay(readString(entry, "end", `${label}.end`));
		if (end <= start) {
			throw new Error(`Field ${label} must end after it starts`);
		}
		return { start, end };
	});

	const rawDays = section.tradingDays ?? [1, 2, 3, 4, 5];
	if (
		!Array.isArray(rawDays) ||
		!rawDays.every(
			(day: unknown): day is number =>
				typeof day === "number" && Number.isInteger(day) && day >= 0 && day <= 6
		)
	) {
		throw new Error("Field schedule.tradingDays must list weekdays 0-6");
	}
	if (rawDays.length === 0) {
		throw new Error("Field schedule.tradingDays must list at least one weekday");
	}

	return {
		timeZone,
		sessions,
		tradingDays: rawDays,
		safetyMarginMs: readNumber(
			section,
			"safetyMarginMs",
			"schedule.safetyMarginMs",
			3_000
		),
	};
};

export const loadFeedConfig = (
	options: FeedConfigLoadOptions = {}
): FeedConfig => {
	const workspaceRoot = findWorkspaceRoot();
	loadEnvFiles(workspaceRoot, options.envPath);

	const profile =
		options.profile ?? readOptionalEnvVar("FEED_PROFILE") ?? "default";
	const configDir = options.configDir ?? path.join(workspaceRoot, "config");
	const configPath = path.join(configDir, "feeds", `${profile}.json`);
	const file = readJsonObject(configPath);

	return {
		profile,
		path: configPath,
		provider: loadProvider(file),
		feed: loadFeedSettings(file),
		schedule: loadSchedule(file),
	};
};
