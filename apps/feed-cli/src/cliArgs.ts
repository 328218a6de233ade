export type ArgValue = string | boolean;

const BOOLEAN_FLAGS = new Set(["live", "history", "help"]);

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--") && !BOOLEAN_FLAGS.has(key)) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	if (positionals[0] && args.dataname === undefined) {
		args.dataname = positionals[0];
	}
	return args;
};

export const DEFAULT_IDLE_MS = 1_000;

export interface FeedCliOptions {
	profile?: string;
	dataname?: string;
	timeframe?: string;
	/** undefined keeps the profile's setting */
	liveBars?: boolean;
	idleMs: number;
	envPath?: string;
	configDir?: string;
	help: boolean;
}

const readString = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new Error(`Missing value for --${key}`);
	}
	return value;
};

const parseNumber = (
	value: string | undefined,
	label: string
): number | undefined => {
	if (value === undefined) {
		return undefined;
	}
	const num = Number(value);
	if (!Number.isFinite(num) || num < 0) {
		throw new Error(`Invalid numeric value for --${label}: ${value}`);
	}
	return num;
};

export const resolveFeedCliOptions = (
	args: Record<string, ArgValue>
): FeedCliOptions => {
	if (args.live === true && args.history === true) {
		throw new Error("Use either --live or --history, not both");
	}
	const liveBars =
		args.live === true ? true : args.history === true ? false : undefined;

	return {
		profile: readString(args, "profile"),
		dataname: readString(args, "dataname"),
		timeframe: readString(args, "timeframe"),
		liveBars,
		idleMs:
			parseNumber(readString(args, "idle-ms"), "idle-ms") ?? DEFAULT_IDLE_MS,
		envPath: readString(args, "envPath"),
		configDir: readString(args, "configDir"),
		help: args.help === true,
	};
};
