import { config as dotenvConfig } from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";

const loaded = new Set<string>();

/**
 * Load `.env` style files from the workspace root once per process.
 * `BARLINE_ENV_FILE` points at an extra file loaded before the defaults.
 */
export function loadEnvFiles(projectRoot: string, envPath?: string): string[] {
	const candidates = filterUnique(
		[envPath, process.env.BARLINE_ENV_FILE, ".env", ".env.local"].filter(
			(value): value is string => Boolean(value)
		)
	);

	const applied: string[] = [];
	candidates.forEach((candidate) => {
		const fullPath = path.isAbsolute(candidate)
			? candidate
			: path.join(projectRoot, candidate);
		if (!existsSync(fullPath) || loaded.has(fullPath)) {
			return;
		}
		dotenvConfig({ path: fullPath });
		loaded.add(fullPath);
		applied.push(fullPath);
	});
	return applied;
}

function filterUnique(values: string[]): string[] {
	return values.filter((value, index) => values.indexOf(value) === index);
}
