/**
 * Core package: bar and timeframe contracts, time math, collaborator
 * interfaces, logging and configuration shared by the rest of the workspace.
 */
export * from "./types";
export * from "./time";
export * from "./errors";
export * from "./exchange";
export * from "./config";
export { loadEnvFiles } from "./env";
export {
	createLogger,
	errorMessage,
	log,
	silentLogger,
} from "./utils/logger";
export type { BaseLogPayload, LogLevel, ModuleLogger } from "./utils/logger";
export { abortableDelay } from "./utils/abortableDelay";
