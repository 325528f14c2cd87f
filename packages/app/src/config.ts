import { ConfigurationError, isLogLevel, LOG_LEVELS, type LogLevel } from "@ferry/core";

/** Settings an application can take from its environment. */
export interface AppConfig {
	/** Minimum level written by the application logger. */
	logLevel: LogLevel;
	/** Ignore a trailing slash when routing. */
	trimLastSlash: boolean;
}

export const DEFAULT_APP_CONFIG: Readonly<AppConfig> = {
	logLevel: "info",
	trimLastSlash: false,
};

const TRUE_VALUES = new Set(["true", "1"]);
const FALSE_VALUES = new Set(["false", "0"]);

function parseBoolean(name: string, raw: string): boolean {
	const value = raw.trim().toLowerCase();
	if (TRUE_VALUES.has(value)) return true;
	if (FALSE_VALUES.has(value)) return false;
	throw new ConfigurationError(`${name} must be one of true, false, 1, 0 (got "${raw}")`);
}

/**
 * Read application settings from environment variables.
 *
 * - `FERRY_LOG_LEVEL`: debug | info | warn | error
 * - `FERRY_TRIM_LAST_SLASH`: true | false | 1 | 0
 *
 * Unset or empty variables keep their defaults; anything else that cannot
 * be parsed throws a {@link ConfigurationError}.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
	const config: AppConfig = { ...DEFAULT_APP_CONFIG };

	const logLevel = env.FERRY_LOG_LEVEL?.trim().toLowerCase();
	if (logLevel) {
		if (!isLogLevel(logLevel)) {
			throw new ConfigurationError(
				`FERRY_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")} (got "${env.FERRY_LOG_LEVEL}")`,
			);
		}
		config.logLevel = logLevel;
	}

	const trim = env.FERRY_TRIM_LAST_SLASH;
	if (trim?.trim()) {
		config.trimLastSlash = parseBoolean("FERRY_TRIM_LAST_SLASH", trim);
	}

	return config;
}
