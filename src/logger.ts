import { createClog } from "@marianmeres/clog";

/**
 * Logger interface compatible with console and @marianmeres/clog.
 * All methods accept variadic arguments.
 */
export interface Logger {
	debug: (...args: unknown[]) => unknown;
	log: (...args: unknown[]) => unknown;
	warn: (...args: unknown[]) => unknown;
	error: (...args: unknown[]) => unknown;
}

/**
 * Creates the default namespaced logger used by circuits which were not
 * given a custom one.
 */
export function createLogger(namespace = "circuit"): Logger {
	return createClog(namespace);
}
