/**
 * The slice of a logger the launcher components need. Fastify's pino
 * logger (`app.log`) and `console` both satisfy it.
 */
export interface Logger {
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

/** Console sink with a bracketed component prefix, e.g. `[generate]`. */
export function createConsoleLogger(prefix: string): Logger {
	return {
		info: (message) => console.log(`[${prefix}] ${message}`),
		warn: (message) => console.warn(`[${prefix}] ${message}`),
		error: (message) => console.error(`[${prefix}] ${message}`),
	};
}

export const silentLogger: Logger = {
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};
