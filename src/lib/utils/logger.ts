// Tagged console logger shared by the sync engine

export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
}

/** Console logger; every line is prefixed with `[tag]` */
export function createLogger(tag: string): Logger {
	const prefix = `[${tag}]`;
	return {
		debug: (message, ...details) => console.debug(prefix, message, ...details),
		info: (message, ...details) => console.info(prefix, message, ...details),
		warn: (message, ...details) => console.warn(prefix, message, ...details),
		error: (message, ...details) => console.error(prefix, message, ...details)
	};
}

/** Discards everything (tests, headless tools) */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {}
};
