import pc from "picocolors";
import { symbols } from "./cli/ui";

export type Logger = {
	debug: (message: string) => void;
	info: (message: string) => void;
	warn: (message: string) => void;
	error: (message: string) => void;
};

export type LoggerOptions = {
	verbose?: boolean;
	silent?: boolean;
	stdout?: NodeJS.WritableStream;
	stderr?: NodeJS.WritableStream;
};

export const createLogger = (options: LoggerOptions = {}): Logger => {
	const stdout = options.stdout ?? process.stdout;
	const stderr = options.stderr ?? process.stderr;
	return {
		debug: (message) => {
			if (!options.verbose || options.silent) return;
			stdout.write(`${pc.dim(`  ${message}`)}\n`);
		},
		info: (message) => {
			if (options.silent) return;
			stdout.write(`${symbols.info} ${message}\n`);
		},
		warn: (message) => {
			if (options.silent) return;
			stderr.write(`${symbols.warn} ${message}\n`);
		},
		// Errors are written even in silent mode.
		error: (message) => {
			stderr.write(`${symbols.error} ${message}\n`);
		},
	};
};

export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};

/**
 * Captures log lines in memory.
 */
export const createMemoryLogger = () => {
	const lines: Array<{ level: keyof Logger; message: string }> = [];
	const logger: Logger = {
		debug: (message) => lines.push({ level: "debug", message }),
		info: (message) => lines.push({ level: "info", message }),
		warn: (message) => lines.push({ level: "warn", message }),
		error: (message) => lines.push({ level: "error", message }),
	};
	return { logger, lines };
};
