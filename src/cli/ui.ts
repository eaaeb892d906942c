import path from "node:path";
import pc from "picocolors";
import { toPosixPath } from "../paths";
import type { SyncOutcome } from "../sync";

export const symbols = {
	error: pc.red("✖"),
	success: pc.green("✔"),
	info: pc.blue("ℹ"),
	warn: pc.yellow("⚠"),
};

let silent = false;

export const setSilentMode = (value: boolean) => {
	silent = value;
};

const write = (text: string) => {
	if (silent) return;
	process.stdout.write(`${text}\n`);
};

const plural = (count: number, noun: string) =>
	`${count} ${noun}${count === 1 ? "" : "s"}`;

const outcomeSymbol = (outcome: SyncOutcome | null) => {
	if (outcome === "Success") return symbols.success;
	if (outcome === "PartialFailure") return symbols.warn;
	return symbols.error;
};

export const ui = {
	plural,

	/** Shortest of the absolute path and the cwd-relative one. */
	path: (value: string) => {
		const relative = path.relative(process.cwd(), value);
		return toPosixPath(relative.length < value.length ? relative : value);
	},

	/** Current serial, with the serial a partial run still owes. */
	serial: (current: number, target: number) =>
		target > current
			? `${current} ${pc.dim(`(target ${target})`)}`
			: String(current),

	serialRange: (from: number, to: number) =>
		from === to ? `serial ${to}` : `serial ${from} → ${to}`,

	runSummary: (
		kind: string,
		outcome: SyncOutcome | null,
		errorCount: number,
		serialText: string,
	) => {
		const icon = outcomeSymbol(outcome);
		if (outcome === "Success") {
			return `${icon} ${kind} finished · ${serialText}`;
		}
		if (outcome === "PartialFailure") {
			return `${icon} ${kind} finished with ${plural(errorCount, "error")} · ${serialText}`;
		}
		return `${icon} ${kind} aborted · ${serialText}`;
	},

	pending: (names: readonly string[]) =>
		`${symbols.warn} ${plural(names.length, "pending package")}: ${names.join(", ")}`,

	line: (text = "") => write(text),

	header: (label: string, value: string) =>
		write(`${symbols.info} ${label.padEnd(10)} ${value}`),

	item: (icon: string, label: string, details?: string) =>
		write(`  ${icon} ${pc.bold(label)} ${details ? pc.gray(details) : ""}`),
};
