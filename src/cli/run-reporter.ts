import pc from "picocolors";
import type { SyncEvent, SyncPhase } from "../sync";
import { createLiveOutput, type LiveOutput } from "./live-output";
import { symbols } from "./ui";

const formatDuration = (ms: number) => {
	const seconds = Math.max(0, ms / 1000);
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = seconds % 60;
	return `${minutes}m ${remainder.toFixed(1)}s`;
};

const plural = (count: number, noun: string) =>
	`${count} ${noun}${count === 1 ? "" : "s"}`;

export type RunReporterOptions = {
	/** Recent file lines kept under the package results. */
	maxLiveLines?: number;
	output?: LiveOutput;
};

/**
 * Live terminal view of a sync run: one line per finished package, the
 * current phase with elapsed time, and the latest verified files.
 */
export class RunReporter {
	private readonly output: LiveOutput;
	private readonly maxLiveLines: number;
	private readonly startTime = Date.now();
	private readonly results: string[] = [];
	private readonly liveLines: string[] = [];
	private readonly hasTty = Boolean(process.stdout.isTTY);
	private timer: NodeJS.Timeout | null = null;
	private phase: SyncPhase | null = null;
	private verified = 0;
	private failures = 0;
	private missing = 0;

	constructor(options: RunReporterOptions = {}) {
		this.output = options.output ?? createLiveOutput();
		this.maxLiveLines = options.maxLiveLines ?? 4;
		this.startTimer();
	}

	readonly handle = (event: SyncEvent) => {
		switch (event.type) {
			case "phase":
				this.phase = event.phase;
				break;
			case "file":
				if (event.status === "verified") {
					this.verified += 1;
					this.pushLive(pc.dim(`verified ${event.filename}`));
				}
				break;
			case "package":
				this.recordPackage(event.name, event.status);
				break;
		}
		this.render();
	};

	finish(summary: string) {
		this.liveLines.length = 0;
		this.phase = null;
		const parts = [
			`${plural(this.verified, "file")} verified in ${formatDuration(Date.now() - this.startTime)}`,
			this.missing ? `${this.missing} missing` : "",
			this.failures ? `${this.failures} pending` : "",
		].filter((part) => part.length > 0);
		this.output.persist(this.composeView([`${summary} · ${parts.join(" · ")}`]));
		this.stopTimer();
	}

	stop() {
		this.output.stop();
		this.stopTimer();
	}

	private recordPackage(
		name: string,
		status: Extract<SyncEvent, { type: "package" }>["status"],
	) {
		switch (status) {
			case "committed":
				this.results.push(this.formatLine(symbols.success, name));
				this.liveLines.length = 0;
				return;
			case "missing":
				this.missing += 1;
				this.results.push(this.formatLine(symbols.warn, name, "not found upstream"));
				return;
			case "failed":
				this.failures += 1;
				this.results.push(this.formatLine(symbols.error, name, "left pending"));
				return;
			case "deleted":
				this.results.push(this.formatLine(symbols.info, name, "deleted"));
				return;
		}
	}

	private pushLive(line: string) {
		this.liveLines.push(line);
		if (this.liveLines.length > this.maxLiveLines) {
			this.liveLines.splice(0, this.liveLines.length - this.maxLiveLines);
		}
	}

	private render() {
		if (!this.hasTty) return;
		this.output.render(this.composeView());
	}

	private startTimer() {
		if (!this.hasTty) return;
		this.timer = setInterval(() => {
			if (this.phase !== null) {
				this.render();
			}
		}, 250);
		this.timer.unref?.();
	}

	private stopTimer() {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
	}

	private composeView(footer: string[] = []) {
		const current =
			this.phase === null
				? ""
				: `${pc.cyan("→")} ${this.phase} ${pc.dim(formatDuration(Date.now() - this.startTime))}`;
		const lines = [...this.results, current, ...this.liveLines, ...footer].filter(
			(line) => line.length > 0,
		);
		return lines.length > 0 ? lines : [" "];
	}

	private formatLine(icon: string, label: string, details?: string) {
		const partDetails = details ? pc.gray(details) : "";
		return `  ${icon} ${pc.bold(label)} ${partDetails}`.trimEnd();
	}
}
