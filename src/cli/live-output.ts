import cliTruncate from "cli-truncate";
import { createLogUpdate } from "log-update";

type LiveOutputOptions = {
	stdout?: NodeJS.WriteStream;
	maxWidth?: number;
};

export type LiveOutput = {
	render: (lines: string[]) => void;
	persist: (lines: string[]) => void;
	clear: () => void;
	stop: () => void;
};

/**
 * Redraws a block of lines in place. Lines are cut to the terminal width,
 * read on every draw so a resize takes effect.
 */
export const createLiveOutput = (
	options: LiveOutputOptions = {},
): LiveOutput => {
	const stdout = options.stdout ?? process.stdout;
	const updater = createLogUpdate(stdout);
	const width = () =>
		options.maxWidth ?? Math.max(20, (stdout.columns ?? 80) - 2);

	const draw = (lines: string[]) => {
		const maxWidth = width();
		updater(
			lines
				.map((line) => cliTruncate(line, maxWidth, { position: "end" }))
				.join("\n"),
		);
	};

	return {
		render: draw,
		persist: (lines) => {
			draw(lines);
			updater.done();
		},
		clear: () => updater.clear(),
		stop: () => updater.done(),
	};
};
