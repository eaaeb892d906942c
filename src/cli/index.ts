import process from "node:process";
import pc from "picocolors";
import { ConfigError } from "../errors";
import { createLogger, type Logger } from "../logger";
import type { SyncEvent, SyncReport } from "../sync";
import { ExitCode } from "./exit-code";
import { parseArgs } from "./parse-args";
import { RunReporter } from "./run-reporter";
import type { CliCommand, CliOptions } from "./types";
import { setSilentMode, symbols, ui } from "./ui";

export const CLI_NAME = "index-mirror";

const HELP_TEXT = `
Usage: ${CLI_NAME} <command> [options]

Commands:
  mirror [--force-check]         Bring the mirror up to the upstream serial
  sync <package...>              Mirror the named packages now
    [--skip-simple-root]
  verify [--repair]              Re-check stored release files
  delete <package...>            Remove packages from the mirror
    [--dry-run]
  status                         Show mirror state
  rollback <package> [snapshot]  List or restore index snapshots
  init                           Create a new config interactively

Global options:
  -c, --config <path>
  --json
  --silent
  --verbose
`;

const printHelp = () => {
	process.stdout.write(HELP_TEXT.trimStart());
};

const printError = (message: string) => {
	process.stderr.write(`${symbols.error} ${message}\n`);
};

const exitCodeFor = (report: SyncReport) => {
	switch (report.run.outcome) {
		case "Success":
			return ExitCode.Success;
		case "PartialFailure":
			return ExitCode.PartialFailure;
		default:
			return ExitCode.FatalError;
	}
};

const printReport = (report: SyncReport, reporter: RunReporter | null) => {
	const { run } = report;
	const summary = ui.runSummary(
		run.kind,
		run.outcome,
		run.errors.length,
		ui.serialRange(report.fromSerial, report.state.currentSerial),
	);
	if (reporter) {
		reporter.finish(summary);
	} else {
		ui.line(summary);
	}
	if (report.failed.length > 0) {
		ui.line(ui.pending(report.failed));
	}
	if (report.diffFilePath) {
		ui.line(`${symbols.info} Diff file ${pc.gray(ui.path(report.diffFilePath))}`);
	}
};

const runWithReporter = async (
	options: CliOptions,
	execute: (
		onEvent: ((event: SyncEvent) => void) | undefined,
		logger: Logger,
	) => Promise<SyncReport>,
) => {
	const logger = createLogger({
		verbose: options.verbose,
		silent: options.silent || options.json,
	});
	const reporter = options.json || options.silent ? null : new RunReporter();
	let report: SyncReport;
	try {
		report = await execute(reporter?.handle, logger);
	} catch (error) {
		reporter?.stop();
		throw error;
	}
	if (options.json) {
		process.stdout.write(`${JSON.stringify(report, jsonReplacer, 2)}\n`);
	} else {
		printReport(report, reporter);
	}
	process.exitCode = exitCodeFor(report);
};

const jsonReplacer = (_key: string, value: unknown) =>
	value instanceof Set ? Array.from(value).sort() : value;

const createCoordinator = async (
	options: CliOptions,
	onEvent: ((event: SyncEvent) => void) | undefined,
	logger: Logger,
) => {
	const { loadConfig } = await import("../config");
	const { SyncCoordinator } = await import("../sync");
	const { config } = await loadConfig(options.config);
	const controller = new AbortController();
	const onSignal = () => {
		logger.warn("Cancelling; waiting for running jobs to finish.");
		controller.abort();
	};
	process.once("SIGINT", onSignal);
	process.once("SIGTERM", onSignal);
	return new SyncCoordinator(config, {
		logger,
		onEvent,
		signal: controller.signal,
	});
};

const runCommand = async (parsed: CliCommand) => {
	const { options } = parsed;
	switch (parsed.command) {
		case "mirror":
			await runWithReporter(options, async (onEvent, logger) =>
				(await createCoordinator(options, onEvent, logger)).runMirror({
					forceCheck: options.forceCheck,
				}),
			);
			return;
		case "sync":
			await runWithReporter(options, async (onEvent, logger) =>
				(await createCoordinator(options, onEvent, logger)).syncPackages(
					parsed.packages,
					{ skipRootIndex: options.skipSimpleRoot },
				),
			);
			return;
		case "delete":
			await runWithReporter(options, async (onEvent, logger) =>
				(await createCoordinator(options, onEvent, logger)).deletePackages(
					parsed.packages,
					{ dryRun: options.dryRun },
				),
			);
			return;
		case "verify":
			await runWithReporter(options, async (onEvent, logger) => {
				const coordinator = await createCoordinator(options, onEvent, logger);
				const report = await coordinator.verifyMirror();
				if (!options.repair || report.failed.length === 0) {
					return report;
				}
				logger.info(`Repairing ${report.failed.length} package(s).`);
				return coordinator.syncPackages(report.failed);
			});
			return;
		case "status": {
			const { getStatus, printStatus } = await import("../status");
			const status = await getStatus({ configPath: options.config });
			if (options.json) {
				process.stdout.write(`${JSON.stringify(status, null, 2)}\n`);
			} else {
				printStatus(status);
			}
			return;
		}
		case "rollback": {
			const { rollbackIndex } = await import("../rollback");
			const result = await rollbackIndex({
				configPath: options.config,
				packageName: parsed.packageName,
				snapshot: parsed.snapshot,
			});
			if (options.json) {
				process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
				return;
			}
			if (result.restored) {
				ui.line(`${symbols.success} Restored ${pc.bold(result.restored)}`);
				return;
			}
			if (result.snapshots.length === 0) {
				ui.line(`${symbols.info} No snapshots for ${result.packageName}.`);
				return;
			}
			for (const snapshot of result.snapshots) {
				ui.item(
					symbols.info,
					snapshot.key.split("/").at(-1) ?? snapshot.key,
					`serial ${snapshot.serialAtGeneration}`,
				);
			}
			return;
		}
		case "init": {
			const { initConfig } = await import("../init");
			if (options.config) {
				throw new Error("Init does not accept --config. Run it in the target directory.");
			}
			const result = await initConfig();
			if (options.json) {
				process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
			} else {
				ui.line(`${symbols.success} Wrote ${pc.gray(ui.path(result.configPath))}`);
			}
			return;
		}
		case null:
			printHelp();
			process.exitCode = ExitCode.InvalidArgument;
			return;
	}
};

/**
 * The main entry point of the CLI
 */
export async function main(): Promise<void> {
	try {
		process.on("uncaughtException", errorHandler);
		process.on("unhandledRejection", errorHandler);

		const parsed = parseArgs();

		// Set silent mode if the flag is present
		setSilentMode(parsed.options.silent);

		if (parsed.help) {
			printHelp();
			process.exit(ExitCode.Success);
		}

		await runCommand(parsed.parsed);
	} catch (error) {
		errorHandler(error);
	}
}

function errorHandler(error: unknown): void {
	const message = error instanceof Error ? error.message : String(error);
	printError(message);
	process.exit(
		error instanceof ConfigError ? ExitCode.InvalidArgument : ExitCode.FatalError,
	);
}
