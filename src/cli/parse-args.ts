import process from "node:process";

import cac from "cac";
import { ExitCode } from "./exit-code";
import type { CliCommand, CliOptions } from "./types";

const COMMANDS = [
	"mirror",
	"sync",
	"verify",
	"delete",
	"status",
	"rollback",
	"init",
] as const;
type Command = (typeof COMMANDS)[number];

export type ParsedArgs = {
	command: Command | null;
	options: CliOptions;
	positionals: string[];
	help: boolean;
	parsed: CliCommand;
};

const VALUE_FLAGS = new Set(["--config", "-c"]);

const isCommand = (value: string): value is Command =>
	COMMANDS.some((command) => command === value);

const findCommandIndex = (rawArgs: string[]) => {
	for (let index = 0; index < rawArgs.length; index += 1) {
		const arg = rawArgs[index] ?? "";
		if (arg.startsWith("-")) {
			const [flag = ""] = arg.split("=");
			if (VALUE_FLAGS.has(flag) && !arg.includes("=")) {
				index += 1;
			}
			continue;
		}
		return index;
	}
	return -1;
};

const getCommandFromArgs = (rawArgs: string[]) => {
	const commandIndex = findCommandIndex(rawArgs);
	if (commandIndex === -1) {
		return null;
	}
	const command = rawArgs[commandIndex] ?? "";
	if (!isCommand(command)) {
		throw new Error(`Unknown command '${command}'.`);
	}
	return command;
};

const parsePositionals = (rawArgs: string[]) => {
	const commandIndex = findCommandIndex(rawArgs);
	const tail = commandIndex === -1 ? [] : rawArgs.slice(commandIndex + 1);
	const positionals: string[] = [];
	for (let index = 0; index < tail.length; index += 1) {
		const arg = tail[index] ?? "";
		if (VALUE_FLAGS.has(arg)) {
			index += 1;
			continue;
		}
		if (arg.startsWith("-")) {
			continue;
		}
		positionals.push(arg);
	}
	return positionals;
};

const buildOptions = (values: Record<string, unknown>): CliOptions => {
	const config = values.config;
	if (config !== undefined && (typeof config !== "string" || config.length === 0)) {
		throw new Error("--config expects a path.");
	}
	return {
		config: typeof config === "string" ? config : undefined,
		json: Boolean(values.json),
		silent: Boolean(values.silent),
		verbose: Boolean(values.verbose),
		repair: Boolean(values.repair),
		forceCheck: Boolean(values.forceCheck),
		skipSimpleRoot: Boolean(values.skipSimpleRoot),
		dryRun: Boolean(values.dryRun),
	};
};

const buildParsedCommand = (
	command: Command | null,
	options: CliOptions,
	positionals: string[],
): CliCommand => {
	const assertArity = (min: number, max: number, usage: string) => {
		if (positionals.length < min || positionals.length > max) {
			throw new Error(`Usage: ${usage}`);
		}
	};
	switch (command) {
		case "mirror":
			assertArity(0, 0, "mirror [--force-check]");
			return { command, options };
		case "sync":
			assertArity(1, Number.POSITIVE_INFINITY, "sync <package...> [--skip-simple-root]");
			return { command, packages: positionals, options };
		case "delete":
			assertArity(1, Number.POSITIVE_INFINITY, "delete <package...> [--dry-run]");
			return { command, packages: positionals, options };
		case "verify":
			assertArity(0, 0, "verify [--repair]");
			return { command, options };
		case "status":
			assertArity(0, 0, "status");
			return { command, options };
		case "rollback": {
			assertArity(1, 2, "rollback <package> [snapshot]");
			const [packageName = "", snapshot = null] = positionals;
			return { command, packageName, snapshot, options };
		}
		case "init":
			assertArity(0, 0, "init");
			return { command, options };
		default:
			return { command: null, options };
	}
};

export const parseArgs = (argv = process.argv): ParsedArgs => {
	try {
		const cli = cac("index-mirror");

		cli
			.option("-c, --config <path>", "Path to config file")
			.option("--json", "Output JSON")
			.option("--silent", "Suppress non-error output")
			.option("--verbose", "Enable verbose logging")
			.help();

		cli
			.command("mirror", "Bring the mirror up to the upstream serial")
			.option("--force-check", "Check every upstream package, not just the changelog");
		cli
			.command("sync <package...>", "Mirror the named packages now")
			.option("--skip-simple-root", "Leave the root index untouched");
		cli
			.command("delete <package...>", "Remove packages from the mirror")
			.option("--dry-run", "Only list what would be removed");
		cli
			.command("verify", "Re-check stored release files")
			.option("--repair", "Download failing files again");
		cli.command("status", "Show mirror state");
		cli.command(
			"rollback <package> [snapshot]",
			"List or restore historical index snapshots",
		);
		cli.command("init", "Create a new config interactively");

		const result = cli.parse(argv, { run: false });
		const rawArgs = argv.slice(2);
		const command = getCommandFromArgs(rawArgs);
		const options = buildOptions(result.options);
		const positionals = parsePositionals(rawArgs);
		return {
			command,
			options,
			positionals,
			help: Boolean(result.options.help),
			parsed: buildParsedCommand(command, options, positionals),
		};
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		console.error(message);
		process.exit(ExitCode.InvalidArgument);
	}
};
