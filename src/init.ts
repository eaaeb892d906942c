import path from "node:path";
import {
	confirm as clackConfirm,
	isCancel as clackIsCancel,
	select as clackSelect,
	text as clackText,
} from "@clack/prompts";
import {
	buildExampleOptions,
	configExists,
	DEFAULT_CONFIG_FILENAME,
	DEFAULT_MASTER,
	type SimpleFormat,
	validateConfig,
	writeConfig,
} from "./config";

type InitOptions = {
	cwd?: string;
};

type PromptDeps = {
	confirm?: (options: {
		message: string;
		initialValue: boolean;
	}) => Promise<boolean | symbol>;
	isCancel?: (value: unknown) => value is symbol;
	select?: (options: {
		message: string;
		options: Array<{ value: SimpleFormat; label: string }>;
		initialValue: SimpleFormat;
	}) => Promise<SimpleFormat | symbol>;
	text?: (options: {
		message: string;
		initialValue: string;
	}) => Promise<string | symbol>;
};

const cancelled = () => new Error("Init cancelled.");

/**
 * Asks for the essentials and writes `mirror.config.json` in `cwd`.
 */
export const initConfig = async (
	options: InitOptions = {},
	deps: PromptDeps = {},
) => {
	const cwd = options.cwd ?? process.cwd();
	const confirm = deps.confirm ?? clackConfirm;
	const isCancel = deps.isCancel ?? clackIsCancel;
	const select: NonNullable<PromptDeps["select"]> = deps.select ?? clackSelect;
	const text = deps.text ?? clackText;
	const configPath = path.resolve(cwd, DEFAULT_CONFIG_FILENAME);

	if (await configExists(configPath)) {
		throw new Error(`Config already exists at ${configPath}.`);
	}

	const directoryAnswer = await text({
		message: "Mirror directory",
		initialValue: "mirror",
	});
	if (isCancel(directoryAnswer)) {
		throw cancelled();
	}
	const masterAnswer = await text({
		message: "Upstream index URL",
		initialValue: DEFAULT_MASTER,
	});
	if (isCancel(masterAnswer)) {
		throw cancelled();
	}
	const formatAnswer = await select({
		message: "Simple index format",
		options: [
			{ value: "ALL", label: "HTML and JSON" },
			{ value: "HTML", label: "HTML only" },
			{ value: "JSON", label: "JSON only" },
		],
		initialValue: "ALL",
	});
	if (isCancel(formatAnswer)) {
		throw cancelled();
	}
	const releaseFilesAnswer = await confirm({
		message: "Download release files",
		initialValue: true,
	});
	if (isCancel(releaseFilesAnswer)) {
		throw cancelled();
	}

	const directory = directoryAnswer.length > 0 ? directoryAnswer : "mirror";
	const master = masterAnswer.length > 0 ? masterAnswer : DEFAULT_MASTER;
	const mirrorOptions = buildExampleOptions({
		directory,
		master,
		"simple-format": formatAnswer,
		"release-files": releaseFilesAnswer === true,
	});
	// Fails before anything is written when the answers do not validate.
	validateConfig(mirrorOptions, cwd);
	await writeConfig(configPath, mirrorOptions);
	return { configPath, options: mirrorOptions };
};
