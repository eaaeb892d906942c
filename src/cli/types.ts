export type CliOptions = {
	config?: string;
	json: boolean;
	silent: boolean;
	verbose: boolean;
	repair: boolean;
	forceCheck: boolean;
	skipSimpleRoot: boolean;
	dryRun: boolean;
};

export type CliCommand =
	| { command: "mirror"; options: CliOptions }
	| { command: "sync"; packages: string[]; options: CliOptions }
	| { command: "verify"; options: CliOptions }
	| { command: "delete"; packages: string[]; options: CliOptions }
	| { command: "status"; options: CliOptions }
	| {
			command: "rollback";
			packageName: string;
			snapshot: string | null;
			options: CliOptions;
	  }
	| { command: "init"; options: CliOptions }
	| { command: null; options: CliOptions };
