/** Process exit statuses for mirror runs. */
export const ExitCode = {
	Success: 0,
	/** Run aborted, or an unexpected error escaped. */
	FatalError: 1,
	/** Run finished but some packages stay pending. */
	PartialFailure: 2,
	/** Bad CLI usage or an invalid config file. */
	InvalidArgument: 9,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
