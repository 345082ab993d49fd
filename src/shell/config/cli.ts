// CHANGE: Command line parsing for emit-check-result
// WHY: Shell scripts report a result by flags instead of building a ResultState in code
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: parseCLIArgs never throws; bad input is a CliUsageError value
// COMPLEXITY: O(n) where n = |argv|

import { Either, Option, pipe } from "effect";

import { parseServiceState } from "../../core/decision.js";
import { CliUsageError } from "../../core/errors.js";
import { StateExitCode } from "../../core/models.js";
import type { CLIOptions, OutputConfig } from "../../core/types/index.js";

type ParseState = Omit<CLIOptions, "configPath"> & {
	readonly configPath: string | undefined;
};

type ValueFlagHandler = (
	current: ParseState,
	value: string,
) => Either.Either<ParseState, CliUsageError>;

type BooleanFlagHandler = (current: ParseState) => ParseState;

const initialState: ParseState = {
	state: { label: "OK", exitCode: StateExitCode.OK },
	summary: "",
	longOutput: "",
	warningThreshold: "",
	criticalThreshold: "",
	errors: [],
	performanceData: [],
	output: {},
	configPath: undefined,
};

const withOutput = (current: ParseState, output: OutputConfig): ParseState => ({
	...current,
	output: { ...current.output, ...output },
});

const valueHandlers: Readonly<Record<string, ValueFlagHandler>> = {
	"--state": (current, value) =>
		pipe(
			parseServiceState(value),
			Option.match({
				onNone: () =>
					Either.left(new CliUsageError({ detail: `unknown state "${value}"` })),
				onSome: (state) => Either.right({ ...current, state }),
			}),
		),
	"--summary": (current, summary) => Either.right({ ...current, summary }),
	"--long": (current, longOutput) => Either.right({ ...current, longOutput }),
	"--warning": (current, warningThreshold) =>
		Either.right({ ...current, warningThreshold }),
	"--critical": (current, criticalThreshold) =>
		Either.right({ ...current, criticalThreshold }),
	"--config": (current, configPath) => Either.right({ ...current, configPath }),
	"--error": (current, value) =>
		Either.right({ ...current, errors: [...current.errors, value] }),
	"--perf": (current, value) =>
		Either.right({
			...current,
			performanceData: [...current.performanceData, value],
		}),
	"--errors-label": (current, errorsLabel) =>
		Either.right(withOutput(current, { errorsLabel })),
	"--thresholds-label": (current, thresholdsLabel) =>
		Either.right(withOutput(current, { thresholdsLabel })),
	"--detailed-info-label": (current, detailedInfoLabel) =>
		Either.right(withOutput(current, { detailedInfoLabel })),
	"--branding": (current, branding) =>
		Either.right(withOutput(current, { branding })),
};

const booleanHandlers: Readonly<Record<string, BooleanFlagHandler>> = {
	"--hide-errors": (current) =>
		withOutput(current, { hideErrorsSection: true }),
	"--hide-thresholds": (current) =>
		withOutput(current, { hideThresholdsSection: true }),
};

const lookup = <H>(
	table: Readonly<Record<string, H>>,
	arg: string,
): H | undefined => (Object.hasOwn(table, arg) ? table[arg] : undefined);

interface ArgProcessResult {
	readonly state: ParseState;
	readonly skipNext: boolean;
}

function processArgument(
	arg: string,
	next: string | undefined,
	current: ParseState,
): Either.Either<ArgProcessResult, CliUsageError> {
	const valueHandler = lookup(valueHandlers, arg);
	if (valueHandler !== undefined) {
		if (next === undefined) {
			return Either.left(
				new CliUsageError({ detail: `missing value for ${arg}` }),
			);
		}
		return Either.map(valueHandler(current, next), (state) => ({
			state,
			skipNext: true,
		}));
	}

	const booleanHandler = lookup(booleanHandlers, arg);
	if (booleanHandler !== undefined) {
		return Either.right({ state: booleanHandler(current), skipNext: false });
	}

	return Either.left(new CliUsageError({ detail: `unknown argument "${arg}"` }));
}

/**
 * Parses emit-check-result arguments.
 *
 * @param argv - Arguments without the node binary and script path
 * @returns Options, or the first usage problem
 *
 * @example
 * ```ts
 * // Command: emit-check-result --state warning --summary "WARNING: disk 91%" --perf "disk=91%;80;90;0;100"
 * parseCLIArgs();
 * // Right({ state: { label: "WARNING", exitCode: 1 }, summary: "WARNING: disk 91%", ... })
 * ```
 */
export function parseCLIArgs(
	argv: ReadonlyArray<string> = process.argv.slice(2),
): Either.Either<CLIOptions, CliUsageError> {
	let state = initialState;

	for (let i = 0; i < argv.length; i++) {
		const arg = argv.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, argv.at(i + 1), state);
		if (Either.isLeft(result)) return Either.left(result.left);

		state = result.right.state;
		if (result.right.skipNext) {
			i++;
		}
	}

	// exactOptionalPropertyTypes: an absent configPath is modelled by omitting the key
	const { configPath, ...rest } = state;
	return Either.right(configPath === undefined ? rest : { ...rest, configPath });
}
