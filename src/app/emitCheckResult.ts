// CHANGE: APP orchestration of the emit-check-result command
// WHY: Shell scripts get the same output format and exit codes as plugins written against the library
// PURITY: APP
// EFFECT: Effect<void, never, PluginRuntime>
// INVARIANT: usage errors exit UNKNOWN; a bad --perf entry or config file only adds to the errors section
// COMPLEXITY: O(n + p) where n = |argv|, p = |performance data entries|

import { Effect, Either, Option } from "effect";

import type { ConfigLoadError, CliUsageError } from "../core/errors.js";
import { StateExitCode } from "../core/models.js";
import { parsePerformanceMetric } from "../core/perfdata.js";
import { ResultState } from "../core/result-state.js";
import type { CLIOptions, OutputConfig } from "../core/types/index.js";
import { parseCLIArgs } from "../shell/config/cli.js";
import { loadOutputConfig, resolveConfigPath } from "../shell/config/loader.js";
import { NodePluginRuntime, type PluginRuntime } from "../shell/runtime.js";
import { runCheck } from "./runCheck.js";

interface LoadedConfig {
	readonly config: OutputConfig;
	readonly problems: ReadonlyArray<ConfigLoadError>;
}

/**
 * Copies the labels, visibility flags and branding of a config onto the state.
 */
export function applyOutputConfig(
	state: ResultState,
	config: OutputConfig,
): void {
	if (config.errorsLabel !== undefined) state.errorsLabel = config.errorsLabel;
	if (config.thresholdsLabel !== undefined) {
		state.thresholdsLabel = config.thresholdsLabel;
	}
	if (config.detailedInfoLabel !== undefined) {
		state.detailedInfoLabel = config.detailedInfoLabel;
	}
	if (config.hideErrorsSection !== undefined) {
		state.hideErrorsSection = config.hideErrorsSection;
	}
	if (config.hideThresholdsSection !== undefined) {
		state.hideThresholdsSection = config.hideThresholdsSection;
	}
	const { branding } = config;
	if (branding !== undefined) state.brandingCallback = () => branding;
}

const loadConfig = (
	explicitPath: string | undefined,
): Effect.Effect<LoadedConfig> =>
	Option.match(resolveConfigPath(explicitPath), {
		onNone: (): Effect.Effect<LoadedConfig> =>
			Effect.succeed({ config: {}, problems: [] }),
		onSome: (configPath): Effect.Effect<LoadedConfig> =>
			loadOutputConfig(configPath).pipe(
				Effect.map((config): LoadedConfig => ({ config, problems: [] })),
				Effect.catchAll((error) =>
					Effect.sync((): LoadedConfig => {
						console.error(error.message);
						return { config: {}, problems: [error] };
					}),
				),
			),
	});

const appendPerformanceData = (
	state: ResultState,
	entries: ReadonlyArray<string>,
): void => {
	for (const entry of entries) {
		const appended = Either.flatMap(parsePerformanceMetric(entry), (metric) =>
			state.appendPerformanceMetrics(false, metric),
		);
		if (Either.isLeft(appended)) {
			state.appendErrors(appended.left);
		}
	}
};

/**
 * Fills the state from parsed options and the merged output config.
 */
export function populateState(
	state: ResultState,
	options: CLIOptions,
	fileConfig: OutputConfig,
): void {
	state.exitStatusCode = options.state.exitCode;
	state.serviceOutput = options.summary;
	state.longServiceOutput = options.longOutput;
	state.warningThreshold = options.warningThreshold;
	state.criticalThreshold = options.criticalThreshold;
	applyOutputConfig(state, { ...fileConfig, ...options.output });
	state.appendErrors(...options.errors.map((message) => new Error(message)));
	appendPerformanceData(state, options.performanceData);
}

const reportUsageError = (state: ResultState, error: CliUsageError): void => {
	state.exitStatusCode = StateExitCode.UNKNOWN;
	state.serviceOutput = `UNKNOWN: ${error.message}`;
};

/**
 * Builds a result from command line arguments and finalizes it.
 *
 * @param argv - Arguments without the node binary and script path
 * @effect Effect<void, never, PluginRuntime>
 */
export const emitCheckResult = (
	argv: ReadonlyArray<string>,
): Effect.Effect<void, never, PluginRuntime> => {
	const state = new ResultState();
	const program = Either.match(parseCLIArgs(argv), {
		onLeft: (error) => Effect.sync(() => reportUsageError(state, error)),
		onRight: (options) =>
			Effect.gen(function* () {
				const loaded = yield* loadConfig(options.configPath);
				populateState(state, options, loaded.config);
				state.appendErrors(...loaded.problems);
			}),
	});
	return runCheck(state, program);
};

/**
 * {@link emitCheckResult} on Node.js.
 */
export const runEmitCheckResult = (
	argv: ReadonlyArray<string>,
): Promise<void> =>
	Effect.runPromise(emitCheckResult(argv).pipe(Effect.provide(NodePluginRuntime)));
