// CHANGE: Functional Core domain models for plugin check results
// WHY: The supervisor reads only the exit code and stdout; both are fixed by these constants
// PURITY: CORE
// INVARIANT: CORE defines no effects; constants are immutable
// COMPLEXITY: O(1)

/**
 * Exit codes understood by Nagios-compatible supervisors, keyed by state label.
 *
 * @remarks
 * Mirrors `utils.sh` shipped with the standard plugins
 * (`/usr/lib/nagios/plugins/utils.sh`).
 */
export const StateExitCode = {
	OK: 0,
	WARNING: 1,
	CRITICAL: 2,
	UNKNOWN: 3,
	DEPENDENT: 4,
} as const;

export type StateLabel = keyof typeof StateExitCode;

/**
 * Exit code of one of the known states.
 *
 * @invariant ExitCode ∈ {0, 1, 2, 3, 4}
 */
export type ExitCode = (typeof StateExitCode)[StateLabel];

/**
 * Status label and exit code for a service check.
 */
export interface ServiceState {
	readonly label: StateLabel;
	readonly exitCode: ExitCode;
}

/**
 * Line terminator for rendered check output.
 *
 * @remarks
 * A bare LF inside `$LONGSERVICEOUTPUT$` is shown literally by Nagios Core,
 * and CRLF doubles line breaks in Nagios XI. A space followed by LF renders
 * as one line break in both.
 */
export const CHECK_OUTPUT_EOL = " \n";

export const DEFAULT_THRESHOLDS_LABEL = "THRESHOLDS";
export const DEFAULT_ERRORS_LABEL = "ERRORS";
export const DEFAULT_DETAILED_INFO_LABEL = "DETAILED INFO";

/** Separator the supervisor splits performance data on. */
export const PERFORMANCE_DATA_HEADER = "|";

/**
 * Markdown fence around crash details. `<pre>` cannot be used: Nagios strips
 * angle brackets via `illegal_macro_output_chars`.
 */
export const FENCED_BLOCK_DELIMITER = "```";

export const PLUGIN_CRASH_SUMMARY = `CRITICAL: plugin crash detected. See details via web UI or run plugin manually via CLI.`;

/**
 * One plugin performance data point.
 *
 * @remarks
 * Only `label` and `value` are required. The remaining fields follow the
 * plugin guidelines (https://nagios-plugins.org/doc/guidelines.html#AEN200)
 * but are not checked against each other.
 */
export interface PerformanceMetric {
	/**
	 * Ideally unique within its first 19 characters (RRD limitation). Words are
	 * conventionally separated by underscores, e.g. `percent_packet_loss`.
	 */
	readonly label: string;
	/** In class `[-0-9.]`, or a literal `U` when the value could not be determined. */
	readonly value: string;
	/** `s`, `ms`, `%`, `B`, `KB`, `c` (continuous counter), or empty for a plain count. */
	readonly unitOfMeasurement?: string;
	readonly warn?: string;
	readonly crit?: string;
	readonly min?: string;
	readonly max?: string;
}

/**
 * Called once before exit; the returned text identifies the plugin (and its
 * version) in the notification.
 */
export type BrandingCallback = () => string;

/**
 * Read-only view of everything the renderer needs.
 *
 * @pure true
 */
export interface CheckResultView {
	readonly serviceOutput: string;
	readonly longServiceOutput: string;
	readonly errors: ReadonlyArray<Error>;
	readonly performanceMetrics: ReadonlyArray<PerformanceMetric>;
	readonly warningThreshold: string;
	readonly criticalThreshold: string;
	readonly thresholdsLabel: string | undefined;
	readonly errorsLabel: string | undefined;
	readonly detailedInfoLabel: string | undefined;
	readonly hideThresholdsSection: boolean;
	readonly hideErrorsSection: boolean;
	readonly brandingCallback: BrandingCallback | undefined;
}
