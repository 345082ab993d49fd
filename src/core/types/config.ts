// CHANGE: Configuration types for the emit-check-result command and the output config file
// WHY: Shell parsers produce these; the app layer applies them to a ResultState
// PURITY: CORE

import type { ServiceState } from "../models.js";

/**
 * Contents of check-result.config.json. Every key is optional.
 *
 * @property branding Text emitted as the branding trailer
 */
export interface OutputConfig {
	readonly errorsLabel?: string;
	readonly thresholdsLabel?: string;
	readonly detailedInfoLabel?: string;
	readonly hideErrorsSection?: boolean;
	readonly hideThresholdsSection?: boolean;
	readonly branding?: string;
}

/**
 * Parsed command line of emit-check-result.
 *
 * @property state Declared state; OK when omitted
 * @property errors Messages for the errors section, in flag order
 * @property performanceData Raw `--perf` values, parsed later so that a bad
 *           entry ends up in the errors section instead of aborting the run
 * @property configPath Explicit `--config`; undefined means the default lookup
 */
export interface CLIOptions {
	readonly state: ServiceState;
	readonly summary: string;
	readonly longOutput: string;
	readonly warningThreshold: string;
	readonly criticalThreshold: string;
	readonly errors: ReadonlyArray<string>;
	readonly performanceData: ReadonlyArray<string>;
	readonly output: OutputConfig;
	readonly configPath?: string;
}

