// CHANGE: Public API entry point for plugin authors
// WHY: Export the state, the finalizer and its composition helpers; keep parsers and loaders internal
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are pure functions, typed interfaces, or Effects
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// RUNNING A PLUGIN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run a plugin body and finalize its state.
 *
 * @example
 * ```typescript
 * import { ResultState, StateExitCode, pluginBody, runPlugin } from "plugin-check-result";
 *
 * const state = new ResultState();
 * await runPlugin(state, pluginBody(async () => {
 *   const used = await diskUsagePercent("/");
 *   state.exitStatusCode = used > 90 ? StateExitCode.CRITICAL : StateExitCode.OK;
 *   state.serviceOutput = `${used > 90 ? "CRITICAL" : "OK"}: / is ${used}% full`;
 *   state.appendPerformanceMetrics(false, { label: "disk_used", value: String(used), unitOfMeasurement: "%" });
 * }));
 * ```
 */
export { pluginBody, runCheck, runPlugin } from "./app/runCheck.js";
export { returnCheckResults } from "./shell/finalize.js";
export {
	type FaultEventSource,
	type FaultHandlerOptions,
	registerFaultHandlers,
} from "./shell/process-hooks.js";
export {
	captureStackTrace,
	NodePluginRuntime,
	PluginRuntime,
	type PluginRuntimeService,
} from "./shell/runtime.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND STATE
// ═══════════════════════════════════════════════════════════════════════════════

export { ResultState, type ResultStateInit } from "./core/result-state.js";
export {
	type BrandingCallback,
	CHECK_OUTPUT_EOL,
	type CheckResultView,
	DEFAULT_DETAILED_INFO_LABEL,
	DEFAULT_ERRORS_LABEL,
	DEFAULT_THRESHOLDS_LABEL,
	type ExitCode,
	type PerformanceMetric,
	PLUGIN_CRASH_SUMMARY,
	type ServiceState,
	StateExitCode,
	type StateLabel,
} from "./core/models.js";

/**
 * Typed errors, discriminated by `_tag`.
 */
export {
	ConfigLoadError,
	CliUsageError,
	MalformedPerformanceData,
	NoPerformanceDataProvided,
	PanicDetected,
	type PerformanceDataError,
	PerformanceDataMissingLabel,
	PerformanceDataMissingValue,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	formatPerformanceMetric,
	parsePerformanceMetric,
	validatePerformanceMetric,
} from "./core/perfdata.js";
export { renderCheckResults } from "./core/render.js";
export { parseServiceState, stateLabelForExitCode } from "./core/decision.js";
