// CHANGE: Typed domain error ADT for check results using Effect.Data
// WHY: Callers match on `_tag` to handle a specific failure
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values, discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * A performance metric without a label.
 *
 * @pure true (Data class)
 */
export class PerformanceDataMissingLabel extends Data.TaggedError(
	"PerformanceDataMissingLabel",
)<{}> {
	override readonly message = "provided performance data missing required label";
}

/**
 * A performance metric without a value.
 *
 * @pure true (Data class)
 */
export class PerformanceDataMissingValue extends Data.TaggedError(
	"PerformanceDataMissingValue",
)<{}> {
	override readonly message = "provided performance data missing required value";
}

/**
 * An empty batch was passed to `appendPerformanceMetrics`.
 *
 * @pure true (Data class)
 */
export class NoPerformanceDataProvided extends Data.TaggedError(
	"NoPerformanceDataProvided",
)<{}> {
	override readonly message = "no performance data provided";
}

/**
 * Text that is not in `label=value[UOM];warn;crit;min;max` form.
 *
 * @pure true (Data class)
 * @invariant input is the rejected text
 */
export class MalformedPerformanceData extends Data.TaggedError(
	"MalformedPerformanceData",
)<{
	readonly input: string;
}> {
	override readonly message = `malformed performance data: "${this.input}"`;
}

/**
 * The plugin body crashed and the finalizer intercepted it.
 *
 * @pure true (Data class)
 * @invariant detail is the printable form of fault
 */
export class PanicDetected extends Data.TaggedError("PanicDetected")<{
	readonly fault: unknown;
	readonly detail: string;
}> {
	override readonly message = `plugin crash/panic detected: ${this.detail}`;
}

/**
 * Invalid command line of `emit-check-result`.
 *
 * @pure true (Data class)
 */
export class CliUsageError extends Data.TaggedError("CliUsageError")<{
	readonly detail: string;
}> {
	override readonly message = this.detail;
}

/**
 * Output config file could not be read or is not JSON.
 *
 * @pure true (Data class)
 */
export class ConfigLoadError extends Data.TaggedError("ConfigLoadError")<{
	readonly path: string;
	readonly detail: string;
}> {
	override readonly message = `failed to load config ${this.path}: ${this.detail}`;
}

export type PerformanceDataError =
	| PerformanceDataMissingLabel
	| PerformanceDataMissingValue
	| NoPerformanceDataProvided;
