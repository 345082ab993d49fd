// CHANGE: Pure renderer composing the check output sections in their fixed order
// WHY: The supervisor parses stdout positionally; section order and separators are part of the contract
// FORMAT THEOREM: render(v) = summary ⊕ errors ⊕ thresholds ⊕ detail ⊕ branding ⊕ perfdata
// PURITY: CORE (calls the branding callback, nothing else)
// INVARIANT: summary is emitted verbatim; no string is interpreted as a template
// INVARIANT: every section after content is preceded by exactly one blank line
// COMPLEXITY: O(e + m + |text|) where e = |errors|, m = |metrics|

import { pipe } from "effect";

import {
	CHECK_OUTPUT_EOL,
	type CheckResultView,
	DEFAULT_DETAILED_INFO_LABEL,
	DEFAULT_ERRORS_LABEL,
	DEFAULT_THRESHOLDS_LABEL,
	PERFORMANCE_DATA_HEADER,
} from "./models.js";
import { formatPerformanceMetric } from "./perfdata.js";

type Section = (output: string) => string;

const labelOr = (custom: string | undefined, fallback: string): string =>
	custom !== undefined && custom.length > 0 ? custom : fallback;

/**
 * Ends the current line if needed and adds one empty line.
 *
 * @pure true
 * @postcondition result ends with EOL EOL, or is EOL EOL for empty input
 */
export const withBlankLine = (output: string): string =>
	output.endsWith(CHECK_OUTPUT_EOL)
		? `${output}${CHECK_OUTPUT_EOL}`
		: `${output}${CHECK_OUTPUT_EOL}${CHECK_OUTPUT_EOL}`;

const lines = (entries: ReadonlyArray<string>): string =>
	entries.map((entry) => `${entry}${CHECK_OUTPUT_EOL}`).join("");

/**
 * Printable text of an error; the name stands in for an empty message.
 *
 * @pure true
 */
export const describeError = (error: Error): string =>
	error.message.length > 0 ? error.message : error.name;

/**
 * Numbered error list, 1-based in append order.
 *
 * @invariant present ⇔ ¬hideErrorsSection ∧ |errors| > 0
 */
export const errorsSection =
	(view: CheckResultView): Section =>
	(output) => {
		if (view.hideErrorsSection || view.errors.length === 0) return output;
		return `${withBlankLine(output)}${lines([
			labelOr(view.errorsLabel, DEFAULT_ERRORS_LABEL),
			...view.errors.map(
				(error, index) => `${index + 1}: ${describeError(error)}`,
			),
		])}`;
	};

/**
 * @invariant present ⇔ ¬hideThresholdsSection ∧ (warning ≠ "" ∨ critical ≠ "")
 */
export const thresholdsSection =
	(view: CheckResultView): Section =>
	(output) => {
		const entries = [
			...(view.warningThreshold.length > 0
				? [`WARNING: ${view.warningThreshold}`]
				: []),
			...(view.criticalThreshold.length > 0
				? [`CRITICAL: ${view.criticalThreshold}`]
				: []),
		];
		if (view.hideThresholdsSection || entries.length === 0) return output;
		return `${withBlankLine(output)}${lines([
			labelOr(view.thresholdsLabel, DEFAULT_THRESHOLDS_LABEL),
			...entries,
		])}`;
	};

export const detailedInfoSection =
	(view: CheckResultView): Section =>
	(output) =>
		view.longServiceOutput.length === 0
			? output
			: `${withBlankLine(output)}${labelOr(
					view.detailedInfoLabel,
					DEFAULT_DETAILED_INFO_LABEL,
				)}${CHECK_OUTPUT_EOL}${view.longServiceOutput}`;

export const brandingSection =
	(view: CheckResultView): Section =>
	(output) =>
		view.brandingCallback === undefined
			? output
			: `${output}${CHECK_OUTPUT_EOL}${view.brandingCallback()}${CHECK_OUTPUT_EOL}`;

export const performanceDataSection =
	(view: CheckResultView): Section =>
	(output) =>
		view.performanceMetrics.length === 0
			? output
			: `${withBlankLine(output)}${lines([
					PERFORMANCE_DATA_HEADER,
					...view.performanceMetrics.map(formatPerformanceMetric),
				])}`;

/**
 * Renders the complete check output.
 *
 * @param view - State to render
 * @returns Text to write to stdout in a single write
 *
 * @pure true, apart from invoking view.brandingCallback once
 *
 * @example
 * ```ts
 * renderCheckResults(new ResultState({ serviceOutput: "OK: all good" }));
 * // "OK: all good"
 * ```
 */
export const renderCheckResults = (view: CheckResultView): string =>
	pipe(
		view.serviceOutput,
		errorsSection(view),
		thresholdsSection(view),
		detailedInfoSection(view),
		brandingSection(view),
		performanceDataSection(view),
	);
