// CHANGE: Pure validation, formatting and parsing of performance metrics
// WHY: Metrics reach the wire only through these functions
// SOURCE: https://nagios-plugins.org/doc/guidelines.html#AEN200
// FORMAT THEOREM: ∀m: format(m) = label "=" value uom ";" warn ";" crit ";" min ";" max
// PURITY: CORE
// INVARIANT: validate(m) = Right(m) ⇔ m.label ≠ "" ∧ m.value ≠ ""
// COMPLEXITY: O(n) where n = |text|

import { Either } from "effect";
import { match } from "ts-pattern";

import {
	MalformedPerformanceData,
	PerformanceDataMissingLabel,
	PerformanceDataMissingValue,
} from "./errors.js";
import type { PerformanceMetric } from "./models.js";

/**
 * Checks that label and value are present.
 *
 * @param metric - Metric to check
 * @returns The metric, or the first missing field as a typed error
 *
 * @pure true
 * @complexity O(1)
 */
export const validatePerformanceMetric = (
	metric: PerformanceMetric,
): Either.Either<
	PerformanceMetric,
	PerformanceDataMissingLabel | PerformanceDataMissingValue
> =>
	match(metric)
		.returnType<
			Either.Either<
				PerformanceMetric,
				PerformanceDataMissingLabel | PerformanceDataMissingValue
			>
		>()
		.with({ label: "" }, () => Either.left(new PerformanceDataMissingLabel()))
		.with({ value: "" }, () => Either.left(new PerformanceDataMissingValue()))
		.otherwise(Either.right);

// Supervisors split perfdata on whitespace; a label containing a space is quoted.
const quoteLabel = (label: string): string =>
	label.includes(" ") ? `'${label}'` : label;

/**
 * Renders one metric as `label=value[UOM];warn;crit;min;max`.
 *
 * @pure true
 * @invariant every position is present, so the result contains exactly four `;`
 *            plus any `;` inside the fields themselves
 *
 * @example
 * ```ts
 * formatPerformanceMetric({ label: "time", value: "12ms" }); // "time=12ms;;;;"
 * formatPerformanceMetric({ label: "disk used", value: "1" }); // "'disk used'=1;;;;"
 * ```
 */
export const formatPerformanceMetric = (metric: PerformanceMetric): string =>
	[
		`${quoteLabel(metric.label)}=${metric.value}${metric.unitOfMeasurement ?? ""}`,
		metric.warn ?? "",
		metric.crit ?? "",
		metric.min ?? "",
		metric.max ?? "",
	].join(";");

const VALUE_WITH_UOM = /^(-?[0-9.]+|U$)(.*)$/u;

const unquoteLabel = (label: string): string =>
	label.length >= 2 && label.startsWith("'") && label.endsWith("'")
		? label.slice(1, -1)
		: label;

/**
 * Parses text produced by {@link formatPerformanceMetric}, or written by hand
 * in the same form.
 *
 * @param text - `label=value[UOM];warn;crit;min;max`, trailing fields optional
 * @returns Parsed metric; validation is left to `appendPerformanceMetrics`
 *
 * @pure true
 * @invariant result.label/value may still be empty; only a missing `=` is rejected
 * @complexity O(n)
 */
export const parsePerformanceMetric = (
	text: string,
): Either.Either<PerformanceMetric, MalformedPerformanceData> => {
	const trimmed = text.trim();
	const eq = trimmed.indexOf("=");
	if (eq < 0) {
		return Either.left(new MalformedPerformanceData({ input: text }));
	}

	const label = unquoteLabel(trimmed.slice(0, eq));
	const [first = "", warn = "", crit = "", min = "", max = ""] = trimmed
		.slice(eq + 1)
		.split(";");

	const groups = VALUE_WITH_UOM.exec(first);
	const value = groups?.[1] ?? first;
	const unitOfMeasurement = groups?.[2] ?? "";

	return Either.right({
		label,
		value,
		unitOfMeasurement,
		warn,
		crit,
		min,
		max,
	});
};
