// CHANGE: Exact-output specs for the check result renderer
// WHY: The supervisor parses stdout positionally; every separator matters
// FORMAT THEOREM: render(v) = summary ⊕ errors ⊕ thresholds ⊕ detail ⊕ branding ⊕ perfdata
// PURITY: CORE

import { describe, expect, it } from "vitest";

import { CHECK_OUTPUT_EOL } from "../../src/core/models.js";
import {
	describeError,
	renderCheckResults,
	withBlankLine,
} from "../../src/core/render.js";
import { ResultState, type ResultStateInit } from "../../src/core/result-state.js";
import { metric } from "../utils/builders.js";

const EOL = CHECK_OUTPUT_EOL;

const stateWithErrors = (
	init: ResultStateInit,
	...messages: ReadonlyArray<string>
): ResultState => {
	const state = new ResultState(init);
	state.appendErrors(...messages.map((message) => new Error(message)));
	return state;
};

describe("withBlankLine", () => {
	it("ends an open line and adds an empty one", () => {
		expect(withBlankLine("summary")).toBe(`summary${EOL}${EOL}`);
	});

	it("adds only the empty line after a terminated line", () => {
		expect(withBlankLine(`entry${EOL}`)).toBe(`entry${EOL}${EOL}`);
	});
});

describe("describeError", () => {
	it("falls back to the error name for an empty message", () => {
		expect(describeError(new TypeError(""))).toBe("TypeError");
	});
});

describe("renderCheckResults", () => {
	it("emits the summary alone when nothing else is set", () => {
		expect(renderCheckResults(new ResultState({ serviceOutput: "OK: all good" }))).toBe(
			"OK: all good",
		);
	});

	it("emits format-like sequences in the summary verbatim", () => {
		const state = new ResultState({ serviceOutput: "OK: 100%d used %s ${x}" });
		expect(renderCheckResults(state)).toBe("OK: 100%d used %s ${x}");
	});

	it("renders one metric under the performance data header", () => {
		const state = new ResultState({ serviceOutput: "OK: all good" });
		state.appendPerformanceMetrics(false, { label: "time", value: "12ms" });
		expect(renderCheckResults(state)).toBe(
			"OK: all good \n \n| \ntime=12ms;;;; \n",
		);
	});

	it("numbers errors from 1 in append order", () => {
		const state = stateWithErrors(
			{ serviceOutput: "CRITICAL: 2 problems" },
			"disk full",
			"timeout",
		);
		expect(renderCheckResults(state)).toBe(
			"CRITICAL: 2 problems \n \nERRORS \n1: disk full \n2: timeout \n",
		);
	});

	it("uses a custom errors label verbatim", () => {
		const state = stateWithErrors({ serviceOutput: "S", errorsLabel: "FAILURES" }, "e");
		expect(renderCheckResults(state)).toBe("S \n \nFAILURES \n1: e \n");
	});

	it("falls back to the default label when the custom one is empty", () => {
		const state = stateWithErrors({ serviceOutput: "S", errorsLabel: "" }, "e");
		expect(renderCheckResults(state)).toBe("S \n \nERRORS \n1: e \n");
	});

	it("hides the errors section when asked even with errors recorded", () => {
		const state = stateWithErrors({ serviceOutput: "S", hideErrorsSection: true }, "e");
		expect(renderCheckResults(state)).toBe("S");
	});

	it("separates errors and thresholds with one blank line", () => {
		const state = stateWithErrors(
			{ serviceOutput: "S", warningThreshold: "80%", criticalThreshold: "90%" },
			"e",
		);
		expect(renderCheckResults(state)).toBe(
			"S \n \nERRORS \n1: e \n \nTHRESHOLDS \nWARNING: 80% \nCRITICAL: 90% \n",
		);
	});

	it("lists only the thresholds that are set", () => {
		const state = new ResultState({
			serviceOutput: "S",
			criticalThreshold: "95",
			thresholdsLabel: "LIMITS",
		});
		expect(renderCheckResults(state)).toBe("S \n \nLIMITS \nCRITICAL: 95 \n");
	});

	it("omits the thresholds section when both thresholds are empty", () => {
		const state = new ResultState({ serviceOutput: "S", thresholdsLabel: "LIMITS" });
		expect(renderCheckResults(state)).toBe("S");
	});

	it("hides thresholds when asked", () => {
		const state = new ResultState({
			serviceOutput: "S",
			warningThreshold: "80%",
			hideThresholdsSection: true,
		});
		expect(renderCheckResults(state)).toBe("S");
	});

	it("emits long output verbatim under its header", () => {
		const state = new ResultState({
			serviceOutput: "S",
			longServiceOutput: "line1\nline2",
			detailedInfoLabel: "DETAILS",
		});
		expect(renderCheckResults(state)).toBe("S \n \nDETAILS \nline1\nline2");
	});

	it("places branding between long output and performance data", () => {
		const state = new ResultState({
			serviceOutput: "S",
			longServiceOutput: "detail",
			brandingCallback: () => "MyPlugin v1.0",
		});
		state.appendPerformanceMetrics(false, metric());
		expect(renderCheckResults(state)).toBe(
			"S \n \nDETAILED INFO \ndetail \nMyPlugin v1.0 \n \n| \ntime=12ms;;;; \n",
		);
	});

	it("wraps branding in end-of-line tokens without a blank line", () => {
		const state = new ResultState({
			serviceOutput: "S",
			brandingCallback: () => "MyPlugin v1.0",
		});
		expect(renderCheckResults(state)).toBe(`S${EOL}MyPlugin v1.0${EOL}`);
	});

	it("renders every section in order", () => {
		const state = stateWithErrors(
			{
				serviceOutput: "WARNING: 1 of 3 datacenters slow",
				longServiceOutput: "dc1: ok \ndc2: slow",
				warningThreshold: "500ms",
				brandingCallback: () => "check_dc v0.3",
			},
			"dc2 answered in 812ms",
		);
		state.appendPerformanceMetrics(
			false,
			{ label: "datacenters", value: "3" },
			{ label: "slowest", value: "812", unitOfMeasurement: "ms", warn: "500" },
		);
		expect(renderCheckResults(state)).toBe(
			[
				"WARNING: 1 of 3 datacenters slow \n",
				" \n",
				"ERRORS \n",
				"1: dc2 answered in 812ms \n",
				" \n",
				"THRESHOLDS \n",
				"WARNING: 500ms \n",
				" \n",
				"DETAILED INFO \n",
				"dc1: ok \ndc2: slow",
				" \n",
				"check_dc v0.3 \n",
				" \n",
				"| \n",
				"datacenters=3;;;; \n",
				"slowest=812ms;500;;; \n",
			].join(""),
		);
	});
});
