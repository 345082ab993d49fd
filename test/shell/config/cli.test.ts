// CHANGE: Specs for emit-check-result argument parsing
// PURITY: SHELL (argv passed explicitly)

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { parseCLIArgs } from "../../../src/shell/config/cli.js";

const usageProblem = (argv: ReadonlyArray<string>): string =>
	Either.match(parseCLIArgs(argv), {
		onLeft: (error) => error.message,
		onRight: () => "",
	});

describe("parseCLIArgs", () => {
	it("defaults to an empty OK result", () => {
		expect(parseCLIArgs([])).toEqual(
			Either.right({
				state: { label: "OK", exitCode: 0 },
				summary: "",
				longOutput: "",
				warningThreshold: "",
				criticalThreshold: "",
				errors: [],
				performanceData: [],
				output: {},
			}),
		);
	});

	it("collects value flags, repeatable flags and switches", () => {
		const parsed = parseCLIArgs([
			"--state",
			"warning",
			"--summary",
			"WARNING: disk 91%",
			"--long",
			"/var 91%",
			"--warning",
			"80",
			"--critical",
			"90",
			"--error",
			"first",
			"--error",
			"second",
			"--perf",
			"disk=91%;80;90",
			"--perf",
			"inodes=12%",
			"--errors-label",
			"PROBLEMS",
			"--hide-thresholds",
			"--config",
			"/etc/check.json",
		]);

		expect(parsed).toEqual(
			Either.right({
				state: { label: "WARNING", exitCode: 1 },
				summary: "WARNING: disk 91%",
				longOutput: "/var 91%",
				warningThreshold: "80",
				criticalThreshold: "90",
				errors: ["first", "second"],
				performanceData: ["disk=91%;80;90", "inodes=12%"],
				output: { errorsLabel: "PROBLEMS", hideThresholdsSection: true },
				configPath: "/etc/check.json",
			}),
		);
	});

	it("accepts a numeric state", () => {
		const parsed = parseCLIArgs(["--state", "2"]);
		expect(Either.map(parsed, (options) => options.state)).toEqual(
			Either.right({ label: "CRITICAL", exitCode: 2 }),
		);
	});

	it("keeps a value that looks like a flag", () => {
		const parsed = parseCLIArgs(["--summary", "--hide-errors"]);
		expect(Either.map(parsed, (options) => options.summary)).toEqual(
			Either.right("--hide-errors"),
		);
	});

	it("rejects an unknown state", () => {
		expect(usageProblem(["--state", "fine"])).toBe('unknown state "fine"');
	});

	it("rejects a value flag without value", () => {
		expect(usageProblem(["--summary", "S", "--perf"])).toBe(
			"missing value for --perf",
		);
	});

	it("rejects unknown arguments, inherited keys included", () => {
		expect(usageProblem(["--bogus"])).toBe('unknown argument "--bogus"');
		expect(usageProblem(["toString"])).toBe('unknown argument "toString"');
	});
});
