// CHANGE: Specs for composing a plugin body with the finalizer
// PURITY: APP (recording runtime)

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { pluginBody, runCheck } from "../../src/app/runCheck.js";
import { PLUGIN_CRASH_SUMMARY } from "../../src/core/models.js";
import { ResultState } from "../../src/core/result-state.js";
import { metric, recordingRuntime } from "../utils/builders.js";

describe("runCheck", () => {
	it("finalizes what a successful body declared", async () => {
		const { io, layer } = recordingRuntime();
		const state = new ResultState();
		const program = Effect.sync(() => {
			state.serviceOutput = "OK: 3 users";
			state.appendPerformanceMetrics(false, metric({ label: "users", value: "3" }));
		});

		await Effect.runPromise(runCheck(state, program).pipe(Effect.provide(layer)));

		expect(io.writes).toEqual(["OK: 3 users \n \n| \nusers=3;;;; \n"]);
		expect(io.exits).toEqual([0]);
	});

	it("reports a typed failure as CRITICAL", async () => {
		const { io, layer } = recordingRuntime();
		const state = new ResultState({ serviceOutput: "OK" });

		await Effect.runPromise(
			runCheck(state, Effect.fail(new Error("timeout"))).pipe(
				Effect.provide(layer),
			),
		);

		expect(io.exits).toEqual([2]);
		expect(state.serviceOutput).toBe(PLUGIN_CRASH_SUMMARY);
		expect(state.errors.map((error) => error.message)).toEqual([
			"plugin crash/panic detected: timeout",
		]);
	});

	it("reports a throwing async body as CRITICAL", async () => {
		const { io, layer } = recordingRuntime("trace-b");
		const state = new ResultState();
		const program = pluginBody(async () => {
			state.serviceOutput = "OK: half done";
			await Promise.resolve();
			throw new RangeError("index out of range");
		});

		await Effect.runPromise(runCheck(state, program).pipe(Effect.provide(layer)));

		expect(io.exits).toEqual([2]);
		expect(state.longServiceOutput).toBe(
			"``` \nindex out of range \n \ntrace-b \n```",
		);
	});

	it("finalizes after the body's own cleanup", async () => {
		const { io, layer } = recordingRuntime();
		const state = new ResultState({ serviceOutput: "OK" });
		const program = Effect.sync(() => io.events.push("body")).pipe(
			Effect.ensuring(Effect.sync(() => io.events.push("cleanup"))),
		);

		await Effect.runPromise(runCheck(state, program).pipe(Effect.provide(layer)));

		expect(io.events).toEqual(["body", "cleanup", "write", "exit"]);
	});
});
