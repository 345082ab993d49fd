// CHANGE: Specs for routing uncaught faults to the finalizer
// PURITY: SHELL (fake event source, recording runtime)

import { describe, expect, it, vi } from "vitest";

import { PLUGIN_CRASH_SUMMARY } from "../../src/core/models.js";
import { ResultState } from "../../src/core/result-state.js";
import {
	type FaultEventSource,
	registerFaultHandlers,
} from "../../src/shell/process-hooks.js";
import { recordingRuntime } from "../utils/builders.js";

type Listener = (fault: unknown) => void;

const fakeSource = (): FaultEventSource & {
	emit(event: string, fault: unknown): void;
	count(): number;
} => {
	const listeners = new Map<string, Listener[]>();
	return {
		on(event, listener) {
			listeners.set(event, [...(listeners.get(event) ?? []), listener]);
		},
		off(event, listener) {
			listeners.set(
				event,
				(listeners.get(event) ?? []).filter((entry) => entry !== listener),
			);
		},
		emit(event, fault) {
			for (const listener of listeners.get(event) ?? []) listener(fault);
		},
		count() {
			return [...listeners.values()].reduce((n, list) => n + list.length, 0);
		},
	};
};

describe("registerFaultHandlers", () => {
	it("finalizes with a crash report on an uncaught exception", async () => {
		const source = fakeSource();
		const { io, layer } = recordingRuntime("trace-u");
		const state = new ResultState({ serviceOutput: "OK" });
		registerFaultHandlers(state, { source, runtime: layer });

		source.emit("uncaughtException", new Error("late failure"));

		await vi.waitFor(() => expect(io.exits).toEqual([2]));
		expect(io.writes).toHaveLength(1);
		expect(io.writes[0]?.startsWith(PLUGIN_CRASH_SUMMARY)).toBe(true);
		expect(state.errors.map((error) => error.message)).toEqual([
			"plugin crash/panic detected: late failure",
		]);
	});

	it("handles an unhandled rejection with a non-Error reason", async () => {
		const source = fakeSource();
		const { io, layer } = recordingRuntime();
		const state = new ResultState();
		registerFaultHandlers(state, { source, runtime: layer });

		source.emit("unhandledRejection", "socket closed");

		await vi.waitFor(() => expect(io.exits).toEqual([2]));
		expect(state.errors.map((error) => error.message)).toEqual([
			"plugin crash/panic detected: socket closed",
		]);
	});

	it("finalizes only once for repeated faults", async () => {
		const source = fakeSource();
		const { io, layer } = recordingRuntime();
		const state = new ResultState();
		registerFaultHandlers(state, { source, runtime: layer });

		source.emit("uncaughtException", new Error("first"));
		source.emit("unhandledRejection", new Error("second"));

		await vi.waitFor(() => expect(io.exits).toEqual([2]));
		expect(io.writes).toHaveLength(1);
		expect(state.errors).toHaveLength(1);
	});

	it("removes its listeners when unregistered", () => {
		const source = fakeSource();
		const { layer } = recordingRuntime();
		const unregister = registerFaultHandlers(new ResultState(), {
			source,
			runtime: layer,
		});

		expect(source.count()).toBe(2);
		unregister();
		expect(source.count()).toBe(0);
	});
});
