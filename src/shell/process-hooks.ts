// CHANGE: Route faults that escape the plugin body's Effect to the finalizer
// WHY: A throw inside a timer or event callback never reaches runCheck
// PURITY: SHELL
// EFFECT: registers process listeners; each fault forks Effect<void, never, PluginRuntime>
// INVARIANT: the finalizer still runs at most once per ResultState
// COMPLEXITY: O(1)

import { Effect, Exit, type Layer } from "effect";

import type { ResultState } from "../core/result-state.js";
import { returnCheckResults } from "./finalize.js";
import { NodePluginRuntime, type PluginRuntime } from "./runtime.js";

type FaultEvent = "uncaughtException" | "unhandledRejection";

type FaultListener = (fault: unknown) => void;

/**
 * Anything that emits process fault events; `process` by default.
 */
export interface FaultEventSource {
	on(event: FaultEvent, listener: FaultListener): unknown;
	off(event: FaultEvent, listener: FaultListener): unknown;
}

export interface FaultHandlerOptions {
	readonly source?: FaultEventSource;
	readonly runtime?: Layer.Layer<PluginRuntime>;
}

const FAULT_EVENTS: ReadonlyArray<FaultEvent> = [
	"uncaughtException",
	"unhandledRejection",
];

/**
 * Finalizes the state with a CRITICAL crash report on the first uncaught
 * exception or unhandled rejection.
 *
 * @returns Function removing the listeners again
 *
 * @example
 * ```ts
 * const state = new ResultState();
 * const unregister = registerFaultHandlers(state);
 * setTimeout(() => { throw new Error("late failure"); }, 10);
 * ```
 */
export function registerFaultHandlers(
	state: ResultState,
	options: FaultHandlerOptions = {},
): () => void {
	const source = options.source ?? process;
	const runtime = options.runtime ?? NodePluginRuntime;

	const listener: FaultListener = (fault) => {
		Effect.runFork(
			returnCheckResults(state, Exit.die(fault)).pipe(Effect.provide(runtime)),
		);
	};

	for (const event of FAULT_EVENTS) {
		source.on(event, listener);
	}

	return () => {
		for (const event of FAULT_EVENTS) {
			source.off(event, listener);
		}
	};
}
