// CHANGE: Pure mapping between state labels, exit codes and ServiceState
// WHY: Command line input names a state either by label or by code
// FORMAT THEOREM: ∀s ∈ StateLabel: parseServiceState(s) = Some({ label: s, exitCode: StateExitCode[s] })
// PURITY: CORE
// INVARIANT: No side effects; unknown input maps to None
// COMPLEXITY: O(1)

import { Option, pipe } from "effect";
import { match } from "ts-pattern";

import {
	type ServiceState,
	type StateLabel,
	StateExitCode,
} from "./models.js";

/**
 * State label for one of the known exit codes.
 *
 * @pure true
 * @invariant result = None ⇔ code ∉ {0,1,2,3,4}
 */
export const stateLabelForExitCode = (
	code: number,
): Option.Option<StateLabel> =>
	match(code)
		.returnType<Option.Option<StateLabel>>()
		.with(StateExitCode.OK, () => Option.some<StateLabel>("OK"))
		.with(StateExitCode.WARNING, () => Option.some<StateLabel>("WARNING"))
		.with(StateExitCode.CRITICAL, () => Option.some<StateLabel>("CRITICAL"))
		.with(StateExitCode.UNKNOWN, () => Option.some<StateLabel>("UNKNOWN"))
		.with(StateExitCode.DEPENDENT, () => Option.some<StateLabel>("DEPENDENT"))
		.otherwise(() => Option.none());

const isStateLabel = (input: string): input is StateLabel =>
	Object.hasOwn(StateExitCode, input);

const serviceState = (label: StateLabel): ServiceState => ({
	label,
	exitCode: StateExitCode[label],
});

/**
 * Reads a state given as a label (any case) or as its numeric exit code.
 *
 * @pure true
 *
 * @example
 * ```ts
 * parseServiceState("warning"); // Some({ label: "WARNING", exitCode: 1 })
 * parseServiceState("2");       // Some({ label: "CRITICAL", exitCode: 2 })
 * parseServiceState("7");       // None
 * ```
 */
export const parseServiceState = (
	input: string,
): Option.Option<ServiceState> => {
	const normalized = input.trim().toUpperCase();
	if (isStateLabel(normalized)) {
		return Option.some(serviceState(normalized));
	}
	return /^\d+$/u.test(normalized)
		? pipe(
				stateLabelForExitCode(Number.parseInt(normalized, 10)),
				Option.map(serviceState),
			)
		: Option.none();
};

