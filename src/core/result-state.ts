// CHANGE: Mutable per-execution record the plugin fills in before finalization
// WHY: A plugin discovers its outcome piecemeal; the finalizer consumes the record once
// PURITY: CORE (local mutation only, no IO)
// INVARIANT: every metric in performanceMetrics passed validation unless the caller skipped it
// INVARIANT: Open → Finalized is the only transition and it is irreversible
// COMPLEXITY: O(k) per append where k = batch size

import { Either } from "effect";

import {
	NoPerformanceDataProvided,
	type PerformanceDataError,
	type PerformanceDataMissingLabel,
	type PerformanceDataMissingValue,
} from "./errors.js";
import {
	type BrandingCallback,
	type CheckResultView,
	type PerformanceMetric,
	StateExitCode,
} from "./models.js";
import { validatePerformanceMetric } from "./perfdata.js";

/**
 * Public fields a plugin may set at construction time.
 */
export type ResultStateInit = Partial<
	Pick<
		ResultState,
		| "exitStatusCode"
		| "serviceOutput"
		| "longServiceOutput"
		| "warningThreshold"
		| "criticalThreshold"
		| "thresholdsLabel"
		| "errorsLabel"
		| "detailedInfoLabel"
		| "hideThresholdsSection"
		| "hideErrorsSection"
		| "brandingCallback"
	>
>;

/**
 * Last known execution state of a plugin: the errors met so far and the
 * intended final state.
 *
 * @example
 * ```ts
 * const state = new ResultState({ exitStatusCode: StateExitCode.OK });
 * state.serviceOutput = "OK: 3 datacenters reachable";
 * state.appendPerformanceMetrics(false, { label: "datacenters", value: "3" });
 * ```
 */
export class ResultState implements CheckResultView {
	/**
	 * Exit code handed to the supervisor. Any integer is passed through.
	 */
	exitStatusCode: number = StateExitCode.OK;

	/** First line of output, e.g. "OK: ping 12ms". Emitted as-is. */
	serviceOutput = "";

	/** Everything after the first line. */
	longServiceOutput = "";

	/** Display-only; never parsed. */
	warningThreshold = "";

	/** Display-only; never parsed. */
	criticalThreshold = "";

	/** Replaces the THRESHOLDS header when non-empty. */
	thresholdsLabel: string | undefined = undefined;

	/** Replaces the ERRORS header when non-empty. */
	errorsLabel: string | undefined = undefined;

	/** Replaces the DETAILED INFO header when non-empty. */
	detailedInfoLabel: string | undefined = undefined;

	/** Hide the thresholds section even when thresholds are set. */
	hideThresholdsSection = false;

	/** Hide the errors section even when errors were recorded. */
	hideErrorsSection = false;

	brandingCallback: BrandingCallback | undefined = undefined;

	private readonly recordedErrors: Error[] = [];

	private readonly metrics: PerformanceMetric[] = [];

	private finalized = false;

	constructor(init: ResultStateInit = {}) {
		Object.assign(this, init);
	}

	get errors(): ReadonlyArray<Error> {
		return this.recordedErrors.slice();
	}

	get performanceMetrics(): ReadonlyArray<PerformanceMetric> {
		return this.metrics.slice();
	}

	/**
	 * Most recently recorded error.
	 *
	 * @deprecated Use {@link ResultState.appendErrors}. Assigning appends to
	 * the same collection; assigning `undefined` does nothing.
	 */
	get lastError(): Error | undefined {
		return this.recordedErrors.at(-1);
	}

	set lastError(error: Error | undefined) {
		if (error !== undefined) {
			this.recordedErrors.push(error);
		}
	}

	get isFinalized(): boolean {
		return this.finalized;
	}

	/**
	 * Appends errors in the given order.
	 *
	 * @complexity O(k)
	 */
	appendErrors(...errors: ReadonlyArray<Error>): void {
		this.recordedErrors.push(...errors);
	}

	/**
	 * Appends a batch of metrics. The batch is validated first unless
	 * `skipValidation` is set; any failure leaves the collection unchanged.
	 *
	 * @returns Right on success, otherwise the first validation error or
	 *          NoPerformanceDataProvided for an empty batch
	 *
	 * @postcondition Right ⇒ metrics' = metrics ++ batch
	 * @postcondition Left ⇒ metrics' = metrics
	 */
	appendPerformanceMetrics(
		skipValidation: boolean,
		...batch: ReadonlyArray<PerformanceMetric>
	): Either.Either<void, PerformanceDataError> {
		if (batch.length === 0) {
			return Either.left(new NoPerformanceDataProvided());
		}

		const checked: Either.Either<
			ReadonlyArray<PerformanceMetric>,
			PerformanceDataMissingLabel | PerformanceDataMissingValue
		> = skipValidation
			? Either.right(batch)
			: Either.all(batch.map(validatePerformanceMetric));

		return Either.map(checked, (metrics) => {
			this.metrics.push(...metrics);
		});
	}

	/**
	 * Moves the record to its terminal state.
	 *
	 * @returns false when it was already finalized
	 */
	markFinalized(): boolean {
		if (this.finalized) return false;
		this.finalized = true;
		return true;
	}
}
