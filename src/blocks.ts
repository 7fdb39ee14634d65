import {
	type BlockOptions,
	CBlock,
	POSITIONAL,
	registerEventHandlers,
	SBlock,
	type SBlockOptions,
} from "./block.ts";
import type { Circuit } from "./circuit.ts";
import { CancelledError, describeError, ProtocolError } from "./errors.ts";
import type { EventData } from "./event.ts";
import { defineFsm, FSM, type FsmOptions } from "./fsm.ts";
import { sleep, type MonitoredTask } from "./tasks.ts";
import { checkDuration, formatValue, UNDEF } from "./value.ts";

/** Logical negation of a single positional input. */
export class Not extends CBlock {
	start(): void {
		super.start();
		this.checkSignature({ [POSITIONAL]: 1 });
	}

	calcOutput(): boolean {
		return !this.inputGroup(POSITIONAL)[0];
	}
}

/** Function computing a combinational output. */
export type BlockFunction = (...args: unknown[]) => unknown;

export interface FuncBlockOptions extends BlockOptions {
	/**
	 * Pass positional inputs as separate arguments (default), or as one
	 * array argument. Named inputs follow as an object, if there are any.
	 */
	unpack?: boolean;
}

/**
 * Combinational block computing its output with a function.
 *
 * @example
 * ```typescript
 * const sum = new FuncBlock(circuit, "sum", (a, b) => Number(a) + Number(b))
 *   .connect("x", "y");
 * ```
 */
export class FuncBlock extends CBlock {
	readonly unpack: boolean;

	constructor(
		circuit: Circuit,
		name: string | null,
		readonly func: BlockFunction,
		options: FuncBlockOptions = {}
	) {
		super(circuit, name, options);
		if (typeof func !== "function") {
			throw new TypeError(`${this}: expected was a function, got ${formatValue(func)}`);
		}
		this.unpack = options.unpack ?? true;
	}

	calcOutput(): unknown {
		const positional = this.inputs.has(POSITIONAL) ? this.inputGroup(POSITIONAL) : [];
		const named: Record<string, unknown> = {};
		for (const iname of this.inputNames()) {
			if (iname !== POSITIONAL) named[iname] = this.inputValue(iname);
		}
		const extra = Object.keys(named).length ? [named] : [];
		return this.unpack
			? this.func(...positional, ...extra)
			: this.func(positional, ...extra);
	}
}

/** Logical AND of all positional inputs. */
export class And extends CBlock {
	calcOutput(): boolean {
		return this.inputGroup(POSITIONAL).every(Boolean);
	}
}

/** Logical OR of all positional inputs. */
export class Or extends CBlock {
	calcOutput(): boolean {
		return this.inputGroup(POSITIONAL).some(Boolean);
	}
}

/**
 * Simulation control block, created automatically under the name `_ctrl`
 * when referenced. Accepts `shutdown` and `abort` events.
 */
export class ControlBlock extends SBlock {
	initRegular(): void {
		this.setOutput(null);
	}
}

registerEventHandlers(ControlBlock, {
	shutdown: (ctrl, data) => {
		const source = String(data.source ?? "<no-source-data>");
		ctrl.circuit.abort(
			new CancelledError(`${ctrl}: shutdown requested by '${source}'`)
		);
	},
	abort: (ctrl, data) => {
		const source = String(data.source ?? "<no-source-data>");
		const error = data.error;
		const reported =
			error === undefined
				? "<no-error-data>"
				: error instanceof Error
					? describeError(error)
					: formatValue(error);
		ctrl.circuit.abort(
			new ProtocolError(
				`${ctrl}: error reported by '${source}': ${reported}`,
				error instanceof Error ? { cause: error } : undefined
			)
		);
	},
});

export interface InputOptions extends SBlockOptions {
	/** Validation function, a falsy result rejects the value */
	check?: (value: unknown) => unknown;
	/** Accepted values */
	allowed?: Iterable<unknown>;
	/** Conversion applied to accepted values, throwing rejects the value */
	schema?: (value: unknown) => unknown;
}

/**
 * Settable value with optional validation. The value is changed with
 * a `put` event, which returns whether the value was accepted.
 */
export class Input extends SBlock {
	readonly #check: ((value: unknown) => unknown) | null;
	readonly #allowed: ReadonlySet<unknown> | null;
	readonly #schema: ((value: unknown) => unknown) | null;

	constructor(circuit: Circuit, name: string | null, options: InputOptions = {}) {
		super(circuit, name, options);
		this.#check = options.check ?? null;
		this.#allowed = options.allowed ? new Set(options.allowed) : null;
		this.#schema = options.schema ?? null;
		if (this.initdef !== UNDEF) this.validate(this.initdef);
	}

	/**
	 * Returns the (possibly converted) value if accepted.
	 * @throws Error if rejected
	 */
	validate(value: unknown): unknown {
		if (this.#allowed && !this.#allowed.has(value)) {
			throw new Error(`Validation error: ${formatValue(value)} is not among allowed values`);
		}
		if (this.#check && !this.#check(value)) {
			throw new Error(`Validation function rejected value ${formatValue(value)}`);
		}
		if (this.#schema) {
			try {
				return this.#schema(value);
			} catch (err) {
				const reason = err instanceof Error ? err.message : String(err);
				throw new Error(
					`Validation schema rejected value ${formatValue(value)} with error: ${reason}`
				);
			}
		}
		return value;
	}

	initFromValue(value: unknown): void {
		this.put(value);
	}

	restoreState(state: unknown): void {
		this.put(state);
	}
}

registerEventHandlers(Input, {
	put: (input, data) => {
		let value: unknown;
		try {
			value = input.validate(data.value);
		} catch (err) {
			input.logWarning(err instanceof Error ? err.message : String(err));
			return false;
		}
		input.setOutput(value);
		return true;
	},
});

export interface CounterOptions extends SBlockOptions {
	/** Count modulo this number */
	modulo?: number | null;
}

/** Counter of `inc` and `dec` events, optionally modulo M. */
export class Counter extends SBlock {
	readonly modulo: number | null;

	constructor(circuit: Circuit, name: string | null, options: CounterOptions = {}) {
		super(circuit, name, { ...options, initdef: options.initdef ?? 0 });
		if (options.modulo === 0) throw new Error("modulo must not be zero");
		this.modulo = options.modulo ?? null;
	}

	/** Current count */
	get count(): number {
		return typeof this.output === "number" ? this.output : 0;
	}

	/** Sets the counter, applying the modulo. */
	set(value: unknown): number {
		if (typeof value !== "number" || Number.isNaN(value)) {
			throw new TypeError(`${this}: expected was a number, got ${formatValue(value)}`);
		}
		const modulo = this.modulo;
		// the result has the sign of the modulo, -0 becomes 0
		const count = modulo === null ? value : ((value % modulo) + modulo) % modulo || 0;
		this.setOutput(count);
		return count;
	}

	initFromValue(value: unknown): void {
		this.set(value);
	}

	restoreState(state: unknown): void {
		this.set(state);
	}
}

function amount(data: EventData): number {
	const value = data.amount ?? 1;
	if (typeof value !== "number") {
		throw new TypeError(`amount: expected was a number, got ${formatValue(value)}`);
	}
	return value;
}

registerEventHandlers(Counter, {
	inc: (counter, data) => counter.set(counter.count + amount(data)),
	dec: (counter, data) => counter.set(counter.count - amount(data)),
	put: (counter, data) => counter.set(data.value),
	reset: (counter) => counter.set(counter.initdef),
});

const TIMER = defineFsm({
	states: ["off", "on"],
	timers: {
		on: [Infinity, "stop"],
		off: [Infinity, "start"],
	},
	events: [
		["start", null, "on"],
		["stop", null, "off"],
		["toggle", "on", "off"],
		["toggle", "off", "on"],
	],
	cond: {
		start: (fsm) => !(fsm instanceof Timer) || fsm.restartable || fsm.state !== "on",
		stop: (fsm) => !(fsm instanceof Timer) || fsm.restartable || fsm.state !== "off",
	},
});

export interface TimerOptions extends FsmOptions {
	/** A running timer is restarted by another start (or stop) event (default true) */
	restartable?: boolean;
}

/**
 * A timer with states `off` and `on`. Both states are timed, the default
 * durations are infinite; set them with the `durations` option, e.g.
 * `{ on: 5 }` for a monostable timer. The output is a boolean.
 */
export class Timer extends FSM {
	readonly restartable: boolean;

	constructor(circuit: Circuit, name: string | null, options: TimerOptions = {}) {
		super(circuit, name, TIMER, options);
		this.restartable = options.restartable ?? true;
	}

	calcOutput(): boolean {
		return this.state === "on";
	}
}

/** Value source for {@link ValuePoll}; `UNDEF` means "no value". */
export type PollFunction = (signal: AbortSignal) => unknown;

export interface ValuePollOptions extends SBlockOptions {
	/** Polling interval in seconds */
	interval: number;
}

/**
 * A source of periodically measured or computed values. The polling runs
 * as a monitored service task from `start()` till `stop()`; a polling error
 * aborts the circuit. The block is initialized by the first value, or by
 * `initdef` if the first value does not arrive within `initTimeout`.
 */
export class ValuePoll extends SBlock {
	readonly interval: number;
	#task: MonitoredTask<void> | null = null;
	#firstValue: (() => void) | null = null;

	constructor(
		circuit: Circuit,
		name: string | null,
		readonly func: PollFunction,
		options: ValuePollOptions
	) {
		super(circuit, name, options);
		const interval = checkDuration(options.interval, "interval");
		if (interval === null || interval <= 0) {
			throw new Error(`${this}: interval must be positive`);
		}
		this.interval = interval;
	}

	async #poll(signal: AbortSignal): Promise<void> {
		for (;;) {
			const value = await this.func(signal);
			if (value !== UNDEF) this.setOutput(value);
			await sleep(this.interval, signal);
		}
	}

	setOutput(value: unknown): void {
		super.setOutput(value);
		const firstValue = this.#firstValue;
		if (firstValue) {
			this.#firstValue = null;
			firstValue();
		}
	}

	start(): void {
		super.start();
		this.#task = this.startMonitoredTask((signal) => this.#poll(signal), {
			service: true,
			name: "poll task",
		});
	}

	/** Waits for the first value. */
	initAsync(signal: AbortSignal): Promise<void> {
		if (this.isInitialized()) return Promise.resolve();
		return new Promise((resolve, reject) => {
			const onAbort = () => {
				this.#firstValue = null;
				reject(signal.reason);
			};
			signal.addEventListener("abort", onAbort, { once: true });
			this.#firstValue = () => {
				signal.removeEventListener("abort", onAbort);
				resolve();
			};
		});
	}

	initFromValue(value: unknown): void {
		this.setOutput(value);
	}

	stop(): void {
		this.#task?.abort();
		super.stop();
	}

	async stopAsync(_signal: AbortSignal): Promise<void> {
		const task = this.#task;
		this.#task = null;
		await task?.cancel();
	}
}
