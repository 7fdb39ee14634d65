import { isDeepStrictEqual } from "node:util";
import type { Circuit } from "./circuit.ts";
import {
	describeError,
	InvalidStateError,
	ProtocolError,
	UnknownEventError,
} from "./errors.ts";
import {
	checkEventType,
	checkName,
	type Event,
	EventCond,
	type EventData,
	type EventList,
	type EventType,
	eventList,
	formatEventType,
	isMultiple,
} from "./event.ts";
import {
	diffSignature,
	type ExpectedSignature,
	type InputSignature,
} from "./signature.ts";
import { MonitoredTask, type TaskFunction } from "./tasks.ts";
import { checkDuration, Const, formatValue, UNDEF } from "./value.ts";

/** Default `initAsync()` timeout in seconds */
export const DEFAULT_INIT_TIMEOUT = 10;

/** Default `stopAsync()` timeout in seconds */
export const DEFAULT_STOP_TIMEOUT = 10;

/**
 * Returned by event handlers which do not support the given event type.
 * `SBlock.event()` turns it into an `UnknownEventError` unless asked not to.
 */
export const NOT_HANDLED: unique symbol = Symbol("NOT_HANDLED");

/** Placeholder for a named input connected to the block of the same name. */
export const SAME_NAME: unique symbol = Symbol("SAME_NAME");

/** Common block options. */
export interface BlockOptions {
	/** Optional human readable description */
	comment?: string;
	/** Enable debug messages for this block */
	debug?: boolean;
	/** Events sent when the output changes */
	onOutput?: EventList;
	/** Allows a name starting with an underscore (automatic blocks only) */
	reserved?: boolean;
}

/**
 * Base class for all circuit blocks.
 *
 * Blocks register themselves in the circuit given to the constructor.
 * They are never removed; a block lives as long as its circuit.
 */
export abstract class Block {
	readonly name: string;
	comment: string;
	debug: boolean;
	/** Combinational blocks having this block connected to an input */
	readonly oconnections = new Set<CBlock>();
	protected readonly outputEvents: readonly Event[];
	#output: unknown = UNDEF;

	constructor(
		public readonly circuit: Circuit,
		name: string | null,
		options: BlockOptions = {}
	) {
		if (name === null) {
			const prefix = `_${this.constructor.name}_`;
			const count = circuit
				.getBlocks()
				.filter((blk) => blk.name.startsWith(prefix)).length;
			name = prefix + count;
		} else {
			checkName(name, "block name");
			if (name.startsWith("_") && !options.reserved) {
				throw new Error(
					`'${name}' is a reserved name (starting with an underscore)`
				);
			}
		}
		this.name = name;
		this.comment = options.comment ?? "";
		this.debug = !!options.debug;
		this.outputEvents = eventList(options.onOutput);
		circuit.addBlock(this);
		circuit.registerEvents(this.outputEvents);
	}

	/** Current output value, `UNDEF` until initialized */
	get output(): unknown {
		return this.#output;
	}

	/** Stores a new output value without any further processing. */
	protected storeOutput(value: unknown): void {
		this.#output = value;
	}

	isInitialized(): boolean {
		return this.#output !== UNDEF;
	}

	logDebug(message: string): void {
		if (this.debug) this.circuit.logger.debug(`${this}: ${message}`);
	}

	logInfo(message: string): void {
		this.circuit.logger.log(`${this}: ${message}`);
	}

	logWarning(message: string): void {
		this.circuit.logger.warn(`${this}: ${message}`);
	}

	logError(message: string, err?: unknown): void {
		const extra = err === undefined ? [] : [err];
		this.circuit.logger.error(`${this}: ${message}`, ...extra);
	}

	/** Pre-simulation hook */
	start(): void {}

	/** Post-simulation hook */
	stop(): void {}

	protected sendOutputEvents(
		events: readonly Event[],
		previous: unknown,
		value: unknown
	): void {
		for (const event of events) {
			event.send(this, { trigger: "output", previous, value });
		}
	}

	/** Static block information */
	getConf(): Record<string, unknown> {
		return {
			class: this.constructor.name,
			debug: this.debug,
			comment: this.comment,
			name: this.name,
		};
	}

	toString(): string {
		return `<${this.constructor.name} '${this.name}'>`;
	}
}

/** Resolved input: a block or a constant. */
export type ResolvedInput = Block | Const;

/**
 * Input specification: a block, a block name, a Const, or a bare literal
 * which is wrapped into a Const automatically. String constants must be
 * wrapped explicitly, because a bare string is a block name.
 */
export type InputItem =
	| Block
	| Const
	| string
	| number
	| boolean
	| bigint
	| null
	| undefined;

/** Named input specification: a single item, a group, or `SAME_NAME`. */
export type InputSpec = InputItem | Iterable<InputItem> | typeof SAME_NAME;

/** Name of the unnamed input group formed by positional inputs */
export const POSITIONAL = "_";

/**
 * Base class for combinational blocks. The output is a pure function
 * of current input values.
 */
export abstract class CBlock extends Block {
	/** Blocks connected to the inputs (constants excluded) */
	readonly iconnections = new Set<Block>();
	#spec = new Map<string, InputItem | InputItem[]>();
	#inputs = new Map<string, ResolvedInput | ResolvedInput[]>();

	/** Connects positional inputs. See {@link CBlock.connectInputs}. */
	connect(...inputs: InputItem[]): this {
		return this.connectInputs({}, inputs);
	}

	/**
	 * Connects named inputs, input groups and positional inputs.
	 * May be called only once and only before the circuit is finalized;
	 * the connections are processed by `Circuit.finalize()`.
	 */
	connectInputs(
		named: Readonly<Record<string, InputSpec>>,
		positional: readonly InputItem[] = []
	): this {
		this.circuit.checkNotFinalized();
		if (this.#spec.size) {
			throw new InvalidStateError("connect() may be called only once");
		}
		const names = Object.keys(named);
		if (!positional.length && !names.length) {
			throw new Error("No inputs to connect were given");
		}
		if (names.includes(POSITIONAL)) {
			throw new Error(`Input name '${POSITIONAL}' is reserved`);
		}
		for (const item of positional) {
			if (isMultiple(item)) {
				throw new Error(
					`${formatValue(item)} is not a single input specification ` +
						"(wrap it in Const if it is a constant)"
				);
			}
		}
		if (positional.length) this.#spec.set(POSITIONAL, [...positional]);
		for (const [iname, spec] of Object.entries(named)) {
			checkName(iname, "input name");
			if (spec === SAME_NAME) {
				this.#spec.set(iname, iname);
			} else if (isMultiple(spec)) {
				this.#spec.set(iname, [...spec]);
			} else {
				this.#spec.set(iname, spec);
			}
		}
		return this;
	}

	/**
	 * Replaces input specifications by blocks and constants and updates
	 * the connection sets. Called by the circuit during finalization.
	 */
	resolveInputs(resolve: (item: InputItem) => ResolvedInput): void {
		const all: ResolvedInput[] = [];
		for (const [iname, spec] of this.#spec) {
			if (Array.isArray(spec)) {
				const group = spec.map(resolve);
				this.#inputs.set(iname, group);
				all.push(...group);
			} else {
				const input = resolve(spec);
				this.#inputs.set(iname, input);
				all.push(input);
			}
		}
		for (const input of all) {
			if (input instanceof Block) {
				this.iconnections.add(input);
				input.oconnections.add(this);
			}
		}
	}

	start(): void {
		super.start();
		if (!this.#spec.size) {
			throw new InvalidStateError(`${this}: inputs not connected`);
		}
	}

	/** Resolved inputs by name (empty before finalization) */
	get inputs(): ReadonlyMap<string, ResolvedInput | readonly ResolvedInput[]> {
		return this.#inputs;
	}

	/** Names of all connected inputs and groups */
	inputNames(): string[] {
		return [...this.#spec.keys()];
	}

	/**
	 * Returns the value of an input, or an array of values for a group.
	 */
	inputValue(name: string): unknown {
		const input = this.#inputs.get(name);
		if (input === undefined) {
			throw new Error(`${this} has no input '${name}'`);
		}
		return Array.isArray(input)
			? input.map((blk) => blk.output)
			: input.output;
	}

	/** Values of an input group; single inputs are not accepted. */
	inputGroup(name: string): unknown[] {
		const value = this.inputValue(name);
		if (!Array.isArray(value)) {
			throw new Error(`${this}: input '${name}' is not a group`);
		}
		return value;
	}

	/** Returns the current input signature. */
	inputSignature(): InputSignature {
		if (!this.#spec.size) {
			throw new InvalidStateError("not connect()'ed yet");
		}
		const signature: InputSignature = {};
		for (const [iname, spec] of this.#spec) {
			signature[iname] = Array.isArray(spec) ? spec.length : null;
		}
		return signature;
	}

	/**
	 * Compares the actual signature with the expected one and throws
	 * a detailed error on mismatch.
	 */
	checkSignature(expected: ExpectedSignature): InputSignature {
		const actual = this.inputSignature();
		const diff = diffSignature(actual, expected);
		if (diff !== null) {
			throw new Error(`${this}: Not connected correctly: ${diff}`);
		}
		return actual;
	}

	/** Computes the output value from the inputs. */
	abstract calcOutput(): unknown;

	/**
	 * Computes the new output value.
	 * @returns output change indicator
	 */
	evalBlock(): boolean {
		const previous = this.output;
		const value = this.calcOutput();
		if (value === UNDEF) {
			throw new Error("Output value must not be <UNDEF>");
		}
		if (isDeepStrictEqual(previous, value)) return false;
		this.logDebug(`output: ${formatValue(previous)} -> ${formatValue(value)}`);
		this.storeOutput(value);
		this.sendOutputEvents(this.outputEvents, previous, value);
		return true;
	}

	getConf(): Record<string, unknown> {
		const conf: Record<string, unknown> = {
			...super.getConf(),
			type: "combinational",
		};
		if (this.circuit.isFinalized()) {
			const inputs: Record<string, string | string[]> = {};
			for (const [iname, input] of this.#inputs) {
				inputs[iname] = Array.isArray(input)
					? input.map((blk) => blk.name)
					: input.name;
			}
			conf.inputs = inputs;
		}
		return conf;
	}
}

/** Sequential block options. */
export interface SBlockOptions extends BlockOptions {
	/** Events sent on every `setOutput()`, even if the value did not change */
	onEveryOutput?: EventList;
	/** Initialization value passed to `initFromValue()` as a last resort */
	initdef?: unknown;
	/** Enable state persistence (requires `restoreState()`) */
	persistent?: boolean;
	/** Save the state after each event (default true) */
	syncState?: boolean;
	/** Saved state older than this many seconds is not restored */
	expiration?: number | null;
	/** `initAsync()` timeout in seconds; `<= 0` disables the async init */
	initTimeout?: number | null;
	/** `stopAsync()` timeout in seconds; `<= 0` disables the async cleanup */
	stopTimeout?: number | null;
}

/** Per-call options of {@link SBlock.event}. */
export interface EventCallOptions {
	/** Return `NOT_HANDLED` instead of throwing for unsupported event types */
	ignoreUnknown?: boolean;
}

/** Specialized handler of one event type. */
export type EventHandler<B extends SBlock> = (block: B, data: EventData) => unknown;

type AnyHandler = (block: SBlock, data: EventData) => unknown;

/** A sequential block class, usable as a handler table owner. */
export type SBlockClass<B extends SBlock> = (abstract new (
	...args: never[]
) => B) & { readonly prototype: B };

// own handlers registered for a class, keyed by the class prototype
const ownHandlers = new WeakMap<object, ReadonlyMap<string, AnyHandler>>();
// merged handler tables including inherited entries
let mergedHandlers = new WeakMap<object, ReadonlyMap<string, AnyHandler>>();

/**
 * Registers specialized event handlers for a sequential block class.
 * Handler tables are inherited; a subclass entry overrides its parent's.
 * Register handlers before creating instances of the class.
 *
 * @example
 * ```typescript
 * registerEventHandlers(Counter, {
 *   inc: (counter, data) => counter.add(Number(data.amount ?? 1)),
 * });
 * ```
 */
export function registerEventHandlers<B extends SBlock>(
	cls: SBlockClass<B>,
	handlers: Readonly<Record<string, EventHandler<B>>>
): void {
	const table = new Map<string, AnyHandler>();
	for (const [etype, handler] of Object.entries(handlers)) {
		checkName(etype, "event type");
		table.set(etype, (block, data) => {
			if (!(block instanceof cls)) {
				throw new TypeError(`${block}: '${etype}' handler belongs to a different block type`);
			}
			return handler(block, data);
		});
	}
	ownHandlers.set(cls.prototype, table);
	mergedHandlers = new WeakMap();
}

function handlerTable(block: SBlock): ReadonlyMap<string, AnyHandler> {
	const proto: object = Object.getPrototypeOf(block);
	let table = mergedHandlers.get(proto);
	if (!table) {
		const chain: object[] = [];
		for (let p: object | null = proto; p; p = Object.getPrototypeOf(p)) {
			chain.unshift(p);
		}
		const merged = new Map<string, AnyHandler>();
		for (const p of chain) {
			for (const [etype, handler] of ownHandlers.get(p) ?? []) {
				merged.set(etype, handler);
			}
		}
		table = merged;
		mergedHandlers.set(proto, table);
	}
	return table;
}

/** Returns true if the block's type has a specialized handler for `etype`. */
export function hasEventHandler(block: SBlock, etype: string): boolean {
	return handlerTable(block).has(etype);
}

/**
 * Base class for sequential blocks, i.e. blocks with an internal state
 * changed only by events.
 *
 * Optional capabilities are declared as optional methods; a subclass
 * enables a capability by implementing the method.
 */
export abstract class SBlock extends Block {
	// guard against event recursion
	#eventActive = false;
	/** Completed `Circuit.initSBlock()` steps (2 in total) */
	initStepsCompleted = 0;
	readonly initdef: unknown;
	persistent: boolean;
	readonly syncState: boolean;
	readonly expiration: number | null;
	/** Persistent storage key */
	readonly key: string;
	readonly initTimeout: number;
	readonly stopTimeout: number;
	protected readonly everyOutputEvents: readonly Event[];

	/** Regular initialization of the internal state and the output */
	initRegular?(): void;
	/** Initialization from the `initdef` value */
	initFromValue?(value: unknown): void;
	/** Asynchronous initialization, bounded by `initTimeout` */
	initAsync?(signal: AbortSignal): Promise<void>;
	/** Asynchronous cleanup, bounded by `stopTimeout` */
	stopAsync?(signal: AbortSignal): Promise<void>;
	/** Restores a state previously returned by `getState()` */
	restoreState?(state: unknown): void;

	constructor(circuit: Circuit, name: string | null, options: SBlockOptions = {}) {
		super(circuit, name, options);
		this.everyOutputEvents = eventList(options.onEveryOutput);
		circuit.registerEvents(this.everyOutputEvents);

		if (this.initFromValue) {
			this.initdef = options.initdef === undefined ? UNDEF : options.initdef;
		} else if (options.initdef !== undefined) {
			throw new TypeError(
				`${this}: 'initdef' argument rejected, because initFromValue() method is missing`
			);
		} else {
			this.initdef = UNDEF;
		}

		if (options.persistent && !this.restoreState) {
			throw new TypeError(
				`${this}: 'persistent' argument rejected, because restoreState() method is missing`
			);
		}
		this.persistent = !!options.persistent;
		this.syncState = options.syncState ?? true;
		this.expiration = checkDuration(options.expiration, "expiration");
		this.key = String(this);

		this.initTimeout = this.#timeout(
			"initTimeout",
			!!this.initAsync,
			options.initTimeout,
			DEFAULT_INIT_TIMEOUT
		);
		this.stopTimeout = this.#timeout(
			"stopTimeout",
			!!this.stopAsync,
			options.stopTimeout,
			DEFAULT_STOP_TIMEOUT
		);
	}

	#timeout(
		option: string,
		supported: boolean,
		value: number | null | undefined,
		defaultValue: number
	): number {
		if (!supported) {
			if (value !== undefined && value !== null) {
				const method = option === "initTimeout" ? "initAsync" : "stopAsync";
				throw new TypeError(
					`${this}: '${option}' argument rejected, because ${method}() method is missing`
				);
			}
			return 0;
		}
		const timeout = checkDuration(value, option);
		if (timeout === null) {
			this.logDebug(`${option} not set, default is ${defaultValue}s`);
			return defaultValue;
		}
		return timeout;
	}

	/**
	 * Sets a new output value. A change is reported to the circuit
	 * and triggers the `onOutput` events.
	 */
	setOutput(value: unknown): void {
		if (value === UNDEF) {
			throw new Error("Output value must not be <UNDEF>");
		}
		const previous = this.output;
		if (isDeepStrictEqual(previous, value)) {
			if (!this.everyOutputEvents.length) return;
			this.logDebug(`output: ${formatValue(value)} (unchanged)`);
		} else {
			this.logDebug(`output: ${formatValue(previous)} -> ${formatValue(value)}`);
			this.storeOutput(value);
			this.circuit.notifyOutputChange(this);
			this.sendOutputEvents(this.outputEvents, previous, value);
		}
		this.sendOutputEvents(this.everyOutputEvents, previous, value);
	}

	/**
	 * Handles an event.
	 *
	 * Conditional event types are resolved first. Then the specialized
	 * handler registered for the event type is invoked, or the generic
	 * {@link SBlock.handleEvent} if there is none.
	 *
	 * A block may not process an event while already processing another
	 * one; such a recursive call is a fatal error. An error raised by
	 * a handler aborts the circuit and is re-thrown.
	 */
	event(
		etype: EventType,
		data: EventData = {},
		options: EventCallOptions = {}
	): unknown {
		checkEventType(etype);
		if (Object.keys(data).length) {
			this.logDebug(`got event ${formatEventType(etype)}, data: ${formatValue(data)}`);
		} else {
			this.logDebug(`got event ${formatEventType(etype)}`);
		}
		if (this.#eventActive) {
			throw new ProtocolError(`${this}: Forbidden recursive event() call`);
		}
		this.#eventActive = true;
		let result: unknown;
		try {
			result = this.#dispatch(etype, data);
			if (result === NOT_HANDLED && !options.ignoreUnknown) {
				throw new UnknownEventError(
					`${this}: Unknown event type ${formatEventType(etype)}`
				);
			}
		} catch (err) {
			if (this.persistent && !this.circuit.isReady()) {
				// the internal state may be corrupted
				this.logWarning("Disabling persistent state due to an error");
				this.persistent = false;
			}
			throw err;
		} finally {
			this.#eventActive = false;
		}
		if (result === NOT_HANDLED) return NOT_HANDLED;
		if (this.persistent && this.syncState) this.savePersistentState();
		return result;
	}

	#dispatch(etype: EventType, data: EventData): unknown {
		let resolved: EventType | null = etype;
		while (resolved instanceof EventCond) {
			resolved = data.value ? resolved.etrue : resolved.efalse;
			this.logDebug(`conditional event -> ${formatEventType(resolved)}`);
		}
		if (resolved === null) return null;
		const handler =
			typeof resolved === "string"
				? handlerTable(this).get(resolved)
				: undefined;
		try {
			return handler ? handler(this, data) : this.handleEvent(resolved, data);
		} catch (err) {
			if (err instanceof UnknownEventError) throw err;
			this.circuit.abort(
				new ProtocolError(
					`${this}: ${describeError(err)} during handling of event ` +
						`${formatEventType(resolved)}, data: ${formatValue(data)}`,
					{ cause: err }
				)
			);
			throw err;
		}
	}

	/**
	 * Generic event handler for event types without a specialized handler.
	 * Returns `NOT_HANDLED` by default.
	 */
	protected handleEvent(_etype: EventType, _data: EventData): unknown {
		return NOT_HANDLED;
	}

	/**
	 * Runs `fn` with the recursion guard suspended, allowing exactly the
	 * nested `event()` calls made by `fn`.
	 */
	protected withRecursiveEvents<T>(fn: () => T): T {
		const saved = this.#eventActive;
		this.#eventActive = false;
		try {
			return fn();
		} finally {
			this.#eventActive = saved;
		}
	}

	/** Shortcut for `event("put", { ...data, value })` */
	put(value: unknown, data: EventData = {}): unknown {
		return this.event("put", { ...data, value });
	}

	/**
	 * Returns the internal state. The default assumes the state equals
	 * the output; blocks with a richer state override it.
	 */
	getState(): unknown {
		return this.output;
	}

	/** Saves the state to the persistent storage. Errors are logged only. */
	savePersistentState(): void {
		const store = this.circuit.persistentStore;
		if (!this.persistent || !store) return;
		try {
			store.set(this.key, this.getState());
		} catch (err) {
			this.logWarning(`Persistent data save error: ${describeError(err)}`);
			// remove stale data
			try {
				store.delete(this.key);
			} catch (deleteErr) {
				this.logWarning(`Persistent data delete error: ${describeError(deleteErr)}`);
			}
		}
	}

	/**
	 * Loads the saved state from the persistent storage and restores it.
	 * Errors are logged only.
	 */
	initFromPersistentData(): void {
		const store = this.circuit.persistentStore;
		if (!store || !this.restoreState) return;
		let state: unknown;
		try {
			if (!store.has(this.key)) return;
			state = store.get(this.key);
		} catch (err) {
			this.logWarning(`Persistent data retrieval error: ${describeError(err)}`);
			return;
		}
		const expiration = this.expiration;
		if (expiration !== null) {
			if (expiration <= 0) return;
			const ts = this.circuit.persistentTimestamp;
			if (ts !== null && ts + expiration < Date.now() / 1000) {
				this.logDebug("The internal state has expired.");
				return;
			}
		}
		try {
			this.restoreState(state);
		} catch (err) {
			this.logWarning(
				`Error restoring saved state: ${describeError(err)}; state: ${formatValue(state)}`
			);
		}
	}

	/**
	 * Runs an async function as a task monitored by the circuit: a failure
	 * aborts the simulation. A service task is supposed to run until
	 * cancelled, even its normal return is an error.
	 */
	protected startMonitoredTask<T>(
		fn: TaskFunction<T>,
		options: { service?: boolean; name?: string } = {}
	): MonitoredTask<T> {
		return new MonitoredTask(this, fn, options);
	}

	getConf(): Record<string, unknown> {
		return {
			...super.getConf(),
			type: "sequential",
			persistent: this.persistent,
		};
	}
}
