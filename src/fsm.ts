import {
	hasEventHandler,
	NOT_HANDLED,
	SBlock,
	type SBlockOptions,
} from "./block.ts";
import type { Circuit } from "./circuit.ts";
import { ProtocolError } from "./errors.ts";
import {
	checkName,
	type Event,
	type EventData,
	type EventList,
	type EventType,
	eventList,
	formatEventType,
	Goto,
} from "./event.ts";
import { startTimer, type TimerHandle } from "./tasks.ts";
import { checkDuration, formatValue, UNDEF, type Undef } from "./value.ts";

/**
 * Guard, entry or exit callback. Receives the FSM and the frozen payload
 * of the event being processed. Guards return a truthy value to approve
 * the transition; return values of other callbacks are ignored.
 */
export type FsmCallback = (fsm: FSM, data: EventData) => unknown;

/**
 * A transition declaration: `[event, from, to]`.
 *
 * - `from` is a state, a list of states, or `null` for the wildcard
 *   (any state without a specific entry for the event)
 * - `to` is the next state, or `null` to declare "no transition"
 */
export type FsmTransition = readonly [
	event: string,
	from: string | readonly string[] | null,
	to: string | null,
];

/**
 * A timed state declaration: `[duration, event]`. The event (or a direct
 * `Goto`) is raised when the state's timer expires. A `null` duration must
 * be set per instance or per event; `Infinity` disables the timer.
 */
export type FsmTimer = readonly [duration: number | null, event: string | Goto];

/**
 * Declarative FSM definition compiled by {@link defineFsm}.
 *
 * @example
 * ```typescript
 * const TURNSTILE = defineFsm({
 *   states: ["locked", "unlocked"],
 *   events: [
 *     ["coin", ["locked", "unlocked"], "unlocked"],
 *     ["push", "unlocked", "locked"],
 *   ],
 *   timers: { unlocked: [5, "push"] },
 * });
 * ```
 */
export interface FsmDefinition {
	/** States; the first one is the default initial state */
	states?: readonly string[];
	/** Timed states (implicitly added to the state set) */
	timers?: Readonly<Record<string, FsmTimer>>;
	/** Transitions */
	events?: readonly FsmTransition[];
	/** Guards by event name */
	cond?: Readonly<Record<string, FsmCallback>>;
	/** Entry callbacks by state name */
	enter?: Readonly<Record<string, FsmCallback>>;
	/** Exit callbacks by state name */
	exit?: Readonly<Record<string, FsmCallback>>;
}

/**
 * Compiled, immutable FSM control table. One table is shared by all FSM
 * blocks created from it; per-instance settings never modify it.
 */
export interface FsmTable {
	readonly states: ReadonlySet<string>;
	readonly events: ReadonlySet<string>;
	readonly defaultState: string;
	/** Maximum number of states entered while handling a single event */
	readonly chainLimit: number;
	/** event → (state or `null` for wildcard) → next state or `null` */
	readonly transitions: ReadonlyMap<string, ReadonlyMap<string | null, string | null>>;
	readonly durations: ReadonlyMap<string, number | null>;
	readonly timedEvents: ReadonlyMap<string, string | Goto>;
	readonly cond: ReadonlyMap<string, FsmCallback>;
	readonly enter: ReadonlyMap<string, FsmCallback>;
	readonly exit: ReadonlyMap<string, FsmCallback>;
}

const compiled = new WeakMap<FsmDefinition, FsmTable>();

function callbackMap(
	callbacks: Readonly<Record<string, FsmCallback>> | undefined,
	valid: ReadonlySet<string>,
	what: string
): ReadonlyMap<string, FsmCallback> {
	const map = new Map<string, FsmCallback>();
	for (const [name, cb] of Object.entries(callbacks ?? {})) {
		if (!valid.has(name)) {
			throw new Error(`${what}: unknown name '${name}'`);
		}
		if (typeof cb !== "function") {
			throw new TypeError(`${what}['${name}']: expected was a function, got ${formatValue(cb)}`);
		}
		map.set(name, cb);
	}
	return map;
}

/**
 * Compiles and validates an FSM definition. The result is frozen and cached,
 * so compiling the same definition object again returns the same table.
 *
 * @throws Error on invalid names, unknown states or events and duplicate
 *   transitions
 */
export function defineFsm(definition: FsmDefinition): FsmTable {
	const cached = compiled.get(definition);
	if (cached) return cached;

	const declared = definition.states ?? [];
	if (typeof declared === "string") {
		// a frequent error: "x" instead of ["x"]
		throw new TypeError(
			`states: expected is an array of strings, did you mean: ["${declared}"] ?`
		);
	}
	const timers = Object.entries(definition.timers ?? {});
	const states = new Set<string>([...declared, ...timers.map(([state]) => state)]);
	if (!states.size) {
		throw new Error("Cannot create a state machine with no states");
	}
	for (const state of states) checkName(state, "FSM state name");
	const defaultState = declared.length ? declared[0] : timers[0][0];

	const checkState = (state: string, where: string) => {
		if (!states.has(state)) throw new Error(`${where}: unknown state '${state}'`);
	};

	const events = new Set<string>();
	const transitions = new Map<string, Map<string | null, string | null>>();
	for (const [event, from, to] of definition.events ?? []) {
		checkName(event, "FSM event name");
		events.add(event);
		if (to !== null) checkState(to, `event '${event}'`);
		let row = transitions.get(event);
		if (!row) {
			row = new Map();
			transitions.set(event, row);
		}
		const sources: readonly (string | null)[] =
			from === null || typeof from === "string" ? [from] : from;
		for (const source of sources) {
			if (source !== null) checkState(source, `event '${event}'`);
			if (row.has(source)) {
				throw new Error(
					`Multiple transitions defined for event '${event}' in state ${
						source === null ? "<any>" : `'${source}'`
					}`
				);
			}
			row.set(source, to);
		}
	}

	const durations = new Map<string, number | null>();
	const timedEvents = new Map<string, string | Goto>();
	for (const [state, [duration, event]] of timers) {
		durations.set(state, checkDuration(duration, `timers['${state}']`));
		if (event instanceof Goto) {
			checkState(event.state, `timers['${state}']`);
		} else if (!events.has(event)) {
			throw new Error(`timers['${state}']: undefined event '${event}'`);
		}
		timedEvents.set(state, event);
	}

	const table: FsmTable = Object.freeze({
		states,
		events,
		defaultState,
		chainLimit: 3 * states.size,
		transitions,
		durations,
		timedEvents,
		cond: callbackMap(definition.cond, events, "cond"),
		enter: callbackMap(definition.enter, states, "enter"),
		exit: callbackMap(definition.exit, states, "exit"),
	});
	compiled.set(definition, table);
	return table;
}

/** Per-instance FSM options. */
export interface FsmOptions extends SBlockOptions {
	/** Timer durations overriding the table defaults (`null` keeps the default) */
	durations?: Readonly<Record<string, number | null>>;
	/** Additional guards; all guards must approve a transition */
	cond?: Readonly<Record<string, FsmCallback>>;
	/** Additional entry callbacks */
	enter?: Readonly<Record<string, FsmCallback>>;
	/** Additional exit callbacks */
	exit?: Readonly<Record<string, FsmCallback>>;
	/** Events sent when entering a state */
	onEnter?: Readonly<Record<string, EventList>>;
	/** Events sent when exiting a state */
	onExit?: Readonly<Record<string, EventList>>;
	/** Events sent when an event has no transition defined */
	onNotrans?: EventList;
}

/** Saved FSM state: `[state, timer expiration as unix time or null, sdata]` */
export type FsmState = [state: string | Undef, expires: number | null, sdata: Record<string, unknown>];

interface ScheduledTransition {
	etype: EventType;
	data: EventData;
	state: string;
}

interface ActiveTimer {
	handle: TimerHandle;
	/** expiration time in milliseconds since the epoch */
	expires: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Finite-state machine block with optional timed states.
 *
 * The transition table comes from {@link defineFsm}. Events handled by the
 * FSM are the table's event names plus `Goto(state)` for direct transitions.
 *
 * **Transition steps** for an event in an initialized FSM:
 * 1. lookup of the next state, a specific entry beats the wildcard entry
 * 2. guards (skipped for the very first transition), all must approve
 * 3. exit callbacks, `onExit` events, timer cancellation
 * 4. state change and entry callbacks
 * 5. timer start if the new state is timed
 * 6. output update and `onEnter` events
 *
 * An entry callback (or a zero-duration timer) may request exactly one
 * further transition. The FSM then passes through the intermediate state
 * without output update or `onEnter` events. Chains are limited to
 * 3 × number of states.
 *
 * @example
 * ```typescript
 * const fsm = createFsm(circuit, "door", TURNSTILE, {
 *   durations: { unlocked: 10 },
 *   onEnter: { locked: new Event("alarm", "arm") },
 * });
 * fsm.event("coin"); // → "unlocked"
 * ```
 */
export class FSM extends SBlock {
	#state: string | Undef = UNDEF;
	#timer: ActiveTimer | null = null;
	// an FSM transition is in progress
	#fsmEventActive = false;
	// scheduled chained transition
	#next: ScheduledTransition | null = null;
	readonly #durations: ReadonlyMap<string, number | null>;
	readonly #cond: ReadonlyMap<string, FsmCallback>;
	readonly #enter: ReadonlyMap<string, FsmCallback>;
	readonly #exit: ReadonlyMap<string, FsmCallback>;
	readonly #onEnter: ReadonlyMap<string, readonly Event[]>;
	readonly #onExit: ReadonlyMap<string, readonly Event[]>;
	readonly #onNotrans: readonly Event[];

	/** Additional state data saved and restored together with the state */
	sdata: Record<string, unknown> = {};

	constructor(
		circuit: Circuit,
		name: string | null,
		readonly table: FsmTable,
		options: FsmOptions = {}
	) {
		super(circuit, name, {
			...options,
			initdef: options.initdef ?? table.defaultState,
		});
		for (const event of table.events) {
			if (hasEventHandler(this, event)) {
				throw new Error(
					`Ambiguous event '${event}': the name is used for both FSM and SBlock event`
				);
			}
		}

		const durations = new Map(table.durations);
		for (const [state, value] of Object.entries(options.durations ?? {})) {
			if (!durations.has(state)) {
				throw new Error(`'${state}' is not a timed state`);
			}
			const duration = checkDuration(value, `durations['${state}']`);
			if (duration !== null) durations.set(state, duration);
		}
		this.#durations = durations;
		this.#cond = callbackMap(options.cond, table.events, "cond");
		this.#enter = callbackMap(options.enter, table.states, "enter");
		this.#exit = callbackMap(options.exit, table.states, "exit");
		this.#onEnter = this.#stateEvents(options.onEnter, "onEnter");
		this.#onExit = this.#stateEvents(options.onExit, "onExit");
		this.#onNotrans = eventList(options.onNotrans);
		circuit.registerEvents(this.#onNotrans);
	}

	#stateEvents(
		spec: Readonly<Record<string, EventList>> | undefined,
		what: string
	): ReadonlyMap<string, readonly Event[]> {
		const map = new Map<string, readonly Event[]>();
		for (const [state, events] of Object.entries(spec ?? {})) {
			if (!this.table.states.has(state)) {
				throw new Error(`${what}: unknown state '${state}'`);
			}
			const list = eventList(events);
			this.circuit.registerEvents(list);
			map.set(state, list);
		}
		return map;
	}

	/** Current state or `UNDEF` if not initialized */
	get state(): string | Undef {
		return this.#state;
	}

	#checkState(state: string): string {
		if (!this.table.states.has(state)) {
			throw new Error(`Unknown state '${state}'`);
		}
		return state;
	}

	/**
	 * Returns `[state, timer expiration, sdata]`. The expiration is a unix
	 * timestamp in seconds, or `null` if no timer is running.
	 */
	getState(): FsmState {
		const expires = this.#timer ? this.#timer.expires / 1000 : null;
		return [this.#state, expires, { ...this.sdata }];
	}

	/**
	 * Restores a state created by `getState()`. The state is resumed, not
	 * entered: no callbacks run and no events are sent. A running timer is
	 * re-armed for its remaining time; an expired one makes the saved state
	 * invalid and it is ignored.
	 */
	restoreState(saved: unknown): void {
		if (!Array.isArray(saved) || (saved.length !== 2 && saved.length !== 3)) {
			throw new TypeError(`Invalid FSM state: ${formatValue(saved)}`);
		}
		const items: readonly unknown[] = saved;
		const [state, expires, sdata = {}] = items;
		if (typeof state !== "string") {
			throw new TypeError(`Invalid FSM state name: ${formatValue(state)}`);
		}
		this.#checkState(state);
		if (expires !== null && typeof expires !== "number") {
			throw new TypeError(`Invalid timer expiration: ${formatValue(expires)}`);
		}
		if (!isRecord(sdata)) {
			throw new TypeError(`Invalid FSM state data: ${formatValue(sdata)}`);
		}
		if (expires !== null) {
			const remaining = expires - Date.now() / 1000;
			if (remaining <= 0) {
				this.logWarning("restore state: ignoring expired state");
				return;
			}
			const timedEvent = this.table.timedEvents.get(state);
			if (timedEvent === undefined) {
				throw new ProtocolError(`cannot set a timer for a not timed state '${state}'`);
			}
			this.#setTimer(remaining, timedEvent);
		}
		this.#state = state;
		this.sdata = { ...sdata };
		this.logDebug(`state: <UNDEF> -> ${state}`);
		const output = this.calcOutput();
		if (output !== UNDEF) this.setOutput(output);
	}

	initFromValue(value: unknown): void {
		if (typeof value !== "string") {
			throw new TypeError(`Initial FSM state must be a string, got ${formatValue(value)}`);
		}
		this.event(new Goto(value));
	}

	stop(): void {
		this.#stopTimer();
		super.stop();
	}

	#setTimer(seconds: number, event: string | Goto): void {
		this.logDebug(`timer: ${seconds.toFixed(3)}s before ${formatEventType(event)}`);
		const handle = startTimer(() => {
			this.#timer = null;
			try {
				this.event(event);
			} catch (err) {
				this.circuit.abort(err);
			}
		}, seconds);
		this.#timer = { handle, expires: Date.now() + seconds * 1000 };
	}

	#startTimer(override: unknown, event: string | Goto): void {
		const state = this.#state;
		let duration = checkDuration(override, "duration");
		if (duration === null && state !== UNDEF) {
			duration = this.#durations.get(state) ?? null;
		}
		if (duration === null) {
			throw new Error(`Timer duration for state '${String(state)}' not set`);
		}
		if (duration === Infinity) return;
		if (duration <= 0) {
			this.logDebug(`timer: zero delay before ${formatEventType(event)}`);
			this.event(event);
			return;
		}
		this.#setTimer(duration, event);
	}

	#stopTimer(): void {
		if (this.#timer) {
			this.#timer.handle.cancel();
			this.#timer = null;
			this.logDebug("timer: cancelled");
		}
	}

	/**
	 * Runs the table callback and the instance callback.
	 * @returns their return values (0, 1 or 2 items)
	 */
	#runCallbacks(
		kind: "cond" | "enter" | "exit",
		name: string,
		data: EventData
	): unknown[] {
		const results: unknown[] = [];
		const instanceCb = (
			kind === "cond" ? this.#cond : kind === "enter" ? this.#enter : this.#exit
		).get(name);
		if (instanceCb) results.push(instanceCb(this, data));
		const tableCb = this.table[kind].get(name);
		if (tableCb) results.push(tableCb(this, data));
		return results;
	}

	#sendStateEvents(trigger: "enter" | "exit"): void {
		const state = this.#state;
		if (state === UNDEF) return;
		const events = (trigger === "enter" ? this.#onEnter : this.#onExit).get(state);
		if (!events) return;
		const sdata = Object.fromEntries(
			Object.entries(this.sdata).filter(([key]) => !key.startsWith("_"))
		);
		for (const event of events) {
			event.send(this, { trigger, state, value: this.output, sdata });
		}
	}

	#lookup(event: string): string | null {
		const row = this.table.transitions.get(event);
		if (!row) return null;
		const state = this.#state;
		if (state !== UNDEF && row.has(state)) return row.get(state) ?? null;
		return row.get(null) ?? null;
	}

	protected handleEvent(etype: EventType, data: EventData): unknown {
		const frozen: EventData = Object.freeze({ ...data });
		let next: string;
		if (etype instanceof Goto) {
			next = this.#checkState(etype.state);
		} else if (typeof etype === "string" && this.table.events.has(etype)) {
			const found = this.#lookup(etype);
			if (found === null) {
				this.logDebug(
					`No transition defined for event '${etype}' in state ${formatValue(this.#state)}`
				);
				for (const event of this.#onNotrans) {
					event.send(this, { trigger: "notrans", event: etype, state: this.#state });
				}
				return false;
			}
			if (
				this.#state !== UNDEF &&
				!this.#runCallbacks("cond", etype, frozen).every(Boolean)
			) {
				this.logDebug(
					`not executing event '${etype}' (${String(this.#state)} -> ${found}), condition not satisfied`
				);
				return false;
			}
			next = found;
		} else {
			return NOT_HANDLED;
		}

		if (this.#fsmEventActive) {
			// recursive call from an entry callback or a zero-duration timer
			if (this.#next) {
				throw new ProtocolError(
					"Forbidden event multiplication; Two events " +
						`(${formatEventType(this.#next.etype)} and ${formatEventType(etype)}) ` +
						"were generated while handling a single event"
				);
			}
			this.#next = { etype, data: frozen, state: next };
			return true;
		}

		this.#fsmEventActive = true;
		try {
			const previous = this.#state;
			const initial = previous === UNDEF;
			if (previous !== UNDEF) {
				this.#runCallbacks("exit", previous, frozen);
				this.#sendStateEvents("exit");
				this.#stopTimer();
			}
			let step: ScheduledTransition = { etype, data: frozen, state: next };
			for (let entered = 0; ; entered++) {
				if (entered >= this.table.chainLimit) {
					throw new ProtocolError(
						"Chained state transition limit reached (infinite loop?)"
					);
				}
				this.logDebug(
					`state: ${formatValue(this.#state)} -> ${step.state} (event: ${formatEventType(step.etype)})`
				);
				this.#state = step.state;
				const current = step;
				this.withRecursiveEvents(() =>
					this.#runCallbacks("enter", current.state, current.data)
				);
				if (!this.#next) {
					const timedEvent = this.table.timedEvents.get(current.state);
					if (timedEvent !== undefined) {
						this.withRecursiveEvents(() =>
							this.#startTimer(current.data.duration, timedEvent)
						);
					}
				}
				const scheduled = this.#next;
				if (!scheduled) break;
				this.#next = null;
				// intermediate state: exit immediately, no events
				this.#runCallbacks("exit", current.state, scheduled.data);
				step = scheduled;
			}
			const output = this.calcOutput();
			if (output !== UNDEF) this.setOutput(output);
			if (!initial) this.#sendStateEvents("enter");
			return true;
		} finally {
			this.#fsmEventActive = false;
			this.#next = null;
		}
	}

	/**
	 * Computes the output value from the state. Returning `UNDEF` leaves
	 * the output unchanged. The default output is the state name.
	 */
	calcOutput(): unknown {
		return this.#state;
	}

	getConf(): Record<string, unknown> {
		return {
			...super.getConf(),
			states: [...this.table.states],
			events: [...this.table.events],
		};
	}
}

/**
 * Creates an FSM block from a definition or a compiled table.
 *
 * @example
 * ```typescript
 * const light = createFsm(circuit, "light", {
 *   states: ["off", "on"],
 *   events: [["toggle", "off", "on"], ["toggle", "on", "off"]],
 * });
 * ```
 */
export function createFsm(
	circuit: Circuit,
	name: string | null,
	definition: FsmDefinition | FsmTable,
	options?: FsmOptions
): FSM {
	const table = "chainLimit" in definition ? definition : defineFsm(definition);
	return new FSM(circuit, name, table, options);
}

/**
 * Renders a compiled table as a Mermaid stateDiagram-v2 notation.
 *
 * Wildcard transitions are expanded to every state without a specific
 * entry and labelled `event (any)`; timer transitions are labelled
 * with the timer's default duration.
 *
 * @example
 * ```typescript
 * console.log(toMermaid(TURNSTILE));
 * // stateDiagram-v2
 * //     [*] --> locked
 * //     locked --> unlocked: coin
 * //     ...
 * ```
 */
export function toMermaid(table: FsmTable): string {
	let mermaid = "stateDiagram-v2\n";
	mermaid += `    [*] --> ${table.defaultState}\n`;

	for (const [event, row] of table.transitions) {
		for (const [from, to] of row) {
			if (from === null || to === null) continue;
			mermaid += `    ${from} --> ${to}: ${event}\n`;
		}
		const wildcard = row.get(null);
		if (wildcard === undefined || wildcard === null) continue;
		for (const from of table.states) {
			if (!row.has(from)) {
				mermaid += `    ${from} --> ${wildcard}: ${event} (any)\n`;
			}
		}
	}

	for (const [state, event] of table.timedEvents) {
		let target: string | null;
		if (event instanceof Goto) {
			target = event.state;
		} else {
			const row = table.transitions.get(event);
			target = row?.has(state) ? (row.get(state) ?? null) : (row?.get(null) ?? null);
		}
		if (target === null) continue;
		const duration = table.durations.get(state);
		const label =
			duration === null || duration === undefined ? "timer" : `timer (${duration}s)`;
		mermaid += `    ${state} --> ${target}: ${label}\n`;
	}

	return mermaid;
}
