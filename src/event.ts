import type { Block, SBlock } from "./block.ts";
import { CircuitError } from "./errors.ts";
import { formatValue } from "./value.ts";

/**
 * Event payload. An open, read-only key/value bag; handlers must ignore
 * keys they do not understand.
 */
export type EventData = Readonly<Record<string, unknown>>;

/**
 * A conditional event type, roughly `value ? etrue : efalse` where the value
 * is taken from the payload item `value`. A missing value selects `efalse`.
 * A `null` branch means no event at all.
 */
export class EventCond {
	constructor(
		public readonly etrue: EventType | null,
		public readonly efalse: EventType | null
	) {
		if (etrue !== null) checkEventType(etrue);
		if (efalse !== null) checkEventType(efalse);
	}

	toString(): string {
		return `EventCond(${formatEventType(this.etrue)}, ${formatEventType(this.efalse)})`;
	}
}

/** A special FSM event type causing a direct transition to `state`. */
export class Goto {
	constructor(public readonly state: string) {
		checkName(state, "Goto state");
	}

	toString(): string {
		return `Goto(${JSON.stringify(this.state)})`;
	}
}

/** Event type: a plain event name or one of the special variants. */
export type EventType = string | EventCond | Goto;

/**
 * Event filter. Returning an object replaces the payload, `true` passes
 * the payload unchanged and any falsy value cancels the delivery.
 */
export type EventFilter = (data: EventData) => EventData | boolean | null | undefined;

/** A single event, any iterable of events, or nothing. */
export type EventList = Event | Iterable<Event> | null | undefined;

/** Raises if `name` is not a non-empty string. */
export function checkName(name: unknown, nametype: string): asserts name is string {
	if (typeof name !== "string") {
		throw new TypeError(`${nametype} must be a string, but got ${formatValue(name)}`);
	}
	if (!name) {
		throw new Error(`${nametype} must be a non-empty string`);
	}
}

/** Raises if `etype` is not a valid event type. */
export function checkEventType(etype: unknown): asserts etype is EventType {
	if (typeof etype === "string") {
		if (!etype) throw new Error("event name must be a non-empty string");
	} else if (!(etype instanceof EventCond) && !(etype instanceof Goto)) {
		throw new TypeError(
			`event type must be a string, EventCond or Goto, but got ${formatValue(etype)}`
		);
	}
}

export function formatEventType(etype: EventType | null): string {
	if (etype === null) return "null";
	return typeof etype === "string" ? `'${etype}'` : String(etype);
}

/**
 * Checks whether `arg` specifies multiple ordered items. Strings are single
 * names, not iterables of characters.
 */
export function isMultiple(arg: unknown): arg is Iterable<unknown> {
	return (
		typeof arg === "object" &&
		arg !== null &&
		Symbol.iterator in arg &&
		!(arg instanceof Set) &&
		!(arg instanceof Map)
	);
}

/** Normalizes an {@link EventList} to an array, validating each item. */
export function eventList(events: EventList): readonly Event[] {
	if (events === null || events === undefined) return [];
	const items: unknown[] = events instanceof Event ? [events] : [...events];
	return items.map((event) => {
		if (!(event instanceof Event)) {
			throw new TypeError(`Expected was an Event object, got ${formatValue(event)}`);
		}
		return event;
	});
}

/** Event options. */
export interface EventOptions {
	/** Filters applied in order before the delivery */
	filters?: EventFilter | Iterable<EventFilter>;
}

/**
 * Event settings: destination, event type and a filter pipeline.
 *
 * The destination may be given by name; names are resolved when the
 * circuit the event is registered with is finalized.
 */
export class Event {
	#dest: SBlock | string;
	#filters: readonly EventFilter[];

	constructor(
		dest: SBlock | string,
		public readonly etype: EventType = "put",
		options: EventOptions = {}
	) {
		if (typeof dest === "string") checkName(dest, "event destination");
		checkEventType(etype);
		this.#dest = dest;
		const filters = options.filters;
		this.#filters =
			filters === undefined
				? []
				: typeof filters === "function"
					? [filters]
					: [...filters];
		for (const filter of this.#filters) {
			if (typeof filter !== "function") {
				throw new TypeError(`Expected was a callable filter, got ${formatValue(filter)}`);
			}
		}
	}

	/** Event sent to the control block, requesting an error stop */
	static abort(options?: EventOptions): Event {
		return new Event("_ctrl", "abort", options);
	}

	/** Event sent to the control block, requesting a normal stop */
	static shutdown(options?: EventOptions): Event {
		return new Event("_ctrl", "shutdown", options);
	}

	/** Name of the destination block (available also before resolving) */
	get destName(): string {
		return typeof this.#dest === "string" ? this.#dest : this.#dest.name;
	}

	/** Returns true if the destination is still given by name only. */
	isResolved(): boolean {
		return typeof this.#dest !== "string";
	}

	/** Replaces the destination name by the block object. */
	resolve(lookup: (name: string) => SBlock): void {
		if (typeof this.#dest === "string") {
			this.#dest = lookup(this.#dest);
		}
	}

	/** The resolved destination block. */
	get dest(): SBlock {
		if (typeof this.#dest === "string") {
			throw new CircuitError(`${this}: destination '${this.#dest}' is not resolved yet`);
		}
		return this.#dest;
	}

	/**
	 * Applies the filters and sends the event to the destination block.
	 * The sender's name is added to the payload as `source`.
	 *
	 * @returns `true` if sent, `false` if rejected by a filter
	 */
	send(source: Block, data: Record<string, unknown> = {}): boolean {
		const dest = this.dest;
		if (dest.circuit !== source.circuit) {
			throw new CircuitError(`event destination ${dest} is not in the current circuit`);
		}
		let payload: EventData = { ...data, source: source.name };
		for (const filter of this.#filters) {
			const result = filter(payload);
			if (!result) {
				source.logDebug(`Not sending event ${this} (rejected by a filter)`);
				return false;
			}
			if (result !== true) payload = result;
		}
		if (dest.initStepsCompleted < 2) {
			// events may be generated during the circuit initialization
			dest.logDebug("pending event, initializing early");
			source.circuit.initSBlock(dest, true);
		}
		source.logDebug(`sending event ${this}`);
		dest.event(this.etype, payload);
		return true;
	}

	toString(): string {
		return `<Event dest='${this.destName}', event=${formatEventType(this.etype)}>`;
	}
}
