/**
 * Output value of a block which has not produced any output yet.
 * Once a block's output leaves UNDEF, it never returns to it.
 */
export const UNDEF: unique symbol = Symbol("UNDEF");

/** Type of the {@link UNDEF} sentinel. */
export type Undef = typeof UNDEF;

/** Checks whether a value is the {@link UNDEF} sentinel. */
export function isUndef(value: unknown): value is Undef {
	return value === UNDEF;
}

/** Literal types which can be interned by value. */
export type Primitive =
	| string
	| number
	| boolean
	| bigint
	| symbol
	| null
	| undefined;

function isPrimitive(value: unknown): value is Primitive {
	return (
		value === null ||
		(typeof value !== "object" && typeof value !== "function")
	);
}

/** Human readable form of a value for names and log messages. */
export function formatValue(value: unknown): string {
	if (value === UNDEF) return "<UNDEF>";
	if (typeof value === "string") return JSON.stringify(value);
	if (typeof value === "bigint") return `${value}n`;
	if (Array.isArray(value)) return `[${value.map(formatValue).join(", ")}]`;
	if (value !== null && typeof value === "object") {
		if (value.toString !== Object.prototype.toString) return String(value);
		try {
			return JSON.stringify(value);
		} catch {
			return "[object]";
		}
	}
	return String(value);
}

/**
 * Validates a duration in seconds. `null` and `undefined` mean "not set".
 */
export function checkDuration(value: unknown, what: string): number | null {
	if (value === null || value === undefined) return null;
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new TypeError(`${what}: expected was a number of seconds, got ${formatValue(value)}`);
	}
	return value;
}

/**
 * A constant value to be fed into a block's input.
 *
 * A Const is not a circuit block and is not registered in any circuit;
 * it appears only as an input and may be shared by several circuits.
 */
export class Const {
	constructor(public readonly output: unknown) {}

	/** Name derived from the value, e.g. `<Const 42>` */
	get name(): string {
		return `<Const ${formatValue(this.output)}>`;
	}

	toString(): string {
		return this.name;
	}
}

/**
 * Interning cache of constants. Primitive literals map to a single Const
 * instance per cache; other values get a fresh, uncached wrapper.
 */
export class ConstCache {
	#cache = new Map<Primitive, Const>();

	get(value: unknown): Const {
		if (value instanceof Const) return value;
		if (!isPrimitive(value)) return new Const(value);
		let cached = this.#cache.get(value);
		if (!cached) {
			cached = new Const(value);
			this.#cache.set(value, cached);
		}
		return cached;
	}

	get size(): number {
		return this.#cache.size;
	}

	clear(): void {
		this.#cache.clear();
	}
}
