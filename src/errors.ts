/** Base class of all circuit errors. */
export class CircuitError extends Error {
	name = "CircuitError";
}

/**
 * Fatal protocol violation. The circuit cannot continue after it:
 * reentrant events, forbidden chained transitions, chain and oscillation
 * limits, errors raised inside event handlers.
 */
export class ProtocolError extends CircuitError {
	name = "ProtocolError";
}

/**
 * An error raised while evaluating, initializing or otherwise operating
 * a specific block. The original error is kept as `cause`.
 */
export class BlockError extends ProtocolError {
	name = "BlockError";

	constructor(
		/** Name of the offending block */
		public readonly block: string,
		message: string,
		options?: ErrorOptions
	) {
		super(message, options);
	}
}

/** Operation not allowed in the current lifecycle phase. */
export class InvalidStateError extends CircuitError {
	name = "InvalidStateError";
}

/** Event type not supported by the destination block. */
export class UnknownEventError extends CircuitError {
	name = "UnknownEventError";
}

/**
 * Cooperative cancellation. Stopping a simulation with a `CancelledError`
 * is the normal (non-fatal) way of terminating it.
 */
export class CancelledError extends Error {
	name = "CancelledError";
}

/** Returns `err` if it is an `Error`, otherwise wraps it. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

/** Short one-line description of an error: `Name: message`. */
export function describeError(err: unknown): string {
	return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
