import type { Block } from "./block.ts";
import { BlockError, CancelledError, describeError, ProtocolError } from "./errors.ts";
import type { Logger } from "./logger.ts";

/** An async function driven by an abort signal. */
export type TaskFunction<T = unknown> = (signal: AbortSignal) => Promise<T>;

/** Returns control to the event loop, letting pending timers and I/O run. */
export function yieldToLoop(): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, 0));
}

/** Longest delay `setTimeout` accepts, in milliseconds */
export const MAX_TIMER_DELAY = 2 ** 31 - 1;

/** Handle of a timer started by {@link startTimer}. */
export interface TimerHandle {
	cancel(): void;
}

/**
 * Calls `callback` after the given number of seconds. Delays longer than
 * {@link MAX_TIMER_DELAY} are split into several `setTimeout` calls;
 * an infinite delay never fires.
 */
export function startTimer(callback: () => void, seconds: number): TimerHandle {
	let remaining = Math.max(0, seconds * 1000);
	let handle: ReturnType<typeof setTimeout>;
	const arm = () => {
		if (remaining > MAX_TIMER_DELAY) {
			remaining -= MAX_TIMER_DELAY;
			handle = setTimeout(arm, MAX_TIMER_DELAY);
		} else {
			handle = setTimeout(callback, remaining);
		}
	};
	arm();
	return { cancel: () => clearTimeout(handle) };
}

/**
 * Sleeps for the given number of seconds. Rejects with the signal's reason
 * when aborted.
 */
export function sleep(seconds: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(signal.reason);
			return;
		}
		const onAbort = () => {
			timer.cancel();
			reject(signal?.reason);
		};
		const timer = startTimer(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, seconds);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/** A promise with its settle functions exposed. */
export class Deferred<T = void> {
	readonly promise: Promise<T>;
	#settled = false;
	#resolve: (value: T) => void = () => {};
	#reject: (reason: unknown) => void = () => {};

	constructor() {
		this.promise = new Promise<T>((resolve, reject) => {
			this.#resolve = resolve;
			this.#reject = reject;
		});
	}

	get settled(): boolean {
		return this.#settled;
	}

	resolve(value: T): void {
		this.#settled = true;
		this.#resolve(value);
	}

	reject(reason: unknown): void {
		this.#settled = true;
		this.#reject(reason);
	}
}

/** A block's task bounded by a timeout in seconds. */
export interface BoundedTask {
	block: Block;
	run: TaskFunction<void>;
	timeout: number;
}

/**
 * Runs the tasks concurrently, each with its own timeout.
 *
 * A task exceeding its timeout gets its signal aborted; its settlement is
 * awaited. Errors and timeouts are logged and counted, never thrown.
 * If the parent `signal` is aborted, all tasks are aborted too and the
 * parent's reason is thrown after every task has settled.
 *
 * @returns number of failed tasks
 */
export async function runBoundedTasks(
	jobName: string,
	tasks: readonly BoundedTask[],
	logger: Logger,
	signal?: AbortSignal
): Promise<number> {
	const results = await Promise.all(
		tasks.map((task) => runBoundedTask(jobName, task, signal))
	);
	const errors = results.filter((ok) => !ok).length;
	if (errors) {
		logger.error(`${errors} block ${jobName} error(s) suppressed`);
	}
	signal?.throwIfAborted();
	return errors;
}

async function runBoundedTask(
	jobName: string,
	{ block, run, timeout }: BoundedTask,
	parent?: AbortSignal
): Promise<boolean> {
	const controller = new AbortController();
	const onParentAbort = () => controller.abort(parent?.reason);
	if (parent?.aborted) onParentAbort();
	else parent?.addEventListener("abort", onParentAbort, { once: true });
	let timedOut = false;
	const timer = startTimer(() => {
		timedOut = true;
		controller.abort(new CancelledError(`${jobName} timeout`));
	}, timeout);
	try {
		await run(controller.signal);
	} catch (err) {
		if (timedOut) {
			block.logWarning(
				`${jobName} timeout, check timeout value (${timeout.toFixed(1)} s)`
			);
			return false;
		}
		if (parent?.aborted) return true;
		block.logError(`${jobName} error: ${describeError(err)}`, err);
		return false;
	} finally {
		timer.cancel();
		parent?.removeEventListener("abort", onParentAbort);
	}
	if (timedOut) {
		// finished despite the abort request
		block.logWarning(`${jobName} timeout, check timeout value (${timeout.toFixed(1)} s)`);
		return false;
	}
	return true;
}

/** Options of a monitored task. */
export interface MonitoredTaskOptions {
	/** A service is supposed to run until cancelled */
	service?: boolean;
	/** Task description for messages */
	name?: string;
}

/**
 * An async function running on behalf of a block. Its failure aborts
 * the block's circuit; the `promise` itself never rejects.
 */
export class MonitoredTask<T = unknown> {
	readonly #controller = new AbortController();
	readonly name: string;
	readonly promise: Promise<T | undefined>;

	constructor(
		readonly owner: Block,
		fn: TaskFunction<T>,
		{ service = false, name = "task" }: MonitoredTaskOptions = {}
	) {
		this.name = name;
		this.promise = this.#monitor(fn, service);
	}

	async #monitor(fn: TaskFunction<T>, service: boolean): Promise<T | undefined> {
		const signal = this.#controller.signal;
		try {
			const result = await fn(signal);
			if (service && !signal.aborted) {
				throw new ProtocolError("Unexpected task termination");
			}
			return result;
		} catch (err) {
			if (signal.aborted) return undefined;
			const owner = this.owner;
			owner.logError(`${this.name} failed: ${describeError(err)}`);
			owner.circuit.abort(
				new BlockError(owner.name, `${owner}: ${this.name} failed: ${describeError(err)}`, {
					cause: err,
				})
			);
			return undefined;
		}
	}

	get signal(): AbortSignal {
		return this.#controller.signal;
	}

	/** Requests cancellation without waiting. */
	abort(): void {
		if (!this.#controller.signal.aborted) {
			this.#controller.abort(new CancelledError(`${this.name} cancelled`));
		}
	}

	/** Requests cancellation and waits until the task settles. */
	async cancel(): Promise<void> {
		this.abort();
		await this.promise;
	}
}
