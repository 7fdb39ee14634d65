import { createPubSub } from "@marianmeres/pubsub";
import {
	Block,
	CBlock,
	type InputItem,
	type ResolvedInput,
	SBlock,
} from "./block.ts";
import { ControlBlock, Not } from "./blocks.ts";
import {
	BlockError,
	CancelledError,
	CircuitError,
	describeError,
	InvalidStateError,
	toError,
} from "./errors.ts";
import type { Event } from "./event.ts";
import { createLogger, type Logger } from "./logger.ts";
import { ChangeQueue, Scheduler } from "./scheduler.ts";
import { type BoundedTask, Deferred, runBoundedTasks, yieldToLoop } from "./tasks.ts";
import { Const, ConstCache, formatValue, UNDEF } from "./value.ts";

/** Persistent store key of the last simulation stop timestamp */
export const STOP_TIME_KEY = "circuit-stop-time";

/** Keys with this prefix belong to the circuit and are never pruned */
export const RESERVED_KEY_PREFIX = "circuit-";

/** Name of the automatically created control block */
export const CONTROL_BLOCK = "_ctrl";

/** Name prefix of automatically created inverter blocks */
export const NOT_PREFIX = "_not_";

/**
 * Circuit lifecycle phase. The phases are passed in this order; a phase may
 * be skipped if the simulation fails early.
 */
export type Phase =
	| "building"
	| "finalized"
	| "started"
	| "initializing"
	| "running"
	| "stopping"
	| "terminated";

/**
 * Map-like storage of persistent block states. A `Map<string, unknown>`
 * qualifies; stored values are opaque to the circuit.
 */
export interface PersistentStore {
	get(key: string): unknown;
	set(key: string, value: unknown): unknown;
	has(key: string): boolean;
	delete(key: string): boolean;
	keys(): Iterable<string>;
}

/** Circuit options. */
export interface CircuitOptions {
	/** Custom logger (default: a clog logger with the "circuit" namespace) */
	logger?: Logger;
	/** Enable circuit-level debug messages */
	debug?: boolean;
	/** Persistent state storage */
	persistentStore?: PersistentStore | null;
}

/** Phase change notification. */
export interface PhaseChange {
	current: Phase;
	previous: Phase | null;
	/** The retained error once the simulation has failed or stopped */
	error: Error | null;
}

/** Block class usable as a type filter. */
export type BlockClass<B extends Block> = abstract new (...args: never[]) => B;

/** `setDebug()` target: a name, a glob pattern, a block or a block class. */
export type DebugTarget = string | Block | BlockClass<Block>;

/** Converts a glob pattern (`*`, `?`, `[...]`) to an anchored RegExp. */
export function globToRegExp(pattern: string): RegExp {
	let source = "";
	for (let i = 0; i < pattern.length; i++) {
		const ch = pattern[i];
		if (ch === "*") {
			source += ".*";
		} else if (ch === "?") {
			source += ".";
		} else if (ch === "[") {
			const end = pattern.indexOf("]", i + 2);
			if (end < 0) {
				source += "\\[";
				continue;
			}
			let set = pattern.slice(i + 1, end).replaceAll("\\", "\\\\");
			if (set.startsWith("!")) set = "^" + set.slice(1);
			source += `[${set}]`;
			i = end;
		} else {
			source += ch.replace(/[.+^${}()|\\\]]/g, "\\$&");
		}
	}
	return new RegExp(`^${source}$`, "s");
}

/**
 * A circuit: the block registry, the simulation kernel and the lifecycle
 * orchestrator.
 *
 * Blocks are created with the circuit as their first constructor argument
 * and register themselves. After `finalize()` (called implicitly by
 * `runForever()`) the topology is frozen.
 *
 * @example
 * ```typescript
 * const circuit = new Circuit();
 * const input = new Input(circuit, "input", { initdef: false });
 * new Not(circuit, "inverted").connect("input");
 * const sim = circuit.runForever();
 * await circuit.waitInit();
 * input.put(true);
 * await circuit.shutdown();
 * ```
 */
export class Circuit {
	readonly logger: Logger;
	/** Circuit-level debug messages */
	debug: boolean;

	#blocks = new Map<string, Block>();
	#events: Event[] = [];
	#consts = new ConstCache();
	#queue = new ChangeQueue<SBlock>();
	#finalized = false;
	#phase: Phase = "building";
	#error: Error | null = null;
	#persistentStore: PersistentStore | null;
	#persistentTimestamp: number | null = null;

	#controller: AbortController | null = null;
	#simStarted = false;
	#simTask: Promise<never> | null = null;
	#simDone = false;
	#scheduler: Scheduler | null = null;
	// true while the simulation runs synchronous startup code
	#inSimulation = false;
	// resolves to true after the initialization, false if it did not complete
	#initDone = new Deferred<boolean>();
	#pubsub = createPubSub();

	constructor(options: CircuitOptions = {}) {
		this.logger = options.logger ?? createLogger();
		this.debug = !!options.debug;
		this.#persistentStore = options.persistentStore ?? null;
	}

	logDebug(message: string): void {
		if (this.debug) this.logger.debug(message);
	}

	/** Current lifecycle phase */
	get phase(): Phase {
		return this.#phase;
	}

	/** The retained (first) error, if any */
	get error(): Error | null {
		return this.#error;
	}

	get persistentStore(): PersistentStore | null {
		return this.#persistentStore;
	}

	/** Stop timestamp (unix seconds) of the previous run, read from the store */
	get persistentTimestamp(): number | null {
		return this.#persistentTimestamp;
	}

	#setPhase(phase: Phase): void {
		const previous = this.#phase;
		if (previous === phase) return;
		this.#phase = phase;
		this.logDebug(`phase: ${previous} -> ${phase}`);
		this.#pubsub.publish("phase", { current: phase, previous, error: this.#error });
	}

	/**
	 * Subscribes to lifecycle phase changes. The callback is invoked
	 * immediately with the current phase.
	 *
	 * @returns unsubscribe function
	 */
	subscribe(cb: (change: PhaseChange) => void): () => void {
		const unsub = this.#pubsub.subscribe("phase", cb);
		cb({ current: this.#phase, previous: null, error: this.#error });
		return () => {
			unsub();
		};
	}

	/** Returns true after `finalize()` was called. */
	isFinalized(): boolean {
		return this.#finalized;
	}

	/** Returns true if the simulation was started and has not failed. */
	isReady(): boolean {
		return this.#simStarted && this.#error === null;
	}

	/** Throws if the circuit does not accept new blocks and connections. */
	checkNotFinalized(): void {
		if (this.#error) {
			throw new InvalidStateError("The circuit was shut down");
		}
		if (this.#finalized) {
			throw new InvalidStateError("No changes allowed in a finalized circuit");
		}
	}

	/** Sets the persistent store. Allowed only before finalization. */
	setPersistentStore(store: PersistentStore | null): void {
		this.checkNotFinalized();
		this.#persistentStore = store;
	}

	/** Registers a new block. Called by the `Block` constructor. */
	addBlock(blk: Block): void {
		this.checkNotFinalized();
		if (blk.circuit !== this) {
			throw new CircuitError(`${blk} belongs to another circuit`);
		}
		const existing = this.#blocks.get(blk.name);
		if (existing) {
			throw new Error(`Duplicate block name '${blk.name}': ${existing} and ${blk}`);
		}
		this.#blocks.set(blk.name, blk);
	}

	/** Registers events for destination resolving during finalization. */
	registerEvents(events: Iterable<Event>): void {
		for (const event of events) {
			if (!event.isResolved()) this.#events.push(event);
		}
	}

	/** Returns all blocks, optionally only those of the given type. */
	getBlocks(): Block[];
	getBlocks<B extends Block>(type: BlockClass<B>): B[];
	getBlocks<B extends Block>(type?: BlockClass<B>): Block[] {
		const blocks = [...this.#blocks.values()];
		return type ? blocks.filter((blk) => blk instanceof type) : blocks;
	}

	/** Returns the block with the given name. */
	findBlock(name: string): Block {
		const blk = this.#blocks.get(name);
		if (!blk) throw new Error(`Block '${name}' not found`);
		return blk;
	}

	/** Returns the interned Const for a literal value. */
	const(value: unknown): Const {
		return this.#consts.get(value);
	}

	/**
	 * Sets the debug flag of the selected blocks.
	 *
	 * @returns number of affected blocks
	 */
	setDebug(value: boolean, ...targets: DebugTarget[]): number {
		const selected = new Set<Block>();
		for (const target of targets) {
			if (typeof target === "string") {
				if (/[*?[]/.test(target)) {
					const re = globToRegExp(target);
					for (const blk of this.#blocks.values()) {
						if (re.test(blk.name)) selected.add(blk);
					}
				} else {
					selected.add(this.findBlock(target));
				}
			} else if (target instanceof Block) {
				selected.add(target);
			} else if (typeof target === "function") {
				for (const blk of this.getBlocks(target)) selected.add(blk);
			} else {
				throw new TypeError(
					`Expected block name, Block object or subclass, got ${formatValue(target)}`
				);
			}
		}
		for (const blk of selected) blk.debug = value;
		return selected.size;
	}

	/** Queues a changed sequential block for the scheduler. */
	notifyOutputChange(blk: SBlock): void {
		this.#queue.put(blk);
	}

	// block lookup with on-demand creation of automatic blocks
	#resolveName(name: string): Block {
		const existing = this.#blocks.get(name);
		if (existing) return existing;
		if (name === CONTROL_BLOCK) {
			return new ControlBlock(this, name, {
				comment: "Simulation Control Block",
				reserved: true,
			});
		}
		if (name.startsWith(NOT_PREFIX) && name.length > NOT_PREFIX.length) {
			const source = name.slice(NOT_PREFIX.length);
			if (!source.startsWith("_")) {
				return new Not(this, name, {
					comment: `Inverted output of ${source}`,
					reserved: true,
				}).connect(source);
			}
		}
		return this.findBlock(name);
	}

	#resolveInput(item: InputItem): ResolvedInput {
		if (item instanceof Const) return item;
		if (typeof item === "string") return this.#resolveName(item);
		if (item instanceof Block) {
			if (this.#blocks.get(item.name) !== item) {
				throw new Error(`${item} is not in the current circuit`);
			}
			return item;
		}
		return this.const(item);
	}

	/**
	 * Completes the circuit: resolves event destinations and input
	 * connections given by name, creates automatic blocks and builds the
	 * connection sets. Subsequent calls do nothing.
	 */
	finalize(): void {
		if (this.#finalized) return;
		this.checkNotFinalized();

		const done = new Set<CBlock>();
		for (;;) {
			// resolving may create new blocks
			const todo = this.getBlocks(CBlock).filter((blk) => !done.has(blk));
			if (!todo.length) break;
			for (const blk of todo) {
				done.add(blk);
				blk.resolveInputs((item) => {
					try {
						return this.#resolveInput(item);
					} catch (err) {
						const message = `failed connection: ${formatValue(item)} --> ${blk}: ${describeError(err)}`;
						throw err instanceof TypeError
							? new TypeError(message, { cause: err })
							: new Error(message, { cause: err });
					}
				});
			}
		}

		// the list may grow while resolving (automatic blocks)
		for (let i = 0; i < this.#events.length; i++) {
			const event = this.#events[i];
			event.resolve((name) => {
				const blk = this.#resolveName(name);
				if (!(blk instanceof SBlock)) {
					throw new TypeError(`${event}: destination ${blk} is not a sequential block`);
				}
				return blk;
			});
		}
		this.#events = [];

		this.#finalized = true;
		this.#setPhase("finalized");
	}

	#checkPersistentData(): void {
		const store = this.#persistentStore;
		const persistent = this.getBlocks(SBlock).filter((blk) => blk.persistent);
		if (!store) {
			if (persistent.length) {
				this.logger.warn("No data storage, state persistence unavailable");
				for (const blk of persistent) blk.persistent = false;
			}
			return;
		}

		let ts: unknown;
		try {
			ts = store.has(STOP_TIME_KEY) ? store.get(STOP_TIME_KEY) : undefined;
		} catch (err) {
			this.logger.warn(`Persistent data read error: ${describeError(err)}`);
		}
		if (typeof ts === "number" && Number.isFinite(ts)) {
			this.#persistentTimestamp = ts;
			if (ts > Date.now() / 1000) {
				this.logger.error(
					"The timestamp of persistent data is in the future, check the system time"
				);
			}
		} else {
			this.#persistentTimestamp = null;
			this.logger.warn(
				"The timestamp of persistent data is missing or invalid, state expiration will not be checked"
			);
		}

		const used = new Set(persistent.map((blk) => blk.key));
		try {
			for (const key of [...store.keys()]) {
				if (used.has(key) || key.startsWith(RESERVED_KEY_PREFIX)) continue;
				this.logger.log(`Removing unused persistent state for '${key}'`);
				store.delete(key);
			}
		} catch (err) {
			this.logger.warn(`Persistent data cleanup error: ${describeError(err)}`);
		}
	}

	/**
	 * Initializes a sequential block without any async code, in two steps:
	 * 1. restore the persistent state, if enabled
	 * 2. regular initialization, then `initdef` if still uninitialized
	 *
	 * The simulator makes two calls with `full = false`; an early event
	 * makes one call with `full = true`. A block may stay uninitialized,
	 * but it must be able to process events afterwards.
	 */
	initSBlock(blk: SBlock, full: boolean): void {
		const steps = blk.initStepsCompleted;
		try {
			if (steps === 0) {
				if (blk.persistent) {
					blk.initFromPersistentData();
					if (blk.isInitialized()) blk.logDebug("initialized from saved state");
				}
				blk.initStepsCompleted = 1;
			}
			if (steps === 1 || (steps === 0 && full)) {
				blk.initRegular?.();
				if (!blk.isInitialized() && blk.initFromValue && blk.initdef !== UNDEF) {
					blk.initFromValue(blk.initdef);
				}
				blk.initStepsCompleted = 2;
			}
		} catch (err) {
			throw new BlockError(
				blk.name,
				`${blk}: initialization error: ${describeError(err)}`,
				{ cause: err }
			);
		}
	}

	async #initAsync(signal: AbortSignal): Promise<void> {
		const tasks: BoundedTask[] = [];
		for (const blk of this.getBlocks(SBlock)) {
			const initAsync = blk.initAsync;
			if (blk.isInitialized() || !initAsync || blk.initTimeout <= 0) continue;
			tasks.push({
				block: blk,
				timeout: blk.initTimeout,
				run: (taskSignal) => initAsync.call(blk, taskSignal),
			});
		}
		if (tasks.length) {
			this.logDebug("Initializing async sequential blocks");
			await runBoundedTasks("async init", tasks, this.logger, signal);
		}
	}

	#initSync2(): void {
		const sblocks = this.getBlocks(SBlock);
		for (const blk of sblocks) {
			// do not check yet, the block may be waiting for an event
			// sent during another block's initialization
			this.initSBlock(blk, false);
		}
		for (const blk of sblocks) {
			if (!blk.isInitialized()) {
				throw new BlockError(blk.name, `${blk}: not initialized`);
			}
		}
		if (this.#persistentStore) {
			for (const blk of sblocks) blk.savePersistentState();
		}
		// the scheduler evaluates everything anyway
		this.#queue.clear();
	}

	#stopBlock(blk: Block): void {
		try {
			blk.stop();
		} catch (err) {
			this.logger.error(`${blk}: ignored error in stop(): ${describeError(err)}`, err);
		}
	}

	/**
	 * Stops the blocks: blocks with async cleanup first, then the remaining
	 * ones. Errors are logged only.
	 */
	async #stopBlocks(blocks: readonly Block[]): Promise<void> {
		const tasks: BoundedTask[] = [];
		const syncBlocks: Block[] = [];
		for (const blk of blocks) {
			const stopAsync = blk instanceof SBlock ? blk.stopAsync : undefined;
			if (blk instanceof SBlock && stopAsync && blk.stopTimeout > 0) {
				tasks.push({
					block: blk,
					timeout: blk.stopTimeout,
					run: (signal) => stopAsync.call(blk, signal),
				});
			} else {
				syncBlocks.push(blk);
			}
		}

		if (tasks.length) {
			for (const { block } of tasks) this.#stopBlock(block);
			await yieldToLoop();
			this.logDebug("Waiting for async cleanup");
			await runBoundedTasks("stop", tasks, this.logger);
		}
		for (const blk of syncBlocks) this.#stopBlock(blk);
	}

	/**
	 * Runs the simulation until it is stopped by `shutdown()` or `abort()`.
	 * The returned promise never resolves: it rejects with a `CancelledError`
	 * after a normal stop, or with the error that stopped the simulation.
	 * A circuit can be run only once.
	 */
	runForever(): Promise<never> {
		if (this.#simStarted) {
			return Promise.reject(
				new InvalidStateError(
					this.#simDone
						? "Cannot restart a finished simulation."
						: "The simulator is already running."
				)
			);
		}
		this.#simStarted = true;
		const controller = new AbortController();
		this.#controller = controller;
		this.#simTask = this.#simulate(controller.signal);
		return this.#simTask;
	}

	async #simulate(signal: AbortSignal): Promise<never> {
		const started: Block[] = [];
		let startOk = false;
		this.#inSimulation = true;
		try {
			if (this.#error) throw this.#error;
			if (!this.#blocks.size) throw new CircuitError("The circuit is empty");

			this.logDebug("Initializing the circuit");
			this.#checkPersistentData();
			this.finalize();

			this.logDebug("Setting up circuit blocks");
			for (const blk of this.#blocks.values()) {
				blk.start();
				started.push(blk);
			}
			this.#setPhase("started");
			// let tasks created by start() run
			this.#inSimulation = false;
			await yieldToLoop();
			this.#inSimulation = true;
			signal.throwIfAborted();
			startOk = true;

			this.#setPhase("initializing");
			this.logDebug("Initializing sequential blocks");
			for (const blk of this.getBlocks(SBlock)) this.initSBlock(blk, false);
			this.#inSimulation = false;
			await this.#initAsync(signal);
			this.#inSimulation = true;
			this.#initSync2();
			signal.throwIfAborted();

			this.logDebug("Starting simulation");
			this.#setPhase("running");
			this.#initDone.resolve(true);
			const scheduler = new Scheduler(this.#queue, this.#blocks.size, (message) =>
				this.logDebug(message)
			);
			this.#scheduler = scheduler;
			this.#inSimulation = false;
			await scheduler.run(this.getBlocks(CBlock), signal);
		} catch (err) {
			// an error thrown by a function which also called abort() loses here
			if (this.#error === null) this.#error = toError(err);
		}
		this.#inSimulation = false;

		const error = this.#error ?? new CancelledError("simulation stopped");
		if (!this.#initDone.settled) this.#initDone.resolve(false);
		if (error instanceof CancelledError) {
			this.logger.log("Normal circuit simulation stop");
		} else {
			this.logger.error(`Fatal circuit simulation error: ${describeError(error)}`, error);
		}

		this.#setPhase("stopping");
		if (started.length) {
			// save the state first, stop() may invalidate it
			const store = this.#persistentStore;
			if (startOk && store) {
				for (const blk of started) {
					if (blk instanceof SBlock) blk.savePersistentState();
				}
				try {
					store.set(STOP_TIME_KEY, Date.now() / 1000);
				} catch (err) {
					this.logger.warn(`Persistent data save error: ${describeError(err)}`);
				}
			}
			await this.#stopBlocks(started);
		}
		this.#consts.clear();
		this.#simDone = true;
		this.#setPhase("terminated");
		throw error;
	}

	/**
	 * Waits until the running circuit is fully initialized.
	 *
	 * @throws InvalidStateError if the simulation was not started or has
	 *   finished before the initialization completed
	 */
	async waitInit(): Promise<void> {
		await this.#checkStarted();
		if (await this.#initDone.promise) return;
		const error = this.#error;
		const message =
			error === null || error instanceof CancelledError
				? "The simulation task is finished"
				: `The simulation task failed with error: ${describeError(error)}`;
		throw new InvalidStateError(message, { cause: error });
	}

	async #checkStarted(): Promise<void> {
		if (!this.#simStarted) {
			// just created?
			await yieldToLoop();
			if (!this.#simStarted) {
				throw new InvalidStateError("The simulation task was not started");
			}
		}
	}

	/**
	 * Aborts the simulation. Only the first error is retained; later errors
	 * are ignored with a warning, except cancellations and the retained
	 * error itself or its cause. May be called before the start, which then
	 * fails.
	 */
	abort(err: unknown): void {
		const current = this.#error;
		if (current !== null) {
			if (err !== current && err !== current.cause && !(err instanceof CancelledError)) {
				this.logger.warn(`ignoring subsequent abort(${describeError(err)})`);
			}
			return;
		}
		const error =
			err instanceof Error
				? err
				: new TypeError(`abort(): expected an error, got ${formatValue(err)}`);
		if (error instanceof CancelledError) {
			this.logDebug(`abort(${describeError(error)})`);
		} else {
			this.logger.warn(`abort(${describeError(error)})`);
		}
		this.#error = error;
		if (!this.#simDone) this.#controller?.abort(error);
	}

	/**
	 * Stops the simulation and waits until it terminates.
	 *
	 * @throws InvalidStateError when called from the simulation itself
	 * @throws the retained error if the simulation failed
	 */
	async shutdown(): Promise<void> {
		if (this.#inSimulation || this.#scheduler?.active) {
			throw new InvalidStateError("Cannot await the simulator task from the simulator task.");
		}
		await this.#checkStarted();
		const simTask = this.#simTask;
		if (simTask === null) return;
		this.abort(new CancelledError("shutdown"));
		try {
			await simTask;
		} catch (err) {
			if (!(err instanceof CancelledError)) throw err;
		}
	}
}
