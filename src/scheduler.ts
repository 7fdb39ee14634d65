import { CBlock, type SBlock } from "./block.ts";
import { BlockError, describeError, ProtocolError } from "./errors.ts";

/** Maximum evaluations per block within one propagation burst */
export const EVALS_PER_BLOCK = 3;

/**
 * FIFO of sequential blocks with changed output. `get()` waits for an item
 * and can be aborted.
 */
export class ChangeQueue<T> {
	#items: T[] = [];
	#wakeup: (() => void) | null = null;

	put(item: T): void {
		this.#items.push(item);
		const wakeup = this.#wakeup;
		if (wakeup) {
			this.#wakeup = null;
			wakeup();
		}
	}

	/** Removes and returns the first item, if any. */
	take(): T | undefined {
		return this.#items.shift();
	}

	/** Waits for an item. Rejects with the signal's reason when aborted. */
	async get(signal: AbortSignal): Promise<T> {
		for (;;) {
			signal.throwIfAborted();
			const item = this.#items.shift();
			if (item !== undefined) return item;
			await new Promise<void>((resolve, reject) => {
				const onAbort = () => {
					this.#wakeup = null;
					reject(signal.reason);
				};
				signal.addEventListener("abort", onAbort, { once: true });
				this.#wakeup = () => {
					signal.removeEventListener("abort", onAbort);
					resolve();
				};
			});
		}
	}

	get size(): number {
		return this.#items.length;
	}

	clear(): void {
		this.#items = [];
	}
}

/**
 * Picks the block to be evaluated next: a block without inputs connected
 * to other pending blocks, or the one with the fewest such inputs.
 * Ties are broken by the set's insertion order.
 */
export function selectBlock(pending: ReadonlySet<CBlock>): CBlock {
	let best: CBlock | null = null;
	let bestCount = Infinity;
	for (const blk of pending) {
		let count = 0;
		for (const input of blk.iconnections) {
			if (input instanceof CBlock && pending.has(input)) count++;
		}
		if (count === 0) return blk;
		if (count < bestCount) {
			best = blk;
			bestCount = count;
		}
	}
	if (best === null) throw new Error("selectBlock: no pending blocks");
	return best;
}

/**
 * The propagation loop. Evaluates combinational blocks affected by output
 * changes until the circuit settles, then waits for the next change.
 */
export class Scheduler {
	#evaluations = 0;
	#active = false;

	constructor(
		readonly queue: ChangeQueue<SBlock>,
		readonly blockCount: number,
		readonly logDebug: (message: string) => void = () => {}
	) {}

	/** True while evaluating blocks, false while waiting for a change */
	get active(): boolean {
		return this.#active;
	}

	/** Total number of block evaluations */
	get evaluations(): number {
		return this.#evaluations;
	}

	/**
	 * Runs until aborted. The `initial` blocks are evaluated first.
	 *
	 * @throws ProtocolError when the circuit does not settle within
	 *   the evaluation limit
	 * @throws BlockError wrapping an evaluation error
	 */
	async run(initial: Iterable<CBlock>, signal: AbortSignal): Promise<never> {
		const limit = EVALS_PER_BLOCK * this.blockCount;
		const pending = new Set<CBlock>(initial);
		const addOutputs = (blk: { oconnections: ReadonlySet<CBlock> }) => {
			for (const out of blk.oconnections) pending.add(out);
		};
		let count = 0;
		this.#active = true;
		try {
			for (;;) {
				signal.throwIfAborted();
				if (!pending.size && !this.queue.size) {
					this.logDebug(`${count} block(s) evaluated, pausing`);
					this.#active = false;
					const blk = await this.queue.get(signal);
					this.#active = true;
					this.logDebug(`output change in ${blk}, resuming`);
					count = 0;
					addOutputs(blk);
				}
				for (let blk = this.queue.take(); blk !== undefined; blk = this.queue.take()) {
					addOutputs(blk);
				}
				if (!pending.size) continue;
				if (++count > limit) {
					throw new ProtocolError(
						"Circuit instability detected (too many block evaluations)"
					);
				}
				const blk = selectBlock(pending);
				pending.delete(blk);
				this.#evaluations++;
				let changed: boolean;
				try {
					changed = blk.evalBlock();
				} catch (err) {
					throw new BlockError(
						blk.name,
						`${blk}: output evaluation error: ${describeError(err)}`,
						{ cause: err }
					);
				}
				if (changed) addOutputs(blk);
			}
		} finally {
			this.#active = false;
		}
	}
}
