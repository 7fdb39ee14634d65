import type { Circuit } from "./circuit.ts";
import { CancelledError } from "./errors.ts";

/** A supporting task run alongside the simulation. */
export type SupportingTask = (signal: AbortSignal) => Promise<unknown>;

export interface RunOptions {
	/** Stop the simulation normally on SIGTERM (default false) */
	catchSigterm?: boolean;
}

interface Outcome {
	name: string;
	error: unknown;
	failed: boolean;
}

/**
 * Runs the circuit simulation together with supporting tasks. When any of
 * them finishes, the simulation is stopped first, then the remaining tasks
 * are cancelled through their signal.
 *
 * Resolves when everything exited normally or was cancelled.
 *
 * @throws the simulation error, if the simulation failed
 * @throws Error with the original error as `cause`, if a supporting task failed
 *
 * @example
 * ```typescript
 * await run(circuit, [
 *   async (signal) => {
 *     await circuit.waitInit();
 *     await sleep(60, signal);
 *   },
 * ]);
 * ```
 */
export async function run(
	circuit: Circuit,
	tasks: readonly SupportingTask[] = [],
	{ catchSigterm = false }: RunOptions = {}
): Promise<void> {
	const onSigterm = () => {
		circuit.logger.warn("SIGTERM caught");
		circuit.abort(new CancelledError("SIGTERM caught"));
	};
	if (catchSigterm) process.on("SIGTERM", onSigterm);
	try {
		if (!tasks.length) {
			try {
				await circuit.runForever();
			} catch (err) {
				if (!(err instanceof CancelledError)) throw err;
			}
			return;
		}

		const controller = new AbortController();
		const sim = circuit.runForever();
		const outcomes = tasks.map(async (task, i): Promise<Outcome> => {
			const name = task.name || `supporting task #${i + 1}`;
			try {
				await task(controller.signal);
				return { name, error: null, failed: false };
			} catch (err) {
				// errors caused by the cancellation are expected
				return { name, error: err, failed: !controller.signal.aborted };
			}
		});
		await Promise.race([
			sim.then(
				() => undefined,
				() => undefined
			),
			...outcomes,
		]);

		// the simulation is stopped first
		let simError: unknown = null;
		try {
			await circuit.shutdown();
		} catch (err) {
			simError = err;
		}
		controller.abort(new CancelledError("run: stopping supporting tasks"));
		const results = await Promise.all(outcomes);
		if (simError !== null) throw simError;
		const failure = results.find((outcome) => outcome.failed);
		if (failure) {
			throw new Error(`Supporting task '${failure.name}' failed`, {
				cause: failure.error,
			});
		}
	} finally {
		if (catchSigterm) process.off("SIGTERM", onSigterm);
	}
}
