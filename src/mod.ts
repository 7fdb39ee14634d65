/**
 * @module
 *
 * Reactive automation circuits: graphs of combinational and sequential
 * blocks executed under a zero-delay discrete-event simulation.
 *
 * Combinational blocks compute their output from their inputs. Sequential
 * blocks (including finite-state machines) change their output only
 * in reaction to events. The circuit propagates every output change until
 * it settles, feedback loops included.
 *
 * @example Basic usage
 * ```typescript
 * import { Circuit, Event, Input, Not, Timer, run } from "circuitkit";
 *
 * const circuit = new Circuit();
 * const button = new Input(circuit, "button", {
 *   initdef: false,
 *   onOutput: new Event("light", "start", { filters: (data) => !!data.value }),
 * });
 * new Timer(circuit, "light", { durations: { on: 30 } });
 * new Not(circuit, "dark").connect("light");
 *
 * await run(circuit, [
 *   async () => {
 *     await circuit.waitInit();
 *     button.put(true);
 *   },
 * ]);
 * ```
 *
 * @example Finite-state machine
 * ```typescript
 * import { createFsm, toMermaid } from "circuitkit";
 *
 * const door = createFsm(circuit, "door", {
 *   states: ["closed", "open"],
 *   events: [["open", "closed", "open"], ["close", "open", "closed"]],
 *   timers: { open: [10, "close"] },
 * });
 * console.log(toMermaid(door.table));
 * ```
 */

export * from "./errors.ts";
export * from "./logger.ts";
export * from "./value.ts";
export * from "./event.ts";
export * from "./signature.ts";
export * from "./block.ts";
export * from "./fsm.ts";
export * from "./scheduler.ts";
export * from "./tasks.ts";
export * from "./circuit.ts";
export * from "./blocks.ts";
export * from "./run.ts";
