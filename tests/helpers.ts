import { SBlock } from "../src/block.ts";
import { Circuit, type CircuitOptions } from "../src/circuit.ts";
import type { EventData, EventType } from "../src/event.ts";
import type { Logger } from "../src/logger.ts";

export type LogLevel = "debug" | "log" | "warn" | "error";

/** Silent logger keeping the first argument of every call. */
export class TestLogger implements Logger {
	readonly records: { level: LogLevel; message: string }[] = [];

	debug = (...args: unknown[]) => this.#add("debug", args);
	log = (...args: unknown[]) => this.#add("log", args);
	warn = (...args: unknown[]) => this.#add("warn", args);
	error = (...args: unknown[]) => this.#add("error", args);

	#add(level: LogLevel, args: unknown[]): void {
		this.records.push({ level, message: String(args[0]) });
	}

	messages(level: LogLevel): string[] {
		return this.records
			.filter((record) => record.level === level)
			.map((record) => record.message);
	}
}

export function createCircuit(options: CircuitOptions = {}): {
	circuit: Circuit;
	logger: TestLogger;
} {
	const logger = new TestLogger();
	const circuit = new Circuit({ logger, ...options });
	return { circuit, logger };
}

/** Sequential block accepting any event and keeping a list of them. */
export class Recorder extends SBlock {
	readonly received: [EventType, EventData][] = [];

	initRegular(): void {
		this.setOutput(null);
	}

	protected handleEvent(etype: EventType, data: EventData): unknown {
		this.received.push([etype, data]);
		return true;
	}
}
