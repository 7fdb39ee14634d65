import assert from "node:assert/strict";
import { test } from "node:test";
import { registerEventHandlers } from "../src/block.ts";
import type { Circuit } from "../src/circuit.ts";
import { ProtocolError } from "../src/errors.ts";
import { Event, Goto } from "../src/event.ts";
import {
	createFsm,
	defineFsm,
	FSM,
	type FsmDefinition,
	type FsmOptions,
	toMermaid,
} from "../src/fsm.ts";
import { sleep } from "../src/tasks.ts";
import { UNDEF } from "../src/value.ts";
import { createCircuit, Recorder } from "./helpers.ts";

const DOOR: FsmDefinition = {
	states: ["closed", "open", "locked"],
	events: [
		["open", "closed", "open"],
		["close", "open", "closed"],
		["lock", "closed", "locked"],
		["unlock", "locked", "closed"],
		["reset", null, "closed"],
		["reset", "locked", null],
	],
};

const WORKER: FsmDefinition = {
	states: ["idle"],
	timers: { busy: [0.02, "done"] },
	events: [
		["work", "idle", "busy"],
		["done", "busy", "idle"],
	],
};

/** Creates an initialized FSM. The `setup` callback may add other blocks. */
function start(
	definition: FsmDefinition,
	options: FsmOptions = {},
	setup: (circuit: Circuit) => void = () => {}
): { circuit: Circuit; fsm: FSM } {
	const { circuit } = createCircuit();
	const fsm = createFsm(circuit, "fsm", definition, options);
	setup(circuit);
	circuit.finalize();
	circuit.initSBlock(fsm, true);
	return { circuit, fsm };
}

test("defineFsm validation", () => {
	assert.throws(() => defineFsm({}), {
		message: "Cannot create a state machine with no states",
	});
	assert.throws(
		() =>
			defineFsm({
				states: ["a", "b", "c"],
				events: [
					["go", "a", "b"],
					["go", "a", "c"],
				],
			}),
		{ message: "Multiple transitions defined for event 'go' in state 'a'" }
	);
	assert.throws(
		() =>
			defineFsm({
				states: ["a"],
				events: [
					["go", null, "a"],
					["go", null, "a"],
				],
			}),
		{ message: "Multiple transitions defined for event 'go' in state <any>" }
	);
	assert.throws(() => defineFsm({ states: ["a"], events: [["go", "a", "zzz"]] }), {
		message: "event 'go': unknown state 'zzz'",
	});
	assert.throws(() => defineFsm({ states: ["a"], timers: { a: [1, "nope"] } }), {
		message: "timers['a']: undefined event 'nope'",
	});
	assert.throws(
		() => defineFsm({ states: ["a"], events: [["go", "a", "a"]], cond: { nope: () => true } }),
		{ message: "cond: unknown name 'nope'" }
	);
});

test("defineFsm result", () => {
	const table = defineFsm(WORKER);
	assert.equal(defineFsm(WORKER), table);
	assert.ok(Object.isFrozen(table));
	assert.deepEqual([...table.states], ["idle", "busy"]);
	assert.equal(table.defaultState, "idle");
	assert.equal(table.chainLimit, 6);
	assert.equal(table.durations.get("busy"), 0.02);

	const timed = defineFsm({ timers: { wait: [1, new Goto("wait")] } });
	assert.equal(timed.defaultState, "wait");
});

test("transitions", () => {
	const { fsm } = start(DOOR);
	assert.equal(fsm.state, "closed");
	assert.equal(fsm.output, "closed");

	assert.equal(fsm.event("open"), true);
	assert.equal(fsm.output, "open");

	// no transition defined
	assert.equal(fsm.event("lock"), false);
	assert.equal(fsm.state, "open");

	// wildcard
	assert.equal(fsm.event("reset"), true);
	assert.equal(fsm.state, "closed");

	// explicit "no transition" masks the wildcard
	fsm.event("lock");
	assert.equal(fsm.event("reset"), false);
	assert.equal(fsm.state, "locked");

	assert.equal(fsm.event(new Goto("open")), true);
	assert.equal(fsm.state, "open");

	assert.throws(() => fsm.event("jump"), { name: "UnknownEventError" });
});

test("initial state", () => {
	const { fsm } = start(DOOR, { initdef: "locked" });
	assert.equal(fsm.state, "locked");
	assert.throws(() => start(DOOR, { initdef: "nowhere" }), {
		name: "BlockError",
		message: "<FSM 'fsm'>: initialization error: Error: Unknown state 'nowhere'",
	});
});

test("guards", () => {
	const { fsm } = start(DOOR, { cond: { open: () => true } }, () => {});
	assert.equal(fsm.event("open"), true);

	const guarded = start(
		{ ...DOOR, cond: { open: (_fsm, data) => data.key === "ok" } },
		{ cond: { open: (_fsm, data) => data.user !== "guest" } }
	).fsm;
	assert.equal(guarded.event("open"), false);
	assert.equal(guarded.event("open", { key: "ok", user: "guest" }), false);
	assert.equal(guarded.state, "closed");
	assert.equal(guarded.event("open", { key: "ok" }), true);
	assert.equal(guarded.state, "open");
});

test("enter and exit callbacks", () => {
	const log: string[] = [];
	const { fsm } = start(
		{
			...DOOR,
			enter: { open: () => log.push("enter open (table)") },
			exit: { closed: () => log.push("exit closed (table)") },
		},
		{
			enter: { open: () => log.push("enter open") },
			exit: { closed: () => log.push("exit closed") },
		}
	);
	assert.deepEqual(log, []);
	fsm.event("open");
	assert.deepEqual(log, [
		"exit closed",
		"exit closed (table)",
		"enter open",
		"enter open (table)",
	]);
});

test("state events", () => {
	const { circuit, fsm } = start(
		DOOR,
		{
			onEnter: { open: new Event("rec", "opened") },
			onExit: { closed: new Event("rec", "left") },
			onNotrans: new Event("rec", "notrans"),
		},
		(circuit) => new Recorder(circuit, "rec")
	);
	const rec = circuit.findBlock("rec");
	assert.ok(rec instanceof Recorder);
	const received = rec.received;
	// no events on the initial entry
	assert.deepEqual(received, []);

	fsm.sdata = { count: 1, _hidden: 2 };
	fsm.event("open");
	fsm.event("lock");
	assert.deepEqual(received, [
		[
			"left",
			{ trigger: "exit", state: "closed", value: "closed", sdata: { count: 1 }, source: "fsm" },
		],
		[
			"opened",
			{ trigger: "enter", state: "open", value: "open", sdata: { count: 1 }, source: "fsm" },
		],
		["notrans", { trigger: "notrans", event: "lock", state: "open", source: "fsm" }],
	]);
});

test("timed state", async () => {
	const { fsm } = start(WORKER);
	const before = Date.now() / 1000;
	fsm.event("work");
	assert.equal(fsm.state, "busy");
	const [, expires] = fsm.getState();
	assert.ok(expires !== null && expires >= before + 0.02 - 0.001);
	await sleep(0.08);
	assert.equal(fsm.state, "idle");
	assert.equal(fsm.getState()[1], null);
});

const MONTH = 30 * 86400;

test("timed state longer than the longest timer delay", async () => {
	const { fsm } = start({ ...WORKER, timers: { busy: [MONTH, "done"] } });
	const before = Date.now() / 1000;
	fsm.event("work");
	await sleep(0.05);
	assert.equal(fsm.state, "busy");
	const [, expires] = fsm.getState();
	assert.ok(expires !== null && expires >= before + MONTH - 1);
	fsm.stop();

	const { circuit } = createCircuit();
	const restored = createFsm(circuit, "restored", WORKER);
	restored.restoreState(["busy", Date.now() / 1000 + MONTH, {}]);
	await sleep(0.05);
	assert.equal(restored.state, "busy");
	restored.stop();
});

test("timer duration overrides", () => {
	const { fsm } = start(WORKER);
	fsm.event("work", { duration: Infinity });
	assert.equal(fsm.state, "busy");
	assert.equal(fsm.getState()[1], null);
	fsm.event("done");

	const { fsm: forever } = start(WORKER, { durations: { busy: Infinity } });
	forever.event("work");
	assert.equal(forever.getState()[1], null);

	assert.throws(() => start(WORKER, { durations: { idle: 1 } }), {
		message: "'idle' is not a timed state",
	});

	const { fsm: unset } = start({ ...WORKER, timers: { busy: [null, "done"] } });
	assert.throws(() => unset.event("work"), {
		message: "Timer duration for state 'busy' not set",
	});
});

test("zero duration timer passes through the state", () => {
	const log: string[] = [];
	const { circuit, fsm } = start(
		{
			states: ["a", "c"],
			timers: { b: [0, "next"] },
			events: [
				["go", "a", "b"],
				["next", "b", "c"],
			],
			enter: { b: () => log.push("enter b") },
			exit: { b: () => log.push("exit b") },
		},
		{ onOutput: new Event("rec", "out") },
		(circuit) => new Recorder(circuit, "rec")
	);
	const rec = circuit.findBlock("rec");
	assert.ok(rec instanceof Recorder);
	const received = rec.received;
	fsm.event("go");
	assert.equal(fsm.state, "c");
	assert.deepEqual(log, ["enter b", "exit b"]);
	assert.deepEqual(
		received.map(([, data]) => data.value),
		["a", "c"]
	);
});

test("transition requested by an entry callback", () => {
	const { fsm } = start({
		states: ["a", "b", "c"],
		events: [
			["go", "a", "b"],
			["next", "b", "c"],
		],
		enter: { b: (machine) => machine.event("next") },
	});
	fsm.event("go");
	assert.equal(fsm.state, "c");
});

test("two transitions requested by an entry callback", () => {
	const { circuit, fsm } = start({
		states: ["a", "b", "c"],
		events: [
			["go", "a", "b"],
			["next", "b", "c"],
		],
		enter: {
			b: (machine) => {
				machine.event("next");
				machine.event("next");
			},
		},
	});
	assert.throws(() => fsm.event("go"), {
		name: "ProtocolError",
		message:
			"Forbidden event multiplication; Two events ('next' and 'next') " +
			"were generated while handling a single event",
	});
	assert.ok(circuit.error instanceof ProtocolError);
});

test("chained transitions are limited", () => {
	const { fsm } = start({
		states: ["idle", "a", "b"],
		events: [["go", "idle", "a"]],
		enter: {
			a: (machine) => machine.event(new Goto("b")),
			b: (machine) => machine.event(new Goto("a")),
		},
	});
	assert.throws(() => fsm.event("go"), {
		message: "Chained state transition limit reached (infinite loop?)",
	});
});

test("state save and restore", () => {
	const log: string[] = [];
	const { circuit } = createCircuit();
	const fsm = createFsm(circuit, "fsm", {
		...WORKER,
		enter: { busy: () => log.push("enter busy") },
	});
	const expires = Date.now() / 1000 + 10;
	fsm.restoreState(["busy", expires, { n: 1 }]);
	assert.equal(fsm.state, "busy");
	assert.equal(fsm.output, "busy");
	assert.deepEqual(fsm.sdata, { n: 1 });
	assert.deepEqual(log, []);
	const saved = fsm.getState();
	assert.equal(saved[0], "busy");
	assert.ok(saved[1] !== null && Math.abs(saved[1] - expires) < 0.1);
	assert.deepEqual(saved[2], { n: 1 });
	fsm.stop();
	assert.equal(fsm.getState()[1], null);

	const other = createFsm(circuit, "other", WORKER);
	other.restoreState(["idle", null]);
	assert.equal(other.state, "idle");
	assert.deepEqual(other.sdata, {});
});

test("invalid saved states", () => {
	const { circuit, logger } = createCircuit();
	const fsm = createFsm(circuit, "fsm", WORKER);
	const now = Date.now() / 1000;

	fsm.restoreState(["busy", now - 1, {}]);
	assert.equal(fsm.state, UNDEF);
	assert.deepEqual(logger.messages("warn"), [
		"<FSM 'fsm'>: restore state: ignoring expired state",
	]);

	assert.throws(() => fsm.restoreState(["idle", now + 10]), {
		name: "ProtocolError",
		message: "cannot set a timer for a not timed state 'idle'",
	});
	assert.throws(() => fsm.restoreState(["zzz", null]), {
		message: "Unknown state 'zzz'",
	});
	assert.throws(() => fsm.restoreState("idle"), {
		name: "TypeError",
		message: 'Invalid FSM state: "idle"',
	});
});

class Switch extends FSM {}

registerEventHandlers(Switch, { toggle: () => true });

test("FSM event names must not clash with handler names", () => {
	const { circuit } = createCircuit();
	const table = defineFsm({
		states: ["off", "on"],
		events: [["toggle", "off", "on"]],
	});
	assert.throws(() => new Switch(circuit, "sw", table), {
		message: "Ambiguous event 'toggle': the name is used for both FSM and SBlock event",
	});
});

test("FSM configuration", () => {
	const { circuit } = createCircuit();
	const fsm = createFsm(circuit, "fsm", WORKER);
	const conf = fsm.getConf();
	assert.deepEqual(conf.states, ["idle", "busy"]);
	assert.deepEqual(conf.events, ["work", "done"]);
	assert.equal(conf.type, "sequential");
});

test("toMermaid", () => {
	const table = defineFsm({
		states: ["off", "on"],
		events: [
			["toggle", "off", "on"],
			["toggle", "on", "off"],
			["reset", null, "off"],
		],
		timers: { on: [5, "toggle"] },
	});
	assert.equal(
		toMermaid(table),
		`stateDiagram-v2
    [*] --> off
    off --> on: toggle
    on --> off: toggle
    off --> off: reset (any)
    on --> off: reset (any)
    on --> off: timer (5s)
`
	);
});
