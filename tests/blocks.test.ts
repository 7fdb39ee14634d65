import assert from "node:assert/strict";
import { test } from "node:test";
import { And, Counter, FuncBlock, Input, Not, Or, Timer, ValuePoll } from "../src/blocks.ts";
import { CancelledError } from "../src/errors.ts";
import { sleep, yieldToLoop } from "../src/tasks.ts";
import { createCircuit } from "./helpers.ts";

test("logic blocks", async () => {
	const { circuit } = createCircuit();
	const a = new Input(circuit, "a", { initdef: false });
	new Input(circuit, "b", { initdef: true });
	const and = new And(circuit, "and").connect("a", "b");
	const or = new Or(circuit, "or").connect("a", "b");
	const withConst = new And(circuit, "and_const").connect("b", true);
	const not = new Not(circuit, "not").connect("or");
	const sum = new FuncBlock(circuit, "sum", (x, y) => Number(x) + Number(y)).connect("a", "b");

	const sim = circuit.runForever();
	await circuit.waitInit();
	assert.equal(and.output, false);
	assert.equal(or.output, true);
	assert.equal(withConst.output, true);
	assert.equal(not.output, false);
	assert.equal(sum.output, 1);

	a.put(true);
	await yieldToLoop();
	assert.equal(and.output, true);
	assert.equal(sum.output, 2);

	await circuit.shutdown();
	await assert.rejects(sim, CancelledError);
});

test("Not requires exactly one input", () => {
	const { circuit } = createCircuit();
	const blk = new Not(circuit, "n").connectInputs({ x: "a" });
	assert.throws(() => blk.start(), {
		message: "<Not 'n'>: Not connected correctly: unexpected: 'x', missing: '_'",
	});
});

test("Input validation", () => {
	const { circuit, logger } = createCircuit();
	const choice = new Input(circuit, "choice", { allowed: [1, 2, 3], initdef: 1 });
	const positive = new Input(circuit, "positive", {
		check: (v) => typeof v === "number" && v >= 0,
	});
	const text = new Input(circuit, "text", {
		schema: (v) => {
			if (typeof v !== "string") throw new Error("not a string");
			return v.trim();
		},
	});
	circuit.initSBlock(choice, true);

	assert.equal(choice.put(4), false);
	assert.equal(choice.output, 1);
	assert.equal(choice.put(3), true);
	assert.equal(choice.output, 3);

	assert.equal(positive.put(-1), false);
	assert.equal(positive.put(5), true);

	assert.equal(text.put(" x "), true);
	assert.equal(text.output, "x");
	assert.equal(text.put(3), false);
	assert.equal(text.output, "x");

	assert.deepEqual(logger.messages("warn"), [
		"<Input 'choice'>: Validation error: 4 is not among allowed values",
		"<Input 'positive'>: Validation function rejected value -1",
		"<Input 'text'>: Validation schema rejected value 3 with error: not a string",
	]);

	assert.throws(() => new Input(circuit, "bad", { allowed: [1], initdef: 2 }), {
		message: "Validation error: 2 is not among allowed values",
	});
});

test("Counter", () => {
	const { circuit } = createCircuit();
	const cnt = new Counter(circuit, "cnt", { initdef: 10 });
	assert.equal(cnt.count, 0);
	circuit.initSBlock(cnt, true);
	assert.equal(cnt.output, 10);

	assert.equal(cnt.event("inc"), 11);
	assert.equal(cnt.event("inc", { amount: 4 }), 15);
	assert.equal(cnt.event("dec", { amount: 20 }), -5);
	assert.equal(cnt.put(7), 7);
	assert.equal(cnt.event("reset"), 10);
	assert.equal(cnt.getState(), 10);
});

test("Counter modulo", () => {
	const { circuit } = createCircuit();
	const cnt = new Counter(circuit, "cnt", { modulo: 3 });
	circuit.initSBlock(cnt, true);
	assert.equal(cnt.event("dec"), 2);
	assert.equal(cnt.event("inc", { amount: 5 }), 1);

	const negative = new Counter(circuit, "neg", { modulo: -3 });
	circuit.initSBlock(negative, true);
	assert.equal(negative.event("inc"), -2);

	assert.throws(() => new Counter(circuit, "zero", { modulo: 0 }), {
		message: "modulo must not be zero",
	});
});

test("Timer", async () => {
	const { circuit } = createCircuit();
	const timer = new Timer(circuit, "timer", { durations: { on: 0.03 } });
	circuit.initSBlock(timer, true);
	assert.equal(timer.state, "off");
	assert.equal(timer.output, false);

	timer.event("start");
	assert.equal(timer.output, true);
	await sleep(0.08);
	assert.equal(timer.output, false);

	timer.event("toggle");
	assert.equal(timer.output, true);
	timer.event("stop");
	assert.equal(timer.output, false);
	timer.stop();
});

test("restartable Timer", () => {
	const { circuit } = createCircuit();
	const timer = new Timer(circuit, "timer", { durations: { on: 10 } });
	circuit.initSBlock(timer, true);
	timer.event("start");
	const [, first] = timer.getState();
	assert.equal(timer.event("start"), true);
	const [, second] = timer.getState();
	assert.ok(first !== null && second !== null && second >= first);
	timer.stop();

	const once = new Timer(circuit, "once", { durations: { on: 10 }, restartable: false });
	circuit.initSBlock(once, true);
	assert.equal(once.event("start"), true);
	assert.equal(once.event("start"), false);
	assert.equal(once.event("stop"), true);
	assert.equal(once.event("stop"), false);
	once.stop();
});

test("ValuePoll options", () => {
	const { circuit } = createCircuit();
	assert.throws(() => new ValuePoll(circuit, "poll", () => 1, { interval: 0 }), {
		message: "<ValuePoll 'poll'>: interval must be positive",
	});
	const poll = new ValuePoll(circuit, "poll2", () => 1, { interval: 1 });
	assert.equal(poll.initTimeout, 10);
	assert.equal(poll.stopTimeout, 10);
});
