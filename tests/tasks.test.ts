import assert from "node:assert/strict";
import { test } from "node:test";
import { CancelledError } from "../src/errors.ts";
import { sleep, startTimer } from "../src/tasks.ts";

const MONTH = 30 * 86400;

test("startTimer", async () => {
	const fired: string[] = [];
	startTimer(() => fired.push("short"), 0.01);
	const cancelled = startTimer(() => fired.push("cancelled"), 0.01);
	cancelled.cancel();
	const long = startTimer(() => fired.push("long"), MONTH);
	await sleep(0.05);
	assert.deepEqual(fired, ["short"]);
	long.cancel();
});

test("long sleep is not cut short", async () => {
	const controller = new AbortController();
	let finished = false;
	const long = sleep(MONTH, controller.signal);
	long.then(
		() => {
			finished = true;
		},
		() => {}
	);
	await sleep(0.05);
	assert.equal(finished, false);
	controller.abort(new CancelledError("stop"));
	await assert.rejects(long, CancelledError);
});
