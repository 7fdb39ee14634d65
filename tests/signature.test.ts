import assert from "node:assert/strict";
import { test } from "node:test";
import { closeMatches, diffSignature, similarity } from "../src/signature.ts";

test("similarity", () => {
	assert.equal(similarity("abc", "abc"), 1);
	assert.equal(similarity("", ""), 1);
	assert.equal(similarity("abcd", "abce"), 0.75);
	assert.equal(similarity("ab", "xy"), 0);
});

test("closeMatches", () => {
	assert.deepEqual(closeMatches("inpt", ["input", "zzzzz"]), ["input"]);
	assert.deepEqual(closeMatches("abc", []), []);
});

test("matching signatures", () => {
	assert.equal(diffSignature({ a: null }, { a: null }), null);
	assert.equal(diffSignature({ _: 2 }, { _: 2 }), null);
	assert.equal(diffSignature({ _: 2 }, { _: [1, null] }), null);
	assert.equal(diffSignature({ _: 2 }, { _: [null, 2] }), null);
});

test("group size mismatch", () => {
	assert.equal(
		diffSignature({ _: 2 }, { _: 1 }),
		"group _: input count is 2, expected was 1"
	);
	assert.equal(
		diffSignature({ _: 1 }, { _: [2, null] }),
		"group _: input count is 1, minimum is 2"
	);
	assert.equal(
		diffSignature({ _: 5 }, { _: [null, 3] }),
		"group _: input count is 5, maximum is 3"
	);
});

test("single input against group", () => {
	assert.equal(
		diffSignature({ a: null }, { a: [2, null] }),
		"a: is a single input, expected was a group"
	);
	assert.equal(
		diffSignature({ _: 2 }, { _: null }),
		"_: is a group, expected was a single input"
	);
	assert.equal(
		diffSignature({ a: null, _: 2 }, { a: [0, null], _: 1 }),
		"a: is a single input, expected was a group; group _: input count is 2, expected was 1"
	);
});

test("name mismatch with suggestions", () => {
	assert.equal(
		diffSignature({ inpt: null }, { input: null, other: null }),
		"unexpected: 'inpt' (did you mean 'input' ?), missing: 'input', 'other'"
	);
	assert.equal(diffSignature({}, { a: null }), "missing: 'a'");
});
