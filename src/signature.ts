/**
 * Input signature: input name → `null` for a single input, or the number
 * of inputs in a group.
 */
export type InputSignature = Record<string, number | null>;

/**
 * Expected input shape: `null` = single input, a number = exact group size,
 * `[min, max]` = group size range with optional bounds.
 */
export type ExpectedSignature = Readonly<
	Record<string, number | null | readonly [number | null, number | null]>
>;

/** Levenshtein distance of two strings. */
function distance(a: string, b: string): number {
	let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
	for (let i = 1; i <= a.length; i++) {
		const row = [i];
		for (let j = 1; j <= b.length; j++) {
			const cost = a[i - 1] === b[j - 1] ? 0 : 1;
			row.push(Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + cost));
		}
		prev = row;
	}
	return prev[b.length];
}

/** Similarity ratio in the range 0.0 (nothing in common) to 1.0 (equal). */
export function similarity(a: string, b: string): number {
	const longest = Math.max(a.length, b.length);
	return longest ? 1 - distance(a, b) / longest : 1;
}

/**
 * Returns up to `n` candidates similar enough to `word`, best matches first.
 */
export function closeMatches(
	word: string,
	candidates: Iterable<string>,
	n = 3,
	cutoff = 0.6
): string[] {
	return [...candidates]
		.map((candidate) => ({ candidate, score: similarity(word, candidate) }))
		.filter(({ score }) => score >= cutoff)
		.sort((x, y) => y.score - x.score || x.candidate.localeCompare(y.candidate))
		.slice(0, n)
		.map(({ candidate }) => candidate);
}

function setDiffMessage(actual: string[], expected: string[]): string {
	const unexpected = actual.filter((name) => !expected.includes(name)).sort();
	const missing = expected.filter((name) => !actual.includes(name)).sort();
	const parts: string[] = [];
	if (unexpected.length) {
		const described = unexpected.map((name) => {
			const suggestions = closeMatches(name, missing);
			if (!suggestions.length) return `'${name}'`;
			const top = suggestions.map((s) => `'${s}'`).join(" or ");
			return `'${name}' (did you mean ${top} ?)`;
		});
		parts.push(`unexpected: ${described.join(", ")}`);
	}
	if (missing.length) {
		parts.push(`missing: ${missing.map((name) => `'${name}'`).join(", ")}`);
	}
	return parts.join(", ");
}

function valueDiffMessage(
	name: string,
	value: number | null,
	expected: ExpectedSignature[string]
): string | null {
	if (expected === null) {
		return value === null ? null : `${name}: is a group, expected was a single input`;
	}
	if (value === null) {
		return `${name}: is a single input, expected was a group`;
	}
	if (typeof expected === "number") {
		return value === expected
			? null
			: `group ${name}: input count is ${value}, expected was ${expected}`;
	}
	if (expected.length !== 2) {
		throw new Error(
			`checkSignature: input '${name}': invalid value ${JSON.stringify(expected)}`
		);
	}
	const [min, max] = expected;
	if (min !== null && value < min) {
		return `group ${name}: input count is ${value}, minimum is ${min}`;
	}
	if (max !== null && value > max) {
		return `group ${name}: input count is ${value}, maximum is ${max}`;
	}
	return null;
}

/**
 * Compares an actual input signature with an expected one.
 *
 * @returns a description of all differences, or `null` if they match
 */
export function diffSignature(
	actual: InputSignature,
	expected: ExpectedSignature
): string | null {
	const actualNames = Object.keys(actual);
	const expectedNames = Object.keys(expected);
	const sameNames =
		actualNames.length === expectedNames.length &&
		actualNames.every((name) => name in expected);
	if (!sameNames) {
		return setDiffMessage(actualNames, expectedNames);
	}
	const errors = expectedNames
		.map((name) => valueDiffMessage(name, actual[name], expected[name]))
		.filter((msg): msg is string => msg !== null);
	return errors.length ? errors.join("; ") : null;
}
