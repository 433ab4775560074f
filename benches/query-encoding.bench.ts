import { bench, describe } from "vitest";
import { encodeQuery, revertBracketKeys } from "../src/operation/query.js";
import type { Field } from "../src/operation/types.js";

function uuids(n: number): string[] {
	const out: string[] = [];
	for (let i = 0; i < n; i++) {
		out.push(`00000000-0000-4000-8000-${i.toString().padStart(12, "0")}`);
	}
	return out;
}

const small: readonly Field[] = [
	["market", "KRW-BTC"],
	["state", "wait"],
	["uuids", uuids(5)],
];
const large: readonly Field[] = [["market", "KRW-BTC"], ["uuids", uuids(100)]];

describe("query encoding", () => {
	bench("brackets, 5 list items", () => {
		encodeQuery(small, "brackets");
	});

	bench("brackets + revert, 100 list items", () => {
		const query = encodeQuery(large, "brackets");
		if (query.ok) revertBracketKeys(query.value);
	});

	bench("comma, 100 list items", () => {
		encodeQuery(large, "comma");
	});
});
