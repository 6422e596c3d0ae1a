import { describe, expect, it } from "vitest";
import { chunkArray } from "./array";

describe("chunkArray", () => {
	it("should split into fixed-size chunks with a shorter tail", () => {
		expect(chunkArray(["a", "b", "c", "d", "e"], 2)).toEqual([["a", "b"], ["c", "d"], ["e"]]);
	});

	it("should return no chunks for an empty list", () => {
		expect(chunkArray([], 3)).toEqual([]);
	});
});
