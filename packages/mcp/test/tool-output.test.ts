import { describe, expect, it } from "vitest";
import { toolOutput, toYaml } from "../src/formatters/tool-output";

describe("toYaml", () => {
	it("omits undefined fields and keeps insertion order", () => {
		expect(toYaml({ pgn: 65262, pgn_name: undefined, decoded: false })).toBe(
			"pgn: 65262\ndecoded: false\n",
		);
	});

	it("writes 64-bit raw values as decimal strings", () => {
		expect(toYaml({ spn: 9001, raw: 0xffffffffffffffffn })).toBe(
			"spn: 9001\nraw: '18446744073709551615'\n",
		);
	});
});

describe("toolOutput", () => {
	it("puts a blank line between the frontmatter and the body", () => {
		expect(toolOutput({ pgn: 65251, spn_count: 0 }, "(No SPNs decoded)")).toBe(
			"---\npgn: 65251\nspn_count: 0\n---\n\n(No SPNs decoded)",
		);
	});
});
