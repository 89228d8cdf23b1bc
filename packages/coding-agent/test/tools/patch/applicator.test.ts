import { describe, expect, it } from "vitest";
import { applyHunks, locateHunk, patchCode } from "../../../src/core/tools/patch/applicator";
import { Hunk } from "../../../src/core/tools/patch/hunk";
import { extractHunks } from "../../../src/core/tools/patch/parser";

describe("patchCode", () => {
	it("applies a simple replacement in place", () => {
		const codeLines = ["line1", "line2", "line3"];
		const result = patchCode(codeLines, ["@@ -2,1 +2,1 @@", "-line2", "+line2_modified"], 0);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["line1", "line2_modified", "line3"]);
	});

	it("applies multiple hunks", () => {
		const codeLines = ["a", "b", "c", "d"];
		const result = patchCode(codeLines, ["@@ -1,1 +1,1 @@", "-a", "+A", "@@ -3,1 +3,1 @@", "-c", "+C"], 0);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["A", "b", "C", "d"]);
	});

	it("leaves the buffer unchanged when a hunk does not match", () => {
		const codeLines = ["line1", "line2"];
		const result = patchCode(codeLines, ["@@ -1,1 +1,1 @@", "-nonexistent", "+new"], 0);

		expect(result).toBe(false);
		expect(codeLines).toEqual(["line1", "line2"]);
	});

	it("rolls back earlier hunks when a later one fails", () => {
		const codeLines = ["a", "b", "c"];
		const result = patchCode(codeLines, ["@@ -1,1 +1,1 @@", "-a", "+A", "@@ -3,1 +3,1 @@", "-zzz", "+Z"], 0);

		expect(result).toBe(false);
		expect(codeLines).toEqual(["a", "b", "c"]);
	});

	it("matches lines with trailing comments only when fuzzy", () => {
		const patchLines = ["@@ -1,1 +1,1 @@", "-line1", "+line1_new"];

		const strict = ["line1  # comment", "line2"];
		expect(patchCode(strict, patchLines, 0)).toBe(false);
		expect(strict).toEqual(["line1  # comment", "line2"]);

		const fuzzy = ["line1  # comment", "line2"];
		expect(patchCode(fuzzy, patchLines, 1)).toBe(true);
		expect(fuzzy).toEqual(["line1_new", "line2"]);
	});

	it("inserts lines after context", () => {
		const codeLines = ["line1", "line3"];
		const result = patchCode(codeLines, ["@@ -1,1 +1,2 @@", " line1", "+line2"], 0);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["line1", "line2", "line3"]);
	});

	it("deletes lines", () => {
		const codeLines = ["line1", "line2", "line3"];
		const result = patchCode(codeLines, ["@@ -1,2 +1,1 @@", " line1", "-line2"], 0);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["line1", "line3"]);
	});

	it("locates later hunks against the already patched buffer", () => {
		const codeLines = ["a", "b", "c"];
		const result = patchCode(codeLines, ["@@ -1,1 +1,1 @@", "-a", "+x", "@@ -1,1 +1,1 @@", "-x", "+y"], 0);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["y", "b", "c"]);
	});

	it("recovers from wrong line numbers", () => {
		const codeLines = ["import os", "", "def main():", "    print('hi')", "    return 0"];
		const result = patchCode(
			codeLines,
			["@@ -40,3 +40,3 @@", " def main():", "-    print('hi')", "+    print('hello')", "     return 0"],
			0,
		);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["import os", "", "def main():", "    print('hello')", "    return 0"]);
	});

	it("locates placeholder hunks by content", () => {
		const codeLines = ["a", "b", "c", "d"];
		const result = patchCode(codeLines, ["@@ ... @@", " b", "-c", "+C"], 0);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["a", "b", "C", "d"]);
	});

	it("keeps the buffer's text for context matched fuzzily", () => {
		const codeLines = ["def f():  # entry", "    return 1"];
		const result = patchCode(codeLines, ["@@ -1,2 +1,2 @@", " def f():", "-    return 1", "+    return 2"], 1);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["def f():  # entry", "    return 2"]);
	});

	it("prefers an exact match over a closer fuzzy one", () => {
		const codeLines = ["x = 1  # one", "x = 1"];
		const result = patchCode(codeLines, ["@@ -1,1 +1,1 @@", "-x = 1", "+x = 2"], 1);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["x = 1  # one", "x = 2"]);
	});

	it("does not apply the same patch twice", () => {
		const codeLines = ["line1", "line2", "line3"];
		const patchLines = ["@@ -2,1 +2,1 @@", "-line2", "+line2_modified"];

		expect(patchCode(codeLines, patchLines, 0)).toBe(true);
		expect(patchCode(codeLines, patchLines, 0)).toBe(false);
		expect(codeLines).toEqual(["line1", "line2_modified", "line3"]);
	});

	it("fills an empty buffer from a new-file hunk", () => {
		const codeLines: string[] = [];
		const result = patchCode(codeLines, ["--- /dev/null", "+++ b/new.py", "@@ -0,0 +1,2 @@", "+x", "+y"], 0);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["x", "y"]);
	});

	it("ignores file markers and patches the given buffer", () => {
		const codeLines = ["a"];
		const result = patchCode(codeLines, ["--- a/elsewhere.py", "+++ b/elsewhere.py", "@@ -1 +1 @@", "-a", "+b"], 0);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["b"]);
	});

	it("removes a dashed comment line that ends a hunk", () => {
		const codeLines = ["select 1;", "-- old note", "x", "a"];
		const result = patchCode(codeLines, ["@@ -1,2 +1,1 @@", " select 1;", "--- old note", "@@ -4,1 +3,1 @@", "-a", "+b"], 0);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["select 1;", "x", "b"]);
	});

	it("adds a line starting with ++ at the end of a hunk", () => {
		const codeLines = ["for (;;) {", "}"];
		const result = patchCode(codeLines, ["@@ -1,1 +1,2 @@", " for (;;) {", "+++i;", "@@ ... @@", " }"], 0);

		expect(result).toBe(true);
		expect(codeLines).toEqual(["for (;;) {", "++i;", "}"]);
	});

	it("fails when the diff has no hunks", () => {
		const codeLines = ["a"];
		expect(patchCode(codeLines, ["not a diff"], 1)).toBe(false);
		expect(codeLines).toEqual(["a"]);
	});
});

describe("applyHunks", () => {
	it("reports the first hunk that failed without touching the input", () => {
		const lines = ["a", "b"];
		const hunks = extractHunks(["@@ -1 +1 @@", "-a", "+A", "@@ -2 +2 @@", "-q", "+Q"]);

		const result = applyHunks(lines, hunks, 0);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.hunkIndex).toBe(1);
			expect(result.hunk.match).toEqual(["q"]);
		}
		expect(lines).toEqual(["a", "b"]);
	});

	it("skips empty hunks", () => {
		const result = applyHunks(["a"], [new Hunk("@@ -1,0 +1,0 @@", [])], 0);
		expect(result).toEqual({ ok: true, lines: ["a"] });
	});
});

describe("locateHunk", () => {
	it("reports the fuzziness level that found the hunk", () => {
		const hunk = new Hunk("@@ -1 +1 @@", ["-value = 3", "+value = 4"]);

		expect(locateHunk(["value = 3  # three"], hunk, 2)).toEqual({ index: 0, fuzziness: 1 });
		expect(locateHunk(["value = 3  # three"], hunk, 0)).toBeUndefined();
	});
});
