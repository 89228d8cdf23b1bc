import { describe, expect, it } from "vitest";
import { extractHunks, parseMarkerPath } from "../../../src/core/tools/patch/parser";

describe("extractHunks", () => {
	it("extracts a single hunk with its filename", () => {
		const hunks = extractHunks(["--- a/file.py", "+++ b/file.py", "@@ -1,2 +1,2 @@", " context", "-old", "+new"]);

		expect(hunks).toHaveLength(1);
		expect(hunks[0].matchCount()).toBe(2);
		expect(hunks[0].filename).toBe("file.py");
		expect(hunks[0].isNewFile).toBe(false);
	});

	it("splits consecutive hunks", () => {
		const hunks = extractHunks(["@@ -1,2 +1,2 @@", "-old1", "+new1", "@@ -10,2 +10,2 @@", "-old2", "+new2"]);

		expect(hunks).toHaveLength(2);
		expect(hunks[0].filename).toBeUndefined();
		expect(hunks[1].startOriginal).toBe(10);
		expect(hunks[1].match).toEqual(["old2"]);
	});

	it("closes a hunk at a bare --- separator", () => {
		const hunks = extractHunks(["@@ -1,1 +1,1 @@", "-old", "---", "@@ -5,1 +5,1 @@", "+new"]);

		expect(hunks).toHaveLength(2);
		expect(hunks[0].match).toEqual(["old"]);
		expect(hunks[1].replace).toEqual(["new"]);
	});

	it("assigns hunks to the files whose markers precede them", () => {
		const hunks = extractHunks([
			"--- a/src/one.py",
			"+++ b/src/one.py",
			"@@ -1 +1 @@",
			"-a",
			"+b",
			"--- a/two.py",
			"+++ b/two.py",
			"@@ -3,2 +3,2 @@",
			" x",
			"-y",
			"+z",
		]);

		expect(hunks.map((hunk) => hunk.filename)).toEqual(["src/one.py", "two.py"]);
		expect(hunks[0].match).toEqual(["a"]);
		expect(hunks[1].match).toEqual(["x", "y"]);
		expect(hunks[1].replace).toEqual(["x", "z"]);
	});

	it("marks hunks of a /dev/null source as new-file hunks", () => {
		const hunks = extractHunks(["--- /dev/null", "+++ b/pkg/new.py", "@@ -0,0 +1,2 @@", "+a", "+b"]);

		expect(hunks).toHaveLength(1);
		expect(hunks[0].filename).toBe("pkg/new.py");
		expect(hunks[0].isNewFile).toBe(true);
		expect(hunks[0].match).toEqual([]);
		expect(hunks[0].replace).toEqual(["a", "b"]);
	});

	it("emits an empty new-file hunk for markers without a hunk", () => {
		const hunks = extractHunks(["--- /dev/null", "+++ b/empty.txt"]);

		expect(hunks).toHaveLength(1);
		expect(hunks[0].filename).toBe("empty.txt");
		expect(hunks[0].isNewFile).toBe(true);
		expect(hunks[0].empty()).toBe(true);
	});

	it("marks hunks with a /dev/null target as deletions", () => {
		const hunks = extractHunks(["--- a/old.txt", "+++ /dev/null", "@@ -1,2 +0,0 @@", "-a", "-b"]);

		expect(hunks[0].filename).toBe("old.txt");
		expect(hunks[0].isDeletedFile).toBe(true);
		expect(hunks[0].isNewFile).toBe(false);
	});

	it("keeps a removed line that starts with two dashes in the body", () => {
		const hunks = extractHunks(["@@ -1,2 +1,1 @@", "--- note", " select 1"]);

		expect(hunks).toHaveLength(1);
		expect(hunks[0].match).toEqual(["-- note", "select 1"]);
		expect(hunks[0].replace).toEqual(["select 1"]);
	});

	it("keeps a removed dashed line that ends a counted hunk", () => {
		const hunks = extractHunks(["@@ -1,2 +1,1 @@", " select 1;", "--- old note", "@@ -4,1 +3,1 @@", "-a", "+b"]);

		expect(hunks).toHaveLength(2);
		expect(hunks[0].match).toEqual(["select 1;", "-- old note"]);
		expect(hunks[0].replace).toEqual(["select 1;"]);
		expect(hunks[1].filename).toBeUndefined();
	});

	it("keeps an added line starting with ++ before the next hunk", () => {
		const hunks = extractHunks(["@@ -1,1 +1,2 @@", " for (;;) {", "+++i;", "@@ -5,1 +6,1 @@", "-x", "+y"]);

		expect(hunks).toHaveLength(2);
		expect(hunks[0].replace).toEqual(["for (;;) {", "++i;"]);
		expect(hunks[1].filename).toBeUndefined();
		expect(hunks[1].match).toEqual(["x"]);
	});

	it("keeps lone dashed and plussed lines in placeholder hunks", () => {
		const hunks = extractHunks(["@@ ... @@", " a", "--- b", " c", "+++ d", " e"]);

		expect(hunks).toHaveLength(1);
		expect(hunks[0].match).toEqual(["a", "-- b", "c", "e"]);
		expect(hunks[0].replace).toEqual(["a", "c", "++ d", "e"]);
	});

	it("closes a hunk at a git diff header", () => {
		const hunks = extractHunks([
			"diff --git a/x b/x",
			"--- a/x",
			"+++ b/x",
			"@@ -1 +1 @@",
			"-a",
			"+b",
			"diff --git a/y b/y",
			"index 1234567..89abcde 100644",
			"--- a/y",
			"+++ b/y",
			"@@ -1 +1 @@",
			"-c",
			"+d",
		]);

		expect(hunks).toHaveLength(2);
		expect(hunks[0].filename).toBe("x");
		expect(hunks[0].match).toEqual(["a"]);
		expect(hunks[0].replace).toEqual(["b"]);
		expect(hunks[1].filename).toBe("y");
		expect(hunks[1].match).toEqual(["c"]);
	});

	it("uses the --- path when the +++ marker is missing", () => {
		const hunks = extractHunks(["--- a/only.py", "@@ -1 +1 @@", "-a", "+b"]);
		expect(hunks[0].filename).toBe("only.py");
	});

	it("uses the +++ path when the --- marker is missing", () => {
		const hunks = extractHunks(["+++ b/t.py", "@@ -1 +1 @@", "-a", "+b"]);
		expect(hunks[0].filename).toBe("t.py");
		expect(hunks[0].isNewFile).toBe(false);
	});

	it("returns no hunks for text without headers", () => {
		expect(extractHunks(["hello", "world"])).toEqual([]);
	});
});

describe("parseMarkerPath", () => {
	it("strips a/ and b/ prefixes", () => {
		expect(parseMarkerPath("--- a/src/main.py")).toBe("src/main.py");
		expect(parseMarkerPath("+++ b/src/main.py")).toBe("src/main.py");
	});

	it("accepts paths without prefixes", () => {
		expect(parseMarkerPath("+++ src/main.py")).toBe("src/main.py");
	});

	it("drops a tab-separated timestamp", () => {
		expect(parseMarkerPath("--- a/x.py\t2024-01-01 00:00:00.000000000 +0000")).toBe("x.py");
	});

	it("keeps the null device as is", () => {
		expect(parseMarkerPath("--- /dev/null")).toBe("/dev/null");
	});

	it("returns undefined for a bare marker", () => {
		expect(parseMarkerPath("---")).toBeUndefined();
	});
});
