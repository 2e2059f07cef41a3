import { describe, expect, it } from "vitest";
import { UsageError } from "./errors.js";
import { parseOptions } from "./options.js";

describe("parseOptions", () => {
  it("uses defaults relative to the working directory", () => {
    expect(parseOptions([], "/repo")).toEqual({
      minCommits: 10,
      cwd: "/repo",
      outDir: "/repo/heatmaps",
      authors: [],
      year: undefined,
      save: false,
      help: false,
    });
  });

  it("collects repeated authors and scripted flags", () => {
    const options = parseOptions(
      ["--author", "a@x", "--author=b@x", "--year", "2023", "--save", "--min-commits", "3", "--cwd", "sub"],
      "/repo",
    );
    expect(options.authors).toEqual(["a@x", "b@x"]);
    expect(options.year).toBe(2023);
    expect(options.save).toBe(true);
    expect(options.minCommits).toBe(3);
    expect(options.cwd).toBe("/repo/sub");
    expect(options.outDir).toBe("/repo/sub/heatmaps");
  });

  it("accepts an explicit output directory", () => {
    expect(parseOptions(["--out-dir", "/tmp/maps"], "/repo").outDir).toBe("/tmp/maps");
  });

  it.each([
    [["--min-commits", "ten"], '--min-commits must be a non-negative integer, got "ten"'],
    [["--year", "23"], '--year must be a four-digit year, got "23"'],
    [["--colour"], "Unknown option: --colour"],
    [["extra"], "Unexpected argument: extra"],
  ])("rejects %j", (argv, message) => {
    expect(() => parseOptions(argv, "/repo")).toThrow(new UsageError(message));
  });
});
