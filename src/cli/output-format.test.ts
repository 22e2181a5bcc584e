import { describe, it, expect, beforeEach } from "vitest";
import { resolveOutputFormat, resetOutputFormatCache } from "./output-format.js";

describe("resolveOutputFormat", () => {
  beforeEach(() => {
    resetOutputFormatCache();
  });

  it("defaults to terminal when OUTPUT_FORMAT is unset", () => {
    expect(resolveOutputFormat({})).toBe("terminal");
  });

  it("accepts json and markdown in any case", () => {
    expect(resolveOutputFormat({ OUTPUT_FORMAT: "Json" })).toBe("json");
    resetOutputFormatCache();
    expect(resolveOutputFormat({ OUTPUT_FORMAT: "MARKDOWN" })).toBe("markdown");
  });

  it("falls back to terminal for unknown formats", () => {
    expect(resolveOutputFormat({ OUTPUT_FORMAT: "csv" })).toBe("terminal");
  });

  it("keeps the first resolved format until reset", () => {
    resolveOutputFormat({ OUTPUT_FORMAT: "json" });

    expect(resolveOutputFormat({ OUTPUT_FORMAT: "markdown" })).toBe("json");
  });
});
