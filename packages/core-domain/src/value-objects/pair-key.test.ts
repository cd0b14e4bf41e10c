import { describe, it, expect } from "vitest";
import { createPairKey } from "./pair-key";

describe("createPairKey", () => {
  it("joins both file names with a pipe", () => {
    expect(
      createPairKey("/in/summaries/a-summary.pdf", "/in/transcripts/a-transcript.pdf")
    ).toBe("a-summary.pdf|a-transcript.pdf");
  });

  it("ignores the directories the files live in", () => {
    const before = createPairKey("/old/s/x.pdf", "/old/t/y.pdf");
    const after = createPairKey("/new/place/x.pdf", "C:\\drive\\y.pdf");
    expect(after).toBe(before);
  });
});
