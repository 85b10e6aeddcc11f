import { describe, expect, it } from "vitest";
import { annotateImage, formatFilename, parseDocTitle, parsePageNr } from "./filename-parser.js";

describe("filename-parser", () => {
  it("reads the page number in front of the image suffix", () => {
    expect(parsePageNr("HGB_1_001_002_007.jpg")).toBe(7);
    expect(parsePageNr("HGB_1_001_002_120.jpg")).toBe(120);
  });

  it("returns null when no page number is present", () => {
    expect(parsePageNr("noise.png")).toBeNull();
    expect(parsePageNr("HGB_1_001_002_07.jpg")).toBeNull();
    expect(parsePageNr("")).toBeNull();
  });

  it("reads the document title", () => {
    expect(parseDocTitle("HGB_1_001_002_007.jpg")).toBe("HGB_1_001_002");
    expect(parseDocTitle("scan-HGB_3_120_044_001.jpg")).toBe("HGB_3_120_044");
  });

  it("returns null for filenames without a document title", () => {
    expect(parseDocTitle("noise.png")).toBeNull();
    expect(parseDocTitle("HGB_12_001_002_007.jpg")).toBeNull();
  });

  it("formats filenames with zero-padded page numbers", () => {
    expect(formatFilename("HGB_1_001_002", 7)).toBe("HGB_1_001_002_007.jpg");
    expect(formatFilename("HGB_1_001_002", 42)).toBe("HGB_1_001_002_042.jpg");
  });

  it("propagates absent inputs instead of building a malformed name", () => {
    expect(formatFilename(null, 7)).toBeNull();
    expect(formatFilename("HGB_1_001_002", null)).toBeNull();
    expect(formatFilename(undefined, undefined)).toBeNull();
    expect(formatFilename("HGB_1_001_002", 2.5)).toBeNull();
  });

  it("parses back what it formats", () => {
    const title = "HGB_2_010_300";
    for (const page of [1, 9, 10, 99, 100, 999]) {
      const filename = formatFilename(title, page);
      expect(filename).not.toBeNull();
      expect(parseDocTitle(filename ?? "")).toBe(title);
      expect(parsePageNr(filename ?? "")).toBe(page);
    }
  });

  it("annotates image records", () => {
    expect(annotateImage("HGB_1_001_002_003.jpg")).toEqual({
      filename: "HGB_1_001_002_003.jpg",
      docTitle: "HGB_1_001_002",
      pageNr: 3,
    });
    expect(annotateImage("cover.png")).toEqual({
      filename: "cover.png",
      docTitle: null,
      pageNr: null,
    });
  });
});
