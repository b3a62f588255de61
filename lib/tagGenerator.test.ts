import { describe, it, expect } from "vitest";
import { TAG_ALPHABET, generateReportTag, isReportTag, normalizeTag } from "./tagGenerator";

describe("generateReportTag", () => {
  it("produces four characters from the tag alphabet", () => {
    for (let i = 0; i < 200; i++) {
      expect(generateReportTag()).toMatch(/^[0-9A-Z]{4}$/);
    }
  });

  it("maps each pick onto the alphabet", () => {
    const picks = [0, 10, 35, 1];
    let call = 0;
    const tag = generateReportTag((upperBound) => {
      expect(upperBound).toBe(TAG_ALPHABET.length);
      return picks[call++];
    });
    expect(tag).toBe("0AZ1");
  });
});

describe("normalizeTag", () => {
  it("trims and upper-cases user input", () => {
    expect(normalizeTag("  ab1z ")).toBe("AB1Z");
  });
});

describe("isReportTag", () => {
  it("accepts only four upper-case alphanumerics", () => {
    expect(isReportTag("AB1Z")).toBe(true);
    expect(isReportTag("ab1z")).toBe(false);
    expect(isReportTag("ABCDE")).toBe(false);
    expect(isReportTag("AB-1")).toBe(false);
  });
});
