import { describe, expect, it } from "vitest";
import { parseFrequency } from "../src/index";

describe("parseFrequency", () => {
  it("converts hourly intervals into doses per day", () => {
    expect(parseFrequency("q6h")).toBe(4);
    expect(parseFrequency("q8h")).toBe(3);
    expect(parseFrequency("q12h")).toBe(2);
  });

  it("treats od and q24h as once daily", () => {
    expect(parseFrequency("od")).toBe(1);
    expect(parseFrequency("q24h")).toBe(1);
  });

  it("reads the count after the times-per-day prefix", () => {
    expect(parseFrequency("günde3")).toBe(3);
    expect(parseFrequency("günde 3")).toBe(3);
    expect(parseFrequency("Günde 2 kez")).toBe(2);
    expect(parseFrequency("gunde 4")).toBe(4);
  });

  it("ignores case and surrounding whitespace", () => {
    expect(parseFrequency("  Q6H ")).toBe(4);
    expect(parseFrequency("q 8 h")).toBe(3);
    expect(parseFrequency("OD")).toBe(1);
  });

  it("keeps fractional doses per day for long intervals", () => {
    const dosesPerDay = parseFrequency("q18h");
    expect(dosesPerDay).toBeCloseTo(4 / 3, 10);
  });

  it("rejects zero counts and zero-hour intervals", () => {
    expect(parseFrequency("q0h")).toBeUndefined();
    expect(parseFrequency("günde 0")).toBeUndefined();
    expect(parseFrequency("günde")).toBeUndefined();
  });

  it("returns undefined for unknown codes", () => {
    expect(parseFrequency("bid")).toBeUndefined();
    expect(parseFrequency("q6")).toBeUndefined();
    expect(parseFrequency("q1.5h")).toBeUndefined();
    expect(parseFrequency("")).toBeUndefined();
  });

  it("accepts caller-supplied frequency tokens", () => {
    expect(parseFrequency("BID", { freqMap: { bid: 2 } })).toBe(2);
    expect(parseFrequency("t i d", { freqMap: { tid: 3 } })).toBe(3);
    expect(parseFrequency("qid", { freqMap: { qid: 0 } })).toBeUndefined();
  });

  it("lets built-in forms win over the custom map", () => {
    expect(parseFrequency("od", { freqMap: { od: 2 } })).toBe(1);
  });
});
