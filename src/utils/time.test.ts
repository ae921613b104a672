import { DurationFormatError } from "../errors";
import { formatDuration, parseDuration, secondsToMs } from "./time";

describe("parseDuration", () => {
  it.each([
    ["1:12:13.123", 4_333_123],
    ["1:12", 72_000],
    ["12", 12_000],
    ["12.34567", 12_346],
    ["00:00:00", 0],
    ["100:00:00", 360_000_000],
  ])("parses %s", (input, expected) => {
    expect(parseDuration(input)).toBe(expected);
  });

  it("treats empty input as zero", () => {
    expect(parseDuration("")).toBe(0);
    expect(parseDuration(undefined)).toBe(0);
    expect(parseDuration(null)).toBe(0);
  });

  it.each(["1:1:12:13", "1:12:13,123", "1:a:13", "a", "1:12.", "-5"])("rejects %s", (input) => {
    expect(() => parseDuration(input)).toThrow(DurationFormatError);
  });
});

describe("formatDuration", () => {
  it("writes hours, minutes and seconds", () => {
    expect(formatDuration(3_661_000)).toBe("01:01:01");
    expect(formatDuration(0)).toBe("00:00:00");
  });

  it("adds milliseconds on request", () => {
    expect(formatDuration(4_333_123, { millis: true })).toBe("01:12:13.123");
    expect(formatDuration(5_007, { millis: true })).toBe("00:00:05.007");
  });

  it("reads back what it writes", () => {
    expect(parseDuration(formatDuration(4_333_123, { millis: true }))).toBe(4_333_123);
  });
});

describe("secondsToMs", () => {
  it("rounds to whole milliseconds", () => {
    expect(secondsToMs("12.3456")).toBe(12_346);
    expect(secondsToMs(1.5)).toBe(1_500);
  });

  it("ignores missing or invalid values", () => {
    expect(secondsToMs(undefined)).toBeUndefined();
    expect(secondsToMs("N/A")).toBeUndefined();
    expect(secondsToMs(-1)).toBeUndefined();
  });
});
