import { describe, it, expect } from "vitest";
import { bucketByInterval, formatIntervalKey, intervalKey, sortedBuckets } from "./intervals.js";
import { reading } from "./test-helpers.js";

describe("intervalKey", () => {
  it("truncates the time of day to the granularity", () => {
    expect(intervalKey({ time: "08:14:59" })).toBe(480);
    expect(intervalKey({ time: "08:15:00" })).toBe(495);
    expect(intervalKey({ time: "08:44:00" }, 30)).toBe(510);
  });

  it("formats keys as times", () => {
    expect(formatIntervalKey(495)).toBe("08:15:00");
    expect(formatIntervalKey(0)).toBe("00:00:00");
  });
});

describe("bucketByInterval", () => {
  it("applies the asymmetric min/max update", () => {
    const buckets = bucketByInterval([
      reading("2024-03-10 08:00:00", 5),
      reading("2024-03-10 08:05:00", 7),
      reading("2024-03-10 08:10:00", 3),
    ]);

    expect(buckets.get(480)).toEqual({ key: 480, minValue: 7, maxValue: 3, count: 3 });
  });

  it("aligns readings from different days on the same interval", () => {
    const buckets = bucketByInterval([
      reading("2024-03-10 13:20:00", 6),
      reading("2024-03-11 13:25:00", 9),
    ]);

    expect(buckets.size).toBe(1);
    expect(buckets.get(795)?.count).toBe(2);
  });

  it("does not depend on input order", () => {
    const readings = [
      reading("2024-03-10 08:00:00", 5),
      reading("2024-03-10 08:05:00", 7),
      reading("2024-03-11 08:10:00", 3),
      reading("2024-03-11 09:00:00", 8),
      reading("2024-03-12 09:01:00", 4),
    ];

    const forward = sortedBuckets(bucketByInterval(readings));
    const reversed = sortedBuckets(bucketByInterval([...readings].reverse()));
    const shuffled = sortedBuckets(
      bucketByInterval([readings[3], readings[0], readings[4], readings[2], readings[1]])
    );

    expect(reversed).toEqual(forward);
    expect(shuffled).toEqual(forward);
  });

  it("rejects invalid granularity", () => {
    expect(() => bucketByInterval([], 0)).toThrow("Invalid bucket granularity: 0");
  });
});

describe("sortedBuckets", () => {
  it("orders buckets by key", () => {
    const buckets = bucketByInterval([
      reading("2024-03-10 22:00:00", 5),
      reading("2024-03-10 01:00:00", 6),
      reading("2024-03-10 12:00:00", 7),
    ]);

    expect(sortedBuckets(buckets).map((b) => b.key)).toEqual([60, 720, 1320]);
  });
});
