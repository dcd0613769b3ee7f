import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { formatInTimeZone } from "date-fns-tz";
import { parseTimestamp, probeCreationTimes, resolveTimestamp } from "./timestamp.js";

const FFPROBE_ARGS = [
  "-v",
  "quiet",
  "-print_format",
  "json",
  "-show_entries",
  "format_tags=creation_time:stream_tags=creation_time",
];

describe("parseTimestamp", () => {
  it("parses ffprobe's UTC form with microseconds", () => {
    expect(parseTimestamp("2025-08-20T18:23:45.000000Z")?.toISOString()).toBe(
      "2025-08-20T18:23:45.000Z"
    );
  });

  it("parses a trailing Z without fraction", () => {
    expect(parseTimestamp("2025-08-20T18:23:45Z")?.toISOString()).toBe("2025-08-20T18:23:45.000Z");
  });

  it("treats a space-separated value without offset as UTC", () => {
    expect(parseTimestamp("2025-08-20 18:23:45")?.toISOString()).toBe("2025-08-20T18:23:45.000Z");
  });

  it("applies an explicit offset", () => {
    expect(parseTimestamp("2025-08-20T11:23:45-07:00")?.toISOString()).toBe(
      "2025-08-20T18:23:45.000Z"
    );
    expect(parseTimestamp("2025-08-21T03:53:45+09:30")?.toISOString()).toBe(
      "2025-08-20T18:23:45.000Z"
    );
  });

  it("accepts a date on its own as midnight UTC", () => {
    expect(parseTimestamp("2025-08-20")?.toISOString()).toBe("2025-08-20T00:00:00.000Z");
  });

  it("trims surrounding whitespace", () => {
    expect(parseTimestamp("  2025-08-20T18:23:45Z \n")?.toISOString()).toBe(
      "2025-08-20T18:23:45.000Z"
    );
  });

  it("truncates fractions of any length to milliseconds", () => {
    expect(parseTimestamp("2025-08-20T18:23:45.12")?.toISOString()).toBe(
      "2025-08-20T18:23:45.120Z"
    );
    expect(parseTimestamp("2025-08-20T18:23:45.1234567")?.toISOString()).toBe(
      "2025-08-20T18:23:45.123Z"
    );
  });

  it("keeps the offset after a fraction of any length", () => {
    expect(parseTimestamp("2025-08-20T18:23:45.12Z")?.toISOString()).toBe(
      "2025-08-20T18:23:45.120Z"
    );
    expect(parseTimestamp("2025-08-20T18:23:45.1234567Z")?.toISOString()).toBe(
      "2025-08-20T18:23:45.123Z"
    );
    expect(parseTimestamp("2025-08-20T11:23:45.5-07:00")?.toISOString()).toBe(
      "2025-08-20T18:23:45.500Z"
    );
  });

  it("accepts offsets without a colon or without minutes", () => {
    expect(parseTimestamp("2025-08-20T18:23:45+0000")?.toISOString()).toBe(
      "2025-08-20T18:23:45.000Z"
    );
    expect(parseTimestamp("2025-08-20T11:23:45-0700")?.toISOString()).toBe(
      "2025-08-20T18:23:45.000Z"
    );
    expect(parseTimestamp("2025-08-20T23:23:45+05")?.toISOString()).toBe(
      "2025-08-20T18:23:45.000Z"
    );
  });

  it("accepts times without seconds or minutes", () => {
    expect(parseTimestamp("2025-08-20T18")?.toISOString()).toBe("2025-08-20T18:00:00.000Z");
    expect(parseTimestamp("2025-08-20T18:23")?.toISOString()).toBe("2025-08-20T18:23:00.000Z");
    expect(parseTimestamp("2025-08-20T182345")?.toISOString()).toBe("2025-08-20T18:23:45.000Z");
  });

  it("accepts offsets just under a day and rejects a full day or more", () => {
    expect(parseTimestamp("2025-08-20T18:23:45+23:59")?.toISOString()).toBe(
      "2025-08-19T18:24:45.000Z"
    );
    expect(parseTimestamp("2025-08-20T18:23:45+24:00")).toBeNull();
    expect(parseTimestamp("2025-08-20T18:23:45+25:00")).toBeNull();
    expect(parseTimestamp("2025-08-20T18:23:45-07:60")).toBeNull();
  });

  it("rejects calendar-invalid values", () => {
    expect(parseTimestamp("2025-02-30T10:00:00Z")).toBeNull();
    expect(parseTimestamp("2025-13-01T10:00:00Z")).toBeNull();
    expect(parseTimestamp("2025-08-20T24:00:00")).toBeNull();
  });

  it("returns null for text that is not a timestamp", () => {
    expect(parseTimestamp("")).toBeNull();
    expect(parseTimestamp("yesterday")).toBeNull();
    expect(parseTimestamp("2025:08:20 18:23:45")).toBeNull();
  });

  it("re-reads a Pacific wall-clock rendering as the same instant", () => {
    const instants = [
      new Date("2025-03-01T10:00:00Z"),
      new Date("2025-07-04T19:30:15Z"),
      new Date("2025-11-02T09:30:00Z"),
    ];
    for (const instant of instants) {
      const rendered = formatInTimeZone(instant, "America/Los_Angeles", "yyyy-MM-dd'T'HH:mm:ssXXX");
      expect(parseTimestamp(rendered)?.getTime()).toBe(instant.getTime());
    }
  });
});

describe("probeCreationTimes", () => {
  it("lists container time before stream times", async () => {
    const run = vi.fn(async () =>
      JSON.stringify({
        format: { tags: { creation_time: "2025-08-20T18:23:45.000000Z" } },
        streams: [
          { tags: { creation_time: "2025-08-20T18:23:44.000000Z" } },
          { tags: { language: "und" } },
          { index: 2 },
        ],
      })
    );

    const result = await probeCreationTimes("/videos/clip.mov", "ffprobe", run);

    expect(result).toEqual(["2025-08-20T18:23:45.000000Z", "2025-08-20T18:23:44.000000Z"]);
    expect(run).toHaveBeenCalledWith("ffprobe", [...FFPROBE_ARGS, "/videos/clip.mov"]);
  });

  it("returns no candidates when ffprobe fails", async () => {
    const run = vi.fn(async () => {
      throw new Error("spawn ffprobe ENOENT");
    });
    expect(await probeCreationTimes("/videos/clip.mov", "ffprobe", run)).toEqual([]);
  });

  it("returns no candidates for empty or malformed output", async () => {
    expect(await probeCreationTimes("/v/a.mov", "ffprobe", async () => "")).toEqual([]);
    expect(await probeCreationTimes("/v/a.mov", "ffprobe", async () => "not json")).toEqual([]);
    expect(await probeCreationTimes("/v/a.mov", "ffprobe", async () => "[1, 2]")).toEqual([]);
    expect(await probeCreationTimes("/v/a.mov", "ffprobe", async () => "{}")).toEqual([]);
  });
});

describe("resolveTimestamp", () => {
  let tempDir: string;
  let filePath: string;
  const mtime = new Date("2025-03-01T10:00:00Z");

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "rename-media-timestamp-test-"));
    filePath = path.join(tempDir, "clip.mov");
    await fs.writeFile(filePath, "test");
    await fs.utimes(filePath, mtime, mtime);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("prefers embedded creation time", async () => {
    const run = async () =>
      JSON.stringify({ format: { tags: { creation_time: "2025-08-20T18:23:45.000000Z" } } });

    const result = await resolveTimestamp(filePath, { run });

    expect(result.source).toBe("embedded-metadata");
    expect(result.instant.toISOString()).toBe("2025-08-20T18:23:45.000Z");
  });

  it("skips an unparseable container time in favour of a stream time", async () => {
    const run = async () =>
      JSON.stringify({
        format: { tags: { creation_time: "unknown" } },
        streams: [{ tags: { creation_time: "2025-08-20 18:23:45" } }],
      });

    const result = await resolveTimestamp(filePath, { run });

    expect(result.source).toBe("embedded-metadata");
    expect(result.instant.toISOString()).toBe("2025-08-20T18:23:45.000Z");
  });

  it("moves past a candidate whose offset is a day or more", async () => {
    const run = async () =>
      JSON.stringify({
        format: { tags: { creation_time: "2025-08-20T18:23:45+25:00" } },
        streams: [{ tags: { creation_time: "2025-08-20T18:23:44.000000Z" } }],
      });

    const result = await resolveTimestamp(filePath, { run });

    expect(result.source).toBe("embedded-metadata");
    expect(result.instant.toISOString()).toBe("2025-08-20T18:23:44.000Z");
  });

  it("falls back to modification time when ffprobe is unavailable", async () => {
    const run = async (): Promise<string> => {
      throw new Error("spawn ffprobe ENOENT");
    };

    const result = await resolveTimestamp(filePath, { run });

    expect(result.source).toBe("filesystem-mtime");
    expect(result.instant.getTime()).toBe(mtime.getTime());
  });

  it("falls back to modification time when no candidate parses", async () => {
    const run = async () => JSON.stringify({ format: { tags: { creation_time: "0000-00-00" } } });

    const result = await resolveTimestamp(filePath, { run });

    expect(result.source).toBe("filesystem-mtime");
    expect(result.instant.getTime()).toBe(mtime.getTime());
  });
});
