import { describe, expect, it } from "vitest";
import type { VideoRecord } from "../video/types";
import { getDisplayRow, getHeaders } from "./get-display-row";

const record: VideoRecord = {
  displayName: "movie.mkv",
  width: 1920,
  height: 800,
  frameRate: "23.976",
  videoCodec: "h264",
  audioTracks: ["eng (aac)", "jpn (flac)"],
  subtitleTracks: ["eng (subrip)"],
  qualityTier: "FHD",
};

const failed: VideoRecord = {
  displayName: "broken.mkv",
  width: null,
  height: null,
  frameRate: null,
  videoCodec: null,
  audioTracks: [],
  subtitleTracks: [],
  qualityTier: "Unknown",
};

describe("getDisplayRow", () => {
  it("renders the minimal columns", () => {
    expect(getHeaders("MINIMAL")).toEqual(["File", "Resolution", "Quality"]);
    expect(getDisplayRow(record, "MINIMAL")).toEqual([
      "movie.mkv",
      "1920x800",
      "FHD",
    ]);
  });

  it("renders every field in the full view", () => {
    expect(getHeaders("FULL")).toEqual([
      "File",
      "Resolution",
      "Quality",
      "FPS",
      "Codec",
      "Audio",
      "Subtitles",
    ]);
    expect(getDisplayRow(record, "FULL")).toEqual([
      "movie.mkv",
      "1920x800",
      "FHD",
      "23.976",
      "h264",
      "eng (aac), jpn (flac)",
      "eng (subrip)",
    ]);
  });

  it("hands out headers that cannot be changed", () => {
    expect(Object.isFrozen(getHeaders("MINIMAL"))).toBe(true);
    expect(Object.isFrozen(getHeaders("FULL"))).toBe(true);
  });

  it("uses one placeholder for every absent value", () => {
    expect(getDisplayRow(failed, "FULL")).toEqual([
      "broken.mkv",
      "-",
      "Unknown",
      "-",
      "-",
      "-",
      "-",
    ]);
  });

  it("needs both dimensions to show a resolution", () => {
    expect(getDisplayRow({ ...record, height: null }, "MINIMAL")[1]).toBe("-");
  });
});
