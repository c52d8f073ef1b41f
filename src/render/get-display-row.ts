import type { VideoRecord } from "../video/types";

export type View = "FULL" | "MINIMAL";

export const PLACEHOLDER = "-";

const MINIMAL_HEADERS: readonly string[] = Object.freeze([
  "File",
  "Resolution",
  "Quality",
]);
const FULL_HEADERS: readonly string[] = Object.freeze([
  ...MINIMAL_HEADERS,
  "FPS",
  "Codec",
  "Audio",
  "Subtitles",
]);

export const getHeaders = (view: View) =>
  view === "MINIMAL" ? MINIMAL_HEADERS : FULL_HEADERS;

const getResolution = ({ width, height }: VideoRecord) =>
  width !== null && height !== null ? `${width}x${height}` : PLACEHOLDER;

const joinTracks = (tracks: readonly string[]) =>
  tracks.length > 0 ? tracks.join(", ") : PLACEHOLDER;

export const getDisplayRow = (record: VideoRecord, view: View) => {
  const row = [record.displayName, getResolution(record), record.qualityTier];

  if (view === "MINIMAL") return row;

  return [
    ...row,
    record.frameRate ?? PLACEHOLDER,
    record.videoCodec ?? PLACEHOLDER,
    joinTracks(record.audioTracks),
    joinTracks(record.subtitleTracks),
  ];
};
