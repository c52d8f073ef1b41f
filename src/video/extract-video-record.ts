import { z } from "zod";
import { classifyQuality, DEFAULT_QUALITY_TIERS } from "./classify-quality";
import { getFrameRate } from "./get-frame-rate";
import type {
  ProbeOutput,
  ProbeResult,
  QualityTierTable,
  VideoRecord,
} from "./types";

// fluent-ffmpeg hands numbers back as numbers, but "N/A" and friends stay strings.
const dimension = z
  .union([
    z.number().int().nonnegative(),
    z.string().regex(/^\d+$/).transform(Number),
  ])
  .nullish()
  .catch(null);

const label = z.string().min(1).nullish().catch(null);

const StreamSchema = z.object({
  codec_type: label,
  codec_name: label,
  width: dimension,
  height: dimension,
  avg_frame_rate: label,
  tags: z
    .record(z.union([z.string(), z.number()]))
    .nullish()
    .catch(null),
});

const ProbeDataSchema = z.object({
  streams: z.array(z.unknown()),
});

type Stream = z.infer<typeof StreamSchema>;

type StreamMetadata = Omit<VideoRecord, "displayName" | "qualityTier">;

const EMPTY_METADATA: StreamMetadata = {
  width: null,
  height: null,
  frameRate: null,
  videoCodec: null,
  audioTracks: [],
  subtitleTracks: [],
};

const getLanguage = (stream: Stream) => {
  const language = stream.tags?.language || stream.tags?.lang;

  return language ? String(language) : "und";
};

const formatTrackLabel = (stream: Stream) => {
  const language = getLanguage(stream);

  return stream.codec_name ? `${language} (${stream.codec_name})` : language;
};

const readStreams = (data: unknown): StreamMetadata | null => {
  const probeData = ProbeDataSchema.safeParse(data);

  if (!probeData.success) return null;

  const streams = probeData.data.streams
    .map((stream) => StreamSchema.safeParse(stream))
    .flatMap((parsed) => (parsed.success ? [parsed.data] : []));

  const video = streams.find((stream) => stream.codec_type === "video");

  return {
    width: video?.width ?? null,
    height: video?.height ?? null,
    frameRate: getFrameRate(video?.avg_frame_rate),
    videoCodec: video?.codec_name ?? null,
    audioTracks: streams
      .filter((stream) => stream.codec_type === "audio")
      .map(formatTrackLabel),
    subtitleTracks: streams
      .filter((stream) => stream.codec_type === "subtitle")
      .map(formatTrackLabel),
  };
};

const RESOLUTION_PATTERN = /^(\d+)x(\d+)$/;

const readResolution = (text: string): StreamMetadata | null => {
  const line = text
    .split(/\r?\n/)
    .map((entry) => entry.trim())
    .find((entry) => entry.length > 0);

  const match = line ? RESOLUTION_PATTERN.exec(line) : null;

  if (!match) return null;

  return {
    ...EMPTY_METADATA,
    width: parseInt(match[1], 10),
    height: parseInt(match[2], 10),
  };
};

const readOutput = (output: ProbeOutput) => {
  if (output.format === "CSV") return readResolution(output.text);

  return readStreams(output.data);
};

export const extractVideoRecord = (
  displayName: string,
  result: ProbeResult,
  qualityTiers: QualityTierTable = DEFAULT_QUALITY_TIERS
): VideoRecord => {
  const metadata = (result.ok && readOutput(result.output)) || EMPTY_METADATA;

  return {
    displayName,
    ...metadata,
    qualityTier:
      metadata.width === null
        ? "Unknown"
        : classifyQuality(metadata.width, qualityTiers),
  };
};
