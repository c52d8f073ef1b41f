import * as path from "path";
import { log } from "../transport/log";
import { extractVideoRecord } from "./extract-video-record";
import type { Prober, QualityTierTable, VideoRecord } from "./types";

export { DEFAULT_QUALITY_TIERS, classifyQuality } from "./classify-quality";
export { extractVideoRecord } from "./extract-video-record";
export { getFrameRate } from "./get-frame-rate";
export { createResolutionProber } from "./probe-resolution";
export { createVideoProber } from "./probe-video";
export { ProbeUnavailableError } from "./errors";
export type * from "./types";

type ProbeVideosOptions = {
  prober: Prober;
  qualityTiers?: QualityTierTable;
  onRecord?: (record: VideoRecord, index: number) => void;
};

/**
 * Probes and classifies each file one at a time, in the order given. A file
 * that cannot be probed still produces a record, and the batch carries on.
 */
export const probeVideos = async (
  filePaths: readonly string[],
  { prober, qualityTiers, onRecord }: ProbeVideosOptions
) => {
  const records: VideoRecord[] = [];

  for (const [index, filePath] of filePaths.entries()) {
    const result = await prober(filePath);
    const record = extractVideoRecord(
      path.basename(filePath),
      result,
      qualityTiers
    );

    if (!result.ok) {
      await log({ content: result.error.message, group: "PROBE" });
    } else if (record.width === null) {
      await log({
        content: `No video resolution found for ${filePath}`,
        group: "PROBE",
      });
    }

    onRecord?.(record, index);
    records.push(record);
  }

  return records;
};
