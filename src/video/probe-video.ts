import FFmpeg, { type FfprobeData } from "fluent-ffmpeg";
import { ProbeUnavailableError } from "./errors";
import type { Prober } from "./types";

type ProberOptions = {
  ffprobePath?: string | null;
};

/**
 * Probes every stream of a file through fluent-ffmpeg. The parsed stream
 * list is returned untouched; interpreting it is left to the extractor.
 */
export const createVideoProber =
  ({ ffprobePath }: ProberOptions = {}): Prober =>
  async (filePath) => {
    const ffmpeg = FFmpeg();

    if (ffprobePath) ffmpeg.setFfprobePath(ffprobePath);

    try {
      const probeData = await new Promise<FfprobeData>((resolve, reject) =>
        ffmpeg.addInput(filePath).ffprobe((err, data) => {
          if (err) return reject(err);

          resolve(data);
        })
      );

      return { ok: true, output: { format: "JSON", data: probeData } };
    } catch (error) {
      return { ok: false, error: new ProbeUnavailableError(filePath, error) };
    }
  };
