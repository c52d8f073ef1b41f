import { execFile } from "node:child_process";
import { ProbeUnavailableError } from "./errors";
import type { ProbeResult, Prober } from "./types";

type ProberOptions = {
  ffprobePath?: string | null;
};

export const getResolutionArgs = (filePath: string) => [
  "-v",
  "error",
  "-select_streams",
  "v:0",
  "-show_entries",
  "stream=width,height",
  "-of",
  "csv=s=x:p=0",
  filePath,
];

// Only asks ffprobe for the first video stream's size, printed as WIDTHxHEIGHT.
export const createResolutionProber =
  ({ ffprobePath }: ProberOptions = {}): Prober =>
  (filePath) =>
    new Promise<ProbeResult>((resolve) => {
      execFile(
        ffprobePath || "ffprobe",
        getResolutionArgs(filePath),
        { encoding: "utf8" },
        (err, stdout) => {
          if (err) {
            return resolve({
              ok: false,
              error: new ProbeUnavailableError(filePath, err),
            });
          }

          resolve({ ok: true, output: { format: "CSV", text: stdout } });
        }
      );
    });
