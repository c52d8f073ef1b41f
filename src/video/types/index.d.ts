import type { ProbeUnavailableError } from "../errors";

export type QualityTier = "4K" | "2K" | "FHD" | "HD" | "SD" | "Unknown";

export type QualityTierTable = ReadonlyArray<{
  readonly minWidth: number;
  readonly tier: Exclude<QualityTier, "Unknown">;
}>;

export type VideoRecord = {
  readonly displayName: string;

  readonly width: number | null;
  readonly height: number | null;
  readonly frameRate: string | null;
  readonly videoCodec: string | null;

  readonly audioTracks: readonly string[];
  readonly subtitleTracks: readonly string[];

  readonly qualityTier: QualityTier;
};

export type ProbeOutput =
  | { format: "JSON"; data: unknown }
  | { format: "CSV"; text: string };

export type ProbeResult =
  | { ok: true; output: ProbeOutput }
  | { ok: false; error: ProbeUnavailableError };

export type Prober = (filePath: string) => Promise<ProbeResult>;
