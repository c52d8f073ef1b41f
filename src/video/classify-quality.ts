import type { QualityTier, QualityTierTable } from "./types";

export const DEFAULT_QUALITY_TIERS: QualityTierTable = Object.freeze(
  (
    [
      { minWidth: 3840, tier: "4K" },
      { minWidth: 2560, tier: "2K" },
      { minWidth: 1920, tier: "FHD" },
      { minWidth: 1280, tier: "HD" },
      { minWidth: 0, tier: "SD" },
    ] as const
  ).map((row) => Object.freeze(row))
);

// First row in table order wins, so tables must be sorted by descending width.
export const classifyQuality = (
  width: number,
  qualityTiers: QualityTierTable = DEFAULT_QUALITY_TIERS
): QualityTier => {
  const match = qualityTiers.find(({ minWidth }) => width >= minWidth);

  return match ? match.tier : "Unknown";
};
