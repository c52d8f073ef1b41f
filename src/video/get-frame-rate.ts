const RATIONAL_PATTERN = /^(\d+)\/(\d+)$/;

/**
 * Turns an ffprobe rational such as `24000/1001` into a short decimal
 * string (`23.976`). Returns null for `0/0` and anything that is not two
 * integers separated by a slash.
 */
export const getFrameRate = (rational: string | null | undefined) => {
  if (!rational) return null;

  const match = RATIONAL_PATTERN.exec(rational.trim());

  if (!match) return null;

  const numerator = parseInt(match[1], 10);
  const denominator = parseInt(match[2], 10);

  if (denominator === 0) return null;

  return (numerator / denominator)
    .toFixed(3)
    .replace(/0+$/, "")
    .replace(/\.$/, "");
};
