export class ProbeUnavailableError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);

    super(`ffprobe failed for ${filePath}: ${reason}`, { cause });

    this.name = "ProbeUnavailableError";
    this.filePath = filePath;
  }
}
