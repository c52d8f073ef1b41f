import type { VideoRecord } from "../video/types";

export type RowRenderer = {
  begin: () => void;
  row: (record: VideoRecord) => void;
};

export type Write = (chunk: string) => void;
