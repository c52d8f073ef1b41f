import type { RowRenderer, Write } from "./types";

// One JSON document per line, absent values kept as null.
export const createJsonRenderer = ({ write }: { write: Write }): RowRenderer => ({
  begin: () => {},
  row: (record) => write(`${JSON.stringify(record)}\n`),
});
