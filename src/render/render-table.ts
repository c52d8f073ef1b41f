import { max, padEnd, truncate } from "lodash";
import { getDisplayRow, getHeaders, type View } from "./get-display-row";
import type { RowRenderer, Write } from "./types";

const COLUMN_GAP = "  ";

// Widths of every column but the first. Cells are cut to fit; the last column is left as is.
const FIXED_WIDTHS = [10, 7, 7, 8, 20, 9];

type TableRendererOptions = {
  view: View;
  displayNames: readonly string[];
  write: Write;
};

/**
 * Writes an aligned text table one row at a time. The file column is sized
 * up front from the names that will be rendered, so rows can be flushed as
 * soon as each file has been probed.
 */
export const createTableRenderer = ({
  view,
  displayNames,
  write,
}: TableRendererOptions): RowRenderer => {
  const headers = getHeaders(view);
  const widths = [
    max([headers[0].length, ...displayNames.map((name) => name.length)]) ?? 0,
    ...FIXED_WIDTHS.slice(0, headers.length - 1),
  ];

  const formatLine = (cells: readonly string[]) =>
    cells
      .map((cell, index) =>
        index === cells.length - 1
          ? cell
          : padEnd(truncate(cell, { length: widths[index] }), widths[index])
      )
      .join(COLUMN_GAP);

  return {
    begin: () => {
      write(`${formatLine(headers)}\n`);
      write(`${formatLine(widths.map((width) => "-".repeat(width)))}\n`);
    },
    row: (record) => write(`${formatLine(getDisplayRow(record, view))}\n`),
  };
};
