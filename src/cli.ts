import * as path from "path";
import { parseArgs } from "util";
import { createJsonRenderer } from "./render/render-json";
import { createTableRenderer } from "./render/render-table";
import type { Write } from "./render/types";
import { getEnv } from "./utils/get-env";
import {
  createResolutionProber,
  createVideoProber,
  probeVideos,
  type Prober,
} from "./video";

export const USAGE = "Usage: video-quality-checker [--minimal] [--json] <file...>";

type CliDependencies = {
  prober?: Prober;
  write?: Write;
};

const readArgs = (argv: string[]) => {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        minimal: { type: "boolean", default: false },
        json: { type: "boolean", default: false },
      },
    });
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));

    return null;
  }
};

export const main = async (
  argv: string[],
  { prober, write = (chunk) => process.stdout.write(chunk) }: CliDependencies = {}
) => {
  const args = readArgs(argv);

  if (!args || args.positionals.length === 0) {
    console.error(USAGE);

    return 1;
  }

  const { FFPROBE_PATH } = getEnv();
  const filePaths = args.positionals;
  const minimal = args.values.minimal === true;

  const renderer = args.values.json
    ? createJsonRenderer({ write })
    : createTableRenderer({
        view: minimal ? "MINIMAL" : "FULL",
        displayNames: filePaths.map((filePath) => path.basename(filePath)),
        write,
      });

  renderer.begin();

  await probeVideos(filePaths, {
    prober:
      prober ??
      (minimal
        ? createResolutionProber({ ffprobePath: FFPROBE_PATH })
        : createVideoProber({ ffprobePath: FFPROBE_PATH })),
    onRecord: (record) => renderer.row(record),
  });

  return 0;
};
