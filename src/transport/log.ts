import axios from "axios";
import { getEnv } from "../utils/get-env";

export type Log = {
  content: string;
  group: string;
};

// stdout carries the results table, so log lines go to stderr.
export const log = async (data: Log) => {
  const ts = Date.now();

  console.error(`(${ts}) [${data.group}] ${data.content}`);

  const { TRANSPORT, LOGGER_URL, TOKEN } = getEnv();

  if (TRANSPORT !== "HTTP") return;

  if (!LOGGER_URL) return console.error("Logger not found");

  await axios
    .post(LOGGER_URL, {
      token: TOKEN,
      data: { ...data, timestamp: ts },
    })
    .catch((e) => console.error("Error while sending log entry", e));
};
