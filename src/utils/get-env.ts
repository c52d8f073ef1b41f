export const getEnv = () => {
  const TRANSPORT: "HTTP" | "CONSOLE" =
    process.env.TRANSPORT === "HTTP" ? "HTTP" : "CONSOLE";
  const LOGGER_URL = process.env.LOGGER_URL || null;
  const TOKEN = process.env.TOKEN || null;

  const FFPROBE_PATH = process.env.FFPROBE_PATH || null;

  return {
    TOKEN,
    TRANSPORT,
    LOGGER_URL,
    FFPROBE_PATH,
  };
};
