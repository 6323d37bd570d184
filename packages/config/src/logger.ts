import { createNodeLogger, type Logger, resolveLogLevel } from "@panelstats/logger";

export const log: Logger = createNodeLogger({
  service: "config",
  level: resolveLogLevel(process.env.LOG_LEVEL),
  environment: process.env.PANELSTATS_ENV ?? process.env.NODE_ENV ?? "development",
  pretty: process.env.NODE_ENV === "development",
});
