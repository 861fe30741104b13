import morgan from "morgan";
import chalk from "chalk";
import { logger } from "../utils/logger";

morgan.token("colored-method", (req) => {
  switch (req.method) {
    case "GET":
      return chalk.green(req.method);
    case "POST":
      return chalk.yellow(req.method);
    default:
      return chalk.white(req.method ?? "-");
  }
});

morgan.token("colored-status", (_req, res) => {
  const status = res.statusCode;
  if (status >= 500) return chalk.red(status);
  if (status >= 400) return chalk.yellow(status);
  if (status >= 300) return chalk.cyan(status);
  return chalk.green(status);
});

morgan.token("colored-url", (req) => chalk.cyan(req.url ?? "-"));

/**
 * Access log routed through winston so it shares level and transports
 * with the rest of the service.
 */
export const requestLogger = morgan(
  chalk.white("INCOMING_REQUEST: ") +
    chalk.white("method=") +
    ":colored-method" +
    chalk.white(", uri=") +
    ":colored-url" +
    chalk.white(", status=") +
    ":colored-status" +
    chalk.white(", response-time=") +
    chalk.magenta(":response-time ms") +
    chalk.white(", content-length=") +
    chalk.cyan(":res[content-length]"),
  {
    stream: { write: (line: string) => logger.info(line.trim()) },
  }
);
