import path from "path";
import winston from "winston";
import { loadConfig } from "../configs/environment";

const config = loadConfig();

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp(),
  winston.format.splat(),
  winston.format.printf(({ timestamp, level, message, stack }) =>
    stack
      ? `[${timestamp}] ${level}: ${message}\n${stack}`
      : `[${timestamp}] ${level}: ${message}`
  )
);

const transports: winston.transport[] = [
  new winston.transports.Console({ format: consoleFormat }),
];

if (config.logging.enableFile) {
  transports.push(
    new winston.transports.File({
      filename: path.resolve("logs", "gameplan.log"),
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
    })
  );
}

export const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.nodeEnv === "test",
  format: winston.format.errors({ stack: true }),
  transports,
});
