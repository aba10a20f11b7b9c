import * as winston from "winston";
import { config } from "../config";

const logFormat = winston.format.printf(
  info =>
    `${info.timestamp} ${info.level} [${formatModule(info.metadata)}]: ${info.message} ${
      hasMetadata(info.metadata)
        ? JSON.stringify(info.metadata, jsonReplacer)
        : ""
    }`,
);

function formatModule(metadata: unknown): string {
  if (!metadata || typeof metadata !== "object") return "";
  const module = "module" in metadata ? String(metadata.module) : "";
  const method = "method" in metadata ? String(metadata.method) : "";
  return method ? `${module}:${method}` : module;
}

function hasMetadata(metadata: unknown): boolean {
  return (
    !!metadata &&
    typeof metadata === "object" &&
    Object.keys(metadata).some(k => k !== "module" && k !== "method")
  );
}

function jsonReplacer(_key: string, value: unknown) {
  if (value instanceof Error) {
    return {
      ...value,
      name: value.name,
      message: value.message,
      stack: value.stack,
      cause: value.cause,
    };
  }
  return value;
}

export const logger = winston.createLogger({
  level: config.LOGGING_LEVEL?.toLowerCase() ?? "info",
  format: winston.format.json({ replacer: jsonReplacer }),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
        winston.format.metadata({
          fillExcept: ["message", "level", "timestamp"],
        }),
        ...(config.IS_PRODUCTION || config.ENV === "production"
          ? [winston.format.json({ replacer: jsonReplacer })]
          : [winston.format.colorize(), logFormat]),
      ),
    }),
  ],
});
