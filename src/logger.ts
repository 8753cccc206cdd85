import pino from "pino";

const REDACT_PATHS = [
  "authorization",
  "token",
  "secret",
  "password",
  "apiKey",
  "BOT_TOKEN",
  "env.BOT_TOKEN",
  "headers.authorization",
  "req.headers.authorization"
];

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: undefined,
  redact: {
    paths: REDACT_PATHS,
    censor: "[redacted]"
  }
});
