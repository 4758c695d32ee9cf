import winston from "winston";

const isProduction = process.env.NODE_ENV === "production";

// Metadata keys whose values never reach a transport
const SECRET_KEYS = new Set(["authorization", "secretkey", "secret", "on-nonce"]);

/** Masks credential-bearing metadata before formatting. */
export const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (SECRET_KEYS.has(key.toLowerCase())) {
      info[key] = "[redacted]";
    }
  }
  return info;
});

export const logger = winston.createLogger({
  level: process.env.SYNC_LOG_LEVEL || "info",
  silent: process.env.SYNC_LOG_SILENT === "true",
  format: isProduction
    ? winston.format.combine(
        redactSecrets(),
        winston.format.errors({ stack: true }),
        winston.format.timestamp(),
        winston.format.json()
      )
    : winston.format.combine(
        redactSecrets(),
        winston.format.timestamp({ format: "HH:mm:ss" }),
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, context, ...rest }) => {
          const ctx = context ? `[${String(context)}]` : "";
          const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : "";
          return `${String(timestamp)} ${level} ${ctx} ${String(message)}${extra}`;
        })
      ),
  transports: [new winston.transports.Console()],
});

/** Per-module logger; `context` shows up as `[context]` in development output. */
export function createChildLogger(context: string): winston.Logger {
  return logger.child({ context });
}
