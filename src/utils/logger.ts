import winston from "winston";

const jsonFile = winston.format.combine(
  winston.format.uncolorize(),
  winston.format.timestamp(),
  winston.format.json()
);

// Trade journal keeps paper fills, settlements and manual closes only
const paperTradesOnly = winston.format((info) =>
  typeof info.message === "string" && info.message.startsWith("[PAPER]") ? info : false
);

export function createLogger(level: string = "info", logDir: string = "logs") {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
      winston.format.errors({ stack: true }),
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
        return `${timestamp} [${level}]: ${message}${metaStr}`;
      })
    ),
    transports: [
      new winston.transports.Console(),
      new winston.transports.File({ filename: `${logDir}/bot.log`, format: jsonFile }),
      new winston.transports.File({
        filename: `${logDir}/trades.log`,
        format: winston.format.combine(paperTradesOnly(), jsonFile),
      }),
    ],
  });
}

/** A logger that drops everything; used by tests */
export function createSilentLogger() {
  return winston.createLogger({ silent: true });
}

export type Logger = winston.Logger;
