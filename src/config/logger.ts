import pino from "pino";

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? "silent" : isProduction ? "info" : "debug"),
  transport:
    !isProduction && !isTest
      ? { target: "pino-pretty", options: { colorize: true } }
      : undefined,
  base: { service: "lead-scoring" },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
    req: pino.stdSerializers.req,
    res: pino.stdSerializers.res,
  },
});

export function createChildLogger(module: string) {
  return logger.child({ module });
}

export type Logger = ReturnType<typeof createChildLogger>;
