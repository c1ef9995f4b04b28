import pino from "pino";
import pinoHttp from "pino-http";

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test" || !!process.env.VITEST;

const REDACTED_PATHS = [
  "contentBase64",
  "*.contentBase64",
  "req.headers.authorization",
  "req.headers.cookie",
  "req.headers['ocp-apim-subscription-key']",
  "apiKey",
  "*.apiKey",
];

export type LogComponent = "extraction" | "personal-data" | "document-intelligence" | "http";

export const logger = pino({
  level: process.env.LOG_LEVEL || (isProduction ? "info" : "debug"),
  transport:
    isProduction || isTest
      ? undefined
      : {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
  base: {
    service: "licencia-scan",
    env: process.env.NODE_ENV || "development",
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  redact: {
    paths: REDACTED_PATHS,
    censor: "[REDACTED]",
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export const httpLogger = pinoHttp({
  logger,
  // correlationIdMiddleware runs first and sets the accepted id on the response
  genReqId: (_req, res) => res.getHeader("x-correlation-id")?.toString() ?? "unknown",
  customLogLevel: (_req, res, err) => {
    if (res.statusCode >= 500 || err) return "error";
    if (res.statusCode >= 400) return "warn";
    return "info";
  },
  customSuccessMessage: (req, res) => {
    return `${req.method} ${req.url} ${res.statusCode}`;
  },
  customErrorMessage: (req, res, err) => {
    return `${req.method} ${req.url} ${res.statusCode} - ${err?.message || "Error"}`;
  },
  customProps: () => ({
    component: "http",
  }),
});

export const createContextLogger = (context: { component: LogComponent } & Record<string, unknown>) => {
  return logger.child(context);
};

export const extractionLogger = createContextLogger({ component: "extraction" });
export const personalDataLogger = createContextLogger({ component: "personal-data" });
export const documentIntelligenceLogger = createContextLogger({ component: "document-intelligence" });
