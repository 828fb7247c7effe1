import pino, { type LevelWithSilent } from "pino";

const isTestEnv =
  process.env.NODE_ENV === "test" || Boolean(process.env.VITEST);
const isProd = process.env.NODE_ENV === "production";
const isCI = Boolean(process.env.CI);

const LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

const envLogLevel = process.env.LOG_LEVEL?.toLowerCase();
const resolvedLevel: LevelWithSilent =
  envLogLevel && isLevel(envLogLevel)
    ? envLogLevel
    : isTestEnv
      ? "silent"
      : "info";

// pino-pretty runs in a worker thread; keep it to interactive local runs
const usePrettyPrint = !isProd && !isTestEnv && !isCI;

export const logger = pino({
  level: resolvedLevel,
  serializers: {
    error: pino.stdSerializers.err,
  },
  ...(usePrettyPrint
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname,time,level",
            messageFormat: "[{level}]:{msg}",
          },
        },
      }
    : {}),
  formatters: {
    level: (label: string) => {
      return { level: label.toUpperCase() };
    },
  },
});
