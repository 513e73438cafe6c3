import path from "path";
import pino from "pino";
import { LogData, Logger } from "./types";

type LogArgs<T> = [LogData<T>] | [Partial<LogData<T>>, string] | [string];

const SERVICE_NAME = "status-pipeline";
const PROJECT_ROOT = process.cwd();
const NODE_ENV = process.env.NODE_ENV ?? "development";
const isProduction = NODE_ENV === "production";
const isTest = NODE_ENV === "test";

const defaultLevel = (): string => {
  if (isTest) return "silent";
  return isProduction ? "info" : "debug";
};

// pino-pretty runs in a worker thread; keep it out of production and test runs
const transport =
  NODE_ENV === "development"
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          messageFormat: "{file} {type} {msg}",
          customColors: "info:blue,warn:yellow,error:red,debug:magenta",
          levelFirst: true,
        },
      }
    : undefined;

const pinoLogger = pino({
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  base: {
    service: SERVICE_NAME,
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport,
});

const resolveCallerFile = (): string | undefined => {
  // Stack parsing is too costly for production hot paths
  if (isProduction) {
    return undefined;
  }

  const stack = new Error().stack?.split("\n").slice(4);
  if (!stack) return undefined;

  for (const line of stack) {
    const match = line.match(/\((.*):\d+:\d+\)/) ?? line.match(/at (.*):\d+:\d+/);
    const filePath = match?.[1];
    if (filePath && !filePath.includes("node_modules") && !filePath.includes(`logger${path.sep}`)) {
      return path.relative(PROJECT_ROOT, filePath).replace(/\\/g, "/");
    }
  }

  return undefined;
};

const normalizeLogInput = <T>(args: LogArgs<T>): LogData<T> => {
  const [first] = args;
  if (typeof first === "string") {
    return { type: "GENERAL", message: first };
  }

  if (args.length === 2) {
    const [partial, message] = args;
    return {
      ...partial,
      type: partial.type ?? "GENERAL",
      message,
    };
  }

  return {
    ...first,
    type: first.type ?? "GENERAL",
    message: first.message ?? "Log",
  };
};

const formatLogData = <T>({ message, error, type, payload, file, ...context }: LogData<T>) => {
  const resolvedFile = file ?? resolveCallerFile();

  return {
    ...context,
    msg: message,
    type: `[${type ?? "GENERAL"}]`,
    file: resolvedFile ? `[${resolvedFile}]` : "",
    payload,
    err: error,
  };
};

const logWithLevel = <T>(level: "debug" | "info" | "warn" | "error", ...args: LogArgs<T>) => {
  const structured = normalizeLogInput<T>(args);
  pinoLogger[level](formatLogData(structured));
};

const AppLogger: Logger = {
  debug: <T>(...args: LogArgs<T>) => logWithLevel<T>("debug", ...args),
  info: <T>(...args: LogArgs<T>) => logWithLevel<T>("info", ...args),
  warn: <T>(...args: LogArgs<T>) => logWithLevel<T>("warn", ...args),
  error: <T>(...args: LogArgs<T>) => logWithLevel<T>("error", ...args),
};

export default (): Logger => AppLogger;
export { pinoLogger };
