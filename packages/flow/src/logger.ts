import { appendFileSync } from "node:fs";
import {
  loadLoggerConfig,
  loggerConfigSchema,
  parseOptions,
  type LogLevel,
  type PipePolicy,
} from "./config";

export type FlowEvent =
  | { type: "node-entered"; chart: string; node: string; at: Date }
  | { type: "exit-chart"; chart: string; node: string; at: Date }
  | { type: "exit-flow"; chart: string; node: string; at: Date }
  | {
      type: "node-error";
      chart: string;
      node: string;
      at: Date;
      error: Error;
    }
  | {
      type: "pipe-start";
      pipe: string;
      policy: PipePolicy;
      count: number;
      at: Date;
    }
  | {
      type: "pipe-complete";
      pipe: string;
      policy: PipePolicy;
      failed: number;
      duration: number;
      at: Date;
    };

export interface FlowLogger {
  log(event: FlowEvent): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function eventLevel(event: FlowEvent): Exclude<LogLevel, "silent"> {
  switch (event.type) {
    case "node-error":
      return "error";
    case "node-entered":
      return "debug";
    default:
      return "info";
  }
}

export function formatEvent(event: FlowEvent): string {
  const at = event.at.toISOString();
  switch (event.type) {
    case "node-entered":
      return `${at} [${event.chart}] ${event.node} entered`;
    case "exit-chart":
      return `${at} [${event.chart}] ${event.node} ended chart`;
    case "exit-flow":
      return `${at} [${event.chart}] ${event.node} ended flow`;
    case "node-error":
      return `${at} [${event.chart}] error on step '${event.node}': ${event.error.message}`;
    case "pipe-start":
      return `${at} [Pipe ${event.pipe}] ${event.policy} run over ${event.count} state(s)`;
    case "pipe-complete":
      return `${at} [Pipe ${event.pipe}] finished ${event.policy} run in ${event.duration.toFixed(1)}ms (${event.failed} failed)`;
  }
}

/**
 * Build a logger that drops events below `level` and writes one line per
 * event to the console or appends it to `destination`. Without a config the
 * level and destination come from `FLOWLINE_LOG_LEVEL` and `FLOWLINE_LOG_FILE`.
 *
 * @example
 * const logger = createLogger({ level: "info", destination: "./flow.log" });
 * const chart = new Chart<State>({ name: "Reduce", logger });
 */
export function createLogger(config?: {
  level?: LogLevel;
  destination?: string;
}): FlowLogger {
  const { level, destination } = config
    ? parseOptions(loggerConfigSchema, config, "logger")
    : loadLoggerConfig();
  const threshold = LEVEL_RANK[level];

  return {
    log(event) {
      const severity = eventLevel(event);
      if (LEVEL_RANK[severity] < threshold) return;

      const line = formatEvent(event);
      if (destination !== "console") {
        appendFileSync(destination, line + "\n", "utf-8");
        return;
      }
      if (severity === "error") {
        console.error(line);
        if (event.type === "node-error" && event.error.stack) {
          console.error(event.error.stack);
        }
      } else {
        console.log(line);
      }
    },
  };
}

/** Logger that discards everything. */
export const silentLogger: FlowLogger = { log: () => {} };
