export * from "./utils";
export { Node, Start, End, START, END, type NodeConfig } from "./node";
export { Decision, type DecisionConfig } from "./decision";
export { Chart, defaultRegistry, type ChartConfig } from "./chart";
export { Pipe, type PipeConfig, type PipeState } from "./pipe";
export {
  NodeRegistry,
  createRegistry,
  type NodeSpec,
  type NodeSpecs,
  type NodeFactory,
} from "./registry";
export {
  FlowError,
  LinkError,
  BuildError,
  BranchError,
  StepLimitError,
  ConfigError,
} from "./errors";
export {
  createLogger,
  formatEvent,
  silentLogger,
  type FlowEvent,
  type FlowLogger,
} from "./logger";
export {
  loadLoggerConfig,
  PIPE_POLICIES,
  type LogLevel,
  type LoggerConfig,
  type PipePolicy,
  type Structure,
  type Step,
} from "./config";
export { renderDot, drawChart } from "./render";
export {
  serializeChart,
  restoreChart,
  saveChart,
  loadChart,
  type ChartDocument,
  type NodeDocument,
  type RestoreOptions,
} from "./persist";
export { mapConcurrent } from "./pool";
export { FlowSignal, exitChart, exitFlow, toOutcome } from "./types";
export type {
  FlowNode,
  NodeOwner,
  NodeStatus,
  NodeVisual,
  Outcome,
  OutcomeKind,
  Action,
  ActionResult,
  Selector,
  SelectAction,
  Trace,
} from "./types";
