export interface FlowNode<S> {
  readonly name: string;
  readonly kind: string;
  owner?: NodeOwner;
  forward: FlowNode<S>[];
  reverse: Set<FlowNode<S>>;
  lastDuration: number;
  status: NodeStatus;
  visual: NodeVisual;
  linkForward(target: FlowNode<S>): void;
  unlinkForward(target: FlowNode<S>): void;
  linkReverse(source: FlowNode<S>): void;
  unlinkReverse(source: FlowNode<S>): void;
  next(): FlowNode<S> | undefined;
  work(state: S): Promise<Outcome<S>>;
  run(state: S): Promise<S>;
  clone(): FlowNode<S>;
  trace(): Trace;
  /** Data-only constructor arguments, used when persisting a chart. */
  describe(): Record<string, unknown> | undefined;
}

/** The slice of a Chart a node needs to see through its back-reference. */
export interface NodeOwner {
  readonly name: string;
  readonly safeMode: boolean;
}

export type NodeStatus = "initialized" | "running" | "complete" | "failed";

/** Display descriptor handed to the renderer. */
export type NodeVisual = {
  label: string;
  shape: string;
  color: string;
  style: string;
};

export type Trace = {
  path: string[];
  benchmarks: number[];
};

// ============================================================================
// Outcomes & signals
// ============================================================================

export type OutcomeKind = "continue" | "exit-chart" | "exit-flow";

export type Outcome<S> =
  | { kind: "continue"; state: S }
  | { kind: "exit-chart"; state: S }
  | { kind: "exit-flow"; state: S };

/**
 * Returned by an action instead of a plain state to stop traversal early.
 * `exit-chart` ends the innermost chart; `exit-flow` ends every chart up to
 * the one without an owner.
 */
export class FlowSignal<S> {
  constructor(
    public readonly kind: "exit-chart" | "exit-flow",
    public readonly state: S,
  ) {}
}

export function exitChart<S>(state: S): FlowSignal<S> {
  return new FlowSignal("exit-chart", state);
}

export function exitFlow<S>(state: S): FlowSignal<S> {
  return new FlowSignal("exit-flow", state);
}

export function toOutcome<S>(result: S | FlowSignal<S>): Outcome<S> {
  if (result instanceof FlowSignal) {
    return { kind: result.kind, state: result.state };
  }
  return { kind: "continue", state: result };
}

// ============================================================================
// Actions
// ============================================================================

export type ActionResult<S> = S | FlowSignal<S>;

/** User behaviour of a node. The node itself is passed for self-aware actions. */
export type Action<S> = (
  state: S,
  node: FlowNode<S>,
) => Promise<ActionResult<S>> | ActionResult<S>;

/** Which successor a Decision picks: position, name, or the node itself. */
export type Selector<S> = number | string | FlowNode<S>;

export type SelectAction<S> = (
  state: S,
  node: FlowNode<S>,
) => Promise<Selector<S>> | Selector<S>;
