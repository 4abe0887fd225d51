import { Chart, type ChartConfig } from "./chart";
import { Decision } from "./decision";
import { Node } from "./node";
import { Pipe, type PipeConfig } from "./pipe";
import type { Action, FlowNode, SelectAction } from "./types";

// Node Utilities

/**
 * Create typed node factories for a given state type.
 *
 * Bind your state type once, then create nodes with full type inference
 * for their actions.
 *
 * @example
 * type Galaxy = { flux: number; magnitude?: number };
 *
 * const { process, decision } = createNodes<Galaxy>();
 *
 * const measure = process("Measure", (g) => ({
 *   ...g,
 *   magnitude: -2.5 * Math.log10(g.flux),
 * }));
 * const bright = decision("Bright", (g) => (g.flux > 100 ? "Measure" : "End"));
 */
export function createNodes<S>() {
  return {
    /** A plain step that transforms the state. */
    process: (name: string, action?: Action<S>): Node<S> =>
      new Node<S>({ name, action }),
    /** A branching step that selects its successor. */
    decision: (name: string, select?: SelectAction<S>): Decision<S> =>
      new Decision<S>({ name, select }),
    /** A nested chart. */
    chart: (config: ChartConfig<S>): Chart<S> => new Chart<S>(config),
    /** A pipe replaying `template` over many states. */
    pipe: (config: PipeConfig<S>): Pipe<S> => new Pipe<S>(config),
  };
}

/**
 * Link standalone nodes one after another and return the first.
 * @throws LinkError if any consecutive pair is already linked
 */
export function chain<S>(...nodes: FlowNode<S>[]): FlowNode<S> {
  const [first] = nodes;
  if (!first) {
    throw new Error("chain() requires at least one node");
  }
  nodes.slice(1).reduce<FlowNode<S>>((previous, node) => {
    previous.linkForward(node);
    return node;
  }, first);
  return first;
}

// Chart Utilities

/**
 * Build a chart that runs `nodes` in order: Start → nodes… → End.
 */
export function sequential<S>(
  name: string,
  nodes: FlowNode<S>[],
  config?: Omit<ChartConfig<S>, "name" | "structure" | "specs">,
): Chart<S> {
  if (nodes.length === 0) {
    throw new Error("sequential() requires at least one node");
  }
  const chart = new Chart<S>({ ...config, name });
  for (const node of nodes) chart.addNode(node);
  return chart.build(nodes.map((node) => node.name));
}
