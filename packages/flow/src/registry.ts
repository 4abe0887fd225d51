import { Decision } from "./decision";
import { BuildError } from "./errors";
import { End, Node, Start } from "./node";
import type { Action, FlowNode, SelectAction } from "./types";

/**
 * Per-step configuration handed to `Chart.build`, keyed by step name.
 * `node` wins over everything else; otherwise `kind` picks a factory and the
 * remaining fields are its arguments.
 */
export type NodeSpec<S> = {
  kind?: string;
  node?: FlowNode<S>;
  action?: Action<S>;
  select?: SelectAction<S>;
  /** Data-only arguments (persisted with the chart). */
  config?: Record<string, unknown>;
  /** Specs for the steps of a nested `Chart` kind. */
  specs?: NodeSpecs<S>;
};

export type NodeSpecs<S> = Record<string, NodeSpec<S>>;

export type NodeFactory<S> = (name: string, spec: NodeSpec<S>) => FlowNode<S>;

/**
 * Explicit table of node kinds, resolved when a chart is built.
 * Kinds must be registered before a structure can refer to them.
 */
export class NodeRegistry<S> {
  private factories = new Map<string, NodeFactory<S>>();

  /**
   * Register a factory for a kind tag.
   * @throws BuildError if the kind is already registered
   */
  register(kind: string, factory: NodeFactory<S>): this {
    if (this.factories.has(kind)) {
      throw new BuildError(`Node kind "${kind}" is already registered`);
    }
    this.factories.set(kind, factory);
    return this;
  }

  has(kind: string): boolean {
    return this.factories.has(kind);
  }

  kinds(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * @throws BuildError for an unknown kind
   */
  create(kind: string, name: string, spec: NodeSpec<S> = {}): FlowNode<S> {
    const factory = this.factories.get(kind);
    if (!factory) {
      throw new BuildError(
        `Unknown node kind "${kind}" for step "${name}". Registered: [${this.kinds().join(", ")}]`,
      );
    }
    return factory(name, spec);
  }
}

/** A fresh registry with the leaf kinds: Start, End, Process, Decision. */
export function createRegistry<S>(): NodeRegistry<S> {
  return new NodeRegistry<S>()
    .register("Start", (name) => new Start<S>({ name }))
    .register("End", (name) => new End<S>({ name }))
    .register("Process", (name, spec) => new Node<S>({ name, action: spec.action }))
    .register(
      "Decision",
      (name, spec) => new Decision<S>({ name, select: spec.select }),
    );
}
