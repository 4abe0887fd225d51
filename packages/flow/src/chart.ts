import {
  chartNodeConfigSchema,
  chartOptionsSchema,
  parseOptions,
  structureSchema,
  type Step,
  type Structure,
} from "./config";
import { Decision } from "./decision";
import { BuildError, LinkError, StepLimitError, toError } from "./errors";
import { createLogger, type FlowLogger } from "./logger";
import { END, Node, START } from "./node";
import { createRegistry, type NodeRegistry, type NodeSpec, type NodeSpecs } from "./registry";
import {
  exitFlow,
  type Action,
  type ActionResult,
  type FlowNode,
  type Outcome,
  type SelectAction,
  type Trace,
} from "./types";

export type ChartConfig<S> = {
  name: string;
  /** Built immediately when given; otherwise call `build` or link by hand. */
  structure?: Structure;
  specs?: NodeSpecs<S>;
  /** Swallow node failures and keep going; duplicate links become no-ops. */
  safeMode?: boolean;
  maxIterations?: number; // Step cap for one run (default: unbounded)
  registry?: NodeRegistry<S>;
  logger?: FlowLogger;
  onNodeExecute?: (
    node: FlowNode<S>,
    outcome: Outcome<S>,
  ) => Promise<void> | void;
  onError?: (error: Error, node: FlowNode<S>, state: S) => Promise<void> | void;
};

/**
 * Owns a named set of nodes and walks them from `Start` to `End`, threading the
 * state through each step. A Chart is itself a node, so charts nest.
 */
export class Chart<S> extends Node<S> {
  public nodes = new Map<string, FlowNode<S>>();
  /** Mirror of the links by name, for inspection and rendering. */
  public adjacency = new Map<string, string[]>();
  public currentNode = START;
  public path: string[] = [];
  public benchmarks: number[] = [];
  public state?: S;
  public safeMode: boolean;
  public maxIterations?: number;
  private registry: NodeRegistry<S>;
  private logger: FlowLogger;
  private onNodeExecute?: ChartConfig<S>["onNodeExecute"];
  private onError?: ChartConfig<S>["onError"];
  private tidy = false;
  private linear = false;
  private linearTail = START;

  constructor(config: ChartConfig<S>) {
    super({ name: config.name });
    const options = parseOptions(
      chartOptionsSchema,
      {
        name: config.name,
        safeMode: config.safeMode,
        maxIterations: config.maxIterations,
      },
      "chart",
    );
    this.safeMode = options.safeMode;
    this.maxIterations = options.maxIterations;
    this.registry = config.registry ?? defaultRegistry<S>();
    this.logger = config.logger ?? createLogger();
    this.onNodeExecute = config.onNodeExecute;
    this.onError = config.onError;
    this.visual.shape = "hexagon";

    this.addNode(this.registry.create("Start", START));
    this.addNode(this.registry.create("End", END));
    if (config.structure) this.build(config.structure, config.specs);
  }

  override get kind(): string {
    return "Chart";
  }

  // ==========================================================================
  // Graph building
  // ==========================================================================

  getNode(name: string): FlowNode<S> | undefined {
    return this.nodes.get(name);
  }

  private lookup(name: string): FlowNode<S> {
    const node = this.nodes.get(name);
    if (!node) {
      throw new LinkError(`No node named "${name}" in ${this.name}`);
    }
    return node;
  }

  addNode(node: FlowNode<S>): this {
    if (this.nodes.has(node.name)) {
      if (this.safeMode) return this;
      throw new LinkError(`${node.name} already in ${this.name}`);
    }
    this.nodes.set(node.name, node);
    this.adjacency.set(node.name, []);
    node.owner = this;
    this.tidy = false;

    if (this.linear) {
      this.unlinkNodes(this.linearTail, END);
      this.linkNodes(this.linearTail, node.name);
      this.linkNodes(node.name, END);
      this.linearTail = node.name;
    }
    return this;
  }

  addProcess(name: string, action?: Action<S>): this {
    return this.addNode(new Node<S>({ name, action }));
  }

  addDecision(name: string, select?: SelectAction<S>): this {
    return this.addNode(new Decision<S>({ name, select }));
  }

  linkNodes(from: string, to: string): this {
    const source = this.lookup(from);
    const target = this.lookup(to);
    const links = this.adjacency.get(from) ?? [];
    if (links.includes(to)) {
      if (this.safeMode) return this;
      throw new LinkError(`${to} already linked to ${from}`);
    }
    source.linkForward(target);
    links.push(to);
    this.adjacency.set(from, links);
    this.tidy = false;
    return this;
  }

  unlinkNodes(from: string, to: string): this {
    const source = this.lookup(from);
    const target = this.lookup(to);
    const links = this.adjacency.get(from) ?? [];
    const index = links.indexOf(to);
    if (index === -1) {
      if (this.safeMode) return this;
      throw new LinkError(`${to} is not linked to ${from}`);
    }
    source.unlinkForward(target);
    links.splice(index, 1);
    this.tidy = false;
    return this;
  }

  /**
   * Splice `node` in front of `existing`: every predecessor of `existing` now
   * points at `node`, and `node` points at `existing`. Branch positions of the
   * predecessors are kept.
   */
  insertNode(node: FlowNode<S> | string, existing: string): this {
    const inserted =
      typeof node === "string" ? this.lookup(node) : this.ensureAdded(node);
    const target = this.lookup(existing);

    for (const predecessor of Array.from(target.reverse)) {
      if (predecessor === inserted) continue;
      this.redirect(predecessor.name, target, inserted);
    }
    if (!inserted.forward.includes(target)) {
      this.linkNodes(inserted.name, existing);
    }
    return this;
  }

  private ensureAdded(node: FlowNode<S>): FlowNode<S> {
    if (this.nodes.get(node.name) !== node) this.addNode(node);
    return this.lookup(node.name);
  }

  private redirect(from: string, oldTarget: FlowNode<S>, newTarget: FlowNode<S>): void {
    const source = this.lookup(from);
    const position = source.forward.indexOf(oldTarget);
    const alreadyLinked = source.forward.includes(newTarget);
    this.unlinkNodes(from, oldTarget.name);
    if (alreadyLinked) return;
    this.linkNodes(from, newTarget.name);

    const links = this.adjacency.get(from) ?? [];
    const last = source.forward.length - 1;
    if (position !== -1 && position < last && source.forward[last] === newTarget) {
      source.forward.splice(last, 1);
      source.forward.splice(position, 0, newTarget);
      links.splice(links.indexOf(newTarget.name), 1);
      links.splice(position, 0, newTarget.name);
    }
  }

  /**
   * Append nodes in order while on: each `addNode` is linked after the last
   * one and in front of `End`.
   */
  linearMode(on: boolean): this {
    if (on && !this.linear) {
      let tail = this.lookup(START);
      const seen = new Set<FlowNode<S>>([tail]);
      for (let next = tail.next(); next && next.name !== END && !seen.has(next); next = tail.next()) {
        seen.add(next);
        tail = next;
      }
      if (!(this.adjacency.get(tail.name) ?? []).includes(END)) {
        this.linkNodes(tail.name, END);
      }
      this.linearTail = tail.name;
    }
    this.linear = on;
    return this;
  }

  /**
   * Add and link nodes from a compact description. Can be called repeatedly;
   * each call adds to the existing graph.
   *
   * @example
   * // sequence form: consecutive steps are linked, a tuple fans out
   * chart.build(["P1", "D1", ["D1", ["P2", "P4"]]], specs);
   *
   * // mapping form
   * chart.build({ Start: "P1", P1: "D1", D1: ["P2", "P4"] }, specs);
   *
   * @throws BuildError when a step cannot be resolved or Start has no successor
   */
  build(structure: Structure, specs: NodeSpecs<S> = {}): this {
    const parsed = parseOptions(structureSchema, structure, "structure");

    if (Array.isArray(parsed)) {
      this.buildSequence(parsed, specs);
    } else {
      for (const [from, targets] of Object.entries(parsed)) {
        const source = this.ensure(from, specs);
        for (const to of typeof targets === "string" ? [targets] : targets) {
          this.linkNodes(source, this.ensure(to, specs));
        }
      }
    }

    if (this.lookup(START).forward.length === 0) {
      throw new BuildError(
        `Chart <${this.name}> has no path from ${START}: it must be linked to a node`,
      );
    }
    return this;
  }

  private buildSequence(steps: Step[], specs: NodeSpecs<S>): void {
    const heads = steps.map((step) =>
      this.ensure(typeof step === "string" ? step : step[0], specs),
    );

    steps.forEach((step, index) => {
      const head = heads[index];
      if (head === undefined) return;
      if (typeof step !== "string") {
        for (const to of step[1]) this.linkNodes(head, this.ensure(to, specs));
        return;
      }
      // ["D1", ["D1", [...]]] repeats a name to fan it out; no self-link.
      const following = heads[index + 1];
      if (following !== undefined && following !== head) {
        this.linkNodes(head, following);
      }
    });

    const first = heads[0];
    if (first !== undefined && first !== START && this.lookup(START).forward.length === 0) {
      this.linkNodes(START, first);
    }
    // A trailing fan-out already names its successors; leave it alone.
    const lastStep = steps[steps.length - 1];
    const last = heads[heads.length - 1];
    if (
      typeof lastStep === "string" &&
      last !== undefined &&
      last !== END &&
      this.lookup(END).reverse.size === 0
    ) {
      this.linkNodes(last, END);
    }
  }

  /** Resolve a step identifier to a node name, creating the node if needed. */
  private ensure(step: string, specs: NodeSpecs<S>): string {
    const separator = step.indexOf(":");
    const name = separator === -1 ? step : step.slice(0, separator);
    const explicitKind = separator === -1 ? undefined : step.slice(separator + 1);

    if (!this.nodes.has(name)) {
      this.addNode(this.instantiate(name, explicitKind, specs[name]));
    }
    return name;
  }

  private instantiate(
    name: string,
    explicitKind: string | undefined,
    spec: NodeSpec<S> | undefined,
  ): FlowNode<S> {
    if (spec?.node) {
      if (spec.node.name !== name) {
        throw new BuildError(
          `Spec for step "${name}" holds a node named "${spec.node.name}"`,
        );
      }
      return spec.node;
    }
    const kind =
      explicitKind ??
      spec?.kind ??
      (this.registry.has(name) ? name : undefined) ??
      (spec?.select ? "Decision" : spec ? "Process" : undefined);
    if (!kind) {
      throw new BuildError(
        `Step "${name}" in ${this.name} is not a registered kind and has no node spec`,
      );
    }
    return this.registry.create(kind, name, spec ?? {});
  }

  /** Link every dangling node to `End`. Runs lazily before traversal. */
  private tidyEnds(): void {
    for (const [name, node] of this.nodes) {
      if (name === END || node.kind === "End" || node.forward.length > 0) continue;
      this.linkNodes(name, END);
    }
    this.tidy = true;
  }

  /** Make the chart ready to traverse or render. */
  prepare(): this {
    if (!this.tidy) this.tidyEnds();
    return this;
  }

  private linkToEnd(node: FlowNode<S>): void {
    if (node.name === END || node.kind === "End") return;
    if (!(this.adjacency.get(node.name) ?? []).includes(END)) {
      this.linkNodes(node.name, END);
    }
  }

  // ==========================================================================
  // Traversal
  // ==========================================================================

  protected override async action(input: S): Promise<ActionResult<S>> {
    const start = this.lookup(START);
    if (start.forward.length === 0) {
      throw new BuildError(
        `Chart <${this.name}> has no structure! ${START} must be linked to a node`,
      );
    }
    this.prepare();

    this.state = input;
    this.path = [];
    this.benchmarks = [];
    this.currentNode = START;

    let state = input;
    let current: FlowNode<S> | undefined = start;
    let iterations = 0;

    while (current) {
      if (this.maxIterations !== undefined && ++iterations > this.maxIterations) {
        throw new StepLimitError(this.name, this.maxIterations);
      }
      const node: FlowNode<S> = current;
      this.currentNode = node.name;
      this.path.push(node.name);
      this.logger.log({
        type: "node-entered",
        chart: this.name,
        node: node.name,
        at: new Date(),
      });

      let outcome: Outcome<S>;
      try {
        outcome = await node.work(state);
      } catch (caught) {
        this.benchmarks.push(node.lastDuration);
        const error = toError(caught);
        this.logger.log({
          type: "node-error",
          chart: this.name,
          node: node.name,
          at: new Date(),
          error,
        });
        await this.onError?.(error, node, state);
        if (!this.safeMode) throw caught;
        current = node.next();
        continue;
      }

      this.benchmarks.push(node.lastDuration);
      state = outcome.state;
      this.state = state;
      await this.onNodeExecute?.(node, outcome);

      if (outcome.kind === "exit-chart") {
        this.linkToEnd(node);
        this.logger.log({ type: "exit-chart", chart: this.name, node: node.name, at: new Date() });
        return state;
      }
      if (outcome.kind === "exit-flow") {
        this.linkToEnd(node);
        this.logger.log({ type: "exit-flow", chart: this.name, node: node.name, at: new Date() });
        return this.owner ? exitFlow(state) : state;
      }
      current = node.next();
    }

    return state;
  }

  // ==========================================================================
  // Copies & introspection
  // ==========================================================================

  /** Deep copy: every node (nested charts included) and link is duplicated. */
  override clone(): this {
    const copy = super.clone();
    copy.nodes = new Map();
    copy.adjacency = new Map();
    copy.path = [];
    copy.benchmarks = [];
    copy.state = undefined;
    copy.currentNode = START;

    const copies = new Map<FlowNode<S>, FlowNode<S>>();
    for (const [name, node] of this.nodes) {
      const duplicate = node.clone();
      duplicate.owner = copy;
      copy.nodes.set(name, duplicate);
      copy.adjacency.set(name, [...(this.adjacency.get(name) ?? [])]);
      copies.set(node, duplicate);
    }
    for (const [node, duplicate] of copies) {
      for (const target of node.forward) {
        const linked = copies.get(target);
        if (!linked) continue;
        duplicate.forward.push(linked);
        linked.reverse.add(duplicate);
      }
    }
    return copy;
  }

  override trace(): Trace {
    return { path: [...this.path], benchmarks: [...this.benchmarks] };
  }

  override describe(): Record<string, unknown> {
    if (this.maxIterations === undefined) return { safeMode: this.safeMode };
    return { safeMode: this.safeMode, maxIterations: this.maxIterations };
  }
}

/** Leaf kinds plus `Chart`, built from `spec.config.structure`. */
export function defaultRegistry<S>(): NodeRegistry<S> {
  return createRegistry<S>().register("Chart", (name, spec) => {
    const config = parseOptions(
      chartNodeConfigSchema,
      spec.config ?? {},
      `chart "${name}"`,
    );
    return new Chart<S>({
      name,
      structure: config.structure,
      specs: spec.specs,
      safeMode: config.safeMode,
      maxIterations: config.maxIterations,
    });
  });
}
