import { LinkError } from "./errors";
import {
  toOutcome,
  type Action,
  type ActionResult,
  type FlowNode,
  type NodeOwner,
  type NodeStatus,
  type NodeVisual,
  type Outcome,
  type Trace,
} from "./types";

export const START = "Start";
export const END = "End";

// ============================================================================
// Node
// ============================================================================

export type NodeConfig<S> = {
  name: string;
  /**
   * Transform the state and return it, or return `exitChart(state)` /
   * `exitFlow(state)` to stop early. Defaults to identity.
   *
   * @example
   * action: (s) => ({ ...s, y: s.x + 1 })
   */
  action?: Action<S>;
};

// Base implementation - a plain processing step
export class Node<S> implements FlowNode<S> {
  public readonly name: string;
  public owner?: NodeOwner;
  public forward: FlowNode<S>[] = [];
  public reverse: Set<FlowNode<S>> = new Set();
  public lastDuration = -1;
  public status: NodeStatus = "initialized";
  public visual: NodeVisual;
  protected _action?: Action<S>;

  constructor(config: NodeConfig<S>) {
    this.name = config.name;
    this._action = config.action;
    this.visual = { label: config.name, shape: "box", color: "black", style: "solid" };
  }

  get kind(): string {
    return "Process";
  }

  protected async action(state: S): Promise<ActionResult<S>> {
    return this._action ? await this._action(state, this) : state;
  }

  /** Run the action, time it, and report how traversal should proceed. */
  async work(state: S): Promise<Outcome<S>> {
    this.status = "running";
    const started = performance.now();
    try {
      const outcome = toOutcome(await this.action(state));
      this.status = "complete";
      return outcome;
    } catch (error) {
      this.status = "failed";
      throw error;
    } finally {
      this.lastDuration = performance.now() - started;
    }
  }

  async run(state: S): Promise<S> {
    const outcome = await this.work(state);
    return outcome.state;
  }

  linkForward(target: FlowNode<S>): void {
    if (this.forward.includes(target)) {
      if (this.owner?.safeMode) return;
      throw new LinkError(`${target.name} already linked to ${this.name}`);
    }
    target.linkReverse(this);
    this.forward.push(target);
  }

  unlinkForward(target: FlowNode<S>): void {
    const index = this.forward.indexOf(target);
    if (index === -1) {
      if (this.owner?.safeMode) return;
      throw new LinkError(`${target.name} is not linked to ${this.name}`);
    }
    this.forward.splice(index, 1);
    target.unlinkReverse(this);
  }

  linkReverse(source: FlowNode<S>): void {
    this.reverse.add(source);
  }

  unlinkReverse(source: FlowNode<S>): void {
    this.reverse.delete(source);
  }

  next(): FlowNode<S> | undefined {
    return this.forward[0];
  }

  /**
   * Copy with fresh link containers, no owner, and reset run bookkeeping.
   * A Chart relinks the copies of its own nodes after cloning them.
   */
  clone(): this {
    const copy = Object.create(Object.getPrototypeOf(this));
    Object.assign(copy, this);
    copy.owner = undefined;
    copy.forward = [];
    copy.reverse = new Set();
    copy.visual = { ...this.visual };
    copy.lastDuration = -1;
    copy.status = "initialized";
    return copy;
  }

  trace(): Trace {
    return { path: [this.name], benchmarks: [this.lastDuration] };
  }

  describe(): Record<string, unknown> | undefined {
    return undefined;
  }
}

// ============================================================================
// Terminators
// ============================================================================

export type TerminatorConfig = { name?: string };

/** Entry point of a chart. Nothing may link into it. */
export class Start<S> extends Node<S> {
  constructor(config?: TerminatorConfig) {
    super({ name: config?.name ?? START });
    this.visual = { label: this.name, shape: "box", color: "blue", style: "rounded" };
  }

  override get kind(): string {
    return "Start";
  }

  override linkReverse(source: FlowNode<S>): void {
    throw new LinkError(`${source.name} cannot link to ${this.name}: it is an entry node`);
  }
}

/** Terminal point of a chart. It cannot link forward. */
export class End<S> extends Node<S> {
  constructor(config?: TerminatorConfig) {
    super({ name: config?.name ?? END });
    this.visual = { label: this.name, shape: "box", color: "red", style: "rounded" };
  }

  override get kind(): string {
    return "End";
  }

  override linkForward(target: FlowNode<S>): void {
    throw new LinkError(`${this.name} cannot link to ${target.name}: it is a terminal node`);
  }

  override unlinkForward(target: FlowNode<S>): void {
    throw new LinkError(`${this.name} has no link to ${target.name}: it is a terminal node`);
  }
}
