import {
  parseOptions,
  pipeOptionsSchema,
  pipePolicySchema,
  type PipePolicy,
} from "./config";
import { ConfigError, toError } from "./errors";
import { createLogger, type FlowLogger } from "./logger";
import { Node } from "./node";
import { mapConcurrent } from "./pool";
import type { ActionResult, FlowNode, Trace } from "./types";

/**
 * What a Pipe consumes and produces: one state for the `pass` policy, an
 * array of states otherwise. A failed run yields `null`.
 */
export type PipeState<S> = S | null | ReadonlyArray<S | null>;

export type PipeConfig<S> = {
  name: string;
  /**
   * Chart or node replayed for every state. Never run directly. A `null`
   * element, such as a failure left by an earlier pipe, is run like any other.
   */
  template: FlowNode<S | null>;
  /** "parallel" (default), "iterate" or "pass". */
  policy?: string;
  workers?: number; // Pool size for the parallel policy (default: 4)
  /** Turn a failing run into a `null` result instead of rejecting. */
  safeMode?: boolean;
  logger?: FlowLogger;
};

type ElementRun<S> = { ok: boolean; state: S | null; trace: Trace };

/**
 * Replays a template over many states. Each state gets its own clone of the
 * template, so runs never see each other's per-run bookkeeping.
 *
 * @example
 * const pipe = new Pipe<Galaxy>({ name: "Fit", template: fitChart, workers: 8 });
 * const fitted = await pipe.runMany(galaxies);
 * pipe.paths[0]; // ["Start", "Load", "Fit", "End"]
 */
export class Pipe<S> extends Node<PipeState<S>> {
  public template: FlowNode<S | null>;
  public workers: number;
  public safeMode: boolean;
  public paths: string[][] = [];
  public benchmarks: number[][] = [];
  public succeeded: boolean[] = [];
  private _policy: PipePolicy;
  private logger: FlowLogger;

  constructor(config: PipeConfig<S>) {
    super({ name: config.name });
    const options = parseOptions(
      pipeOptionsSchema,
      {
        name: config.name,
        policy: config.policy,
        workers: config.workers,
        safeMode: config.safeMode,
      },
      "pipe",
    );
    this.template = config.template;
    this._policy = options.policy;
    this.workers = options.workers;
    this.safeMode = options.safeMode;
    this.logger = config.logger ?? createLogger();
    this.visual.shape = "parallelogram";
  }

  override get kind(): string {
    return "Pipe";
  }

  get policy(): PipePolicy {
    return this._policy;
  }

  /** @throws ConfigError for anything but "parallel", "iterate" or "pass" */
  setPolicy(policy: string): this {
    this._policy = parseOptions(pipePolicySchema, policy, `pipe "${this.name}" policy`);
    return this;
  }

  /** Swap the template and forget the aggregated runs of the old one. */
  setTemplate(template: FlowNode<S | null>): this {
    this.template = template;
    this.paths = [];
    this.benchmarks = [];
    this.succeeded = [];
    return this;
  }

  protected override async action(
    input: PipeState<S>,
  ): Promise<ActionResult<PipeState<S>>> {
    if (!this.takesSingle(input)) {
      return await this.runMany(input);
    }
    if (this._policy !== "pass") {
      throw new ConfigError(
        `Pipe <${this.name}> uses the ${this._policy} policy and takes an array of states`,
      );
    }
    return await this.runOnce(input);
  }

  /** Under `pass` the whole input is one state, arrays included. */
  private takesSingle(input: PipeState<S>): input is S | null {
    return this._policy === "pass" || !Array.isArray(input);
  }

  /**
   * Run the template once per state, in a pool of `workers` for the parallel
   * policy or one after another otherwise. Output order matches input order.
   */
  async runMany(states: ReadonlyArray<S | null>): Promise<Array<S | null>> {
    const policy = this._policy;
    const started = performance.now();
    this.logger.log({
      type: "pipe-start",
      pipe: this.name,
      policy,
      count: states.length,
      at: new Date(),
    });

    let runs: ElementRun<S>[];
    if (policy === "parallel") {
      runs = await mapConcurrent(states, this.workers, (state) => this.apply(state));
      runs.forEach((run) => this.record(run));
    } else {
      runs = [];
      for (const state of states) {
        const run = await this.apply(state);
        this.record(run);
        runs.push(run);
      }
    }

    this.logger.log({
      type: "pipe-complete",
      pipe: this.name,
      policy,
      failed: runs.filter((run) => !run.ok).length,
      duration: performance.now() - started,
      at: new Date(),
    });
    return runs.map((run) => run.state);
  }

  /** Run the template once on a single state. */
  async runOnce(state: S | null): Promise<S | null> {
    const run = await this.apply(state);
    this.record(run);
    return run.state;
  }

  private record(run: ElementRun<S>): void {
    this.paths.push(run.trace.path);
    this.benchmarks.push(run.trace.benchmarks);
    this.succeeded.push(run.ok);
  }

  private async apply(state: S | null): Promise<ElementRun<S>> {
    const unit = this.template.clone();
    try {
      const result = await unit.run(state);
      return { ok: true, state: result, trace: unit.trace() };
    } catch (caught) {
      if (!this.safeMode) throw caught;
      const trace = unit.trace();
      this.logger.log({
        type: "node-error",
        chart: `Pipe ${this.name}`,
        node: trace.path.at(-1) ?? unit.name,
        at: new Date(),
        error: toError(caught),
      });
      return { ok: false, state: null, trace };
    }
  }

  override clone(): this {
    const copy = super.clone();
    copy.template = this.template.clone();
    copy.paths = [];
    copy.benchmarks = [];
    copy.succeeded = [];
    return copy;
  }

  override describe(): Record<string, unknown> {
    return {
      policy: this._policy,
      workers: this.workers,
      safeMode: this.safeMode,
    };
  }
}
