import { BranchError } from "./errors";
import { Node } from "./node";
import type { ActionResult, FlowNode, SelectAction, Selector } from "./types";

export type DecisionConfig<S> = {
  name: string;
  /** Pick the successor to follow. Defaults to the current first successor. */
  select?: SelectAction<S>;
};

/**
 * Node that routes instead of transforming. The selected successor is swapped
 * into `forward[0]`, which is what `next()` returns.
 */
export class Decision<S> extends Node<S> {
  protected _select?: SelectAction<S>;

  constructor(config: DecisionConfig<S>) {
    super({ name: config.name });
    this._select = config.select;
    this.visual.shape = "diamond";
  }

  override get kind(): string {
    return "Decision";
  }

  protected override async action(state: S): Promise<ActionResult<S>> {
    const selector = this._select ? await this._select(state, this) : 0;
    this.choose(selector);
    return state;
  }

  /** Move the selected successor to the front of `forward`. */
  choose(selector: Selector<S>): FlowNode<S> {
    const index = this.indexOf(selector);
    const chosen = this.forward[index];
    const current = this.forward[0];
    if (index === -1 || !chosen || !current) {
      throw new BranchError(
        this.name,
        describeSelector(selector),
        this.forward.map((node) => node.name),
      );
    }
    if (index !== 0) {
      this.forward[0] = chosen;
      this.forward[index] = current;
    }
    return chosen;
  }

  private indexOf(selector: Selector<S>): number {
    if (typeof selector === "number") {
      return Number.isInteger(selector) && selector >= 0 && selector < this.forward.length
        ? selector
        : -1;
    }
    if (typeof selector === "string") {
      return this.forward.findIndex((node) => node.name === selector);
    }
    // Clones hold copies of their successors, so fall back to the name.
    const byIdentity = this.forward.indexOf(selector);
    return byIdentity !== -1
      ? byIdentity
      : this.forward.findIndex((node) => node.name === selector.name);
  }
}

function describeSelector<S>(selector: Selector<S>): string {
  if (typeof selector === "number") return `index ${selector}`;
  if (typeof selector === "string") return `"${selector}"`;
  return `node "${selector.name}"`;
}
