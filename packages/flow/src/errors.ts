export class FlowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FlowError";
  }
}

/** Duplicate or invalid edge and node-name operations. */
export class LinkError extends FlowError {
  constructor(message: string) {
    super(message);
    this.name = "LinkError";
  }
}

export class BuildError extends FlowError {
  constructor(message: string) {
    super(message);
    this.name = "BuildError";
  }
}

/** A traversal ran past the chart's `maxIterations`. */
export class StepLimitError extends FlowError {
  constructor(
    public readonly chart: string,
    public readonly limit: number,
  ) {
    super(`Chart <${chart}> exceeded ${limit} steps. Possible infinite loop.`);
    this.name = "StepLimitError";
  }
}

export class BranchError extends FlowError {
  constructor(
    public readonly decision: string,
    selector: string,
    available: string[],
  ) {
    super(
      `Decision <${decision}> selected ${selector}, which is not linked. Available: [${available.join(", ")}]`,
    );
    this.name = "BranchError";
  }
}

export class ConfigError extends FlowError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
