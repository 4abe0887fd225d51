// JSON file persistence for chart structure

import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { Chart, defaultRegistry } from "./chart";
import { parseOptions } from "./config";
import type { FlowLogger } from "./logger";
import type { NodeRegistry, NodeSpecs } from "./registry";

export type NodeDocument = {
  name: string;
  kind: string;
  config?: Record<string, unknown>;
  chart?: ChartDocument;
};

export type ChartDocument = {
  version: 1;
  name: string;
  safeMode: boolean;
  /** Absent when the chart runs unbounded. */
  maxIterations?: number;
  nodes: NodeDocument[];
  /** Successor names per node, in `forward` order. */
  links: Record<string, string[]>;
};

const nodeDocumentSchema: z.ZodType<NodeDocument> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    kind: z.string().min(1),
    config: z.record(z.string(), z.unknown()).optional(),
    chart: chartDocumentSchema.optional(),
  }),
);

export const chartDocumentSchema: z.ZodType<ChartDocument> = z.lazy(() =>
  z.object({
    version: z.literal(1),
    name: z.string().min(1),
    safeMode: z.boolean(),
    maxIterations: z.number().int().positive().optional(),
    nodes: z.array(nodeDocumentSchema),
    links: z.record(z.string(), z.array(z.string())),
  }),
);

export type RestoreOptions<S> = {
  /** Actions and prebuilt nodes by step name; functions are not saved. */
  specs?: NodeSpecs<S>;
  registry?: NodeRegistry<S>;
  logger?: FlowLogger;
};

// ─── Serialize ────────────────────────────────────────────────────────────────

export function serializeChart<S>(chart: Chart<S>): ChartDocument {
  const nodes: NodeDocument[] = [];
  const links: Record<string, string[]> = {};

  for (const node of chart.nodes.values()) {
    const entry: NodeDocument = { name: node.name, kind: node.kind };
    const config = node.describe();
    if (config) entry.config = config;
    if (node instanceof Chart) entry.chart = serializeChart(node);
    nodes.push(entry);
    links[node.name] = node.forward.map((target) => target.name);
  }

  const document: ChartDocument = {
    version: 1,
    name: chart.name,
    safeMode: chart.safeMode,
    nodes,
    links,
  };
  if (chart.maxIterations !== undefined) document.maxIterations = chart.maxIterations;
  return document;
}

// ─── Restore ──────────────────────────────────────────────────────────────────

export function restoreChart<S>(
  document: ChartDocument,
  options: RestoreOptions<S> = {},
): Chart<S> {
  const registry = options.registry ?? defaultRegistry<S>();
  const chart = new Chart<S>({
    name: document.name,
    safeMode: document.safeMode,
    maxIterations: document.maxIterations,
    registry,
    logger: options.logger,
  });

  for (const entry of document.nodes) {
    if (chart.getNode(entry.name)) continue;
    const spec = options.specs?.[entry.name];
    if (spec?.node) {
      chart.addNode(spec.node);
    } else if (entry.chart) {
      chart.addNode(
        restoreChart(entry.chart, {
          registry: options.registry,
          logger: options.logger,
          specs: spec?.specs,
        }),
      );
    } else {
      chart.addNode(
        registry.create(entry.kind, entry.name, { ...spec, config: entry.config }),
      );
    }
  }

  for (const [from, targets] of Object.entries(document.links)) {
    for (const to of targets) chart.linkNodes(from, to);
  }
  return chart;
}

// ─── Files ────────────────────────────────────────────────────────────────────

export async function saveChart<S>(chart: Chart<S>, filePath: string): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  // Write to a temp file then rename for atomicity
  const tmp = filePath + ".tmp";
  await fs.writeFile(tmp, JSON.stringify(serializeChart(chart), null, 2), "utf-8");
  await fs.rename(tmp, filePath);
}

export async function loadChart<S>(
  filePath: string,
  options: RestoreOptions<S> = {},
): Promise<Chart<S>> {
  const raw: unknown = JSON.parse(await fs.readFile(filePath, "utf-8"));
  const document = parseOptions(chartDocumentSchema, raw, `chart file ${filePath}`);
  return restoreChart(document, options);
}
