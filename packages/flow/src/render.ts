import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import { Chart } from "./chart";
import { END, START } from "./node";
import type { NodeVisual } from "./types";

// Graphviz DOT output. Node ids are qualified by the chart path ("C2/C1/P1")
// so nested charts can reuse names; nested charts become dotted clusters.

function quote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function attributes(visual: NodeVisual): string {
  return [
    `label=${quote(visual.label)}`,
    `shape=${quote(visual.shape)}`,
    `color=${quote(visual.color)}`,
    `style=${quote(visual.style)}`,
  ].join(", ");
}

function renderChart<S>(
  chart: Chart<S>,
  prefix: string,
  indent: string,
  lines: string[],
): void {
  chart.prepare();

  for (const node of chart.nodes.values()) {
    if (node instanceof Chart) {
      lines.push(`${indent}subgraph ${quote(`cluster_${prefix}${node.name}`)} {`);
      lines.push(`${indent}  label=${quote(node.name)};`);
      lines.push(`${indent}  style="dotted";`);
      renderChart(node, `${prefix}${node.name}/`, `${indent}  `, lines);
      lines.push(`${indent}}`);
    } else {
      lines.push(`${indent}${quote(prefix + node.name)} [${attributes(node.visual)}];`);
    }
  }

  for (const [from, targets] of chart.adjacency) {
    const source = chart.getNode(from);
    for (const to of targets) {
      const target = chart.getNode(to);
      const extra: string[] = [];
      let tail = prefix + from;
      let head = prefix + to;
      if (source instanceof Chart) {
        tail = `${prefix}${from}/${END}`;
        extra.push(`ltail=${quote(`cluster_${prefix}${from}`)}`);
      }
      if (target instanceof Chart) {
        head = `${prefix}${to}/${START}`;
        extra.push(`lhead=${quote(`cluster_${prefix}${to}`)}`);
      }
      const suffix = extra.length > 0 ? ` [${extra.join(", ")}]` : "";
      lines.push(`${indent}${quote(tail)} -> ${quote(head)}${suffix};`);
    }
  }
}

/** Render a chart (dangling nodes are tidied to End first) as DOT text. */
export function renderDot<S>(chart: Chart<S>): string {
  const lines = [
    `digraph ${quote(chart.name)} {`,
    "  compound=true;",
    "  splines=line;",
  ];
  renderChart(chart, "", "  ", lines);
  lines.push("}");
  return lines.join("\n");
}

/** Write the DOT rendering of `chart` to `filePath`. */
export async function drawChart<S>(chart: Chart<S>, filePath: string): Promise<void> {
  await fs.mkdir(dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, renderDot(chart) + "\n", "utf-8");
}
