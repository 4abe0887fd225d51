import { afterEach, beforeEach, expect, test } from "vitest";
import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  BuildError,
  Chart,
  ConfigError,
  Decision,
  Pipe,
  loadChart,
  restoreChart,
  saveChart,
  serializeChart,
  silentLogger,
  type Action,
  type NodeSpecs,
  type PipeState,
} from "@flowline/flow";

type TestState = {
  value: number;
  executed: string[];
};

const mark =
  (label: string): Action<TestState> =>
  (s) => ({ ...s, executed: [...s.executed, label] });

const specs: NodeSpecs<TestState> = {
  P1: { action: mark("P1") },
  D1: { select: (s) => (s.value > 0 ? "P2" : "P3") },
  P2: { action: mark("P2") },
  P3: { action: mark("P3") },
};

const branching = () =>
  new Chart<TestState>({
    name: "Branching",
    maxIterations: 50,
    structure: ["P1", "D1", ["D1", ["P2", "P3"]]],
    specs,
  });

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "flowline-persist-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

// ============================================================================
// Documents
// ============================================================================

test("serializeChart captures nodes, kinds and links in forward order", () => {
  const chart = new Chart<TestState>({
    name: "Line",
    safeMode: true,
    maxIterations: 50,
    logger: silentLogger,
    structure: ["P1", "P2"],
    specs: { P1: {}, P2: {} },
  });

  expect(serializeChart(chart)).toEqual({
    version: 1,
    name: "Line",
    safeMode: true,
    maxIterations: 50,
    nodes: [
      { name: "Start", kind: "Start" },
      { name: "End", kind: "End" },
      { name: "P1", kind: "Process" },
      { name: "P2", kind: "Process" },
    ],
    links: { Start: ["P1"], End: [], P1: ["P2"], P2: ["End"] },
  });
});

test("a decision's links follow its current branch order", async () => {
  const chart = branching();
  await chart.run({ value: 0, executed: [] });

  expect(serializeChart(chart).links["D1"]).toEqual(["P3", "P2"]);
});

test("nested charts are serialized inline", () => {
  const outer = new Chart<TestState>({
    name: "Outer",
    structure: ["Inner"],
    specs: { Inner: { kind: "Chart", config: { structure: ["A"] }, specs: { A: {} } } },
  });

  const inner = serializeChart(outer).nodes[2];

  expect(inner).toEqual({
    name: "Inner",
    kind: "Chart",
    config: { safeMode: false },
    chart: {
      version: 1,
      name: "Inner",
      safeMode: false,
      nodes: [
        { name: "Start", kind: "Start" },
        { name: "End", kind: "End" },
        { name: "A", kind: "Process" },
      ],
      links: { Start: ["A"], End: [], A: ["End"] },
    },
  });
});

test("restoreChart rebuilds a runnable chart with actions from specs", async () => {
  const document = serializeChart(branching());

  const restored = restoreChart(document, { specs });
  const result = await restored.run({ value: 1, executed: [] });

  expect(restored.maxIterations).toBe(50);
  expect(restored.getNode("D1")).toBeInstanceOf(Decision);
  expect(result.executed).toEqual(["P1", "P2"]);
  expect(restored.path).toEqual(["Start", "P1", "D1", "P2", "End"]);
});

test("restoreChart hands nested specs to nested charts", async () => {
  const document = serializeChart(
    new Chart<TestState>({
      name: "Outer",
      structure: ["Pre", "Inner"],
      specs: {
        Pre: {},
        Inner: { kind: "Chart", config: { structure: ["A"] }, specs: { A: {} } },
      },
    }),
  );

  const restored = restoreChart<TestState>(document, {
    specs: { Pre: { action: mark("Pre") }, Inner: { specs: { A: { action: mark("A") } } } },
  });
  const result = await restored.run({ value: 0, executed: [] });

  expect(result.executed).toEqual(["Pre", "A"]);
  expect(restored.getNode("Inner")).toBeInstanceOf(Chart);
});

test("a node no registry kind can rebuild must come through specs", () => {
  const chart = new Chart<PipeState<TestState>>({ name: "Batch" });
  const template = new Chart<TestState>({ name: "Unit", structure: ["A"], specs: { A: {} } });
  chart.addNode(new Pipe<TestState>({ name: "Fit", template })).linkNodes("Start", "Fit");
  const document = serializeChart(chart);

  expect(document.nodes[2]).toEqual({
    name: "Fit",
    kind: "Pipe",
    config: { policy: "parallel", workers: 4, safeMode: true },
  });
  expect(() => restoreChart(document)).toThrow(BuildError);

  const pipe = new Pipe<TestState>({ name: "Fit", template });
  const restored = restoreChart<PipeState<TestState>>(document, {
    specs: { Fit: { node: pipe } },
  });
  expect(restored.getNode("Fit")).toBe(pipe);
  expect(restored.adjacency.get("Start")).toEqual(["Fit"]);
});

// ============================================================================
// Files
// ============================================================================

test("saveChart and loadChart go through a JSON file", async () => {
  const file = join(dir, "saved", "branching.json");

  await saveChart(branching(), file);
  const loaded = await loadChart(file, { specs });
  const result = await loaded.run({ value: 0, executed: [] });

  expect(result.executed).toEqual(["P1", "P3"]);
  expect(await readdir(join(dir, "saved"))).toEqual(["branching.json"]);
});

test("a saved chart without maxIterations loads unbounded", async () => {
  const file = join(dir, "open.json");
  const document = serializeChart(
    new Chart<TestState>({ name: "Open", structure: ["P1"], specs: { P1: {} } }),
  );
  await writeFile(file, JSON.stringify(document), "utf-8");

  const loaded = await loadChart<TestState>(file, { specs: { P1: { action: mark("P1") } } });

  expect("maxIterations" in document).toBe(false);
  expect(loaded.maxIterations).toBeUndefined();
  expect((await loaded.run({ value: 0, executed: [] })).executed).toEqual(["P1"]);
});

test("loadChart rejects a document that does not validate", async () => {
  const file = join(dir, "broken.json");
  await writeFile(file, JSON.stringify({ version: 2, name: "Broken" }), "utf-8");

  await expect(loadChart(file)).rejects.toBeInstanceOf(ConfigError);
  await expect(loadChart(file)).rejects.toThrow(/version/);
});
