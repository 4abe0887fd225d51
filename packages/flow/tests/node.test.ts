import { test, expect } from "vitest";
import {
  Node,
  Start,
  End,
  Chart,
  LinkError,
  exitChart,
  exitFlow,
  silentLogger,
} from "@flowline/flow";

type TestState = {
  value: number;
  executed: string[];
};

// ============================================================================
// Linking
// ============================================================================

test("linkForward records the edge on both ends", () => {
  const a = new Node<TestState>({ name: "A" });
  const b = new Node<TestState>({ name: "B" });

  a.linkForward(b);

  expect(a.forward).toHaveLength(1);
  expect(a.forward[0]).toBe(b);
  expect(b.reverse.has(a)).toBe(true);
  expect(a.next()).toBe(b);
});

test("unlinkForward removes the edge from both ends", () => {
  const a = new Node<TestState>({ name: "A" });
  const b = new Node<TestState>({ name: "B" });

  a.linkForward(b);
  a.unlinkForward(b);

  expect(a.forward).toHaveLength(0);
  expect(b.reverse.has(a)).toBe(false);
  expect(a.next()).toBeUndefined();
});

test("linking the same edge twice throws LinkError", () => {
  const a = new Node<TestState>({ name: "A" });
  const b = new Node<TestState>({ name: "B" });
  a.linkForward(b);

  expect(() => a.linkForward(b)).toThrow(LinkError);
  expect(() => a.linkForward(b)).toThrow("B already linked to A");
  expect(a.forward).toHaveLength(1);
});

test("duplicate link is a no-op when the owning chart is in safe mode", () => {
  const chart = new Chart<TestState>({
    name: "Lenient",
    safeMode: true,
    logger: silentLogger,
  });
  const a = new Node<TestState>({ name: "A" });
  const b = new Node<TestState>({ name: "B" });
  chart.addNode(a).addNode(b);

  a.linkForward(b);
  a.linkForward(b);

  expect(a.forward).toHaveLength(1);
  expect(b.reverse.size).toBe(1);
});

test("unlinking a missing edge throws LinkError", () => {
  const a = new Node<TestState>({ name: "A" });
  const b = new Node<TestState>({ name: "B" });

  expect(() => a.unlinkForward(b)).toThrow("B is not linked to A");
});

test("keeps links from several sources symmetric", () => {
  const a = new Node<TestState>({ name: "A" });
  const b = new Node<TestState>({ name: "B" });
  const c = new Node<TestState>({ name: "C" });

  a.linkForward(c);
  b.linkForward(c);
  a.unlinkForward(c);

  expect(Array.from(c.reverse)).toEqual([b]);
  expect(b.forward[0]).toBe(c);
});

// ============================================================================
// Terminators
// ============================================================================

test("nothing can link into Start", () => {
  const a = new Node<TestState>({ name: "A" });
  const start = new Start<TestState>();

  expect(() => a.linkForward(start)).toThrow(LinkError);
  expect(a.forward).toHaveLength(0);
  expect(start.reverse.size).toBe(0);
});

test("End cannot link forward", () => {
  const end = new End<TestState>();
  const a = new Node<TestState>({ name: "A" });

  expect(() => end.linkForward(a)).toThrow(
    "End cannot link to A: it is a terminal node",
  );
  expect(a.reverse.size).toBe(0);
});

test("terminators use their default names", () => {
  expect(new Start<TestState>().name).toBe("Start");
  expect(new End<TestState>().name).toBe("End");
  expect(new Start<TestState>().kind).toBe("Start");
  expect(new End<TestState>().kind).toBe("End");
});

// ============================================================================
// Execution
// ============================================================================

test("Node without an action returns the state unchanged", async () => {
  const shared: TestState = { value: 3, executed: [] };
  const node = new Node<TestState>({ name: "Identity" });

  const result = await node.run(shared);

  expect(result).toBe(shared);
});

test("run records duration and status", async () => {
  const node = new Node<TestState>({
    name: "Inc",
    action: (s) => ({ ...s, value: s.value + 1 }),
  });
  expect(node.lastDuration).toBe(-1);
  expect(node.status).toBe("initialized");

  const result = await node.run({ value: 1, executed: [] });

  expect(result.value).toBe(2);
  expect(node.lastDuration).toBeGreaterThanOrEqual(0);
  expect(node.status).toBe("complete");
});

test("action receives the node itself", async () => {
  const node = new Node<TestState>({
    name: "Self aware",
    action: (s, self) => ({ ...s, executed: [...s.executed, self.name] }),
  });

  const result = await node.run({ value: 0, executed: [] });

  expect(result.executed).toEqual(["Self aware"]);
});

test("async actions are awaited", async () => {
  const node = new Node<TestState>({
    name: "Slow",
    action: async (s) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return { ...s, value: 42 };
    },
  });

  const result = await node.run({ value: 0, executed: [] });

  expect(result.value).toBe(42);
});

test("failing action rejects and marks the node failed", async () => {
  const node = new Node<TestState>({
    name: "Boom",
    action: () => {
      throw new Error("kaboom");
    },
  });

  await expect(node.run({ value: 0, executed: [] })).rejects.toThrow("kaboom");
  expect(node.status).toBe("failed");
  expect(node.lastDuration).toBeGreaterThanOrEqual(0);
});

test("work turns signals into outcomes", async () => {
  const shared: TestState = { value: 1, executed: [] };
  const stop = new Node<TestState>({ name: "Stop", action: (s) => exitChart(s) });
  const halt = new Node<TestState>({ name: "Halt", action: (s) => exitFlow(s) });
  const pass = new Node<TestState>({ name: "Pass" });

  expect(await stop.work(shared)).toEqual({ kind: "exit-chart", state: shared });
  expect(await halt.work(shared)).toEqual({ kind: "exit-flow", state: shared });
  expect(await pass.work(shared)).toEqual({ kind: "continue", state: shared });
});

// ============================================================================
// Cloning
// ============================================================================

test("clone keeps behaviour but drops links and owner", async () => {
  const chart = new Chart<TestState>({ name: "Owner", logger: silentLogger });
  const a = new Node<TestState>({
    name: "A",
    action: (s) => ({ ...s, value: s.value * 10 }),
  });
  const b = new Node<TestState>({ name: "B" });
  chart.addNode(a).addNode(b);
  a.linkForward(b);

  const copy = a.clone();

  expect(copy).not.toBe(a);
  expect(copy).toBeInstanceOf(Node);
  expect(copy.name).toBe("A");
  expect(copy.forward).toHaveLength(0);
  expect(copy.reverse.size).toBe(0);
  expect(copy.owner).toBeUndefined();
  expect(a.forward[0]).toBe(b);
  expect((await copy.run({ value: 2, executed: [] })).value).toBe(20);
});

test("trace of a plain node is its name and last duration", async () => {
  const node = new Node<TestState>({ name: "Solo" });
  await node.run({ value: 0, executed: [] });

  const trace = node.trace();

  expect(trace.path).toEqual(["Solo"]);
  expect(trace.benchmarks).toEqual([node.lastDuration]);
});
