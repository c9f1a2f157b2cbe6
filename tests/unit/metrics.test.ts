import { describe, it } from "mocha";
import { expect } from "chai";

import { SearchMetricsRecorder } from "../../src/metrics.js";

/** Clock returning the given instants in sequence. */
function scriptedClock(...instants: number[]): () => number {
  const queue = [...instants];
  return () => queue.shift() ?? 0;
}

describe("SearchMetricsRecorder", () => {
  it("counts successes and failures per operation and engine", async () => {
    const metrics = new SearchMetricsRecorder({ now: scriptedClock(0, 120, 0, 30) });

    expect(await metrics.measure("embed", async () => "ok")).to.equal("ok");
    try {
      await metrics.measure("webFallback", async () => {
        throw new Error("offline");
      }, "tavily");
      expect.fail("measure should rethrow");
    } catch (error) {
      expect((error as Error).message).to.equal("offline");
    }
    metrics.observe("engineSearch", true, 7_500, "brave");

    const snapshot = metrics.snapshot();
    expect(snapshot.operations).to.deep.equal([
      { operation: "embed", engine: null, success: 1, failure: 0 },
      { operation: "engineSearch", engine: "brave", success: 1, failure: 0 },
      { operation: "webFallback", engine: "tavily", success: 0, failure: 1 },
    ]);
  });

  it("buckets latencies by upper bound", () => {
    const metrics = new SearchMetricsRecorder();
    metrics.observe("engineSearch", true, 50, "a");
    metrics.observe("engineSearch", true, 51, "a");
    metrics.observe("engineSearch", false, 90_000, "b");
    metrics.observe("merge", true, -5);

    const [engineSearch, merge] = metrics.snapshot().latencyBuckets;
    expect(engineSearch.operation).to.equal("engineSearch");
    expect(engineSearch.buckets.filter((bucket) => bucket.count > 0)).to.deep.equal([
      { bucket: "le_00050ms", count: 1 },
      { bucket: "le_00100ms", count: 1 },
      { bucket: "gt_60000ms", count: 1 },
    ]);
    expect(engineSearch.buckets).to.have.length(11);
    expect(merge.buckets.filter((bucket) => bucket.count > 0)).to.deep.equal([{ bucket: "le_00050ms", count: 1 }]);
  });
});
