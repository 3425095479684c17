import * as path from "path";
import { expect } from "chai";
import { SamplesNotFoundError, StoreCorruptedError } from "../src/errors";
import { SampleStore } from "../src/services/sample-store";
import { expectRejection, makeTempDir, removeDir, writeFiles } from "./helpers";

describe("SampleStore", () => {
  it("should read samples nested under the contest", async () => {
    const store = new SampleStore({
      cache: {
        abc100: {
          "1": {
            samples: [
              { in: "1 2\n", out: "3\n" },
              { in: "5 5\n", out: "10\n" },
            ],
          },
        },
      },
    });

    expect(await store.getSamples("abc100", "1")).to.deep.equal([
      { input: "1 2\n", output: "3\n" },
      { input: "5 5\n", output: "10\n" },
    ]);
  });

  it("should fall back to a contest/problem key holding a bare list", async () => {
    const store = new SampleStore({
      cache: {
        abc100: { "1": { samples: [{ in: "x", out: "y" }] } },
        "abc100/2": [{ in: "7\n", out: "49\n" }],
      },
    });

    expect(await store.getSamples("abc100", "2")).to.deep.equal([{ input: "7\n", output: "49\n" }]);
  });

  it("should default missing fields and skip items that are not objects", async () => {
    const store = new SampleStore({
      cache: { abc1: { "3": ["junk", 4, null, { in: "only input\n" }, { out: "only output\n" }] } },
    });

    expect(await store.getSamples("abc1", "3")).to.deep.equal([
      { input: "only input\n", output: "" },
      { input: "", output: "only output\n" },
    ]);
  });

  it("should throw when nothing usable is cached", async () => {
    const store = new SampleStore({
      cache: { abc1: { "1": { samples: [] }, "2": { notes: "none" } } },
    });

    const error = await expectRejection(store.getSamples("abc1", "9"), SamplesNotFoundError);
    expect(error.message).to.equal("No cached samples found for contest='abc1', problem_id='9'.");
    await expectRejection(store.getSamples("abc1", "1"), SamplesNotFoundError);
    await expectRejection(store.getSamples("abc1", "2"), SamplesNotFoundError);
  });

  it("should ignore inherited object keys", async () => {
    const store = new SampleStore({ cache: {} });
    await expectRejection(store.getSamples("constructor", "toString"), SamplesNotFoundError);
  });

  it("should treat a cache that is not an object as empty", async () => {
    const store = new SampleStore({ cache: ["abc1"] });
    await expectRejection(store.getSamples("abc1", "1"), SamplesNotFoundError);
  });

  describe("from a file", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it("should load the cache file", async () => {
      await writeFiles(dir, {
        "samples_cache.json": JSON.stringify({ arc5: { "12": { samples: [{ in: "a", out: "b" }] } } }),
      });
      const store = new SampleStore({ cacheFile: path.join(dir, "samples_cache.json") });

      expect(await store.getSamples("arc5", "12")).to.deep.equal([{ input: "a", output: "b" }]);
    });

    it("should behave as empty when the file is missing", async () => {
      const store = new SampleStore({ cacheFile: path.join(dir, "absent.json") });
      await expectRejection(store.getSamples("arc5", "12"), SamplesNotFoundError);
    });

    it("should report a cache file that is not JSON", async () => {
      await writeFiles(dir, { "samples_cache.json": "{" });
      const cacheFile = path.join(dir, "samples_cache.json");
      const store = new SampleStore({ cacheFile });

      const error = await expectRejection(store.getSamples("arc5", "12"), StoreCorruptedError);
      expect(error.filePath).to.equal(cacheFile);
    });
  });
});
