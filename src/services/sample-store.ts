import { z } from "zod";
import { SamplesNotFoundError, StoreCorruptedError } from "../errors";
import { TestCase } from "../types";
import * as fsUtils from "../utils/fs-utils";

const sampleSchema = z.object({
  in: z.string().default(""),
  out: z.string().default(""),
});

const cacheSchema = z.record(z.unknown());

type SamplesCache = z.infer<typeof cacheSchema>;

export interface SampleStoreOptions {
  cacheFile?: string;
  cache?: unknown;
}

function lookup(record: SamplesCache, key: string): unknown {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Turn one cache entry into test cases. An entry is either
 * `{ samples: [...] }` or a bare list; non-object items are skipped.
 */
function samplesFromEntry(entry: unknown): TestCase[] | undefined {
  let items: unknown;
  if (Array.isArray(entry)) {
    items = entry;
  } else {
    const wrapped = cacheSchema.safeParse(entry);
    if (!wrapped.success) return undefined;
    items = lookup(wrapped.data, "samples");
  }
  if (!Array.isArray(items)) return undefined;

  const samples: TestCase[] = [];
  for (const item of items) {
    const parsed = sampleSchema.safeParse(item);
    if (parsed.success) {
      samples.push({ input: parsed.data.in, output: parsed.data.out });
    }
  }
  return samples;
}

/**
 * Read-only access to the cached sample tests of each problem. Accepts both
 * `{ contest: { problem: entry } }` and `{ "contest/problem": entry }`.
 */
export class SampleStore {
  private cache: SamplesCache | undefined;

  constructor(private readonly options: SampleStoreOptions = {}) {
    if (options.cache !== undefined) {
      const parsed = cacheSchema.safeParse(options.cache);
      this.cache = parsed.success ? parsed.data : {};
    }
  }

  /**
   * Ordered sample tests for a problem
   * @throws SamplesNotFoundError when nothing is cached for it
   */
  async getSamples(contestId: string, problemId: string): Promise<TestCase[]> {
    const cache = await this.loadCache();

    const candidates: unknown[] = [];
    const contestEntry = cacheSchema.safeParse(lookup(cache, contestId));
    if (contestEntry.success) {
      candidates.push(lookup(contestEntry.data, problemId));
    }
    candidates.push(lookup(cache, `${contestId}/${problemId}`));

    for (const candidate of candidates) {
      const samples = samplesFromEntry(candidate);
      if (samples && samples.length > 0) return samples;
    }

    throw new SamplesNotFoundError(contestId, problemId);
  }

  private async loadCache(): Promise<SamplesCache> {
    if (this.cache) return this.cache;

    const cacheFile = this.options.cacheFile;
    if (!cacheFile || !(await fsUtils.fileExists(cacheFile))) {
      this.cache = {};
      return this.cache;
    }

    let payload: unknown;
    try {
      payload = JSON.parse(await fsUtils.readFile(cacheFile));
    } catch (error) {
      throw new StoreCorruptedError(
        cacheFile,
        error instanceof Error ? error.message : String(error)
      );
    }

    const parsed = cacheSchema.safeParse(payload);
    this.cache = parsed.success ? parsed.data : {};
    return this.cache;
  }
}
