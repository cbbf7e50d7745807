import { Command, InvalidArgumentError } from "commander";

import { DEFAULT_BENCH_SIZES, DEFAULT_CHAINS_PER_RACK, WORKLOAD_NAMES, isWorkloadName, type WorkloadName } from "./workloads.js";

export type BenchCliArgs = {
  sizes: number[];
  workloads: WorkloadName[];
  perRack: number;
  iterations: number;
  warmupIterations: number;
  outDir?: string;
};

const positive = (flag: string) => (raw: string) => {
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n <= 0) throw new InvalidArgumentError(`invalid ${flag} value: ${raw}`);
  return n;
};

const nonNegative = (flag: string) => (raw: string) => {
  const n = Number(raw);
  if (!Number.isSafeInteger(n) || n < 0) throw new InvalidArgumentError(`invalid ${flag} value: ${raw}`);
  return n;
};

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function parseSizes(raw: string): number[] {
  const parts = splitList(raw);
  if (parts.length === 0) throw new InvalidArgumentError("expected a comma-separated list of track sizes");
  const invalid = parts.filter((p) => !Number.isSafeInteger(Number(p)) || Number(p) <= 0);
  if (invalid.length > 0) throw new InvalidArgumentError(`invalid size(s): ${invalid.join(", ")}`);
  return parts.map(Number);
}

function parseWorkloads(raw: string): WorkloadName[] {
  const parts = splitList(raw);
  const invalid = parts.filter((p) => !isWorkloadName(p));
  if (parts.length === 0 || invalid.length > 0) {
    throw new InvalidArgumentError(`invalid workload(s): ${invalid.join(", ") || raw} (allowed: ${WORKLOAD_NAMES.join(", ")})`);
  }
  return Array.from(new Set(parts.filter(isWorkloadName)));
}

/** `BENCH_ITERATIONS` and `BENCH_WARMUP` seed the timing flags. */
function envDefault(env: NodeJS.ProcessEnv, key: string, parse: (raw: string) => number): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  try {
    return parse(raw.trim());
  } catch (err) {
    throw new Error(`${key}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

export function parseBenchCliArgs(opts: { argv?: string[]; env?: NodeJS.ProcessEnv } = {}): BenchCliArgs {
  const argv = opts.argv ?? process.argv.slice(2);
  const env = opts.env ?? process.env;

  const program = new Command()
    .name("fxrack-bench")
    .description("Time hierarchy operations against an in-memory host.")
    .exitOverride()
    .option("--sizes <n1,n2,...>", `operations per workload (default: ${DEFAULT_BENCH_SIZES.join(",")})`, parseSizes)
    .option("--workloads <w1,w2,...>", `workloads to run (allowed: ${WORKLOAD_NAMES.join(", ")})`, parseWorkloads)
    .option("--per-rack <n>", `chains per rack in chain-fanout (default: ${DEFAULT_CHAINS_PER_RACK})`, positive("--per-rack"))
    .option("--iterations <n>", "timed runs per workload and size", positive("--iterations"))
    .option("--warmup <n>", "untimed runs before the timed ones", nonNegative("--warmup"))
    .option("--out-dir <dir>", "directory for one JSON report per workload and size");

  program.parse(argv, { from: "user" });
  const parsed = program.opts<{
    sizes?: number[];
    workloads?: WorkloadName[];
    perRack?: number;
    iterations?: number;
    warmup?: number;
    outDir?: string;
  }>();

  const iterations = parsed.iterations ?? envDefault(env, "BENCH_ITERATIONS", positive("--iterations")) ?? 1;
  const warmupIterations =
    parsed.warmup ?? envDefault(env, "BENCH_WARMUP", nonNegative("--warmup")) ?? (iterations > 1 ? 1 : 0);

  return {
    sizes: parsed.sizes ?? [...DEFAULT_BENCH_SIZES],
    workloads: parsed.workloads ?? [...WORKLOAD_NAMES],
    perRack: parsed.perRack ?? DEFAULT_CHAINS_PER_RACK,
    iterations,
    warmupIterations,
    outDir: parsed.outDir === undefined || parsed.outDir === "" ? undefined : parsed.outDir,
  };
}
