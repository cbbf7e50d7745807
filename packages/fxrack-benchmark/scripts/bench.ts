import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { measureWorkload } from "../src/index.js";
import { parseBenchCliArgs } from "../src/cli.js";

const defaultOutDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../../benchmarks/memory");

async function main() {
  const args = parseBenchCliArgs();
  const outDir = path.resolve(args.outDir ?? defaultOutDir);
  await mkdir(outDir, { recursive: true });

  for (const name of args.workloads) {
    for (const size of args.sizes) {
      const report = measureWorkload(name, size, {
        perRack: args.perRack,
        iterations: args.iterations,
        warmupIterations: args.warmupIterations,
      });
      const outFile = path.join(outDir, `${report.workload}.json`);
      await writeFile(outFile, JSON.stringify({ ...report, host: "memory", createdAt: new Date().toISOString() }, null, 2) + "\n");
      console.log(
        `${report.workload}: median ${report.medianMs.toFixed(2)} ms, p95 ${report.p95Ms.toFixed(2)} ms (${report.opsPerSec.toFixed(0)} ops/s) -> ${outFile}`
      );
    }
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
