import fs from "fs";
import { run } from "./interp.js";
import { bufferSource, collectSink } from "./io.js";
import { BENCH_CONFIG } from "./bench-config.js";

type Program = keyof typeof BENCH_CONFIG.BENCH_ITERATIONS;

interface BenchmarkResults {
  [key: string]: number;
}

const execute = (bytes: Uint8Array): void => {
  const result = run(bytes, bufferSource(""), collectSink());
  if (!result.ok) {
    throw result.error;
  }
};

const benchmark = (iterations: number, bytes: Uint8Array): number => {
  for (let i = 0; i < BENCH_CONFIG.WARMUP_ITERATIONS; i++) {
    execute(bytes);
  }

  const start = process.hrtime.bigint();
  for (let i = 0; i < iterations; i++) {
    execute(bytes);
  }
  const end = process.hrtime.bigint();

  return Number(end - start) / 1e6;
};

const main = () => {
  const programs: Program[] = ["hello", "digits", "bench"];
  const marks: BenchmarkResults = {};

  console.log("Running benchmarks (with warmup)...\n");

  for (const name of programs) {
    const bytes = fs.readFileSync(`bf/${name}.bf`);
    console.log(`Testing ${name}...`);
    marks[name] = benchmark(BENCH_CONFIG.BENCH_ITERATIONS[name], bytes);
  }

  console.log("\nBenchmark results (ms):");
  console.table(marks);
};

main();
