// src/bench-config.ts
export const BENCH_CONFIG = {
  WARMUP_ITERATIONS: 3,
  BENCH_ITERATIONS: {
    hello: 200,
    digits: 200,
    bench: 5,
  },
} as const;
