// src/config.ts

/** Number of cells on the tape. */
export const TAPE_SIZE = 30000;

export const BENCH_CONFIG = {
  WARMUP_ITERATIONS: 3,
  BENCH_ITERATIONS: {
    hello: 100,
    nested: 1,
    echo: 50,
  },
} as const;
