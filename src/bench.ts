import fs from "fs";
import { BENCH_CONFIG } from "./config.js";
import { BufferInput, sinkOutput } from "./io.js";
import { createInterpreter, type InterpreterOptions } from "./interpreter.js";

interface BenchmarkResults {
  [key: string]: { optimized: number; raw: number };
}

// echo.bf copies its input through
const echoInput = new TextEncoder().encode("the quick brown fox\n".repeat(20));

const benchmark = (
  source: Buffer,
  options: InterpreterOptions,
  iterations: number,
  input: Uint8Array = new Uint8Array(0),
): number => {
  const once = () => createInterpreter(source, options).run(new BufferInput(input), sinkOutput());

  // 预热运行
  for (let i = 0; i < BENCH_CONFIG.WARMUP_ITERATIONS; i++) {
    once();
  }

  const start = process.hrtime.bigint();
  for (let i = 0; i < iterations; i++) {
    once();
  }
  const end = process.hrtime.bigint();

  return Number(end - start) / 1e6;
};

const main = () => {
  const hello = fs.readFileSync("bf/hello.bf");
  const nested = fs.readFileSync("bf/nested.bf");
  const echo = fs.readFileSync("bf/echo.bf");
  const { BENCH_ITERATIONS } = BENCH_CONFIG;

  const marks: BenchmarkResults = {};

  console.log("Running benchmarks (with warmup)...\n");

  console.log("Testing 'Hello World!'...");
  marks["hello"] = {
    optimized: benchmark(hello, { optimize: true }, BENCH_ITERATIONS.hello),
    raw: benchmark(hello, { optimize: false }, BENCH_ITERATIONS.hello),
  };

  console.log("Testing nested loops...");
  marks["nested"] = {
    optimized: benchmark(nested, { optimize: true }, BENCH_ITERATIONS.nested),
    raw: benchmark(nested, { optimize: false }, BENCH_ITERATIONS.nested),
  };

  console.log("Testing echo...");
  marks["echo"] = {
    optimized: benchmark(echo, { optimize: true }, BENCH_ITERATIONS.echo, echoInput),
    raw: benchmark(echo, { optimize: false }, BENCH_ITERATIONS.echo, echoInput),
  };

  console.log("\nBenchmark results (ms):");
  console.table(marks);
};

main();
