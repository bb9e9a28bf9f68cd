/**
 * Shared configuration for fuzz tests.
 *
 * FUZZ_LEVEL controls test thoroughness:
 *   quick    - minimal iterations (CI/fast feedback)
 *   standard - normal iterations
 *   thorough - more iterations and larger streams
 *
 * Individual overrides:
 *   FUZZ_ITERATIONS - override iteration count
 *   FUZZ_TABLES - override the maximum number of tables per stream
 */

export type FuzzLevel = "quick" | "standard" | "thorough";

function parseLevel(val: string | undefined): FuzzLevel {
  if (val === "quick" || val === "standard" || val === "thorough") return val;
  return "standard";
}

export const FUZZ_LEVEL = parseLevel(process.env.FUZZ_LEVEL);

interface FuzzConfig {
  iterations: number;
  maxTables: number;
  maxRows: number;
  maxColumns: number;
}

const FUZZ_CONFIGS: Record<FuzzLevel, FuzzConfig> = {
  quick: { iterations: 10, maxTables: 3, maxRows: 20, maxColumns: 4 },
  standard: { iterations: 50, maxTables: 5, maxRows: 100, maxColumns: 8 },
  thorough: { iterations: 200, maxTables: 10, maxRows: 1000, maxColumns: 16 },
};

const baseConfig = FUZZ_CONFIGS[FUZZ_LEVEL];

export const config = {
  iterations: parseInt(process.env.FUZZ_ITERATIONS ?? String(baseConfig.iterations), 10),
  maxTables: parseInt(process.env.FUZZ_TABLES ?? String(baseConfig.maxTables), 10),
  maxRows: baseConfig.maxRows,
  maxColumns: baseConfig.maxColumns,
};

export interface FuzzErrorContext {
  iteration: number;
  totalIterations: number;
  seed: number;
  bytes: number;
  readBufferSize?: number;
}

export function logFuzzError(ctx: FuzzErrorContext, err: unknown): void {
  const lines = [
    ``,
    `${"=".repeat(60)}`,
    `FUZZ TEST FAILURE`,
    `${"=".repeat(60)}`,
    `Iteration:   ${ctx.iteration + 1}/${ctx.totalIterations}`,
    `Seed:        ${ctx.seed}`,
    `Bytes:       ${ctx.bytes.toLocaleString()}`,
  ];

  if (ctx.readBufferSize !== undefined) {
    lines.push(`Buffer:      ${ctx.readBufferSize}`);
  }

  lines.push(`${"-".repeat(60)}`);

  if (err instanceof Error) {
    lines.push(`Error:       ${err.message}`);
    if (err.stack) {
      lines.push(`Stack:`);
      lines.push(err.stack.split("\n").slice(1).join("\n"));
    }
  } else {
    lines.push(`Error:       ${String(err)}`);
  }

  lines.push(`${"=".repeat(60)}`);
  console.error(lines.join("\n"));
}

export function logConfig(): void {
  console.log(
    `[fuzz] level=${FUZZ_LEVEL}, iterations=${config.iterations}, maxTables=${config.maxTables}, maxRows=${config.maxRows}`,
  );
}
