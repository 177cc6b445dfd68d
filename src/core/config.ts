import { availableParallelism } from "node:os";
import { assertChunkSize } from "./chunks.js";
import { ConfigError, InvalidRadiusError } from "./errors.js";

export interface FilterConfig {
  /** Chebyshev radius of the neighborhood; 1 means a 3×3 window. */
  radius: number;
  /** Edge length of a parallel chunk, in pixels. */
  chunkSize: number;
  /** Upper bound on worker threads per parallel call. 0 = one per available core. */
  maxThreads: number;
}

export const DEFAULT_CONFIG: FilterConfig = {
  radius: 1,
  chunkSize: 45,
  maxThreads: 0,
};

export function assertRadius(radius: number): void {
  if (!Number.isInteger(radius) || radius < 0) throw new InvalidRadiusError(radius);
}

/** Resolve `maxThreads` (0 = auto) to a concrete thread count ≥ 1. */
export function resolveThreadCount(maxThreads: number): number {
  if (!Number.isInteger(maxThreads) || maxThreads < 0) {
    throw new ConfigError(`maxThreads must be a non-negative integer, got ${maxThreads}`);
  }
  return maxThreads === 0 ? availableParallelism() : maxThreads;
}

/**
 * Merge overrides onto DEFAULT_CONFIG and validate the result.
 * Throws InvalidRadiusError / InvalidChunkSizeError / ConfigError.
 */
export function resolveConfig(overrides: Partial<FilterConfig> = {}): FilterConfig {
  const config = { ...DEFAULT_CONFIG, ...overrides };
  assertRadius(config.radius);
  assertChunkSize(config.chunkSize);
  resolveThreadCount(config.maxThreads);
  return config;
}

/**
 * Read the filter settings from the environment:
 *
 *   MEDIAN_RADIUS      default: 1
 *   MEDIAN_CHUNK_SIZE  default: 45
 *   MEDIAN_THREADS     default: 0 (one per core)
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): FilterConfig {
  return resolveConfig({
    radius: readInteger(env, "MEDIAN_RADIUS", DEFAULT_CONFIG.radius),
    chunkSize: readInteger(env, "MEDIAN_CHUNK_SIZE", DEFAULT_CONFIG.chunkSize),
    maxThreads: readInteger(env, "MEDIAN_THREADS", DEFAULT_CONFIG.maxThreads),
  });
}

function readInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (Number.isNaN(value)) throw new ConfigError(`${name} is not a number: "${raw}"`);
  return value;
}
