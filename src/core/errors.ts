/**
 * Error taxonomy for the filter engines.
 *
 * Every error raised by the core carries a `code` so callers (the CLI, a batch
 * driver) can decide whether to skip an image or abort without parsing
 * messages. The core never exits the process.
 */

import type { Chunk } from "./chunks.js";

export type FilterErrorCode =
  | "INVALID_DIMENSIONS"
  | "INVALID_CHUNK_SIZE"
  | "INVALID_RADIUS"
  | "INVALID_CONFIG"
  | "WORKER_FAILURE";

export class FilterError extends Error {
  constructor(
    message: string,
    public readonly code: FilterErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "FilterError";
  }
}

/** Zero-area buffer, or dimensions that disagree with the pixel data. */
export class InvalidDimensionsError extends FilterError {
  constructor(
    public readonly width: number,
    public readonly height: number,
    detail = "image must have a positive width and height"
  ) {
    super(`Invalid dimensions ${width}×${height}: ${detail}`, "INVALID_DIMENSIONS");
    this.name = "InvalidDimensionsError";
  }
}

export class InvalidChunkSizeError extends FilterError {
  constructor(public readonly chunkSize: number) {
    super(`Invalid chunk size ${chunkSize}: must be a positive integer`, "INVALID_CHUNK_SIZE");
    this.name = "InvalidChunkSizeError";
  }
}

export class InvalidRadiusError extends FilterError {
  constructor(public readonly radius: number) {
    super(`Invalid radius ${radius}: must be a non-negative integer`, "INVALID_RADIUS");
    this.name = "InvalidRadiusError";
  }
}

/** A setting that could not be parsed, e.g. a non-numeric env variable. */
export class ConfigError extends FilterError {
  constructor(detail: string) {
    super(detail, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

/**
 * A parallel task faulted. Raised only after every other task of the same
 * call has settled; `chunk` is the lowest-index chunk that failed.
 */
export class WorkerFailureError extends FilterError {
  constructor(
    public readonly chunk: Chunk,
    cause: unknown
  ) {
    super(
      `Worker failed on chunk ${chunk.index} ` +
        `[${chunk.x0},${chunk.x1})×[${chunk.y0},${chunk.y1}): ${describe(cause)}`,
      "WORKER_FAILURE",
      { cause }
    );
    this.name = "WorkerFailureError";
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
