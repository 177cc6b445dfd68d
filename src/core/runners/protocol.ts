/**
 * Messages exchanged between the thread runner and `chunk.worker.ts`.
 *
 * Startup (main → worker, via workerData):
 *   { width, height, radius, source, target }
 *   source/target are Uint8ClampedArray views over SharedArrayBuffers, so the
 *   structured clone shares the memory instead of copying it.
 *
 * Per chunk (main → worker):   { type: "chunk", chunk }
 * Per chunk (worker → main):   { type: "done", index }
 *                              { type: "failed", index, message }
 */

import type { Chunk } from "../chunks.js";

export interface WorkerInit {
  width: number;
  height: number;
  radius: number;
  source: Uint8ClampedArray;
  target: Uint8ClampedArray;
}

export interface ChunkRequest {
  type: "chunk";
  chunk: Chunk;
}

export type ChunkReply =
  | { type: "done"; index: number }
  | { type: "failed"; index: number; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function parseWorkerInit(value: unknown): WorkerInit | null {
  if (!isRecord(value)) return null;
  const { width, height, radius, source, target } = value;
  if (
    typeof width !== "number" ||
    typeof height !== "number" ||
    typeof radius !== "number" ||
    !(source instanceof Uint8ClampedArray) ||
    !(target instanceof Uint8ClampedArray)
  ) {
    return null;
  }
  return { width, height, radius, source, target };
}

export function parseChunkRequest(value: unknown): ChunkRequest | null {
  if (!isRecord(value) || value.type !== "chunk") return null;
  const chunk = value.chunk;
  if (!isRecord(chunk)) return null;
  const { index, x0, y0, x1, y1 } = chunk;
  if (
    typeof index !== "number" ||
    typeof x0 !== "number" ||
    typeof y0 !== "number" ||
    typeof x1 !== "number" ||
    typeof y1 !== "number"
  ) {
    return null;
  }
  return { type: "chunk", chunk: { index, x0, y0, x1, y1 } };
}

export function parseChunkReply(value: unknown): ChunkReply | null {
  if (!isRecord(value)) return null;
  const { type, index, message } = value;
  if (typeof index !== "number") return null;
  if (type === "done") return { type: "done", index };
  if (type === "failed" && typeof message === "string") return { type: "failed", index, message };
  return null;
}
