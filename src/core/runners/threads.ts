/**
 * Thread runner: a worker_threads pool that lives for exactly one
 * parallel-filter call.
 *
 * Features:
 * - Threads are spawned lazily, never more than min(maxThreads, chunks)
 * - Input and output memory is shared once through workerData, not copied
 *   per chunk
 * - A thread that errors or exits fails only its in-flight chunk and is
 *   replaced on the next dispatch, so every submitted chunk settles
 * - A thread that dies before its first reply (e.g. the entry failed to
 *   load) fails the queued chunks too, instead of respawning once per chunk
 * - close() terminates every thread the session spawned
 */

import { Worker } from "node:worker_threads";
import type { Chunk } from "../chunks.js";
import { DEFAULT_CONFIG, resolveThreadCount } from "../config.js";
import {
  parseChunkReply,
  type ChunkRequest,
  type WorkerInit,
} from "./protocol.js";
import type { ChunkJob, ChunkRunner, ChunkRunnerFactory } from "./types.js";

/**
 * Compiled worker entry, dist/src/core/chunk.worker.js. Loaded from the
 * TypeScript sources (as under Vitest), this module points at the build
 * output instead, so `npm run build` must have run.
 */
export const DEFAULT_WORKER_URL = import.meta.url.endsWith(".ts")
  ? new URL("../../../dist/src/core/chunk.worker.js", import.meta.url)
  : new URL("../chunk.worker.js", import.meta.url);

export interface ThreadRunnerOptions {
  /** 0 = one thread per available core (default DEFAULT_CONFIG.maxThreads). */
  maxThreads?: number;
  /** Worker entry speaking the protocol in protocol.ts. */
  workerUrl?: URL;
}

interface PendingChunk {
  chunk: Chunk;
  resolve: () => void;
  reject: (error: Error) => void;
}

interface PoolThread {
  worker: Worker;
  current: PendingChunk | null;
  /** Set once the thread has answered any chunk. */
  replied: boolean;
}

export function threadRunner({
  maxThreads = DEFAULT_CONFIG.maxThreads,
  workerUrl = DEFAULT_WORKER_URL,
}: ThreadRunnerOptions = {}): ChunkRunnerFactory {
  const size = resolveThreadCount(maxThreads);
  return (job) => new ThreadPool(job, size, workerUrl);
}

class ThreadPool implements ChunkRunner {
  private readonly init: WorkerInit;
  private readonly threads = new Set<PoolThread>();
  private readonly queue: PendingChunk[] = [];
  private closed = false;

  constructor(
    job: ChunkJob,
    private readonly size: number,
    private readonly workerUrl: URL
  ) {
    if (!job.target.isShared()) {
      throw new TypeError("thread runner needs a target backed by SharedArrayBuffer");
    }
    // One copy at most, and only when the caller's input is not shared yet.
    const source = job.source.toShared();
    this.init = {
      width: source.width,
      height: source.height,
      radius: job.radius,
      source: source.data,
      target: job.target.data,
    };
  }

  run(chunk: Chunk): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error("thread runner session is closed"));
    }
    return new Promise<void>((resolve, reject) => {
      this.queue.push({ chunk, resolve, reject });
      this.dispatch();
    });
  }

  async close(): Promise<void> {
    this.closed = true;
    const threads = [...this.threads];
    this.threads.clear();

    const abandoned = [
      ...this.queue.splice(0),
      ...threads.flatMap((t) => (t.current ? [t.current] : [])),
    ];
    for (const pending of abandoned) {
      pending.reject(new Error(`chunk ${pending.chunk.index} abandoned: runner closed`));
    }

    await Promise.all(threads.map((t) => t.worker.terminate()));
  }

  private dispatch(): void {
    while (!this.closed && this.queue.length > 0) {
      const idle = this.idleThread();
      if (!idle && this.threads.size >= this.size) return;

      const pending = this.queue.shift();
      if (!pending) return;

      let thread: PoolThread;
      try {
        thread = idle ?? this.spawn();
      } catch (err) {
        pending.reject(err instanceof Error ? err : new Error(String(err)));
        continue;
      }
      thread.current = pending;
      const request: ChunkRequest = { type: "chunk", chunk: pending.chunk };
      thread.worker.postMessage(request);
    }
  }

  private idleThread(): PoolThread | undefined {
    for (const thread of this.threads) {
      if (!thread.current) return thread;
    }
    return undefined;
  }

  private spawn(): PoolThread {
    const worker = new Worker(this.workerUrl, { workerData: this.init });
    const thread: PoolThread = { worker, current: null, replied: false };

    worker.on("message", (message: unknown) => this.handleReply(thread, message));
    worker.on("error", (err: Error) => this.retire(thread, err));
    worker.on("exit", (code: number) =>
      this.retire(thread, new Error(`worker thread exited with code ${code}`))
    );

    this.threads.add(thread);
    return thread;
  }

  private handleReply(thread: PoolThread, message: unknown): void {
    const pending = thread.current;
    if (!pending) return;
    thread.current = null;
    thread.replied = true;

    const reply = parseChunkReply(message);
    if (!reply || reply.index !== pending.chunk.index) {
      pending.reject(new Error(`unexpected reply for chunk ${pending.chunk.index}`));
    } else if (reply.type === "done") {
      pending.resolve();
    } else {
      pending.reject(new Error(reply.message));
    }
    this.dispatch();
  }

  /** Drop a dead thread, failing whatever it was working on. */
  private retire(thread: PoolThread, error: Error): void {
    if (!this.threads.delete(thread)) return; // "error" is followed by "exit"
    const pending = thread.current;
    thread.current = null;
    pending?.reject(error);
    if (!thread.replied) {
      for (const queued of this.queue.splice(0)) queued.reject(error);
    }
    this.dispatch();
  }
}
