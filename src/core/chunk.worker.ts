/**
 * Worker thread entry for the thread runner.
 *
 * Wraps the shared source and target memory from workerData once, then
 * filters one chunk per message and replies with its index. A chunk that
 * throws is reported as "failed"; the thread stays alive for the next one.
 */

import { parentPort, workerData } from "node:worker_threads";
import { IntensityBuffer } from "./intensity-buffer.js";
import { filterRegion } from "./median.js";
import {
  parseChunkRequest,
  parseWorkerInit,
  type ChunkReply,
} from "./runners/protocol.js";

const port = parentPort;
const init = parseWorkerInit(workerData);
if (!port || !init) {
  throw new Error("chunk.worker must be started by the thread runner");
}

const source = new IntensityBuffer(init.width, init.height, init.source);
const target = new IntensityBuffer(init.width, init.height, init.target);

port.on("message", (message: unknown) => {
  const request = parseChunkRequest(message);
  if (!request) throw new Error("chunk.worker received a malformed request");

  const { chunk } = request;
  let reply: ChunkReply;
  try {
    filterRegion(source, target, chunk, init.radius);
    reply = { type: "done", index: chunk.index };
  } catch (err) {
    reply = {
      type: "failed",
      index: chunk.index,
      message: err instanceof Error ? err.message : String(err),
    };
  }
  port.postMessage(reply);
});
