import { parentPort, workerData } from 'node:worker_threads';

import { z } from 'zod';

import { FrameCompositor } from '../frame-compositor.js';
import { isWorkerRequest, toFrameFailedMessage, type WorkerResponse } from './protocol.js';

const workerDataSchema = z
  .object({
    textCacheEntries: z.number().int().positive().optional(),
  })
  .default({});

if (!parentPort) {
  throw new Error('Frame compositor worker must be spawned as a worker thread');
}

const port = parentPort;
const compositor = new FrameCompositor(workerDataSchema.parse(workerData));

port.on('message', (message: unknown) => {
  if (!isWorkerRequest(message)) {
    return;
  }

  if (message.type === 'shutdown') {
    port.close();
    return;
  }

  const { task } = message;
  let response: WorkerResponse;

  try {
    response = { type: 'frameComposited', index: task.index, bitmap: compositor.composite(task) };
  } catch (error) {
    response = toFrameFailedMessage(task.index, error);
  }

  port.postMessage(response);
});
