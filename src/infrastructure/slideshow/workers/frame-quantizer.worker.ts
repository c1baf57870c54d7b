import { parentPort } from 'node:worker_threads';

import type { Frame, IndexedFrame, Palette } from '@domain/slideshow/index.js';

import { quantize, type QuantizeOptions } from '../quantization/quantizer.js';

export interface QuantizeFrameMessage {
  readonly type: 'quantize';
  readonly id: number;
  readonly frame: Frame;
  readonly options: QuantizeOptions;
  readonly sharedPalette?: Palette;
}

export interface ShutdownMessage {
  readonly type: 'shutdown';
}

export type QuantizerWorkerMessage = QuantizeFrameMessage | ShutdownMessage;

export type QuantizerReply =
  | { readonly type: 'quantized'; readonly id: number; readonly frame: IndexedFrame }
  | { readonly type: 'failed'; readonly id: number; readonly message: string };

if (!parentPort) {
  throw new Error('Frame quantizer worker must be spawned as a worker thread');
}

parentPort.on('message', (message: QuantizerWorkerMessage) => {
  if (message.type === 'shutdown') {
    parentPort?.close();
    return;
  }

  const { id, frame, options, sharedPalette } = message;

  try {
    const indexed = quantize(frame, options, sharedPalette);
    const reply: QuantizerReply = { type: 'quantized', id, frame: indexed };
    const { buffer } = indexed.indices;
    parentPort?.postMessage(reply, buffer instanceof ArrayBuffer ? [buffer] : []);
  } catch (error) {
    const reply: QuantizerReply = {
      type: 'failed',
      id,
      message: error instanceof Error ? error.message : String(error),
    };
    parentPort?.postMessage(reply);
  }
});
