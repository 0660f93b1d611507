import { constants, createInflate } from 'node:zlib';
import type { Inflate } from 'node:zlib';
import { ZLIB_SUFFIX } from '@/constants';
import { toError } from '@/errors';
import type { RawFrame } from './socket';

export type DecodeResult =
  | { kind: 'message'; payload: unknown }
  | { kind: 'incomplete' }
  | { kind: 'dropped'; error: Error };

interface InflateContext {
  stream: Inflate;
  output: Buffer[];
  lastError: Error | null;
}

function createContext(): InflateContext {
  const context: InflateContext = {
    stream: createInflate({ flush: constants.Z_SYNC_FLUSH, chunkSize: 64 * 1024 }),
    output: [],
    lastError: null
  };

  context.stream.on('data', (chunk: Buffer) => {
    context.output.push(chunk);
  });
  // Without a listener an inflate error would be thrown as an uncaught exception.
  context.stream.on('error', (error) => {
    context.lastError = error;
  });

  return context;
}

function endsWithSuffix(data: Buffer): boolean {
  return data.length >= ZLIB_SUFFIX.length && data.subarray(data.length - ZLIB_SUFFIX.length).equals(ZLIB_SUFFIX);
}

/**
 * Turns gateway frames into JSON documents.
 *
 * Binary frames belong to one zlib stream that lives as long as the
 * connection, so the inflate context is shared by every message and only
 * replaced on `reset()` or after a failure.
 */
export class FrameDecompressor {
  private context: InflateContext = createContext();
  private chunks: Buffer[] = [];
  private buffered = 0;
  private dropped = 0;

  get bufferedBytes(): number {
    return this.buffered;
  }

  get droppedFrames(): number {
    return this.dropped;
  }

  async push(frame: RawFrame): Promise<DecodeResult> {
    if (!frame.binary) {
      return this.parse(frame.data, null);
    }

    this.chunks.push(frame.data);
    this.buffered += frame.data.length;

    if (!endsWithSuffix(frame.data)) {
      return { kind: 'incomplete' };
    }

    const data = this.chunks.length === 1 ? frame.data : Buffer.concat(this.chunks, this.buffered);
    this.chunks = [];
    this.buffered = 0;

    const context = this.context;
    try {
      const text = await this.inflate(context, data);
      return this.parse(text, context);
    } catch (error) {
      return this.drop(error, context);
    }
  }

  reset(): void {
    this.chunks = [];
    this.buffered = 0;
    this.replaceContext();
  }

  private inflate(context: InflateContext, data: Buffer): Promise<string> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error): void => reject(error);
      context.stream.once('error', onError);

      context.stream.write(data, (error) => {
        context.stream.off('error', onError);
        if (error) {
          reject(error);
          return;
        }
        // Output for this write is emitted before the callback; collect it on the next tick.
        process.nextTick(() => {
          const output = Buffer.concat(context.output);
          context.output = [];
          resolve(output.toString('utf8'));
        });
      });
    });
  }

  private parse(text: string, context: InflateContext | null): DecodeResult {
    try {
      const payload: unknown = JSON.parse(text);
      return { kind: 'message', payload };
    } catch (error) {
      return this.drop(error, context);
    }
  }

  private drop(error: unknown, context: InflateContext | null): DecodeResult {
    const reason = toError(error);
    if (context === null) {
      this.dropped++;
    } else if (context === this.context) {
      // A context replaced by reset() while inflating is already gone.
      this.dropped++;
      this.replaceContext();
    }
    return { kind: 'dropped', error: reason };
  }

  private replaceContext(): void {
    this.context.stream.removeAllListeners('data');
    this.context.stream.destroy();
    this.context = createContext();
  }
}
