import { constants, createDeflate } from 'node:zlib';
import { describe, expect, it } from 'vitest';
import { FrameDecompressor } from '../FrameDecompressor';
import { createCompressor } from './zlibStream';

describe('FrameDecompressor', () => {
  it('decodes a message that arrives in one frame', async () => {
    const compress = createCompressor();
    const decompressor = new FrameDecompressor();

    const frame = await compress({ op: 10, d: { heartbeat_interval: 45000 } });

    expect(frame.subarray(-4)).toEqual(Buffer.from([0x00, 0x00, 0xff, 0xff]));
    await expect(decompressor.push({ binary: true, data: frame })).resolves.toEqual({
      kind: 'message',
      payload: { op: 10, d: { heartbeat_interval: 45000 } }
    });
  });

  it('buffers partial frames until the flush marker arrives', async () => {
    const compress = createCompressor();
    const decompressor = new FrameDecompressor();
    const frame = await compress({ op: 0, s: 1, t: 'READY', d: { session_id: 'abc' } });
    const head = frame.subarray(0, 5);
    const tail = frame.subarray(5);

    await expect(decompressor.push({ binary: true, data: head })).resolves.toEqual({ kind: 'incomplete' });
    expect(decompressor.bufferedBytes).toBe(5);

    await expect(decompressor.push({ binary: true, data: tail })).resolves.toEqual({
      kind: 'message',
      payload: { op: 0, s: 1, t: 'READY', d: { session_id: 'abc' } }
    });
    expect(decompressor.bufferedBytes).toBe(0);
  });

  it('keeps one inflate context across messages', async () => {
    const compress = createCompressor();
    const decompressor = new FrameDecompressor();
    const first = await compress({ op: 11 });
    const second = await compress({ op: 1, d: 7 });

    await expect(decompressor.push({ binary: true, data: first })).resolves.toEqual({
      kind: 'message',
      payload: { op: 11 }
    });
    await expect(decompressor.push({ binary: true, data: second })).resolves.toEqual({
      kind: 'message',
      payload: { op: 1, d: 7 }
    });
  });

  it('cannot continue a stream after reset', async () => {
    const compress = createCompressor();
    const decompressor = new FrameDecompressor();
    const first = await compress({ op: 11 });
    const second = await compress({ op: 11 });

    await decompressor.push({ binary: true, data: first });
    decompressor.reset();
    const result = await decompressor.push({ binary: true, data: second });

    expect(result.kind).toBe('dropped');
    expect(decompressor.droppedFrames).toBe(1);
  });

  it('drops a corrupt frame and recovers with a fresh stream', async () => {
    const decompressor = new FrameDecompressor();
    const corrupt = Buffer.from([0x01, 0x02, 0x03, 0x04, 0x00, 0x00, 0xff, 0xff]);

    const dropped = await decompressor.push({ binary: true, data: corrupt });
    expect(dropped.kind).toBe('dropped');
    expect(decompressor.droppedFrames).toBe(1);

    const frame = await createCompressor()({ op: 11 });
    await expect(decompressor.push({ binary: true, data: frame })).resolves.toEqual({
      kind: 'message',
      payload: { op: 11 }
    });
  });

  it('drops reassembled data that is not JSON', async () => {
    const compress = createCompressor();
    const decompressor = new FrameDecompressor();
    const deflate = createDeflate();
    const chunks: Buffer[] = [];
    deflate.on('data', (chunk: Buffer) => chunks.push(chunk));
    await new Promise<void>((resolve) => {
      deflate.write('not json');
      deflate.flush(constants.Z_SYNC_FLUSH, () => setImmediate(resolve));
    });

    const result = await decompressor.push({ binary: true, data: Buffer.concat(chunks) });
    expect(result.kind).toBe('dropped');

    await expect(decompressor.push({ binary: true, data: await compress({ op: 11 }) })).resolves.toEqual({
      kind: 'message',
      payload: { op: 11 }
    });
  });

  it('parses text frames directly', async () => {
    const decompressor = new FrameDecompressor();

    await expect(decompressor.push({ binary: false, data: '{"op":11}' })).resolves.toEqual({
      kind: 'message',
      payload: { op: 11 }
    });

    const result = await decompressor.push({ binary: false, data: '{"op":' });
    expect(result.kind).toBe('dropped');
    expect(decompressor.droppedFrames).toBe(1);
  });
});
