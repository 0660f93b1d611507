import WebSocket from 'ws';
import type { RawData } from 'ws';

export type RawFrame = { binary: true; data: Buffer } | { binary: false; data: string };

export interface GatewaySocketHandlers {
  open(): void;
  message(frame: RawFrame): void;
  close(code: number, reason: string): void;
  error(error: Error): void;
}

/** The part of a websocket the gateway session talks to. */
export interface GatewaySocket {
  readonly isOpen: boolean;
  send(data: string): void;
  close(code: number, reason?: string): void;
}

export type SocketFactory = (url: string, handlers: GatewaySocketHandlers) => GatewaySocket;

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export const createWebSocket: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url, { perMessageDeflate: false });

  ws.on('open', () => handlers.open());
  ws.on('message', (data, isBinary) => {
    const buffer = toBuffer(data);
    handlers.message(isBinary ? { binary: true, data: buffer } : { binary: false, data: buffer.toString('utf8') });
  });
  ws.on('close', (code, reason) => handlers.close(code, reason.toString('utf8')));
  ws.on('error', (error) => handlers.error(error));

  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send(data) {
      ws.send(data);
    },
    close(code, reason) {
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else if (ws.readyState === WebSocket.OPEN) {
        ws.close(code, reason);
      }
    }
  };
};
