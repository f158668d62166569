import { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import type { FeedSocket } from './types.js';

function rawToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

// Adapts `ws` to FeedSocket: text frames only, and errors after the owner has
// detached its listeners are not rethrown by EventEmitter.
class WsFeedSocket extends EventEmitter implements FeedSocket {
  private readonly ws: WebSocket;

  constructor(url: string, handshakeTimeoutMs: number) {
    super();
    this.ws = new WebSocket(url, { handshakeTimeout: handshakeTimeoutMs });
    this.ws.on('open', () => this.emit('open'));
    this.ws.on('message', (data) => this.emit('message', rawToString(data)));
    this.ws.on('ping', () => this.emit('ping'));
    this.ws.on('close', (code, reason) => this.emit('close', code, reason.toString('utf8')));
    this.ws.on('error', (err) => {
      if (this.listenerCount('error') > 0) this.emit('error', err);
    });
  }

  send(data: string): void {
    if (this.ws.readyState === WebSocket.OPEN) this.ws.send(data);
  }

  close(code?: number, reason?: string): void {
    this.ws.close(code, reason);
  }

  terminate(): void {
    this.ws.terminate();
  }
}

export function createWsSocket(url: string, handshakeTimeoutMs = 10_000): FeedSocket {
  return new WsFeedSocket(url, handshakeTimeoutMs);
}
