/**
 * rawConnection - Bare TCP peer for driving the reliable listener byte by byte
 */

import { once } from 'node:events';
import { connect, type Socket } from 'node:net';

import { JsonFrameDecoder, isRecord } from '@/protocol/index.js';

import { assertEventually } from './assertions.js';

export interface RawConnection {
  socket: Socket;
  /** Write raw text exactly as given */
  send: (text: string) => void;
  /** Wait for the next `count` response documents */
  read: (count: number, timeoutMs?: number) => Promise<Array<Record<string, unknown>>>;
  /** Every document received so far and not yet read */
  buffered: () => number;
  /** Resolves once the server has closed the connection */
  closed: Promise<void>;
  isClosed: () => boolean;
  close: () => void;
}

export async function openRawConnection(port: number, host: string = '127.0.0.1'): Promise<RawConnection> {
  const socket = connect({ host, port });
  await once(socket, 'connect');

  const decoder = new JsonFrameDecoder();
  const received: Array<Record<string, unknown>> = [];
  let isClosed = false;

  socket.on('data', (chunk: Buffer) => {
    for (const frame of decoder.push(chunk)) {
      const parsed: unknown = JSON.parse(frame);
      if (!isRecord(parsed)) {
        throw new Error(`Server sent a non-object document: ${frame}`);
      }
      received.push(parsed);
    }
  });
  socket.on('error', () => {
    // Resets after a server-side destroy are expected in close tests; 'close' follows
    isClosed = true;
  });

  const closed = new Promise<void>((resolve) => {
    socket.once('close', () => {
      isClosed = true;
      resolve();
    });
  });

  return {
    socket,
    send: (text) => {
      socket.write(text);
    },
    read: async (count, timeoutMs = 2000) => {
      await assertEventually(
        () => received.length >= count,
        timeoutMs,
        `Expected ${count} responses, got ${received.length}`
      );
      return received.splice(0, count);
    },
    buffered: () => received.length,
    closed,
    isClosed: () => isClosed,
    close: () => {
      socket.destroy();
    },
  };
}
