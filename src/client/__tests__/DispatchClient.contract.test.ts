/**
 * Dispatch Client Contract Tests
 *
 * Contract:
 * - One call in flight per client; the connection is reused between calls
 * - A command error keeps the connection, any transport failure discards it
 * - Calls are never retried
 * - Casts return immediately and only ever log
 *
 * Most cases run against a scripted TCP peer so each failure can be produced
 * on demand.
 */

import assert from 'node:assert/strict';
import { createSocket } from 'node:dgram';
import { createServer, type Server, type Socket } from 'node:net';
import { afterEach, describe, it } from 'node:test';

import { assertEventually, captureLogs, type LogCapture } from '@/__testutils__/index.js';
import {
  DispatchClient,
  DispatchClientError,
  DispatchCommandError,
  DispatchConnectionError,
  DispatchEarlyCloseError,
  DispatchParseError,
  DispatchTimeoutError,
} from '@/client/index.js';
import { ErrorCode, JsonFrameDecoder, isRecord } from '@/protocol/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

type Reply = (request: Record<string, unknown>, socket: Socket) => void;

interface ScriptedPeer {
  port: number;
  requests: Array<Record<string, unknown>>;
  connections: number;
}

let peer: Server | null = null;
const peerSockets = new Set<Socket>();
let client: DispatchClient | null = null;

/**
 * TCP peer that hands every decoded request to `reply`.
 */
async function startPeer(reply: Reply): Promise<ScriptedPeer> {
  const state: ScriptedPeer = { port: 0, requests: [], connections: 0 };
  const server = createServer((socket) => {
    state.connections++;
    peerSockets.add(socket);
    socket.once('close', () => peerSockets.delete(socket));
    const decoder = new JsonFrameDecoder();
    socket.on('data', (chunk) => {
      for (const frame of decoder.push(chunk)) {
        const request: unknown = JSON.parse(frame);
        if (isRecord(request)) {
          state.requests.push(request);
          reply(request, socket);
        }
      }
    });
    socket.on('error', () => {
      // Client-side destroys show up here as resets
    });
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
  peer = server;

  const address = server.address();
  assert.ok(address !== null && typeof address !== 'string');
  state.port = address.port;
  return state;
}

/**
 * Answers every request with its own type and params.
 */
const echo: Reply = (request, socket) => {
  const result = { type: request['type'], params: request['params'] };
  socket.write(JSON.stringify({ status: 'success', result, id: request['id'] }) + '\n');
};

function createClient(
  port: number,
  options: { timeoutMs?: number; udpPort?: number; logs?: LogCapture } = {}
): DispatchClient {
  const created = new DispatchClient({
    host: '127.0.0.1',
    tcpPort: port,
    udpPort: options.udpPort ?? port,
    timeoutMs: options.timeoutMs ?? 2000,
    logger: createLogger('client', options.logs?.sink ?? (() => undefined)),
  });
  client = created;
  return created;
}

afterEach(async () => {
  await client?.close();
  client = null;
  const server = peer;
  peer = null;
  if (server) {
    for (const socket of peerSockets) {
      socket.destroy();
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});

void describe('DispatchClient call', () => {
  void it('sends a framed request and returns the result', async () => {
    const scripted = await startPeer(echo);
    const dispatch = createClient(scripted.port);

    const result = await dispatch.call('set_tempo', { tempo: 128 });

    assert.deepEqual(result, { type: 'set_tempo', params: { tempo: 128 } });
    assert.deepEqual(scripted.requests, [{ type: 'set_tempo', params: { tempo: 128 }, id: 1 }]);
  });

  void it('sends empty params when none are given', async () => {
    const scripted = await startPeer(echo);
    const dispatch = createClient(scripted.port);

    await dispatch.call('get_info');

    assert.deepEqual(scripted.requests[0]?.['params'], {});
  });

  void it('reassembles a large structured result spread over many reads', async () => {
    const clips = Array.from({ length: 5000 }, (_, index) => ({
      index,
      name: `Clip ${index} \u00e9`,
      length: (index % 16) + 0.25,
      notes: [{ pitch: 36 + (index % 24), start: index / 4, velocity: 100 }],
    }));
    const scripted = await startPeer((request, socket) => {
      const payload = JSON.stringify({ status: 'success', result: { clips }, id: request['id'] }) + '\n';
      const bytes = Buffer.from(payload, 'utf8');
      // Uneven slices, some cutting a multi-byte character in half
      let offset = 0;
      const writeNext = (): void => {
        if (offset >= bytes.length) {
          return;
        }
        const end = Math.min(bytes.length, offset + 8191);
        socket.write(bytes.subarray(offset, end));
        offset = end;
        setImmediate(writeNext);
      };
      writeNext();
    });
    const dispatch = createClient(scripted.port, { timeoutMs: 5000 });

    const result = await dispatch.call('get_clips');

    assert.deepEqual(result, { clips });
  });

  void it('reuses one connection and numbers requests', async () => {
    const scripted = await startPeer(echo);
    const dispatch = createClient(scripted.port);

    await dispatch.call('get_info');
    await dispatch.call('get_info');
    await dispatch.call('get_info');

    assert.equal(scripted.connections, 1);
    assert.deepEqual(
      scripted.requests.map((request) => request['id']),
      [1, 2, 3]
    );
  });

  void it('writes the next request only after the previous response', async () => {
    const seenAtReply: number[] = [];
    const scripted = await startPeer((request, socket) => {
      seenAtReply.push(scripted.requests.length);
      setTimeout(() => echo(request, socket), 20);
    });
    const dispatch = createClient(scripted.port);

    const results = await Promise.all([
      dispatch.call('a'),
      dispatch.call('b'),
      dispatch.call('c'),
    ]);

    assert.deepEqual(seenAtReply, [1, 2, 3]);
    assert.deepEqual(
      results.map((result) => (isRecord(result) ? result['type'] : null)),
      ['a', 'b', 'c']
    );
  });

  void it('returns null for a success without a result', async () => {
    const scripted = await startPeer((request, socket) => {
      socket.write(JSON.stringify({ status: 'success', id: request['id'] }));
    });
    const dispatch = createClient(scripted.port);

    assert.equal(await dispatch.call('undo'), null);
  });
});

void describe('DispatchClient command errors', () => {
  void it('raises the server error and keeps the connection', async () => {
    const scripted = await startPeer((request, socket) => {
      if (request['type'] === 'delete_track') {
        socket.write(
          JSON.stringify({
            status: 'error',
            message: 'Track index out of range',
            code: 'HANDLER_ERROR',
            id: request['id'],
          })
        );
        return;
      }
      echo(request, socket);
    });
    const dispatch = createClient(scripted.port);

    await assert.rejects(dispatch.call('delete_track', { track_index: 9 }), (error: unknown) => {
      assert.ok(error instanceof DispatchCommandError);
      assert.equal(error.message, 'Track index out of range');
      assert.equal(error.code, ErrorCode.HANDLER_ERROR);
      assert.equal(error.commandName, 'delete_track');
      assert.equal(error.exitCode, EXIT_CODES.COMMAND_FAILED);
      return true;
    });
    await dispatch.call('get_info');

    assert.equal(scripted.connections, 1);
  });

  void it('reads an error without a code as HANDLER_ERROR', async () => {
    const scripted = await startPeer((request, socket) => {
      socket.write(JSON.stringify({ status: 'error', message: 'boom', id: request['id'] }));
    });
    const dispatch = createClient(scripted.port);

    await assert.rejects(dispatch.call('get_info'), (error: unknown) => {
      assert.ok(error instanceof DispatchCommandError);
      assert.equal(error.code, ErrorCode.HANDLER_ERROR);
      return true;
    });
  });
});

void describe('DispatchClient transport errors', () => {
  void it('reports a refused connection', async () => {
    const scripted = await startPeer(echo);
    const port = scripted.port;
    await new Promise<void>((resolve) => peer?.close(() => resolve()));
    peer = null;
    const dispatch = createClient(port);

    await assert.rejects(dispatch.call('get_info'), (error: unknown) => {
      assert.ok(error instanceof DispatchConnectionError);
      assert.equal(error.code, 'ECONNREFUSED');
      assert.equal(error.endpoint, `127.0.0.1:${port}`);
      assert.equal(error.exitCode, EXIT_CODES.RESOURCE_NOT_FOUND);
      assert.ok(
        error.message.startsWith(
          `get_info connection error | Endpoint: 127.0.0.1:${port} | Code: ECONNREFUSED | Details: `
        )
      );
      return true;
    });
  });

  void it('names the command that was being called when the connect fails', async () => {
    const scripted = await startPeer(echo);
    const port = scripted.port;
    await new Promise<void>((resolve) => peer?.close(() => resolve()));
    peer = null;
    const dispatch = createClient(port);

    await assert.rejects(dispatch.call('get_info'), DispatchConnectionError);
    await assert.rejects(dispatch.call('set_tempo', { tempo: 100 }), (error: unknown) => {
      assert.ok(error instanceof DispatchConnectionError);
      assert.equal(error.commandName, 'set_tempo');
      assert.ok(error.message.startsWith('set_tempo connection error | '));
      return true;
    });
  });

  void it('times out when no response arrives, then reconnects', async () => {
    const scripted = await startPeer((request, socket) => {
      if (request['type'] !== 'hang') {
        echo(request, socket);
      }
    });
    const dispatch = createClient(scripted.port, { timeoutMs: 100 });

    await assert.rejects(dispatch.call('hang'), (error: unknown) => {
      assert.ok(error instanceof DispatchTimeoutError);
      assert.equal(error.message, 'hang request timeout after 0.1s');
      assert.equal(error.exitCode, EXIT_CODES.REQUEST_TIMEOUT);
      return true;
    });

    await dispatch.call('get_info');
    assert.equal(scripted.connections, 2);
    assert.equal(scripted.requests.length, 2);
  });

  void it('reports a connection closed before the response', async () => {
    const scripted = await startPeer((_request, socket) => {
      socket.end();
    });
    const dispatch = createClient(scripted.port);

    await assert.rejects(dispatch.call('get_info'), (error: unknown) => {
      assert.ok(error instanceof DispatchEarlyCloseError);
      assert.equal(error.message, 'Connection closed before get_info response received');
      return true;
    });
    assert.equal(scripted.requests.length, 1);
  });

  void it('rejects a response that is not JSON', async () => {
    const scripted = await startPeer((_request, socket) => {
      socket.write('oops\n');
    });
    const dispatch = createClient(scripted.port);

    await assert.rejects(dispatch.call('get_info'), (error: unknown) => {
      assert.ok(error instanceof DispatchParseError);
      assert.match(error.message, /^Failed to parse get_info response: /);
      return true;
    });
  });

  void it('rejects a document that is not a dispatch response', async () => {
    const scripted = await startPeer((_request, socket) => {
      socket.write('{"hello":"world"}\n');
    });
    const dispatch = createClient(scripted.port);

    await assert.rejects(dispatch.call('get_info'), {
      message: 'Failed to parse get_info response: Not a dispatch response',
    });
  });

  void it('rejects a response to a different request', async () => {
    const scripted = await startPeer((_request, socket) => {
      socket.write('{"status":"success","result":1,"id":7}\n');
    });
    const dispatch = createClient(scripted.port);

    await assert.rejects(dispatch.call('get_info'), {
      message: 'Failed to parse get_info response: Response id 7 does not match request id 1',
    });
  });

  void it('rejects extra data after the response and reconnects', async () => {
    const scripted = await startPeer((request, socket) => {
      if (scripted.connections === 1) {
        socket.write(`{"status":"success","result":1,"id":${String(request['id'])}}{"status":"success"}`);
        return;
      }
      echo(request, socket);
    });
    const dispatch = createClient(scripted.port);

    await assert.rejects(dispatch.call('get_info'), {
      message: 'Failed to parse get_info response: Unexpected data after response',
    });
    await dispatch.call('get_info');

    assert.equal(scripted.connections, 2);
  });
});

void describe('DispatchClient cast', () => {
  void it('sends one datagram per cast without an id', async () => {
    const receiver = createSocket('udp4');
    const received: string[] = [];
    receiver.on('message', (message) => received.push(message.toString('utf8')));
    await new Promise<void>((resolve) => receiver.bind(0, '127.0.0.1', () => resolve()));

    try {
      const dispatch = createClient(1, { udpPort: receiver.address().port });
      dispatch.cast('set_track_volume', { track_index: 0, volume: 0.5 });
      dispatch.cast('fire_clip');

      await assertEventually(() => received.length === 2, 1000);
      assert.deepEqual(received, [
        '{"type":"set_track_volume","params":{"track_index":0,"volume":0.5}}',
        '{"type":"fire_clip","params":{}}',
      ]);
    } finally {
      await new Promise<void>((resolve) => receiver.close(() => resolve()));
    }
  });

  void it('drops a payload too large for one datagram', async () => {
    const logs = captureLogs();
    const dispatch = createClient(1, { logs });

    dispatch.cast('set_track_name', { name: 'x'.repeat(70_000) });

    assert.deepEqual(logs.info('client'), [
      'Dropped cast set_track_name: 70046 bytes exceeds the 65507 byte datagram limit',
    ]);
  });

  void it('close waits for a pending cast to leave', async () => {
    const logs = captureLogs();
    const dispatch = createClient(1, { udpPort: 9, logs });

    dispatch.cast('stop_clip');
    await dispatch.close();

    assert.equal(logs.info('client').length, 0);
  });
});

void describe('DispatchClient close', () => {
  void it('rejects calls after close', async () => {
    const scripted = await startPeer(echo);
    const dispatch = createClient(scripted.port);
    await dispatch.call('get_info');

    await dispatch.close();

    await assert.rejects(dispatch.call('get_info'), (error: unknown) => {
      assert.ok(error instanceof DispatchClientError);
      assert.equal(error.message, 'Client is closed');
      return true;
    });
    assert.equal(scripted.requests.length, 1);
  });

  void it('logs and drops casts after close', async () => {
    const logs = captureLogs();
    const dispatch = createClient(1, { logs });

    await dispatch.close();
    dispatch.cast('fire_clip');

    assert.deepEqual(logs.info('client'), ['Dropped cast fire_clip: client is closed']);
  });

  void it('ends the open connection', async () => {
    let peerClosed = false;
    const scripted = await startPeer((request, socket) => {
      socket.once('end', () => {
        peerClosed = true;
      });
      echo(request, socket);
    });
    const dispatch = createClient(scripted.port);
    await dispatch.call('get_info');

    await dispatch.close();

    await assertEventually(() => peerClosed, 1000);
  });
});
