/**
 * Reliable Listener Contract Tests
 *
 * Contract:
 * - Every request gets exactly one response, on its own connection, in order
 * - Bad input is answered without reaching the session; the connection survives
 * - Limits (frame size, command time, idle time) are enforced per connection
 */

import assert from 'node:assert/strict';
import { afterEach, describe, it } from 'node:test';

import {
  RecordingSession,
  assertEventually,
  captureLogs,
  delay,
  openRawConnection,
  type RawConnection,
} from '@/__testutils__/index.js';
import { ErrorCode } from '@/protocol/index.js';
import { CommandRegistry, SafetyTier, type CommandHandler } from '@/registry/index.js';
import { ExecutionSerializer, ReliableListener, type ConnectionLimits } from '@/server/index.js';
import { createLogger } from '@/ui/logging/index.js';

const forward =
  (name: string): CommandHandler =>
  (session, params) =>
    session.invoke(name, params);

let listener: ReliableListener | null = null;
const connections: RawConnection[] = [];

async function startListener(limits: Partial<ConnectionLimits> = {}): Promise<{
  session: RecordingSession;
  serializer: ExecutionSerializer;
  connect: () => Promise<RawConnection>;
}> {
  const session = new RecordingSession();
  const logs = captureLogs();
  const registry = new CommandRegistry()
    .register('query', forward('query'), SafetyTier.NeverLossy)
    .register('slow', forward('slow'), SafetyTier.NeverLossy)
    .register('explode', forward('explode'), SafetyTier.NeverLossy)
    .register('big', forward('big'), SafetyTier.NeverLossy)
    .seal();
  const serializer = new ExecutionSerializer({
    registry,
    session,
    logger: createLogger('serializer', logs.sink),
  });
  const started = new ReliableListener({
    ...limits,
    serializer,
    registry,
    host: '127.0.0.1',
    port: 0,
    logger: createLogger('reliable', logs.sink),
  });
  const address = await started.start();
  listener = started;

  return {
    session,
    serializer,
    connect: async () => {
      const connection = await openRawConnection(address.port);
      connections.push(connection);
      return connection;
    },
  };
}

afterEach(async () => {
  for (const connection of connections.splice(0)) {
    connection.close();
  }
  await listener?.stop();
  listener = null;
});

void describe('ReliableListener request/response', () => {
  void it('answers a request with its result and echoes the id', async () => {
    const { connect } = await startListener();
    const connection = await connect();

    connection.send('{"type":"query","params":{"track_index":1},"id":1}');

    assert.deepEqual(await connection.read(1), [
      { status: 'success', result: { command: 'query', params: { track_index: 1 } }, id: 1 },
    ]);
  });

  void it('answers pipelined requests in order', async () => {
    const { connect } = await startListener();
    const connection = await connect();

    connection.send(
      '{"type":"query","params":{"n":1},"id":1}{"type":"query","params":{"n":2},"id":2}\n{"type":"query","params":{"n":3},"id":3}'
    );

    const responses = await connection.read(3);
    assert.deepEqual(
      responses.map((response) => response['id']),
      [1, 2, 3]
    );
  });

  void it('reassembles a request written a few bytes at a time', async () => {
    const { connect } = await startListener();
    const connection = await connect();
    const request = '{"type":"query","params":{"name":"Bass"},"id":"split"}';

    for (let i = 0; i < request.length; i += 7) {
      connection.send(request.slice(i, i + 7));
      await delay(1);
    }

    assert.deepEqual(await connection.read(1), [
      { status: 'success', result: { command: 'query', params: { name: 'Bass' } }, id: 'split' },
    ]);
  });

  void it('returns a large result intact', async () => {
    const { session, connect } = await startListener();
    const payload = 'x'.repeat(1_000_000);
    session.on('big', () => ({ payload }));
    const connection = await connect();

    connection.send('{"type":"big","params":{}}');

    const [response] = await connection.read(1, 5000);
    assert.deepEqual(response, { status: 'success', result: { payload } });
  });

  void it('answers after the client half-closes, then closes', async () => {
    const { connect } = await startListener();
    const connection = await connect();

    connection.send('{"type":"query","params":{},"id":5}');
    connection.socket.end();

    assert.deepEqual(await connection.read(1), [
      { status: 'success', result: { command: 'query', params: {} }, id: 5 },
    ]);
    await connection.closed;
  });
});

void describe('ReliableListener error responses', () => {
  void it('answers malformed JSON without reaching the session', async () => {
    const { session, connect } = await startListener();
    const connection = await connect();

    connection.send('{"type": query}');
    const [response] = await connection.read(1);

    assert.equal(response?.['status'], 'error');
    assert.equal(response?.['code'], ErrorCode.PROTOCOL_ERROR);
    assert.match(String(response?.['message']), /^Invalid JSON: /);
    assert.equal(session.invocations.length, 0);

    connection.send('{"type":"query","params":{},"id":2}');
    assert.deepEqual(await connection.read(1), [
      { status: 'success', result: { command: 'query', params: {} }, id: 2 },
    ]);
  });

  void it('answers documents that are not objects without waiting for more input', async () => {
    const { session, connect } = await startListener();
    const connection = await connect();
    const notAnObject = {
      status: 'error',
      message: 'Command must be a JSON object',
      code: ErrorCode.PROTOCOL_ERROR,
    };

    connection.send('42');
    assert.deepEqual(await connection.read(1, 1000), [notAnObject]);

    connection.send('null"x"');
    assert.deepEqual(await connection.read(2, 1000), [notAnObject, notAnObject]);
    assert.equal(session.invocations.length, 0);

    connection.send('{"type":"query","params":{},"id":3}');
    assert.deepEqual(await connection.read(1), [
      { status: 'success', result: { command: 'query', params: {} }, id: 3 },
    ]);
  });

  void it('answers a request with the wrong shape', async () => {
    const { connect } = await startListener();
    const connection = await connect();

    connection.send('{"params":{},"id":"no-type"}');

    assert.deepEqual(await connection.read(1), [
      {
        status: 'error',
        message: "Command is missing a string 'type' field",
        code: ErrorCode.PROTOCOL_ERROR,
        id: 'no-type',
      },
    ]);
  });

  void it('answers an unknown command', async () => {
    const { session, connect } = await startListener();
    const connection = await connect();

    connection.send('{"type":"launch_rocket","params":{},"id":"x"}');

    assert.deepEqual(await connection.read(1), [
      { status: 'error', message: 'Unknown command: launch_rocket', code: ErrorCode.UNKNOWN_COMMAND, id: 'x' },
    ]);
    assert.equal(session.invocations.length, 0);
  });

  void it('answers a handler failure and keeps the connection', async () => {
    const { session, connect } = await startListener();
    session.on('explode', () => {
      throw new Error('Track index out of range');
    });
    const connection = await connect();

    connection.send('{"type":"explode","params":{},"id":1}{"type":"query","params":{},"id":2}');

    assert.deepEqual(await connection.read(2), [
      { status: 'error', message: 'Track index out of range', code: ErrorCode.HANDLER_ERROR, id: 1 },
      { status: 'success', result: { command: 'query', params: {} }, id: 2 },
    ]);
  });
});

void describe('ReliableListener limits', () => {
  void it('answers an oversize frame and closes the connection', async () => {
    const { session, connect } = await startListener({ maxFrameBytes: 64 });
    const connection = await connect();

    connection.send(`{"type":"query","params":{"pad":"${'x'.repeat(200)}"}}`);

    assert.deepEqual(await connection.read(1), [
      { status: 'error', message: 'Request frame exceeds 64 bytes', code: ErrorCode.PROTOCOL_ERROR },
    ]);
    await connection.closed;
    assert.equal(session.invocations.length, 0);
  });

  void it('answers COMMAND_TIMEOUT and discards the late result', async () => {
    const { session, connect } = await startListener({ commandTimeoutMs: 50 });
    session.on('slow', async () => {
      await delay(200);
      return 'late';
    });
    const connection = await connect();

    connection.send('{"type":"slow","params":{},"id":1}');

    assert.deepEqual(await connection.read(1), [
      {
        status: 'error',
        message: 'Timeout waiting for operation to complete',
        code: ErrorCode.COMMAND_TIMEOUT,
        id: 1,
      },
    ]);

    await delay(250);
    assert.equal(session.count('slow'), 1);
    assert.equal(connection.buffered(), 0);

    connection.send('{"type":"query","params":{},"id":2}');
    assert.deepEqual(await connection.read(1), [
      { status: 'success', result: { command: 'query', params: {} }, id: 2 },
    ]);
  });

  void it('closes a connection that stays idle', async () => {
    const { connect } = await startListener({ idleTimeoutMs: 50 });
    const connection = await connect();

    await connection.closed;

    assert.equal(connection.isClosed(), true);
  });

  void it('does not count time spent executing against the idle timeout', async () => {
    const { session, connect } = await startListener({ idleTimeoutMs: 80 });
    session.on('slow', async () => {
      await delay(200);
      return 'done';
    });
    const connection = await connect();

    connection.send('{"type":"slow","params":{},"id":1}');

    assert.deepEqual(await connection.read(1), [{ status: 'success', result: 'done', id: 1 }]);
  });
});

void describe('ReliableListener flow control', () => {
  void it('stops reading from a pipelining client while its requests wait', async () => {
    const { session, connect } = await startListener();
    session.on('slow', () => delay(20));
    const connection = await connect();
    const request = `{"type":"slow","params":{"pad":"${'x'.repeat(2000)}"}}`;
    const total = 20_000;

    connection.send(request.repeat(total));
    await delay(500);

    // Kernel buffers hold a few MB at most; the rest must still sit with the client
    assert.ok(
      connection.socket.writableLength > (request.length * total) / 2,
      `client still holds ${connection.socket.writableLength} bytes`
    );
    assert.ok(session.count('slow') < 100);
  });

  void it('resumes reading once pipelined requests are answered', async () => {
    const { session, connect } = await startListener();
    session.on('slow', () => delay(5));
    const connection = await connect();

    connection.send('{"type":"slow","params":{},"id":1}'.repeat(20));
    const responses = await connection.read(20);
    assert.equal(responses.length, 20);

    connection.send('{"type":"query","params":{},"id":21}');
    assert.deepEqual(await connection.read(1), [
      { status: 'success', result: { command: 'query', params: {} }, id: 21 },
    ]);
  });
});

void describe('ReliableListener connection failures', () => {
  void it('still executes a command whose client disconnected', async () => {
    const { session, serializer, connect } = await startListener();
    session.on('slow', () => delay(50));
    const connection = await connect();

    connection.send('{"type":"slow","params":{}}');
    await assertEventually(() => session.count('slow') === 1, 1000);
    connection.close();

    await assertEventually(() => serializer.stats().executed === 1, 1000);

    const other = await connect();
    other.send('{"type":"query","params":{},"id":9}');
    assert.deepEqual(await other.read(1), [
      { status: 'success', result: { command: 'query', params: {} }, id: 9 },
    ]);
  });

  void it('keeps responses on the connection that asked', async () => {
    const { connect } = await startListener();
    const first = await connect();
    const second = await connect();

    first.send('{"type":"query","params":{"from":"first"},"id":1}');
    second.send('{"type":"query","params":{"from":"second"},"id":1}');

    assert.deepEqual(await first.read(1), [
      { status: 'success', result: { command: 'query', params: { from: 'first' } }, id: 1 },
    ]);
    assert.deepEqual(await second.read(1), [
      { status: 'success', result: { command: 'query', params: { from: 'second' } }, id: 1 },
    ]);
  });
});
