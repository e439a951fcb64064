/**
 * Benchmark script for measuring dispatch latency and throughput.
 *
 * Starts an in-process server on ephemeral loopback ports with the in-memory
 * session and measures:
 * - Reliable round-trip latency (avg, p50, p99) for a query and a setter
 * - Lossy throughput: casts executed per second
 *
 * Usage:
 *   npm run benchmark
 *   tsx scripts/benchmark.ts --calls 2000 --casts 20000
 *   tsx scripts/benchmark.ts --output docs/perf/dispatch-baseline.md
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { DispatchClient } from '@/client/index.js';
import { DispatchServer, MemorySession } from '@/server/index.js';
import { createLogger } from '@/ui/logging/index.js';

const projectRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..');

/** Casts sent before waiting for the server to catch up, so the socket buffer never overflows. */
const CAST_BATCH = 100;

interface LatencyMetrics {
  scenario: string;
  calls: number;
  avgMs: number;
  p50Ms: number;
  p99Ms: number;
}

interface ThroughputMetrics {
  casts: number;
  executed: number;
  durationMs: number;
  perSecond: number;
}

function readCount(args: string[], flag: string, fallback: number): number {
  const index = args.indexOf(flag);
  const raw = index === -1 ? undefined : args[index + 1];
  const parsed = raw === undefined ? NaN : parseInt(raw, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function percentile(sorted: number[], fraction: number): number {
  const index = Math.min(sorted.length - 1, Math.ceil(sorted.length * fraction) - 1);
  return sorted[Math.max(0, index)] ?? 0;
}

async function measureCalls(
  client: DispatchClient,
  scenario: string,
  calls: number,
  params: (i: number) => Record<string, unknown>
): Promise<LatencyMetrics> {
  const samples: number[] = [];

  for (let i = 0; i < calls; i++) {
    const started = process.hrtime.bigint();
    await client.call(scenario, params(i));
    samples.push(Number(process.hrtime.bigint() - started) / 1e6);
  }

  samples.sort((a, b) => a - b);
  const total = samples.reduce((sum, value) => sum + value, 0);
  return {
    scenario,
    calls,
    avgMs: total / calls,
    p50Ms: percentile(samples, 0.5),
    p99Ms: percentile(samples, 0.99),
  };
}

async function waitFor(condition: () => boolean, timeoutMs: number): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(`Server did not catch up within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setImmediate(resolve));
  }
}

async function measureCasts(
  client: DispatchClient,
  server: DispatchServer,
  casts: number
): Promise<ThroughputMetrics> {
  const baseline = server.stats().serializer.executed;
  const started = process.hrtime.bigint();

  for (let i = 0; i < casts; i++) {
    client.cast('set_track_volume', { track_index: 0, volume: (i % 100) / 100 });
    if ((i + 1) % CAST_BATCH === 0 || i === casts - 1) {
      const expected = i + 1;
      await waitFor(() => server.stats().lossy.received >= expected, 5000);
    }
  }
  await server.serializer.drain();

  const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
  const executed = server.stats().serializer.executed - baseline;
  return { casts, executed, durationMs, perSecond: (executed / durationMs) * 1000 };
}

function generateMarkdownReport(latency: LatencyMetrics[], throughput: ThroughputMetrics): string {
  let report = `# Dispatch Benchmark\n\n`;
  report += `Generated: ${new Date().toISOString()}\n`;
  report += `Node: ${process.version}\n\n`;

  report += `## Reliable Round Trip\n\n`;
  report += `| Command | Calls | Avg | p50 | p99 |\n`;
  report += `|---------|-------|-----|-----|-----|\n`;
  for (const result of latency) {
    report += `| ${result.scenario} | ${result.calls} | ${result.avgMs.toFixed(3)}ms | ${result.p50Ms.toFixed(3)}ms | ${result.p99Ms.toFixed(3)}ms |\n`;
  }

  report += `\n## Lossy Throughput\n\n`;
  report += `| Casts | Executed | Duration | Per Second |\n`;
  report += `|-------|----------|----------|------------|\n`;
  report += `| ${throughput.casts} | ${throughput.executed} | ${throughput.durationMs.toFixed(1)}ms | ${throughput.perSecond.toFixed(0)} |\n`;

  report += `\n## Notes\n\n`;
  report += `- Client and server share one process and talk over loopback\n`;
  report += `- Casts are paced in batches of ${CAST_BATCH} so none are dropped by the kernel\n`;

  return report;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const calls = readCount(args, '--calls', 1000);
  const casts = readCount(args, '--casts', 10_000);
  const outputIndex = args.indexOf('--output');
  const output = outputIndex === -1 ? undefined : args[outputIndex + 1];

  const server = new DispatchServer({
    session: new MemorySession(),
    host: '127.0.0.1',
    tcpPort: 0,
    udpPort: 0,
    logSink: () => undefined,
  });
  const { tcp, udp } = await server.start();
  const client = new DispatchClient({
    host: '127.0.0.1',
    tcpPort: tcp.port,
    udpPort: udp.port,
    logger: createLogger('client', () => undefined),
  });

  try {
    console.log(`Measuring ${calls} calls per command...`);
    const latency = [
      await measureCalls(client, 'get_info', calls, () => ({})),
      await measureCalls(client, 'set_track_pan', calls, (i) => ({ track_index: 1, pan: (i % 20) / 10 - 1 })),
    ];

    console.log(`Measuring ${casts} casts...`);
    const throughput = await measureCasts(client, server, casts);

    const report = generateMarkdownReport(latency, throughput);
    if (output) {
      const outputPath = resolve(projectRoot, output);
      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, report, 'utf-8');
      console.log(`Report saved to: ${outputPath}`);
    } else {
      console.log(`\n${report}`);
    }
  } finally {
    await client.close();
    await server.stop();
  }
}

main().catch((error: unknown) => {
  console.error('Benchmark failed:', error);
  process.exit(1);
});
