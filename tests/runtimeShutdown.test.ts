import assert from 'node:assert/strict';
import { test } from './testHarness';
import { stopWithTimeout } from '../src/runtime/stopWithTimeout';
import { createRuntime } from '../src/runtime/bootstrap';
import { DiscoveryInbox } from '../src/application/discovery/discoveryInbox';
import { logManager } from '../src/shared/logging/logger';
import { createRecordingLogger } from './fakes/recordingLogger';
import { FakeHeosSystem } from './fakes/heosSystem';
import { ManualScheduler } from './fakes/manualScheduler';
import { makeGroup, makePlayer } from './fakes/scriptedBridge';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

test('stopWithTimeout logs stopped on clean shutdown', async () => {
  const { log, entries } = createRecordingLogger();
  const result = await stopWithTimeout('discovery', async () => {
    await delay(5);
  }, 50, log);

  assert.equal(result.kind, 'stopped');
  assert.deepEqual(entries, [{ level: 'info', message: 'discovery stopped', data: undefined }]);
});

test('stopWithTimeout logs timeout without clean stop', async () => {
  const { log, entries } = createRecordingLogger();
  const result = await stopWithTimeout('bridge', async () => {
    await delay(30);
  }, 5, log);

  assert.equal(result.kind, 'timeout');
  await delay(40);

  assert.deepEqual(entries, [{ level: 'warn', message: 'bridge stop timed out', data: { timeoutMs: 5 } }]);
});

test('stopWithTimeout logs errors on failure', async () => {
  const { log, entries } = createRecordingLogger();
  const result = await stopWithTimeout('bridge', async () => {
    throw new Error('socket already closed');
  }, 50, log);

  assert.equal(result.kind, 'error');
  assert.deepEqual(entries, [
    { level: 'error', message: 'failed to stop bridge', data: { message: 'socket already closed' } },
  ]);
});

test('runtime connects the bridge and reports players and groups from background scans', async () => {
  const scheduler = new ManualScheduler();
  const system = new FakeHeosSystem();
  system.players = [makePlayer('1', 'Living Room'), makePlayer('2', 'Kitchen')];
  system.groups = [makeGroup('1', ['1', '2'], 'Stereo Pair')];
  const runtime = createRuntime({
    bridge: { id: 'bridge-1', host: '192.0.2.1' },
    system,
    clock: scheduler,
    timers: scheduler,
  });
  logManager.configure({ level: 'none' });

  await runtime.start();
  assert.equal(runtime.bridge.connectionState, 'connected');
  assert.equal(runtime.discovery.state, 'backgroundActive');

  await scheduler.advance(5_000);

  assert.ok(runtime.sink instanceof DiscoveryInbox);
  assert.deepEqual(
    runtime.sink.list().map((entry) => `${entry.result.ref.kind}:${entry.result.label}`),
    ['player:Living Room', 'player:Kitchen', 'group:Stereo Pair'],
  );

  await runtime.stop();
  assert.equal(runtime.bridge.connectionState, 'disconnected');
  assert.equal(runtime.discovery.state, 'idle');
  assert.equal(scheduler.pendingTimers, 0);
});
