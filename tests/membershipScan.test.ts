import assert from 'node:assert/strict';
import { test } from './testHarness';
import { runMembershipScan, withQueryTimeout } from '../src/application/discovery/membershipScan';
import { groupMemberHash } from '../src/domain/heos/identity';
import { createLogger } from '../src/shared/logging/logger';
import { ManualScheduler } from './fakes/manualScheduler';
import { RecordingSink } from './fakes/recordingSink';
import { ScriptedBridge, groupMap, makeGroup, makePlayer, playerMap } from './fakes/scriptedBridge';

const log = createLogger('Test', 'MembershipScan');

test('scan reports the new player before the new group and activates the group', async () => {
  const trace: string[] = [];
  const bridge = new ScriptedBridge(trace);
  const sink = new RecordingSink(trace);
  bridge.script.newPlayers.push(playerMap(makePlayer('1', 'Living Room')));
  bridge.script.newGroups.push(groupMap(makeGroup('1', ['1', '2'], 'Stereo Pair')));

  const summary = await runMembershipScan(bridge, sink, log);

  const hash = groupMemberHash(['1', '2']);
  assert.deepEqual(trace, [
    'query newPlayers',
    'discovered player:1',
    'query newGroups',
    `discovered group:${hash}`,
    `online group:${hash}`,
    'query removedGroups',
    'query removedPlayers',
  ]);
  assert.deepEqual(summary, {
    aborted: null,
    playersDiscovered: 1,
    groupsDiscovered: 1,
    groupsRemoved: 0,
    playersRemoved: 0,
  });
});

test('player result carries name, pid, type and host scoped under the bridge', async () => {
  const bridge = new ScriptedBridge();
  const sink = new RecordingSink();
  bridge.script.newPlayers.push(
    playerMap({ pid: '42', name: 'Kitchen', model: 'HEOS 3', ip: '192.0.2.42' }),
  );

  await runMembershipScan(bridge, sink, log);

  assert.deepEqual(sink.events[0], {
    type: 'discovered',
    result: {
      ref: { kind: 'player', id: '42' },
      label: 'Kitchen',
      properties: { name: 'Kitchen', pid: '42', type: 'HEOS 3', host: '192.0.2.42' },
      bridgeId: 'bridge-1',
    },
  });
});

test('group result is keyed by member hash with the member list as property', async () => {
  const bridge = new ScriptedBridge();
  const sink = new RecordingSink();
  bridge.script.newGroups.push(groupMap(makeGroup('7', ['7', '3'], 'Downstairs')));

  await runMembershipScan(bridge, sink, log);

  assert.deepEqual(sink.events[0], {
    type: 'discovered',
    result: {
      ref: { kind: 'group', id: groupMemberHash(['3', '7']) },
      label: 'Downstairs',
      properties: { name: 'Downstairs', groupMembers: '7;3' },
      bridgeId: 'bridge-1',
    },
  });
});

test('absent player data aborts the whole pass', async () => {
  const trace: string[] = [];
  const bridge = new ScriptedBridge(trace);
  const sink = new RecordingSink(trace);
  bridge.script.newPlayers.push(null);
  bridge.script.newGroups.push(groupMap(makeGroup('1', ['1', '2'])));
  bridge.script.removedGroups.push(groupMap(makeGroup('5', ['5', '6'])));
  bridge.script.removedPlayers.push(playerMap(makePlayer('9')));

  const summary = await runMembershipScan(bridge, sink, log);

  assert.equal(summary.aborted, 'players_unavailable');
  assert.deepEqual(trace, ['query newPlayers']);
  assert.equal(sink.events.length, 0);
});

test('absent group data aborts the pass after players, removals included', async () => {
  const trace: string[] = [];
  const bridge = new ScriptedBridge(trace);
  const sink = new RecordingSink(trace);
  bridge.script.newPlayers.push(playerMap(makePlayer('1')));
  bridge.script.newGroups.push(null);
  bridge.script.removedPlayers.push(playerMap(makePlayer('9')));

  const summary = await runMembershipScan(bridge, sink, log);

  assert.equal(summary.aborted, 'groups_unavailable');
  assert.equal(summary.playersDiscovered, 1);
  assert.deepEqual(trace, ['query newPlayers', 'discovered player:1', 'query newGroups']);
});

test('removals run after additions: groups first, then players', async () => {
  const trace: string[] = [];
  const bridge = new ScriptedBridge(trace);
  const sink = new RecordingSink(trace);
  bridge.script.removedGroups.push(groupMap(makeGroup('5', ['6', '5'])));
  bridge.script.removedPlayers.push(playerMap(makePlayer('9')));

  const summary = await runMembershipScan(bridge, sink, log);

  const hash = groupMemberHash(['5', '6']);
  assert.deepEqual(trace, [
    'query newPlayers',
    'query newGroups',
    'query removedGroups',
    `removed group:${hash}`,
    `offline group:${hash}`,
    'query removedPlayers',
    'removed player:9',
  ]);
  assert.equal(summary.groupsRemoved, 1);
  assert.equal(summary.playersRemoved, 1);
});

test('empty reports emit nothing', async () => {
  const bridge = new ScriptedBridge();
  const sink = new RecordingSink();

  const summary = await runMembershipScan(bridge, sink, log);

  assert.equal(sink.events.length, 0);
  assert.equal(summary.aborted, null);
});

test('query timeout turns a hung addition query into absent data', async () => {
  const scheduler = new ManualScheduler();
  const bridge = new ScriptedBridge();
  bridge.queryNewPlayers = () => new Promise(() => undefined);
  const sink = new RecordingSink();
  const bounded = withQueryTimeout(bridge, scheduler, 1_000, log);

  const pass = runMembershipScan(bounded, sink, log);
  await scheduler.advance(1_000);
  const summary = await pass;

  assert.equal(summary.aborted, 'players_unavailable');
  assert.equal(sink.events.length, 0);
});

test('query timeout fails the pass when a removal query hangs', async () => {
  const scheduler = new ManualScheduler();
  const bridge = new ScriptedBridge();
  bridge.queryRemovedPlayers = () => new Promise(() => undefined);
  const sink = new RecordingSink();
  const bounded = withQueryTimeout(bridge, scheduler, 500, log);

  const outcome = assert.rejects(runMembershipScan(bounded, sink, log), {
    name: 'ScanQueryTimeoutError',
  });
  await scheduler.advance(500);
  await outcome;
  assert.equal(sink.events.length, 0);
});
