import assert from 'node:assert/strict';

import ActionDispatcher from '../src/bridge/actionDispatcher';
import type { StateReporter } from '../src/bridge/commandTypes';
import { PlaybackState } from '../src/player/playerTypes';
import { captureLogs, deferred, FakePlayer, playerTimeout, settle, warnings } from './fakes';

class RecordingReporter implements StateReporter {
  reports: string[] = [];

  async reportState(state: PlaybackState): Promise<void> {
    this.reports.push(`sta:${state}`);
  }

  async reportVolume(volume: number): Promise<void> {
    this.reports.push(`vol:${volume}`);
  }
}

function setup() {
  const player = new FakePlayer();
  const reporter = new RecordingReporter();
  const dispatcher = new ActionDispatcher(player, reporter);
  return { player, reporter, dispatcher };
}

async function volumeArithmeticTests() {
  const clamp = (value: number) => Math.min(100, Math.max(0, value));
  const operations: Array<[string, (current: number, amount: number) => number]> = [
    ['=', (_current, amount) => amount],
    ['+', (current, amount) => current + amount],
    ['-', (current, amount) => current - amount],
  ];

  for (const [operator, apply] of operations) {
    for (const current of [0, 37, 95, 100]) {
      for (const amount of [0, 10, 120]) {
        const { player, dispatcher } = setup();
        player.volume = current;
        const result = await dispatcher.dispatch('vol', `${operator}${amount}`);
        assert.equal(result.status, 'handled');
        assert.equal(player.volume, clamp(apply(current, amount)), `${operator}${amount} from ${current}`);
      }
    }
  }

  // Absolute volume never reads the current one.
  const { player, dispatcher } = setup();
  await dispatcher.dispatch('vol', '=30');
  assert.deepEqual(player.calls, ['setVolume:30']);
}

async function malformedVolumeTests() {
  for (const value of ['', '5', '+', '+x', '=1.5', '*10', '= 5']) {
    const { player, dispatcher } = setup();
    player.volume = 40;
    const { result, logs } = await captureLogs(() => dispatcher.dispatch('vol', value));
    assert.equal(result.status, 'ignored', `"${value}" should be ignored`);
    assert.equal(player.volume, 40);
    assert.deepEqual(player.calls, []);
    assert.equal(warnings(logs).length, 1, `"${value}" should log one warning`);
  }
}

async function playbackTests() {
  const direct: Array<[string, string]> = [
    ['play', 'play'],
    ['stop', 'stop'],
    ['pause', 'pause'],
    ['resume', 'resume'],
    ['prev', 'previous'],
    ['next', 'next'],
  ];
  for (const [value, call] of direct) {
    const { player, dispatcher } = setup();
    const result = await dispatcher.dispatch('plb', value);
    assert.deepEqual(result, { status: 'handled', action: 'plb' });
    assert.deepEqual(player.calls, [call]);
  }

  const toggles: Array<[PlaybackState, string]> = [
    [PlaybackState.Playing, 'pause'],
    [PlaybackState.Paused, 'resume'],
    [PlaybackState.Stopped, 'play'],
  ];
  for (const [state, call] of toggles) {
    const { player, reporter, dispatcher } = setup();
    player.state = state;
    await dispatcher.dispatch('plb', 'toggle');
    assert.deepEqual(player.calls, ['getState', call]);
    assert.deepEqual(reporter.reports, []);
  }

  for (const value of ['', 'Play', 'rewind', 'toggle2']) {
    const { player, dispatcher } = setup();
    const { result, logs } = await captureLogs(() => dispatcher.dispatch('plb', value));
    assert.equal(result.status, 'ignored');
    assert.deepEqual(player.calls, []);
    assert.deepEqual(warnings(logs), [`[Dispatcher] Unknown playback control action: "${value}"`]);
  }
}

async function queueTests() {
  {
    const { player, dispatcher } = setup();
    const { result, logs } = await captureLogs(() => dispatcher.dispatch('add', ''));
    assert.deepEqual(result, { status: 'ignored', action: 'add', reason: 'Cannot add empty track to queue' });
    assert.deepEqual(player.queue, []);
    assert.deepEqual(player.calls, []);
    assert.deepEqual(warnings(logs), ['[Dispatcher] Cannot add empty track to queue']);
  }

  {
    const { player, dispatcher } = setup();
    await dispatcher.dispatch('add', 'local:track:song.mp3');
    await dispatcher.dispatch('add', 'http://radio.example/stream');
    assert.deepEqual(player.queue, ['local:track:song.mp3', 'http://radio.example/stream']);

    const result = await dispatcher.dispatch('clr', 'anything');
    assert.deepEqual(result, { status: 'handled', action: 'clr' });
    assert.deepEqual(player.queue, []);
  }
}

async function unimplementedTests() {
  const { player, dispatcher } = setup();

  const load = await dispatcher.dispatch('loa', 'm3u:party.m3u');
  assert.deepEqual(load, {
    status: 'not_implemented',
    action: 'loa',
    reason: 'Loading playlist "m3u:party.m3u" is not implemented',
  });

  const search = await dispatcher.dispatch('src', 'beatles');
  assert.equal(search.status, 'not_implemented');

  const queueInfo = await dispatcher.dispatch('inf', 'queue');
  assert.equal(queueInfo.status, 'not_implemented');

  assert.deepEqual(await dispatcher.dispatch('loa', ''), {
    status: 'ignored',
    action: 'loa',
    reason: 'Cannot load unnamed playlist',
  });
  assert.deepEqual(await dispatcher.dispatch('src', ''), {
    status: 'ignored',
    action: 'src',
    reason: 'Cannot search without a query',
  });

  assert.deepEqual(player.calls, []);
}

async function infoTests() {
  const { player, reporter, dispatcher } = setup();
  player.state = PlaybackState.Paused;
  player.volume = 64;

  assert.equal((await dispatcher.dispatch('inf', 'state')).status, 'handled');
  assert.equal((await dispatcher.dispatch('inf', 'volume')).status, 'handled');
  assert.deepEqual(reporter.reports, ['sta:paused', 'vol:64']);

  const unknown = await dispatcher.dispatch('inf', 'weather');
  assert.deepEqual(unknown, { status: 'ignored', action: 'inf', reason: 'Unknown information request: "weather"' });
}

async function unknownActionTests() {
  const { player, dispatcher } = setup();
  const { result, logs } = await captureLogs(() => dispatcher.dispatch('foo', 'bar'));
  assert.deepEqual(result, { status: 'ignored', action: 'foo', reason: 'Unknown action "foo"' });
  assert.deepEqual(warnings(logs), ['[Dispatcher] Unknown action "foo", ignoring']);
  assert.deepEqual(player.calls, []);
  assert.deepEqual(dispatcher.actions, ['plb', 'vol', 'add', 'clr', 'loa', 'src', 'inf']);
}

async function failureTests() {
  const { player, dispatcher } = setup();
  const timeout = playerTimeout();
  player.failWith = timeout;

  const failed = await dispatcher.dispatch('plb', 'play');
  assert.deepEqual(failed, { status: 'player_error', action: 'plb', error: timeout });

  player.failWith = null;
  const next = await dispatcher.dispatch('plb', 'play');
  assert.equal(next.status, 'handled');
  assert.deepEqual(player.calls, ['play']);

  const broken = new Error('reporter exploded');
  const fatalDispatcher = new ActionDispatcher(new FakePlayer(), {
    reportState: async () => {
      throw broken;
    },
    reportVolume: async () => undefined,
  });
  const fatal = await fatalDispatcher.dispatch('inf', 'state');
  assert.deepEqual(fatal, { status: 'fatal', action: 'inf', error: broken });
}

async function cancellationTests() {
  const player = new FakePlayer();
  const reporter = new RecordingReporter();
  let active = true;
  const dispatcher = new ActionDispatcher(player, reporter, () => active);

  const held = deferred();
  player.gate = held.promise;
  const pending = dispatcher.dispatch('vol', '-5');
  await settle(5);
  active = false;
  held.resolve();

  assert.deepEqual(await pending, {
    status: 'cancelled',
    action: 'vol',
    reason: 'Bridge stopped before "vol" completed',
  });
  assert.deepEqual(player.calls, ['getVolume']);
  assert.equal(player.volume, 50);

  player.gate = null;
  assert.equal((await dispatcher.dispatch('inf', 'state')).status, 'cancelled');
  assert.deepEqual(reporter.reports, []);
}

export async function runActionDispatcherTests() {
  await volumeArithmeticTests();
  await malformedVolumeTests();
  await playbackTests();
  await queueTests();
  await unimplementedTests();
  await infoTests();
  await unknownActionTests();
  await failureTests();
  await cancellationTests();
}
