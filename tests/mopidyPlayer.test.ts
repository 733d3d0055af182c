import assert from 'node:assert/strict';
import { WebSocket, WebSocketServer } from 'ws';

import MopidyPlayer from '../src/player/Mopidy/player';
import { isRecord } from '../src/player/Mopidy/stateMapper';
import { PlaybackState, PlayerEvent, PlayerRequestError } from '../src/player/playerTypes';
import { settle } from './fakes';

interface ReceivedCall {
  method: string;
  params?: unknown;
}

/**
 * In-process stand-in for the core websocket endpoint.
 * `core.playback.next` is never answered so callers hit their timeout.
 */
class FakeMopidyServer {
  readonly calls: ReceivedCall[] = [];
  private readonly server: WebSocketServer;

  constructor() {
    this.server = new WebSocketServer({ host: '127.0.0.1', port: 0, path: '/mopidy/ws' });
    this.server.on('connection', (socket) => {
      socket.on('message', (data) => this.onMessage(socket, data.toString()));
    });
  }

  listening(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.once('listening', () => {
        const address = this.server.address();
        if (typeof address === 'string') {
          reject(new Error(`Unexpected server address ${address}`));
          return;
        }
        resolve(address.port);
      });
    });
  }

  close(): Promise<void> {
    this.server.clients.forEach((client) => client.terminate());
    return new Promise((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private onMessage(socket: WebSocket, text: string): void {
    const request: unknown = JSON.parse(text);
    if (!isRecord(request) || typeof request.method !== 'string') return;
    const id = request.id;
    const method = request.method;
    this.calls.push(request.params === undefined ? { method } : { method, params: request.params });

    const reply = (body: Record<string, unknown>) => socket.send(JSON.stringify({ jsonrpc: '2.0', id, ...body }));

    switch (method) {
      case 'core.playback.get_state':
        reply({ result: 'paused' });
        return;
      case 'core.mixer.get_volume':
        reply({ result: null });
        return;
      case 'core.tracklist.add':
        reply({ error: { code: -32000, message: 'Tracklist is full' } });
        return;
      case 'core.playback.next':
        return;
      case 'core.playback.play':
        reply({ result: null });
        socket.send(JSON.stringify({ event: 'tracklist_changed' }));
        socket.send(JSON.stringify({ event: 'volume_changed', volume: 42 }));
        socket.send(
          JSON.stringify({
            event: 'track_playback_started',
            tl_track: { tlid: 1, track: { uri: 'local:track:a.ogg', name: 'Alpha', artists: [{ name: 'Band' }] } },
          }),
        );
        return;
      default:
        reply({ result: null });
    }
  }
}

export async function runMopidyPlayerTests() {
  const offline = new MopidyPlayer({ host: '127.0.0.1', port: 1, requestTimeoutMs: 100 });
  await assert.rejects(offline.play(), (error: unknown) => {
    assert.ok(error instanceof PlayerRequestError);
    assert.equal(error.message, 'core.playback.play: Not connected');
    return true;
  });

  const server = new FakeMopidyServer();
  const port = await server.listening();
  const player = new MopidyPlayer({ host: '127.0.0.1', port, requestTimeoutMs: 150, reconnectDelayMs: 0 });
  const events: PlayerEvent[] = [];

  try {
    await player.connect();
    const unsubscribe = player.onEvent((event) => events.push(event));

    assert.equal(await player.getState(), PlaybackState.Paused);

    await player.setVolume(30);
    assert.deepEqual(server.calls.at(-1), { method: 'core.mixer.set_volume', params: { volume: 30 } });

    await assert.rejects(player.getVolume(), {
      name: 'PlayerRequestError',
      message: 'core.mixer.get_volume: Mixer volume unavailable',
    });

    await assert.rejects(player.addToQueue('local:track:b.ogg'), {
      name: 'PlayerRequestError',
      message: 'core.tracklist.add: Tracklist is full',
    });
    assert.deepEqual(server.calls.at(-1), { method: 'core.tracklist.add', params: { uris: ['local:track:b.ogg'] } });

    await assert.rejects(player.next(), {
      name: 'PlayerRequestError',
      message: 'core.playback.next: Timed out after 150 ms',
    });

    await player.play();
    await settle(50);
    assert.deepEqual(events, [
      { type: 'volume_changed', volume: 42 },
      {
        type: 'track_playback_started',
        track: { uri: 'local:track:a.ogg', name: 'Alpha', artists: ['Band'], album: undefined, lengthMs: undefined },
      },
    ]);

    unsubscribe();
    await player.clearQueue();
    assert.deepEqual(server.calls.at(-1), { method: 'core.tracklist.clear' });
  } finally {
    await player.disconnect();
    await server.close();
  }

  await assert.rejects(player.stop(), { message: 'core.playback.stop: Not connected' });
}
