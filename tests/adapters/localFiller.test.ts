import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from '../testHarness';
import { isFillerAudioFile, LocalFillerLibrary } from '../../src/adapters/library/LocalFillerLibrary';
import { buildPlayerArgs, LocalFillerPlayer } from '../../src/adapters/playback/LocalFillerPlayer';
import { FakeClock } from '../fakes/clock';

class FakeProcess extends EventEmitter {
  public exitCode: number | null = null;
  public signalCode: NodeJS.Signals | null = null;
  public readonly kills: Array<NodeJS.Signals | undefined> = [];

  public kill(signal?: NodeJS.Signals): boolean {
    this.kills.push(signal);
    return true;
  }
}

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'adsilencer-tests-'));
  try {
    await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

test('isFillerAudioFile accepts common audio extensions only', () => {
  assert.equal(isFillerAudioFile('song.MP3'), true);
  assert.equal(isFillerAudioFile('song.opus'), true);
  assert.equal(isFillerAudioFile('cover.jpg'), false);
  assert.equal(isFillerAudioFile('README'), false);
});

test('LocalFillerLibrary lists audio files sorted, skipping folders and other files', async () => {
  await withTempDir(async (dir) => {
    await fs.writeFile(path.join(dir, 'b.mp3'), '');
    await fs.writeFile(path.join(dir, 'a.flac'), '');
    await fs.writeFile(path.join(dir, 'notes.txt'), '');
    await fs.mkdir(path.join(dir, 'c.mp3'));

    const files = await new LocalFillerLibrary(dir).listFiles();

    assert.deepEqual(files, [path.join(dir, 'a.flac'), path.join(dir, 'b.mp3')]);
  });
});

test('LocalFillerLibrary rejects for a missing directory', async () => {
  await withTempDir(async (dir) => {
    await assert.rejects(() => new LocalFillerLibrary(path.join(dir, 'gone')).listFiles());
  });
});

test('buildPlayerArgs runs ffplay headless and passes the file to other players', () => {
  assert.deepEqual(buildPlayerArgs('/usr/bin/ffplay', '/m/a.mp3'), [
    '-nodisp',
    '-autoexit',
    '-loglevel',
    'error',
    '/m/a.mp3',
  ]);
  assert.deepEqual(buildPlayerArgs('paplay', '/m/a.wav'), ['/m/a.wav']);
});

test('LocalFillerPlayer reports duration and elapsed time and stops the process', async () => {
  const clock = new FakeClock();
  clock.current = 1000;
  const spawned: Array<{ command: string; args: string[] }> = [];
  const proc = new FakeProcess();
  const player = new LocalFillerPlayer({
    command: 'ffplay',
    clock,
    probeDuration: async (file) => (file === '/m/a.mp3' ? 95_000 : 0),
    spawn: (command, args) => {
      spawned.push({ command, args });
      setImmediate(() => proc.emit('spawn'));
      return proc;
    },
  });

  const session = await player.play('/m/a.mp3');
  clock.current = 2500;

  assert.equal(spawned[0].command, 'ffplay');
  assert.equal(await session.durationMs(), 95_000);
  assert.equal(session.elapsedMs(), 1500);
  session.stop();
  assert.deepEqual(proc.kills, ['SIGTERM']);
});

test('LocalFillerPlayer leaves a finished process alone', async () => {
  const proc = new FakeProcess();
  const player = new LocalFillerPlayer({
    command: 'paplay',
    clock: new FakeClock(),
    probeDuration: async () => 0,
    spawn: () => {
      setImmediate(() => proc.emit('spawn'));
      return proc;
    },
  });

  const session = await player.play('/m/a.wav');
  proc.exitCode = 0;
  session.stop();

  assert.deepEqual(proc.kills, []);
});

test('LocalFillerPlayer rejects when the player cannot be spawned', async () => {
  const proc = new FakeProcess();
  const player = new LocalFillerPlayer({
    command: 'no-such-player',
    clock: new FakeClock(),
    spawn: () => {
      setImmediate(() => proc.emit('error', new Error('spawn no-such-player ENOENT')));
      return proc;
    },
  });

  await assert.rejects(() => player.play('/m/a.mp3'), /ENOENT/);
});

test('LocalFillerPlayer stopAll terminates players whose session was never stopped', async () => {
  const procs = [new FakeProcess(), new FakeProcess()];
  let next = 0;
  const player = new LocalFillerPlayer({
    command: 'ffplay',
    clock: new FakeClock(),
    probeDuration: async () => 0,
    spawn: () => {
      const proc = procs[next];
      next += 1;
      setImmediate(() => proc.emit('spawn'));
      return proc;
    },
  });

  const first = await player.play('/m/a.mp3');
  await player.play('/m/b.mp3');
  first.stop();
  player.stopAll();
  player.stopAll();

  assert.deepEqual(procs[0].kills, ['SIGTERM']);
  assert.deepEqual(procs[1].kills, ['SIGTERM']);
});
