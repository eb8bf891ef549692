import assert from 'node:assert/strict';
import { test } from './testHarness';
import { MuteController } from '../src/application/audio/MuteController';
import { FillerPlaybackOrchestrator } from '../src/application/filler/FillerPlaybackOrchestrator';
import type { FillerLibraryPort, FillerPlaybackPort } from '../src/ports/FillerPlaybackPort';
import { FakeClock, flushAsync } from './fakes/clock';
import { makeLibraryFake, makePlaybackFake } from './fakes/fillerPorts';
import { makeMixerFake, type MixerFakeOptions } from './fakes/mixerPort';

const FILES = ['/filler/a.mp3', '/filler/b.mp3'];

function setup(options: {
  library?: FillerLibraryPort;
  playback?: FillerPlaybackPort;
  mixer?: MixerFakeOptions;
  clock?: FakeClock;
} = {}) {
  const clock = options.clock ?? new FakeClock();
  const { mixer, calls } = makeMixerFake(options.mixer);
  const muteController = new MuteController(mixer, 'Spotify');
  const playbackFake = makePlaybackFake({ clock });
  const orchestrator = new FillerPlaybackOrchestrator({
    muteController,
    library: options.library ?? makeLibraryFake(FILES),
    playback: options.playback ?? playbackFake.playback,
    clock,
    settleDelayMs: 1500,
    random: () => 0.75,
  });
  return { orchestrator, muteController, calls, clock, playbackFake };
}

test('filler job mutes, plays one file to the end, resumes, then unmutes', async () => {
  const { orchestrator, calls, clock, playbackFake } = setup();
  let resumes = 0;

  const job = orchestrator.start(async () => {
    resumes += 1;
    assert.deepEqual(calls, [{ streamId: 42, flag: 1 }]);
  });
  assert.ok(job);
  const outcome = await job.done;

  assert.deepEqual(outcome, { kind: 'played', file: '/filler/b.mp3', durationMs: 180_000 });
  assert.deepEqual(playbackFake.played, ['/filler/b.mp3']);
  assert.deepEqual(clock.sleeps, [1500, 178_500]);
  assert.equal(playbackFake.stops(), 1);
  assert.equal(resumes, 1);
  assert.deepEqual(calls, [
    { streamId: 42, flag: 1 },
    { streamId: 42, flag: 0 },
  ]);
  assert.equal(orchestrator.isRunning(), false);
});

test('filler job unmutes before releasing its guard', async () => {
  let runningAtUnmute: boolean | null = null;
  let orchestratorRef: FillerPlaybackOrchestrator | null = null;
  const { orchestrator } = setup({
    mixer: {
      onSetMute: (call) => {
        if (call.flag === 0 && orchestratorRef) {
          runningAtUnmute = orchestratorRef.isRunning();
        }
      },
    },
  });
  orchestratorRef = orchestrator;

  const job = orchestrator.start(async () => undefined);
  assert.ok(job);
  await job.done;

  assert.equal(runningAtUnmute, true);
  assert.equal(orchestrator.isRunning(), false);
});

test('filler job drops detections while one is in flight', async () => {
  const clock = new FakeClock();
  clock.hold();
  const { orchestrator, playbackFake, calls } = setup({ clock });

  const first = orchestrator.start(async () => undefined);
  assert.ok(first);
  await flushAsync();
  assert.deepEqual(clock.sleeps, [1500]);
  assert.equal(orchestrator.isRunning(), true);
  assert.equal(orchestrator.start(async () => undefined), null);
  assert.equal(orchestrator.start(async () => undefined), null);

  clock.release();
  await first.done;

  assert.equal(playbackFake.played.length, 1);
  assert.deepEqual(calls.map((call) => call.flag), [1, 0]);
  assert.ok(orchestrator.start(async () => undefined));
  await orchestrator.whenIdle();
  assert.equal(playbackFake.played.length, 2);
});

test('filler job with an empty library still unmutes and never plays', async () => {
  const clock = new FakeClock();
  const playbackFake = makePlaybackFake({ clock });
  const { orchestrator, calls } = setup({
    clock,
    library: makeLibraryFake([]),
    playback: playbackFake.playback,
  });
  let resumes = 0;

  const job = orchestrator.start(async () => {
    resumes += 1;
  });
  assert.ok(job);

  assert.deepEqual(await job.done, { kind: 'skipped', reason: 'empty-library' });
  assert.deepEqual(playbackFake.played, []);
  assert.equal(resumes, 0);
  assert.deepEqual(calls.map((call) => call.flag), [1, 0]);
  assert.equal(orchestrator.isRunning(), false);
});

test('filler job survives an unreadable library', async () => {
  const { orchestrator, calls } = setup({ library: makeLibraryFake(new Error('EACCES')) });

  const job = orchestrator.start(async () => undefined);
  assert.ok(job);

  assert.deepEqual(await job.done, { kind: 'skipped', reason: 'library-unreadable' });
  assert.deepEqual(calls.map((call) => call.flag), [1, 0]);
});

test('filler job survives a playback that cannot start', async () => {
  const clock = new FakeClock();
  const broken = makePlaybackFake({ clock, startError: new Error('spawn ffplay ENOENT') });
  const { orchestrator, calls } = setup({ clock, playback: broken.playback });
  let resumes = 0;

  const job = orchestrator.start(async () => {
    resumes += 1;
  });
  assert.ok(job);

  assert.deepEqual(await job.done, { kind: 'skipped', reason: 'playback-failed' });
  assert.equal(resumes, 0);
  assert.deepEqual(clock.sleeps, []);
  assert.deepEqual(calls.map((call) => call.flag), [1, 0]);
});

test('filler job unmutes even when resuming the player fails', async () => {
  const { orchestrator, calls } = setup();

  const job = orchestrator.start(async () => {
    throw new Error('player vanished');
  });
  assert.ok(job);

  assert.equal((await job.done).kind, 'played');
  assert.deepEqual(calls.map((call) => call.flag), [1, 0]);
  assert.equal(orchestrator.isRunning(), false);
});

test('filler job treats a zero duration as nothing left to wait for', async () => {
  const clock = new FakeClock();
  const silent = makePlaybackFake({ clock, durationMs: 0 });
  const { orchestrator } = setup({ clock, playback: silent.playback });

  const job = orchestrator.start(async () => undefined);
  assert.ok(job);

  assert.deepEqual(await job.done, { kind: 'played', file: '/filler/b.mp3', durationMs: 0 });
  assert.deepEqual(clock.sleeps, [1500, 0]);
});
