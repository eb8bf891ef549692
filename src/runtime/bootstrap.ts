import type { AppConfig } from '@/config';
import { createLogger, logManager } from '@/shared/logging/logger';
import { AdResponseCoordinator, type AdResponseMode } from '@/application/AdResponseCoordinator';
import { MuteController } from '@/application/audio/MuteController';
import { PlayerBindingRegistry } from '@/application/binding/PlayerBindingRegistry';
import { StateTracker } from '@/application/detection/StateTracker';
import { FillerPlaybackOrchestrator } from '@/application/filler/FillerPlaybackOrchestrator';
import { createRuntimePorts, type RuntimePorts } from '@/runtime/ports';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

const FILLER_STOP_TIMEOUT_MS = 5000;
const SERVICE_STOP_TIMEOUT_MS = 3000;

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
};

export type StartResult = 'started' | 'already-running';

export type Runtime = {
  start: () => Promise<StartResult>;
  stop: () => Promise<void>;
  coordinator: AdResponseCoordinator;
  binding: PlayerBindingRegistry;
  muteController: MuteController;
  filler: FillerPlaybackOrchestrator | null;
};

export function createRuntime(config: AppConfig, overrides: Partial<RuntimePorts> = {}): Runtime {
  const ports = createRuntimePorts(config, overrides);
  const muteController = new MuteController(ports.mixer, config.env.mixerAppName);
  const filler = ports.library
    ? new FillerPlaybackOrchestrator({
        muteController,
        library: ports.library,
        playback: ports.playback,
        clock: ports.clock,
        settleDelayMs: config.env.settleDelayMs,
      })
    : null;

  let bindingRef: PlayerBindingRegistry | null = null;
  const requireBinding = (): PlayerBindingRegistry => {
    if (!bindingRef) {
      throw new Error('player binding not configured');
    }
    return bindingRef;
  };
  const mode: AdResponseMode = filler
    ? { kind: 'filler', filler, resumePlayer: () => requireBinding().resume() }
    : { kind: 'simple' };
  const coordinator = new AdResponseCoordinator({
    mode,
    tracker: new StateTracker(),
    muteController,
  });
  const binding = new PlayerBindingRegistry({
    player: ports.player,
    playerName: config.env.playerName,
    onMetadata: (event) => {
      void coordinator.handleMetadata(event);
    },
  });
  bindingRef = binding;
  let running = false;

  async function startServices(): Promise<StartResult> {
    logManager.configure({ level: config.env.logLevel, json: config.env.logJson });
    const log = createLogger('Server');

    if (!(await ports.lock.acquire())) {
      return 'already-running';
    }
    running = true;

    const rejected = config.filler.mode === 'simple' ? config.filler.rejected : undefined;
    if (rejected) {
      log.warn('filler directory unusable; muting only', { ...rejected });
    }
    log.info('starting ad silencer', {
      mode: coordinator.modeKind,
      player: config.env.playerName,
      app: config.env.mixerAppName,
      fillerDir: config.filler.directory,
    });
    await binding.start();
    log.info('startup complete');
    return 'started';
  }

  async function stopServices(): Promise<void> {
    if (!running) {
      return;
    }
    running = false;
    const log = createLogger('Server').child('Shutdown');
    binding.stop();

    const draining: LifecycleService[] = [
      { name: 'metadata-queue', stop: () => coordinator.drain() },
    ];
    if (filler) {
      draining.push({ name: 'filler-job', stop: () => filler.whenIdle() });
    }
    await Promise.all(
      draining.map((service) =>
        stopWithTimeout(service.name, service.stop, FILLER_STOP_TIMEOUT_MS, log),
      ),
    );

    // Kills any filler player a timed-out job left behind.
    const services: LifecycleService[] = [
      { name: 'filler-player', stop: async () => ports.playback.stopAll() },
    ];
    if (muteController.isMuted()) {
      services.push({
        name: 'stream-restore',
        stop: async () => {
          if (!(await muteController.unmute())) {
            throw new Error('stream could not be unmuted');
          }
        },
      });
    }
    services.push({ name: 'player-bus', stop: async () => ports.player.disconnect() });
    services.push({ name: 'instance-lock', stop: () => ports.lock.release() });
    for (const service of services) {
      await stopWithTimeout(service.name, service.stop, SERVICE_STOP_TIMEOUT_MS, log);
    }
  }

  return {
    start: startServices,
    stop: stopServices,
    coordinator,
    binding,
    muteController,
    filler,
  };
}
