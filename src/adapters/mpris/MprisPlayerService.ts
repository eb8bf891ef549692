import { sessionBus, Variant, type MessageBus } from 'dbus-next';
import type { TrackMetadataEvent } from '@/domain/playback/types';
import type {
  PlayerPort,
  PlayerPresenceListener,
  PlayerPresenceWatch,
  PlayerSubscription,
} from '@/ports/PlayerPort';
import { bestEffortSync } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';

const MPRIS_PREFIX = 'org.mpris.MediaPlayer2.';
const MPRIS_PATH = '/org/mpris/MediaPlayer2';
const PLAYER_IFACE = 'org.mpris.MediaPlayer2.Player';
const PROPERTIES_IFACE = 'org.freedesktop.DBus.Properties';
const DBUS_NAME = 'org.freedesktop.DBus';
const DBUS_PATH = '/org/freedesktop/DBus';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function unwrap(value: unknown): unknown {
  return value instanceof Variant ? value.value : value;
}

/** `org.mpris.MediaPlayer2.spotify` -> `spotify`; null for non-MPRIS names. */
export function playerNameFromBusName(busName: string): string | null {
  if (!busName.startsWith(MPRIS_PREFIX)) {
    return null;
  }
  const name = busName.slice(MPRIS_PREFIX.length);
  return name || null;
}

/** Artist arrives as a list, title as a string (a list for some players). */
export function normalizeMetadataField(value: unknown): string {
  const raw = unwrap(value);
  if (typeof raw === 'string') {
    return raw;
  }
  if (Array.isArray(raw)) {
    return raw.filter((item): item is string => typeof item === 'string').join(', ');
  }
  return '';
}

export function readTrackMetadata(metadata: unknown): TrackMetadataEvent | null {
  const raw = unwrap(metadata);
  if (!isRecord(raw)) {
    return null;
  }
  return {
    artist: normalizeMetadataField(raw['xesam:artist']),
    title: normalizeMetadataField(raw['xesam:title']),
  };
}

export type OwnerChangedListener = (busName: string, oldOwner: string, newOwner: string) => void;
export type PropertiesChangedListener = (iface: string, changed: unknown, invalidated: unknown) => void;

export interface SignalSource<L> {
  on(event: string, listener: L): void;
  off(event: string, listener: L): void;
}

/** `org.freedesktop.DBus` on the bus daemon. */
export interface BusDaemon extends SignalSource<OwnerChangedListener> {
  listNames(): Promise<unknown>;
}

export interface MprisPlayerObject {
  properties: SignalSource<PropertiesChangedListener>;
  play(): Promise<void>;
}

/** The slice of a bus connection the service needs. */
export interface MprisConnection {
  daemon(): Promise<BusDaemon>;
  player(busName: string): Promise<MprisPlayerObject>;
  disconnect(): void;
}

export function connectSessionBus(bus: MessageBus = sessionBus()): MprisConnection {
  return {
    daemon: async () => {
      const proxy = await bus.getProxyObject(DBUS_NAME, DBUS_PATH);
      const iface = proxy.getInterface(DBUS_NAME);
      return {
        on: (event, listener) => {
          iface.on(event, listener);
        },
        off: (event, listener) => {
          iface.off(event, listener);
        },
        listNames: async () => {
          const names: unknown = await iface.ListNames();
          return names;
        },
      };
    },
    player: async (busName) => {
      const proxy = await bus.getProxyObject(busName, MPRIS_PATH);
      const properties = proxy.getInterface(PROPERTIES_IFACE);
      const player = proxy.getInterface(PLAYER_IFACE);
      return {
        properties: {
          on: (event, listener) => {
            properties.on(event, listener);
          },
          off: (event, listener) => {
            properties.off(event, listener);
          },
        },
        play: async () => {
          await player.Play();
        },
      };
    },
    disconnect: () => bus.disconnect(),
  };
}

/**
 * MPRIS players on the session bus. The connection is opened on first use.
 */
export class MprisPlayerService implements PlayerPort {
  private readonly log = createLogger('Player', 'Mpris');
  private connection: MprisConnection | null;
  private daemon: Promise<BusDaemon> | null = null;

  constructor(connection?: MprisConnection) {
    this.connection = connection ?? null;
  }

  public async listPlayers(): Promise<string[]> {
    const daemon = await this.getDaemon();
    const names = await daemon.listNames();
    if (!Array.isArray(names)) {
      return [];
    }
    return names
      .filter((name): name is string => typeof name === 'string')
      .map(playerNameFromBusName)
      .filter((name): name is string => name !== null);
  }

  public async watchPresence(listener: PlayerPresenceListener): Promise<PlayerPresenceWatch> {
    const daemon = await this.getDaemon();
    const onOwnerChanged: OwnerChangedListener = (busName, oldOwner, newOwner) => {
      const name = playerNameFromBusName(busName);
      if (!name) {
        return;
      }
      this.log.spam('mpris owner changed', { name, oldOwner, newOwner });
      if (oldOwner) {
        listener.onVanish(name);
      }
      if (newOwner) {
        listener.onAppear(name);
      }
    };
    daemon.on('NameOwnerChanged', onOwnerChanged);
    return {
      stop: () => {
        daemon.off('NameOwnerChanged', onOwnerChanged);
      },
    };
  }

  public async subscribe(
    name: string,
    onMetadata: (event: TrackMetadataEvent) => void,
  ): Promise<PlayerSubscription> {
    const player = await this.getConnection().player(`${MPRIS_PREFIX}${name}`);

    const onPropertiesChanged: PropertiesChangedListener = (iface, changed) => {
      if (iface !== PLAYER_IFACE || !isRecord(changed) || !('Metadata' in changed)) {
        return;
      }
      const event = readTrackMetadata(changed.Metadata);
      if (event) {
        onMetadata(event);
      }
    };
    player.properties.on('PropertiesChanged', onPropertiesChanged);

    return {
      resume: () => player.play(),
      close: () => {
        player.properties.off('PropertiesChanged', onPropertiesChanged);
      },
    };
  }

  public disconnect(): void {
    const connection = this.connection;
    this.connection = null;
    this.daemon = null;
    if (!connection) {
      return;
    }
    bestEffortSync(() => connection.disconnect(), {
      fallback: undefined,
      onError: 'debug',
      label: 'session bus disconnect failed',
      log: this.log,
    });
  }

  private getConnection(): MprisConnection {
    if (!this.connection) {
      this.connection = connectSessionBus();
    }
    return this.connection;
  }

  private getDaemon(): Promise<BusDaemon> {
    if (!this.daemon) {
      this.daemon = this.getConnection().daemon();
    }
    return this.daemon;
  }
}
