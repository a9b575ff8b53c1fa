import { bleProfile, characteristicUuidForHandle, uuidEquals } from '@/config/bleProfile';
import type {
  BatteryChannel,
  BatteryMap,
  ConnectOutcome,
  ConnectStatus,
  DeviceIdentity,
  ReadOutcome,
} from '@/types/device';

import { parseBatteryLevel } from './batteryLevel';
import type {
  BatteryMonitor,
  BatteryMonitorHandlers,
  BleTransport,
  DiscoveredDevice,
  NotificationListener,
  TransportHandle,
} from './types';

interface ConnectionSession {
  device: DeviceIdentity;
  handle: TransportHandle;
  channels: Map<number, BatteryChannel>;
  disposed: boolean;
}

const CANCELLED_MESSAGE = 'Connection attempt cancelled';
const SUBSCRIPTION_FAILED_MESSAGE = 'Notification subscription failed';
const LINK_LOST_MESSAGE = 'Connection lost during initial read';

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

const toOutcome = (status: ConnectStatus, errorMessage = ''): ConnectOutcome => ({ status, errorMessage });

const snapshotChannels = (channels: Iterable<BatteryChannel>): BatteryMap => {
  const batteries: BatteryMap = {};
  for (const channel of channels) {
    batteries[channel.handle] = { ...channel };
  }
  return batteries;
};

const readOutcome = (status: ReadOutcome['status'], batteries: BatteryMap = {}, errorMessage = ''): ReadOutcome => ({
  status,
  batteries,
  errorMessage,
});

export const createBatteryMonitor = (
  transport: BleTransport,
  handlers: BatteryMonitorHandlers,
): BatteryMonitor => {
  let session: ConnectionSession | null = null;
  let attempt: AbortController | null = null;
  const teardowns = new Set<Promise<void>>();

  const closeHandle = (handle: TransportHandle): Promise<void> => {
    const teardown = transport
      .disconnect(handle)
      .catch((error) => console.warn('[Monitor] Transport disconnect failed', error))
      .finally(() => {
        teardowns.delete(teardown);
      });
    teardowns.add(teardown);
    return teardown;
  };

  const disposeSession = (): ConnectionSession | null => {
    const current = session;
    session = null;
    if (!current) {
      return null;
    }

    current.disposed = true;
    current.channels.clear();
    return current;
  };

  const commitLevels = (target: ConnectionSession, batteries: BatteryMap) => {
    for (const channel of target.channels.values()) {
      const read = batteries[channel.handle];
      if (read) {
        channel.level = read.level;
      }
    }
  };

  const notificationListener =
    (target: ConnectionSession): NotificationListener =>
    (characteristicHandle, data) => {
      if (target.disposed) {
        return;
      }

      const level = parseBatteryLevel(data);
      if (level === null) {
        return;
      }

      const channel = target.channels.get(characteristicHandle);
      if (!channel) {
        return;
      }

      channel.level = level;
      if (session === target) {
        handlers.onBatteryLevelsChanged();
      }
    };

  const handleLinkLost = (lost: TransportHandle) => {
    const current = session;
    if (!current || current.handle.id !== lost.id) {
      return;
    }

    console.warn(`[Monitor] Lost connection to ${current.device.name}`);
    disposeSession();
    handlers.onBatteryLevelsChanged();
    handlers.onConnectionLost?.(current.device);
  };

  const readChannels = async (target: ConnectionSession): Promise<ReadOutcome> => {
    const channels = [...target.channels.values()];
    const batteries = snapshotChannels(channels);

    try {
      for (const channel of channels) {
        const value = await transport.readCharacteristic(target.handle, channel.handle);
        const level = parseBatteryLevel(value);
        if (level === null) {
          console.warn(`[Monitor] No value read for characteristic ${characteristicUuidForHandle(channel.handle)}`);
          continue;
        }

        batteries[channel.handle] = { ...channel, level };
      }
    } catch (error) {
      console.error('[Monitor] Error reading battery levels', error);
      return readOutcome('FAILURE', {}, describeError(error));
    }

    if (target.disposed) {
      return readOutcome('NOT_CONNECTED');
    }

    return readOutcome('SUCCESS', batteries);
  };

  const disconnect = () => {
    attempt?.abort();
    attempt = null;

    const previous = disposeSession();
    if (previous && transport.isConnected(previous.handle)) {
      // Not awaited: the next connect waits for pending teardowns instead.
      closeHandle(previous.handle);
    }
  };

  const connect = async (device: DeviceIdentity): Promise<ConnectOutcome> => {
    disconnect();

    const controller = new AbortController();
    attempt = controller;
    const { signal } = controller;

    let handle: TransportHandle | null = null;
    let candidate: ConnectionSession | null = null;

    const abandon = async (status: ConnectStatus, message = ''): Promise<ConnectOutcome> => {
      if (candidate && candidate !== session) {
        candidate.disposed = true;
        candidate.channels.clear();
      }

      if (handle) {
        const open = handle;
        handle = null;
        await closeHandle(open);
      }

      return toOutcome(status, message);
    };

    try {
      if (teardowns.size > 0) {
        await Promise.all([...teardowns]);
      }
      if (signal.aborted) {
        return await abandon('CANCELLED', CANCELLED_MESSAGE);
      }

      let found: DiscoveredDevice | null;
      try {
        found = await transport.findDeviceByAddress(device.id);
      } catch (error) {
        console.error(`[Monitor] Failed to locate ${device.name}`, error);
        return await abandon('DEVICE_NOT_FOUND', describeError(error));
      }

      if (signal.aborted) {
        return await abandon('CANCELLED', CANCELLED_MESSAGE);
      }
      if (!found) {
        return await abandon('DEVICE_NOT_FOUND');
      }

      try {
        handle = await transport.connect(found, { onDisconnect: handleLinkLost });
      } catch (error) {
        console.error(`[Monitor] Failed to connect to ${device.name}`, error);
        return await abandon('DEVICE_NOT_FOUND', describeError(error));
      }

      if (signal.aborted) {
        return await abandon('CANCELLED', CANCELLED_MESSAGE);
      }
      if (!transport.isConnected(handle)) {
        return await abandon('DEVICE_NOT_FOUND');
      }

      const services = await transport.getServices(handle);
      if (signal.aborted) {
        return await abandon('CANCELLED', CANCELLED_MESSAGE);
      }

      const batteryService = services.find((service) => uuidEquals(service.uuid, bleProfile.batteryServiceUuid));
      if (!batteryService) {
        return await abandon('BATTERY_SERVICE_NOT_FOUND');
      }

      const characteristics = batteryService.characteristics.filter((characteristic) =>
        uuidEquals(characteristic.uuid, bleProfile.batteryLevelCharacteristicUuid),
      );
      if (characteristics.length === 0) {
        return await abandon('BATTERY_LEVEL_CHARACTERISTIC_NOT_FOUND');
      }

      const pending: ConnectionSession = { device, handle, channels: new Map(), disposed: false };
      candidate = pending;
      const listener = notificationListener(pending);

      for (const characteristic of characteristics) {
        pending.channels.set(characteristic.handle, {
          handle: characteristic.handle,
          name: characteristic.description || bleProfile.defaultChannelName,
          level: bleProfile.unknownLevel,
        });

        try {
          await transport.subscribeNotify(pending.handle, characteristic.handle, listener);
        } catch (error) {
          console.error('[Monitor] Failed to subscribe to notifications', error);
          return await abandon('SUBSCRIPTION_FAILURE', describeError(error) || SUBSCRIPTION_FAILED_MESSAGE);
        }

        if (signal.aborted) {
          return await abandon('CANCELLED', CANCELLED_MESSAGE);
        }
      }

      // The session owns the handle from here on.
      session = pending;
      handle = null;

      const initial = await readChannels(pending);
      if (signal.aborted) {
        return toOutcome('CANCELLED', CANCELLED_MESSAGE);
      }
      // The link dropped while reading; handleLinkLost already tore it down.
      if (pending.disposed) {
        return toOutcome('DEVICE_NOT_FOUND', LINK_LOST_MESSAGE);
      }

      if (initial.status === 'SUCCESS') {
        commitLevels(pending, initial.batteries);
      } else {
        console.warn(`[Monitor] Initial battery read failed, keeping unknown levels: ${initial.errorMessage}`);
      }

      console.info(`[Monitor] Connected to ${device.name} (${pending.channels.size} battery channel(s))`);
      return toOutcome('CONNECTED');
    } catch (error) {
      console.error('[Monitor] Connection error', error);
      return await abandon('UNEXPECTED_ERROR', describeError(error));
    } finally {
      if (attempt === controller) {
        attempt = null;
      }
    }
  };

  const readBatteryLevels = async (): Promise<ReadOutcome> => {
    const target = session;
    if (!target || !transport.isConnected(target.handle)) {
      return readOutcome('NOT_CONNECTED');
    }

    return readChannels(target);
  };

  const refresh = async (): Promise<ReadOutcome> => {
    const target = session;
    const result = await readBatteryLevels();
    if (result.status === 'SUCCESS' && target && session === target) {
      commitLevels(target, result.batteries);
      handlers.onBatteryLevelsChanged();
    }
    return result;
  };

  return {
    connect,
    disconnect,
    isConnected: () => session !== null && transport.isConnected(session.handle),
    readBatteryLevels,
    refresh,
    get batteries() {
      return session ? snapshotChannels(session.channels.values()) : {};
    },
    get device() {
      return session?.device ?? null;
    },
  };
};
