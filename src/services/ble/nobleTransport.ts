import noble from '@abandonware/noble';
import type { Characteristic, Peripheral } from '@abandonware/noble';

import { bleProfile, normalizeUuid, uuidEquals } from '@/config/bleProfile';

import {
  type BleTransport,
  BleTransportError,
  type DiscoveredDevice,
  type GattService,
  type NotificationListener,
  type TransportHandle,
} from './types';

interface Subscription {
  characteristic: Characteristic;
  onData: (data: Buffer, isNotification: boolean) => void;
}

interface NobleConnection {
  handle: TransportHandle;
  peripheral: Peripheral;
  characteristics: Map<number, Characteristic>;
  subscriptions: Subscription[];
  closed: boolean;
}

export interface NobleTransportOptions {
  scanDurationMs: number;
  findDeviceTimeoutMs: number;
}

const addressOf = (peripheral: Peripheral) =>
  peripheral.address && peripheral.address !== 'unknown' ? peripheral.address : peripheral.id;

const nameOf = (peripheral: Peripheral) => peripheral.advertisement?.localName || null;

const waitForPoweredOn = (timeoutMs: number) =>
  new Promise<void>((resolve, reject) => {
    if (noble.state === 'poweredOn') {
      resolve();
      return;
    }

    const onStateChange = (state: string) => {
      if (state !== 'poweredOn') {
        return;
      }
      clearTimeout(timer);
      noble.removeListener('stateChange', onStateChange);
      resolve();
    };

    const timer = setTimeout(() => {
      noble.removeListener('stateChange', onStateChange);
      reject(new BleTransportError(`Bluetooth adapter is not powered on (state: ${noble.state})`));
    }, timeoutMs);

    noble.on('stateChange', onStateChange);
  });

const readUserDescription = async (characteristic: Characteristic): Promise<string | null> => {
  try {
    const descriptors = await characteristic.discoverDescriptorsAsync();
    const userDescription = descriptors.find((descriptor) =>
      uuidEquals(descriptor.uuid, bleProfile.userDescriptionDescriptorUuid),
    );
    if (!userDescription) {
      return null;
    }

    const value = await userDescription.readValueAsync();
    const text = value.toString('utf8').replace(/\0+$/, '').trim();
    return text || null;
  } catch (error) {
    console.debug('[BLE] User description read failed', error);
    return null;
  }
};

/**
 * Host BLE stack through noble. Characteristic handles are assigned per
 * connection in discovery order, since noble does not expose ATT handles.
 */
export const createNobleTransport = ({ scanDurationMs, findDeviceTimeoutMs }: NobleTransportOptions): BleTransport => {
  const knownPeripherals = new Map<string, Peripheral>();
  const connections = new Map<number, NobleConnection>();
  let nextHandleId = 1;
  let scanQueue: Promise<unknown> = Promise.resolve();

  // noble runs one scan at a time; overlapping callers take turns.
  const exclusive = <T>(task: () => Promise<T>): Promise<T> => {
    const run = scanQueue.then(task, task);
    scanQueue = run.catch(() => undefined);
    return run;
  };

  const discover = (durationMs: number, match?: (peripheral: Peripheral) => boolean) =>
    exclusive(async () => {
      await waitForPoweredOn(durationMs);

      return new Promise<Peripheral[]>((resolve, reject) => {
        const found = new Map<string, Peripheral>();
        let settled = false;

        const finish = () => {
          if (settled) {
            return;
          }
          settled = true;
          clearTimeout(timer);
          noble.removeListener('discover', onDiscover);
          noble.stopScanningAsync().then(() => resolve([...found.values()]), reject);
        };

        const onDiscover = (peripheral: Peripheral) => {
          found.set(peripheral.id, peripheral);
          knownPeripherals.set(addressOf(peripheral).toLowerCase(), peripheral);
          if (match?.(peripheral)) {
            finish();
          }
        };

        const timer = setTimeout(finish, durationMs);
        noble.on('discover', onDiscover);
        noble.startScanningAsync([], false).catch((error: unknown) => {
          settled = true;
          clearTimeout(timer);
          noble.removeListener('discover', onDiscover);
          reject(error);
        });
      });
    });

  const requireConnection = (handle: TransportHandle) => {
    const connection = connections.get(handle.id);
    if (!connection || connection.closed) {
      throw new BleTransportError(`Not connected to ${handle.address}`);
    }
    return connection;
  };

  const requireCharacteristic = (connection: NobleConnection, characteristicHandle: number) => {
    const characteristic = connection.characteristics.get(characteristicHandle);
    if (!characteristic) {
      throw new BleTransportError(`Unknown characteristic handle ${characteristicHandle}`);
    }
    return characteristic;
  };

  const release = (connection: NobleConnection) => {
    connection.closed = true;
    connection.subscriptions.forEach(({ characteristic, onData }) => {
      characteristic.removeListener('data', onData);
    });
    connection.subscriptions = [];
    connection.characteristics.clear();
    connections.delete(connection.handle.id);
  };

  const disconnect = async (handle: TransportHandle) => {
    const connection = connections.get(handle.id);
    if (!connection) {
      return;
    }

    release(connection);
    if (connection.peripheral.state !== 'disconnected') {
      await connection.peripheral.disconnectAsync();
    }
  };

  return {
    scan: async () => {
      const peripherals = await discover(scanDurationMs);
      return peripherals.map<DiscoveredDevice>((peripheral) => ({
        address: addressOf(peripheral),
        name: nameOf(peripheral),
      }));
    },
    findDeviceByAddress: async (address) => {
      const wanted = address.toLowerCase();
      const peripherals = await discover(findDeviceTimeoutMs, (peripheral) => addressOf(peripheral).toLowerCase() === wanted);
      const match = peripherals.find((peripheral) => addressOf(peripheral).toLowerCase() === wanted);
      return match ? { address: addressOf(match), name: nameOf(match) } : null;
    },
    connect: async (device, options = {}) => {
      const peripheral = knownPeripherals.get(device.address.toLowerCase());
      if (!peripheral) {
        throw new BleTransportError(`Device ${device.address} has not been discovered`);
      }

      await peripheral.connectAsync();

      const handle: TransportHandle = { id: nextHandleId++, address: addressOf(peripheral) };
      const connection: NobleConnection = {
        handle,
        peripheral,
        characteristics: new Map(),
        subscriptions: [],
        closed: false,
      };
      connections.set(handle.id, connection);

      peripheral.once('disconnect', () => {
        if (connection.closed) {
          return;
        }
        console.warn(`[BLE] ${handle.address} disconnected`);
        release(connection);
        options.onDisconnect?.(handle);
      });

      return handle;
    },
    isConnected: (handle) => {
      const connection = connections.get(handle.id);
      return !!connection && !connection.closed && connection.peripheral.state === 'connected';
    },
    getServices: async (handle) => {
      const connection = requireConnection(handle);
      // Handles from an earlier enumeration on this connection are dropped.
      connection.characteristics.clear();
      let nextCharacteristicHandle = 1;

      const services = await connection.peripheral.discoverServicesAsync([]);
      const result: GattService[] = [];
      for (const service of services) {
        const characteristics = await service.discoverCharacteristicsAsync([]);
        const described: GattService['characteristics'] = [];
        for (const characteristic of characteristics) {
          const characteristicHandle = nextCharacteristicHandle++;
          connection.characteristics.set(characteristicHandle, characteristic);
          described.push({
            uuid: normalizeUuid(characteristic.uuid),
            handle: characteristicHandle,
            description: await readUserDescription(characteristic),
          });
        }
        result.push({ uuid: normalizeUuid(service.uuid), characteristics: described });
      }
      return result;
    },
    readCharacteristic: async (handle, characteristicHandle) => {
      const connection = requireConnection(handle);
      return requireCharacteristic(connection, characteristicHandle).readAsync();
    },
    subscribeNotify: async (handle, characteristicHandle, listener: NotificationListener) => {
      const connection = requireConnection(handle);
      const characteristic = requireCharacteristic(connection, characteristicHandle);
      // noble also emits 'data' for plain reads; only notifications pass.
      const onData = (data: Buffer, isNotification: boolean) => {
        if (isNotification && !connection.closed) {
          listener(characteristicHandle, data);
        }
      };

      characteristic.on('data', onData);
      try {
        await characteristic.subscribeAsync();
      } catch (error) {
        characteristic.removeListener('data', onData);
        throw error;
      }
      connection.subscriptions.push({ characteristic, onData });
    },
    disconnect,
    dispose: async () => {
      await Promise.all([...connections.values()].map((connection) => disconnect(connection.handle)));
      await noble.stopScanningAsync();
    },
  };
};
