import { bleProfile } from '@/config/bleProfile';

import {
  type BleTransport,
  BleTransportError,
  type ConnectOptions,
  type DiscoveredDevice,
  type GattService,
  type NotificationListener,
  type TransportHandle,
} from './types';

export interface MockCharacteristic {
  uuid: string;
  handle: number;
  description?: string | null;
  value?: number[] | null;
  readError?: string;
  subscribeError?: string;
}

export interface MockService {
  uuid: string;
  characteristics: MockCharacteristic[];
}

export interface MockPeripheral {
  address: string;
  name: string | null;
  services: MockService[];
  present?: boolean;
  connectError?: string;
  /** Connect resolves but the link never reports itself as up. */
  staysDisconnected?: boolean;
}

export interface MockTransportOptions {
  peripherals?: MockPeripheral[];
  scanError?: string;
  findError?: string;
}

interface MockConnection {
  handle: TransportHandle;
  peripheral: MockPeripheral;
  connected: boolean;
  listeners: Map<number, NotificationListener[]>;
  onDisconnect?: ConnectOptions['onDisconnect'];
}

export interface MockTransportStats {
  scans: number;
  connects: number;
  disconnects: number;
  subscriptions: number;
  reads: number;
}

export interface MockTransport extends BleTransport {
  notify: (address: string, characteristicHandle: number, bytes: number[]) => void;
  /** Delivers to one connection even after it was closed, like a late radio event. */
  notifyHandle: (handle: TransportHandle, characteristicHandle: number, bytes: number[]) => void;
  setValue: (address: string, characteristicHandle: number, bytes: number[] | null) => void;
  setReadError: (address: string, characteristicHandle: number, message: string | null) => void;
  setPresent: (address: string, present: boolean) => void;
  dropConnection: (address: string) => void;
  openConnections: () => number;
  readonly stats: MockTransportStats;
}

const clonePeripheral = (peripheral: MockPeripheral): MockPeripheral => ({
  ...peripheral,
  services: peripheral.services.map((service) => ({
    ...service,
    characteristics: service.characteristics.map((characteristic) => ({
      ...characteristic,
      value: characteristic.value ? [...characteristic.value] : characteristic.value,
    })),
  })),
});

const toGattServices = (peripheral: MockPeripheral): GattService[] =>
  peripheral.services.map((service) => ({
    uuid: service.uuid,
    characteristics: service.characteristics.map((characteristic) => ({
      uuid: characteristic.uuid,
      handle: characteristic.handle,
      description: characteristic.description ?? null,
    })),
  }));

/**
 * In-process BLE stack. Backs the simulated keyboard when no radio is wanted
 * and stands in for the host stack in tests.
 */
export const createMockTransport = ({
  peripherals = [],
  scanError,
  findError,
}: MockTransportOptions = {}): MockTransport => {
  const devices = peripherals.map(clonePeripheral);
  const connections = new Map<number, MockConnection>();
  const stats: MockTransportStats = { scans: 0, connects: 0, disconnects: 0, subscriptions: 0, reads: 0 };
  let nextHandleId = 1;

  const findPeripheral = (address: string) =>
    devices.find((device) => device.address.toLowerCase() === address.toLowerCase());

  const findCharacteristic = (peripheral: MockPeripheral, characteristicHandle: number) => {
    for (const service of peripheral.services) {
      const match = service.characteristics.find((characteristic) => characteristic.handle === characteristicHandle);
      if (match) {
        return match;
      }
    }
    return null;
  };

  const requireCharacteristic = (peripheral: MockPeripheral, characteristicHandle: number) => {
    const characteristic = findCharacteristic(peripheral, characteristicHandle);
    if (!characteristic) {
      throw new BleTransportError(`Unknown characteristic handle ${characteristicHandle}`);
    }
    return characteristic;
  };

  const requireConnection = (handle: TransportHandle) => {
    const connection = connections.get(handle.id);
    if (!connection || !connection.connected) {
      throw new BleTransportError(`Not connected to ${handle.address}`);
    }
    return connection;
  };

  const isPresent = (peripheral: MockPeripheral) => peripheral.present !== false;

  const deliver = (connection: MockConnection, characteristicHandle: number, bytes: number[]) => {
    const listeners = connection.listeners.get(characteristicHandle) ?? [];
    const data = Uint8Array.from(bytes);
    listeners.forEach((listener) => listener(characteristicHandle, data));
  };

  return {
    scan: async () => {
      stats.scans += 1;
      if (scanError) {
        throw new BleTransportError(scanError);
      }
      return devices.filter(isPresent).map<DiscoveredDevice>(({ address, name }) => ({ address, name }));
    },
    findDeviceByAddress: async (address) => {
      if (findError) {
        throw new BleTransportError(findError);
      }
      const peripheral = findPeripheral(address);
      if (!peripheral || !isPresent(peripheral)) {
        return null;
      }
      return { address: peripheral.address, name: peripheral.name };
    },
    connect: async (device, options = {}) => {
      stats.connects += 1;
      const peripheral = findPeripheral(device.address);
      if (!peripheral || !isPresent(peripheral)) {
        throw new BleTransportError(`Device ${device.address} is out of range`);
      }
      if (peripheral.connectError) {
        throw new BleTransportError(peripheral.connectError);
      }

      const handle: TransportHandle = { id: nextHandleId++, address: peripheral.address };
      connections.set(handle.id, {
        handle,
        peripheral,
        connected: !peripheral.staysDisconnected,
        listeners: new Map(),
        onDisconnect: options.onDisconnect,
      });
      return handle;
    },
    isConnected: (handle) => connections.get(handle.id)?.connected ?? false,
    getServices: async (handle) => toGattServices(requireConnection(handle).peripheral),
    readCharacteristic: async (handle, characteristicHandle) => {
      const connection = requireConnection(handle);
      stats.reads += 1;
      const characteristic = requireCharacteristic(connection.peripheral, characteristicHandle);
      if (characteristic.readError) {
        throw new BleTransportError(characteristic.readError);
      }
      return Uint8Array.from(characteristic.value ?? []);
    },
    subscribeNotify: async (handle, characteristicHandle, listener) => {
      const connection = requireConnection(handle);
      const characteristic = requireCharacteristic(connection.peripheral, characteristicHandle);
      if (characteristic.subscribeError !== undefined) {
        throw new BleTransportError(characteristic.subscribeError);
      }

      stats.subscriptions += 1;
      const listeners = connection.listeners.get(characteristicHandle) ?? [];
      connection.listeners.set(characteristicHandle, [...listeners, listener]);
    },
    disconnect: async (handle) => {
      stats.disconnects += 1;
      const connection = connections.get(handle.id);
      if (connection) {
        connection.connected = false;
      }
    },
    dispose: async () => {
      connections.forEach((connection) => {
        connection.connected = false;
      });
    },
    notify: (address, characteristicHandle, bytes) => {
      const peripheral = findPeripheral(address);
      const characteristic = peripheral ? findCharacteristic(peripheral, characteristicHandle) : null;
      if (characteristic) {
        characteristic.value = [...bytes];
      }

      connections.forEach((connection) => {
        if (connection.connected && connection.handle.address === peripheral?.address) {
          deliver(connection, characteristicHandle, bytes);
        }
      });
    },
    notifyHandle: (handle, characteristicHandle, bytes) => {
      const connection = connections.get(handle.id);
      if (connection) {
        deliver(connection, characteristicHandle, bytes);
      }
    },
    setValue: (address, characteristicHandle, bytes) => {
      const peripheral = findPeripheral(address);
      if (peripheral) {
        requireCharacteristic(peripheral, characteristicHandle).value = bytes ? [...bytes] : null;
      }
    },
    setReadError: (address, characteristicHandle, message) => {
      const peripheral = findPeripheral(address);
      if (peripheral) {
        requireCharacteristic(peripheral, characteristicHandle).readError = message ?? undefined;
      }
    },
    setPresent: (address, present) => {
      const peripheral = findPeripheral(address);
      if (peripheral) {
        peripheral.present = present;
      }
    },
    dropConnection: (address) => {
      connections.forEach((connection) => {
        if (connection.connected && connection.handle.address.toLowerCase() === address.toLowerCase()) {
          connection.connected = false;
          connection.onDisconnect?.(connection.handle);
        }
      });
    },
    openConnections: () => [...connections.values()].filter((connection) => connection.connected).length,
    stats,
  };
};

export const SIMULATED_KEYBOARD_ADDRESS = 'de:ad:be:ef:00:01';

export const simulatedKeyboard = (): MockPeripheral => ({
  address: SIMULATED_KEYBOARD_ADDRESS,
  name: 'Split Keyboard (simulated)',
  services: [
    {
      uuid: bleProfile.batteryServiceUuid,
      characteristics: [
        { uuid: bleProfile.batteryLevelCharacteristicUuid, handle: 0x1a, description: 'Central', value: [87] },
        { uuid: bleProfile.batteryLevelCharacteristicUuid, handle: 0x1e, description: 'Peripheral 0', value: [64] },
      ],
    },
  ],
});

/**
 * Drains one simulated half per tick and pushes the new level as a notification.
 * Returns a stop function.
 */
export const startSimulatedDrain = (transport: MockTransport, peripheral: MockPeripheral, intervalMs: number) => {
  const levels = new Map<number, number>();
  peripheral.services.forEach((service) =>
    service.characteristics.forEach((characteristic) => {
      levels.set(characteristic.handle, characteristic.value?.[0] ?? 100);
    }),
  );

  const handles = [...levels.keys()];
  let cursor = 0;

  const timer = setInterval(() => {
    if (handles.length === 0) {
      return;
    }

    const handle = handles[cursor % handles.length];
    cursor += 1;
    const current = levels.get(handle) ?? 100;
    const next = current <= 0 ? 100 : current - 1;
    levels.set(handle, next);
    transport.notify(peripheral.address, handle, [next]);
  }, intervalMs);

  return () => clearInterval(timer);
};
