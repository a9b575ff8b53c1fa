import type { BatteryMap, ConnectOutcome, DeviceIdentity, ReadOutcome } from '@/types/device';

export interface DiscoveredDevice {
  address: string;
  name: string | null;
}

export interface TransportHandle {
  readonly id: number;
  readonly address: string;
}

export interface GattCharacteristic {
  uuid: string;
  /** Unique within one transport connection. */
  handle: number;
  description: string | null;
}

export interface GattService {
  uuid: string;
  characteristics: GattCharacteristic[];
}

export type NotificationListener = (characteristicHandle: number, data: Uint8Array) => void;

export interface ConnectOptions {
  onDisconnect?: (handle: TransportHandle) => void;
}

/**
 * Host BLE stack as seen by the monitor. Every call may be slow; none of them
 * is expected to time out on its own.
 */
export interface BleTransport {
  scan: () => Promise<DiscoveredDevice[]>;
  findDeviceByAddress: (address: string) => Promise<DiscoveredDevice | null>;
  connect: (device: DiscoveredDevice, options?: ConnectOptions) => Promise<TransportHandle>;
  isConnected: (handle: TransportHandle) => boolean;
  getServices: (handle: TransportHandle) => Promise<GattService[]>;
  readCharacteristic: (handle: TransportHandle, characteristicHandle: number) => Promise<Uint8Array>;
  subscribeNotify: (
    handle: TransportHandle,
    characteristicHandle: number,
    listener: NotificationListener,
  ) => Promise<void>;
  disconnect: (handle: TransportHandle) => Promise<void>;
  dispose: () => Promise<void>;
}

export class BleTransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BleTransportError';
  }
}

export interface BatteryMonitorHandlers {
  onBatteryLevelsChanged: () => void;
  onConnectionLost?: (device: DeviceIdentity) => void;
}

export interface BatteryMonitor {
  connect: (device: DeviceIdentity) => Promise<ConnectOutcome>;
  disconnect: () => void;
  isConnected: () => boolean;
  readBatteryLevels: () => Promise<ReadOutcome>;
  refresh: () => Promise<ReadOutcome>;
  readonly batteries: BatteryMap;
  readonly device: DeviceIdentity | null;
}

export type SchedulerState = 'idle' | 'countingDown' | 'connecting' | 'connected';

export interface ReconnectSchedulerHandlers {
  connect: () => Promise<ConnectOutcome>;
  onCountdown?: (secondsRemaining: number) => void;
  onAttempt?: () => void;
  onOutcome?: (outcome: ConnectOutcome) => void;
}

export interface ReconnectScheduler {
  start: (options?: { immediate?: boolean }) => void;
  stop: () => void;
  readonly state: SchedulerState;
  readonly isRunning: boolean;
  readonly secondsRemaining: number;
}
