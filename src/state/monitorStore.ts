import { createStore } from 'zustand/vanilla';

import { appConfig } from '@/config/appConfig';
import { isKnownLevel } from '@/services/ble/batteryLevel';
import type {
  BatteryChannel,
  BatteryMap,
  ConnectionState,
  DeviceIdentity,
  KnownDevice,
  LowBatteryAlert,
} from '@/types/device';
import { formatLowBatteryMessage, formatTooltip, LOW_BATTERY_TITLE, NOT_CONNECTED_TITLE, READY_STATUS } from '@/utils/formatters';

export interface MonitorStore {
  connectionState: ConnectionState;
  device: KnownDevice | null;
  batteries: BatteryChannel[];
  /** Lowest known level across all halves, -1 when nothing is known. */
  minLevel: number;
  /** Level the low battery check compares against; see armLowBatteryAlert. */
  lastMinLevel: number;
  tooltip: string;
  statusText: string;
  reconnectSecondsRemaining: number | null;
  discoveredDevices: DeviceIdentity[];
  scanning: boolean;
  lowBatteryAlert: LowBatteryAlert | null;
  lastUpdated: number | null;
  setConnectionState: (state: ConnectionState) => void;
  setDevice: (device: KnownDevice | null) => void;
  setBatteries: (batteries: BatteryMap, connected: boolean) => void;
  setStatusText: (statusText: string) => void;
  setReconnectCountdown: (seconds: number | null) => void;
  resetDiscoveredDevices: () => void;
  addDiscoveredDevice: (device: DeviceIdentity) => void;
  setScanning: (scanning: boolean) => void;
  armLowBatteryAlert: () => void;
  clearLowBatteryAlert: () => void;
}

interface MonitorStoreOptions {
  lowBatteryThreshold?: number;
}

const lowestKnownLevel = (channels: BatteryChannel[]) => {
  const known = channels.map((channel) => channel.level).filter(isKnownLevel);
  return known.length > 0 ? Math.min(...known) : -1;
};

export const createMonitorStore = ({ lowBatteryThreshold = appConfig.lowBatteryThreshold }: MonitorStoreOptions = {}) =>
  createStore<MonitorStore>((set, get) => ({
    connectionState: 'disconnected',
    device: null,
    batteries: [],
    minLevel: -1,
    lastMinLevel: -1,
    tooltip: NOT_CONNECTED_TITLE,
    statusText: READY_STATUS,
    reconnectSecondsRemaining: null,
    discoveredDevices: [],
    scanning: false,
    lowBatteryAlert: null,
    lastUpdated: null,
    setConnectionState: (connectionState) => set({ connectionState }),
    setDevice: (device) =>
      set((state) => ({
        device,
        tooltip: formatTooltip(device?.name ?? null, state.batteries, state.connectionState === 'connected'),
      })),
    setBatteries: (batteries, connected) => {
      const state = get();
      const channels = connected
        ? Object.values(batteries).sort((a, b) => a.handle - b.handle)
        : [];
      const minLevel = connected ? lowestKnownLevel(channels) : -1;
      // Halves that are all unknown leave the alert baseline untouched.
      const lastMinLevel = channels.length > 0 && minLevel === -1 ? state.lastMinLevel : minLevel;
      const deviceName = state.device?.name ?? '';

      const crossedThreshold =
        state.lastMinLevel > lowBatteryThreshold && minLevel !== -1 && minLevel <= lowBatteryThreshold;

      set({
        batteries: channels,
        minLevel,
        lastMinLevel,
        tooltip: formatTooltip(state.device?.name ?? null, channels, connected),
        lastUpdated: Date.now(),
        lowBatteryAlert: crossedThreshold
          ? {
              title: LOW_BATTERY_TITLE,
              message: formatLowBatteryMessage(deviceName, lowBatteryThreshold),
              level: minLevel,
              timestamp: Date.now(),
            }
          : state.lowBatteryAlert,
      });
    },
    setStatusText: (statusText) => set({ statusText }),
    setReconnectCountdown: (reconnectSecondsRemaining) => set({ reconnectSecondsRemaining }),
    resetDiscoveredDevices: () => set({ discoveredDevices: [] }),
    addDiscoveredDevice: (device) =>
      set((state) => ({
        discoveredDevices: state.discoveredDevices.some((known) => known.id === device.id)
          ? state.discoveredDevices
          : [...state.discoveredDevices, device],
      })),
    setScanning: (scanning) => set({ scanning }),
    armLowBatteryAlert: () => set({ lastMinLevel: 100 }),
    clearLowBatteryAlert: () => set({ lowBatteryAlert: null }),
  }));

export type MonitorStoreApi = ReturnType<typeof createMonitorStore>;

export const monitorStore = createMonitorStore();
