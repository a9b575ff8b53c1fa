import os from 'os';
import path from 'path';

type Env = Record<string, string | undefined>;

export const parseBoolean = (value: string | undefined, fallback: boolean) => {
  if (value === undefined) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }

  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return fallback;
};

export const parseNumber = (value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parseText = (value: string | undefined) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

export interface AppConfig {
  useMockBleTransport: boolean;
  reconnectIntervalTicks: number;
  tickMs: number;
  scanDurationMs: number;
  findDeviceTimeoutMs: number;
  lowBatteryThreshold: number;
  connectOnLaunch: boolean;
  deviceId: string | null;
  deviceName: string | null;
  deviceCachePath: string;
}

const defaultCachePath = () => path.join(os.homedir(), '.config', 'keyboard-battery-monitor', 'device.json');

export const loadAppConfig = (env: Env = process.env): AppConfig => ({
  useMockBleTransport: parseBoolean(env.KBM_USE_MOCK_BLE, false),
  reconnectIntervalTicks: Math.max(1, Math.floor(parseNumber(env.KBM_RECONNECT_INTERVAL, 300))),
  tickMs: parseNumber(env.KBM_TICK_MS, 1000),
  scanDurationMs: parseNumber(env.KBM_SCAN_MS, 5000),
  findDeviceTimeoutMs: parseNumber(env.KBM_FIND_TIMEOUT_MS, 10000),
  lowBatteryThreshold: parseNumber(env.KBM_LOW_BATTERY_THRESHOLD, 20),
  connectOnLaunch: parseBoolean(env.KBM_CONNECT_ON_LAUNCH, true),
  deviceId: parseText(env.KBM_DEVICE_ID),
  deviceName: parseText(env.KBM_DEVICE_NAME),
  deviceCachePath: parseText(env.KBM_DEVICE_CACHE) ?? defaultCachePath(),
});

export const appConfig = loadAppConfig();
