import { type AppConfig, appConfig } from '@/config/appConfig';
import { createBatteryMonitor } from '@/services/ble/batteryMonitor';
import { listPairedDevices } from '@/services/ble/deviceEnumerator';
import { createReconnectScheduler } from '@/services/ble/reconnectScheduler';
import type { BatteryMonitor, BleTransport, ReconnectScheduler } from '@/services/ble/types';
import { type MonitorStoreApi, monitorStore } from '@/state/monitorStore';
import { saveKnownDevice } from '@/storage/deviceCache';
import type { ConnectOutcome, DeviceIdentity, KnownDevice, ReadOutcome } from '@/types/device';
import {
  formatConnectedStatus,
  formatConnectFailure,
  formatConnectingStatus,
  formatConnectionLostStatus,
  formatCountdownStatus,
  formatDeviceMissingStatus,
  READY_STATUS,
} from '@/utils/formatters';

type ControllerConfig = Pick<AppConfig, 'reconnectIntervalTicks' | 'tickMs' | 'connectOnLaunch'>;

interface MonitorControllerDeps {
  transport: BleTransport;
  store?: MonitorStoreApi;
  config?: ControllerConfig;
  saveDevice?: (device: KnownDevice | null) => Promise<void>;
}

export interface MonitorController {
  run: (initialDevice?: DeviceIdentity | null) => Promise<void>;
  reloadDevices: () => Promise<void>;
  connect: (device: DeviceIdentity) => Promise<ConnectOutcome>;
  disconnect: () => Promise<void>;
  refresh: () => Promise<ReadOutcome>;
  exit: () => Promise<void>;
  readonly monitor: BatteryMonitor;
  readonly scheduler: ReconnectScheduler;
}

const NO_DEVICE_OUTCOME: ConnectOutcome = { status: 'DEVICE_NOT_FOUND', errorMessage: 'No device selected' };

const toKnownDevice = (device: DeviceIdentity): KnownDevice => ({
  id: device.id,
  name: device.name,
  lastSeenTs: Date.now(),
});

/**
 * Headless counterpart of the tray application: keeps the store in step with
 * the monitor and drives reconnects for the remembered device.
 */
export const createMonitorController = ({
  transport,
  store = monitorStore,
  config = appConfig,
  saveDevice = saveKnownDevice,
}: MonitorControllerDeps): MonitorController => {
  const state = () => store.getState();

  const persist = (device: KnownDevice | null) => {
    saveDevice(device).catch((error) => console.warn('[Monitor] Failed to remember device', error));
  };

  const syncBatteries = () => {
    state().setBatteries(monitor.batteries, monitor.isConnected());
  };

  const handleConnected = (device: DeviceIdentity) => {
    const known = toKnownDevice(device);
    const current = state();
    current.setDevice(known);
    current.setConnectionState('connected');
    current.setReconnectCountdown(null);
    current.setStatusText(formatConnectedStatus(device.name));
    syncBatteries();
    persist(known);
  };

  const handleFailure = (device: DeviceIdentity, outcome: ConnectOutcome) => {
    const current = state();
    current.setConnectionState('disconnected');
    current.setStatusText(formatConnectFailure(device.name, outcome));
    syncBatteries();
  };

  const monitor: BatteryMonitor = createBatteryMonitor(transport, {
    onBatteryLevelsChanged: syncBatteries,
    onConnectionLost: (device) => {
      const current = state();
      current.setConnectionState('disconnected');
      current.setStatusText(formatConnectionLostStatus(device.name));
      scheduler.start();
    },
  });

  const scheduler: ReconnectScheduler = createReconnectScheduler(
    {
      connect: () => {
        const target = state().device;
        return target ? monitor.connect(target) : Promise.resolve(NO_DEVICE_OUTCOME);
      },
      onCountdown: (seconds) => {
        const current = state();
        current.setReconnectCountdown(seconds);
        if (current.device) {
          current.setStatusText(formatCountdownStatus(current.device.name, seconds));
        }
      },
      onAttempt: () => {
        const current = state();
        current.setReconnectCountdown(null);
        current.setConnectionState('connecting');
        if (current.device) {
          current.setStatusText(formatConnectingStatus(current.device.name));
        }
      },
      onOutcome: (outcome) => {
        const target = state().device;
        if (!target) {
          return;
        }

        if (outcome.status === 'CONNECTED') {
          handleConnected(target);
          return;
        }

        handleFailure(target, outcome);
        state().setReconnectCountdown(scheduler.secondsRemaining);
      },
    },
    { intervalTicks: config.reconnectIntervalTicks, tickMs: config.tickMs },
  );

  const reloadDevices = async () => {
    const current = state();
    current.resetDiscoveredDevices();
    current.setScanning(true);
    await listPairedDevices(
      transport,
      (name, id) => state().addDiscoveredDevice({ id, name }),
      () => state().setScanning(false),
    );
  };

  const run = async (initialDevice?: DeviceIdentity | null) => {
    if (!initialDevice) {
      await reloadDevices();
      return;
    }

    const current = state();
    current.setDevice(toKnownDevice(initialDevice));
    // First reading after launch may raise the low battery alert.
    current.armLowBatteryAlert();

    await reloadDevices();
    const present = state().discoveredDevices.some(
      (device) => device.id.toLowerCase() === initialDevice.id.toLowerCase(),
    );
    if (!present) {
      state().setStatusText(formatDeviceMissingStatus(initialDevice.name));
    }

    scheduler.start({ immediate: present && config.connectOnLaunch });
  };

  const connect = async (device: DeviceIdentity) => {
    scheduler.stop();
    const current = state();
    current.setReconnectCountdown(null);
    current.setConnectionState('connecting');
    current.setStatusText(formatConnectingStatus(device.name));

    const outcome = await monitor.connect(device);
    if (outcome.status === 'CONNECTED') {
      handleConnected(device);
    } else {
      handleFailure(device, outcome);
    }
    return outcome;
  };

  const disconnect = async () => {
    scheduler.stop();
    monitor.disconnect();

    const current = state();
    current.setDevice(null);
    current.clearLowBatteryAlert();
    current.setConnectionState('disconnected');
    current.setReconnectCountdown(null);
    current.setStatusText(READY_STATUS);
    syncBatteries();
    await saveDevice(null);
  };

  const exit = async () => {
    scheduler.stop();
    monitor.disconnect();
    await transport.dispose();
  };

  return {
    run,
    reloadDevices,
    connect,
    disconnect,
    refresh: () => monitor.refresh(),
    exit,
    monitor,
    scheduler,
  };
};
