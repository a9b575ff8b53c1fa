import { appConfig } from '@/config/appConfig';
import { createMonitorController } from '@/controller/monitorController';
import {
  createMockTransport,
  simulatedKeyboard,
  startSimulatedDrain,
} from '@/services/ble/mockTransport';
import type { BleTransport } from '@/services/ble/types';
import { monitorStore } from '@/state/monitorStore';
import { loadKnownDevice } from '@/storage/deviceCache';
import type { DeviceIdentity } from '@/types/device';

const SIMULATED_DRAIN_MS = 15000;

interface TransportSetup {
  transport: BleTransport;
  initialDevice: DeviceIdentity | null;
  stopSimulation: () => void;
}

const resolveRememberedDevice = async (): Promise<DeviceIdentity | null> => {
  if (appConfig.deviceId) {
    return { id: appConfig.deviceId, name: appConfig.deviceName ?? appConfig.deviceId };
  }
  return loadKnownDevice();
};

const createTransport = async (): Promise<TransportSetup> => {
  const remembered = await resolveRememberedDevice();

  if (appConfig.useMockBleTransport) {
    const keyboard = simulatedKeyboard();
    const transport = createMockTransport({ peripherals: [keyboard] });
    return {
      transport,
      initialDevice: remembered ?? { id: keyboard.address, name: keyboard.name ?? keyboard.address },
      stopSimulation: startSimulatedDrain(transport, keyboard, SIMULATED_DRAIN_MS),
    };
  }

  // noble binds to the adapter on load, so it stays out of mock runs.
  const { createNobleTransport } = await import('@/services/ble/nobleTransport');
  return {
    transport: createNobleTransport({
      scanDurationMs: appConfig.scanDurationMs,
      findDeviceTimeoutMs: appConfig.findDeviceTimeoutMs,
    }),
    initialDevice: remembered,
    stopSimulation: () => undefined,
  };
};

const main = async () => {
  const { transport, initialDevice, stopSimulation } = await createTransport();
  const controller = createMonitorController({ transport });

  const unsubscribe = monitorStore.subscribe((state, previous) => {
    if (state.statusText !== previous.statusText) {
      console.info(`[Monitor] ${state.statusText}`);
    }
    if (state.tooltip !== previous.tooltip) {
      console.info(`[Battery] ${state.tooltip.split('\n').join(' | ')}`);
    }
    if (state.lowBatteryAlert && state.lowBatteryAlert !== previous.lowBatteryAlert) {
      console.warn(`[Battery] ${state.lowBatteryAlert.title}: ${state.lowBatteryAlert.message}`);
    }
    if (previous.scanning && !state.scanning && !state.device) {
      state.discoveredDevices.forEach((device) => console.info(`[BLE] ${device.id}  ${device.name}`));
      console.info('[Monitor] Set KBM_DEVICE_ID (and KBM_DEVICE_NAME) to one of the devices above to start monitoring.');
    }
  });

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    unsubscribe();
    stopSimulation();
    await controller.exit();
    process.exit(0);
  };

  process.once('SIGINT', () => {
    shutdown().catch((error) => console.error('[Monitor] Shutdown failed', error));
  });
  process.once('SIGTERM', () => {
    shutdown().catch((error) => console.error('[Monitor] Shutdown failed', error));
  });

  await controller.run(initialDevice);
};

main().catch((error: unknown) => {
  console.error('[Monitor] Fatal error', error);
  process.exit(1);
});
