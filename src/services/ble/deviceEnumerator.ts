import type { BleTransport } from './types';

export type DeviceCallback = (name: string, id: string) => void;
export type CompletionCallback = () => void;

/**
 * One-shot scan that reports every named device. Unnamed devices are skipped
 * since nobody can pick them from a list. Scan errors are logged only.
 */
export const listPairedDevices = async (
  transport: BleTransport,
  onDevice: DeviceCallback,
  onComplete: CompletionCallback,
): Promise<void> => {
  try {
    const devices = await transport.scan();
    for (const device of devices) {
      if (device.name) {
        onDevice(device.name, device.address);
      }
    }
  } catch (error) {
    console.error('[BLE] Error discovering devices', error);
  } finally {
    onComplete();
  }
};
