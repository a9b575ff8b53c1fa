import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { bleProfile } from '@/config/bleProfile';
import { createBatteryMonitor } from '@/services/ble/batteryMonitor';
import { createNobleTransport } from '@/services/ble/nobleTransport';
import { BleTransportError } from '@/services/ble/types';

import { FakeCharacteristic, FakeDescriptor, fakeNoble, FakePeripheral, FakeService } from './support/fakeNoble';

vi.mock('@abandonware/noble', async () => {
  const { fakeNoble: noble } = await import('./support/fakeNoble');
  return { default: noble };
});

const ADDRESS = 'C8:2E:1F:00:AA:01';

const buildKeyboard = () => {
  const model = new FakeCharacteristic('2a29', [0x5a]);
  const left = new FakeCharacteristic('2a19', [87], [new FakeDescriptor('2901', Buffer.from('Left\0'))]);
  const right = new FakeCharacteristic('2a19', [64], [new FakeDescriptor('2901', Buffer.from('Right'))]);
  const peripheral = new FakePeripheral('c82e1f00aa01', ADDRESS, 'Corne', [
    new FakeService('180a', [model]),
    new FakeService('180f', [left, right]),
  ]);
  return { peripheral, left, right };
};

const createTransport = () => createNobleTransport({ scanDurationMs: 5, findDeviceTimeoutMs: 5 });

const connectKeyboard = async (onDisconnect = vi.fn()) => {
  const keyboard = buildKeyboard();
  fakeNoble.peripherals = [keyboard.peripheral];
  const transport = createTransport();
  const found = await transport.findDeviceByAddress(ADDRESS);
  if (!found) {
    throw new Error('keyboard not discovered');
  }
  const handle = await transport.connect(found, { onDisconnect });
  return { ...keyboard, transport, handle, onDisconnect };
};

describe('createNobleTransport', () => {
  beforeEach(() => {
    fakeNoble.reset();
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists discovered devices, falling back to the id for hidden addresses', async () => {
    fakeNoble.peripherals = [buildKeyboard().peripheral, new FakePeripheral('5f0c9a', 'unknown', undefined)];

    const devices = await createTransport().scan();

    expect(devices).toEqual([
      { address: ADDRESS, name: 'Corne' },
      { address: '5f0c9a', name: null },
    ]);
    expect(fakeNoble.stopScanCalls).toBe(1);
  });

  it('finds a device by address regardless of case', async () => {
    fakeNoble.peripherals = [buildKeyboard().peripheral];
    const transport = createTransport();

    expect(await transport.findDeviceByAddress('c8:2e:1f:00:aa:01')).toEqual({ address: ADDRESS, name: 'Corne' });
    expect(await transport.findDeviceByAddress('00:11:22:33:44:55')).toBeNull();
  });

  it('fails the scan when the adapter stays off', async () => {
    fakeNoble.state = 'poweredOff';

    await expect(createTransport().scan()).rejects.toThrow(
      'Bluetooth adapter is not powered on (state: poweredOff)',
    );
  });

  it('refuses to connect to a device it has not seen', async () => {
    await expect(createTransport().connect({ address: ADDRESS, name: 'Corne' })).rejects.toBeInstanceOf(
      BleTransportError,
    );
  });

  it('numbers characteristics per connection and names them from their user description', async () => {
    const { transport, handle } = await connectKeyboard();

    expect(transport.isConnected(handle)).toBe(true);
    expect(await transport.getServices(handle)).toEqual([
      {
        uuid: '0000180a-0000-1000-8000-00805f9b34fb',
        characteristics: [{ uuid: '00002a29-0000-1000-8000-00805f9b34fb', handle: 1, description: null }],
      },
      {
        uuid: bleProfile.batteryServiceUuid,
        characteristics: [
          { uuid: bleProfile.batteryLevelCharacteristicUuid, handle: 2, description: 'Left' },
          { uuid: bleProfile.batteryLevelCharacteristicUuid, handle: 3, description: 'Right' },
        ],
      },
    ]);
  });

  it('passes notifications to the listener but not read results', async () => {
    const { transport, handle, left } = await connectKeyboard();
    await transport.getServices(handle);
    const listener = vi.fn();
    await transport.subscribeNotify(handle, 2, listener);

    const value = await transport.readCharacteristic(handle, 2);
    expect(Array.from(value)).toEqual([87]);
    expect(listener).not.toHaveBeenCalled();

    left.notify([60]);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toBe(2);
    expect(Array.from(listener.mock.calls[0][1])).toEqual([60]);
  });

  it('removes the data listener when a subscription fails', async () => {
    const { transport, handle, left } = await connectKeyboard();
    await transport.getServices(handle);
    left.subscribeError = new Error('Insufficient authentication');

    await expect(transport.subscribeNotify(handle, 2, vi.fn())).rejects.toThrow('Insufficient authentication');
    expect(left.listenerCount('data')).toBe(0);
  });

  it('reports a remote disconnect and closes the handle', async () => {
    const { transport, handle, peripheral, onDisconnect } = await connectKeyboard();
    await transport.getServices(handle);

    peripheral.drop();

    expect(onDisconnect).toHaveBeenCalledWith(handle);
    expect(transport.isConnected(handle)).toBe(false);
    await expect(transport.readCharacteristic(handle, 2)).rejects.toThrow(`Not connected to ${ADDRESS}`);
  });

  it('detaches listeners on a local disconnect without reporting it as lost', async () => {
    const { transport, handle, peripheral, left, onDisconnect } = await connectKeyboard();
    await transport.getServices(handle);
    await transport.subscribeNotify(handle, 2, vi.fn());

    await transport.disconnect(handle);

    expect(peripheral.disconnectCalls).toBe(1);
    expect(left.listenerCount('data')).toBe(0);
    expect(onDisconnect).not.toHaveBeenCalled();
    expect(transport.isConnected(handle)).toBe(false);
  });

  it('closes open links and stops scanning on dispose', async () => {
    const { transport, peripheral } = await connectKeyboard();
    const scansStopped = fakeNoble.stopScanCalls;

    await transport.dispose();

    expect(peripheral.disconnectCalls).toBe(1);
    expect(fakeNoble.stopScanCalls).toBe(scansStopped + 1);
  });
});

describe('createBatteryMonitor over noble', () => {
  beforeEach(() => {
    fakeNoble.reset();
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps reads out of the session and applies notifications', async () => {
    const keyboard = buildKeyboard();
    fakeNoble.peripherals = [keyboard.peripheral];
    const onBatteryLevelsChanged = vi.fn();
    const monitor = createBatteryMonitor(createTransport(), { onBatteryLevelsChanged });

    const outcome = await monitor.connect({ id: 'c8:2e:1f:00:aa:01', name: 'Corne' });

    expect(outcome.status).toBe('CONNECTED');
    expect(monitor.batteries).toEqual({
      2: { handle: 2, name: 'Left', level: 87 },
      3: { handle: 3, name: 'Right', level: 64 },
    });
    expect(onBatteryLevelsChanged).not.toHaveBeenCalled();

    keyboard.left.value = Buffer.from([50]);
    const result = await monitor.readBatteryLevels();

    expect(result.status).toBe('SUCCESS');
    expect(result.batteries[2].level).toBe(50);
    expect(monitor.batteries[2].level).toBe(87);
    expect(onBatteryLevelsChanged).not.toHaveBeenCalled();

    keyboard.right.notify([40]);

    expect(onBatteryLevelsChanged).toHaveBeenCalledTimes(1);
    expect(monitor.batteries[3].level).toBe(40);
  });
});
