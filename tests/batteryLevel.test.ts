import { describe, expect, it } from 'vitest';

import { characteristicUuidForHandle, normalizeUuid, uuidEquals, bleProfile } from '@/config/bleProfile';
import { isKnownLevel, parseBatteryLevel } from '@/services/ble/batteryLevel';

describe('parseBatteryLevel', () => {
  it('reads the first byte as a percentage', () => {
    expect(parseBatteryLevel(Uint8Array.from([42]))).toBe(42);
    expect(parseBatteryLevel(Uint8Array.from([0, 99]))).toBe(0);
    expect(parseBatteryLevel(Uint8Array.from([100]))).toBe(100);
  });

  it('maps the raw unknown marker to -1', () => {
    expect(parseBatteryLevel(Uint8Array.from([255]))).toBe(-1);
  });

  it('returns null when there is no value', () => {
    expect(parseBatteryLevel(new Uint8Array(0))).toBeNull();
    expect(parseBatteryLevel(null)).toBeNull();
    expect(parseBatteryLevel(undefined)).toBeNull();
  });

  it('treats only -1 as unknown', () => {
    expect(isKnownLevel(-1)).toBe(false);
    expect(isKnownLevel(0)).toBe(true);
    expect(isKnownLevel(87)).toBe(true);
  });
});

describe('bleProfile uuids', () => {
  it('expands short uuids onto the base uuid', () => {
    expect(normalizeUuid('180F')).toBe('0000180f-0000-1000-8000-00805f9b34fb');
    expect(normalizeUuid('00002A19')).toBe('00002a19-0000-1000-8000-00805f9b34fb');
  });

  it('adds dashes to compact 128-bit uuids', () => {
    expect(normalizeUuid('0000180f00001000800000805f9b34fb')).toBe(bleProfile.batteryServiceUuid);
  });

  it('compares uuids across notations', () => {
    expect(uuidEquals('2a19', bleProfile.batteryLevelCharacteristicUuid)).toBe(true);
    expect(uuidEquals('2A19', '0000180F-0000-1000-8000-00805F9B34FB')).toBe(false);
  });

  it('derives a characteristic uuid from its handle', () => {
    expect(characteristicUuidForHandle(0x2a19)).toBe('00002a19-0000-1000-8000-00805f9b34fb');
  });
});
