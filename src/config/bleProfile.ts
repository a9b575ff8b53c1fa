export interface BleProfile {
  batteryServiceUuid: string;
  batteryLevelCharacteristicUuid: string;
  userDescriptionDescriptorUuid: string;
  defaultChannelName: string;
  unknownLevel: number;
  /** Raw level byte that devices send when they cannot tell. */
  rawUnknownLevel: number;
}

const BASE_UUID_SUFFIX = '-0000-1000-8000-00805f9b34fb';

export const bleProfile: BleProfile = {
  batteryServiceUuid: `0000180f${BASE_UUID_SUFFIX}`,
  batteryLevelCharacteristicUuid: `00002a19${BASE_UUID_SUFFIX}`,
  userDescriptionDescriptorUuid: `00002901${BASE_UUID_SUFFIX}`,
  defaultChannelName: 'Main',
  unknownLevel: -1,
  rawUnknownLevel: 255,
};

/**
 * Expands short (16/32-bit) and undashed 128-bit UUIDs to the lowercase dashed form.
 * Anything else is returned lowercased and untouched.
 */
export const normalizeUuid = (uuid: string): string => {
  const compact = uuid.trim().toLowerCase();

  if (/^[0-9a-f]{4}$/.test(compact)) {
    return `0000${compact}${BASE_UUID_SUFFIX}`;
  }

  if (/^[0-9a-f]{8}$/.test(compact)) {
    return `${compact}${BASE_UUID_SUFFIX}`;
  }

  if (/^[0-9a-f]{32}$/.test(compact)) {
    return [
      compact.slice(0, 8),
      compact.slice(8, 12),
      compact.slice(12, 16),
      compact.slice(16, 20),
      compact.slice(20),
    ].join('-');
  }

  return compact;
};

export const uuidEquals = (a: string, b: string) => normalizeUuid(a) === normalizeUuid(b);

export const characteristicUuidForHandle = (handle: number): string =>
  `0000${handle.toString(16)}${BASE_UUID_SUFFIX}`;
