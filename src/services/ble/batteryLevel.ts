import { bleProfile } from '@/config/bleProfile';

/**
 * Battery level from a raw characteristic value: the first byte is the percent.
 * Returns null for an empty value.
 */
export const parseBatteryLevel = (data: Uint8Array | null | undefined): number | null => {
  if (!data || data.length === 0) {
    return null;
  }

  const level = data[0];
  return level === bleProfile.rawUnknownLevel ? bleProfile.unknownLevel : level;
};

export const isKnownLevel = (level: number) => level !== bleProfile.unknownLevel;
