import { promises as fs } from 'fs';
import path from 'path';

import { appConfig } from '@/config/appConfig';
import type { KnownDevice } from '@/types/device';

const sanitizeDevice = (raw: unknown): KnownDevice | null => {
  if (typeof raw !== 'object' || raw === null || !('id' in raw)) {
    return null;
  }

  const { id } = raw;
  if (typeof id !== 'string' || id.length === 0) {
    return null;
  }

  const name = 'name' in raw && typeof raw.name === 'string' && raw.name.length > 0 ? raw.name : id;
  const lastSeenTs = 'lastSeenTs' in raw && typeof raw.lastSeenTs === 'number' ? raw.lastSeenTs : Date.now();

  return { id, name, lastSeenTs };
};

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export const loadKnownDevice = async (filePath = appConfig.deviceCachePath): Promise<KnownDevice | null> => {
  try {
    const raw = await fs.readFile(filePath, 'utf8');
    if (!raw.trim()) {
      return null;
    }

    const parsed: unknown = JSON.parse(raw);
    return sanitizeDevice(parsed);
  } catch (error) {
    if (!isMissingFile(error)) {
      console.warn('[Cache] Failed to load cached device', error);
    }
    return null;
  }
};

export const saveKnownDevice = async (
  device: KnownDevice | null,
  filePath = appConfig.deviceCachePath,
): Promise<void> => {
  try {
    if (!device) {
      await fs.rm(filePath, { force: true });
      return;
    }

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(
      filePath,
      JSON.stringify({ id: device.id, name: device.name, lastSeenTs: device.lastSeenTs }),
      'utf8',
    );
  } catch (error) {
    console.warn('[Cache] Failed to persist device', error);
  }
};
