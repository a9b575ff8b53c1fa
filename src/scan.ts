import { appConfig } from '@/config/appConfig';

const COLUMN_RULE = '-'.repeat(50);

const main = async () => {
  const { createNobleTransport } = await import('@/services/ble/nobleTransport');
  const transport = createNobleTransport({
    scanDurationMs: appConfig.scanDurationMs,
    findDeviceTimeoutMs: appConfig.findDeviceTimeoutMs,
  });

  console.info('Scanning for BLE devices...');
  try {
    const devices = await transport.scan();
    if (devices.length === 0) {
      console.info('No BLE devices found.');
      return;
    }

    console.info('\nFound BLE devices:');
    console.info(COLUMN_RULE);
    console.info(`${'Address'.padEnd(20)} | ${'Name'.padEnd(30)}`);
    console.info(COLUMN_RULE);
    devices.forEach((device) => {
      console.info(`${device.address.padEnd(20)} | ${(device.name ?? 'Unknown').padEnd(30)}`);
    });
  } finally {
    await transport.dispose();
  }
};

main()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  });
