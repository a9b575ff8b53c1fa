import type { BatteryChannel, ConnectOutcome } from '@/types/device';

export const NOT_CONNECTED_TITLE = 'Not Connected';
export const READY_STATUS = 'Ready';
export const LOW_BATTERY_TITLE = 'Low battery';

export const formatLevel = (level: number) => `${level}%`;

export const formatCountdownStatus = (deviceName: string, seconds: number) =>
  `Connecting to '${deviceName}' in ${seconds} seconds..`;

export const formatConnectingStatus = (deviceName: string) => `Connecting to '${deviceName}'..`;

export const formatConnectedStatus = (deviceName: string) => `Connected to ${deviceName}`;

export const formatConnectFailure = (deviceName: string, outcome: ConnectOutcome) =>
  `Could not connect to '${deviceName}': ${outcome.errorMessage || outcome.status}`;

export const formatDeviceMissingStatus = (deviceName: string) => `'${deviceName}' is not in range`;

export const formatLowBatteryMessage = (deviceName: string, threshold: number) =>
  `${deviceName} battery level is below ${threshold}%`;

export const formatTooltip = (deviceName: string | null, channels: BatteryChannel[], connected: boolean) => {
  if (!connected || channels.length === 0) {
    return NOT_CONNECTED_TITLE;
  }

  const label = deviceName ?? '';
  if (channels.length === 1) {
    return `${label}: ${formatLevel(channels[0].level)}`;
  }

  return [label, ...channels.map((channel) => `${channel.name}: ${formatLevel(channel.level)}`)].join('\n');
};

export const formatConnectionLostStatus = (deviceName: string) => `Lost connection to ${deviceName}`;
