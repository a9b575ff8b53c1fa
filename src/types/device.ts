export interface DeviceIdentity {
  id: string;
  name: string;
}

export interface BatteryChannel {
  handle: number;
  name: string;
  /** Percent 0-100, or -1 while unknown. */
  level: number;
}

export type BatteryMap = Record<number, BatteryChannel>;

export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

export type ConnectStatus =
  | 'CONNECTED'
  | 'DEVICE_NOT_FOUND'
  | 'BATTERY_SERVICE_NOT_FOUND'
  | 'BATTERY_LEVEL_CHARACTERISTIC_NOT_FOUND'
  | 'SUBSCRIPTION_FAILURE'
  | 'UNEXPECTED_ERROR'
  | 'CANCELLED';

export interface ConnectOutcome {
  status: ConnectStatus;
  errorMessage: string;
}

export type ReadStatus = 'SUCCESS' | 'NOT_CONNECTED' | 'FAILURE';

export interface ReadOutcome {
  status: ReadStatus;
  batteries: BatteryMap;
  errorMessage: string;
}

export interface KnownDevice extends DeviceIdentity {
  lastSeenTs: number;
}

export interface LowBatteryAlert {
  title: string;
  message: string;
  level: number;
  timestamp: number;
}
