/** A record exactly as the wearable API returned it. */
export type RawDeviceRecord = Record<string, unknown>;

export const DEVICE_SOURCES = [
  'daily_sleep',
  'sleep',
  'daily_readiness',
  'daily_activity',
  'daily_stress',
  'workouts',
  'daytime_hr',
] as const;

export type DeviceSource = (typeof DEVICE_SOURCES)[number];

export type SleepSource = 'daily_sleep' | 'daily_readiness' | 'sleep';
export type ActivitySource = 'daily_activity' | 'daily_stress' | 'workouts' | 'daytime_hr';

export type DeviceData = Partial<Record<DeviceSource, RawDeviceRecord[]>>;
export type SleepSourceData = Record<SleepSource, RawDeviceRecord[]>;
export type ActivitySourceData = Record<ActivitySource, RawDeviceRecord[]>;
