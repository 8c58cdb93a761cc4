/**
 * DEVICE STATE - TYPE DEFINITIONS
 * =================================
 */

import type { DeviceType } from '../catalog/types';

export const DEVICE_MODES = ['STANDBY', 'ACTIVE', 'MAINTENANCE', 'EMERGENCY_SHUTDOWN'] as const;

export type DeviceMode = typeof DEVICE_MODES[number];

export const OPERATIONAL_STATUSES = ['NOMINAL', 'WARNING', 'FAULT', 'SHUTDOWN'] as const;

export type OperationalStatus = typeof OPERATIONAL_STATUSES[number];

export interface DeviceState {
	deviceId: string;
	deviceType: DeviceType;
	mode: DeviceMode;
	status: OperationalStatus;
	lastCommand: string | null;
	lastCommandAt: Date | null;
	updatedAt: Date;
}

export type StateTransition =
	| { deviceId: string; field: 'mode'; from: DeviceMode; to: DeviceMode; cause: string; at: Date }
	| { deviceId: string; field: 'status'; from: OperationalStatus; to: OperationalStatus; cause: string; at: Date };
