/**
 * DEVICE CATALOG - TYPE DEFINITIONS
 * ===================================
 *
 * Device types form a closed set known at compile time. Everything that
 * differs between them (parameters, commands, interlocks) is table data keyed
 * by `DeviceType`.
 */

export const DEVICE_TYPES = ['ground_power_unit', 'cryogenic_line'] as const;

export type DeviceType = typeof DEVICE_TYPES[number];

export type ParameterCategory = 'electrical' | 'thermal' | 'mechanical' | 'fluid';

/**
 * Immutable reference data for one telemetry parameter
 */
export interface ParameterDefinition {
	readonly name: string;
	readonly unit: string;
	readonly category: ParameterCategory;
	readonly min: number;
	readonly max: number;
	readonly nominal: number;
}

/**
 * A monitored piece of equipment
 */
export interface DeviceDescriptor {
	deviceId: string;
	deviceType: DeviceType;
	subsystem?: string;
	location?: string;
}

/**
 * Source of validated parameter definitions, keyed by (device type, parameter)
 */
export interface ParameterSource {
	getParameter(deviceType: DeviceType, name: string): Promise<ParameterDefinition | undefined>;
}

export function isDeviceType(value: string): value is DeviceType {
	return DEVICE_TYPES.some(type => type === value);
}
