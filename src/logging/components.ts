/**
 * Logging Component Names
 *
 * Usage:
 *   logger.warn('Alarm raised', { component: LogComponents.ALARMS });
 */

export const LogComponents = {
	CORE: 'ControlCore',
	TELEMETRY: 'Telemetry',
	ALARMS: 'AlarmManager',
	DEVICE_STATE: 'DeviceState',
	COMMANDS: 'CommandValidator',
	COMMAND_REGISTRY: 'CommandRegistry',
	DELIVERY: 'Delivery',
	CONFIG: 'Config',
} as const;

export type LogComponent = typeof LogComponents[keyof typeof LogComponents];
