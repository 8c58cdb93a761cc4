/**
 * COMMANDS - TYPE DEFINITIONS
 * =============================
 */

import type { DeviceType } from '../catalog/types';
import type { DeviceCommand } from './schemas';

export const COMMAND_TYPES = [
	'set_mode',
	'emergency_shutdown',
	'recover_from_shutdown',
	'clear_fault',
	'enable_output',
	'disable_output',
	'set_voltage',
	'set_current_limit',
	'open_valve',
	'close_valve',
] as const;

export type CommandType = typeof COMMAND_TYPES[number];

export interface CommandTraits {
	priority: boolean;     // Always admitted, preempts in-flight commands
	recovery: boolean;     // The only way out of EMERGENCY_SHUTDOWN
	safing: boolean;       // Closes or de-energizes; never gated by an interlock
	setsMode: boolean;     // Applied to the device state tracker on admission
}

const PLAIN: CommandTraits = { priority: false, recovery: false, safing: false, setsMode: false };

export const COMMAND_TRAITS: Readonly<Record<CommandType, CommandTraits>> = {
	set_mode: { ...PLAIN, setsMode: true },
	emergency_shutdown: { ...PLAIN, priority: true, setsMode: true },
	recover_from_shutdown: { ...PLAIN, recovery: true, setsMode: true },
	clear_fault: PLAIN,
	enable_output: PLAIN,
	disable_output: { ...PLAIN, safing: true },
	set_voltage: PLAIN,
	set_current_limit: PLAIN,
	open_valve: PLAIN,
	close_valve: { ...PLAIN, safing: true },
};

const COMMON_COMMANDS: readonly CommandType[] = ['set_mode', 'emergency_shutdown', 'recover_from_shutdown', 'clear_fault'];

/**
 * Commands each device type understands
 */
export const COMMAND_CATALOG: Readonly<Record<DeviceType, readonly CommandType[]>> = {
	ground_power_unit: [...COMMON_COMMANDS, 'enable_output', 'disable_output', 'set_voltage', 'set_current_limit'],
	cryogenic_line: [...COMMON_COMMANDS, 'open_valve', 'close_valve'],
};

export type CommandStatus = 'SUBMITTED' | 'ADMITTED' | 'REJECTED' | 'EXECUTED' | 'FAILED';

export type RejectionCode = 'unknown_device' | 'unsupported_command' | 'invalid_parameter' | 'interlock';

export interface RejectionReason {
	code: RejectionCode;
	message: string;
	field?: string;        // Offending parameter, for invalid_parameter
	rule?: string;         // Interlock rule id, for interlock
}

export interface CommandRequest {
	deviceId: string;
	commandType: string;
	params?: unknown;
	issuedBy: string;
}

export interface CommandRecord {
	id: string;
	deviceId: string;
	commandType: string;
	rawParams: unknown;
	command: DeviceCommand | null;   // Decoded form, once admitted
	issuedBy: string;
	submittedAt: Date;
	status: CommandStatus;
	priority: boolean;
	rejection: RejectionReason | null;
	detail: string | null;           // Execution detail reported by the dispatcher
	completedAt: Date | null;
	preemptedBy: string | null;
}

export type CommandDecision =
	| { outcome: 'ADMITTED'; command: DeviceCommand; priority: boolean }
	| { outcome: 'REJECTED'; reason: RejectionReason };

export type SubmitResult =
	| { status: 'ADMITTED'; commandId: string; priority: boolean }
	| { status: 'REJECTED'; commandId: string; reason: RejectionReason };

export function isCommandType(value: string): value is CommandType {
	return COMMAND_TYPES.some(type => type === value);
}

export function isPriorityCommand(command: DeviceCommand): boolean {
	return COMMAND_TRAITS[command.type].priority
		|| (command.type === 'set_mode' && command.params.mode === 'EMERGENCY_SHUTDOWN');
}
