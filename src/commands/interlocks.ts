/**
 * INTERLOCK TABLE
 * =================
 *
 * Safety preconditions, declared as data: global rules plus
 * device type → command type → rules. The validator evaluates every entry the
 * same way; nothing here dispatches on device subclasses.
 *
 * A rule returns a violation message, or null when it holds.
 */

import type { DeviceType } from '../catalog/types';
import type { Alarm } from '../alarms/types';
import type { DeviceMode, DeviceState } from '../devices/types';
import type { DeviceCommand } from './schemas';
import type { CommandType } from './types';
import { COMMAND_TRAITS, isPriorityCommand } from './types';

/**
 * What a rule may read. The built-in table gates on state and telemetry only;
 * `activeAlarms` is there for custom tables passed to the core.
 */
export interface InterlockContext {
	state: DeviceState;
	latestValue(parameter: string): number | undefined;
	activeAlarms: readonly Alarm[];
}

export interface InterlockRule {
	id: string;
	description: string;
	check(context: InterlockContext, command: DeviceCommand): string | null;
}

export interface InterlockTable {
	global: readonly InterlockRule[];
	byDeviceType: { readonly [T in DeviceType]: Partial<Record<CommandType, readonly InterlockRule[]>> };
}

export interface InterlockViolation {
	rule: string;
	message: string;
}

/** Valve may open only once the line is chilled below this temperature (°C) */
export const VALVE_CHILLDOWN_LIMIT = -100;

function requireMode(id: string, mode: DeviceMode): InterlockRule {
	return {
		id,
		description: `Device must be in ${mode} mode`,
		check: ({ state }, command) => state.mode === mode
			? null
			: `${command.type} requires mode ${mode} (current: ${state.mode})`,
	};
}

const emergencyLockout: InterlockRule = {
	id: 'emergency-lockout',
	description: 'Only recovery is accepted while in EMERGENCY_SHUTDOWN',
	check: ({ state }, command) => state.mode === 'EMERGENCY_SHUTDOWN' && !COMMAND_TRAITS[command.type].recovery
		? `Device is in EMERGENCY_SHUTDOWN; only recover_from_shutdown is accepted`
		: null,
};

const recoveryRequiresShutdown: InterlockRule = {
	id: 'recovery-requires-shutdown',
	description: 'Recovery only applies to a device in EMERGENCY_SHUTDOWN',
	check: ({ state }, command) => COMMAND_TRAITS[command.type].recovery && state.mode !== 'EMERGENCY_SHUTDOWN'
		? `Device is not in EMERGENCY_SHUTDOWN (current: ${state.mode})`
		: null,
};

const outputBlockedByFault: InterlockRule = {
	id: 'gpu-output-blocked-by-fault',
	description: 'Output may not be energized while the unit is in FAULT',
	check: ({ state }) => state.status === 'FAULT'
		? 'Cannot enable output while operational status is FAULT'
		: null,
};

const valveRequiresChilldown: InterlockRule = {
	id: 'cryo-valve-requires-chilldown',
	description: `Line temperature must be below ${VALVE_CHILLDOWN_LIMIT}°C before the valve opens`,
	check: ({ latestValue }) => {
		const temperature = latestValue('temperature');
		if (temperature === undefined) {
			return 'No temperature reading available for valve interlock';
		}
		return temperature < VALVE_CHILLDOWN_LIMIT
			? null
			: `Temperature too high (${temperature}°C) for valve operation; must be below ${VALVE_CHILLDOWN_LIMIT}°C`;
	},
};

export const INTERLOCK_TABLE: InterlockTable = {
	global: [emergencyLockout, recoveryRequiresShutdown],
	byDeviceType: {
		ground_power_unit: {
			enable_output: [requireMode('gpu-output-requires-active', 'ACTIVE'), outputBlockedByFault],
		},
		cryogenic_line: {
			open_valve: [requireMode('cryo-valve-requires-active', 'ACTIVE'), valveRequiresChilldown],
		},
	},
};

/**
 * First violated rule for the command, or null. Priority and safing commands
 * are never gated.
 */
export function evaluateInterlocks(
	table: InterlockTable,
	deviceType: DeviceType,
	command: DeviceCommand,
	context: InterlockContext
): InterlockViolation | null {
	if (COMMAND_TRAITS[command.type].safing || isPriorityCommand(command)) {
		return null;
	}

	const rules = [...table.global, ...(table.byDeviceType[deviceType][command.type] ?? [])];
	for (const rule of rules) {
		const message = rule.check(context, command);
		if (message !== null) {
			return { rule: rule.id, message };
		}
	}
	return null;
}
