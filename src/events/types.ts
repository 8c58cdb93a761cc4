/**
 * CORE EVENTS & COLLABORATOR CONTRACTS
 * ======================================
 *
 * Everything the core hands to its surroundings: events for persistence and
 * display, and admitted commands for execution.
 */

import type { DeviceType } from '../catalog/types';
import type { Alarm } from '../alarms/types';
import type { DeviceCommand } from '../commands/schemas';
import type { CommandRecord } from '../commands/types';
import type { StateTransition } from '../devices/types';
import type { ReportedStatus } from '../telemetry/types';

export type AlarmEventType = 'alarm.created' | 'alarm.updated' | 'alarm.acknowledged' | 'alarm.cleared';

export type CommandEventType = 'command.admitted' | 'command.rejected' | 'command.completed';

export type CoreEvent =
	| { type: AlarmEventType; at: Date; alarm: Alarm }
	| { type: 'device.transition'; at: Date; transition: StateTransition }
	| {
		type: 'device.status_reported';
		at: Date;
		deviceId: string;
		parameter: string;
		status: Exclude<ReportedStatus, 'NOMINAL'>;
		value: number;
		timestamp: Date;
	}
	| { type: CommandEventType; at: Date; command: CommandRecord };

export type CoreEventType = CoreEvent['type'];

/**
 * Receives events for persistence / display
 */
export interface EventSink {
	publish(events: readonly CoreEvent[]): Promise<void>;
}

export interface DispatchRequest {
	commandId: string;
	deviceId: string;
	deviceType: DeviceType;
	command: DeviceCommand;
	priority: boolean;
	issuedBy: string;
	issuedAt: Date;
}

/**
 * Carries admitted commands to the equipment. Resolves once the request is
 * accepted for delivery; the outcome arrives later through
 * `reportExecutionResult`.
 */
export interface CommandDispatcher {
	dispatch(request: DispatchRequest): Promise<void>;
}
