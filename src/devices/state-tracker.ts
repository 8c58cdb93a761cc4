/**
 * DEVICE STATE TRACKER
 * ======================
 *
 * Owns mode × operational status for every registered device.
 *
 * - Mode changes only through admitted commands.
 * - Status follows the highest active alarm severity (FAULT/CRITICAL → FAULT,
 *   WARNING → WARNING, otherwise NOMINAL).
 * - EMERGENCY_SHUTDOWN pins status to SHUTDOWN; only a recovery command leaves it.
 */

import type { DeviceDescriptor } from '../catalog/types';
import type { Severity } from '../alarms/types';
import { compareSeverity } from '../alarms/types';
import type { DeviceCommand } from '../commands/schemas';
import { InvalidTransitionError, NotFoundError } from '../errors';
import type { Logger } from '../logging/logger';
import { noopLogger } from '../logging/logger';
import { LogComponents } from '../logging/components';
import type { DeviceMode, DeviceState, OperationalStatus, StateTransition } from './types';

export interface DeviceStateTrackerOptions {
	clock?: () => Date;
	logger?: Logger;
}

export function statusForSeverity(highest: Severity | undefined): OperationalStatus {
	if (highest === undefined) return 'NOMINAL';
	if (compareSeverity(highest, 'FAULT') >= 0) return 'FAULT';
	if (compareSeverity(highest, 'WARNING') >= 0) return 'WARNING';
	return 'NOMINAL';
}

export class DeviceStateTracker {
	private readonly states = new Map<string, DeviceState>();
	private readonly descriptors = new Map<string, DeviceDescriptor>();
	private readonly clock: () => Date;
	private readonly logger: Logger;

	constructor(options: DeviceStateTrackerOptions = {}) {
		this.clock = options.clock ?? (() => new Date());
		this.logger = options.logger ?? noopLogger;
	}

	/**
	 * Register a device; it starts in STANDBY / NOMINAL. Re-registering keeps state.
	 */
	register(descriptor: DeviceDescriptor): DeviceState {
		const existing = this.states.get(descriptor.deviceId);
		if (existing) {
			if (existing.deviceType !== descriptor.deviceType) {
				throw new InvalidTransitionError(
					`Device ${descriptor.deviceId} is already registered as ${existing.deviceType}`
				);
			}
			this.descriptors.set(descriptor.deviceId, { ...descriptor });
			return cloneState(existing);
		}

		const state: DeviceState = {
			deviceId: descriptor.deviceId,
			deviceType: descriptor.deviceType,
			mode: 'STANDBY',
			status: 'NOMINAL',
			lastCommand: null,
			lastCommandAt: null,
			updatedAt: this.now(),
		};
		this.states.set(descriptor.deviceId, state);
		this.descriptors.set(descriptor.deviceId, { ...descriptor });

		this.logger.info('Device registered', {
			component: LogComponents.DEVICE_STATE,
			deviceId: descriptor.deviceId,
			deviceType: descriptor.deviceType,
		});

		return cloneState(state);
	}

	has(deviceId: string): boolean {
		return this.states.has(deviceId);
	}

	find(deviceId: string): DeviceState | undefined {
		const state = this.states.get(deviceId);
		return state ? cloneState(state) : undefined;
	}

	get(deviceId: string): DeviceState {
		const state = this.find(deviceId);
		if (!state) {
			throw new NotFoundError('device', deviceId);
		}
		return state;
	}

	descriptor(deviceId: string): DeviceDescriptor | undefined {
		const descriptor = this.descriptors.get(deviceId);
		return descriptor ? { ...descriptor } : undefined;
	}

	list(): DeviceDescriptor[] {
		return Array.from(this.descriptors.values()).map(d => ({ ...d }));
	}

	/**
	 * Apply an admitted command. Mode-setting commands change the mode at once;
	 * status is then recomputed against `highestActive`.
	 */
	applyCommand(deviceId: string, command: DeviceCommand, highestActive: Severity | undefined): StateTransition[] {
		const state = this.require(deviceId);
		const at = this.now();
		const cause = `command:${command.type}`;
		const transitions: StateTransition[] = [];

		const targetMode = this.targetMode(state, command);
		if (targetMode !== undefined && targetMode !== state.mode) {
			transitions.push({ deviceId, field: 'mode', from: state.mode, to: targetMode, cause, at });
			state.mode = targetMode;
		}

		state.lastCommand = command.type;
		state.lastCommandAt = at;
		state.updatedAt = at;

		transitions.push(...this.updateStatus(state, highestActive, cause, at));
		this.logTransitions(transitions);
		return transitions;
	}

	/**
	 * Recompute status after alarm changes
	 */
	reconcileStatus(deviceId: string, highestActive: Severity | undefined, cause: string = 'alarms'): StateTransition[] {
		const state = this.require(deviceId);
		const transitions = this.updateStatus(state, highestActive, cause, this.now());
		this.logTransitions(transitions);
		return transitions;
	}

	private targetMode(state: DeviceState, command: DeviceCommand): DeviceMode | undefined {
		switch (command.type) {
			case 'emergency_shutdown':
				return 'EMERGENCY_SHUTDOWN';
			case 'recover_from_shutdown':
				if (state.mode !== 'EMERGENCY_SHUTDOWN') {
					throw new InvalidTransitionError(`Device ${state.deviceId} is not in EMERGENCY_SHUTDOWN`);
				}
				return command.params.mode;
			case 'set_mode':
				if (state.mode === 'EMERGENCY_SHUTDOWN' && command.params.mode !== 'EMERGENCY_SHUTDOWN') {
					throw new InvalidTransitionError(
						`Device ${state.deviceId} must be recovered before leaving EMERGENCY_SHUTDOWN`
					);
				}
				return command.params.mode;
			default:
				return undefined;
		}
	}

	private updateStatus(
		state: DeviceState,
		highestActive: Severity | undefined,
		cause: string,
		at: Date
	): StateTransition[] {
		const next = state.mode === 'EMERGENCY_SHUTDOWN' ? 'SHUTDOWN' : statusForSeverity(highestActive);
		if (next === state.status) {
			return [];
		}

		const transition: StateTransition = { deviceId: state.deviceId, field: 'status', from: state.status, to: next, cause, at };
		state.status = next;
		state.updatedAt = at;
		return [transition];
	}

	private logTransitions(transitions: StateTransition[]): void {
		for (const transition of transitions) {
			this.logger.info(`Device ${transition.field} ${transition.from} → ${transition.to}`, {
				component: LogComponents.DEVICE_STATE,
				deviceId: transition.deviceId,
				cause: transition.cause,
			});
		}
	}

	private require(deviceId: string): DeviceState {
		const state = this.states.get(deviceId);
		if (!state) {
			throw new NotFoundError('device', deviceId);
		}
		return state;
	}

	private now(): Date {
		return new Date(this.clock().getTime());
	}
}

function cloneState(state: DeviceState): DeviceState {
	return {
		...state,
		lastCommandAt: state.lastCommandAt ? new Date(state.lastCommandAt.getTime()) : null,
		updatedAt: new Date(state.updatedAt.getTime()),
	};
}
