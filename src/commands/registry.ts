/**
 * COMMAND REGISTRY
 * ==================
 *
 * Lifecycle of every submitted command:
 *
 *   SUBMITTED → ADMITTED | REJECTED
 *   ADMITTED  → EXECUTED | FAILED   (reported by the dispatcher)
 *
 * Closed commands are kept as history up to `historyLimit`.
 */

import { v4 as uuidv4 } from 'uuid';
import { InvalidTransitionError, NotFoundError } from '../errors';
import type { Logger } from '../logging/logger';
import { noopLogger } from '../logging/logger';
import { LogComponents } from '../logging/components';
import type { DeviceCommand } from './schemas';
import type { CommandRecord, CommandRequest, RejectionReason } from './types';

export interface CommandRegistryOptions {
	historyLimit?: number;
	clock?: () => Date;
	logger?: Logger;
}

export class CommandRegistry {
	private readonly records = new Map<string, CommandRecord>();
	private readonly closedOrder: string[] = [];
	private readonly historyLimit: number;
	private readonly clock: () => Date;
	private readonly logger: Logger;

	constructor(options: CommandRegistryOptions = {}) {
		this.historyLimit = options.historyLimit ?? 1000;
		this.clock = options.clock ?? (() => new Date());
		this.logger = options.logger ?? noopLogger;
	}

	submit(request: CommandRequest): CommandRecord {
		const record: CommandRecord = {
			id: uuidv4(),
			deviceId: request.deviceId,
			commandType: request.commandType,
			rawParams: request.params ?? {},
			command: null,
			issuedBy: request.issuedBy,
			submittedAt: this.now(),
			status: 'SUBMITTED',
			priority: false,
			rejection: null,
			detail: null,
			completedAt: null,
			preemptedBy: null,
		};
		this.records.set(record.id, record);
		return cloneRecord(record);
	}

	admit(commandId: string, command: DeviceCommand, priority: boolean): CommandRecord {
		const record = this.expect(commandId, 'SUBMITTED');
		record.status = 'ADMITTED';
		record.command = command;
		record.priority = priority;

		this.logger.info('Command admitted', {
			component: LogComponents.COMMAND_REGISTRY,
			commandId,
			deviceId: record.deviceId,
			commandType: record.commandType,
			priority,
		});
		return cloneRecord(record);
	}

	reject(commandId: string, reason: RejectionReason): CommandRecord {
		const record = this.expect(commandId, 'SUBMITTED');
		record.status = 'REJECTED';
		record.rejection = { ...reason };
		record.completedAt = this.now();
		this.close(record);

		this.logger.info('Command rejected', {
			component: LogComponents.COMMAND_REGISTRY,
			commandId,
			deviceId: record.deviceId,
			commandType: record.commandType,
			code: reason.code,
			reason: reason.message,
		});
		return cloneRecord(record);
	}

	/**
	 * Close an admitted command with the dispatcher's result. Returns null when
	 * the command was preempted earlier and the late result is ignored.
	 */
	complete(commandId: string, success: boolean, detail: string | null = null): CommandRecord | null {
		const record = this.records.get(commandId);
		if (!record) {
			throw new NotFoundError('command', commandId);
		}

		if (record.preemptedBy !== null) {
			this.logger.debug('Ignoring result for preempted command', {
				component: LogComponents.COMMAND_REGISTRY,
				commandId,
				preemptedBy: record.preemptedBy,
			});
			return null;
		}

		if (record.status !== 'ADMITTED') {
			throw new InvalidTransitionError(`Command ${commandId} is ${record.status}, not ADMITTED`);
		}

		record.status = success ? 'EXECUTED' : 'FAILED';
		record.detail = detail;
		record.completedAt = this.now();
		this.close(record);

		if (!success) {
			this.logger.warn('Command execution failed', {
				component: LogComponents.COMMAND_REGISTRY,
				commandId,
				deviceId: record.deviceId,
				commandType: record.commandType,
				detail,
			});
		}
		return cloneRecord(record);
	}

	/**
	 * Fail every other in-flight command of the device in favour of a priority command
	 */
	preemptInFlight(deviceId: string, byCommandId: string): CommandRecord[] {
		const preempted: CommandRecord[] = [];
		const at = this.now();

		for (const record of this.records.values()) {
			if (record.deviceId !== deviceId || record.id === byCommandId || record.status !== 'ADMITTED') {
				continue;
			}
			record.status = 'FAILED';
			record.detail = `preempted by ${byCommandId}`;
			record.preemptedBy = byCommandId;
			record.completedAt = at;
			this.close(record);
			preempted.push(cloneRecord(record));
		}

		if (preempted.length > 0) {
			this.logger.warn('In-flight commands preempted', {
				component: LogComponents.COMMAND_REGISTRY,
				deviceId,
				byCommandId,
				preempted: preempted.map(r => r.id),
			});
		}
		return preempted;
	}

	get(commandId: string): CommandRecord | undefined {
		const record = this.records.get(commandId);
		return record ? cloneRecord(record) : undefined;
	}

	/**
	 * Admitted commands awaiting an execution result, oldest first
	 */
	pending(deviceId: string): CommandRecord[] {
		return Array.from(this.records.values())
			.filter(r => r.deviceId === deviceId && r.status === 'ADMITTED')
			.map(cloneRecord);
	}

	/**
	 * Retained commands, newest first
	 */
	history(deviceId?: string): CommandRecord[] {
		return Array.from(this.records.values())
			.filter(r => deviceId === undefined || r.deviceId === deviceId)
			.reverse()
			.map(cloneRecord);
	}

	private expect(commandId: string, status: CommandRecord['status']): CommandRecord {
		const record = this.records.get(commandId);
		if (!record) {
			throw new NotFoundError('command', commandId);
		}
		if (record.status !== status) {
			throw new InvalidTransitionError(`Command ${commandId} is ${record.status}, expected ${status}`);
		}
		return record;
	}

	private close(record: CommandRecord): void {
		this.closedOrder.push(record.id);
		while (this.closedOrder.length > this.historyLimit) {
			const oldest = this.closedOrder.shift();
			if (oldest !== undefined) {
				this.records.delete(oldest);
			}
		}
	}

	private now(): Date {
		return new Date(this.clock().getTime());
	}
}

function cloneRecord(record: CommandRecord): CommandRecord {
	return {
		...record,
		rejection: record.rejection ? { ...record.rejection } : null,
		submittedAt: new Date(record.submittedAt.getTime()),
		completedAt: record.completedAt ? new Date(record.completedAt.getTime()) : null,
	};
}
