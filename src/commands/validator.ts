/**
 * Command Validator
 *
 * ADMIT / REJECT for one request, in order:
 *   1. priority commands (emergency shutdown) are always admitted
 *   2. command type must exist for the device type
 *   3. parameters decode against the command's schema
 *   4. interlocks hold
 */

import type { DeviceType } from '../catalog/types';
import type { Logger } from '../logging/logger';
import { noopLogger } from '../logging/logger';
import { LogComponents } from '../logging/components';
import type { InterlockContext, InterlockTable } from './interlocks';
import { INTERLOCK_TABLE, evaluateInterlocks } from './interlocks';
import { decodeCommand } from './schemas';
import type { CommandDecision, CommandRequest } from './types';
import { COMMAND_CATALOG, isCommandType, isPriorityCommand } from './types';

export interface CommandValidatorOptions {
	interlocks?: InterlockTable;
	logger?: Logger;
}

export class CommandValidator {
	private readonly interlocks: InterlockTable;
	private readonly logger: Logger;

	constructor(options: CommandValidatorOptions = {}) {
		this.interlocks = options.interlocks ?? INTERLOCK_TABLE;
		this.logger = options.logger ?? noopLogger;
	}

	validate(
		request: Pick<CommandRequest, 'commandType' | 'params'>,
		deviceType: DeviceType,
		context: InterlockContext
	): CommandDecision {
		const { commandType } = request;

		if (!isCommandType(commandType) || !COMMAND_CATALOG[deviceType].includes(commandType)) {
			return this.reject({
				code: 'unsupported_command',
				message: `unsupported command: ${commandType} for ${deviceType}`,
			});
		}

		const decoded = decodeCommand(commandType, request.params);
		if (!decoded.ok) {
			return this.reject({
				code: 'invalid_parameter',
				message: decoded.message,
				field: decoded.field,
			});
		}

		const command = decoded.command;
		if (isPriorityCommand(command)) {
			return { outcome: 'ADMITTED', command, priority: true };
		}

		const violation = evaluateInterlocks(this.interlocks, deviceType, command, context);
		if (violation) {
			return this.reject({
				code: 'interlock',
				message: violation.message,
				rule: violation.rule,
			});
		}

		return { outcome: 'ADMITTED', command, priority: false };
	}

	private reject(reason: Extract<CommandDecision, { outcome: 'REJECTED' }>['reason']): CommandDecision {
		this.logger.debug('Command rejected', {
			component: LogComponents.COMMANDS,
			code: reason.code,
			reason: reason.message,
		});
		return { outcome: 'REJECTED', reason };
	}
}
