/**
 * Core errors
 */

import type { CoreEvent } from './events/types';

export type ValidationErrorCode =
	| 'unknown_device'
	| 'unknown_parameter'
	| 'bad_timestamp'
	| 'bad_value';

export class CoreError extends Error {
	readonly code: string;

	constructor(code: string, message: string) {
		super(message);
		this.name = 'CoreError';
		this.code = code;
	}
}

/**
 * A telemetry point the core refused. Each point is judged on its own.
 */
export class ValidationError extends CoreError {
	declare readonly code: ValidationErrorCode;

	constructor(code: ValidationErrorCode, message: string) {
		super(code, message);
		this.name = 'ValidationError';
	}
}

export class NotFoundError extends CoreError {
	readonly resource: string;
	readonly id: string;

	constructor(resource: string, id: string) {
		super('not_found', `${resource} not found: ${id}`);
		this.name = 'NotFoundError';
		this.resource = resource;
		this.id = id;
	}
}

export class InvalidTransitionError extends CoreError {
	constructor(message: string) {
		super('invalid_transition', message);
		this.name = 'InvalidTransitionError';
	}
}

/**
 * The event sink or the dispatcher failed. In-memory state is already updated;
 * `events` holds what the sink did not receive so the caller can replay it.
 */
export class DeliveryError extends CoreError {
	readonly events: readonly CoreEvent[];

	constructor(message: string, events: readonly CoreEvent[], cause?: unknown) {
		super('delivery_failed', message);
		this.name = 'DeliveryError';
		this.events = events;
		this.cause = cause;
	}
}

export class ConfigError extends CoreError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super('invalid_config', `Invalid configuration: ${issues.join('; ')}`);
		this.name = 'ConfigError';
		this.issues = issues;
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
