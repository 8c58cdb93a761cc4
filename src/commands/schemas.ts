/**
 * Command parameter schemas
 *
 * Loosely-typed parameter maps are decoded once, at the boundary, into a
 * discriminated union keyed by command type.
 */

import { z } from 'zod';
import { DEVICE_MODES } from '../devices/types';
import type { CommandType } from './types';

const NoParams = z.object({});

export const CommandSchema = z.discriminatedUnion('type', [
	z.object({
		type: z.literal('set_mode'),
		params: z.object({ mode: z.enum(DEVICE_MODES) }),
	}),
	z.object({
		type: z.literal('emergency_shutdown'),
		// Malformed optional fields are dropped: this command is never refused
		params: z.object({ reason: z.string().max(500).optional().catch(undefined) }).catch({}),
	}),
	z.object({
		type: z.literal('recover_from_shutdown'),
		params: z.object({ mode: z.enum(['STANDBY', 'MAINTENANCE']).default('STANDBY') }),
	}),
	z.object({ type: z.literal('clear_fault'), params: NoParams }),
	z.object({ type: z.literal('enable_output'), params: NoParams }),
	z.object({ type: z.literal('disable_output'), params: NoParams }),
	z.object({
		type: z.literal('set_voltage'),
		params: z.object({ voltage: z.number().min(20).max(32) }),
	}),
	z.object({
		type: z.literal('set_current_limit'),
		params: z.object({ current: z.number().min(0).max(150) }),
	}),
	z.object({
		type: z.literal('open_valve'),
		params: z.object({ position: z.number().min(0).max(100) }),
	}),
	z.object({ type: z.literal('close_valve'), params: NoParams }),
]);

export type DeviceCommand = z.infer<typeof CommandSchema>;

export type CommandOf<K extends CommandType> = Extract<DeviceCommand, { type: K }>;

export type DecodeResult =
	| { ok: true; command: DeviceCommand }
	| { ok: false; field: string; message: string };

export function decodeCommand(type: CommandType, params: unknown): DecodeResult {
	const parsed = CommandSchema.safeParse({ type, params: params ?? {} });
	if (parsed.success) {
		return { ok: true, command: parsed.data };
	}

	const issue = parsed.error.issues[0];
	// Paths are rooted at { type, params }; report the field inside params
	const field = issue && issue.path.length > 1 ? issue.path.slice(1).join('.') : 'params';
	return {
		ok: false,
		field,
		message: issue ? `${field}: ${issue.message}` : 'Invalid parameters',
	};
}
