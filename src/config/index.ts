/**
 * CONTROL CORE CONFIGURATION
 * ============================
 *
 * Environment-driven settings, validated with zod. `loadConfigFromEnv` is pure
 * over the env object it is given; `loadConfig` reads `.env` first.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_DEVICES } from '../catalog/device-catalog';
import { DEVICE_TYPES } from '../catalog/types';
import type { DeviceDescriptor } from '../catalog/types';
import { ConfigError } from '../errors';

const DeviceDescriptorSchema = z.object({
	deviceId: z.string().trim().min(1),
	deviceType: z.enum(DEVICE_TYPES),
	subsystem: z.string().optional(),
	location: z.string().optional(),
});

export const CoreConfigSchema = z.object({
	logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
	windowSize: z.number().int().min(2).default(100),
	minSamples: z.number().int().min(2).default(30),
	sigmaThreshold: z.number().positive().default(3),
	faultDeviationRatio: z.number().positive().default(0.1),
	clearAfterSamples: z.number().int().min(2).default(5),
	anomalyConfirmSamples: z.number().int().min(1).default(2),
	alarmHistoryLimit: z.number().int().min(10).default(1000),
	commandHistoryLimit: z.number().int().min(10).default(1000),
	devices: z.array(DeviceDescriptorSchema).default(() => DEFAULT_DEVICES.map(d => ({ ...d }))),
}).superRefine((config, ctx) => {
	if (config.minSamples > config.windowSize) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			path: ['minSamples'],
			message: `must not exceed windowSize (${config.windowSize})`,
		});
	}

	const seen = new Set<string>();
	config.devices.forEach((device, index) => {
		if (seen.has(device.deviceId)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['devices', index, 'deviceId'],
				message: `duplicate device ${device.deviceId}`,
			});
		}
		seen.add(device.deviceId);
	});
});

export type CoreConfig = z.output<typeof CoreConfigSchema>;

export type CoreConfigInput = z.input<typeof CoreConfigSchema>;

/**
 * Validate and fill defaults; throws ConfigError listing every problem
 */
export function resolveConfig(input: CoreConfigInput = {}): CoreConfig {
	const parsed = CoreConfigSchema.safeParse(input);
	if (!parsed.success) {
		throw new ConfigError(parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`));
	}
	return parsed.data;
}

/**
 * Parse "ID:type[,ID:type...]"
 */
export function parseDeviceList(value: string): Array<{ deviceId: string; deviceType: string }> {
	return value
		.split(',')
		.map(entry => entry.trim())
		.filter(entry => entry.length > 0)
		.map(entry => {
			const [deviceId = '', deviceType = ''] = entry.split(':').map(part => part.trim());
			return { deviceId, deviceType };
		});
}

/**
 * Load configuration from environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CoreConfig {
	return resolveConfig({
		logLevel: parseLogLevel(env.LOG_LEVEL),
		windowSize: parseNumber(env.GSE_WINDOW_SIZE),
		minSamples: parseNumber(env.GSE_MIN_SAMPLES),
		sigmaThreshold: parseNumber(env.GSE_SIGMA_THRESHOLD),
		faultDeviationRatio: parseNumber(env.GSE_FAULT_DEVIATION_RATIO),
		clearAfterSamples: parseNumber(env.GSE_CLEAR_AFTER_SAMPLES),
		anomalyConfirmSamples: parseNumber(env.GSE_ANOMALY_CONFIRM_SAMPLES),
		alarmHistoryLimit: parseNumber(env.GSE_ALARM_HISTORY_LIMIT),
		commandHistoryLimit: parseNumber(env.GSE_COMMAND_HISTORY_LIMIT),
		devices: env.GSE_DEVICES !== undefined ? parseDevices(env.GSE_DEVICES) : undefined,
	});
}

/**
 * Read `.env` (if present) into process.env, then load
 */
export function loadConfig(): CoreConfig {
	dotenv.config();
	return loadConfigFromEnv(process.env);
}

/**
 * Get human-readable configuration summary
 */
export function getConfigSummary(config: CoreConfig): string {
	const devices = config.devices.map((d: DeviceDescriptor) => `${d.deviceId} (${d.deviceType})`).join(', ');

	return `
GSE Control Core Configuration:
  Log Level: ${config.logLevel}
  Rolling Window: ${config.windowSize} samples (statistics from ${config.minSamples})
  Anomaly Band: ${config.sigmaThreshold}σ, confirmed after ${config.anomalyConfirmSamples} sample(s)
  Fault Deviation: ${(config.faultDeviationRatio * 100).toFixed(0)}% of range
  Auto-clear After: ${config.clearAfterSamples} nominal samples
  Devices: ${devices}
	`.trim();
}

function parseNumber(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === '') return undefined;
	// NaN is left for the schema to report against the right key
	return Number(value);
}

function parseLogLevel(value: string | undefined): CoreConfigInput['logLevel'] {
	switch (value) {
		case 'error':
		case 'warn':
		case 'info':
		case 'debug':
			return value;
		case undefined:
		case '':
			return undefined;
		default:
			throw new ConfigError([`logLevel: unsupported LOG_LEVEL "${value}"`]);
	}
}

function parseDevices(value: string): CoreConfigInput['devices'] {
	const devices = parseDeviceList(value);
	const issues: string[] = [];
	const result: DeviceDescriptor[] = [];

	devices.forEach(({ deviceId, deviceType }, index) => {
		const parsed = DeviceDescriptorSchema.safeParse({ deviceId, deviceType });
		if (parsed.success) {
			result.push(parsed.data);
		} else {
			issues.push(`devices.${index}: invalid entry "${deviceId}:${deviceType}"`);
		}
	});

	if (issues.length > 0) {
		throw new ConfigError(issues);
	}
	return result;
}
