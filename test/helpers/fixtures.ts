/**
 * Test Fixtures
 * =============
 *
 * Factory functions for telemetry points, alarms and core configuration.
 *
 * Usage:
 *   const config = createTestConfig({ clearAfterSamples: 2 });
 *   const point = createTelemetryPoint({ value: 40 });
 */

import { resolveConfig } from '../../src/config';
import type { CoreConfig, CoreConfigInput } from '../../src/config';
import type { Alarm } from '../../src/alarms/types';
import type { TelemetryInput } from '../../src/telemetry/types';

export const T0 = Date.parse('2026-01-15T12:00:00.000Z');

export const createTestConfig = (overrides: CoreConfigInput = {}): CoreConfig =>
	resolveConfig(overrides);

export const createTelemetryPoint = (overrides: Partial<TelemetryInput> = {}): TelemetryInput => ({
	deviceId: 'GPU-001',
	parameter: 'voltage',
	timestamp: new Date(T0).toISOString(),
	value: 28,
	...overrides,
});

/**
 * `count` voltage readings alternating 27.9 / 28.1, one second apart
 */
export const createVoltageSeries = (count: number, deviceId: string = 'GPU-001'): TelemetryInput[] =>
	Array.from({ length: count }, (_, i) => createTelemetryPoint({
		deviceId,
		timestamp: T0 + i * 1000,
		value: i % 2 === 0 ? 27.9 : 28.1,
	}));

export const createAlarm = (overrides: Partial<Alarm> = {}): Alarm => ({
	id: 'alarm-1',
	deviceId: 'GPU-001',
	parameter: 'voltage',
	type: 'THRESHOLD_HIGH',
	severity: 'WARNING',
	state: 'TRIGGERED',
	thresholdValue: 32,
	actualValue: 33,
	triggeredAt: new Date(T0),
	lastUpdatedAt: new Date(T0),
	occurrences: 1,
	acknowledged: false,
	acknowledgedBy: null,
	acknowledgedAt: null,
	cleared: false,
	clearedAt: null,
	durationMs: null,
	...overrides,
});
