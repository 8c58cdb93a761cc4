/**
 * ALARMS - TYPE DEFINITIONS
 * ===========================
 */

export const SEVERITIES = ['NOMINAL', 'INFO', 'WARNING', 'FAULT', 'CRITICAL'] as const;

/**
 * Ordered: NOMINAL < INFO < WARNING < FAULT < CRITICAL
 */
export type Severity = typeof SEVERITIES[number];

export const ALARM_TYPES = ['THRESHOLD_HIGH', 'THRESHOLD_LOW', 'STATISTICAL_ANOMALY', 'DEVICE_FAULT'] as const;

export type AlarmType = typeof ALARM_TYPES[number];

/**
 * NONE is implicit: an alarm exists only once triggered. CLEARED is terminal.
 */
export type AlarmState = 'TRIGGERED' | 'ACKNOWLEDGED' | 'CLEARED';

export interface Alarm {
	id: string;
	deviceId: string;
	parameter: string;
	type: AlarmType;
	severity: Severity;
	state: AlarmState;
	thresholdValue: number | null;
	actualValue: number;
	triggeredAt: Date;
	lastUpdatedAt: Date;
	occurrences: number;              // Violations folded into this alarm
	acknowledged: boolean;
	acknowledgedBy: string | null;
	acknowledgedAt: Date | null;
	cleared: boolean;
	clearedAt: Date | null;
	durationMs: number | null;        // clearedAt - triggeredAt
}

export interface AlarmTrigger {
	deviceId: string;
	parameter: string;
	type: AlarmType;
	severity: Severity;
	thresholdValue: number | null;
	actualValue: number;
}

export type AlarmTransitionKind = 'created' | 'updated' | 'acknowledged' | 'cleared';

export interface AlarmTransition {
	kind: AlarmTransitionKind;
	alarm: Alarm;
}

export interface AlarmHistoryFilter {
	deviceId?: string;
	since?: Date;
}

export function severityRank(severity: Severity): number {
	return SEVERITIES.indexOf(severity);
}

/**
 * Negative when a < b, positive when a > b
 */
export function compareSeverity(a: Severity, b: Severity): number {
	return severityRank(a) - severityRank(b);
}

export function isActive(alarm: Alarm): boolean {
	return alarm.state !== 'CLEARED';
}
