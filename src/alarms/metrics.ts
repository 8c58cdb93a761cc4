/**
 * Alarm analytics: mean time to acknowledge / resolve and alarm frequency,
 * derived purely from alarm timestamps.
 */

import type { Alarm, Severity } from './types';

export interface AlarmMetrics {
	totalAlarms: number;
	activeAlarms: number;
	clearedAlarms: number;
	acknowledgedAlarms: number;
	meanTimeToAcknowledgeMs: number | null;
	meanTimeToResolveMs: number | null;
	bySeverity: Record<Severity, number>;
	byDevice: Array<{ deviceId: string; count: number }>;
}

export function computeAlarmMetrics(alarms: readonly Alarm[]): AlarmMetrics {
	const bySeverity: Record<Severity, number> = { NOMINAL: 0, INFO: 0, WARNING: 0, FAULT: 0, CRITICAL: 0 };
	const perDevice = new Map<string, number>();
	const ackTimes: number[] = [];
	const resolveTimes: number[] = [];

	for (const alarm of alarms) {
		bySeverity[alarm.severity]++;
		perDevice.set(alarm.deviceId, (perDevice.get(alarm.deviceId) ?? 0) + 1);

		if (alarm.acknowledgedAt) {
			ackTimes.push(alarm.acknowledgedAt.getTime() - alarm.triggeredAt.getTime());
		}
		if (alarm.cleared && alarm.durationMs !== null) {
			resolveTimes.push(alarm.durationMs);
		}
	}

	const byDevice = Array.from(perDevice.entries())
		.map(([deviceId, count]) => ({ deviceId, count }))
		.sort((a, b) => b.count - a.count || a.deviceId.localeCompare(b.deviceId));

	return {
		totalAlarms: alarms.length,
		activeAlarms: alarms.filter(a => !a.cleared).length,
		clearedAlarms: resolveTimes.length,
		acknowledgedAlarms: ackTimes.length,
		meanTimeToAcknowledgeMs: mean(ackTimes),
		meanTimeToResolveMs: mean(resolveTimes),
		bySeverity,
		byDevice,
	};
}

function mean(values: number[]): number | null {
	if (values.length === 0) return null;
	return values.reduce((sum, v) => sum + v, 0) / values.length;
}
