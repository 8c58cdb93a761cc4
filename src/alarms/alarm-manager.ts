/**
 * ALARM LIFECYCLE MANAGER
 * =========================
 *
 * Sole owner of alarm state. Applies detector verdicts, one alarm per
 * (device, parameter, type) at a time:
 *
 *   NONE → TRIGGERED → ACKNOWLEDGED → CLEARED
 *
 * A further violation of an active tuple updates that alarm in place. A
 * violation after CLEARED starts a new alarm with a new id. Callers only ever
 * receive copies.
 */

import { v4 as uuidv4 } from 'uuid';
import { InvalidTransitionError, NotFoundError } from '../errors';
import type { Logger } from '../logging/logger';
import { noopLogger } from '../logging/logger';
import { LogComponents } from '../logging/components';
import type { ReportedStatus, Verdict } from '../telemetry/types';
import type {
	Alarm,
	AlarmHistoryFilter,
	AlarmTransition,
	AlarmTrigger,
	AlarmType,
	Severity,
} from './types';
import { compareSeverity, isActive } from './types';

export interface AlarmManagerOptions {
	clearAfterSamples?: number;       // Consecutive nominal samples before an active alarm clears
	anomalyConfirmSamples?: number;   // Consecutive statistical verdicts before an alarm is raised
	historyLimit?: number;            // Cleared alarms retained
	clock?: () => Date;
	logger?: Logger;
}

export interface VerdictSample {
	deviceId: string;
	parameter: string;
	verdict: Verdict;
	reportedStatus?: ReportedStatus;
}

export class AlarmManager {
	private readonly alarms = new Map<string, Alarm>();
	private readonly activeIndex = new Map<string, string>();   // tuple key → alarm id
	private readonly nominalStreaks = new Map<string, number>(); // pair key → consecutive nominal samples
	private readonly anomalyStreaks = new Map<string, number>(); // pair key → consecutive statistical verdicts
	private readonly clearedOrder: string[] = [];

	private readonly clearAfterSamples: number;
	private readonly anomalyConfirmSamples: number;
	private readonly historyLimit: number;
	private readonly clock: () => Date;
	private readonly logger: Logger;

	constructor(options: AlarmManagerOptions = {}) {
		this.clearAfterSamples = options.clearAfterSamples ?? 5;
		this.anomalyConfirmSamples = options.anomalyConfirmSamples ?? 2;
		this.historyLimit = options.historyLimit ?? 1000;
		this.clock = options.clock ?? (() => new Date());
		this.logger = options.logger ?? noopLogger;
	}

	/**
	 * Fold one classified sample into alarm state
	 */
	applyVerdict(sample: VerdictSample): AlarmTransition[] {
		const { deviceId, parameter, verdict } = sample;
		const pair = pairKey(deviceId, parameter);
		const transitions: AlarmTransition[] = [];
		const reportedFault = sample.reportedStatus === 'FAULT';

		if (reportedFault) {
			transitions.push(this.raise({
				deviceId,
				parameter,
				type: 'DEVICE_FAULT',
				severity: 'FAULT',
				thresholdValue: null,
				actualValue: verdict.value,
			}));
		}

		if (verdict.kind === 'violation') {
			if (verdict.alarmType === 'STATISTICAL_ANOMALY') {
				const streak = (this.anomalyStreaks.get(pair) ?? 0) + 1;
				this.anomalyStreaks.set(pair, streak);

				const alreadyActive = this.activeIndex.has(tupleKey(deviceId, parameter, 'STATISTICAL_ANOMALY'));
				if (streak < this.anomalyConfirmSamples && !alreadyActive) {
					this.nominalStreaks.delete(pair);
					this.logger.debug('Statistical anomaly awaiting confirmation', {
						component: LogComponents.ALARMS,
						deviceId,
						parameter,
						streak,
						required: this.anomalyConfirmSamples,
					});
					return transitions;
				}
			} else {
				this.anomalyStreaks.delete(pair);
			}

			transitions.push(this.raise({
				deviceId,
				parameter,
				type: verdict.alarmType,
				severity: verdict.severity,
				thresholdValue: verdict.thresholdValue,
				actualValue: verdict.value,
			}));
			return transitions;
		}

		this.anomalyStreaks.delete(pair);
		if (reportedFault) {
			return transitions;
		}

		const streak = Math.min((this.nominalStreaks.get(pair) ?? 0) + 1, this.clearAfterSamples);
		this.nominalStreaks.set(pair, streak);
		if (streak < this.clearAfterSamples) {
			return transitions;
		}

		const eligible = this.activeAlarmsFor(deviceId, parameter);
		if (eligible.length > 0) {
			for (const alarm of eligible) {
				transitions.push(this.clear(alarm));
			}
			this.nominalStreaks.delete(pair);
		}

		return transitions;
	}

	/**
	 * Create an alarm for the tuple, or update the active one in place
	 */
	raise(trigger: AlarmTrigger): AlarmTransition {
		const key = tupleKey(trigger.deviceId, trigger.parameter, trigger.type);
		const now = this.now();
		this.nominalStreaks.delete(pairKey(trigger.deviceId, trigger.parameter));

		const existingId = this.activeIndex.get(key);
		const existing = existingId !== undefined ? this.alarms.get(existingId) : undefined;
		if (existing) {
			existing.actualValue = trigger.actualValue;
			existing.severity = trigger.severity;
			existing.thresholdValue = trigger.thresholdValue;
			existing.lastUpdatedAt = now;
			existing.occurrences++;
			return { kind: 'updated', alarm: cloneAlarm(existing) };
		}

		const alarm: Alarm = {
			id: uuidv4(),
			deviceId: trigger.deviceId,
			parameter: trigger.parameter,
			type: trigger.type,
			severity: trigger.severity,
			state: 'TRIGGERED',
			thresholdValue: trigger.thresholdValue,
			actualValue: trigger.actualValue,
			triggeredAt: now,
			lastUpdatedAt: now,
			occurrences: 1,
			acknowledged: false,
			acknowledgedBy: null,
			acknowledgedAt: null,
			cleared: false,
			clearedAt: null,
			durationMs: null,
		};

		this.alarms.set(alarm.id, alarm);
		this.activeIndex.set(key, alarm.id);

		this.logger.warn('Alarm raised', {
			component: LogComponents.ALARMS,
			alarmId: alarm.id,
			deviceId: alarm.deviceId,
			parameter: alarm.parameter,
			type: alarm.type,
			severity: alarm.severity,
			actualValue: alarm.actualValue,
			thresholdValue: alarm.thresholdValue,
		});

		return { kind: 'created', alarm: cloneAlarm(alarm) };
	}

	/**
	 * Operator acknowledgment. Returns null when the alarm was already acknowledged.
	 */
	acknowledge(alarmId: string, operator: string): AlarmTransition | null {
		const alarm = this.alarms.get(alarmId);
		if (!alarm) {
			throw new NotFoundError('alarm', alarmId);
		}
		if (alarm.state === 'CLEARED') {
			throw new InvalidTransitionError(`Alarm ${alarmId} is already cleared`);
		}
		if (alarm.state === 'ACKNOWLEDGED') {
			return null;
		}

		alarm.state = 'ACKNOWLEDGED';
		alarm.acknowledged = true;
		alarm.acknowledgedBy = operator;
		alarm.acknowledgedAt = this.now();

		this.logger.info('Alarm acknowledged', {
			component: LogComponents.ALARMS,
			alarmId,
			operator,
		});

		return { kind: 'acknowledged', alarm: cloneAlarm(alarm) };
	}

	get(alarmId: string): Alarm | undefined {
		const alarm = this.alarms.get(alarmId);
		return alarm ? cloneAlarm(alarm) : undefined;
	}

	/**
	 * Alarms not yet cleared, oldest trigger first
	 */
	active(deviceId?: string): Alarm[] {
		return Array.from(this.activeIndex.values())
			.map(id => this.alarms.get(id))
			.filter((alarm): alarm is Alarm => alarm !== undefined)
			.filter(alarm => deviceId === undefined || alarm.deviceId === deviceId)
			.sort((a, b) => a.triggeredAt.getTime() - b.triggeredAt.getTime())
			.map(cloneAlarm);
	}

	/**
	 * All retained alarms, newest trigger first
	 */
	history(filter: AlarmHistoryFilter = {}): Alarm[] {
		const since = filter.since?.getTime();
		return Array.from(this.alarms.values())
			.filter(alarm => filter.deviceId === undefined || alarm.deviceId === filter.deviceId)
			.filter(alarm => since === undefined || alarm.triggeredAt.getTime() >= since)
			.sort((a, b) => b.triggeredAt.getTime() - a.triggeredAt.getTime())
			.map(cloneAlarm);
	}

	highestActiveSeverity(deviceId: string): Severity | undefined {
		let highest: Severity | undefined;
		for (const id of this.activeIndex.values()) {
			const alarm = this.alarms.get(id);
			if (!alarm || alarm.deviceId !== deviceId) continue;
			if (highest === undefined || compareSeverity(alarm.severity, highest) > 0) {
				highest = alarm.severity;
			}
		}
		return highest;
	}

	private clear(alarm: Alarm): AlarmTransition {
		const now = this.now();
		// Never let a clock step make the duration negative
		const clearedAt = now.getTime() < alarm.triggeredAt.getTime() ? new Date(alarm.triggeredAt.getTime()) : now;

		alarm.state = 'CLEARED';
		alarm.cleared = true;
		alarm.clearedAt = clearedAt;
		alarm.durationMs = clearedAt.getTime() - alarm.triggeredAt.getTime();

		this.activeIndex.delete(tupleKey(alarm.deviceId, alarm.parameter, alarm.type));
		this.clearedOrder.push(alarm.id);
		this.pruneHistory();

		this.logger.info('Alarm cleared', {
			component: LogComponents.ALARMS,
			alarmId: alarm.id,
			deviceId: alarm.deviceId,
			parameter: alarm.parameter,
			type: alarm.type,
			durationMs: alarm.durationMs,
		});

		return { kind: 'cleared', alarm: cloneAlarm(alarm) };
	}

	private now(): Date {
		return new Date(this.clock().getTime());
	}

	private activeAlarmsFor(deviceId: string, parameter: string): Alarm[] {
		const result: Alarm[] = [];
		for (const id of this.activeIndex.values()) {
			const alarm = this.alarms.get(id);
			if (alarm && alarm.deviceId === deviceId && alarm.parameter === parameter && isActive(alarm)) {
				result.push(alarm);
			}
		}
		return result;
	}

	private pruneHistory(): void {
		while (this.clearedOrder.length > this.historyLimit) {
			const oldest = this.clearedOrder.shift();
			if (oldest !== undefined) {
				this.alarms.delete(oldest);
			}
		}
	}
}

function pairKey(deviceId: string, parameter: string): string {
	return `${deviceId}/${parameter}`;
}

function tupleKey(deviceId: string, parameter: string, type: AlarmType): string {
	return `${deviceId}/${parameter}/${type}`;
}

export function cloneAlarm(alarm: Alarm): Alarm {
	return {
		...alarm,
		triggeredAt: new Date(alarm.triggeredAt.getTime()),
		lastUpdatedAt: new Date(alarm.lastUpdatedAt.getTime()),
		acknowledgedAt: alarm.acknowledgedAt ? new Date(alarm.acknowledgedAt.getTime()) : null,
		clearedAt: alarm.clearedAt ? new Date(alarm.clearedAt.getTime()) : null,
	};
}
