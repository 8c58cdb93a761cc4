/**
 * TELEMETRY - TYPE DEFINITIONS
 * ==============================
 */

import type { AlarmType, Severity } from '../alarms/types';

/**
 * Status a device may report alongside a value
 */
export type ReportedStatus = 'NOMINAL' | 'WARNING' | 'FAULT';

/**
 * One telemetry point as delivered by the transport layer
 */
export interface TelemetryInput {
	deviceId: string;
	parameter: string;
	timestamp: string | number | Date;   // ISO-8601 string, Unix ms, or Date
	value: number;
	status?: ReportedStatus;
}

/**
 * Fixed-capacity circular window of raw values
 */
export interface RollingWindow {
	values: number[];
	capacity: number;
	size: number;                        // Current size (≤ capacity)
	head: number;                        // Index of next insertion
}

/**
 * Statistics derived from the current window contents
 */
export interface WindowStats {
	count: number;
	mean: number;
	stdDev: number;                      // Population standard deviation
}

export interface DetectorSettings {
	minSamples: number;
	sigmaThreshold: number;
	faultDeviationRatio: number;         // Fraction of the range beyond a bound that makes a FAULT
}

export interface ViolationVerdict {
	kind: 'violation';
	alarmType: Exclude<AlarmType, 'DEVICE_FAULT'>;
	severity: Severity;
	value: number;
	thresholdValue: number;
	deviation: number;                   // Distance beyond the bound, or σ from the mean
	message: string;
}

export interface NominalVerdict {
	kind: 'nominal';
	value: number;
	statisticsApplied: boolean;          // False while the window holds fewer than minSamples
	message: string;
}

export type Verdict = ViolationVerdict | NominalVerdict;
