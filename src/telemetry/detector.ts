/**
 * ANOMALY & THRESHOLD DETECTOR
 * ==============================
 *
 * Classifies one telemetry point against its parameter bounds and the rolling
 * statistics of its window. Pure: it never touches alarm state.
 *
 * Decision order (first match wins):
 *   1. outside [min, max]          → THRESHOLD_HIGH / THRESHOLD_LOW
 *   2. |value - mean| > σ·stdDev   → STATISTICAL_ANOMALY (needs minSamples)
 *   3. otherwise                   → nominal
 */

import type { ParameterDefinition } from '../catalog/types';
import type { DetectorSettings, Verdict, WindowStats } from './types';

export const DEFAULT_DETECTOR_SETTINGS: DetectorSettings = {
	minSamples: 30,
	sigmaThreshold: 3,
	faultDeviationRatio: 0.1,
};

export interface DetectionInput {
	value: number;
	parameter: ParameterDefinition;
	stats: WindowStats;
}

export function classify(input: DetectionInput, settings: DetectorSettings = DEFAULT_DETECTOR_SETTINGS): Verdict {
	const { value, parameter, stats } = input;

	if (value > parameter.max || value < parameter.min) {
		const high = value > parameter.max;
		const bound = high ? parameter.max : parameter.min;
		const deviation = Math.abs(value - bound);
		const range = parameter.max - parameter.min;
		const severity = deviation > settings.faultDeviationRatio * range ? 'FAULT' : 'WARNING';

		return {
			kind: 'violation',
			alarmType: high ? 'THRESHOLD_HIGH' : 'THRESHOLD_LOW',
			severity,
			value,
			thresholdValue: bound,
			deviation,
			message: `${parameter.name} ${formatValue(value, parameter.unit)} ${high ? 'above maximum' : 'below minimum'} ${formatValue(bound, parameter.unit)}`,
		};
	}

	if (stats.count < settings.minSamples) {
		return {
			kind: 'nominal',
			value,
			statisticsApplied: false,
			message: `Within bounds; ${stats.count}/${settings.minSamples} samples for statistical detection`,
		};
	}

	const distance = Math.abs(value - stats.mean);
	const band = settings.sigmaThreshold * stats.stdDev;

	if (distance > band) {
		const above = value > stats.mean;
		// stdDev is 0 for a constant window; any departure is then infinitely many σ away
		const zScore = stats.stdDev > 0 ? distance / stats.stdDev : Infinity;

		return {
			kind: 'violation',
			alarmType: 'STATISTICAL_ANOMALY',
			severity: 'WARNING',
			value,
			thresholdValue: above ? stats.mean + band : stats.mean - band,
			deviation: zScore,
			message: `${parameter.name} ${value.toFixed(2)} is ${zScore.toFixed(2)}σ from mean ${stats.mean.toFixed(2)}`,
		};
	}

	return {
		kind: 'nominal',
		value,
		statisticsApplied: true,
		message: `Within bounds and within ${settings.sigmaThreshold}σ of mean`,
	};
}

function formatValue(value: number, unit: string): string {
	return `${value}${unit}`;
}
