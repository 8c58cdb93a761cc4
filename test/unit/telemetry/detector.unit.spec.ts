import { PARAMETER_CATALOG } from '../../../src/catalog/device-catalog';
import type { ParameterDefinition } from '../../../src/catalog/types';
import { DEFAULT_DETECTOR_SETTINGS, classify } from '../../../src/telemetry/detector';
import type { Verdict, WindowStats } from '../../../src/telemetry/types';

const voltage: ParameterDefinition = {
	name: 'voltage',
	unit: 'V',
	category: 'electrical',
	min: 20,
	max: 32,
	nominal: 28,
};

const NO_STATS: WindowStats = { count: 0, mean: 0, stdDev: 0 };
const SETTLED: WindowStats = { count: 30, mean: 28, stdDev: 0.1 };

function detect(value: number, stats: WindowStats = NO_STATS): Verdict {
	return classify({ value, parameter: voltage, stats }, DEFAULT_DETECTOR_SETTINGS);
}

describe('classify', () => {
	describe('thresholds', () => {
		it('raises THRESHOLD_HIGH FAULT well above the maximum', () => {
			expect(detect(40)).toEqual({
				kind: 'violation',
				alarmType: 'THRESHOLD_HIGH',
				severity: 'FAULT',
				value: 40,
				thresholdValue: 32,
				deviation: 8,
				message: 'voltage 40V above maximum 32V',
			});
		});

		it('raises WARNING when the excursion is within a tenth of the range', () => {
			const verdict = detect(32.5);
			expect(verdict.kind).toBe('violation');
			if (verdict.kind === 'violation') {
				expect(verdict.alarmType).toBe('THRESHOLD_HIGH');
				expect(verdict.severity).toBe('WARNING');
			}
		});

		it('raises FAULT once the excursion exceeds a tenth of the range', () => {
			const verdict = detect(33.5);
			expect(verdict.kind === 'violation' && verdict.severity).toBe('FAULT');
		});

		it('raises THRESHOLD_LOW below the minimum', () => {
			expect(detect(19)).toEqual({
				kind: 'violation',
				alarmType: 'THRESHOLD_LOW',
				severity: 'WARNING',
				value: 19,
				thresholdValue: 20,
				deviation: 1,
				message: 'voltage 19V below minimum 20V',
			});
		});

		it('treats the bounds themselves as in range', () => {
			expect(detect(32).kind).toBe('nominal');
			expect(detect(20).kind).toBe('nominal');
		});

		it('takes precedence over statistics', () => {
			const verdict = detect(40, SETTLED);
			expect(verdict.kind === 'violation' && verdict.alarmType).toBe('THRESHOLD_HIGH');
		});
	});

	describe('statistics', () => {
		it('skips statistical detection below the minimum sample count', () => {
			expect(detect(31, { count: 29, mean: 28, stdDev: 0.1 })).toEqual({
				kind: 'nominal',
				value: 31,
				statisticsApplied: false,
				message: 'Within bounds; 29/30 samples for statistical detection',
			});
		});

		it('flags a value beyond 3σ above the mean', () => {
			const verdict = detect(28.5, SETTLED);

			expect(verdict.kind).toBe('violation');
			if (verdict.kind === 'violation') {
				expect(verdict.alarmType).toBe('STATISTICAL_ANOMALY');
				expect(verdict.severity).toBe('WARNING');
				expect(verdict.thresholdValue).toBeCloseTo(28.3, 10);
				expect(verdict.deviation).toBeCloseTo(5, 10);
			}
		});

		it('reports the lower band edge for a value below the mean', () => {
			const verdict = detect(27.5, SETTLED);
			expect(verdict.kind === 'violation' && verdict.thresholdValue).toBeCloseTo(27.7, 10);
		});

		it('accepts a value inside the band', () => {
			expect(detect(28.2, SETTLED)).toEqual({
				kind: 'nominal',
				value: 28.2,
				statisticsApplied: true,
				message: 'Within bounds and within 3σ of mean',
			});
		});

		it('flags any departure from a constant window', () => {
			const constant: WindowStats = { count: 40, mean: 28, stdDev: 0 };

			const verdict = detect(28.1, constant);
			expect(verdict.kind === 'violation' && verdict.deviation).toBe(Infinity);
			expect(detect(28, constant).kind).toBe('nominal');
		});
	});

	it('classifies catalog parameters with their own units', () => {
		const temperature = PARAMETER_CATALOG.cryogenic_line.find(p => p.name === 'temperature');
		expect(temperature).toBeDefined();
		if (temperature) {
			const verdict = classify({ value: 200, parameter: temperature, stats: NO_STATS });
			expect(verdict.message).toBe('temperature 200°C above maximum 150°C');
			// 50 beyond a 423-wide range is above 10%
			expect(verdict.kind === 'violation' && verdict.severity).toBe('FAULT');
		}
	});
});
