/**
 * ROLLING WINDOW - CIRCULAR BUFFER
 * ==================================
 *
 * Fixed-capacity FIFO window over the most recent raw samples. Statistics are
 * recomputed from the window contents on demand, so there is no running sum
 * to drift as values are evicted.
 */

import type { RollingWindow, WindowStats } from './types';

/**
 * Create an empty window
 */
export function createWindow(capacity: number): RollingWindow {
	if (!Number.isInteger(capacity) || capacity < 1) {
		throw new RangeError(`Window capacity must be a positive integer, got ${capacity}`);
	}

	return {
		values: new Array<number>(capacity).fill(0),
		capacity,
		size: 0,
		head: 0,
	};
}

/**
 * Append a value, overwriting the oldest one once the window is full.
 * Returns the evicted value, if any.
 */
export function pushValue(window: RollingWindow, value: number): number | undefined {
	const index = window.head;
	const evicted = window.size === window.capacity ? window.values[index] : undefined;

	window.values[index] = value;
	window.head = (window.head + 1) % window.capacity;

	if (window.size < window.capacity) {
		window.size++;
	}

	return evicted;
}

/**
 * Window contents, oldest first
 */
export function windowValues(window: RollingWindow): number[] {
	return getRecentValues(window, window.size);
}

/**
 * Last `count` values, oldest first
 */
export function getRecentValues(window: RollingWindow, count: number): number[] {
	const result: number[] = [];
	const actualCount = Math.min(Math.max(0, count), window.size);

	// Read backwards from head
	for (let i = 0; i < actualCount; i++) {
		const index = (window.head - 1 - i + window.capacity) % window.capacity;
		result.unshift(window.values[index]);
	}

	return result;
}

export function getLatest(window: RollingWindow): number | undefined {
	if (window.size === 0) return undefined;
	return window.values[(window.head - 1 + window.capacity) % window.capacity];
}

/**
 * Mean and population standard deviation (two-pass)
 */
export function computeStats(window: RollingWindow): WindowStats {
	const count = window.size;
	if (count === 0) {
		return { count: 0, mean: 0, stdDev: 0 };
	}

	let sum = 0;
	for (let i = 0; i < count; i++) {
		sum += window.values[i];
	}
	const mean = sum / count;

	let squaredDiffs = 0;
	for (let i = 0; i < count; i++) {
		const diff = window.values[i] - mean;
		squaredDiffs += diff * diff;
	}

	return {
		count,
		mean,
		stdDev: Math.sqrt(squaredDiffs / count),
	};
}

export function clearWindow(window: RollingWindow): void {
	window.values.fill(0);
	window.size = 0;
	window.head = 0;
}
