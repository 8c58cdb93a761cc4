/**
 * Rolling statistics per (device, parameter).
 *
 * Each tracker owns its windows; nothing here is process-global, so separate
 * deployments (or tests) never share state.
 */

import type { RollingWindow, WindowStats } from './types';
import { clearWindow, computeStats, createWindow, getLatest, getRecentValues, pushValue } from './rolling-window';

export class RollingStatsTracker {
	private readonly windows = new Map<string, Map<string, RollingWindow>>();
	readonly capacity: number;

	constructor(capacity: number = 100) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`Window capacity must be a positive integer, got ${capacity}`);
		}
		this.capacity = capacity;
	}

	/**
	 * Append a value to the pair's window, creating the window on first use
	 */
	record(deviceId: string, parameter: string, value: number): void {
		let deviceWindows = this.windows.get(deviceId);
		if (!deviceWindows) {
			deviceWindows = new Map();
			this.windows.set(deviceId, deviceWindows);
		}

		let window = deviceWindows.get(parameter);
		if (!window) {
			window = createWindow(this.capacity);
			deviceWindows.set(parameter, window);
		}

		pushValue(window, value);
	}

	stats(deviceId: string, parameter: string): WindowStats {
		const window = this.getWindow(deviceId, parameter);
		return window ? computeStats(window) : { count: 0, mean: 0, stdDev: 0 };
	}

	/**
	 * Last value received for the pair, by arrival order
	 */
	latest(deviceId: string, parameter: string): number | undefined {
		const window = this.getWindow(deviceId, parameter);
		return window ? getLatest(window) : undefined;
	}

	recent(deviceId: string, parameter: string, count: number): number[] {
		const window = this.getWindow(deviceId, parameter);
		return window ? getRecentValues(window, count) : [];
	}

	/**
	 * Latest value of every parameter seen for a device
	 */
	snapshot(deviceId: string): Record<string, number> {
		const result: Record<string, number> = {};
		const deviceWindows = this.windows.get(deviceId);
		if (!deviceWindows) return result;

		for (const [parameter, window] of deviceWindows) {
			const value = getLatest(window);
			if (value !== undefined) {
				result[parameter] = value;
			}
		}
		return result;
	}

	reset(deviceId?: string): void {
		const targets = deviceId === undefined
			? Array.from(this.windows.values())
			: [this.windows.get(deviceId)];

		for (const deviceWindows of targets) {
			deviceWindows?.forEach(window => clearWindow(window));
		}
	}

	private getWindow(deviceId: string, parameter: string): RollingWindow | undefined {
		return this.windows.get(deviceId)?.get(parameter);
	}
}
