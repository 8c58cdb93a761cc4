/**
 * GSE CONTROL CORE - PUBLIC API
 * ===============================
 *
 * Telemetry monitoring, alarm lifecycle, device state and command interlocks
 * for ground support equipment.
 */

import { GseControlCore } from './control-core';
import type { GseControlCoreOptions } from './control-core';
import { getConfigSummary, loadConfig } from './config';
import { createLogger } from './logging/logger';
import { LogComponents } from './logging/components';

export { GseControlCore } from './control-core';
export type { DeviceSnapshot, GseControlCoreOptions, IngestResult, PointResult } from './control-core';

export { AlarmManager, cloneAlarm } from './alarms/alarm-manager';
export { computeAlarmMetrics } from './alarms/metrics';
export type { AlarmMetrics } from './alarms/metrics';
export * from './alarms/types';

export { DEFAULT_DEVICES, PARAMETER_CATALOG, StaticParameterSource } from './catalog/device-catalog';
export * from './catalog/types';

export { CommandRegistry } from './commands/registry';
export { CommandValidator } from './commands/validator';
export { INTERLOCK_TABLE, VALVE_CHILLDOWN_LIMIT, evaluateInterlocks } from './commands/interlocks';
export type { InterlockContext, InterlockRule, InterlockTable, InterlockViolation } from './commands/interlocks';
export { CommandSchema, decodeCommand } from './commands/schemas';
export type { CommandOf, DecodeResult, DeviceCommand } from './commands/schemas';
export * from './commands/types';

export { CoreConfigSchema, getConfigSummary, loadConfig, loadConfigFromEnv, parseDeviceList, resolveConfig } from './config';
export type { CoreConfig, CoreConfigInput } from './config';

export { DeviceStateTracker, statusForSeverity } from './devices/state-tracker';
export * from './devices/types';

export * from './errors';

export { EventBus } from './events/event-bus';
export type * from './events/types';

export { createLogger, noopLogger } from './logging/logger';
export type { LogLevel, LogMeta, Logger, LoggerOptions } from './logging/logger';
export { LogComponents } from './logging/components';

export { DEFAULT_DETECTOR_SETTINGS, classify } from './telemetry/detector';
export { RollingStatsTracker } from './telemetry/stats-tracker';
export type * from './telemetry/types';

export { KeyedLock } from './utils/keyed-lock';

/**
 * Build a core from the environment (`.env` included) with a winston logger
 */
export function createControlCore(
	options: Omit<GseControlCoreOptions, 'config' | 'logger'>
): GseControlCore {
	const config = loadConfig();
	const logger = createLogger({ level: config.logLevel });
	logger.info(getConfigSummary(config), { component: LogComponents.CONFIG });

	return new GseControlCore({ ...options, config, logger });
}
