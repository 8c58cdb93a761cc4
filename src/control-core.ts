/**
 * GSE CONTROL CORE
 * ==================
 *
 * Entry point for telemetry, operator commands and execution reports.
 *
 *   telemetry → validate → rolling stats → detector → alarms → device status
 *   command   → validator (state, latest telemetry, active alarms) → dispatch
 *
 * Every read-decide-mutate sequence for a device runs under that device's
 * lock. Events are collected while the lock is held and handed to the sink
 * (and admitted commands to the dispatcher) only after it is released. A
 * command's completion never reaches the sink ahead of its admission.
 */

import { computeAlarmMetrics } from './alarms/metrics';
import type { AlarmMetrics } from './alarms/metrics';
import { AlarmManager } from './alarms/alarm-manager';
import type { Alarm, AlarmHistoryFilter, AlarmTransition } from './alarms/types';
import { StaticParameterSource } from './catalog/device-catalog';
import type { DeviceDescriptor, ParameterSource } from './catalog/types';
import { isDeviceType } from './catalog/types';
import { CommandRegistry } from './commands/registry';
import type { CommandRecord, CommandRequest, RejectionReason, SubmitResult } from './commands/types';
import { CommandValidator } from './commands/validator';
import type { InterlockTable } from './commands/interlocks';
import { resolveConfig } from './config';
import type { CoreConfig } from './config';
import { DeviceStateTracker } from './devices/state-tracker';
import type { DeviceState, StateTransition } from './devices/types';
import { ConfigError, DeliveryError, InvalidTransitionError, NotFoundError, ValidationError, describeError } from './errors';
import { EventBus } from './events/event-bus';
import type { CommandDispatcher, CoreEvent, DispatchRequest, EventSink } from './events/types';
import type { Logger } from './logging/logger';
import { noopLogger } from './logging/logger';
import { LogComponents } from './logging/components';
import { classify } from './telemetry/detector';
import { RollingStatsTracker } from './telemetry/stats-tracker';
import type { DetectorSettings, ReportedStatus, TelemetryInput, Verdict, WindowStats } from './telemetry/types';
import { KeyedLock } from './utils/keyed-lock';

export interface GseControlCoreOptions {
	dispatcher: CommandDispatcher;
	config?: CoreConfig;
	parameters?: ParameterSource;
	sink?: EventSink;
	interlocks?: InterlockTable;
	logger?: Logger;
	clock?: () => Date;
}

export interface IngestResult {
	accepted: true;
	verdict: Verdict;
	alarms: AlarmTransition[];
	outOfOrder: boolean;
}

export type PointResult =
	| { ok: true; result: IngestResult }
	| { ok: false; error: Error };

export interface DeviceSnapshot {
	descriptor: DeviceDescriptor;
	state: DeviceState;
	telemetry: Record<string, number>;   // Latest value per parameter
	activeAlarms: Alarm[];
}

const REPORTED_STATUSES: readonly ReportedStatus[] = ['NOMINAL', 'WARNING', 'FAULT'];

export class GseControlCore {
	readonly config: CoreConfig;

	private readonly parameters: ParameterSource;
	private readonly sink: EventSink;
	private readonly dispatcher: CommandDispatcher;
	private readonly logger: Logger;
	private readonly clock: () => Date;
	private readonly detectorSettings: DetectorSettings;

	private readonly stats: RollingStatsTracker;
	private readonly alarms: AlarmManager;
	private readonly devices: DeviceStateTracker;
	private readonly validator: CommandValidator;
	private readonly registry: CommandRegistry;
	private readonly lock = new KeyedLock();
	private readonly lastTimestamps = new Map<string, number>();
	private readonly admissions = new Map<string, CoreEvent[]>();   // Unpublished admission batches by command id

	constructor(options: GseControlCoreOptions) {
		this.config = options.config ?? resolveConfig();
		this.parameters = options.parameters ?? new StaticParameterSource();
		this.sink = options.sink ?? new EventBus();
		this.dispatcher = options.dispatcher;
		this.logger = options.logger ?? noopLogger;
		this.clock = options.clock ?? (() => new Date());
		this.detectorSettings = {
			minSamples: this.config.minSamples,
			sigmaThreshold: this.config.sigmaThreshold,
			faultDeviationRatio: this.config.faultDeviationRatio,
		};

		const shared = { clock: this.clock, logger: this.logger };
		this.stats = new RollingStatsTracker(this.config.windowSize);
		this.alarms = new AlarmManager({
			...shared,
			clearAfterSamples: this.config.clearAfterSamples,
			anomalyConfirmSamples: this.config.anomalyConfirmSamples,
			historyLimit: this.config.alarmHistoryLimit,
		});
		this.devices = new DeviceStateTracker(shared);
		this.validator = new CommandValidator({ interlocks: options.interlocks, logger: this.logger });
		this.registry = new CommandRegistry({ ...shared, historyLimit: this.config.commandHistoryLimit });

		for (const device of this.config.devices) {
			this.devices.register(device);
		}

		this.logger.info('Control core initialized', {
			component: LogComponents.CORE,
			devices: this.config.devices.map(d => d.deviceId),
			windowSize: this.config.windowSize,
		});
	}

	// ============================================================================
	// TELEMETRY
	// ============================================================================

	async ingest(input: TelemetryInput): Promise<IngestResult> {
		const descriptor = this.devices.descriptor(input.deviceId);
		if (!descriptor) {
			throw new ValidationError('unknown_device', `Unknown device: ${input.deviceId}`);
		}

		// Lookup runs under the lock so points enter the window in arrival order
		const { result, events } = await this.lock.run(input.deviceId, async () => {
			const definition = await this.parameters.getParameter(descriptor.deviceType, input.parameter);
			if (!definition) {
				throw new ValidationError(
					'unknown_parameter',
					`Unknown parameter ${input.parameter} for ${descriptor.deviceType}`
				);
			}

			const timestamp = parseTimestamp(input.timestamp);
			if (typeof input.value !== 'number' || !Number.isFinite(input.value)) {
				throw new ValidationError('bad_value', `Value for ${input.parameter} must be a finite number`);
			}
			if (input.status !== undefined && !REPORTED_STATUSES.includes(input.status)) {
				throw new ValidationError('bad_value', `Unsupported device status: ${String(input.status)}`);
			}

			const { deviceId, parameter, value, status } = input;
			const events: CoreEvent[] = [];
			const outOfOrder = this.trackTimestamp(deviceId, parameter, timestamp);

			this.stats.record(deviceId, parameter, value);
			const verdict = classify(
				{ value, parameter: definition, stats: this.stats.stats(deviceId, parameter) },
				this.detectorSettings
			);

			if (status === 'WARNING' || status === 'FAULT') {
				events.push({ type: 'device.status_reported', at: this.now(), deviceId, parameter, status, value, timestamp });
			}

			const alarmTransitions = this.alarms.applyVerdict({ deviceId, parameter, verdict, reportedStatus: status });
			events.push(...this.alarmEvents(alarmTransitions));
			events.push(...this.transitionEvents(
				this.devices.reconcileStatus(deviceId, this.alarms.highestActiveSeverity(deviceId))
			));

			const result: IngestResult = { accepted: true, verdict, alarms: alarmTransitions, outOfOrder };
			return { result, events };
		});

		await this.publish(events);
		return result;
	}

	/**
	 * Ingest points one by one; a refused point never affects the others
	 */
	async ingestBatch(points: readonly TelemetryInput[]): Promise<PointResult[]> {
		const results: PointResult[] = [];
		for (const point of points) {
			try {
				results.push({ ok: true, result: await this.ingest(point) });
			} catch (error) {
				results.push({ ok: false, error: error instanceof Error ? error : new Error(String(error)) });
			}
		}
		return results;
	}

	// ============================================================================
	// COMMANDS
	// ============================================================================

	async submitCommand(request: CommandRequest): Promise<SubmitResult> {
		const descriptor = this.devices.descriptor(request.deviceId);
		if (!descriptor) {
			const reason: RejectionReason = { code: 'unknown_device', message: `Unknown device: ${request.deviceId}` };
			const record = this.registry.submit(request);
			const rejected = this.registry.reject(record.id, reason);
			await this.publish([{ type: 'command.rejected', at: this.now(), command: rejected }]);
			return { status: 'REJECTED', commandId: record.id, reason };
		}

		const decided = await this.lock.run(request.deviceId, () => this.decide(request));

		if (decided.dispatch) {
			await this.dispatchAdmitted(decided.dispatch, decided.events);
		} else {
			await this.publish(decided.events);
		}
		return decided.result;
	}

	/**
	 * Record the equipment's outcome for an admitted command. A late result for a
	 * preempted command is ignored and the preempted record returned as is.
	 */
	async reportExecutionResult(commandId: string, success: boolean, detail?: string): Promise<CommandRecord> {
		const record = this.registry.get(commandId);
		if (!record) {
			throw new NotFoundError('command', commandId);
		}

		const { completed, events } = await this.lock.run(record.deviceId, () => {
			const completed = this.registry.complete(commandId, success, detail ?? null);
			const events: CoreEvent[] = completed
				? this.holdBehindAdmission([{ type: 'command.completed', at: this.now(), command: completed }])
				: [];
			return { completed, events };
		});

		await this.publish(events);
		return completed ?? this.command(commandId);
	}

	command(commandId: string): CommandRecord {
		const record = this.registry.get(commandId);
		if (!record) {
			throw new NotFoundError('command', commandId);
		}
		return record;
	}

	pendingCommands(deviceId: string): CommandRecord[] {
		return this.registry.pending(deviceId);
	}

	commandHistory(deviceId?: string): CommandRecord[] {
		return this.registry.history(deviceId);
	}

	// ============================================================================
	// ALARMS
	// ============================================================================

	async acknowledgeAlarm(alarmId: string, operator: string): Promise<Alarm> {
		const alarm = this.alarms.get(alarmId);
		if (!alarm) {
			throw new NotFoundError('alarm', alarmId);
		}

		const transition = await this.lock.run(alarm.deviceId, () => this.alarms.acknowledge(alarmId, operator));
		if (!transition) {
			return this.alarms.get(alarmId) ?? alarm;
		}

		await this.publish(this.alarmEvents([transition]));
		return transition.alarm;
	}

	activeAlarms(deviceId?: string): Alarm[] {
		return this.alarms.active(deviceId);
	}

	alarmHistory(filter: AlarmHistoryFilter = {}): Alarm[] {
		return this.alarms.history(filter);
	}

	alarmMetrics(): AlarmMetrics {
		return computeAlarmMetrics(this.alarms.history());
	}

	// ============================================================================
	// DEVICES
	// ============================================================================

	registerDevice(descriptor: DeviceDescriptor): DeviceState {
		if (!isDeviceType(descriptor.deviceType)) {
			throw new ConfigError([`deviceType: unsupported device type "${String(descriptor.deviceType)}"`]);
		}
		return this.devices.register(descriptor);
	}

	listDevices(): DeviceDescriptor[] {
		return this.devices.list();
	}

	deviceState(deviceId: string): DeviceState {
		return this.devices.get(deviceId);
	}

	deviceSnapshot(deviceId: string): DeviceSnapshot {
		const state = this.devices.get(deviceId);
		const descriptor = this.devices.descriptor(deviceId) ?? { deviceId, deviceType: state.deviceType };
		return {
			descriptor,
			state,
			telemetry: this.stats.snapshot(deviceId),
			activeAlarms: this.alarms.active(deviceId),
		};
	}

	rollingStats(deviceId: string, parameter: string): WindowStats {
		return this.stats.stats(deviceId, parameter);
	}

	// ============================================================================
	// INTERNALS
	// ============================================================================

	/**
	 * Validate and apply one command. Runs under the device lock.
	 */
	private decide(request: CommandRequest): {
		result: SubmitResult;
		events: CoreEvent[];
		dispatch: DispatchRequest | null;
	} {
		const record = this.registry.submit(request);
		const state = this.devices.get(request.deviceId);
		const decision = this.validator.validate(request, state.deviceType, {
			state,
			latestValue: parameter => this.stats.latest(request.deviceId, parameter),
			activeAlarms: this.alarms.active(request.deviceId),
		});

		if (decision.outcome === 'REJECTED') {
			const rejected = this.registry.reject(record.id, decision.reason);
			return {
				result: { status: 'REJECTED', commandId: record.id, reason: decision.reason },
				events: [{ type: 'command.rejected', at: this.now(), command: rejected }],
				dispatch: null,
			};
		}

		const { command, priority } = decision;
		let transitions: StateTransition[];
		try {
			transitions = this.devices.applyCommand(
				request.deviceId,
				command,
				this.alarms.highestActiveSeverity(request.deviceId)
			);
		} catch (error) {
			if (!(error instanceof InvalidTransitionError)) {
				throw error;
			}
			const reason: RejectionReason = { code: 'interlock', message: error.message, rule: 'mode-transition' };
			const rejected = this.registry.reject(record.id, reason);
			return {
				result: { status: 'REJECTED', commandId: record.id, reason },
				events: [{ type: 'command.rejected', at: this.now(), command: rejected }],
				dispatch: null,
			};
		}

		const events: CoreEvent[] = [];
		if (priority) {
			const preempted = this.registry.preemptInFlight(request.deviceId, record.id);
			events.push(...this.holdBehindAdmission(
				preempted.map(command => ({ type: 'command.completed' as const, at: this.now(), command }))
			));
		}

		const admitted = this.registry.admit(record.id, command, priority);
		events.push({ type: 'command.admitted', at: this.now(), command: admitted });
		events.push(...this.transitionEvents(transitions));
		this.admissions.set(record.id, events);

		return {
			result: { status: 'ADMITTED', commandId: record.id, priority },
			events,
			dispatch: {
				commandId: record.id,
				deviceId: request.deviceId,
				deviceType: state.deviceType,
				command,
				priority,
				issuedBy: request.issuedBy,
				issuedAt: admitted.submittedAt,
			},
		};
	}

	/**
	 * Dispatch first, then publish, so a sink outage never holds back a command.
	 * A dispatch failure closes the command as FAILED.
	 */
	private async dispatchAdmitted(request: DispatchRequest, events: CoreEvent[]): Promise<void> {
		try {
			await this.dispatcher.dispatch(request);
		} catch (error) {
			this.admissions.delete(request.commandId);
			this.logger.error('Command dispatch failed', {
				component: LogComponents.DELIVERY,
				commandId: request.commandId,
				deviceId: request.deviceId,
				commandType: request.command.type,
				error: describeError(error),
			});

			const failed = await this.lock.run(request.deviceId, () => {
				const current = this.registry.get(request.commandId);
				return current?.status === 'ADMITTED'
					? this.registry.complete(request.commandId, false, `dispatch failed: ${describeError(error)}`)
					: null;
			});
			if (failed) {
				events.push({ type: 'command.completed', at: this.now(), command: failed });
			}

			try {
				await this.sink.publish(events);
			} catch (publishError) {
				this.logDeliveryFailure(events, publishError);
			}
			throw new DeliveryError(`Dispatch of command ${request.commandId} failed`, events, error);
		}

		this.admissions.delete(request.commandId);
		await this.publish(events);
	}

	/**
	 * Completions of a command whose admission batch is still waiting on the
	 * dispatcher join that batch; the rest are returned for publication now.
	 * Called under the device lock.
	 */
	private holdBehindAdmission(events: CoreEvent[]): CoreEvent[] {
		return events.filter(event => {
			if (event.type !== 'command.completed') {
				return true;
			}
			const admission = this.admissions.get(event.command.id);
			if (!admission) {
				return true;
			}
			admission.push(event);
			return false;
		});
	}

	private async publish(events: CoreEvent[]): Promise<void> {
		if (events.length === 0) {
			return;
		}
		try {
			await this.sink.publish(events);
		} catch (error) {
			this.logDeliveryFailure(events, error);
			throw new DeliveryError(`Failed to publish ${events.length} event(s)`, events, error);
		}
	}

	private logDeliveryFailure(events: CoreEvent[], error: unknown): void {
		this.logger.error('Event publication failed', {
			component: LogComponents.DELIVERY,
			events: events.map(e => e.type),
			error: describeError(error),
		});
	}

	/**
	 * Remember the newest timestamp per pair; true when this one is older
	 */
	private trackTimestamp(deviceId: string, parameter: string, timestamp: Date): boolean {
		const key = `${deviceId}/${parameter}`;
		const last = this.lastTimestamps.get(key);
		const time = timestamp.getTime();

		if (last !== undefined && time < last) {
			this.logger.warn('Out-of-order telemetry accepted', {
				component: LogComponents.TELEMETRY,
				deviceId,
				parameter,
				timestamp: timestamp.toISOString(),
				latest: new Date(last).toISOString(),
			});
			return true;
		}

		this.lastTimestamps.set(key, time);
		return false;
	}

	private alarmEvents(transitions: AlarmTransition[]): CoreEvent[] {
		return transitions.map(transition => ({
			type: `alarm.${transition.kind}` as const,
			at: this.now(),
			alarm: transition.alarm,
		}));
	}

	private transitionEvents(transitions: StateTransition[]): CoreEvent[] {
		return transitions.map(transition => ({ type: 'device.transition' as const, at: this.now(), transition }));
	}

	private now(): Date {
		return new Date(this.clock().getTime());
	}
}

function parseTimestamp(value: unknown): Date {
	let time = NaN;
	if (value instanceof Date) {
		time = value.getTime();
	} else if (typeof value === 'number') {
		time = value;
	} else if (typeof value === 'string' && value.trim() !== '') {
		time = Date.parse(value);
	}

	if (!Number.isFinite(time)) {
		throw new ValidationError('bad_timestamp', `Invalid timestamp: ${String(value)}`);
	}
	return new Date(time);
}
