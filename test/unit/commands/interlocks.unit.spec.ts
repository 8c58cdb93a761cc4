import { INTERLOCK_TABLE, evaluateInterlocks } from '../../../src/commands/interlocks';
import type { InterlockContext, InterlockTable } from '../../../src/commands/interlocks';
import type { DeviceCommand } from '../../../src/commands/schemas';
import type { DeviceType } from '../../../src/catalog/types';
import type { DeviceMode, OperationalStatus } from '../../../src/devices/types';
import { T0 } from '../../helpers/fixtures';

const createContext = (
	deviceType: DeviceType,
	mode: DeviceMode,
	readings: Record<string, number> = {},
	status: OperationalStatus = 'NOMINAL'
): InterlockContext => ({
	state: {
		deviceId: deviceType === 'cryogenic_line' ? 'CRYO-001' : 'GPU-001',
		deviceType,
		mode,
		status,
		lastCommand: null,
		lastCommandAt: null,
		updatedAt: new Date(T0),
	},
	latestValue: parameter => readings[parameter],
	activeAlarms: [],
});

const OPEN_VALVE: DeviceCommand = { type: 'open_valve', params: { position: 50 } };

describe('evaluateInterlocks', () => {
	describe('cryogenic_line open_valve', () => {
		it('allows opening a chilled line in ACTIVE mode', () => {
			const context = createContext('cryogenic_line', 'ACTIVE', { temperature: -150 });
			expect(evaluateInterlocks(INTERLOCK_TABLE, 'cryogenic_line', OPEN_VALVE, context)).toBeNull();
		});

		it('refuses a warm line', () => {
			const context = createContext('cryogenic_line', 'ACTIVE', { temperature: -50 });

			expect(evaluateInterlocks(INTERLOCK_TABLE, 'cryogenic_line', OPEN_VALVE, context)).toEqual({
				rule: 'cryo-valve-requires-chilldown',
				message: 'Temperature too high (-50°C) for valve operation; must be below -100°C',
			});
		});

		it('refuses at exactly the chilldown limit', () => {
			const context = createContext('cryogenic_line', 'ACTIVE', { temperature: -100 });
			expect(evaluateInterlocks(INTERLOCK_TABLE, 'cryogenic_line', OPEN_VALVE, context)?.rule)
				.toBe('cryo-valve-requires-chilldown');
		});

		it('refuses without a temperature reading', () => {
			const context = createContext('cryogenic_line', 'ACTIVE');
			expect(evaluateInterlocks(INTERLOCK_TABLE, 'cryogenic_line', OPEN_VALVE, context)).toEqual({
				rule: 'cryo-valve-requires-chilldown',
				message: 'No temperature reading available for valve interlock',
			});
		});

		it('refuses outside ACTIVE mode', () => {
			const context = createContext('cryogenic_line', 'STANDBY', { temperature: -150 });
			expect(evaluateInterlocks(INTERLOCK_TABLE, 'cryogenic_line', OPEN_VALVE, context)).toEqual({
				rule: 'cryo-valve-requires-active',
				message: 'open_valve requires mode ACTIVE (current: STANDBY)',
			});
		});
	});

	describe('ground_power_unit enable_output', () => {
		const ENABLE: DeviceCommand = { type: 'enable_output', params: {} };

		it('refuses while the unit is in FAULT', () => {
			const context = createContext('ground_power_unit', 'ACTIVE', {}, 'FAULT');
			expect(evaluateInterlocks(INTERLOCK_TABLE, 'ground_power_unit', ENABLE, context)?.rule)
				.toBe('gpu-output-blocked-by-fault');
		});

		it('refuses outside ACTIVE mode', () => {
			const context = createContext('ground_power_unit', 'MAINTENANCE');
			expect(evaluateInterlocks(INTERLOCK_TABLE, 'ground_power_unit', ENABLE, context)?.rule)
				.toBe('gpu-output-requires-active');
		});

		it('allows a healthy ACTIVE unit', () => {
			const context = createContext('ground_power_unit', 'ACTIVE', {}, 'WARNING');
			expect(evaluateInterlocks(INTERLOCK_TABLE, 'ground_power_unit', ENABLE, context)).toBeNull();
		});
	});

	describe('global rules', () => {
		it('locks out ordinary commands during an emergency shutdown', () => {
			const context = createContext('ground_power_unit', 'EMERGENCY_SHUTDOWN');
			const command: DeviceCommand = { type: 'set_voltage', params: { voltage: 28 } };

			expect(evaluateInterlocks(INTERLOCK_TABLE, 'ground_power_unit', command, context)?.rule)
				.toBe('emergency-lockout');
		});

		it('requires an emergency shutdown before recovery', () => {
			const context = createContext('ground_power_unit', 'STANDBY');
			const command: DeviceCommand = { type: 'recover_from_shutdown', params: { mode: 'STANDBY' } };

			expect(evaluateInterlocks(INTERLOCK_TABLE, 'ground_power_unit', command, context)).toEqual({
				rule: 'recovery-requires-shutdown',
				message: 'Device is not in EMERGENCY_SHUTDOWN (current: STANDBY)',
			});
		});

		it('never gates safing or priority commands', () => {
			const context = createContext('cryogenic_line', 'EMERGENCY_SHUTDOWN');

			expect(evaluateInterlocks(INTERLOCK_TABLE, 'cryogenic_line', { type: 'close_valve', params: {} }, context)).toBeNull();
			expect(evaluateInterlocks(INTERLOCK_TABLE, 'cryogenic_line', { type: 'emergency_shutdown', params: {} }, context)).toBeNull();
		});
	});

	it('evaluates rules from a custom table', () => {
		const check = jest.fn().mockReturnValue('pressure too high');
		const table: InterlockTable = {
			global: [],
			byDeviceType: {
				ground_power_unit: {},
				cryogenic_line: {
					clear_fault: [{ id: 'custom-pressure', description: 'test rule', check }],
				},
			},
		};
		const context = createContext('cryogenic_line', 'ACTIVE');
		const command: DeviceCommand = { type: 'clear_fault', params: {} };

		expect(evaluateInterlocks(table, 'cryogenic_line', command, context)).toEqual({
			rule: 'custom-pressure',
			message: 'pressure too high',
		});
		expect(check).toHaveBeenCalledWith(context, command);
	});
});
