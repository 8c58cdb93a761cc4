/**
 * Parameter catalog and default deployment
 */

import type { DeviceDescriptor, DeviceType, ParameterDefinition, ParameterSource } from './types';

const TEMPERATURE: ParameterDefinition = {
	name: 'temperature',
	unit: '°C',
	category: 'thermal',
	min: -273,
	max: 150,
	nominal: 25,
};

export const PARAMETER_CATALOG: Readonly<Record<DeviceType, readonly ParameterDefinition[]>> = {
	ground_power_unit: [
		{ name: 'voltage', unit: 'V', category: 'electrical', min: 20, max: 32, nominal: 28 },
		{ name: 'current', unit: 'A', category: 'electrical', min: 0, max: 150, nominal: 50 },
		{ name: 'power', unit: 'W', category: 'electrical', min: 0, max: 5000, nominal: 1400 },
		TEMPERATURE,
	],
	cryogenic_line: [
		{ name: 'valve_position', unit: '%', category: 'mechanical', min: 0, max: 100, nominal: 0 },
		{ name: 'pressure', unit: 'psi', category: 'fluid', min: 0, max: 100, nominal: 14.7 },
		{ name: 'flow_rate', unit: 'L/min', category: 'fluid', min: 0, max: 600, nominal: 0 },
		TEMPERATURE,
		{ name: 'liquid_level', unit: '%', category: 'fluid', min: 0, max: 100, nominal: 75 },
	],
};

export const DEFAULT_DEVICES: readonly DeviceDescriptor[] = [
	{ deviceId: 'GPU-001', deviceType: 'ground_power_unit', subsystem: 'Power Systems', location: 'Pad 39A' },
	{ deviceId: 'CRYO-001', deviceType: 'cryogenic_line', subsystem: 'Propellant Systems', location: 'Pad 39A' },
];

/**
 * In-memory parameter source backed by a catalog (the built-in one by default)
 */
export class StaticParameterSource implements ParameterSource {
	private readonly index = new Map<string, ParameterDefinition>();

	constructor(catalog: Readonly<Record<DeviceType, readonly ParameterDefinition[]>> = PARAMETER_CATALOG) {
		for (const [deviceType, parameters] of Object.entries(catalog)) {
			for (const parameter of parameters) {
				this.index.set(`${deviceType}/${parameter.name}`, parameter);
			}
		}
	}

	async getParameter(deviceType: DeviceType, name: string): Promise<ParameterDefinition | undefined> {
		return this.index.get(`${deviceType}/${name}`);
	}

	listParameters(deviceType: DeviceType): ParameterDefinition[] {
		const prefix = `${deviceType}/`;
		return Array.from(this.index.entries())
			.filter(([key]) => key.startsWith(prefix))
			.map(([, parameter]) => parameter);
	}
}
