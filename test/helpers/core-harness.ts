/**
 * Builds a control core wired to mock collaborators
 */

import { GseControlCore } from '../../src/control-core';
import type { CoreConfigInput } from '../../src/config';
import { createTestConfig } from './fixtures';
import { FakeClock, MockDispatcher, MockEventSink, createMockLogger } from './mocks';

export interface CoreHarness {
	core: GseControlCore;
	clock: FakeClock;
	sink: MockEventSink;
	dispatcher: MockDispatcher;
	logger: ReturnType<typeof createMockLogger>;
}

export const createCoreHarness = (config: CoreConfigInput = {}): CoreHarness => {
	const clock = new FakeClock();
	const sink = new MockEventSink();
	const dispatcher = new MockDispatcher();
	const logger = createMockLogger();

	const core = new GseControlCore({
		config: createTestConfig(config),
		sink,
		dispatcher,
		logger,
		clock: clock.now,
	});

	return { core, clock, sink, dispatcher, logger };
};
