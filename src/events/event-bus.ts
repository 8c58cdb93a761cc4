/**
 * In-process event sink
 *
 * Emits:
 * - '<event type>' (e.g. 'alarm.created', 'device.transition') with the event
 * - 'event' for every event
 */

import { EventEmitter } from 'events';
import type { CoreEvent, EventSink } from './types';

export class EventBus extends EventEmitter implements EventSink {
	async publish(events: readonly CoreEvent[]): Promise<void> {
		for (const event of events) {
			this.emit(event.type, event);
			this.emit('event', event);
		}
	}
}
