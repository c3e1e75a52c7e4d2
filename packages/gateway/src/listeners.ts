import { EventChannel } from "./channel.js";
import { EventTypeFlags, eventTypeFlag, type GatewayEvent } from "./events.js";

export interface Subscription {
	id: number;
	events: EventChannel<GatewayEvent>;
}

interface Listener {
	mask: bigint;
	events: EventChannel<GatewayEvent>;
}

/**
 * Fan-out of gateway events to any number of subscribers, each filtered by
 * an event-type mask. Subscribers that closed their channel are dropped on
 * the next publish.
 */
export class ListenerRegistry {
	private nextId = 0;
	private readonly listeners = new Map<number, Listener>();

	subscribe(mask: bigint = EventTypeFlags.ALL): Subscription {
		const id = this.nextId++;
		const events = new EventChannel<GatewayEvent>();
		this.listeners.set(id, { mask, events });
		return { id, events };
	}

	/** Returns the number of listeners the event was delivered to. */
	publish(event: GatewayEvent): number {
		const flag = eventTypeFlag(event);
		let delivered = 0;
		for (const [id, listener] of this.listeners) {
			if ((listener.mask & flag) === 0n) {
				continue;
			}
			if (listener.events.push(event)) {
				delivered += 1;
			} else {
				this.listeners.delete(id);
			}
		}
		return delivered;
	}

	/** Whether any listener's mask includes one of the given flags. */
	wants(flags: bigint): boolean {
		for (const listener of this.listeners.values()) {
			if ((listener.mask & flags) !== 0n && !listener.events.closed) {
				return true;
			}
		}
		return false;
	}

	unsubscribe(id: number): boolean {
		const listener = this.listeners.get(id);
		if (!listener) {
			return false;
		}
		listener.events.close();
		return this.listeners.delete(id);
	}

	clear(): void {
		for (const listener of this.listeners.values()) {
			listener.events.close();
		}
		this.listeners.clear();
	}

	get size(): number {
		return this.listeners.size;
	}
}
