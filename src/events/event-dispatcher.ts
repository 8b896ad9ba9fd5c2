/**
 * EventDispatcher: typed pub/sub for borrowing events.
 *
 * Synchronous dispatch; handlers are called in registration order, specific
 * subscriptions before wildcard ones. A throwing handler is reported to the
 * error callback and does not stop the remaining handlers.
 */

import type { BorrowingEvent, BorrowingEventType } from "./borrowing-events.js";

type EventHandler = (event: BorrowingEvent) => void;

/** Callback invoked when a handler throws during dispatch. */
export type HandlerErrorCallback = (error: unknown, event: BorrowingEvent) => void;

export class EventDispatcher {
	private readonly handlers: Map<BorrowingEventType | "*", EventHandler[]>;
	private readonly onHandlerError: HandlerErrorCallback | null;

	constructor(onHandlerError?: HandlerErrorCallback) {
		this.handlers = new Map();
		this.onHandlerError = onHandlerError ?? null;
	}

	/** Subscribe to one event type, or "*" for all. Returns the unsubscribe function. */
	on(type: BorrowingEventType | "*", handler: EventHandler): () => void {
		const handlers = this.handlers.get(type) ?? [];
		handlers.push(handler);
		this.handlers.set(type, handlers);

		return () => {
			const list = this.handlers.get(type);
			if (list) {
				const idx = list.indexOf(handler);
				if (idx !== -1) list.splice(idx, 1);
			}
		};
	}

	emit(event: BorrowingEvent): void {
		this.dispatchAll(this.handlers.get(event.type), event);
		this.dispatchAll(this.handlers.get("*"), event);
	}

	/** Remove all handlers */
	clear(): void {
		this.handlers.clear();
	}

	// ── Internal ──────────────────────────────────────────────────

	private dispatchAll(handlers: EventHandler[] | undefined, event: BorrowingEvent): void {
		if (!handlers) return;
		for (const handler of [...handlers]) {
			try {
				handler(event);
			} catch (error: unknown) {
				this.onHandlerError?.(error, event);
			}
		}
	}
}

/**
 * Events recorded while an operation runs. The engine drains the queue into
 * the dispatcher once the operation commits and discards it on rollback.
 */
export class EventQueue {
	private pending: BorrowingEvent[] = [];

	push(event: BorrowingEvent): void {
		this.pending.push(event);
	}

	get size(): number {
		return this.pending.length;
	}

	/** Take every recorded event, leaving the queue empty. */
	drain(): readonly BorrowingEvent[] {
		const events = this.pending;
		this.pending = [];
		return events;
	}

	discard(): void {
		this.pending = [];
	}
}
