export type {
	BorrowingEvent,
	BorrowingEventType,
	PairAccFeesUpdated,
	GroupAccFeesUpdated,
	GroupOiUpdated,
	PairGroupUpdated,
	PairParamsUpdated,
	GroupUpdated,
	TradeInitialAccFeesStored,
	TradeActionHandled,
} from "./borrowing-events.js";

export { EventDispatcher, EventQueue } from "./event-dispatcher.js";
export type { HandlerErrorCallback } from "./event-dispatcher.js";
