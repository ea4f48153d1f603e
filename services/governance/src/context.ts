import type { Identity } from "@sealvote/shared";
import type { EventBuffer } from "./events/event-log.js";

/**
 * Per-request state handed to every component operation.
 * `now` is the single clock reading taken for the request.
 */
export interface RequestContext {
  caller: Identity;
  now: number;
  events: EventBuffer;
}
