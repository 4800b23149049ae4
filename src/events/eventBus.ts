/** Publish/subscribe routing of session lifecycle events. */

// Internally using node's EventEmitter; captureRejections routes failures of async handlers to
// the per-kind "error" listener instead of leaving them unhandled.
import { EventEmitter } from "node:events";
import { Logger } from "../logging";
import { Disposable } from "../utils/disposables";
import { SessionEvent, SessionEventKind, SessionEventOfKind } from "./sessionEvents";

/** Type describing handler callbacks to whom events are routed. */
export type SessionEventHandler<K extends SessionEventKind> = (
  event: SessionEventOfKind<K>,
) => Promise<void> | void;

/**
 * Event bus contract consumed by the explorer. Delivery is asynchronous, at-least-once, and not
 * ordered relative to fetches.
 */
export interface EventBus {
  subscribe<K extends SessionEventKind>(kind: K, handler: SessionEventHandler<K>): Disposable;
  publish(event: SessionEvent): Promise<void>;
}

const logger = new Logger("events.eventBus");

/** {@link EventBus} delivering within the current process. */
export class InProcessEventBus implements EventBus {
  /** Map of event kind -> EventEmitter with the handlers registered via subscribe(). */
  private emitters: Map<SessionEventKind, EventEmitter> = new Map();

  constructor() {
    populateEmittersMap(this.emitters);
  }

  /**
   * Register a (possibly async) handler for events of the given kind. The handler is called every
   * time an event of that kind is published, until the returned Disposable is disposed.
   **/
  subscribe<K extends SessionEventKind>(kind: K, handler: SessionEventHandler<K>): Disposable {
    const emitter = this.getEmitter(kind);
    emitter.on("event", handler);
    return { dispose: () => emitter.off("event", handler) };
  }

  /** Deliver an event to all handlers registered for its kind. */
  async publish(event: SessionEvent): Promise<void> {
    const emitter = this.getEmitter(event.kind);
    const handlerCount = emitter.listenerCount("event");
    logger.debug(`Delivering ${event.kind} for ${event.instance} to ${handlerCount} handler(s)`);
    emitter.emit("event", event);
  }

  /** How many handlers are registered for the given kind? */
  handlerCount(kind: SessionEventKind): number {
    return this.getEmitter(kind).listenerCount("event");
  }

  private getEmitter(kind: SessionEventKind): EventEmitter {
    const emitter = this.emitters.get(kind);
    if (emitter === undefined) {
      throw new Error(`InProcessEventBus: unknown event kind ${kind}`);
    }
    return emitter;
  }
}

/** Construct EventEmitters for each event kind. */
function populateEmittersMap(emitters: Map<SessionEventKind, EventEmitter>): void {
  for (const kind of Object.values(SessionEventKind)) {
    const perKindEmitter = new EventEmitter({ captureRejections: true });
    perKindEmitter.on("error", (error: unknown) => {
      logger.error(`Error delivering ${kind} event to handler: ${error}`);
    });
    emitters.set(kind, perKindEmitter);
  }
}
