// Internally using node's EventEmitter in place of an editor host's EventEmitter; listeners are
// registered via the `.event` function and released through the returned Disposable.
import { EventEmitter } from "node:events";
import { Logger } from "../logging";
import { Disposable } from "./disposables";

const logger = new Logger("utils.emitter");

/** Function registering a listener, returning the handle that unregisters it. */
export type Event<T> = (listener: (data: T) => void) => Disposable;

/** Single-event, typed emitter. */
export class Emitter<T> implements Disposable {
  private readonly emitter = new EventEmitter().setMaxListeners(0);

  readonly event: Event<T> = (listener: (data: T) => void): Disposable => {
    this.emitter.on("fired", listener);
    return { dispose: () => this.emitter.off("fired", listener) };
  };

  /**
   * Deliver `data` to every listener, in registration order. A throwing listener is logged and
   * does not keep the remaining listeners from running.
   */
  fire(data: T): void {
    for (const listener of this.emitter.listeners("fired")) {
      try {
        listener(data);
      } catch (error) {
        logger.error("event listener threw", error);
      }
    }
  }

  get listenerCount(): number {
    return this.emitter.listenerCount("fired");
  }

  dispose(): void {
    this.emitter.removeAllListeners();
  }
}
