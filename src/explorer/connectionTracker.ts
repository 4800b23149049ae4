import type { SessionBroker } from "../clients/sessionBroker";
import type { EventBus } from "../events/eventBus";
import { SessionEndedEvent, SessionEventKind, SessionStartedEvent } from "../events/sessionEvents";
import { Logger } from "../logging";
import type { InstanceLocator } from "../models/locators";
import type { ConnectionStateReader } from "../models/nodes";
import { DisposableCollection } from "../utils/disposables";
import { Emitter, Event } from "../utils/emitter";

const logger = new Logger("explorer.connectionTracker");

export interface ConnectionStateChange {
  locator: InstanceLocator;
  isConnected: boolean;
}

/**
 * Set of loaded instances that have an open remote session, kept current from session
 * events on the bus. Instances are keyed by their locator's string form.
 *
 * Only instances present in the tree are tracked: events about anything else are ignored, and an
 * instance's state is seeded from the session broker when it is first tracked.
 */
export class ConnectionStateTracker extends DisposableCollection implements ConnectionStateReader {
  /** Locator key -> number of live instance nodes with that identity. */
  private readonly tracked = new Map<string, number>();
  private readonly connected = new Set<string>();

  private readonly _onDidChangeConnectionState = new Emitter<ConnectionStateChange>();
  /** Fires when a tracked instance connects or disconnects. */
  readonly onDidChangeConnectionState: Event<ConnectionStateChange> =
    this._onDidChangeConnectionState.event;

  constructor(
    eventBus: EventBus,
    private readonly sessionBroker: SessionBroker,
  ) {
    super();
    this.disposables.push(
      eventBus.subscribe(SessionEventKind.Started, (event) => this.handleSessionStarted(event)),
      eventBus.subscribe(SessionEventKind.Ended, (event) => this.handleSessionEnded(event)),
      this._onDidChangeConnectionState,
    );
  }

  isConnected(instance: InstanceLocator): boolean {
    return this.connected.has(instance.toString());
  }

  /** Is an instance with this identity currently present in the tree? */
  isTracked(instance: InstanceLocator): boolean {
    return this.tracked.has(instance.toString());
  }

  /** Start tracking newly created instance nodes, seeding unknown ones from the session broker. */
  trackInstances(instances: Iterable<InstanceLocator>): void {
    for (const locator of instances) {
      const key = locator.toString();
      const count = this.tracked.get(key) ?? 0;
      this.tracked.set(key, count + 1);
      if (count > 0) {
        continue;
      }
      if (this.sessionBroker.isConnected(locator)) {
        this.connected.add(key);
      } else {
        this.connected.delete(key);
      }
    }
  }

  /** Stop tracking instance nodes that were discarded from the tree. */
  untrackInstances(instances: Iterable<InstanceLocator>): void {
    for (const locator of instances) {
      const key = locator.toString();
      const count = this.tracked.get(key);
      if (count === undefined) {
        continue;
      }
      if (count > 1) {
        this.tracked.set(key, count - 1);
      } else {
        this.tracked.delete(key);
        this.connected.delete(key);
      }
    }
  }

  private handleSessionStarted(event: SessionStartedEvent): void {
    this.setConnected(event.instance, true);
  }

  private handleSessionEnded(event: SessionEndedEvent): void {
    this.setConnected(event.instance, false);
  }

  private setConnected(locator: InstanceLocator, isConnected: boolean): void {
    const key = locator.toString();
    if (!this.tracked.has(key)) {
      logger.debug(`ignoring session event for unloaded instance ${key}`);
      return;
    }
    if (this.connected.has(key) === isConnected) {
      return;
    }
    if (isConnected) {
      this.connected.add(key);
    } else {
      this.connected.delete(key);
    }
    logger.debug(`instance ${key} is now ${isConnected ? "connected" : "disconnected"}`);
    this._onDidChangeConnectionState.fire({ locator, isConnected });
  }
}
