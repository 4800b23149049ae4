import * as assert from "assert";
import * as sinon from "sinon";
import { getStubbedSessionBroker } from "../../tests/stubs/services";
import type { SessionBroker } from "../clients/sessionBroker";
import { InProcessEventBus } from "../events/eventBus";
import { SessionEndedEvent, SessionEventKind, SessionStartedEvent } from "../events/sessionEvents";
import { InstanceLocator } from "../models/locators";
import { ConnectionStateChange, ConnectionStateTracker } from "./connectionTracker";

describe("ConnectionStateTracker", () => {
  let sandbox: sinon.SinonSandbox;
  let eventBus: InProcessEventBus;
  let sessionBroker: sinon.SinonStubbedInstance<SessionBroker>;
  let tracker: ConnectionStateTracker;
  let changes: ConnectionStateChange[];

  const vm1 = InstanceLocator.create({ projectId: "project-1", zone: "zone-1", name: "vm-1" });
  const vm2 = InstanceLocator.create({ projectId: "project-1", zone: "zone-1", name: "vm-2" });
  // an equal locator that is a different object
  const vm1Copy = InstanceLocator.create({ projectId: "project-1", zone: "zone-1", name: "vm-1" });

  beforeEach(() => {
    sandbox = sinon.createSandbox();
    eventBus = new InProcessEventBus();
    sessionBroker = getStubbedSessionBroker(sandbox);
    tracker = new ConnectionStateTracker(eventBus, sessionBroker);
    changes = [];
    tracker.onDidChangeConnectionState((change) => changes.push(change));
  });

  afterEach(() => {
    tracker.dispose();
    sandbox.restore();
  });

  it("should subscribe to session started and ended events", () => {
    assert.strictEqual(eventBus.handlerCount(SessionEventKind.Started), 1);
    assert.strictEqual(eventBus.handlerCount(SessionEventKind.Ended), 1);
  });

  it("should seed tracked instances from the session broker", () => {
    sessionBroker.isConnected.withArgs(vm1).returns(true);

    tracker.trackInstances([vm1, vm2]);

    assert.strictEqual(tracker.isConnected(vm1Copy), true);
    assert.strictEqual(tracker.isConnected(vm2), false);
    sinon.assert.calledTwice(sessionBroker.isConnected);
  });

  it("should follow session events for tracked instances", async () => {
    tracker.trackInstances([vm1, vm2]);

    await eventBus.publish(new SessionStartedEvent(vm1Copy));
    assert.strictEqual(tracker.isConnected(vm1), true);
    assert.strictEqual(tracker.isConnected(vm2), false);

    await eventBus.publish(new SessionEndedEvent(vm1Copy));
    assert.strictEqual(tracker.isConnected(vm1), false);

    assert.deepStrictEqual(
      changes.map((change) => [change.locator.toString(), change.isConnected]),
      [
        ["projects/project-1/zones/zone-1/instances/vm-1", true],
        ["projects/project-1/zones/zone-1/instances/vm-1", false],
      ],
    );
  });

  it("should ignore events for instances that are not loaded", async () => {
    tracker.trackInstances([vm1]);
    const unknown = InstanceLocator.create({
      projectId: "project-1",
      zone: "zone-1",
      name: "unknown-1",
    });

    await eventBus.publish(new SessionStartedEvent(unknown));

    assert.strictEqual(tracker.isConnected(unknown), false);
    assert.strictEqual(tracker.isConnected(vm1), false);
    assert.strictEqual(changes.length, 0);
  });

  it("should treat duplicate events as one", async () => {
    tracker.trackInstances([vm1]);

    await eventBus.publish(new SessionStartedEvent(vm1));
    await eventBus.publish(new SessionStartedEvent(vm1));

    assert.strictEqual(tracker.isConnected(vm1), true);
    assert.strictEqual(changes.length, 1);
  });

  it("should forget untracked instances", async () => {
    tracker.trackInstances([vm1]);
    await eventBus.publish(new SessionStartedEvent(vm1));

    tracker.untrackInstances([vm1]);

    assert.strictEqual(tracker.isTracked(vm1), false);
    assert.strictEqual(tracker.isConnected(vm1), false);
  });

  it("should keep the state of an instance tracked by a replacing node", async () => {
    tracker.trackInstances([vm1]);
    await eventBus.publish(new SessionStartedEvent(vm1));

    // a reload tracks the new node before untracking the old one
    tracker.trackInstances([vm1Copy]);
    tracker.untrackInstances([vm1]);

    assert.strictEqual(tracker.isTracked(vm1), true);
    assert.strictEqual(tracker.isConnected(vm1), true);
    sinon.assert.calledOnce(sessionBroker.isConnected);
  });

  it("should unsubscribe from the bus when disposed", () => {
    tracker.dispose();

    assert.strictEqual(eventBus.handlerCount(SessionEventKind.Started), 0);
    assert.strictEqual(eventBus.handlerCount(SessionEventKind.Ended), 0);
  });
});
