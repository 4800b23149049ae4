import * as assert from "assert";
import * as sinon from "sinon";
import { TEST_PROJECT_ID } from "../../tests/unit/testResources";
import { flushPromises } from "../../tests/unit/testUtils";
import { Logger } from "../logging";
import { InstanceLocator } from "../models/locators";
import { InProcessEventBus } from "./eventBus";
import { SessionEndedEvent, SessionEventKind, SessionStartedEvent } from "./sessionEvents";

describe("events/eventBus.ts InProcessEventBus", () => {
  const instance = InstanceLocator.create({
    projectId: TEST_PROJECT_ID,
    zone: "zone-1",
    name: "instance-1",
  });

  let sandbox: sinon.SinonSandbox;
  let eventBus: InProcessEventBus;

  beforeEach(() => {
    sandbox = sinon.createSandbox();
    eventBus = new InProcessEventBus();
  });

  afterEach(() => {
    sandbox.restore();
  });

  it("should deliver events only to handlers of their kind", async () => {
    const startedHandler = sandbox.stub();
    const endedHandler = sandbox.stub();
    eventBus.subscribe(SessionEventKind.Started, startedHandler);
    eventBus.subscribe(SessionEventKind.Ended, endedHandler);
    const event = new SessionStartedEvent(instance);

    await eventBus.publish(event);

    sinon.assert.calledOnceWithExactly(startedHandler, event);
    sinon.assert.notCalled(endedHandler);
  });

  it("should stop delivering once the subscription is disposed", async () => {
    const handler = sandbox.stub();
    const subscription = eventBus.subscribe(SessionEventKind.Ended, handler);
    assert.strictEqual(eventBus.handlerCount(SessionEventKind.Ended), 1);

    subscription.dispose();
    await eventBus.publish(new SessionEndedEvent(instance));

    sinon.assert.notCalled(handler);
    assert.strictEqual(eventBus.handlerCount(SessionEventKind.Ended), 0);
  });

  it("should log a rejection from an async handler", async () => {
    const errorStub = sandbox.stub(Logger.prototype, "error");
    eventBus.subscribe(SessionEventKind.Started, async () => {
      throw new Error("boom");
    });

    await eventBus.publish(new SessionStartedEvent(instance));
    await flushPromises();

    sinon.assert.calledOnceWithExactly(
      errorStub,
      "Error delivering sessionStarted event to handler: Error: boom",
    );
  });
});
