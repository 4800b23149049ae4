import * as assert from "assert";
import * as sinon from "sinon";
import { Logger } from "../logging";
import { Emitter } from "./emitter";

describe("utils/emitter.ts Emitter", () => {
  let sandbox: sinon.SinonSandbox;
  let emitter: Emitter<string>;

  beforeEach(() => {
    sandbox = sinon.createSandbox();
    emitter = new Emitter<string>();
  });

  afterEach(() => {
    emitter.dispose();
    sandbox.restore();
  });

  it("should deliver fired data to listeners in registration order", () => {
    const received: string[] = [];
    emitter.event((data) => received.push(`first:${data}`));
    emitter.event((data) => received.push(`second:${data}`));

    emitter.fire("a");

    assert.deepStrictEqual(received, ["first:a", "second:a"]);
  });

  it("should stop delivering to a listener once its subscription is disposed", () => {
    const listener = sandbox.stub();
    const subscription = emitter.event(listener);

    emitter.fire("a");
    subscription.dispose();
    emitter.fire("b");

    sinon.assert.calledOnceWithExactly(listener, "a");
    assert.strictEqual(emitter.listenerCount, 0);
  });

  it("should keep calling listeners after one throws", () => {
    const errorSpy = sandbox.stub(Logger.prototype, "error");
    const error = new Error("listener failed");
    const after = sandbox.stub();
    emitter.event(() => {
      throw error;
    });
    emitter.event(after);

    emitter.fire("a");

    sinon.assert.calledOnceWithExactly(after, "a");
    sinon.assert.calledOnceWithExactly(errorSpy, "event listener threw", error);
  });

  it("should drop every listener when disposed", () => {
    const listener = sandbox.stub();
    emitter.event(listener);
    emitter.event(listener);
    assert.strictEqual(emitter.listenerCount, 2);

    emitter.dispose();
    emitter.fire("a");

    assert.strictEqual(emitter.listenerCount, 0);
    sinon.assert.notCalled(listener);
  });
});
