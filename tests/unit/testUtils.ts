import type { CollectionResetEvent, ReadonlyNodeCollection } from "../../src/models/nodeCollection";
import type { Disposable } from "../../src/utils/disposables";

/** A promise plus the functions settling it, for holding a stubbed call open. */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: Error): void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Record every reset published by a collection until the returned handle is disposed. */
export function recordResets<T>(
  collection: ReadonlyNodeCollection<T>,
): { events: CollectionResetEvent[] } & Disposable {
  const events: CollectionResetEvent[] = [];
  const subscription = collection.onDidReset((event) => events.push(event));
  return { events, dispose: () => subscription.dispose() };
}

/** Let already-settled promise callbacks run. */
export async function flushPromises(): Promise<void> {
  await new Promise<void>((resolve) => setImmediate(resolve));
}
