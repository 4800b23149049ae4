import type { InstanceLocator } from "../models/locators";

export enum SessionEventKind {
  Started = "sessionStarted",
  Ended = "sessionEnded",
}

/** A remote session (RDP, SSH) to an instance was established. */
export class SessionStartedEvent {
  readonly kind = SessionEventKind.Started;
  constructor(readonly instance: InstanceLocator) {}
}

/** A remote session to an instance was closed or lost. */
export class SessionEndedEvent {
  readonly kind = SessionEventKind.Ended;
  constructor(readonly instance: InstanceLocator) {}
}

export type SessionEvent = SessionStartedEvent | SessionEndedEvent;

/** The event class delivered for a given kind. */
export type SessionEventOfKind<K extends SessionEventKind> = Extract<SessionEvent, { kind: K }>;
