import {
  type EventHint,
  NodeClient,
  Scope,
  defaultStackParser,
  getDefaultIntegrations,
  makeNodeTransport,
  rewriteFramesIntegration,
} from "@sentry/node";
import type { ExplorerConfig } from "../configs";
import { Logger } from "../logging";

const logger = new Logger("sentry");
let sentryScope: Scope | null = null;
let sentryClient: NodeClient | null = null;
const throttledEvents: Record<string, boolean> = {};

/** Returns the Sentry Scope singleton, creating it if it doesn't exist */
export function getSentryScope(): Scope {
  if (!sentryScope) {
    logger.debug("Creating new Sentry scope");
    sentryScope = new Scope();
  }
  return sentryScope;
}

/**
 * Initialize Sentry for error tracking, if a DSN is configured. The client is set up manually on
 * a private scope to avoid polluting the global one of a host application.
 * @see https://docs.sentry.io/platforms/javascript/best-practices/shared-environments/#shared-environment-setup
 * @returns whether a client is active after the call
 */
export function initSentry(
  config: Pick<ExplorerConfig, "sentryDsn" | "sentryEnvironment" | "sentryRelease">,
): boolean {
  if (sentryClient) {
    logger.debug("Sentry already initialized");
    return true;
  }
  if (!config.sentryDsn) {
    logger.debug("No Sentry DSN configured, error reporting disabled");
    return false;
  }
  // filter out integrations that use the global variable
  const integrations = getDefaultIntegrations({}).filter((defaultIntegration) => {
    return ![
      "Breadcrumbs",
      "OnUnhandledRejection",
      "OnUncaughtException",
      "CaptureConsole",
    ].includes(defaultIntegration.name);
  });

  sentryClient = new NodeClient({
    dsn: config.sentryDsn,
    environment: config.sentryEnvironment,
    release: config.sentryRelease,
    integrations: [...integrations, rewriteFramesIntegration()],
    tracesSampleRate: 0,
    sampleRate: 1.0,
    attachStacktrace: true,
    transport: makeNodeTransport,
    stackParser: defaultStackParser,
    ignoreErrors: ["CancelledOperationError"],
    beforeSend: (event, hint) => {
      const original = hint.originalException;
      const msg = event.message || (original instanceof Error ? original.message : undefined);
      // if message is undefined we will always send the event
      if (msg) {
        if (msg in throttledEvents) {
          // do not send event if we already sent same msg in the last 1 minute
          logger.debug("Rate limiting activated for", msg);
          return null;
        }
        throttledEvents[msg] = true;
        setTimeout(() => {
          delete throttledEvents[msg];
        }, 60000).unref();
      }
      return event;
    },
  });

  const scope = getSentryScope();
  scope.setClient(sentryClient);
  scope.setTag("pid", process.pid);

  sentryClient.init();
  return true;
}

/** Is a Sentry client active? */
export function isSentryEnabled(): boolean {
  return getSentryScope().getClient() !== undefined;
}

export function sentryCaptureException(ex: unknown, hint?: EventHint): unknown {
  const scope = getSentryScope();
  if (!scope.getClient()) {
    logger.debug("No Sentry client available, not sending exception");
    return ex;
  }

  logger.debug("Sending exception to Sentry", { hint });
  scope.captureException(ex, hint);
  return ex;
}

export async function closeSentryClient(): Promise<void> {
  await getSentryScope().getClient()?.close(2000);
  sentryClient = null;
}
