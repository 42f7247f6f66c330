import { Agent, Dispatcher } from "undici";
import { AppConfig } from "../config";

export interface HttpClient {
  dispatcher: Dispatcher;
  close(): Promise<void>;
}

/**
 * One connection pool for the whole run, injected into every fetch so
 * workers share sockets per origin instead of opening their own.
 */
export function createHttpClient(
  config: Pick<AppConfig, "ignoreHttpsErrors" | "requestTimeoutMs" | "workers">,
): HttpClient {
  const agent = new Agent({
    connections: config.workers,
    connect: {
      timeout: config.requestTimeoutMs,
      rejectUnauthorized: !config.ignoreHttpsErrors,
    },
    headersTimeout: config.requestTimeoutMs,
    bodyTimeout: config.requestTimeoutMs,
  });

  return {
    dispatcher: agent,
    close: () => agent.close(),
  };
}
