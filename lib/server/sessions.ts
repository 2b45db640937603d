import { createGenerationServiceFromEnv } from "../ai";
import { SessionStore, type PipelineDeps } from "../expenses";
import { getServerEnv } from "./env";

declare global {
  // eslint-disable-next-line no-var
  var expenseSessions: SessionStore | undefined;
}

// One store per process, kept on `global` so dev module reloads reuse it too.
export function getSessionStore(): SessionStore {
  return (global.expenseSessions ??= new SessionStore({ idleTtlMs: getServerEnv().SESSION_IDLE_TTL_MS }));
}

export function getPipelineDeps(): PipelineDeps {
  const env = getServerEnv();
  return {
    service: createGenerationServiceFromEnv(env),
    concurrency: env.CLASSIFY_CONCURRENCY,
    groupErrors: env.GROUP_ERROR_CATEGORIES,
  };
}
