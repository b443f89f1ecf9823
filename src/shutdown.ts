/**
 * Ordered teardown of the running services.
 */

interface Stoppable {
  stop(): Promise<void>;
}

export interface ShutdownTargets {
  listener: Stoppable;
  broadcaster: Stoppable;
  webSocketApi: Stoppable;
  apiServer: Stoppable;
  pool: { end(): Promise<void> };
}

/**
 * The broadcaster is marked stopped before anything is awaited: closing the
 * upstream connection can take a network round trip, and nothing may be
 * delivered once shutdown has begun.
 */
export async function shutdownServices(targets: ShutdownTargets): Promise<void> {
  const broadcastStopped = targets.broadcaster.stop();
  await targets.listener.stop();
  await broadcastStopped;
  await targets.webSocketApi.stop();
  await targets.apiServer.stop();
  await targets.pool.end();
}
