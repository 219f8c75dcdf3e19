import { Duplex } from 'stream';
import { errorMessage } from './errors';
import { logger } from './logger';

// Anything with a forced close: http.Agent, SocksProxyAgent, test doubles.
export interface Closeable {
  destroy(): void;
}

interface PhaseGate {
  promise: Promise<void>;
  resolve: () => void;
  settled: boolean;
}

function createGate(): PhaseGate {
  let resolve: () => void = () => {};
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve, settled: false };
}

/**
 * Registry of every live client, socket, timer and worker of one test run,
 * and the single source of truth for whether the run should stop.
 *
 * Contracts:
 *   1. Register at birth. A handle registered after stop is destroyed on the spot.
 *   2. Await at death. Every phase ends with awaitAllWorkers().
 *   3. Teardown is total, immediate and forced (no graceful close).
 *
 * Engines receive the lifecycle by reference; nothing else closes their handles.
 */
export class ResourceLifecycle {
  private userCancelledFlag = false;
  private timedOutFlag = false;

  private clients = new Set<Closeable>();
  private sockets = new Set<Duplex>();
  private timers = new Set<NodeJS.Timeout>();
  private workers = new Set<Promise<void>>();

  private gate: PhaseGate | null = null;

  get userCancelled(): boolean {
    return this.userCancelledFlag;
  }

  get timedOut(): boolean {
    return this.timedOutFlag;
  }

  get shouldStop(): boolean {
    return this.userCancelledFlag || this.timedOutFlag;
  }

  get tracked(): { clients: number; sockets: number; timers: number; workers: number } {
    return {
      clients: this.clients.size,
      sockets: this.sockets.size,
      timers: this.timers.size,
      workers: this.workers.size,
    };
  }

  // Registration checks shouldStop and tracks in one synchronous step, so a
  // teardown sweep can never run between the check and the insert.

  registerClient(client: Closeable): boolean {
    if (this.shouldStop) {
      client.destroy();
      return false;
    }
    this.clients.add(client);
    return true;
  }

  registerSocket(socket: Duplex): boolean {
    if (this.shouldStop) {
      socket.destroy();
      return false;
    }
    // Keep-alive sockets are handed out again for later requests.
    if (this.sockets.has(socket)) return true;
    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));
    return true;
  }

  registerTimer(timer: NodeJS.Timeout): boolean {
    if (this.shouldStop) {
      clearTimeout(timer);
      return false;
    }
    this.timers.add(timer);
    return true;
  }

  // Normal-completion paths. Each handle is closed once, here or by teardown.

  releaseClient(client: Closeable): void {
    if (!this.clients.delete(client)) return;
    client.destroy();
  }

  clearTimer(timer: NodeJS.Timeout): void {
    if (!this.timers.delete(timer)) return;
    clearTimeout(timer);
  }

  /**
   * Runs a tracked unit of work. Its failure is swallowed (forced-close errors
   * are the normal way a worker ends) but its completion is still awaited by
   * awaitAllWorkers().
   */
  launchWorker(body: () => Promise<void>): void {
    const task: Promise<void> = Promise.resolve()
      .then(body)
      .catch(error => {
        if (!this.shouldStop) logger.log(`[Lifecycle] Worker ended with error: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.workers.delete(task);
      });
    this.workers.add(task);
  }

  // Workers launched while waiting are awaited too.
  async awaitAllWorkers(): Promise<void> {
    while (this.workers.size > 0) {
      await Promise.all([...this.workers]);
    }
  }

  reset(): void {
    this.userCancelledFlag = false;
    this.timedOutFlag = false;
    this.clients.clear();
    this.sockets.clear();
    this.timers.clear();
    this.workers.clear();
    this.gate = null;
  }

  // Timeouts are phase-scoped: a new phase clears the previous phase's timeout.
  // A user cancellation is never cleared here.
  beginPhase(): void {
    this.timedOutFlag = false;
    this.gate = createGate();
  }

  completePhase(): void {
    if (this.gate && !this.gate.settled) {
      this.gate.settled = true;
      this.gate.resolve();
    }
  }

  awaitPhaseComplete(): Promise<void> {
    return this.gate ? this.gate.promise : Promise.resolve();
  }

  timeoutPhase(): void {
    if (this.shouldStop) return;
    this.timedOutFlag = true;
    this.teardown();
    this.completePhase();
  }

  // After a timeout the registries are already empty, so the sweep below
  // touches nothing; the flag still records the user's intent.
  cancel(): void {
    if (this.userCancelledFlag) return;
    this.userCancelledFlag = true;
    this.teardown();
    this.completePhase();
  }

  private teardown(): void {
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();

    const sockets = [...this.sockets];
    this.sockets.clear();
    for (const socket of sockets) {
      try {
        socket.destroy();
      } catch (error) {
        logger.log(`[Lifecycle] Socket destroy failed: ${errorMessage(error)}`);
      }
    }

    const clients = [...this.clients];
    this.clients.clear();
    for (const client of clients) {
      try {
        client.destroy();
      } catch (error) {
        logger.log(`[Lifecycle] Client destroy failed: ${errorMessage(error)}`);
      }
    }
  }
}
