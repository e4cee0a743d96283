import type { ConnectionSupervisor } from './connection-supervisor.ts';

/** Process-wide view of live connections, used for cross-connection fan-out and shutdown. */
export class ConnectionRegistry {
  private readonly connections = new Map<string, ConnectionSupervisor>();

  public get size(): number {
    return this.connections.size;
  }

  public add(supervisor: ConnectionSupervisor): void {
    this.connections.set(supervisor.id, supervisor);
  }

  public remove(connectionId: string): boolean {
    return this.connections.delete(connectionId);
  }

  public get(connectionId: string): ConnectionSupervisor | undefined {
    return this.connections.get(connectionId);
  }

  public ids(): readonly string[] {
    return [...this.connections.keys()];
  }

  /**
   * Cancels the thread's active turn on every connection and tombstones it there.
   * Resolves once each of those turns has released its thread slot, which happens after its
   * final store write and just before its terminal frame is queued. Returns how many turns
   * were active.
   */
  public async cancelThread(threadId: string, reason: string): Promise<number> {
    const pending: Promise<void>[] = [];
    let cancelled = 0;
    for (const supervisor of this.connections.values()) {
      if (supervisor.multiplexer.activeThreadIds().includes(threadId)) {
        cancelled += 1;
      }
      pending.push(supervisor.multiplexer.forgetThread(threadId, reason));
    }
    await Promise.all(pending);
    return cancelled;
  }

  public async closeAll(reason: string): Promise<void> {
    const supervisors = [...this.connections.values()];
    for (const supervisor of supervisors) {
      supervisor.teardown(reason);
    }
    await Promise.all(supervisors.map((supervisor) => supervisor.closed));
  }
}
