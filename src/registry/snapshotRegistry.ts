import { logger } from "../utils/logger";

const registryLogger = logger.child({ component: "registry" });

export type RegistryListener = () => void;

/**
 * Copy-on-write keyed store. Every change swaps in a new immutable map, so a
 * reader holding a snapshot never observes a half-applied registration.
 */
export abstract class SnapshotRegistry<Entry> {
  private current: ReadonlyMap<string, Entry> = new Map();
  private listeners = new Set<RegistryListener>();

  protected abstract readonly kind: string;

  /** The map in effect right now. Hold on to it for a consistent view. */
  snapshot(): ReadonlyMap<string, Entry> {
    return this.current;
  }

  get size(): number {
    return this.current.size;
  }

  has(key: string): boolean {
    return this.current.has(key);
  }

  /**
   * Called after every successful change.
   * @returns A function that removes the listener
   */
  onChange(listener: RegistryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  protected insert(key: string, entry: Entry): void {
    if (this.current.has(key)) {
      throw new Error(`${this.kind} '${key}' is already registered`);
    }
    const next = new Map(this.current);
    next.set(key, entry);
    this.current = next;
    registryLogger.debug(`Registered ${this.kind}`, { key });
    this.emitChange();
  }

  protected delete(key: string): boolean {
    if (!this.current.has(key)) {
      return false;
    }
    const next = new Map(this.current);
    next.delete(key);
    this.current = next;
    registryLogger.debug(`Unregistered ${this.kind}`, { key });
    this.emitChange();
    return true;
  }

  private emitChange(): void {
    for (const listener of this.listeners) {
      try {
        listener();
      } catch (error) {
        registryLogger.error(`${this.kind} change listener failed`, error);
      }
    }
  }
}
