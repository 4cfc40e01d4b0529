import type { Logger } from "../logging.js";
import { silentLogger } from "../logging.js";
import type { Timer } from "../types.js";

/** Durable home of timer records. Only cancel and the finish coordinator write status. */
export interface TimerRecordStore {
  insert(timer: Timer): Promise<Timer>;
  findById(id: string): Promise<Timer | undefined>;
  listByOwner(owner: string): Promise<Timer[]>;
  save(timer: Timer): Promise<Timer>;
}

interface TimerStoreOptions {
  initialTimers?: Timer[];
  onChange?: (timers: Timer[]) => void | Promise<void>;
  logger?: Logger;
}

export class TimerStore implements TimerRecordStore {
  private readonly timers = new Map<string, Timer>();
  private readonly onChange?: (timers: Timer[]) => void | Promise<void>;
  private readonly logger: Logger;
  private pendingPersist: Promise<void> = Promise.resolve();
  private lastPersistError: Error | null = null;

  constructor(options: TimerStoreOptions = {}) {
    this.onChange = options.onChange;
    this.logger = options.logger ?? silentLogger;

    for (const timer of options.initialTimers ?? []) {
      this.timers.set(timer.id, { ...timer });
    }
  }

  async insert(timer: Timer): Promise<Timer> {
    if (this.timers.has(timer.id)) {
      throw new Error(`Timer ${timer.id} already exists.`);
    }
    this.timers.set(timer.id, { ...timer });
    this.emitChange();
    await this.waitForPersistence();
    return { ...timer };
  }

  async findById(id: string): Promise<Timer | undefined> {
    const timer = this.timers.get(id);
    return timer ? { ...timer } : undefined;
  }

  async listByOwner(owner: string): Promise<Timer[]> {
    return this.getAll()
      .filter(timer => timer.owner === owner)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async save(timer: Timer): Promise<Timer> {
    if (!this.timers.has(timer.id)) {
      throw new Error(`Timer ${timer.id} does not exist.`);
    }
    this.timers.set(timer.id, { ...timer });
    this.emitChange();
    await this.waitForPersistence();
    return { ...timer };
  }

  getAll(): Timer[] {
    return [...this.timers.values()].map(timer => ({ ...timer }));
  }

  async waitForPersistence(): Promise<void> {
    try {
      await this.pendingPersist;
    } catch (error) {
      if (!this.lastPersistError && error instanceof Error) {
        this.lastPersistError = error;
      }
    }

    if (this.lastPersistError) {
      const error = this.lastPersistError;
      this.lastPersistError = null;
      throw error;
    }
  }

  private emitChange(): void {
    if (!this.onChange) {
      return;
    }

    const snapshot = this.getAll();
    this.lastPersistError = null;
    const result = Promise.resolve().then(() => this.onChange?.(snapshot));
    this.pendingPersist = result.catch(error => {
      this.lastPersistError = error instanceof Error ? error : new Error(String(error));
      this.logger.error("Timer persistence failed", { error: this.lastPersistError });
      throw this.lastPersistError;
    });
  }
}
