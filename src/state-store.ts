import fs from 'fs';
import path from 'path';
import { errorMessage, type Log } from './instance-logger.js';
import {
  storedStateSchema,
  type PersistedDevice,
  type StoredInstance,
  type StoredState,
} from './scheduler/persisted.js';

export const STATE_FILE_NAME = 'schedule-manager.json';

export interface InstanceState {
  paused: boolean;
  configPaused: boolean;
  devices: Record<string, PersistedDevice>;
}

/**
 * Schedules and pause flags of every instance, kept in one JSON file in the
 * homebridge storage directory
 */
export class StateStore {
  private readonly filePath: string;
  private state: StoredState | null = null;

  constructor(
    storagePath: string,
    private readonly log: Log,
  ) {
    this.filePath = path.join(storagePath, STATE_FILE_NAME);
  }

  get path(): string {
    return this.filePath;
  }

  /**
   * Stored state of one instance; undefined when the instance has never been saved
   */
  loadInstance(name: string): StoredInstance | undefined {
    return this.read().instances[name];
  }

  saveInstance(name: string, instance: InstanceState): void {
    const state = this.read();
    state.instances[name] = instance;
    this.write(state);
  }

  private read(): StoredState {
    if (this.state) {
      return this.state;
    }

    this.state = { version: 1, instances: {} };
    if (!fs.existsSync(this.filePath)) {
      this.log.debug(`No saved schedules at ${this.filePath}`);
      return this.state;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
      const parsed = storedStateSchema.safeParse(raw);
      if (parsed.success) {
        this.state = parsed.data;
      } else {
        const issue = parsed.error.issues[0];
        this.log.error(`Ignoring saved schedules in ${this.filePath}: ${issue?.path.join('.')} ${issue?.message}`);
        this.moveAside();
      }
    } catch (error) {
      this.log.error(`Failed to read saved schedules from ${this.filePath}: ${errorMessage(error)}`);
      this.moveAside();
    }
    return this.state;
  }

  /**
   * Keep an unreadable file as <name>.bad so the next save does not overwrite it
   */
  private moveAside(): void {
    const badPath = `${this.filePath}.bad`;
    try {
      fs.renameSync(this.filePath, badPath);
      this.log.warn(`Saved schedules moved to ${badPath}`);
    } catch (error) {
      this.log.error(`Failed to move ${this.filePath} aside: ${errorMessage(error)}`);
    }
  }

  private write(state: StoredState): void {
    const tempPath = `${this.filePath}.tmp`;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(state, null, 2));
      fs.renameSync(tempPath, this.filePath);
    } catch (error) {
      this.log.error(`Failed to save schedules to ${this.filePath}: ${errorMessage(error)}`);
    }
  }
}
