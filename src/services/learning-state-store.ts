import * as fs from 'fs';
import * as path from 'path';
import { DateTime } from 'luxon';
import { LearningState } from '../types';
import { Logger } from '../util/logger';
import { errorMessage, PersistenceError } from '../util/error-handler';
import {
  createDefaultLearningState,
  decodeLearningState,
  LEARNING_STATE_SCHEMA,
  LEARNING_STATE_VERSION
} from './learning-state-codec';

export interface LearningStateStoreOptions {
  filePath: string;
  backupDir: string;
}

export interface BackupInfo {
  name: string;
  path: string;
  createdAt: string;
  sizeBytes: number;
}

export type LoadSource = 'stored' | 'cold-start';

const BACKUP_PREFIX = 'learning-state-';

/**
 * LearningStateStore Service
 *
 * Keeps the single persisted LearningState record on disk. Saves write a
 * temporary file, flush it and rename it over the live file, so a crash
 * leaves either the old or the new state, never a mix of both.
 */
export class LearningStateStore {
  private lastLoadSource: LoadSource = 'cold-start';

  constructor(
    private readonly options: LearningStateStoreOptions,
    private readonly logger: Logger
  ) {}

  get filePath(): string {
    return this.options.filePath;
  }

  getLastLoadSource(): LoadSource {
    return this.lastLoadSource;
  }

  /**
   * Load the committed state. A missing or unreadable file yields the
   * documented defaults (cold start); it never throws.
   */
  load(): LearningState {
    const file = this.options.filePath;
    this.discardTempFile();

    if (!fs.existsSync(file)) {
      this.logger.log(`No learning state at ${file}; cold start with default parameters`);
      this.lastLoadSource = 'cold-start';
      return createDefaultLearningState();
    }

    try {
      const state = this.readStateFile(file);
      this.lastLoadSource = 'stored';
      this.logger.log(`Warm start: loaded learning state (${state.cycleCount} cycles, confidence ${state.parameters.learningConfidence.toFixed(2)})`);
      return state;
    } catch (error) {
      this.logger.error(`Learning state at ${file} is unreadable; cold start with default parameters`, error);
      this.lastLoadSource = 'cold-start';
      return createDefaultLearningState();
    }
  }

  /**
   * @throws PersistenceError when the state could not be committed
   */
  save(state: LearningState): void {
    const file = this.options.filePath;
    const tempFile = `${file}.tmp`;
    const record: LearningState = { ...state, schema: LEARNING_STATE_SCHEMA, version: LEARNING_STATE_VERSION };

    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      const fd = fs.openSync(tempFile, 'w');
      try {
        fs.writeSync(fd, JSON.stringify(record, null, 2));
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tempFile, file);
      this.logger.debug(`Learning state saved (cycle ${state.cycleCount})`);
    } catch (error) {
      throw new PersistenceError(`Failed to save learning state: ${errorMessage(error)}`, error, { file });
    }
  }

  /**
   * Copy the committed state into the backup directory.
   *
   * @returns the backup file name
   */
  backup(label?: string): string {
    const file = this.options.filePath;
    if (!fs.existsSync(file)) {
      throw new PersistenceError('No committed learning state to back up', undefined, { file });
    }

    const stamp = DateTime.utc().toFormat("yyyyLLdd'T'HHmmssSSS");
    const suffix = label ? `-${label.replace(/[^A-Za-z0-9_-]/g, '_')}` : '';
    const name = `${BACKUP_PREFIX}${stamp}${suffix}.json`;

    try {
      fs.mkdirSync(this.options.backupDir, { recursive: true });
      fs.copyFileSync(file, path.join(this.options.backupDir, name));
    } catch (error) {
      throw new PersistenceError(`Failed to back up learning state: ${errorMessage(error)}`, error, { file });
    }
    this.logger.log(`Learning state backed up as ${name}`);
    return name;
  }

  /** Backups, newest first */
  listBackups(): BackupInfo[] {
    const dir = this.options.backupDir;
    if (!fs.existsSync(dir)) {
      return [];
    }
    return fs.readdirSync(dir)
      .filter(name => name.startsWith(BACKUP_PREFIX) && name.endsWith('.json'))
      .sort()
      .reverse()
      .map(name => {
        const fullPath = path.join(dir, name);
        const stat = fs.statSync(fullPath);
        return {
          name,
          path: fullPath,
          createdAt: stat.mtime.toISOString(),
          sizeBytes: stat.size
        };
      });
  }

  /**
   * Validate a backup and commit it as the live state.
   */
  restore(name: string): LearningState {
    if (path.basename(name) !== name) {
      throw new PersistenceError(`Invalid backup name: ${name}`);
    }
    const source = path.join(this.options.backupDir, name);
    if (!fs.existsSync(source)) {
      throw new PersistenceError(`Backup not found: ${name}`, undefined, { source });
    }

    let state: LearningState;
    try {
      state = this.readStateFile(source);
    } catch (error) {
      throw new PersistenceError(`Backup ${name} is not a valid learning state: ${errorMessage(error)}`, error);
    }

    this.save(state);
    this.logger.log(`Learning state restored from ${name}`);
    return state;
  }

  private readStateFile(file: string): LearningState {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    return decodeLearningState(parsed);
  }

  /** A leftover temp file is an interrupted save; the live file is still the committed one */
  private discardTempFile(): void {
    const tempFile = `${this.options.filePath}.tmp`;
    if (!fs.existsSync(tempFile)) {
      return;
    }
    try {
      fs.unlinkSync(tempFile);
      this.logger.warn('Discarded incomplete learning state write', { file: tempFile });
    } catch (error) {
      this.logger.warn(`Could not remove ${tempFile}: ${errorMessage(error)}`);
    }
  }
}
