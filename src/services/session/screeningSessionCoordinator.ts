import { randomUUID } from 'crypto';
import {
  CriterionId,
  ProgressListener,
  ScreeningProgress,
  ScreeningReport,
  SessionProgressView,
  SessionStatus,
} from '../../domain/contracts';
import { describeError } from '../../domain/errors';
import { componentLogger, Logger } from '../../logging/logger';
import { resolveCriteria } from '../screening/criteria';

export type ScreeningRunner = (criteria: CriterionId[], onProgress: ProgressListener) => Promise<ScreeningReport>;

export interface ScreeningSessionCoordinatorConfig {
  runner: ScreeningRunner;
  createId?: () => string;
  logger?: Logger;
}

interface SessionRecord {
  id: string;
  criteria: CriterionId[];
  status: SessionStatus;
  progress: ScreeningProgress;
  result: ScreeningReport | null;
  error: string | null;
  settled: Promise<void>;
}

const MAX_TRACKED_SESSIONS = 10;

const INITIAL_PROGRESS: ScreeningProgress = { message: 'Initialising...', stage: 'init', remaining: 0 };

/**
 * Tracks screening runs. Starting a run makes it current and marks the previous
 * one superseded; the old run keeps going, but every progress, result or error
 * write it makes afterwards is dropped.
 *
 * Each write compares the writer's session id with the current id and updates
 * the record in the same synchronous block, so no other write can land between
 * the check and the update.
 */
export class ScreeningSessionCoordinator {
  private readonly sessions = new Map<string, SessionRecord>();
  private currentId: string | null = null;
  private readonly logger: Logger;
  private readonly createId: () => string;

  constructor(private readonly config: ScreeningSessionCoordinatorConfig) {
    this.logger = componentLogger(config.logger, 'session');
    this.createId = config.createId ?? (() => randomUUID().split('-')[0]);
  }

  startSession(selection?: Iterable<number>): string {
    const criteria = resolveCriteria(selection);
    const id = this.createId();

    const previous = this.current();
    if (previous && previous.status === 'running') {
      previous.status = 'superseded';
      this.logger.info({ sessionId: previous.id, supersededBy: id }, 'session superseded');
    }

    const record: SessionRecord = {
      id,
      criteria,
      status: 'running',
      progress: { ...INITIAL_PROGRESS },
      result: null,
      error: null,
      settled: Promise.resolve(),
    };
    this.sessions.set(id, record);
    this.currentId = id;
    this.forgetOldSessions();
    this.logger.info({ sessionId: id, criteria }, 'session started');

    record.settled = this.execute(record);
    return id;
  }

  getProgress(): SessionProgressView {
    const record = this.current();
    if (!record) {
      return {
        sessionId: null,
        status: 'idle',
        running: false,
        stage: '',
        message: '',
        remaining: 0,
        error: null,
      };
    }
    return {
      sessionId: record.id,
      status: record.status,
      running: record.status === 'running',
      stage: record.progress.stage,
      message: record.progress.message,
      remaining: record.progress.remaining,
      error: record.error,
    };
  }

  /** The finished report, or null while running, after failure, or for unknown ids. */
  getResult(sessionId: string): ScreeningReport | null {
    return this.sessions.get(sessionId)?.result ?? null;
  }

  getStatus(sessionId: string): SessionStatus | null {
    return this.sessions.get(sessionId)?.status ?? null;
  }

  currentSessionId(): string | null {
    return this.currentId;
  }

  /** Resolves when the session's run has finished, whatever its outcome. */
  whenSettled(sessionId: string): Promise<void> {
    return this.sessions.get(sessionId)?.settled ?? Promise.resolve();
  }

  private async execute(record: SessionRecord): Promise<void> {
    const onProgress: ProgressListener = (progress) => {
      this.writeIfCurrent(record, () => {
        record.progress = progress;
      });
    };

    try {
      const report = await this.config.runner(record.criteria, onProgress);
      const accepted = this.writeIfCurrent(record, () => {
        record.result = report;
        record.status = 'completed';
      });
      if (accepted) {
        this.logger.info({ sessionId: record.id, finalCount: report.finalCount }, 'session completed');
      } else {
        this.logger.info({ sessionId: record.id }, 'discarding result of superseded session');
      }
    } catch (error) {
      const message = describeError(error);
      const accepted = this.writeIfCurrent(record, () => {
        record.error = message;
        record.status = 'failed';
      });
      this.logger.error({ sessionId: record.id, err: message, current: accepted }, 'session failed');
    }
  }

  private writeIfCurrent(record: SessionRecord, write: () => void): boolean {
    if (this.currentId !== record.id) {
      return false;
    }
    write();
    return true;
  }

  private forgetOldSessions(): void {
    for (const id of this.sessions.keys()) {
      if (this.sessions.size <= MAX_TRACKED_SESSIONS) {
        break;
      }
      this.sessions.delete(id);
    }
  }

  private current(): SessionRecord | null {
    return this.currentId ? this.sessions.get(this.currentId) ?? null : null;
  }
}
