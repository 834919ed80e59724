import type {
  BatchDeleteResult,
  DeleteOutcome,
  DiskSpace,
  DiskUsageRow,
  FileItem,
  ScanProfile,
  ScanProgress,
  Snapshot,
} from '../types.js';
import { ProgressChannel, createLogger, errorMessage } from '../utils/index.js';
import { StateMachine, type AppEvent, type Effect, type ViewState } from './state-machine.js';

const log = createLogger('Session');

export interface SessionServices {
  scan(profile: ScanProfile, progress: ProgressChannel<ScanProgress>): Promise<Snapshot>;
  listDirectory(path: string): Promise<FileItem[]>;
  deleteOne(item: FileItem): Promise<DeleteOutcome>;
  deleteMarked(paths: readonly string[], listing: readonly FileItem[]): Promise<BatchDeleteResult>;
  diskUsage(): Promise<DiskUsageRow[]>;
  diskSpace(): Promise<DiskSpace>;
  confirm(message: string): Promise<boolean>;
}

export interface SessionView {
  render(view: ViewState): void;
}

export interface SessionOptions {
  confirmDeletion?: boolean;
  /** How often buffered scan progress is forwarded to the state machine, in ms. */
  progressInterval?: number;
  progressCapacity?: number;
}

/**
 * Single-threaded event loop around the state machine.
 *
 * Every state change happens inside `post`, one event at a time. Slow work
 * runs in the background and reports back by posting another event.
 */
export class InteractiveSession {
  readonly machine: StateMachine;

  private readonly queue: AppEvent[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly progressInterval: number;
  private readonly progressCapacity: number;
  private processing = false;
  private finished = false;
  private ticker: ReturnType<typeof setInterval> | null = null;
  private resolveRun: (() => void) | null = null;

  constructor(
    private readonly services: SessionServices,
    private readonly view: SessionView,
    options: SessionOptions = {}
  ) {
    this.machine = new StateMachine({ confirmDeletion: options.confirmDeletion });
    this.progressInterval = options.progressInterval ?? 100;
    this.progressCapacity = options.progressCapacity ?? 100;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  /** Draws the first frame and resolves once the user quits. */
  run(): Promise<void> {
    const done = new Promise<void>((resolve) => {
      this.resolveRun = resolve;
    });
    if (this.finished) {
      return Promise.resolve();
    }
    this.view.render(this.machine.view());
    return done;
  }

  post(event: AppEvent): void {
    if (this.finished) return;
    this.queue.push(event);
    if (this.processing) return;

    this.processing = true;
    try {
      let next = this.queue.shift();
      while (next && !this.finished) {
        for (const effect of this.machine.dispatch(next)) {
          this.perform(effect);
        }
        next = this.queue.shift();
      }
    } finally {
      this.processing = false;
    }

    if (!this.finished) {
      this.view.render(this.machine.view());
    }
  }

  /** Resolves once no background work is pending. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  stop(): void {
    if (this.finished) return;
    this.finished = true;
    this.stopTicker();
    this.queue.length = 0;
    this.resolveRun?.();
  }

  private perform(effect: Effect): void {
    switch (effect.type) {
      case 'quit':
        this.stop();
        return;
      case 'scan':
        this.startScan(effect.profile);
        return;
      case 'explore': {
        const { category, path, mode } = effect;
        this.track(
          this.services.listDirectory(path).then(
            (items) => this.post({ type: 'explore-complete', category, path, mode, items }),
            (error: unknown) => this.post({ type: 'explore-failed', category, path, mode, error: errorMessage(error) })
          )
        );
        return;
      }
      case 'confirm':
        this.track(
          this.services.confirm(effect.message).then(
            (accepted) => this.post({ type: 'confirm-result', accepted }),
            (error: unknown) => {
              log(`Confirmation prompt failed: ${errorMessage(error)}`);
              this.post({ type: 'confirm-result', accepted: false });
            }
          )
        );
        return;
      case 'deleteOne': {
        const { request } = effect;
        this.track(
          this.services.deleteOne(request.item).then(
            (outcome) => {
              if (outcome.ok) {
                this.post({ type: 'deletion-complete', request, freed: outcome.freed, deletedPaths: [outcome.path] });
              } else {
                this.post({ type: 'deletion-failed', request, error: outcome.error });
              }
            },
            (error: unknown) => this.post({ type: 'deletion-failed', request, error: errorMessage(error) })
          )
        );
        return;
      }
      case 'deleteMarked': {
        const { request } = effect;
        this.track(
          this.services.deleteMarked(request.paths, request.listing).then(
            (result) => this.post({ type: 'deletion-complete', request, freed: result.freed, deletedPaths: result.deletedPaths }),
            (error: unknown) => this.post({ type: 'deletion-failed', request, error: errorMessage(error) })
          )
        );
        return;
      }
      case 'diskUsage':
        this.track(
          this.services.diskUsage().then(
            (rows) => this.post({ type: 'disk-usage-complete', rows }),
            (error: unknown) => this.post({ type: 'disk-usage-failed', error: errorMessage(error) })
          )
        );
        return;
      case 'diskSpace':
        this.track(
          this.services.diskSpace().then(
            (space) => this.post({ type: 'disk-space', space }),
            // The header simply keeps its previous value
            (error: unknown) => log(`Free space lookup failed: ${errorMessage(error)}`)
          )
        );
        return;
    }
  }

  private startScan(profile: ScanProfile): void {
    const progress = new ProgressChannel<ScanProgress>(this.progressCapacity);
    const flush = () => {
      const updates = progress.drain();
      if (updates.length > 0) {
        this.post({ type: 'scan-progress', updates });
      }
    };

    this.stopTicker();
    this.ticker = setInterval(flush, this.progressInterval);

    this.track(
      this.services.scan(profile, progress).then(
        (snapshot) => {
          this.stopTicker();
          flush();
          if (progress.droppedCount > 0) {
            log(`Dropped ${progress.droppedCount} progress updates`);
          }
          this.post({ type: 'scan-complete', snapshot });
        },
        (error: unknown) => {
          this.stopTicker();
          this.post({ type: 'scan-failed', error: errorMessage(error) });
        }
      )
    );
  }

  private track(work: Promise<void>): void {
    const tracked = work
      .catch((error: unknown) => {
        log(`Background task failed: ${errorMessage(error)}`);
        this.post({ type: 'error', message: errorMessage(error) });
      })
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }

  private stopTicker(): void {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
  }
}
