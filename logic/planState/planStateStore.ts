/**
 * Plan State Store
 * Holds the latest published plan per entry and pushes it to the entry's sensors
 */
import type { PlannerLogger, PlanResponse, PlanSchedule } from '../plannerApi/types';
import { PublishError } from '../plannerApi/errors';
import { extractErrorMessage } from '../utils/errorUtils';

/**
 * Sensor state of one entry. Replaced as a whole, never mutated.
 */
export interface PlanSnapshot {
  readonly baselineCost: number;
  readonly optimizedCost: number;
  readonly schedule: PlanSchedule;
  readonly updatedAt: number;
}

/**
 * Receives snapshots for display (implemented by the Homey device)
 */
export interface PlanStatePublisher {
  publishPlanState(snapshot: PlanSnapshot): Promise<void>;
}

export class PlanStateStore {
  private readonly snapshots = new Map<string, PlanSnapshot>();
  private readonly publishers = new Map<string, PlanStatePublisher>();
  private readonly publishChains = new Map<string, Promise<void>>();
  private readonly logger: PlannerLogger;

  constructor(logger: PlannerLogger) {
    this.logger = logger;
  }

  attach(entryId: string, publisher: PlanStatePublisher): void {
    this.publishers.set(entryId, publisher);
  }

  /**
   * Forget everything about an entry (device deleted or unloaded)
   */
  detach(entryId: string): void {
    this.publishers.delete(entryId);
    this.snapshots.delete(entryId);
    this.publishChains.delete(entryId);
  }

  get(entryId: string): PlanSnapshot | undefined {
    return this.snapshots.get(entryId);
  }

  /**
   * Replace the entry's state with a new plan in one assignment, then publish it.
   * Publishes for the same entry run one after another; a snapshot that was
   * superseded before its turn is not published.
   * @throws PublishError when the publisher fails; the previous snapshot is restored
   */
  async replace(entryId: string, plan: PlanResponse, now: number = Date.now()): Promise<PlanSnapshot> {
    const snapshot: PlanSnapshot = Object.freeze({
      baselineCost: plan.baselineCost,
      optimizedCost: plan.optimizedCost,
      schedule: plan.schedule,
      updatedAt: now,
    });

    const replaced = this.snapshots.get(entryId);
    this.snapshots.set(entryId, snapshot);

    const previous = this.publishChains.get(entryId) ?? Promise.resolve();
    const publishing = previous.then(async () => {
      const publisher = this.publishers.get(entryId);
      if (!publisher || this.snapshots.get(entryId) !== snapshot) {
        return;
      }
      await publisher.publishPlanState(snapshot);
    });
    // The chain only orders publishes; the failure is handled below
    const settled = publishing.then(() => undefined, () => undefined);
    this.publishChains.set(entryId, settled);

    try {
      await publishing;
    } catch (error: unknown) {
      const errorMessage = extractErrorMessage(error);
      this.logger.error(`[PLAN_STATE] Failed to publish plan for ${entryId}:`, errorMessage);
      if (this.snapshots.get(entryId) === snapshot) {
        if (replaced) {
          this.snapshots.set(entryId, replaced);
        } else {
          this.snapshots.delete(entryId);
        }
      }
      throw new PublishError(`Failed to update battery plan sensors: ${errorMessage}`);
    } finally {
      if (this.publishChains.get(entryId) === settled) {
        this.publishChains.delete(entryId);
      }
    }

    return snapshot;
  }
}
