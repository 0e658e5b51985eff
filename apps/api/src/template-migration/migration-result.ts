export type MigrationFailureReason =
  | 'version_conflict'
  | 'not_found'
  | 'malformed_config'
  | 'storage_error'
  | 'unexpected_error';

export type MigrationOutcome =
  | { status: 'unchanged' }
  /** Dry run only: the config cannot be walked, so it is left out */
  | { status: 'excluded'; reason: 'malformed_config' }
  | { status: 'would_update'; fieldCount: number }
  | { status: 'updated'; fieldCount: number }
  | { status: 'failed'; reason: MigrationFailureReason };

export type MigrationStatus = MigrationOutcome['status'];

export interface MigrationDryRunResult {
  notificationIdsToUpdate: string[];
}

export interface MigrationCommitResult {
  updatedNotificationIds: string[];
  failedNotificationIds: string[];
}

export type MigrationSummary = Record<MigrationStatus, number>;

/**
 * Collects one outcome per notification id. Each id lands in exactly one
 * bucket; recording an id twice is a programming error.
 */
export class MigrationResultAggregator {
  private readonly outcomes = new Map<string, MigrationOutcome>();

  record(notificationId: string, outcome: MigrationOutcome): void {
    if (this.outcomes.has(notificationId)) {
      throw new Error(`Outcome already recorded for notification ${notificationId}`);
    }
    this.outcomes.set(notificationId, outcome);
  }

  get size(): number {
    return this.outcomes.size;
  }

  outcomeOf(notificationId: string): MigrationOutcome | undefined {
    return this.outcomes.get(notificationId);
  }

  idsWith(status: MigrationStatus): string[] {
    const ids: string[] = [];
    for (const [id, outcome] of this.outcomes) {
      if (outcome.status === status) ids.push(id);
    }
    return ids;
  }

  failures(): Array<{ notificationId: string; reason: MigrationFailureReason }> {
    const failures: Array<{ notificationId: string; reason: MigrationFailureReason }> = [];
    for (const [notificationId, outcome] of this.outcomes) {
      if (outcome.status === 'failed') {
        failures.push({ notificationId, reason: outcome.reason });
      }
    }
    return failures;
  }

  summary(): MigrationSummary {
    const summary: MigrationSummary = {
      unchanged: 0,
      excluded: 0,
      would_update: 0,
      updated: 0,
      failed: 0,
    };
    for (const outcome of this.outcomes.values()) {
      summary[outcome.status]++;
    }
    return summary;
  }

  toDryRunResult(): MigrationDryRunResult {
    return { notificationIdsToUpdate: this.idsWith('would_update') };
  }

  toCommitResult(): MigrationCommitResult {
    return {
      updatedNotificationIds: this.idsWith('updated'),
      failedNotificationIds: this.idsWith('failed'),
    };
  }
}
