import { MigrationResultAggregator } from '../migration-result';

describe('MigrationResultAggregator', () => {
  let aggregator: MigrationResultAggregator;

  beforeEach(() => {
    aggregator = new MigrationResultAggregator();
    aggregator.record('a', { status: 'updated', fieldCount: 2 });
    aggregator.record('b', { status: 'unchanged' });
    aggregator.record('c', { status: 'failed', reason: 'version_conflict' });
    aggregator.record('d', { status: 'would_update', fieldCount: 1 });
    aggregator.record('e', { status: 'updated', fieldCount: 1 });
  });

  it('should keep ids in recording order per status', () => {
    expect(aggregator.idsWith('updated')).toEqual(['a', 'e']);
    expect(aggregator.idsWith('failed')).toEqual(['c']);
    expect(aggregator.size).toBe(5);
  });

  it('should count outcomes per status', () => {
    expect(aggregator.summary()).toEqual({
      unchanged: 1,
      excluded: 0,
      would_update: 1,
      updated: 2,
      failed: 1,
    });
  });

  it('should list failures with their reason', () => {
    expect(aggregator.failures()).toEqual([{ notificationId: 'c', reason: 'version_conflict' }]);
    expect(aggregator.outcomeOf('c')).toEqual({ status: 'failed', reason: 'version_conflict' });
    expect(aggregator.outcomeOf('missing')).toBeUndefined();
  });

  it('should build both result shapes', () => {
    expect(aggregator.toDryRunResult()).toEqual({ notificationIdsToUpdate: ['d'] });
    expect(aggregator.toCommitResult()).toEqual({
      updatedNotificationIds: ['a', 'e'],
      failedNotificationIds: ['c'],
    });
  });

  it('should keep excluded records out of both result shapes', () => {
    aggregator.record('f', { status: 'excluded', reason: 'malformed_config' });

    expect(aggregator.summary().excluded).toBe(1);
    expect(aggregator.summary().failed).toBe(1);
    expect(aggregator.toDryRunResult()).toEqual({ notificationIdsToUpdate: ['d'] });
    expect(aggregator.toCommitResult().failedNotificationIds).toEqual(['c']);
  });

  it('should refuse a second outcome for the same id', () => {
    expect(() => aggregator.record('a', { status: 'unchanged' })).toThrow(
      'Outcome already recorded for notification a',
    );
  });
});
