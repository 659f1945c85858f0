/**
 * Tests for Plan State Store
 */
import { PlanStateStore, type PlanStatePublisher } from '../logic/planState/planStateStore';
import { PublishError } from '../logic/plannerApi/errors';
import type { PlannerLogger, PlanResponse } from '../logic/plannerApi/types';
import { scheduleEntry } from './helpers/fetchMocks';

const flushPromises = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe('PlanStateStore', () => {
  const entryId = 'battery-planner-sys-1';
  const planA: PlanResponse = { baselineCost: 10, optimizedCost: 8, schedule: [scheduleEntry] };
  const planB: PlanResponse = { baselineCost: 20, optimizedCost: 15, schedule: [] };

  let logger: jest.Mocked<PlannerLogger>;
  let publisher: jest.Mocked<PlanStatePublisher>;
  let store: PlanStateStore;

  beforeEach(() => {
    jest.clearAllMocks();
    logger = { log: jest.fn(), error: jest.fn() };
    publisher = { publishPlanState: jest.fn().mockResolvedValue(undefined) };
    store = new PlanStateStore(logger);
    store.attach(entryId, publisher);
  });

  test('replace stores and publishes a complete snapshot', async () => {
    const snapshot = await store.replace(entryId, planA, 1_700_000_000_000);

    expect(snapshot).toEqual({
      baselineCost: 10,
      optimizedCost: 8,
      schedule: [scheduleEntry],
      updatedAt: 1_700_000_000_000,
    });
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(store.get(entryId)).toBe(snapshot);
    expect(publisher.publishPlanState).toHaveBeenCalledWith(snapshot);
  });

  test('entries are isolated from each other', async () => {
    await store.replace(entryId, planA);

    expect(store.get('battery-planner-sys-2')).toBeUndefined();
  });

  test('a superseded snapshot is not published', async () => {
    const first = store.replace(entryId, planA);
    const second = store.replace(entryId, planB);
    await Promise.all([first, second]);

    expect(publisher.publishPlanState).toHaveBeenCalledTimes(1);
    expect(publisher.publishPlanState).toHaveBeenCalledWith(
      expect.objectContaining({ baselineCost: 20, optimizedCost: 15 }),
    );
    expect(store.get(entryId)).toEqual(expect.objectContaining({ baselineCost: 20 }));
  });

  test('publishes for one entry run one after another', async () => {
    let releaseFirst: () => void = () => undefined;
    publisher.publishPlanState
      .mockImplementationOnce(() => new Promise<void>((resolve) => {
        releaseFirst = resolve;
      }))
      .mockResolvedValue(undefined);

    const first = store.replace(entryId, planA);
    await flushPromises();
    const second = store.replace(entryId, planB);
    await flushPromises();

    expect(publisher.publishPlanState).toHaveBeenCalledTimes(1);

    releaseFirst();
    await Promise.all([first, second]);

    expect(publisher.publishPlanState).toHaveBeenCalledTimes(2);
    const published = publisher.publishPlanState.mock.calls.map(([snapshot]) => snapshot.baselineCost);
    expect(published).toEqual([10, 20]);
  });

  test('a failing publisher restores the previous snapshot and rejects', async () => {
    const kept = await store.replace(entryId, planA);
    publisher.publishPlanState.mockRejectedValueOnce(new Error('capability write failed'));

    await expect(store.replace(entryId, planB)).rejects.toThrow(
      new PublishError('Failed to update battery plan sensors: capability write failed'),
    );
    expect(store.get(entryId)).toBe(kept);
    expect(logger.error).toHaveBeenCalledWith(
      `[PLAN_STATE] Failed to publish plan for ${entryId}:`,
      'capability write failed',
    );
  });

  test('a failed first publish leaves no snapshot', async () => {
    publisher.publishPlanState.mockRejectedValueOnce(new Error('capability write failed'));

    await expect(store.replace(entryId, planA)).rejects.toBeInstanceOf(PublishError);
    expect(store.get(entryId)).toBeUndefined();
  });

  test('publishing continues after a failed publish', async () => {
    publisher.publishPlanState.mockRejectedValueOnce(new Error('capability write failed'));
    await expect(store.replace(entryId, planA)).rejects.toBeInstanceOf(PublishError);

    const snapshot = await store.replace(entryId, planB);

    expect(publisher.publishPlanState).toHaveBeenCalledTimes(2);
    expect(publisher.publishPlanState).toHaveBeenLastCalledWith(snapshot);
    expect(store.get(entryId)).toBe(snapshot);
  });

  test('detach forgets the entry', async () => {
    await store.replace(entryId, planA);
    store.detach(entryId);

    expect(store.get(entryId)).toBeUndefined();

    await store.replace(entryId, planB);
    expect(publisher.publishPlanState).toHaveBeenCalledTimes(1);
  });
});
