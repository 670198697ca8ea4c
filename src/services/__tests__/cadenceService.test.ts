import { afterEach, describe, expect, it, vi } from 'vitest';
import { createTestEngine, seedProspect, TEST_NOW } from '../../test/fixtures';
import { addBusinessDays, getCadenceMode } from '../cadenceSchedule';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('cadence schedule', () => {
  it('selects the mode by population', () => {
    expect(getCadenceMode('unengaged')).toBe('system');
    expect(getCadenceMode('broken')).toBe('system');
    expect(getCadenceMode('parked')).toBe('system');
    expect(getCadenceMode('engaged')).toBe('prospect');
    expect(getCadenceMode('dead_dnc')).toBe('none');
    expect(getCadenceMode('lost')).toBe('none');
    expect(getCadenceMode('closed_won')).toBe('none');
    expect(getCadenceMode('partnership')).toBe('none');
  });

  it('clamps attempt numbers to the interval table', () => {
    const { engine } = createTestEngine();

    expect(engine.cadence.getInterval(1)).toEqual({ attempt: 1, minDays: 3, maxDays: 5, channel: 'call' });
    expect(engine.cadence.getInterval(0).attempt).toBe(1);
    expect(engine.cadence.getInterval(9)).toEqual({ attempt: 5, minDays: 14, maxDays: 21, channel: 'combo' });
  });

  it('skips weekends', () => {
    expect(addBusinessDays(new Date(2024, 2, 8), 1)).toEqual(new Date(2024, 2, 11));
  });

  it('counts from today when nothing has been attempted', () => {
    const { engine } = createTestEngine();

    expect(engine.cadence.calculateNextContact(0, null)).toEqual(new Date(2024, 2, 11));
  });

  it('counts from the last attempt using its interval', () => {
    const { engine } = createTestEngine();

    // Friday 8 March + 5 business days
    expect(engine.cadence.calculateNextContact(2, new Date(2024, 2, 8, 15, 0))).toEqual(new Date(2024, 2, 15));
    // Wednesday 6 March + 7 business days
    expect(engine.cadence.calculateNextContact(3, new Date(2024, 2, 6, 11, 0))).toEqual(new Date(2024, 2, 15));
  });

  it('uses the configured table', () => {
    const { engine } = createTestEngine({
      cadenceIntervals: [{ attempt: 1, minDays: 1, maxDays: 2, channel: 'email' }],
    });

    expect(engine.cadence.calculateNextContact(0, null)).toEqual(new Date(2024, 2, 7));
  });
});

describe('CadenceService.setFollowUp', () => {
  it('rejects a missing or invalid date', async () => {
    const { store, engine } = createTestEngine();
    const prospect = seedProspect(store, { population: 'unengaged' });

    const missing = await engine.cadence.setFollowUp(prospect.id, undefined, 'Call back');
    const invalid = await engine.cadence.setFollowUp(prospect.id, new Date('not a date'), 'Call back');

    for (const result of [missing, invalid]) {
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('ValidationError');
        expect(result.error.message).toBe(`A valid follow-up date is required for prospect ${prospect.id}`);
      }
    }
  });

  it('sets the date and writes one reminder', async () => {
    const { store, engine } = createTestEngine();
    const when = new Date(2024, 2, 20, 14, 0);
    const prospect = seedProspect(store, {
      population: 'engaged',
      engagementStage: 'post_demo',
      followUpDate: new Date(2024, 2, 8),
    });

    const result = await engine.cadence.setFollowUp(prospect.id, when, 'Wants pricing after board meeting');

    expect(result.ok && result.value.followUpDate).toEqual(when);
    expect(store.activities).toHaveLength(1);
    expect(store.activities[0]).toMatchObject({
      activityType: 'reminder',
      followUpSet: when,
      notes: 'Wants pricing after board meeting',
      createdBy: 'user',
    });
  });

  it('never schedules a DNC prospect', async () => {
    const { store, engine } = createTestEngine();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const prospect = seedProspect(store, { population: 'dead_dnc', deadReason: 'dnc' });

    const result = await engine.cadence.setFollowUp(prospect.id, new Date(2024, 2, 20), 'Try again');

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('DncViolation');
    expect((await store.getProspect(prospect.id))?.followUpDate).toBeNull();
    expect(store.activities).toEqual([]);
  });

  it('refuses to schedule prospects that have left the cadence', async () => {
    const { store, engine } = createTestEngine();
    const won = seedProspect(store, { population: 'closed_won', closeDate: new Date(2024, 2, 1) });
    const lost = seedProspect(store, { population: 'lost', lostDate: new Date(2024, 1, 1) });
    const partner = seedProspect(store, { population: 'partnership' });

    for (const prospect of [won, lost, partner]) {
      const result = await engine.cadence.setFollowUp(prospect.id, new Date(2024, 2, 8), 'Check in');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('ValidationError');
        expect(result.error.message).toBe(
          `Prospect ${prospect.id} is ${prospect.population}; follow-ups are only kept for scheduled populations`
        );
      }
      expect((await store.getProspect(prospect.id))?.followUpDate).toBeNull();
    }
    expect(store.activities).toEqual([]);
  });
});

describe('CadenceService.logAttempt', () => {
  it('reschedules system-paced prospects from the attempt', async () => {
    const { store, engine } = createTestEngine();
    const prospect = seedProspect(store, { population: 'unengaged', followUpDate: new Date(2024, 2, 6) });

    const result = await engine.cadence.logAttempt(prospect.id, { activityType: 'call', outcome: 'no_answer' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.attemptCount).toBe(1);
    expect(result.value.lastContactDate).toEqual(TEST_NOW);
    expect(result.value.followUpDate).toEqual(new Date(2024, 2, 11));
    expect(store.activities[0]).toMatchObject({
      activityType: 'call',
      outcome: 'no_answer',
      followUpSet: new Date(2024, 2, 11),
    });
  });

  it('leaves prospect-paced dates alone', async () => {
    const { store, engine } = createTestEngine();
    const agreed = new Date(2024, 2, 20);
    const prospect = seedProspect(store, {
      population: 'engaged',
      engagementStage: 'demo_scheduled',
      followUpDate: agreed,
      attemptCount: 4,
    });

    const result = await engine.cadence.logAttempt(prospect.id, { activityType: 'email_sent', notes: 'Sent deck' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.attemptCount).toBe(5);
    expect(result.value.followUpDate).toEqual(agreed);
    expect(store.activities[0]).toMatchObject({ activityType: 'email_sent', followUpSet: null, notes: 'Sent deck' });
  });

  it('keeps parked prospects waiting for their month', async () => {
    const { store, engine } = createTestEngine();
    const prospect = seedProspect(store, { population: 'parked', parkedMonth: '2024-06' });

    const result = await engine.cadence.logAttempt(prospect.id, { activityType: 'email_received' });

    expect(result.ok && result.value.followUpDate).toBeNull();
  });

  it('refuses to log contact with a DNC prospect', async () => {
    const { store, engine } = createTestEngine();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const prospect = seedProspect(store, { population: 'dead_dnc', deadReason: 'dnc', attemptCount: 2 });

    const result = await engine.cadence.logAttempt(prospect.id, { activityType: 'call' });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('DncViolation');
    expect((await store.getProspect(prospect.id))?.attemptCount).toBe(2);
  });
});

describe('CadenceService queues', () => {
  it('lists overdue follow-ups, most overdue first', async () => {
    const { store, engine } = createTestEngine();
    const engaged = seedProspect(store, {
      population: 'engaged',
      engagementStage: 'pre_demo',
      followUpDate: new Date(2024, 2, 4),
    });
    const unengaged = seedProspect(store, { population: 'unengaged', followUpDate: new Date(2024, 2, 1) });
    seedProspect(store, { population: 'unengaged', followUpDate: new Date(2024, 2, 10) });
    seedProspect(store, { population: 'lost', followUpDate: new Date(2024, 1, 1) });
    seedProspect(store, { population: 'partnership', followUpDate: new Date(2024, 1, 2) });
    seedProspect(store, { population: 'dead_dnc', followUpDate: new Date(2024, 1, 3) });

    const overdue = await engine.cadence.getOverdue();

    expect(overdue.map((prospect) => prospect.id)).toEqual([unengaged.id, engaged.id]);
  });

  it('keeps follow-ups due today out of the overdue list', async () => {
    const { store, engine } = createTestEngine();
    const midnight = seedProspect(store, { population: 'unengaged', followUpDate: new Date(2024, 2, 6) });
    const morning = seedProspect(store, { population: 'unengaged', followUpDate: new Date(2024, 2, 6, 9, 0) });
    const yesterday = seedProspect(store, { population: 'unengaged', followUpDate: new Date(2024, 2, 5, 23, 0) });

    const overdue = await engine.cadence.getOverdue();
    const dueToday = await engine.cadence.getDueOn(TEST_NOW);

    expect(overdue.map((prospect) => prospect.id)).toEqual([yesterday.id]);
    expect(dueToday.map((prospect) => prospect.id)).toEqual([midnight.id, morning.id]);
  });

  it('lists follow-ups due on a day', async () => {
    const { store, engine } = createTestEngine();
    const late = seedProspect(store, { population: 'unengaged', followUpDate: new Date(2024, 2, 11, 9, 0) });
    const early = seedProspect(store, { population: 'unengaged', followUpDate: new Date(2024, 2, 11) });
    seedProspect(store, { population: 'unengaged', followUpDate: new Date(2024, 2, 12) });

    const due = await engine.cadence.getDueOn(new Date(2024, 2, 11, 16, 30));

    expect(due.map((prospect) => prospect.id)).toEqual([early.id, late.id]);
  });

  it('reports orphaned engaged prospects as a defect', async () => {
    const { store, engine } = createTestEngine();
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const orphan = seedProspect(store, { population: 'engaged', engagementStage: 'pre_demo', followUpDate: null });

    const orphans = await engine.cadence.getOrphanedEngaged();

    expect(orphans.map((prospect) => prospect.id)).toEqual([orphan.id]);
    expect(errorSpy).toHaveBeenCalledWith(
      `[CADENCE] Engaged prospects without a follow-up date {"count":1,"prospectIds":["${orphan.id}"]}`
    );
  });
});

describe('CadenceService.reactivateDueParked', () => {
  it('returns parked prospects to the system cadence once their month arrives', async () => {
    const { store, engine } = createTestEngine();
    const january = seedProspect(store, { population: 'parked', parkedMonth: '2024-01' });
    const march = seedProspect(store, { population: 'parked', parkedMonth: '2024-03' });
    const april = seedProspect(store, { population: 'parked', parkedMonth: '2024-04' });

    const batch = await engine.cadence.reactivateDueParked();

    expect(batch.failed).toEqual([]);
    expect(batch.succeeded.map((prospect) => prospect.id)).toEqual([january.id, march.id]);
    expect(batch.succeeded[1]).toMatchObject({
      population: 'unengaged',
      parkedMonth: null,
      followUpDate: new Date(2024, 2, 11),
    });
    expect((await store.getProspect(april.id))?.population).toBe('parked');
    expect(await store.listActivities(march.id)).toMatchObject([
      {
        activityType: 'status_change',
        populationBefore: 'parked',
        populationAfter: 'unengaged',
        notes: 'Parked month 2024-03 reached',
        createdBy: 'system',
      },
    ]);
  });

  it('collects failures and keeps going', async () => {
    const { store, engine } = createTestEngine();
    const first = seedProspect(store, { population: 'parked', parkedMonth: '2024-01' });
    const second = seedProspect(store, { population: 'parked', parkedMonth: '2024-02' });
    store.failNextTransactions(1);

    const batch = await engine.cadence.reactivateDueParked();

    expect(batch.failed).toHaveLength(1);
    expect(batch.failed[0]?.item.id).toBe(first.id);
    expect(batch.failed[0]?.error.kind).toBe('StorageBusy');
    expect(batch.succeeded.map((prospect) => prospect.id)).toEqual([second.id]);
  });
});
