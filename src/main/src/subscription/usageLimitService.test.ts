import { DataSource } from 'typeorm';
import { openDataSource } from '../data/data-source';
import { UsageLimitExceededError } from '../errors';
import { EntitlementService } from './entitlementService';
import { UsageLimitService } from './usageLimitService';

describe('UsageLimitService', () => {
  let dataSource: DataSource;
  let entitlements: EntitlementService;
  let usage: UsageLimitService;
  let clock: number;

  beforeEach(async () => {
    clock = new Date(2024, 2, 15).getTime();
    dataSource = await openDataSource(':memory:');
    entitlements = new EntitlementService(dataSource, () => clock);
    usage = new UsageLimitService(dataSource, entitlements, () => clock);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('applies free plan limits', async () => {
    expect(await usage.checkLimit('u1', 'ocrPages')).toEqual({ allowed: true, used: 0, limit: 30, remaining: 30 });
    await usage.increment('u1', 'ocrPages', 30);
    expect(await usage.checkLimit('u1', 'ocrPages')).toEqual({ allowed: false, used: 30, limit: 30, remaining: 0 });
    await expect(usage.assertWithinLimit('u1', 'ocrPages')).rejects.toBeInstanceOf(UsageLimitExceededError);
  });

  it('checks a batch against what is left', async () => {
    await usage.increment('u1', 'ocrPages', 28);
    expect((await usage.checkLimit('u1', 'ocrPages', 2)).allowed).toBe(true);
    expect((await usage.checkLimit('u1', 'ocrPages', 3)).allowed).toBe(false);
  });

  it('raises limits for premium users', async () => {
    await entitlements.startTrial('u1');
    expect((await usage.checkLimit('u1', 'ttsRequests')).limit).toBe(1000);
  });

  it('counts each month separately', async () => {
    await usage.increment('u1', 'ttsRequests', 5);
    clock = new Date(2024, 3, 1).getTime();
    expect((await usage.checkLimit('u1', 'ttsRequests')).used).toBe(0);
  });

  it('records what a note creation used', async () => {
    const reached = await usage.updateUsageAfterNoteCreation('u1', { ocrPages: 2, storageBytes: 2048, translatedChars: 120 });
    expect(reached).toEqual({ ocrPages: false, ttsRequests: false });
    const current = await usage.getUsage('u1');
    expect(current).toMatchObject({
      period: '2024-03',
      planType: 'free',
      ocrPages: 2,
      ttsRequests: 0,
      translatedChars: 120,
      storageBytes: 2048,
    });
  });

  it('ignores non-positive increments', async () => {
    await usage.increment('u1', 'ocrPages', 0);
    expect((await usage.getUsage('u1')).ocrPages).toBe(0);
  });
});
