import { DataSource } from 'typeorm';
import { openDataSource } from '../data/data-source';
import { ValidationError } from '../errors';
import { DAY } from '../utils/time';
import { EntitlementService, resolvePlanStatus } from './entitlementService';

describe('resolvePlanStatus', () => {
  const now = 10 * DAY;

  it('keeps a plan that has not expired', () => {
    expect(resolvePlanStatus({ planStatus: 'trialActive', expiresAt: now + 1, billingIssue: false }, now)).toBe('trialActive');
    expect(resolvePlanStatus({ planStatus: 'free', expiresAt: null, billingIssue: false }, now)).toBe('free');
  });

  it('completes an expired trial', () => {
    expect(resolvePlanStatus({ planStatus: 'trialCancelled', expiresAt: now, billingIssue: false }, now)).toBe('trialCompleted');
  });

  it('grants a grace period only on billing trouble', () => {
    const expiresAt = now - DAY;
    expect(resolvePlanStatus({ planStatus: 'premiumActive', expiresAt, billingIssue: true }, now)).toBe('premiumGrace');
    expect(resolvePlanStatus({ planStatus: 'premiumActive', expiresAt, billingIssue: false }, now)).toBe('premiumExpired');
    expect(resolvePlanStatus({ planStatus: 'premiumGrace', expiresAt: now - 3 * DAY, billingIssue: true }, now)).toBe(
      'premiumExpired',
    );
  });
});

describe('EntitlementService', () => {
  let dataSource: DataSource;
  let service: EntitlementService;
  let clock: number;
  const start = new Date(2024, 0, 10).getTime();

  beforeEach(async () => {
    clock = start;
    dataSource = await openDataSource(':memory:');
    service = new EntitlementService(dataSource, () => clock);
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('starts new users on the free plan', async () => {
    const status = await service.getStatus('u1');
    expect(status).toEqual({
      planStatus: 'free',
      planType: 'free',
      expiresAt: null,
      daysRemaining: 0,
      isTrialExpiringSoon: false,
      hasUsedTrial: false,
    });
  });

  it('runs a seven day trial once', async () => {
    const status = await service.startTrial('u1');
    expect(status.planStatus).toBe('trialActive');
    expect(status.planType).toBe('premium');
    expect(status.expiresAt).toBe(start + 7 * DAY);
    expect(status.daysRemaining).toBe(7);
    expect(status.isTrialExpiringSoon).toBe(false);
    await expect(service.startTrial('u1')).rejects.toBeInstanceOf(ValidationError);
  });

  it('warns when the trial is about to end and completes it afterwards', async () => {
    await service.startTrial('u1');
    clock = start + 4 * DAY + 1;
    const soon = await service.getStatus('u1');
    expect(soon.daysRemaining).toBe(3);
    expect(soon.isTrialExpiringSoon).toBe(true);

    clock = start + 7 * DAY;
    const after = await service.getStatus('u1');
    expect(after.planStatus).toBe('trialCompleted');
    expect(after.planType).toBe('free');
    expect(after.hasUsedTrial).toBe(true);
  });

  it('keeps benefits of a cancelled trial until it expires', async () => {
    await service.startTrial('u1');
    const status = await service.cancel('u1');
    expect(status.planStatus).toBe('trialCancelled');
    expect(status.planType).toBe('premium');
  });

  it('extends premium from the current expiry on repeat purchases', async () => {
    const first = await service.applyPurchase({ userId: 'u1', productId: 'premium_monthly', transactionDate: start - 1000 });
    expect(first.planStatus).toBe('premiumActive');
    expect(first.expiresAt).toBe(start + 30 * DAY);

    clock = start + DAY;
    const second = await service.applyPurchase({ userId: 'u1', productId: 'premium_monthly', transactionDate: clock });
    expect(second.expiresAt).toBe(start + 60 * DAY);
  });

  it('turns a trial into a yearly plan counted from the purchase', async () => {
    await service.startTrial('u1');
    const status = await service.applyPurchase({ userId: 'u1', productId: 'premium_yearly', transactionDate: start });
    expect(status.expiresAt).toBe(start + 365 * DAY);
  });

  it('rejects unknown products', async () => {
    await expect(
      service.applyPurchase({ userId: 'u1', productId: 'premium_weekly', transactionDate: start }),
    ).rejects.toThrow('unknown product: premium_weekly');
  });

  it('moves through grace to expiry when billing fails', async () => {
    await service.applyPurchase({ userId: 'u1', productId: 'premium_monthly', transactionDate: start });
    await service.markBillingIssue('u1');
    clock = start + 31 * DAY;
    expect((await service.getStatus('u1')).planStatus).toBe('premiumGrace');
    clock = start + 33 * DAY;
    expect((await service.getStatus('u1')).planStatus).toBe('premiumExpired');
  });

  it('drops benefits on refund', async () => {
    await service.applyPurchase({ userId: 'u1', productId: 'premium_monthly', transactionDate: start });
    const status = await service.refund('u1');
    expect(status.planStatus).toBe('refunded');
    expect(status.planType).toBe('free');
  });
});
