import { DataSource } from 'typeorm';
import { logToFile } from '../../log';
import { UserEntity } from '../data/entity/User';
import { ValidationError } from '../errors';
import { PREMIUM_MONTHLY, PREMIUM_YEARLY, PlanStatus, isTrial, planTypeOf } from '../types/PlanStatus';
import { DAY, daysRemaining } from '../utils/time';

export const TRIAL_DAYS = 7;
export const TRIAL_EXPIRING_SOON_DAYS = 3;
export const GRACE_PERIOD_DAYS = 3;

const PRODUCT_PERIODS: Record<string, number> = {
  [PREMIUM_MONTHLY]: 30 * DAY,
  [PREMIUM_YEARLY]: 365 * DAY,
};

export interface GrantedPurchase {
  userId: string;
  productId: string;
  transactionDate: number;
}

export interface EntitlementStatus {
  planStatus: PlanStatus;
  planType: 'free' | 'premium';
  expiresAt: number | null;
  daysRemaining: number;
  isTrialExpiringSoon: boolean;
  hasUsedTrial: boolean;
}

/** Works out the status a stored plan has at a given moment. */
export const resolvePlanStatus = (user: Pick<UserEntity, 'planStatus' | 'expiresAt' | 'billingIssue'>, now: number): PlanStatus => {
  const { planStatus, expiresAt, billingIssue } = user;
  if (expiresAt === null || expiresAt > now) {
    return planStatus;
  }
  if (isTrial(planStatus)) {
    return 'trialCompleted';
  }
  if (planStatus === 'premiumActive' || planStatus === 'premiumCancelled' || planStatus === 'premiumGrace') {
    if (billingIssue && now < expiresAt + GRACE_PERIOD_DAYS * DAY) {
      return 'premiumGrace';
    }
    return 'premiumExpired';
  }
  return planStatus;
};

export class EntitlementService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly now: () => number = Date.now,
  ) {}

  async ensureUser(userId: string) {
    const existing = await this.dataSource.manager.findOneBy(UserEntity, { id: userId });
    if (existing) {
      return existing;
    }
    const now = this.now();
    const user = this.dataSource.manager.create(UserEntity, {
      id: userId,
      planStatus: 'free',
      hasUsedTrial: false,
      trialStartedAt: null,
      expiresAt: null,
      productId: null,
      autoRenew: false,
      billingIssue: false,
      createdAt: now,
      updatedAt: now,
    });
    return this.dataSource.manager.save(user);
  }

  async getStatus(userId: string): Promise<EntitlementStatus> {
    const user = await this.ensureUser(userId);
    const now = this.now();
    const planStatus = resolvePlanStatus(user, now);
    if (planStatus !== user.planStatus) {
      logToFile('plan status changed:', userId, user.planStatus, '->', planStatus);
      user.planStatus = planStatus;
      user.updatedAt = now;
      await this.dataSource.manager.save(user);
    }
    const remaining = user.expiresAt === null ? 0 : daysRemaining(now, user.expiresAt);
    return {
      planStatus,
      planType: planTypeOf(planStatus),
      expiresAt: user.expiresAt,
      daysRemaining: remaining,
      isTrialExpiringSoon: planStatus === 'trialActive' && remaining <= TRIAL_EXPIRING_SOON_DAYS,
      hasUsedTrial: user.hasUsedTrial,
    };
  }

  /** Each user gets one free trial. */
  async startTrial(userId: string) {
    const user = await this.ensureUser(userId);
    if (user.hasUsedTrial) {
      throw new ValidationError('trial already used');
    }
    const now = this.now();
    Object.assign(user, {
      planStatus: 'trialActive',
      hasUsedTrial: true,
      trialStartedAt: now,
      expiresAt: now + TRIAL_DAYS * DAY,
      autoRenew: true,
      updatedAt: now,
    });
    await this.dataSource.manager.save(user);
    return this.getStatus(userId);
  }

  async cancel(userId: string) {
    const user = await this.ensureUser(userId);
    const status = resolvePlanStatus(user, this.now());
    if (status === 'trialActive') {
      user.planStatus = 'trialCancelled';
    } else if (status === 'premiumActive' || status === 'premiumGrace') {
      user.planStatus = 'premiumCancelled';
    }
    user.autoRenew = false;
    user.updatedAt = this.now();
    await this.dataSource.manager.save(user);
    return this.getStatus(userId);
  }

  /** Extends premium by the product's period, counted from the later of now and the current expiry. */
  async applyPurchase({ userId, productId, transactionDate }: GrantedPurchase) {
    const period = PRODUCT_PERIODS[productId];
    if (period === undefined) {
      throw new ValidationError(`unknown product: ${productId}`);
    }
    const user = await this.ensureUser(userId);
    const now = this.now();
    const stillPremium = user.expiresAt !== null && user.expiresAt > now && !isTrial(user.planStatus);
    const base = stillPremium && user.expiresAt !== null ? user.expiresAt : Math.max(transactionDate, now);
    Object.assign(user, {
      planStatus: 'premiumActive',
      productId,
      expiresAt: base + period,
      autoRenew: true,
      billingIssue: false,
      updatedAt: now,
    });
    await this.dataSource.manager.save(user);
    logToFile('premium granted:', userId, productId);
    return this.getStatus(userId);
  }

  async markBillingIssue(userId: string) {
    const user = await this.ensureUser(userId);
    user.billingIssue = true;
    user.updatedAt = this.now();
    await this.dataSource.manager.save(user);
  }

  async refund(userId: string) {
    const user = await this.ensureUser(userId);
    const now = this.now();
    Object.assign(user, { planStatus: 'refunded', expiresAt: now, autoRenew: false, updatedAt: now });
    await this.dataSource.manager.save(user);
    return this.getStatus(userId);
  }
}
