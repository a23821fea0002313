import { DataSource } from 'typeorm';
import { logToFile } from '../../log';
import { UsageEntity } from '../data/entity/Usage';
import { UsageLimitExceededError } from '../errors';
import { PLAN_LIMITS, PlanLimits } from '../types/PlanStatus';
import { monthPeriod } from '../utils/time';
import { EntitlementService } from './entitlementService';

export type LimitedUsage = keyof PlanLimits;
export type UsageCounter = LimitedUsage | 'translatedChars' | 'storageBytes';

export interface NoteCreationUsage {
  ocrPages: number;
  storageBytes: number;
  translatedChars: number;
}

export class UsageLimitService {
  constructor(
    private readonly dataSource: DataSource,
    private readonly entitlements: EntitlementService,
    private readonly now: () => number = Date.now,
  ) {}

  private async currentRow(userId: string) {
    const period = monthPeriod(this.now());
    const id = `${userId}:${period}`;
    await this.dataSource.manager
      .createQueryBuilder()
      .insert()
      .into(UsageEntity)
      .values({ id, userId, period, ocrPages: 0, ttsRequests: 0, translatedChars: 0, storageBytes: 0 })
      .orIgnore()
      .execute();
    const row = await this.dataSource.manager.findOneByOrFail(UsageEntity, { id });
    return row;
  }

  async getLimits(userId: string) {
    const { planType } = await this.entitlements.getStatus(userId);
    return { planType, limits: PLAN_LIMITS[planType] };
  }

  async getUsage(userId: string) {
    const row = await this.currentRow(userId);
    const { planType, limits } = await this.getLimits(userId);
    return {
      period: row.period,
      planType,
      limits,
      ocrPages: row.ocrPages,
      ttsRequests: row.ttsRequests,
      translatedChars: row.translatedChars,
      storageBytes: row.storageBytes,
      limitReached: {
        ocrPages: row.ocrPages >= limits.ocrPages,
        ttsRequests: row.ttsRequests >= limits.ttsRequests,
      },
    };
  }

  async checkLimit(userId: string, kind: LimitedUsage, amount = 1) {
    const row = await this.currentRow(userId);
    const { limits } = await this.getLimits(userId);
    const limit = limits[kind];
    const used = row[kind];
    return { allowed: used + amount <= limit, used, limit, remaining: Math.max(0, limit - used) };
  }

  async assertWithinLimit(userId: string, kind: LimitedUsage, amount = 1) {
    const { allowed, limit } = await this.checkLimit(userId, kind, amount);
    if (!allowed) {
      throw new UsageLimitExceededError(kind, limit);
    }
  }

  async increment(userId: string, kind: UsageCounter, amount = 1) {
    if (amount <= 0) {
      return;
    }
    const row = await this.currentRow(userId);
    await this.dataSource.manager.increment(UsageEntity, { id: row.id }, kind, amount);
  }

  async updateUsageAfterNoteCreation(userId: string, usage: NoteCreationUsage) {
    await this.increment(userId, 'ocrPages', usage.ocrPages);
    await this.increment(userId, 'storageBytes', usage.storageBytes);
    await this.increment(userId, 'translatedChars', usage.translatedChars);
    const { limitReached } = await this.getUsage(userId);
    if (limitReached.ocrPages) {
      logToFile('ocr page limit reached:', userId);
    }
    return limitReached;
  }
}
