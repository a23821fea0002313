export type PlanStatus =
  | 'free'
  | 'trialActive'
  | 'trialCancelled'
  | 'trialCompleted'
  | 'premiumActive'
  | 'premiumCancelled'
  | 'premiumExpired'
  | 'premiumGrace'
  | 'refunded';

export type PlanType = 'free' | 'premium';

export const isTrial = (status: PlanStatus) => status === 'trialActive' || status === 'trialCancelled';

/** Cancelled plans keep their benefits until they expire. */
export const isPremium = (status: PlanStatus) =>
  status === 'trialActive' ||
  status === 'trialCancelled' ||
  status === 'premiumActive' ||
  status === 'premiumCancelled' ||
  status === 'premiumGrace';

export const isActive = isPremium;

export const planTypeOf = (status: PlanStatus): PlanType => (isPremium(status) ? 'premium' : 'free');

export interface PlanLimits {
  ocrPages: number;
  ttsRequests: number;
}

export const PLAN_LIMITS: Record<PlanType, PlanLimits> = {
  free: { ocrPages: 30, ttsRequests: 50 },
  premium: { ocrPages: 300, ttsRequests: 1000 },
};

export const PREMIUM_MONTHLY = 'premium_monthly';
export const PREMIUM_YEARLY = 'premium_yearly';
export const PRODUCT_IDS = [PREMIUM_MONTHLY, PREMIUM_YEARLY] as const;
