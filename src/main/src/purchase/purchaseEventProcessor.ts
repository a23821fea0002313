import { Observable, Subject, Subscription, concatMap, filter, firstValueFrom, from, map, of, takeUntil, timeout } from 'rxjs';
import { logToFile } from '../../log';
import { MINUTE, SECOND } from '../utils/time';

export type PurchaseStatus = 'purchased' | 'restored' | 'pending' | 'error' | 'canceled';

const PURCHASE_STATUSES: readonly PurchaseStatus[] = ['purchased', 'restored', 'pending', 'error', 'canceled'];

export interface PurchaseEvent {
  transactionId: string | null;
  productId: string;
  userId: string;
  status: PurchaseStatus;
  /** Milliseconds since epoch, when the store reports it. */
  transactionDate: number | null;
}

/** The store side: delivers purchase updates and takes acknowledgements. */
export interface PurchasePlatform {
  readonly purchaseStream$: Observable<PurchaseEvent[]>;
  /** Starts a purchase; false when the store would not start one. */
  buy(productId: string): Promise<boolean>;
  completePurchase(event: PurchaseEvent): Promise<void>;
}

/** Grants what a purchase paid for; throws when that did not work. */
export type EntitlementSync = (event: PurchaseEvent) => Promise<void>;

export type PurchaseOutcome = 'granted' | 'duplicate' | 'coolingDown' | 'failed' | 'ignored';

export interface ProcessedPurchase {
  event: PurchaseEvent;
  outcome: PurchaseOutcome;
}

export interface PurchaseEventProcessorOptions {
  maxAttempts?: number;
  cooldownMs?: number;
  staleToleranceMs?: number;
  purchaseTimeoutMs?: number;
  now?: () => number;
}

interface Attempt {
  count: number;
  lastAttemptAt: number;
}

const readString = (value: unknown, key: string) => {
  const field: unknown = typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
  return typeof field === 'string' ? field : null;
};

const isPurchaseStatus = (value: string | null): value is PurchaseStatus =>
  PURCHASE_STATUSES.some((status) => status === value);

/** Reads a purchase update posted by a client or a store notification. */
export const parsePurchaseEvent = (value: unknown, userId: string): PurchaseEvent | null => {
  const productId = readString(value, 'productId');
  const status = readString(value, 'status');
  if (!productId || !isPurchaseStatus(status)) {
    return null;
  }
  const rawDate: unknown = typeof value === 'object' && value !== null ? Reflect.get(value, 'transactionDate') : undefined;
  const transactionDate = typeof rawDate === 'number' ? rawDate : typeof rawDate === 'string' && rawDate !== '' ? Number(rawDate) : NaN;
  return {
    transactionId: readString(value, 'transactionId'),
    productId,
    userId,
    status,
    transactionDate: Number.isFinite(transactionDate) ? transactionDate : null,
  };
};

/**
 * Turns store purchase updates into entitlements. A transaction is granted at
 * most once; one that keeps failing waits out a cooldown before it is tried
 * again. Every update is acknowledged to the store.
 */
export class PurchaseEventProcessor {
  private readonly processed = new Set<string>();
  private readonly attempts = new Map<string, Attempt>();
  private readonly inFlight = new Map<string, Promise<boolean>>();
  /** Last settlement queued per transaction id; overlapping deliveries wait their turn. */
  private readonly settling = new Map<string, Promise<PurchaseOutcome>>();
  private readonly outcomeSubject = new Subject<ProcessedPurchase>();
  readonly outcomes$: Observable<ProcessedPurchase> = this.outcomeSubject.asObservable();
  private subscription: Subscription | null = null;

  private readonly maxAttempts: number;
  private readonly cooldownMs: number;
  private readonly staleToleranceMs: number;
  private readonly purchaseTimeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly platform: PurchasePlatform,
    private readonly sync: EntitlementSync,
    { maxAttempts = 3, cooldownMs = 5 * MINUTE, staleToleranceMs = 2 * SECOND, purchaseTimeoutMs = 5 * MINUTE, now = Date.now }: PurchaseEventProcessorOptions = {},
  ) {
    this.maxAttempts = maxAttempts;
    this.cooldownMs = cooldownMs;
    this.staleToleranceMs = staleToleranceMs;
    this.purchaseTimeoutMs = purchaseTimeoutMs;
    this.now = now;
  }

  start() {
    if (this.subscription) {
      return;
    }
    this.subscription = this.platform.purchaseStream$
      .pipe(concatMap((events) => from(this.handleEvents(events))))
      .subscribe({
        error: (e) => {
          logToFile('purchase stream failed:', e);
          this.subscription = null;
        },
      });
    logToFile('purchase listener started');
  }

  stop() {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }

  isProcessed(transactionId: string) {
    return this.processed.has(transactionId);
  }

  async handleEvents(events: PurchaseEvent[]) {
    const results: ProcessedPurchase[] = [];
    for (const event of events) {
      const outcome = await this.handleEvent(event);
      const result = { event, outcome };
      results.push(result);
      this.outcomeSubject.next(result);
    }
    return results;
  }

  async handleEvent(event: PurchaseEvent): Promise<PurchaseOutcome> {
    try {
      return await this.resolve(event);
    } finally {
      await this.platform.completePurchase(event).catch((e) => logToFile('completing purchase failed:', event.transactionId, e));
    }
  }

  private async resolve(event: PurchaseEvent): Promise<PurchaseOutcome> {
    const id = event.transactionId;
    if (id === null) {
      return this.settle(event);
    }
    const previous = this.settling.get(id) ?? Promise.resolve<PurchaseOutcome>('ignored');
    const next = previous.catch(() => 'failed').then(() => this.settle(event));
    this.settling.set(id, next);
    try {
      return await next;
    } finally {
      if (this.settling.get(id) === next) {
        this.settling.delete(id);
      }
    }
  }

  private async settle(event: PurchaseEvent): Promise<PurchaseOutcome> {
    if (event.status !== 'purchased' && event.status !== 'restored') {
      logToFile('purchase update:', event.productId, event.status);
      return 'ignored';
    }
    const id = event.transactionId;
    if (id !== null && this.processed.has(id)) {
      return 'duplicate';
    }
    if (id !== null) {
      const attempt = this.attempts.get(id);
      if (attempt && attempt.count >= this.maxAttempts) {
        if (this.now() - attempt.lastAttemptAt < this.cooldownMs) {
          return 'coolingDown';
        }
        this.attempts.delete(id);
      }
    }
    try {
      await this.sync(event);
    } catch (e) {
      logToFile('entitlement sync failed:', id, e);
      if (id !== null) {
        const previous = this.attempts.get(id);
        this.attempts.set(id, { count: (previous?.count ?? 0) + 1, lastAttemptAt: this.now() });
      }
      return 'failed';
    }
    if (id !== null) {
      this.processed.add(id);
      this.attempts.delete(id);
    }
    logToFile('purchase granted:', event.productId, id);
    return 'granted';
  }

  /** Resolves true once the store reports this product bought; a second call while one runs joins it. */
  buyProduct(productId: string) {
    const running = this.inFlight.get(productId);
    if (running) {
      return running;
    }
    const flow = this.runPurchaseFlow(productId).finally(() => this.inFlight.delete(productId));
    this.inFlight.set(productId, flow);
    return flow;
  }

  private async runPurchaseFlow(productId: string) {
    this.start();
    const startedAt = this.now();
    const abort$ = new Subject<void>();
    const result = firstValueFrom(
      this.outcomes$.pipe(
        filter(({ event }) => event.productId === productId),
        filter(({ event }) => event.transactionDate === null || event.transactionDate >= startedAt - this.staleToleranceMs),
        map(({ event, outcome }) => {
          if (outcome === 'granted') {
            return true;
          }
          if (outcome === 'failed' || outcome === 'coolingDown' || event.status === 'error' || event.status === 'canceled') {
            return false;
          }
          return null;
        }),
        filter((decided): decided is boolean => decided !== null),
        timeout({ first: this.purchaseTimeoutMs, with: () => of(false) }),
        takeUntil(abort$),
      ),
      { defaultValue: false },
    );
    let started = false;
    try {
      started = await this.platform.buy(productId);
    } catch (e) {
      logToFile('starting purchase failed:', productId, e);
    }
    if (!started) {
      abort$.next();
    }
    return result;
  }
}
