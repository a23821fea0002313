import { NEVER, Observable } from 'rxjs';
import { logToFile } from '../../log';
import { PurchaseEvent, PurchasePlatform } from './purchaseEventProcessor';

/**
 * Platform for the HTTP server: updates arrive through the purchases route
 * rather than a store stream, and purchases can only be started on a device.
 */
export class ServerPurchasePlatform implements PurchasePlatform {
  readonly purchaseStream$: Observable<PurchaseEvent[]> = NEVER;

  async buy(productId: string) {
    logToFile('purchase must start on the device:', productId);
    return false;
  }

  async completePurchase(event: PurchaseEvent) {
    logToFile('purchase acknowledged:', event.transactionId ?? event.productId, event.status);
  }
}
