import type { RemoteRecord } from "../../odoo/remote_record";

/**
 * Read-only access to the backend records a subscription report is built from.
 * Implementations return empty results instead of throwing on backend failures.
 */
export interface SubscriptionSource {
  fetchOrders(): Promise<RemoteRecord[]>;
  /** Empty record when `partnerId` is 0 or the partner cannot be read. */
  fetchCustomer(partnerId: number): Promise<RemoteRecord>;
  /** Most recently scheduled outgoing shipment for an order reference. */
  fetchLatestDelivery(origin: string): Promise<RemoteRecord | undefined>;
  fetchOrderLines(lineIds: number[]): Promise<RemoteRecord[]>;
}
