import type { RpcCaller } from "../../odoo/rpc_client";
import { RemoteRecord } from "../../odoo/remote_record";
import { getLogger, type Logger } from "../../util/logger";
import type { SubscriptionSource } from "../types/contracts";

export const ORDER_FIELDS = [
  "id",
  "name",
  "subscription_state",
  "plan_id",
  "date_order",
  "partner_id",
  "order_line",
  "payment_term_id",
  "amount_untaxed",
  "amount_total",
];

export const PARTNER_FIELDS = [
  "name",
  "street",
  "street2",
  "city",
  "state_id",
  "country_id",
  "phone",
  "email",
];

export const PICKING_FIELDS = ["name", "state", "scheduled_date"];

export const ORDER_LINE_FIELDS = [
  "product_id",
  "name",
  "product_uom_qty",
  "price_unit",
  "price_subtotal",
];

/** Placeholder state used when the subscription module is not installed. */
export const SUBSCRIPTION_STATE_PLACEHOLDER = "n/a";

export function createOdooSubscriptionRepository(params: {
  client: RpcCaller;
  logger?: Logger;
}): SubscriptionSource {
  const { client } = params;
  const logger = params.logger ?? getLogger("reporting/odoo_repository");

  return {
    async fetchOrders(): Promise<RemoteRecord[]> {
      logger.info("Fetching subscriptions...");
      // No `subscription_state != false` filter: that field only exists when
      // the subscriptions module is installed, so every sale order is read.
      const orders = await client.call("sale.order", "search_read", [[]], {
        fields: ORDER_FIELDS,
      });

      const first = orders[0];
      if (first && !first.has("subscription_state")) {
        logger.warn(
          "'subscription_state' field not found. The 'sale_subscription' module is likely missing in Odoo."
        );
        logger.info({ count: orders.length }, `Found ${orders.length} sale orders`);
        return orders.map(order =>
          order.with("subscription_state", SUBSCRIPTION_STATE_PLACEHOLDER)
        );
      }

      logger.info({ count: orders.length }, `Found ${orders.length} sale orders`);
      return orders;
    },

    async fetchCustomer(partnerId: number): Promise<RemoteRecord> {
      if (!partnerId) return new RemoteRecord();
      const rows = await client.call("res.partner", "read", [[partnerId]], {
        fields: PARTNER_FIELDS,
      });
      return rows[0] ?? new RemoteRecord();
    },

    async fetchLatestDelivery(
      origin: string
    ): Promise<RemoteRecord | undefined> {
      if (!origin) return undefined;
      const rows = await client.call(
        "stock.picking",
        "search_read",
        [
          [
            ["origin", "=", origin],
            ["picking_type_id.code", "=", "outgoing"],
          ],
        ],
        { fields: PICKING_FIELDS, order: "scheduled_date desc", limit: 1 }
      );
      return rows[0];
    },

    async fetchOrderLines(lineIds: number[]): Promise<RemoteRecord[]> {
      if (lineIds.length === 0) return [];
      return client.call("sale.order.line", "read", [lineIds], {
        fields: ORDER_LINE_FIELDS,
      });
    },
  };
}
