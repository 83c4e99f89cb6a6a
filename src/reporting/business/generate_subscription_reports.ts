/**
 * Business logic: build one normalized Report per sale order.
 *
 * Per order: customer, latest outgoing delivery and order lines are fetched
 * concurrently, then composed into a Report. A failure while assembling one
 * order is logged and that order is skipped; the rest of the batch goes on.
 */
import type { RemoteRecord } from "../../odoo/remote_record";
import { getLogger, type Logger } from "../../util/logger";
import type { SubscriptionSource } from "../types/contracts";
import {
  NA,
  NOT_AVAILABLE,
  type Customer,
  type Delivery,
  type ProductLine,
  type Report,
} from "../types/domain";
import {
  extractRelationId,
  extractRelationLabel,
  firstLine,
  formatAddress,
  formatDate,
  mapDeliveryStatus,
  mapSubscriptionStatus,
} from "./normalizers";

export interface GenerateReportsDependencies {
  source: SubscriptionSource;
  logger?: Logger;
}

export async function generateSubscriptionReports(
  deps: GenerateReportsDependencies
): Promise<Report[]> {
  const logger = deps.logger ?? getLogger("reporting/generate_reports");
  const orders = await deps.source.fetchOrders();
  if (orders.length === 0) return [];

  const reports: Report[] = [];
  for (const order of orders) {
    try {
      reports.push(await buildReport(order, deps.source));
    } catch (err) {
      const name = order.string("name", NA);
      logger.error(
        { order: name, err },
        `Error processing subscription ${name}: ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }

  logger.info(
    { count: reports.length, skipped: orders.length - reports.length },
    `Successfully processed ${reports.length} subscriptions`
  );
  return reports;
}

export async function buildReport(
  order: RemoteRecord,
  source: SubscriptionSource
): Promise<Report> {
  const partnerId = extractRelationId(order.relation("partner_id"));
  const origin = order.string("name", "");

  const [customer, delivery, lines] = await Promise.all([
    source.fetchCustomer(partnerId),
    source.fetchLatestDelivery(origin),
    source.fetchOrderLines(order.idList("order_line")),
  ]);

  return {
    name: order.string("name", NA),
    status: mapSubscriptionStatus(order.string("subscription_state", "")),
    plan: extractRelationLabel(order.relation("plan_id"), NOT_AVAILABLE),
    start_date: formatDate(order.string("date_order", "")),
    // Sale orders carry no end date.
    end_date: NOT_AVAILABLE,
    customer: toCustomer(customer),
    delivery: toDelivery(delivery),
    products: lines.map(toProductLine),
    payment_terms: extractRelationLabel(order.relation("payment_term_id"), NA),
    untaxed_amount: order.number("amount_untaxed", 0),
    total_amount: order.number("amount_total", 0),
  };
}

function toCustomer(partner: RemoteRecord): Customer {
  return {
    name: partner.string("name", NA),
    address: formatAddress(partner),
    phone: partner.string("phone", NA),
  };
}

function toDelivery(picking: RemoteRecord | undefined): Delivery {
  if (!picking) {
    return { name: NA, status: NA, date: NOT_AVAILABLE };
  }
  return {
    name: picking.string("name", NA),
    status: mapDeliveryStatus(picking.string("state", "")),
    date: formatDate(picking.string("scheduled_date", "")),
  };
}

function toProductLine(line: RemoteRecord): ProductLine {
  return {
    name: firstLine(line.string("name", NA)) || NA,
    quantity: line.number("product_uom_qty", 0),
    unit_price: line.number("price_unit", 0),
    subtotal: line.number("price_subtotal", 0),
  };
}
