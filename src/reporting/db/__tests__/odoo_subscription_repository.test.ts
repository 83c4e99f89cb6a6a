import { RemoteRecord, type RemoteFields } from "@src/odoo/remote_record";
import type { NamedArgs, RpcCaller } from "@src/odoo/rpc_client";
import {
  createOdooSubscriptionRepository,
  ORDER_FIELDS,
  ORDER_LINE_FIELDS,
  PARTNER_FIELDS,
  PICKING_FIELDS,
} from "@src/reporting/db/odoo_subscription_repository";
import { createCapturingLogger } from "@src/reporting/__tests__/fake_source";

interface CapturedCall {
  model: string;
  method: string;
  args: unknown[];
  kwargs?: NamedArgs;
}

function createClientStub(rows: RemoteFields[]): {
  client: RpcCaller;
  calls: CapturedCall[];
} {
  const calls: CapturedCall[] = [];
  return {
    calls,
    client: {
      async call(model, method, args, kwargs) {
        calls.push({ model, method, args, kwargs });
        return rows.map(fields => new RemoteRecord(fields));
      },
    },
  };
}

describe("createOdooSubscriptionRepository", () => {
  it("reads every sale order with the report fields", async () => {
    const { client, calls } = createClientStub([
      { id: 1, name: "SO001", subscription_state: "2_open" },
    ]);
    const repo = createOdooSubscriptionRepository({ client });

    const orders = await repo.fetchOrders();

    expect(calls).toEqual([
      {
        model: "sale.order",
        method: "search_read",
        args: [[]],
        kwargs: { fields: ORDER_FIELDS },
      },
    ]);
    expect(orders[0].string("subscription_state", "")).toBe("2_open");
  });

  it("fills a placeholder state when the subscription module is missing", async () => {
    const { logger, lines } = createCapturingLogger();
    const { client } = createClientStub([
      { id: 1, name: "SO001" },
      { id: 2, name: "SO002" },
    ]);
    const repo = createOdooSubscriptionRepository({ client, logger });

    const orders = await repo.fetchOrders();

    expect(orders.map(o => o.string("subscription_state", ""))).toEqual([
      "n/a",
      "n/a",
    ]);
    const warnings = lines.filter(line => line.level === 40);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].msg).toBe(
      "'subscription_state' field not found. The 'sale_subscription' module is likely missing in Odoo."
    );
  });

  it("skips the partner read for id 0", async () => {
    const { client, calls } = createClientStub([{ name: "Acme Corp" }]);
    const repo = createOdooSubscriptionRepository({ client });

    const empty = await repo.fetchCustomer(0);
    expect(calls).toHaveLength(0);
    expect(empty.has("name")).toBe(false);

    const partner = await repo.fetchCustomer(7);
    expect(partner.string("name", "")).toBe("Acme Corp");
    expect(calls[0]).toEqual({
      model: "res.partner",
      method: "read",
      args: [[7]],
      kwargs: { fields: PARTNER_FIELDS },
    });
  });

  it("returns an empty customer when the partner read yields nothing", async () => {
    const { client } = createClientStub([]);
    const repo = createOdooSubscriptionRepository({ client });
    const partner = await repo.fetchCustomer(7);
    expect(partner.string("name", "N/A")).toBe("N/A");
  });

  it("asks for the latest outgoing picking of an order", async () => {
    const { client, calls } = createClientStub([
      { name: "WH/OUT/0001", state: "done" },
    ]);
    const repo = createOdooSubscriptionRepository({ client });

    expect(await repo.fetchLatestDelivery("")).toBeUndefined();
    expect(calls).toHaveLength(0);

    const picking = await repo.fetchLatestDelivery("SO001");
    expect(picking?.string("name", "")).toBe("WH/OUT/0001");
    expect(calls[0]).toEqual({
      model: "stock.picking",
      method: "search_read",
      args: [
        [
          ["origin", "=", "SO001"],
          ["picking_type_id.code", "=", "outgoing"],
        ],
      ],
      kwargs: {
        fields: PICKING_FIELDS,
        order: "scheduled_date desc",
        limit: 1,
      },
    });
  });

  it("reads order lines by id and skips empty id lists", async () => {
    const { client, calls } = createClientStub([{ name: "Widget" }]);
    const repo = createOdooSubscriptionRepository({ client });

    expect(await repo.fetchOrderLines([])).toEqual([]);
    expect(calls).toHaveLength(0);

    const lines = await repo.fetchOrderLines([11, 12]);
    expect(lines).toHaveLength(1);
    expect(calls[0]).toEqual({
      model: "sale.order.line",
      method: "read",
      args: [[11, 12]],
      kwargs: { fields: ORDER_LINE_FIELDS },
    });
  });
});
