/**
 * Pure field normalizers. Each one is total: bad input produces a sentinel,
 * never an exception.
 */
import type { Relation, RemoteRecord } from "../../odoo/remote_record";
import { INVALID_DATE, NOT_AVAILABLE } from "../types/domain";

export function extractRelationLabel(
  relation: Relation,
  defaultValue: string = NOT_AVAILABLE
): string {
  // A linked relation can still carry a blank label ([id, false], [id, ""]).
  return relation.kind === "linked" && relation.label
    ? relation.label
    : defaultValue;
}

export function extractRelationId(relation: Relation): number {
  return relation.kind === "linked" ? relation.id : 0;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?: (\d{2}):(\d{2}):(\d{2}))?$/;

/**
 * "YYYY-MM-DD" or "YYYY-MM-DD HH:MM:SS" -> "MM/DD/YYYY".
 * Calendar-invalid dates (2023-02-30, 25:00:00) count as unparseable.
 */
export function formatDate(raw: string | undefined): string {
  if (!raw) return NOT_AVAILABLE;
  const m = DATE_PATTERN.exec(raw);
  if (!m) return INVALID_DATE;

  const [, y, mo, d, hh = "00", mm = "00", ss = "00"] = m;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const dt = new Date(Date.UTC(year, month - 1, day));
  const sameDay =
    dt.getUTCFullYear() === year &&
    dt.getUTCMonth() === month - 1 &&
    dt.getUTCDate() === day;
  const validTime = Number(hh) < 24 && Number(mm) < 60 && Number(ss) < 60;
  if (!sameDay || !validTime) return INVALID_DATE;

  return `${mo}/${d}/${y}`;
}

/**
 * Joins street, street2, city and "State (Country)" with ", ", skipping empty
 * parts. The state/country segment needs both halves or is left out.
 */
export function formatAddress(customer: RemoteRecord): string {
  const state = extractRelationLabel(customer.relation("state_id"), "");
  const country = extractRelationLabel(customer.relation("country_id"), "");
  const parts = [
    customer.string("street", ""),
    customer.string("street2", ""),
    customer.string("city", ""),
    state && country ? `${state} (${country})` : "",
  ];
  return parts.filter(Boolean).join(", ");
}

const SUBSCRIPTION_STATUS: Record<string, string> = {
  "4_close": "Closed",
  "6_churn": "Churned",
  "3_pending": "Pending",
  "2_open": "Active",
  "1_draft": "Draft",
};

const DELIVERY_STATUS: Record<string, string> = {
  draft: "Draft",
  waiting: "Waiting",
  confirmed: "Confirmed",
  assigned: "Preparation",
  done: "Delivered",
  cancel: "Cancelled",
};

/** Upper-cases the first character and lower-cases the rest. */
export function capitalize(value: string): string {
  if (!value) return "";
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

function lookup(table: Record<string, string>, code: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(table, code)
    ? table[code]
    : undefined;
}

export function mapSubscriptionStatus(code: string | undefined): string {
  const raw = code ?? "";
  return lookup(SUBSCRIPTION_STATUS, raw) ?? capitalize(raw);
}

export function mapDeliveryStatus(code: string | undefined): string {
  const raw = code ?? "";
  return lookup(DELIVERY_STATUS, raw) ?? capitalize(raw);
}

export function firstLine(text: string): string {
  return text.split("\n")[0] ?? "";
}
