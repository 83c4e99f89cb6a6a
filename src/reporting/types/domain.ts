/**
 * Normalized report shape. This is the contract every output format and
 * consumer depends on; backend quirks stop at the repository and assembler.
 * Every field always carries a display value.
 */
export interface Customer {
  name: string;
  address: string;
  phone: string;
}

export interface Delivery {
  name: string;
  status: string;
  date: string;
}

export interface ProductLine {
  name: string;
  quantity: number;
  unit_price: number;
  subtotal: number;
}

export interface Report {
  name: string;
  status: string;
  plan: string;
  start_date: string;
  end_date: string;
  customer: Customer;
  delivery: Delivery;
  products: ProductLine[];
  payment_terms: string;
  untaxed_amount: number;
  total_amount: number;
}

export const NOT_AVAILABLE = "Not Available";
export const NA = "N/A";
export const INVALID_DATE = "Invalid Date";
