export type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

interface BaseRow {
  id: string;
  created_at: string;
}

export interface UserRow extends BaseRow {
  email: string;
  name: string;
  phone: string | null;
}

export interface ProductRow extends BaseRow {
  shop_id: string;
  name: string;
  price: number;
  description: string | null;
}

export interface OrderRow extends BaseRow {
  customer_id: string;
  total_amount: number;
  tracking_id: string;
  status: string;
  shop_id: string | null;
  delivery_address: string | null;
}

export interface MessageRow extends BaseRow {
  order_id: string;
  sender: string;
  content: string;
}

export interface TicketRow extends BaseRow {
  order_id: string;
  issue: string;
  status: string;
}

export interface DeliveryBoyRow extends BaseRow {
  name: string;
  phone: string;
  status: string;
}

export interface OrderAssignmentRow extends BaseRow {
  order_id: string;
  delivery_boy_id: string;
}

export interface SettingRow {
  key: string;
  value: Json;
  updated_at: string;
}

export interface Tables {
  users: UserRow;
  products: ProductRow;
  orders: OrderRow;
  messages: MessageRow;
  tickets: TicketRow;
  delivery_boys: DeliveryBoyRow;
  order_assignments: OrderAssignmentRow;
  settings: SettingRow;
}

export type TableName = keyof Tables;
export type ColumnOf<K extends TableName> = Extract<keyof Tables[K], string>;

export type FilterValue = string | number | boolean;
export type Filters<K extends TableName> = Partial<Record<ColumnOf<K>, FilterValue>>;
export type NewRow<K extends TableName> = Partial<Tables[K]>;

/** Postgres functions called through `rpc`, see supabase/migrations. */
export interface Functions {
  assign_order: {
    args: { p_order_id: string; p_delivery_boy_id: string };
    returns: OrderAssignmentRow;
  };
}

export type FunctionName = keyof Functions;

export interface SelectOptions<K extends TableName> {
  filters?: Filters<K>;
  orderBy?: { column: ColumnOf<K>; ascending?: boolean };
  limit?: number;
}
