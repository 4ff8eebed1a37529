import { integer, pgSchema, text } from "drizzle-orm/pg-core";

// All dashboard data lives in the tenant schema; the chart reference tables
// are queried by name from the category table, the lookup tables below are
// typed because their shape is fixed.
export const TENANT_SCHEMA = "tenant01";

export const tenant = pgSchema(TENANT_SCHEMA);

export const meterMasterDetails = tenant.table("tb_metermasterdetail", {
  mtrid: integer("mtrid").notNull(),
  sip: integer("sip"),
});

export const distributionTransformers = tenant.table("tb_ntw_dt", {
  dtId: integer("dt_id"),
  dtName: text("dt_name"),
  meterId: integer("meterid"),
  meterSerialNo: text("meter_serial_no"),
});

export const lvFeeders = tenant.table("tb_ntw_lvfeeder", {
  dtId: integer("dt_id"),
  lvFeederName: text("lvfeeder_name"),
  meterId: integer("meterid"),
  meterSerialNo: text("meter_serial_no"),
});

export type MeterMasterDetail = typeof meterMasterDetails.$inferSelect;
export type DistributionTransformer = typeof distributionTransformers.$inferSelect;
export type LvFeeder = typeof lvFeeders.$inferSelect;
