import { Numeric } from "../utils/money";
import { Owner } from "./Household";

/**
 * Scheduled inflow/outflow data structures (inheritances, college costs, home sales...)
 */

export type FlowType = "INFLOW" | "OUTFLOW";

export interface ScheduledFlowRecord<M> {
  flowId: number;
  name: string;
  owner: Owner;
  type: FlowType;
  annualAmount: M;
  startYear: number;
  endYear: number | null; // null = through the plan's end year
  applyInflation: boolean;
}

export type ScheduledFlow = ScheduledFlowRecord<Numeric>;
