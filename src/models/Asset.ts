import { Numeric } from "../utils/money";
import { Owner } from "./Household";
import { GrowthConfig } from "./GrowthConfig";

/**
 * Asset data structures.
 * Assets grow through a GrowthConfig; they never carry an interest rate.
 */

export interface AssetRecord<M> {
  assetId: number;
  name: string;
  owner: Owner;
  value: M; // as of plan creation
  includeInNestEgg: boolean;
  categoryId?: number | null;
  growth: GrowthConfig<M>;
}

export type Asset = AssetRecord<Numeric>;
