import { ParticipantRoleSchema } from '@netsettle/core';
import { z } from 'zod';

const PriceSchema = z.number().finite().nonnegative();
const RateSchema = z.number().min(0).max(1);

/**
 * Netting parameters shared by every use case
 */
const commonParameters = {
  minimum_payout: PriceSchema.default(0),
  minimum_payout_by_role: z.record(ParticipantRoleSchema, PriceSchema).default({}),
  rounding_mode: z.enum(['half-up', 'half-even']).default('half-up'),
  zero_epsilon: z.number().positive().default(1e-9),
  // No default: which counterparty absorbs an unknown source must be chosen explicitly
  unclassified_source_policy: z.enum(['external-market', 'zero-priced']),
};

export const EnergyCommunityParametersSchema = z
  .object({
    prosumer_sell_price: PriceSchema.default(0.15),
    consumer_buy_price: PriceSchema.default(0.12),
    community_fee_rate: RateSchema.default(0.02),
    grid_feed_price: PriceSchema.default(0.08),
    grid_price_per_kwh: PriceSchema.optional(),
    vpp_price_per_kwh: PriceSchema.optional(),
    ...commonParameters,
  })
  .strict();

export const MieterstromParametersSchema = z
  .object({
    tenant_price_per_kwh: PriceSchema.default(0.18),
    landlord_revenue_share: RateSchema.default(0.6),
    operator_fee_rate: RateSchema.default(0.15),
    grid_compensation: PriceSchema.default(0.08),
    base_fee_per_unit: PriceSchema.default(5),
    grid_price_per_kwh: PriceSchema.optional(),
    ...commonParameters,
  })
  .strict();

export type EnergyCommunityParameters = z.infer<typeof EnergyCommunityParametersSchema>;
export type MieterstromParameters = z.infer<typeof MieterstromParametersSchema>;

export const USE_CASE_IDS = ['energy_community', 'mieterstrom'] as const;
export const UseCaseIdSchema = z.enum(USE_CASE_IDS);
export type UseCaseId = z.infer<typeof UseCaseIdSchema>;

/**
 * Prices used when neither the event nor the policy carries one
 */
export const USE_CASE_CONSTANTS = {
  gridPricePerKwh: 0.3,
  vppPricePerKwh: 0.1,
} as const;

export interface UseCaseDefinition {
  id: UseCaseId;
  title: string;
  description: string;
}

export const USE_CASES: Record<UseCaseId, UseCaseDefinition> = {
  energy_community: {
    id: 'energy_community',
    title: 'Energy community',
    description:
      'Members buy local generation from a community pool; prosumers sell into the pool net of a community fee.',
  },
  mieterstrom: {
    id: 'mieterstrom',
    title: 'Tenant power (Mieterstrom)',
    description: 'Tenants buy rooftop power from the landlord; the operator takes a fee share of local sales.',
  },
};
