import type { EventKind, ParticipantRole } from '@netsettle/core';
import { Decimal } from 'decimal.js';

import type { SourceBucket } from '../domain/types.js';

import {
  USE_CASE_CONSTANTS,
  type EnergyCommunityParameters,
  type MieterstromParameters,
} from './use-case-configs.js';

/**
 * Side of the posting the event's own participant (the subject) lands on:
 * `debit` means the subject pays, `credit` means the subject is paid.
 */
export type SubjectSide = 'debit' | 'credit';

/**
 * Diverts a share of the amount from the credited party to a second counterparty.
 */
export interface RuleSplit<P> {
  counterpartyRole: ParticipantRole;
  share: (parameters: P) => Decimal;
  description: string;
}

export interface SettlementRule<P> {
  id: string;
  kinds: readonly EventKind[];
  /** Omitted: the rule matches any source */
  sources?: readonly SourceBucket[] | undefined;
  subjectRoles: readonly ParticipantRole[];
  side: SubjectSide;
  counterpartyRole: ParticipantRole;
  /** Policy price, else use-case constant. An event's own price takes precedence over both. */
  price: (parameters: P) => Decimal | undefined;
  split?: RuleSplit<P> | undefined;
  description: string;
}

/** Kinds that move energy but carry no money */
export const NON_MONETARY_KINDS: ReadonlySet<EventKind> = new Set(['battery-charge', 'battery-discharge', 'production']);

const LOCAL_SOURCES: readonly SourceBucket[] = ['local-pv', 'battery'];
const TENANT_ROLES: readonly ParticipantRole[] = ['tenant', 'commercial-tenant', 'consumer'];
const COMMUNITY_MEMBER_ROLES: readonly ParticipantRole[] = ['consumer', 'prosumer', 'tenant', 'commercial-tenant'];

const gridPrice = (parameters: { grid_price_per_kwh?: number | undefined }): Decimal =>
  new Decimal(parameters.grid_price_per_kwh ?? USE_CASE_CONSTANTS.gridPricePerKwh);

export const MIETERSTROM_RULES: readonly SettlementRule<MieterstromParameters>[] = [
  {
    id: 'mieterstrom.local-consumption',
    kinds: ['consumption'],
    sources: LOCAL_SOURCES,
    subjectRoles: TENANT_ROLES,
    side: 'debit',
    counterpartyRole: 'landlord',
    price: (p) => new Decimal(p.tenant_price_per_kwh),
    split: {
      counterpartyRole: 'operator',
      share: (p) => new Decimal(p.operator_fee_rate),
      description: 'Operator fee on local power',
    },
    description: 'Local power at tenant price',
  },
  {
    id: 'mieterstrom.grid-consumption',
    kinds: ['consumption'],
    sources: ['grid'],
    subjectRoles: TENANT_ROLES,
    side: 'debit',
    counterpartyRole: 'external-market',
    price: gridPrice,
    description: 'Grid power',
  },
  {
    id: 'mieterstrom.base-fee',
    kinds: ['base-fee'],
    subjectRoles: TENANT_ROLES,
    side: 'debit',
    counterpartyRole: 'landlord',
    price: (p) => new Decimal(p.base_fee_per_unit),
    description: 'Base fee',
  },
  {
    id: 'mieterstrom.landlord-feed-in',
    kinds: ['grid-feed'],
    subjectRoles: ['landlord'],
    side: 'credit',
    counterpartyRole: 'external-market',
    price: (p) => new Decimal(p.grid_compensation),
    split: {
      counterpartyRole: 'operator',
      share: (p) => new Decimal(1).minus(p.landlord_revenue_share),
      description: 'Operator share of feed-in compensation',
    },
    description: 'Feed-in compensation',
  },
  {
    id: 'mieterstrom.feed-in',
    kinds: ['grid-feed'],
    subjectRoles: ['operator', 'prosumer'],
    side: 'credit',
    counterpartyRole: 'external-market',
    price: (p) => new Decimal(p.grid_compensation),
    description: 'Feed-in compensation',
  },
];

export const ENERGY_COMMUNITY_RULES: readonly SettlementRule<EnergyCommunityParameters>[] = [
  {
    id: 'energy_community.local-consumption',
    kinds: ['consumption'],
    sources: LOCAL_SOURCES,
    subjectRoles: COMMUNITY_MEMBER_ROLES,
    side: 'debit',
    counterpartyRole: 'fee-collector',
    price: (p) => new Decimal(p.consumer_buy_price),
    description: 'Community power',
  },
  {
    id: 'energy_community.grid-consumption',
    kinds: ['consumption'],
    sources: ['grid'],
    subjectRoles: COMMUNITY_MEMBER_ROLES,
    side: 'debit',
    counterpartyRole: 'external-market',
    price: gridPrice,
    description: 'Grid power',
  },
  {
    id: 'energy_community.generation',
    kinds: ['generation'],
    subjectRoles: ['prosumer'],
    side: 'credit',
    counterpartyRole: 'fee-collector',
    price: (p) => new Decimal(p.prosumer_sell_price).times(new Decimal(1).minus(p.community_fee_rate)),
    description: 'Generation sold to the community, net of community fee',
  },
  {
    id: 'energy_community.grid-feed',
    kinds: ['grid-feed'],
    subjectRoles: ['prosumer', 'operator'],
    side: 'credit',
    counterpartyRole: 'external-market',
    price: (p) => new Decimal(p.grid_feed_price),
    description: 'Feed-in compensation',
  },
  {
    id: 'energy_community.vpp-sale',
    kinds: ['vpp-sale'],
    subjectRoles: ['prosumer', 'operator'],
    side: 'credit',
    counterpartyRole: 'external-market',
    price: (p) => new Decimal(p.vpp_price_per_kwh ?? USE_CASE_CONSTANTS.vppPricePerKwh),
    description: 'Virtual power plant sale',
  },
  {
    id: 'energy_community.base-fee',
    kinds: ['base-fee'],
    subjectRoles: COMMUNITY_MEMBER_ROLES,
    side: 'debit',
    counterpartyRole: 'fee-collector',
    // Priced only in EUR or by the event's own price
    price: () => undefined,
    description: 'Community base fee',
  },
];
