export * from './domain/types.js';
export { classifySource, normalizeSource } from './aggregation/source-classifier.js';
export { decodeEventKind, decodeParticipantRole } from './aggregation/decoders.js';
export { aggregateEvents, compareEvents, isInWindow, validateWindow } from './aggregation/event-aggregator.js';
export {
  EnergyCommunityParametersSchema,
  MieterstromParametersSchema,
  USE_CASE_CONSTANTS,
  USE_CASE_IDS,
  USE_CASES,
  UseCaseIdSchema,
  type EnergyCommunityParameters,
  type MieterstromParameters,
  type UseCaseDefinition,
  type UseCaseId,
} from './policy/use-case-configs.js';
export {
  getDefaultPolicy,
  getNettingParameters,
  getUseCaseTitle,
  loadPolicy,
  PolicyInputSchema,
  type PolicyInput,
  type SettlementPolicy,
} from './policy/policy-loader.js';
export {
  ENERGY_COMMUNITY_RULES,
  MIETERSTROM_RULES,
  NON_MONETARY_KINDS,
  type SettlementRule,
} from './policy/rule-tables.js';
export { createCounterpartyResolver, SYNTHETIC_PARTICIPANTS, type CounterpartyResolver } from './policy/counterparties.js';
export { evaluateEvent, evaluatePolicy, type EventEvaluation } from './policy/policy-evaluator.js';
export { buildBalances } from './balances/balance-builder.js';
export { applyBilateralNetting } from './netting/netting-engine.js';
export { checkConservation } from './netting/conservation.js';
export {
  canonicalJson,
  canonicalLinePayload,
  computeProofHash,
  verifyProofHash,
  type ProofHashInput,
} from './proof/proof-hash.js';
export { buildExplanation, UNKNOWN_PARTICIPANT_NAME } from './audit/explanation-builder.js';
export {
  buildLineDescription,
  SettlementService,
  type ParticipantPosition,
  type SettlementExecution,
  type SettlementPreview,
  type SettlementRequest,
} from './services/settlement-service.js';
export { AuditService, type AuditLine, type AuditOptions, type AuditPayload } from './services/audit-service.js';
export {
  DEFAULT_PARTICIPANT_ROLE,
  IngestionService,
  UsageEventInputSchema,
  type IngestionSummary,
  type UsageEventInput,
} from './services/ingestion-service.js';
