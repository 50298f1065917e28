import type { ParticipantRole } from '@netsettle/core';
import { ParticipantRoleSchema, ValidationError } from '@netsettle/core';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import type { NettingParameters } from '../domain/types.js';

import {
  EnergyCommunityParametersSchema,
  MieterstromParametersSchema,
  USE_CASES,
  UseCaseIdSchema,
  type EnergyCommunityParameters,
  type MieterstromParameters,
  type UseCaseId,
} from './use-case-configs.js';

/**
 * Policy as supplied by a caller: `{ use_case, parameters }`
 */
export const PolicyInputSchema = z
  .object({
    use_case: z.string().min(1),
    parameters: z.record(z.string(), z.unknown()).default({}),
  })
  .strict();

export type PolicyInput = z.input<typeof PolicyInputSchema>;

export type SettlementPolicy =
  | { useCase: 'energy_community'; parameters: EnergyCommunityParameters }
  | { useCase: 'mieterstrom'; parameters: MieterstromParameters };

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Validate a policy against its use case's parameter schema and fill defaults.
 * Unknown use cases and unknown parameter keys are rejected.
 */
export function loadPolicy(input: unknown): Result<SettlementPolicy, ValidationError> {
  const envelope = PolicyInputSchema.safeParse(input);
  if (!envelope.success) {
    return err(new ValidationError(`Invalid policy: ${formatIssues(envelope.error)}`, { field: 'policy' }));
  }

  const useCase = UseCaseIdSchema.safeParse(envelope.data.use_case);
  if (!useCase.success) {
    return err(
      new ValidationError(
        `Unknown use case "${envelope.data.use_case}". Expected one of: ${UseCaseIdSchema.options.join(', ')}`,
        { field: 'use_case', value: envelope.data.use_case }
      )
    );
  }

  switch (useCase.data) {
    case 'energy_community': {
      const parsed = EnergyCommunityParametersSchema.safeParse(envelope.data.parameters);
      if (!parsed.success) {
        return err(invalidParameters(useCase.data, parsed.error));
      }
      return ok({ useCase: 'energy_community', parameters: parsed.data });
    }
    case 'mieterstrom': {
      const parsed = MieterstromParametersSchema.safeParse(envelope.data.parameters);
      if (!parsed.success) {
        return err(invalidParameters(useCase.data, parsed.error));
      }
      return ok({ useCase: 'mieterstrom', parameters: parsed.data });
    }
  }
}

function invalidParameters(useCase: UseCaseId, error: z.ZodError): ValidationError {
  return new ValidationError(`Invalid ${useCase} policy parameters: ${formatIssues(error)}`, {
    field: 'parameters',
    useCase,
  });
}

/**
 * Documented defaults of a use case, as a ready-to-edit policy. The unclassified
 * source treatment has no default and is filled with `external-market` here.
 */
export function getDefaultPolicy(
  useCase: string
): Result<{ parameters: Record<string, unknown>; use_case: UseCaseId }, ValidationError> {
  const policy = loadPolicy({ use_case: useCase, parameters: { unclassified_source_policy: 'external-market' } });
  if (policy.isErr()) {
    return err(policy.error);
  }
  return ok({ use_case: policy.value.useCase, parameters: { ...policy.value.parameters } });
}

export function getUseCaseTitle(useCase: string): Result<string, ValidationError> {
  const parsed = UseCaseIdSchema.safeParse(useCase);
  if (!parsed.success) {
    return err(new ValidationError(`Unknown use case "${useCase}"`, { field: 'use_case', value: useCase }));
  }
  return ok(USE_CASES[parsed.data].title);
}

export function getNettingParameters(policy: SettlementPolicy): NettingParameters {
  const { parameters } = policy;
  const minimumPayoutByRole: Partial<Record<ParticipantRole, Decimal>> = {};
  for (const [role, amount] of Object.entries(parameters.minimum_payout_by_role)) {
    const parsedRole = ParticipantRoleSchema.safeParse(role);
    if (parsedRole.success && amount !== undefined) {
      minimumPayoutByRole[parsedRole.data] = new Decimal(amount);
    }
  }

  return {
    minimumPayout: new Decimal(parameters.minimum_payout),
    minimumPayoutByRole,
    roundingMode: parameters.rounding_mode,
    zeroEpsilon: new Decimal(parameters.zero_epsilon),
  };
}
