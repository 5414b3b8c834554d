/**
 * Ajv validation instance with schema validators
 * Every JSON document entering the core is checked against its schema first
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type {
  RawOverrideRequest,
  RawPillarScoresFile,
  RawPolicyConfig,
} from '@/types/payloads';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date, date-time, ...)
addFormats(ajv);

// Lazy-loaded validators
let policyValidator: ValidateFunction<RawPolicyConfig> | null = null;
let overrideRequestValidator: ValidateFunction<RawOverrideRequest> | null = null;
let pillarScoresValidator: ValidateFunction<RawPillarScoresFile> | null = null;

export function getPolicyValidator(): ValidateFunction<RawPolicyConfig> {
  if (!policyValidator) {
    policyValidator = ajv.compile<RawPolicyConfig>(loadSchema('policy.v1'));
  }
  return policyValidator;
}

export function getOverrideRequestValidator(): ValidateFunction<RawOverrideRequest> {
  if (!overrideRequestValidator) {
    overrideRequestValidator = ajv.compile<RawOverrideRequest>(loadSchema('override_request.v1'));
  }
  return overrideRequestValidator;
}

export function getPillarScoresValidator(): ValidateFunction<RawPillarScoresFile> {
  if (!pillarScoresValidator) {
    pillarScoresValidator = ajv.compile<RawPillarScoresFile>(loadSchema('pillar_scores.v1'));
  }
  return pillarScoresValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validatePolicy(data: unknown): ValidationResult<RawPolicyConfig> {
  return runValidator(getPolicyValidator(), data);
}

export function validateOverridePayload(data: unknown): ValidationResult<RawOverrideRequest> {
  return runValidator(getOverrideRequestValidator(), data);
}

export function validatePillarScores(data: unknown): ValidationResult<RawPillarScoresFile> {
  return runValidator(getPillarScoresValidator(), data);
}
