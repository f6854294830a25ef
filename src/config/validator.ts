import Joi from 'joi';
import { ConfigError } from '../provisioning/errors.js';
import { DEFAULT_DISPLAY_NAME_PARAMETER } from './settings.js';
import { CatalogFile, ConfigValidationResult } from './types.js';

// Joi schema for a single parameter override
const parameterSchema = Joi.object({
  ParameterKey: Joi.string()
    .required()
    .min(1)
    .max(255)
    .messages({
      'any.required': 'ParameterKey is required for every parameter override',
      'string.base': 'ParameterKey must be a string'
    }),
  ParameterValue: Joi.string()
    .required()
    .allow('')
    .messages({
      'any.required': 'ParameterValue is required for every parameter override',
      'string.base': 'ParameterValue must be a string'
    })
});

// Joi schema for DeploymentTarget
const targetSchema = Joi.object({
  accountId: Joi.string()
    .required()
    .pattern(/^\d{12}$/)
    .messages({
      'string.base': 'Account ID must be a quoted 12-digit string',
      'string.pattern.base': 'Account ID must be exactly 12 digits',
      'any.required': 'Account ID is required for every target'
    }),
  regions: Joi.array()
    .items(
      Joi.string()
        .pattern(/^[a-z]{2}(-[a-z]+)+-\d$/)
        .messages({
          'string.pattern.base': 'Region must be a valid region identifier (e.g., us-east-1)'
        })
    )
    .min(1)
    .unique()
    .required()
    .messages({
      'any.required': 'Every target needs a regions list',
      'array.min': 'Every target needs at least one region',
      'array.unique': 'Regions must not repeat within a target'
    }),
  parameters: Joi.array()
    .items(parameterSchema)
    .unique('ParameterKey')
    .default([])
    .messages({
      'array.unique': 'Parameter keys must be unique within a target'
    })
});

// Joi schema for operation preferences
const operationPreferencesSchema = Joi.object({
  maxConcurrentCount: Joi.number().integer().min(1).optional(),
  failureToleranceCount: Joi.number().integer().min(0).optional(),
  regionConcurrencyType: Joi.string()
    .valid('SEQUENTIAL', 'PARALLEL')
    .optional()
    .messages({
      'any.only': 'Region concurrency type must be SEQUENTIAL or PARALLEL'
    })
});

const durationMs = () => Joi.number().integer().min(0).max(3_600_000);

// Joi schema for RolloutSettings overrides
const rolloutSettingsSchema = Joi.object({
  pollIntervalMs: durationMs(),
  definitionPollIntervalMs: durationMs(),
  maxPollAttempts: Joi.number().integer().min(1).max(1000),
  conflictBackoffMs: durationMs(),
  writeConflictBackoffMs: durationMs(),
  interStepPauseMs: durationMs(),
  failureBackoffMs: durationMs(),
  maxTargetAttempts: Joi.number().integer().min(1),
  maxConsecutiveReadFailures: Joi.number().integer().min(0),
  capabilities: Joi.array()
    .items(Joi.string().valid('CAPABILITY_IAM', 'CAPABILITY_NAMED_IAM', 'CAPABILITY_AUTO_EXPAND'))
    .unique()
    .messages({
      'any.only': 'Capabilities must be CAPABILITY_IAM, CAPABILITY_NAMED_IAM or CAPABILITY_AUTO_EXPAND'
    }),
  operationPreferences: operationPreferencesSchema
});

// Main catalog schema
const catalogSchema = Joi.object<CatalogFile>({
  displayNameParameter: Joi.string()
    .min(1)
    .default(DEFAULT_DISPLAY_NAME_PARAMETER),
  accounts: Joi.array()
    .items(targetSchema)
    .min(1)
    .unique('accountId')
    .required()
    .messages({
      'array.min': 'The catalog must list at least one account',
      'array.unique': 'Account IDs must be unique in the catalog'
    }),
  rollout: rolloutSettingsSchema.optional()
}).unknown(false);

/**
 * Every target must carry the display-name parameter exactly once
 */
function checkDisplayNames(catalog: CatalogFile): string[] {
  const errors: string[] = [];
  for (const account of catalog.accounts) {
    const count = account.parameters.filter(p => p.ParameterKey === catalog.displayNameParameter).length;
    if (count !== 1) {
      errors.push(`Account ${account.accountId} must have exactly one "${catalog.displayNameParameter}" parameter`);
    }
  }
  return errors;
}

/**
 * Validates a target catalog against the schema
 * @param config - The parsed catalog file
 * @returns ConfigValidationResult with validation status, any errors and,
 * when the schema accepts the file, the catalog with defaults applied
 */
export function validateCatalog(config: unknown): ConfigValidationResult {
  const { error, value } = catalogSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });

  if (error) {
    return { valid: false, errors: error.details.map(detail => detail.message) };
  }

  const errors = checkDisplayNames(value);
  return {
    valid: errors.length === 0,
    errors,
    catalog: value
  };
}

/**
 * Validates a target catalog and applies schema defaults
 * @throws ConfigError if validation fails
 */
export function validateAndNormalizeCatalog(config: unknown): CatalogFile {
  const { valid, errors, catalog } = validateCatalog(config);
  if (!valid || !catalog) {
    throw new ConfigError('Catalog validation failed', errors);
  }
  return catalog;
}
