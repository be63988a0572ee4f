/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for the FundRecord output contract.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

const FUND_RECORD_SCHEMA = 'fund_record.schema.json';

// Schema loading - lazy loaded on first use
let fundRecordSchema: object | null = null;
let fundRecordValidator: ValidateFunction | null = null;

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

function loadSchema(schemaName: string): object {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to compiled output (dist/packages/shared/src)
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      if (isObject(parsed)) {
        return parsed;
      }
    }
  }

  // Return a permissive schema if file not found
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getFundRecordSchema(): object {
  if (!fundRecordSchema) {
    fundRecordSchema = loadSchema(FUND_RECORD_SCHEMA);
  }
  return fundRecordSchema;
}

function getFundRecordValidator(): ValidateFunction {
  if (!fundRecordValidator) {
    fundRecordValidator = ajv.compile(getFundRecordSchema());
  }
  return fundRecordValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate a FundRecord against fund_record.schema.json
 */
export function validateFundRecord(data: unknown): ValidationResult {
  const validate = getFundRecordValidator();
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('FundRecord validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

// Re-export schemas for consumers that publish the contract
export const schemas = {
  get fundRecord() {
    return getFundRecordSchema();
  },
};
