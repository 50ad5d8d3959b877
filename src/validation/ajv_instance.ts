/**
 * Ajv validation instance with schema validators
 * Config files on disk must validate before the pipeline uses them
 */

import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { InstrumentProfile } from '@/instruments/types';
import type { MacroReferenceData } from '@/macro/types';

const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

addFormats(ajv);

let profileValidator: ValidateFunction<InstrumentProfile> | null = null;
let macroReferenceValidator: ValidateFunction<MacroReferenceData> | null = null;

export function getProfileValidator(): ValidateFunction<InstrumentProfile> {
  if (!profileValidator) {
    profileValidator = ajv.compile<InstrumentProfile>(loadSchema('instrument_profile.v1'));
  }
  return profileValidator;
}

export function getMacroReferenceValidator(): ValidateFunction<MacroReferenceData> {
  if (!macroReferenceValidator) {
    macroReferenceValidator = ajv.compile<MacroReferenceData>(loadSchema('macro_reference.v1'));
  }
  return macroReferenceValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateInstrumentProfile(data: unknown): ValidationResult<InstrumentProfile> {
  return runValidator(getProfileValidator(), data);
}

export function validateMacroReference(data: unknown): ValidationResult<MacroReferenceData> {
  return runValidator(getMacroReferenceValidator(), data);
}
