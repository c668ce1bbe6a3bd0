/**
 * Utility invoices (electricity, gas, water).
 */

import {
  createExtractedField,
  getField,
  withField,
  type ExtractionResult,
} from '../extraction';
import { normalizeNumber } from '../normalization';
import type { DocumentProcessor } from './types';

const PLAIN_NUMBER = /^-?\d+(\.\d+)?$/;

/**
 * Run a consumption field through number normalization so no unit survives.
 * Values already in plain decimal form are left as they are.
 */
function cleanConsumption(extraction: ExtractionResult, fieldName: string): ExtractionResult {
  const field = getField(extraction, fieldName);
  if (!field || !field.normalizedValue || PLAIN_NUMBER.test(field.normalizedValue)) {
    return extraction;
  }
  return withField(
    extraction,
    createExtractedField({ ...field, normalizedValue: normalizeNumber(field.normalizedValue) })
  );
}

function formatContractPower(extraction: ExtractionResult): ExtractionResult {
  const field = getField(extraction, 'contract_power');
  if (!field || !field.rawValue || !field.normalizedValue) {
    return extraction;
  }
  if (field.rawValue.toLowerCase().includes('kva')) {
    return extraction;
  }
  return withField(
    extraction,
    createExtractedField({ ...field, normalizedValue: `${field.normalizedValue} kVA` })
  );
}

export const energyProcessor: DocumentProcessor = {
  kind: 'utilities_energy',
  description: 'Electricity and gas invoices',
  postProcess: (extraction) => formatContractPower(cleanConsumption(extraction, 'consumption_kwh')),
};

export const waterProcessor: DocumentProcessor = {
  kind: 'utilities_water',
  description: 'Water invoices',
  postProcess: (extraction) => cleanConsumption(extraction, 'consumption_vol'),
};
