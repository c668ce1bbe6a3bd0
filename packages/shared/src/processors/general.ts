import type { DocumentProcessor } from './types';

/**
 * Generic invoices and receipts; no kind-specific refinement.
 */
export const generalProcessor: DocumentProcessor = {
  kind: 'fallback_general',
  description: 'Generic invoices, receipts and letters',
};
