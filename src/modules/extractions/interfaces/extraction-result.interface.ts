export type ExtractionMode = 'auto' | 'question';

export const EXTRACTION_MODES: readonly ExtractionMode[] = ['auto', 'question'];

export interface Party {
  readonly name: string | null;
  readonly address: string | null;
  readonly contact: string | null;
  readonly taxId: string | null;
}

export interface LineItem {
  readonly description: string;
  readonly quantity: number | null;
  readonly unitPrice: number | null;
  readonly total: number | null;
}

export interface InvoiceFields {
  readonly invoiceNumber: string | null;
  readonly invoiceDate: string | null;
  readonly dueDate: string | null;
  readonly currency: string | null;
  readonly vendor: Party;
  readonly customer: Party;
  readonly lineItems: readonly LineItem[];
  readonly subtotal: number | null;
  readonly taxRate: string | null;
  readonly tax: number | null;
  readonly grandTotal: number | null;
  readonly paymentTerms: string | null;
}

export interface StructuredExtraction {
  readonly kind: 'structured';
  readonly mode: 'auto';
  readonly extractedAt: string;
  readonly invoice: InvoiceFields;
}

/**
 * Free-text result. `unstructured` marks an auto-mode response that could not
 * be read as invoice fields; question-mode answers leave it false.
 */
export interface AnswerExtraction {
  readonly kind: 'answer';
  readonly mode: ExtractionMode;
  readonly extractedAt: string;
  readonly rawAnswer: string;
  readonly unstructured: boolean;
}

export type ExtractionResult = StructuredExtraction | AnswerExtraction;

export interface ExtractionRequest {
  mode: ExtractionMode;
  question?: string;
}
