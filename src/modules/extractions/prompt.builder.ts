import { EmptyInputError } from '../../common/errors';
import type { ExtractionRequest } from './interfaces';
import type { PromptOptions } from './extractor-options';

const JSON_LAYOUT = `{
  "invoiceNumber": "Invoice number as printed",
  "invoiceDate": "Issue date as YYYY-MM-DD",
  "dueDate": "Due date as YYYY-MM-DD",
  "currency": "ISO currency code (USD, EUR, INR, ...)",
  "vendor": {
    "name": "Vendor name",
    "address": "Vendor address",
    "contact": "Vendor phone or email",
    "taxId": "Vendor tax ID / VAT / GSTIN"
  },
  "customer": {
    "name": "Customer name",
    "address": "Customer address",
    "contact": "Customer phone or email",
    "taxId": "Customer tax ID"
  },
  "lineItems": [
    {
      "description": "Item description",
      "quantity": 0,
      "unitPrice": 0,
      "total": 0
    }
  ],
  "subtotal": 0,
  "taxRate": "Tax rate as printed, e.g. 18%",
  "tax": 0,
  "grandTotal": 0,
  "paymentTerms": "Payment terms"
}`;

function buildAutoPrompt(options: PromptOptions): string {
  const { language } = options;

  return `Analyze this invoice image and extract every field listed below.

IMPORTANT:
- Translate ALL text to ${language}. If the invoice is in another language, translate names, addresses and item descriptions to ${language}.
- Proper names may be transliterated to ${language} characters instead of translated.
- Return ONLY one valid JSON object, without markdown fences or commentary.

RESPONSE FORMAT:
${JSON_LAYOUT}

RULES:
- Use null for any field that does not appear on the invoice. Do not invent data.
- Amounts and quantities are plain numbers with a dot as decimal separator, without currency symbols or thousands separators.
- List every line item in the order it appears on the invoice.
- Dates use the YYYY-MM-DD format.`;
}

function buildQuestionPrompt(question: string, options: PromptOptions): string {
  return `Answer the question below using only the content of this invoice image.
Translate any text you quote to ${options.language}. If the invoice does not contain the answer, say so.

QUESTION:
${question}`;
}

export function buildPrompt(request: ExtractionRequest, options: PromptOptions): string {
  if (request.mode === 'auto') {
    return buildAutoPrompt(options);
  }

  const question = request.question?.trim() ?? '';
  if (!question) {
    throw new EmptyInputError('A question is required in question mode');
  }

  return buildQuestionPrompt(question, options);
}

const nullable = (type: string | string[]) => ({
  type: [...(Array.isArray(type) ? type : [type]), 'null'],
});

const partySchema = () => ({
  type: 'object',
  properties: {
    name: nullable('string'),
    address: nullable('string'),
    contact: nullable('string'),
    taxId: nullable('string'),
  },
  required: ['name', 'address', 'contact', 'taxId'],
  additionalProperties: false,
});

/**
 * Strict JSON schema for the auto-mode response format.
 */
export function buildExtractionSchema(): Record<string, unknown> {
  return {
    type: 'object',
    properties: {
      invoiceNumber: nullable('string'),
      invoiceDate: nullable('string'),
      dueDate: nullable('string'),
      currency: nullable('string'),
      vendor: partySchema(),
      customer: partySchema(),
      lineItems: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            description: nullable('string'),
            quantity: nullable(['number', 'string']),
            unitPrice: nullable(['number', 'string']),
            total: nullable(['number', 'string']),
          },
          required: ['description', 'quantity', 'unitPrice', 'total'],
          additionalProperties: false,
        },
      },
      subtotal: nullable(['number', 'string']),
      taxRate: nullable('string'),
      tax: nullable(['number', 'string']),
      grandTotal: nullable(['number', 'string']),
      paymentTerms: nullable('string'),
    },
    required: [
      'invoiceNumber',
      'invoiceDate',
      'dueDate',
      'currency',
      'vendor',
      'customer',
      'lineItems',
      'subtotal',
      'taxRate',
      'tax',
      'grandTotal',
      'paymentTerms',
    ],
    additionalProperties: false,
  };
}
