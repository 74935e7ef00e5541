import { CellValue, Field } from './field';

// Property name -> column name used by the extraction service.
export const HEADER_COLUMNS = {
  invoiceNumber: 'invoice_number',
  invoiceDate: 'invoice_date',
  placeOfSupply: 'place_of_supply',
  placeOfOrigin: 'place_of_origin',
  receiverName: 'receiver_name',
  gstinSupplier: 'gstin_supplier',
  taxableValue: 'taxable_value',
  invoiceValue: 'invoice_value',
  taxAmount: 'tax_amount',
} as const;

export const LINE_ITEM_COLUMNS = {
  quantity: 'quantity',
  ratePerItemAfterDiscount: 'rate_per_item_after_discount',
  taxableValue: 'taxable_value',
  sgstAmount: 'sgst_amount',
  cgstAmount: 'cgst_amount',
  igstAmount: 'igst_amount',
  sgstRate: 'sgst_rate',
  cgstRate: 'cgst_rate',
  igstRate: 'igst_rate',
  taxAmount: 'tax_amount',
  taxRate: 'tax_rate',
  finalAmount: 'final_amount',
} as const;

export const SUMMARY_COLUMNS = {
  totalTaxableValue: 'total_taxable_value',
  totalCgstAmount: 'total_cgst_amount',
  totalSgstAmount: 'total_sgst_amount',
  totalIgstAmount: 'total_igst_amount',
  totalTaxAmount: 'total_tax_amount',
  totalInvoiceValue: 'total_invoice_value',
  roundingAdjustment: 'rounding_adjustment',
} as const;

export type HeaderField = keyof typeof HEADER_COLUMNS;
export type LineItemField = keyof typeof LINE_ITEM_COLUMNS;
export type SummaryField = keyof typeof SUMMARY_COLUMNS;

// Schema order of each collection, used for reporting and coercion order.
export const HEADER_FIELD_ORDER: readonly HeaderField[] = [
  'invoiceNumber',
  'invoiceDate',
  'placeOfSupply',
  'placeOfOrigin',
  'receiverName',
  'gstinSupplier',
  'taxableValue',
  'invoiceValue',
  'taxAmount',
];

export const LINE_ITEM_FIELD_ORDER: readonly LineItemField[] = [
  'quantity',
  'ratePerItemAfterDiscount',
  'taxableValue',
  'sgstAmount',
  'cgstAmount',
  'igstAmount',
  'sgstRate',
  'cgstRate',
  'igstRate',
  'taxAmount',
  'taxRate',
  'finalAmount',
];

export const SUMMARY_FIELD_ORDER: readonly SummaryField[] = [
  'totalTaxableValue',
  'totalCgstAmount',
  'totalSgstAmount',
  'totalIgstAmount',
  'totalTaxAmount',
  'totalInvoiceValue',
  'roundingAdjustment',
];

export enum CollectionName {
  INVOICE_DETAILS = 'invoice_details',
  LINE_ITEMS = 'line_items',
  TOTAL_SUMMARY = 'total_summary',
}

/** A row as delivered by the extraction service: column name to raw cell. */
export type RawRow = Record<string, CellValue | null | undefined>;

export interface RawInvoiceDocument {
  invoiceDetails: RawRow[];
  lineItems: RawRow[];
  totalSummary: RawRow[];
}

export type NormalizedRecord<K extends string> = Record<K, Field<CellValue>>;

export interface NormalizedInvoiceDocument {
  invoiceDetails: NormalizedRecord<HeaderField>[];
  lineItems: NormalizedRecord<LineItemField>[];
  totalSummary: NormalizedRecord<SummaryField>[];
}

export interface InvoiceHeader {
  invoiceNumber: Field<string>;
  invoiceDate: Field<Date>;
  placeOfSupply: Field<number>;
  placeOfOrigin: Field<number>;
  receiverName: Field<string>;
  gstinSupplier: Field<string>;
  taxableValue: Field<number>;
  invoiceValue: Field<number>;
  taxAmount: Field<number>;
}

export type LineItem = Record<LineItemField, Field<number>>;

export type SummaryTotals = Record<SummaryField, Field<number>>;

export interface InvoiceDocument {
  invoiceDetails: InvoiceHeader[];
  lineItems: LineItem[];
  totalSummary: SummaryTotals[];
}
