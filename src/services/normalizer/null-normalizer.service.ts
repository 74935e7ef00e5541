import { Injectable } from '@nestjs/common';
import { ABSENT, CellValue, Field, present } from '../../models/field';
import {
  HEADER_COLUMNS,
  HeaderField,
  LINE_ITEM_COLUMNS,
  LineItemField,
  NormalizedInvoiceDocument,
  NormalizedRecord,
  RawInvoiceDocument,
  RawRow,
  SUMMARY_COLUMNS,
  SummaryField,
} from '../../models/invoice-document';

const NULL_LIKE_STRINGS = new Set(['nan', 'null', 'none']);

/**
 * Maps every null-like cell to the absent marker. Values are otherwise
 * passed through untouched, including whitespace-only strings.
 */
export function normalizeCell(value: CellValue | null | undefined): Field<CellValue> {
  if (value === null || value === undefined) return ABSENT;
  if (typeof value === 'number' && Number.isNaN(value)) return ABSENT;
  if (typeof value === 'string' && (value === '' || NULL_LIKE_STRINGS.has(value.toLowerCase()))) {
    return ABSENT;
  }
  return present(value);
}

@Injectable()
export class NullNormalizerService {
  normalizeDocument(raw: RawInvoiceDocument): NormalizedInvoiceDocument {
    return {
      invoiceDetails: raw.invoiceDetails.map(row => this.normalizeHeader(row)),
      lineItems: raw.lineItems.map(row => this.normalizeLineItem(row)),
      totalSummary: raw.totalSummary.map(row => this.normalizeSummary(row)),
    };
  }

  normalizeHeader(row: RawRow): NormalizedRecord<HeaderField> {
    const cell = (column: string) => normalizeCell(row[column]);
    return {
      invoiceNumber: cell(HEADER_COLUMNS.invoiceNumber),
      invoiceDate: cell(HEADER_COLUMNS.invoiceDate),
      placeOfSupply: cell(HEADER_COLUMNS.placeOfSupply),
      placeOfOrigin: cell(HEADER_COLUMNS.placeOfOrigin),
      receiverName: cell(HEADER_COLUMNS.receiverName),
      gstinSupplier: cell(HEADER_COLUMNS.gstinSupplier),
      taxableValue: cell(HEADER_COLUMNS.taxableValue),
      invoiceValue: cell(HEADER_COLUMNS.invoiceValue),
      taxAmount: cell(HEADER_COLUMNS.taxAmount),
    };
  }

  normalizeLineItem(row: RawRow): NormalizedRecord<LineItemField> {
    const cell = (column: string) => normalizeCell(row[column]);
    return {
      quantity: cell(LINE_ITEM_COLUMNS.quantity),
      ratePerItemAfterDiscount: cell(LINE_ITEM_COLUMNS.ratePerItemAfterDiscount),
      taxableValue: cell(LINE_ITEM_COLUMNS.taxableValue),
      sgstAmount: cell(LINE_ITEM_COLUMNS.sgstAmount),
      cgstAmount: cell(LINE_ITEM_COLUMNS.cgstAmount),
      igstAmount: cell(LINE_ITEM_COLUMNS.igstAmount),
      sgstRate: cell(LINE_ITEM_COLUMNS.sgstRate),
      cgstRate: cell(LINE_ITEM_COLUMNS.cgstRate),
      igstRate: cell(LINE_ITEM_COLUMNS.igstRate),
      taxAmount: cell(LINE_ITEM_COLUMNS.taxAmount),
      taxRate: cell(LINE_ITEM_COLUMNS.taxRate),
      finalAmount: cell(LINE_ITEM_COLUMNS.finalAmount),
    };
  }

  normalizeSummary(row: RawRow): NormalizedRecord<SummaryField> {
    const cell = (column: string) => normalizeCell(row[column]);
    return {
      totalTaxableValue: cell(SUMMARY_COLUMNS.totalTaxableValue),
      totalCgstAmount: cell(SUMMARY_COLUMNS.totalCgstAmount),
      totalSgstAmount: cell(SUMMARY_COLUMNS.totalSgstAmount),
      totalIgstAmount: cell(SUMMARY_COLUMNS.totalIgstAmount),
      totalTaxAmount: cell(SUMMARY_COLUMNS.totalTaxAmount),
      totalInvoiceValue: cell(SUMMARY_COLUMNS.totalInvoiceValue),
      roundingAdjustment: cell(SUMMARY_COLUMNS.roundingAdjustment),
    };
  }
}
