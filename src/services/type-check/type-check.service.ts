import { Injectable } from '@nestjs/common';
import { isValid, parse } from 'date-fns';
import { ABSENT, CellValue, Field, present } from '../../models/field';
import {
  CollectionName,
  HEADER_COLUMNS,
  HEADER_FIELD_ORDER,
  HeaderField,
  InvoiceDocument,
  InvoiceHeader,
  LINE_ITEM_COLUMNS,
  LINE_ITEM_FIELD_ORDER,
  LineItem,
  LineItemField,
  NormalizedInvoiceDocument,
  NormalizedRecord,
  SUMMARY_COLUMNS,
  SUMMARY_FIELD_ORDER,
  SummaryField,
  SummaryTotals,
} from '../../models/invoice-document';
import { TypeCoercionViolation } from '../../models/validation-result';
import { ViolationCollector } from '../invoice-validation/violation-collector';

export const INVOICE_DATE_FORMAT = 'd-MMM-yy';
export const INVOICE_DATE_FORMAT_LABEL = 'DD-Mon-YY';

// Two-digit years resolve within 2019 +/- 50: 00-68 -> 2000-2068, 69-99 -> 1969-1999.
const TWO_DIGIT_YEAR_REFERENCE = new Date(2019, 0, 1);

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const COLLECTION_RANK: Record<CollectionName, number> = {
  [CollectionName.INVOICE_DETAILS]: 0,
  [CollectionName.LINE_ITEMS]: 1,
  [CollectionName.TOTAL_SUMMARY]: 2,
};

export function parseInvoiceDate(value: CellValue): Date | undefined {
  if (typeof value !== 'string') return undefined;
  const date = parse(value, INVOICE_DATE_FORMAT, TWO_DIGIT_YEAR_REFERENCE);
  return isValid(date) ? date : undefined;
}

/**
 * Plain decimal literals only: no thousands separators, currency symbols,
 * booleans or non-finite values.
 */
export function parseDecimal(value: CellValue): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value !== 'string') return undefined;

  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return undefined;

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

interface CellPosition {
  collection: CollectionName;
  column: string;
  columnRank: number;
  rowIndex: number;
}

interface PendingViolation {
  rank: [number, number, number];
  violation: TypeCoercionViolation;
}

/**
 * Coercion runs row by row but failures are reported column by column, the
 * order a column-wise conversion would hit them.
 */
class CoercionFailures {
  private readonly pending: PendingViolation[] = [];

  add(position: CellPosition, rawValue: CellValue, reason: string): void {
    const raw = String(rawValue);
    this.pending.push({
      rank: [COLLECTION_RANK[position.collection], position.columnRank, position.rowIndex],
      violation: {
        kind: 'type-coercion',
        collection: position.collection,
        rowIndex: position.rowIndex,
        field: position.column,
        rawValue: raw,
        message:
          `Data type conversion failed: Unable to parse "${raw}" as ${reason} ` +
          `in ${position.collection}.${position.column} at row ${position.rowIndex}`,
      },
    });
  }

  flushInto(collector: ViolationCollector): void {
    const ordered = [...this.pending].sort((a, b) =>
      a.rank[0] - b.rank[0] || a.rank[1] - b.rank[1] || a.rank[2] - b.rank[2],
    );
    for (const { violation } of ordered) {
      if (collector.add(violation)) return;
    }
  }
}

@Injectable()
export class TypeCheckService {
  /**
   * Produces the typed document. Cells that fail to coerce come back absent
   * and are reported through the collector.
   */
  coerce(document: NormalizedInvoiceDocument, collector: ViolationCollector): InvoiceDocument {
    const failures = new CoercionFailures();

    const typed: InvoiceDocument = {
      invoiceDetails: document.invoiceDetails.map((row, rowIndex) => this.coerceHeader(row, rowIndex, failures)),
      lineItems: document.lineItems.map((row, rowIndex) => this.coerceLineItem(row, rowIndex, failures)),
      totalSummary: document.totalSummary.map((row, rowIndex) => this.coerceSummary(row, rowIndex, failures)),
    };

    failures.flushInto(collector);
    return typed;
  }

  private coerceHeader(
    row: NormalizedRecord<HeaderField>,
    rowIndex: number,
    failures: CoercionFailures,
  ): InvoiceHeader {
    const position = (field: HeaderField): CellPosition => ({
      collection: CollectionName.INVOICE_DETAILS,
      column: HEADER_COLUMNS[field],
      // The date column is converted before the numeric ones.
      columnRank: field === 'invoiceDate' ? -1 : HEADER_FIELD_ORDER.indexOf(field),
      rowIndex,
    });
    const num = (field: HeaderField) => this.toNumber(row[field], position(field), failures);

    return {
      invoiceNumber: this.toText(row.invoiceNumber),
      invoiceDate: this.toDate(row.invoiceDate, position('invoiceDate'), failures),
      placeOfSupply: num('placeOfSupply'),
      placeOfOrigin: num('placeOfOrigin'),
      receiverName: this.toText(row.receiverName),
      gstinSupplier: this.toText(row.gstinSupplier),
      taxableValue: num('taxableValue'),
      invoiceValue: num('invoiceValue'),
      taxAmount: num('taxAmount'),
    };
  }

  private coerceLineItem(
    row: NormalizedRecord<LineItemField>,
    rowIndex: number,
    failures: CoercionFailures,
  ): LineItem {
    const num = (field: LineItemField) =>
      this.toNumber(
        row[field],
        {
          collection: CollectionName.LINE_ITEMS,
          column: LINE_ITEM_COLUMNS[field],
          columnRank: LINE_ITEM_FIELD_ORDER.indexOf(field),
          rowIndex,
        },
        failures,
      );

    return {
      quantity: num('quantity'),
      ratePerItemAfterDiscount: num('ratePerItemAfterDiscount'),
      taxableValue: num('taxableValue'),
      sgstAmount: num('sgstAmount'),
      cgstAmount: num('cgstAmount'),
      igstAmount: num('igstAmount'),
      sgstRate: num('sgstRate'),
      cgstRate: num('cgstRate'),
      igstRate: num('igstRate'),
      taxAmount: num('taxAmount'),
      taxRate: num('taxRate'),
      finalAmount: num('finalAmount'),
    };
  }

  private coerceSummary(
    row: NormalizedRecord<SummaryField>,
    rowIndex: number,
    failures: CoercionFailures,
  ): SummaryTotals {
    const num = (field: SummaryField) =>
      this.toNumber(
        row[field],
        {
          collection: CollectionName.TOTAL_SUMMARY,
          column: SUMMARY_COLUMNS[field],
          columnRank: SUMMARY_FIELD_ORDER.indexOf(field),
          rowIndex,
        },
        failures,
      );

    return {
      totalTaxableValue: num('totalTaxableValue'),
      totalCgstAmount: num('totalCgstAmount'),
      totalSgstAmount: num('totalSgstAmount'),
      totalIgstAmount: num('totalIgstAmount'),
      totalTaxAmount: num('totalTaxAmount'),
      totalInvoiceValue: num('totalInvoiceValue'),
      roundingAdjustment: num('roundingAdjustment'),
    };
  }

  private toNumber(field: Field<CellValue>, position: CellPosition, failures: CoercionFailures): Field<number> {
    if (!field.present) return ABSENT;

    const value = parseDecimal(field.value);
    if (value === undefined) {
      failures.add(position, field.value, 'a number');
      return ABSENT;
    }
    return present(value);
  }

  private toDate(field: Field<CellValue>, position: CellPosition, failures: CoercionFailures): Field<Date> {
    if (!field.present) return ABSENT;

    const value = parseInvoiceDate(field.value);
    if (value === undefined) {
      failures.add(position, field.value, `a date in format ${INVOICE_DATE_FORMAT_LABEL}`);
      return ABSENT;
    }
    return present(value);
  }

  private toText(field: Field<CellValue>): Field<string> {
    return field.present ? present(String(field.value)) : ABSENT;
  }
}
