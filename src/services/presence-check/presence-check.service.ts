import { Injectable } from '@nestjs/common';
import { CellValue, Field } from '../../models/field';
import {
  CollectionName,
  HEADER_COLUMNS,
  HEADER_FIELD_ORDER,
  HeaderField,
  LineItemField,
  NormalizedInvoiceDocument,
  NormalizedRecord,
  SummaryField,
} from '../../models/invoice-document';
import { ViolationCollector } from '../invoice-validation/violation-collector';

type Row<K extends string> = NormalizedRecord<K>;

const has = (field: Field<CellValue>): boolean => field.present;

export function isHeaderComplete(row: Row<HeaderField>): boolean {
  return (
    has(row.invoiceNumber) &&
    has(row.invoiceDate) &&
    has(row.placeOfSupply) &&
    has(row.placeOfOrigin) &&
    has(row.receiverName) &&
    has(row.gstinSupplier) &&
    (has(row.taxableValue) || has(row.invoiceValue)) &&
    has(row.taxAmount)
  );
}

export function hasLineItemTax(row: Row<LineItemField>): boolean {
  return (
    has(row.taxAmount) ||
    has(row.taxRate) ||
    (has(row.sgstAmount) && has(row.cgstAmount)) ||
    has(row.igstAmount) ||
    (has(row.sgstRate) && has(row.cgstRate)) ||
    has(row.igstRate)
  );
}

export function hasLineItemValue(row: Row<LineItemField>): boolean {
  return (
    has(row.finalAmount) ||
    has(row.taxableValue) ||
    (has(row.ratePerItemAfterDiscount) && has(row.quantity))
  );
}

export function isLineItemComplete(row: Row<LineItemField>): boolean {
  return hasLineItemTax(row) && hasLineItemValue(row);
}

export function isSummaryComplete(row: Row<SummaryField>): boolean {
  return (
    (has(row.totalTaxableValue) || has(row.totalInvoiceValue)) &&
    (has(row.totalTaxAmount) ||
      has(row.totalIgstAmount) ||
      (has(row.totalCgstAmount) && has(row.totalSgstAmount)))
  );
}

/** Column names of every absent header field at the row, in schema order. */
export function missingHeaderColumns(row: Row<HeaderField>): string[] {
  return HEADER_FIELD_ORDER
    .filter(field => !has(row[field]))
    .map(field => HEADER_COLUMNS[field]);
}

@Injectable()
export class PresenceCheckService {
  /** Header rows first, then line items, then summary rows. */
  check(document: NormalizedInvoiceDocument, collector: ViolationCollector): void {
    if (!this.checkHeader(document, collector)) return;
    if (!this.checkRows(document.lineItems, isLineItemComplete, CollectionName.LINE_ITEMS, collector)) return;
    this.checkRows(document.totalSummary, isSummaryComplete, CollectionName.TOTAL_SUMMARY, collector);
  }

  private checkHeader(document: NormalizedInvoiceDocument, collector: ViolationCollector): boolean {
    for (const [rowIndex, row] of document.invoiceDetails.entries()) {
      if (isHeaderComplete(row)) continue;

      const missingFields = missingHeaderColumns(row);
      const stop = collector.add({
        kind: 'missing-field',
        collection: CollectionName.INVOICE_DETAILS,
        rowIndex,
        missingFields,
        message: `Missing required values in ${CollectionName.INVOICE_DETAILS}: ${missingFields.join(', ')} at row ${rowIndex}`,
      });
      if (stop) return false;
    }
    return true;
  }

  private checkRows<K extends string>(
    rows: Row<K>[],
    isComplete: (row: Row<K>) => boolean,
    collection: CollectionName,
    collector: ViolationCollector,
  ): boolean {
    for (const [rowIndex, row] of rows.entries()) {
      if (isComplete(row)) continue;

      const stop = collector.add({
        kind: 'missing-field',
        collection,
        rowIndex,
        message: `Missing required values in ${collection} at row ${rowIndex}`,
      });
      if (stop) return false;
    }
    return true;
  }
}
