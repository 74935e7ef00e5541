import { Injectable } from '@nestjs/common';
import { allPresent } from '../../models/field';
import {
  CollectionName,
  InvoiceDocument,
  InvoiceHeader,
  LineItem,
  SummaryTotals,
} from '../../models/invoice-document';
import { ReconciliationRelation } from '../../models/validation-result';
import { ViolationCollector } from '../invoice-validation/violation-collector';
import { isClose } from './tolerance';

/** A derived quantity that either resolves or does not apply to the row. */
export type Resolution =
  | { kind: 'resolved'; value: number }
  | { kind: 'not-applicable' };

const NOT_APPLICABLE: Resolution = { kind: 'not-applicable' };

const resolved = (value: number): Resolution => ({ kind: 'resolved', value });

/** taxable_value, else rate_per_item_after_discount x quantity. */
export function resolveBaseValue(item: LineItem): Resolution {
  if (item.taxableValue.present) return resolved(item.taxableValue.value);

  const parts = allPresent(item.ratePerItemAfterDiscount, item.quantity);
  return parts ? resolved(parts[0] * parts[1]) : NOT_APPLICABLE;
}

/**
 * Independent tax figures for a line, in a fixed order: component amounts,
 * component rates, tax amount, tax rate. A figure is left out when any of
 * its inputs is absent.
 */
export function taxEstimates(item: LineItem, baseValue: number): number[] {
  const estimates: number[] = [];

  const amounts = allPresent(item.sgstAmount, item.cgstAmount, item.igstAmount);
  if (amounts) {
    const [sgst, cgst, igst] = amounts;
    estimates.push(sgst + cgst + igst);
  }

  const rates = allPresent(item.sgstRate, item.cgstRate, item.igstRate);
  if (rates) {
    const [sgst, cgst, igst] = rates;
    estimates.push((baseValue * (sgst + cgst + igst)) / 100);
  }

  if (item.taxAmount.present) {
    estimates.push(item.taxAmount.value);
  }

  if (item.taxRate.present) {
    estimates.push((baseValue * item.taxRate.value) / 100);
  }

  return estimates;
}

/**
 * total_tax_amount, else the sum of all three component totals. When
 * neither is available the row's invoice total check does not apply.
 */
export function resolveTotalTax(row: SummaryTotals): Resolution {
  if (row.totalTaxAmount.present) return resolved(row.totalTaxAmount.value);

  const components = allPresent(row.totalCgstAmount, row.totalSgstAmount, row.totalIgstAmount);
  if (!components) return NOT_APPLICABLE;

  const [cgst, sgst, igst] = components;
  return resolved(cgst + sgst + igst);
}

@Injectable()
export class ReconciliationService {
  /** Header rows, then line items, then summary rows. */
  check(document: InvoiceDocument, collector: ViolationCollector): void {
    for (const [rowIndex, row] of document.invoiceDetails.entries()) {
      if (this.checkHeader(row, rowIndex, collector)) return;
    }
    for (const [rowIndex, item] of document.lineItems.entries()) {
      if (this.checkLineItem(item, rowIndex, collector)) return;
    }
    for (const [rowIndex, row] of document.totalSummary.entries()) {
      if (this.checkSummary(row, rowIndex, collector)) return;
    }
  }

  /** Each row check returns true when the collector asks to stop. */
  private checkHeader(row: InvoiceHeader, rowIndex: number, collector: ViolationCollector): boolean {
    const values = allPresent(row.invoiceValue, row.taxableValue, row.taxAmount);
    if (!values) return false;

    const [invoiceValue, taxableValue, taxAmount] = values;
    if (isClose(invoiceValue, taxableValue + taxAmount)) return false;

    return this.report(collector, CollectionName.INVOICE_DETAILS, rowIndex, 'invoice-value', {
      actual: invoiceValue,
      expected: taxableValue + taxAmount,
      message: `Invoice value mismatch at row ${rowIndex}: ${invoiceValue} != ${taxableValue} + ${taxAmount}`,
    });
  }

  private checkLineItem(item: LineItem, rowIndex: number, collector: ViolationCollector): boolean {
    const base = resolveBaseValue(item);
    if (base.kind === 'not-applicable') return false;

    const estimates = taxEstimates(item, base.value);
    for (let i = 0; i < estimates.length - 1; i++) {
      if (isClose(estimates[i], estimates[i + 1])) continue;

      const stop = this.report(collector, CollectionName.LINE_ITEMS, rowIndex, 'tax-estimates', {
        actual: estimates[i],
        expected: estimates[i + 1],
        message:
          `Tax amount mismatch at row ${rowIndex}: Different tax calculations yield different results ` +
          `(${estimates[i]} != ${estimates[i + 1]})`,
      });
      if (stop) return true;
      // Collect-all mode: one mismatch per row is enough.
      break;
    }

    if (!item.finalAmount.present || estimates.length === 0) return false;

    const finalAmount = item.finalAmount.value;
    const tax = estimates[0];
    if (isClose(finalAmount, base.value + tax)) return false;

    return this.report(collector, CollectionName.LINE_ITEMS, rowIndex, 'final-amount', {
      actual: finalAmount,
      expected: base.value + tax,
      message: `Final amount mismatch at row ${rowIndex}: ${finalAmount} != ${base.value} + ${tax}`,
    });
  }

  private checkSummary(row: SummaryTotals, rowIndex: number, collector: ViolationCollector): boolean {
    const totalTax = resolveTotalTax(row);
    if (totalTax.kind === 'not-applicable') return false;

    const values = allPresent(row.totalTaxableValue, row.totalInvoiceValue);
    if (!values) return false;

    const [totalTaxableValue, totalInvoiceValue] = values;
    if (isClose(totalInvoiceValue, totalTaxableValue + totalTax.value)) return false;

    return this.report(collector, CollectionName.TOTAL_SUMMARY, rowIndex, 'total-invoice-value', {
      actual: totalInvoiceValue,
      expected: totalTaxableValue + totalTax.value,
      message:
        `Total invoice value mismatch at row ${rowIndex}: ` +
        `${totalInvoiceValue} != ${totalTaxableValue} + ${totalTax.value}`,
    });
  }

  private report(
    collector: ViolationCollector,
    collection: CollectionName,
    rowIndex: number,
    relation: ReconciliationRelation,
    mismatch: { actual: number; expected: number; message: string },
  ): boolean {
    return collector.add({
      kind: 'reconciliation-mismatch',
      collection,
      rowIndex,
      relation,
      ...mismatch,
    });
  }
}
