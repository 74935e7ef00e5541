import { Injectable } from '@nestjs/common';
import { AppError } from '../../common/errors/app-error';
import { isRecord } from '../../common/utils/type-guards';
import { ConfigurationService } from '../../config/configuration.service';
import { CellValue } from '../../models/field';
import { RawInvoiceDocument, RawRow } from '../../models/invoice-document';

/** Top-level keys of the extraction service response. */
export const EXTRACTION_KEYS = {
  invoiceDetails: 'Invoice Details',
  lineItems: 'Line Items',
  totalSummary: 'Total Summary',
} as const;

function isCell(value: unknown): value is CellValue | null | undefined {
  return (
    value === null ||
    value === undefined ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}

/**
 * Materializes the three record collections from the extraction service's
 * JSON document. Header and summary are single objects; line items an array.
 */
@Injectable()
export class ExtractionMappingService {
  constructor(private readonly configService: ConfigurationService) {}

  toRawDocument(payload: unknown, correlationId?: string): RawInvoiceDocument {
    if (!isRecord(payload)) {
      throw AppError.validationError('Extraction document must be a JSON object', undefined, correlationId);
    }

    return {
      invoiceDetails: [this.toSingleRow(payload[EXTRACTION_KEYS.invoiceDetails], EXTRACTION_KEYS.invoiceDetails, correlationId)],
      lineItems: this.toRows(
        payload[EXTRACTION_KEYS.lineItems],
        EXTRACTION_KEYS.lineItems,
        this.configService.validation.maxLineItems,
        correlationId,
      ),
      totalSummary: [this.toSingleRow(payload[EXTRACTION_KEYS.totalSummary], EXTRACTION_KEYS.totalSummary, correlationId)],
    };
  }

  // A missing section becomes an empty row so that presence checking reports it.
  private toSingleRow(value: unknown, section: string, correlationId?: string): RawRow {
    if (value === undefined || value === null) return {};
    if (!isRecord(value)) {
      throw AppError.validationError(`"${section}" must be an object`, { field: section }, correlationId);
    }
    return this.toRow(value, section, correlationId);
  }

  // The row limit is enforced before any row is mapped.
  private toRows(value: unknown, section: string, maxRows: number, correlationId?: string): RawRow[] {
    if (value === undefined || value === null) return [];
    if (!Array.isArray(value)) {
      throw AppError.validationError(`"${section}" must be an array`, { field: section }, correlationId);
    }
    if (value.length > maxRows) {
      throw AppError.validationError(
        `"${section}" exceeds the limit of ${maxRows} rows`,
        { field: section, rows: value.length, maxLineItems: maxRows },
        correlationId,
      );
    }

    return value.map((row: unknown, index) => {
      if (!isRecord(row)) {
        throw AppError.validationError(
          `"${section}"[${index}] must be an object`,
          { field: section, index },
          correlationId,
        );
      }
      return this.toRow(row, `${section}[${index}]`, correlationId);
    });
  }

  private toRow(source: Record<string, unknown>, path: string, correlationId?: string): RawRow {
    const row: RawRow = {};
    for (const [column, value] of Object.entries(source)) {
      if (!isCell(value)) {
        throw AppError.validationError(
          `"${path}.${column}" must be a string, number, boolean or null`,
          { field: `${path}.${column}` },
          correlationId,
        );
      }
      row[column] = value;
    }
    return row;
  }
}
