import { IsArray, IsIn, IsObject, IsOptional } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { VALIDATION_MODES, ValidationMode } from '../../models/validation-result';

/**
 * Extraction service output. Cell-level checks happen in
 * ExtractionMappingService; this DTO only fixes the section shapes.
 */
export class ValidateInvoiceDto {
  @ApiPropertyOptional({
    description: 'Invoice header fields keyed by column name',
    example: { invoice_number: 'INV-001', invoice_date: '15-Mar-24', invoice_value: 118 },
  })
  @IsOptional()
  @IsObject()
  'Invoice Details'?: Record<string, unknown>;

  @ApiPropertyOptional({
    description: 'Line item rows keyed by column name',
    type: 'array',
    items: { type: 'object' },
  })
  @IsOptional()
  @IsArray()
  'Line Items'?: unknown[];

  @ApiPropertyOptional({
    description: 'Invoice totals keyed by column name',
    example: { total_taxable_value: 100, total_tax_amount: 18, total_invoice_value: 118 },
  })
  @IsOptional()
  @IsObject()
  'Total Summary'?: Record<string, unknown>;
}

export class ValidateInvoiceQueryDto {
  @ApiPropertyOptional({
    enum: [...VALIDATION_MODES],
    description: 'first stops at the first violation; all reports every violation of the failing step',
  })
  @IsOptional()
  @IsIn(VALIDATION_MODES)
  mode?: ValidationMode;
}
