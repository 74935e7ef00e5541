import {
  IsDateString,
  IsEnum,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export enum ErrorType {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  PROCESSING_ERROR = 'PROCESSING_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

export class ErrorDetailsDto {
  @ApiProperty({ enum: ErrorType, description: 'Type of error that occurred' })
  @IsEnum(ErrorType)
  type!: ErrorType;

  @ApiProperty({ description: 'Human-readable error message' })
  @IsString()
  @IsNotEmpty()
  message!: string;

  @ApiPropertyOptional({ description: 'Additional error details' })
  @IsOptional()
  details?: unknown;

  @ApiPropertyOptional({ description: 'Correlation ID for tracking' })
  @IsOptional()
  @IsString()
  correlationId?: string;

  @ApiPropertyOptional({ description: 'Field-specific validation errors' })
  @IsOptional()
  fieldErrors?: Record<string, string[]>;
}

export class ErrorResponseDto {
  @ApiProperty({ description: 'Success indicator', default: false })
  success!: false;

  @ApiProperty({ type: ErrorDetailsDto, description: 'Error information' })
  @ValidateNested()
  @Type(() => ErrorDetailsDto)
  error!: ErrorDetailsDto;

  @ApiProperty({ description: 'Response timestamp' })
  @IsDateString()
  timestamp!: string;
}

export class SuccessResponseDto<T> {
  @ApiProperty({ description: 'Success indicator', default: true })
  success!: true;

  @ApiProperty({ description: 'Response data' })
  data!: T;

  @ApiProperty({ description: 'Response timestamp' })
  @IsDateString()
  timestamp!: string;

  @ApiPropertyOptional({ description: 'Correlation ID for tracking' })
  @IsOptional()
  @IsString()
  correlationId?: string;
}
