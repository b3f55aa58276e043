import {
  ArrayUnique,
  IsArray,
  IsBase64,
  IsIn,
  IsOptional,
  IsString,
  MaxLength,
} from 'class-validator';

import { EXPORT_FORMATS, EXTRACTION_MODES } from '../interfaces';
import type { ExportFormat, ExtractionMode } from '../interfaces';

const SUPPORTED_IMAGE_TYPES = ['image/jpeg', 'image/png'] as const;

export class ExtractInvoiceDto {
  @IsBase64()
  buffer!: string;

  @IsString()
  filename!: string;

  @IsIn(SUPPORTED_IMAGE_TYPES, { message: 'Only JPEG and PNG invoice images are supported' })
  mimetype!: string;

  @IsIn(EXTRACTION_MODES)
  mode!: ExtractionMode;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  question?: string;

  @IsOptional()
  @IsArray()
  @ArrayUnique()
  @IsIn(EXPORT_FORMATS, { each: true })
  formats?: ExportFormat[];
}
