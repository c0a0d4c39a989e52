import {
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  Transform,
  Type,
  plainToInstance,
  type ClassConstructor,
  type TransformFnParams,
} from 'class-transformer';
import type { SheetLayoutMode } from '../../../application/services';

const LAYOUT_MODES: SheetLayoutMode[] = ['template', 'generated'];

/**
 * Multipart fields arrive as JSON strings. Parsed values are turned into
 * DTO instances here since @Type has already run on the raw string.
 */
function parseJsonAs<T>(cls: ClassConstructor<T>) {
  return ({ value }: TransformFnParams): unknown => {
    if (typeof value !== 'string') return value;
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      return value;
    }
    return typeof parsed === 'object' && parsed !== null ? plainToInstance(cls, parsed) : parsed;
  };
}

function toOptionalInt({ value }: TransformFnParams): unknown {
  if (value === undefined || value === null || value === '') return undefined;
  return typeof value === 'string' ? Number(value) : value;
}

function toOptionalBoolean({ value }: TransformFnParams): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === '') return undefined;
  return value;
}

function toOptionalText({ value }: TransformFnParams): unknown {
  if (typeof value === 'number') return String(value);
  return value;
}

/**
 * Explicit header choice per canonical field
 */
export class FieldMappingDto {
  @IsOptional()
  @IsString()
  controlNo?: string;

  @IsOptional()
  @IsString()
  itemNo?: string;

  @IsOptional()
  @IsString()
  barcode?: string;

  @IsOptional()
  @IsString()
  qty?: string;

  @IsOptional()
  @IsString()
  price?: string;

  @IsOptional()
  @IsString()
  delivery?: string;
}

export class AnalyzeUploadDto {
  @IsOptional()
  @IsString()
  sheetName?: string;

  @IsOptional()
  @Transform(toOptionalInt)
  @IsInt()
  @Min(1)
  headerRow?: number;

  @IsOptional()
  @Transform(parseJsonAs(FieldMappingDto))
  @ValidateNested()
  @Type(() => FieldMappingDto)
  mapping?: FieldMappingDto;
}

class TemplateOptionsDto {
  @IsOptional()
  @IsString()
  templateSheet?: string;

  @IsOptional()
  @Transform(toOptionalBoolean)
  @IsBoolean()
  removeTemplateSheet?: boolean;

  @IsOptional()
  @IsIn(LAYOUT_MODES)
  layout?: SheetLayoutMode;
}

export class GenerateFromUploadDto extends TemplateOptionsDto {
  @IsOptional()
  @IsString()
  sheetName?: string;

  @IsOptional()
  @Transform(toOptionalInt)
  @IsInt()
  @Min(1)
  headerRow?: number;

  @IsOptional()
  @Transform(parseJsonAs(FieldMappingDto))
  @ValidateNested()
  @Type(() => FieldMappingDto)
  mapping?: FieldMappingDto;
}

export class ManualLineDto {
  @Transform(toOptionalText)
  @IsString()
  @IsNotEmpty()
  controlNo!: string;

  @Transform(toOptionalText)
  @IsString()
  @IsNotEmpty()
  itemNo!: string;

  @IsOptional()
  @Transform(toOptionalText)
  @IsString()
  barcode?: string;

  @IsOptional()
  @Transform(toOptionalText)
  @IsString()
  qty?: string;

  @IsOptional()
  @Transform(toOptionalText)
  @IsString()
  price?: string;

  @IsOptional()
  @Transform(toOptionalText)
  @IsString()
  delivery?: string;
}

export class GenerateFromManualDto extends TemplateOptionsDto {
  @Transform(parseJsonAs(ManualLineDto))
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => ManualLineDto)
  lines!: ManualLineDto[];
}
