import {
  BadRequestException,
  UnprocessableEntityException,
} from '@nestjs/common';
import type { CanonicalField } from '../../domain/value-objects';

/**
 * Input file or manual entries could not be turned into records.
 * Fatal to the run.
 */
export class InputAcquisitionException extends BadRequestException {
  constructor(message: string) {
    super({ error: 'input_acquisition_failed', message });
  }
}

/**
 * Template workbook missing, unreadable, or without the requested sheet.
 * Fatal to the run.
 */
export class TemplateLoadException extends BadRequestException {
  constructor(message: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super({ error: 'template_load_failed', message: `${message}${detail}` }, { cause });
  }
}

export interface UnresolvedFieldsPayload {
  missing: CanonicalField[];
  /** Every header the user may pick from */
  options: string[];
  /** Partial matches to pre-select in the mapping form */
  guesses: Partial<Record<CanonicalField, string>>;
}

/**
 * Required fields have no column yet. The run is blocked until
 * the caller supplies an explicit mapping for each of them.
 */
export class UnresolvedFieldsException extends UnprocessableEntityException {
  constructor(readonly payload: UnresolvedFieldsPayload) {
    super({
      error: 'unresolved_fields',
      message: `Map these fields manually: ${payload.missing.join(', ')}`,
      ...payload,
    });
  }
}

export class UnknownMappingHeaderException extends BadRequestException {
  constructor(field: CanonicalField, header: string, options: string[]) {
    super({
      error: 'unknown_mapping_header',
      message: `Column "${header}" for ${field} does not exist in the input`,
      options,
    });
  }
}
