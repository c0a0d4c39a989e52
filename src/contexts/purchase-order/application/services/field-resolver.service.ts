import { Injectable } from '@nestjs/common';
import {
  CANONICAL_FIELDS,
  DEFAULT_LAYOUT,
  toColumnMap,
  type CanonicalField,
  type ColumnMap,
  type FieldMatch,
  type FieldOverrides,
  type FieldResolutionVO,
  type MatchPass,
  type PurchaseOrderLayout,
} from '../../domain/value-objects';
import {
  UnknownMappingHeaderException,
  UnresolvedFieldsException,
} from '../errors/purchase-order.errors';

type Matcher = (header: string, candidate: string) => boolean;

const PASSES: Array<{ pass: Exclude<MatchPass, 'manual'>; matches: Matcher }> = [
  { pass: 'exact', matches: (header, candidate) => header === candidate },
  {
    pass: 'case_insensitive',
    matches: (header, candidate) => header.toLowerCase() === candidate.toLowerCase(),
  },
  {
    pass: 'substring',
    matches: (header, candidate) => header.toLowerCase().includes(candidate.toLowerCase()),
  },
];

/**
 * Field Resolver
 *
 * Maps normalized input headers to the canonical purchase order fields:
 * - pass 1: exact match
 * - pass 2: case-insensitive match
 * - pass 3: candidate contained in header
 * Each field is resolved on its own; the first pass with a hit wins.
 */
@Injectable()
export class FieldResolverService {
  resolve(
    headers: readonly string[],
    layout: PurchaseOrderLayout = DEFAULT_LAYOUT,
  ): FieldResolutionVO {
    const matches = CANONICAL_FIELDS.map((field) =>
      this.matchField(field, headers, layout.candidates[field]),
    );
    return this.toResolution(headers, matches, layout);
  }

  /**
   * Applies explicit user choices on top of the automatic guesses
   */
  resolveWithOverrides(
    headers: readonly string[],
    overrides: FieldOverrides = {},
    layout: PurchaseOrderLayout = DEFAULT_LAYOUT,
  ): FieldResolutionVO {
    const auto = this.resolve(headers, layout);

    const matches = auto.matches.map((match): FieldMatch => {
      const override = overrides[match.field]?.trim();
      if (!override) return match;
      if (!headers.includes(override)) {
        throw new UnknownMappingHeaderException(match.field, override, [...headers]);
      }
      return { field: match.field, header: override, pass: 'manual' };
    });

    return this.toResolution(headers, matches, layout);
  }

  /**
   * Complete column map, or an UnresolvedFieldsException carrying
   * the options for the manual mapping form
   */
  requireColumnMap(resolution: FieldResolutionVO): ColumnMap {
    const columns = toColumnMap(resolution);
    if (!columns) {
      throw new UnresolvedFieldsException({
        missing: resolution.missing,
        options: resolution.headers,
        guesses: resolution.guesses,
      });
    }
    return columns;
  }

  private matchField(
    field: CanonicalField,
    headers: readonly string[],
    candidates: readonly string[],
  ): FieldMatch {
    for (const { pass, matches } of PASSES) {
      for (const candidate of candidates) {
        const header = headers.find((h) => h !== '' && matches(h, candidate));
        if (header !== undefined) {
          return { field, header, pass };
        }
      }
    }
    return { field, header: null, pass: null };
  }

  private toResolution(
    headers: readonly string[],
    matches: FieldMatch[],
    layout: PurchaseOrderLayout,
  ): FieldResolutionVO {
    const guesses: Partial<Record<CanonicalField, string>> = {};
    for (const match of matches) {
      if (match.header !== null) guesses[match.field] = match.header;
    }

    const missing = layout.requiredFields.filter((field) => guesses[field] === undefined);

    return { headers: [...headers], matches, guesses, missing };
  }
}
