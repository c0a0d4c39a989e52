/**
 * Generation Report Value Objects
 * Every best-effort sheet operation leaves a result here instead of being dropped
 */

export type SheetOperation = 'write' | 'clear' | 'delete_rows' | 'remove_sheet';

export type CellOperationResult =
  | { operation: SheetOperation; target: string; status: 'applied' }
  | { operation: SheetOperation; target: string; status: 'skipped'; reason: string };

export interface SheetReport {
  title: string;
  controlNo: string;
  itemNo: string;
  operations: CellOperationResult[];
  skippedCount: number;
}

export interface GenerationReport {
  layout: 'template' | 'generated';
  sheetTitles: string[];
  sheets: SheetReport[];
  templateRemoval: CellOperationResult | null;
  totalRecords: number;
  uniqueLines: number;
  skippedOperations: number;
}

/**
 * Runs one sheet operation and captures its failure as a skipped result
 */
export function attemptOperation(
  operation: SheetOperation,
  target: string,
  action: () => void,
): CellOperationResult {
  try {
    action();
    return { operation, target, status: 'applied' };
  } catch (error) {
    return {
      operation,
      target,
      status: 'skipped',
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}

export function countSkipped(operations: readonly CellOperationResult[]): number {
  return operations.filter((op) => op.status === 'skipped').length;
}
