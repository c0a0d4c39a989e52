import type { InputRecord, ManualLineEntry } from './purchase-order-line.vo';

/**
 * Line Accumulator
 * Manually entered lines collected before a generation run.
 * The caller owns the instance and passes it to the generator explicitly.
 */
export class LineAccumulator {
  private readonly lines: ManualLineEntry[] = [];

  constructor(initial: readonly ManualLineEntry[] = []) {
    initial.forEach((entry) => this.add(entry));
  }

  /**
   * Appends a line and returns the new line count
   */
  add(entry: ManualLineEntry): number {
    if (!entry.controlNo?.trim() || !entry.itemNo?.trim()) {
      throw new Error('Control No and Item No are required for a manual line');
    }
    this.lines.push({ ...entry });
    return this.lines.length;
  }

  clear(): void {
    this.lines.length = 0;
  }

  get size(): number {
    return this.lines.length;
  }

  entries(): readonly ManualLineEntry[] {
    return [...this.lines];
  }

  toRecords(): InputRecord[] {
    return this.lines.map((line) => ({
      controlNo: line.controlNo,
      itemNo: line.itemNo,
      barcode: line.barcode ?? null,
      qty: line.qty ?? null,
      price: line.price ?? null,
      delivery: line.delivery ?? null,
    }));
  }
}
