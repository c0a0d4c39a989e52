import { Inject, Injectable } from '@nestjs/common';
import {
  MANUAL_ENTRY_COLUMNS,
  type InputRecord,
  type LineAccumulator,
} from '../../domain/value-objects';
import {
  SPREADSHEET_READER_PORT,
  type ReadSheetOptions,
  type SheetTable,
  type SpreadsheetReaderPort,
} from '../ports';
import { InputAcquisitionException } from '../errors/purchase-order.errors';
import { parseCsvMatrix } from './utils/csv';
import { toUniqueHeaders } from './utils/header-normalizer';

export interface UploadedInput {
  buffer: Buffer;
  fileName: string;
}

export interface RecordSet {
  /** Sheet the records came from; null for CSV and manual entries */
  sheetName: string | null;
  sheetNames: string[];
  headers: string[];
  records: InputRecord[];
}

const EXCEL_EXTENSIONS = ['xlsx', 'xlsm'];

/**
 * Row Source
 * Turns an uploaded sheet or the manual entries into header-keyed records
 */
@Injectable()
export class RowSourceService {
  constructor(
    @Inject(SPREADSHEET_READER_PORT)
    private readonly reader: SpreadsheetReaderPort,
  ) {}

  async readUpload(input: UploadedInput, options: ReadSheetOptions = {}): Promise<RecordSet> {
    const headerRow = options.headerRow ?? 1;
    if (!Number.isInteger(headerRow) || headerRow < 1) {
      throw new InputAcquisitionException(`Header row must be a positive integer (got ${headerRow})`);
    }

    const format = this.detectFormat(input.fileName);
    let table: SheetTable;
    let sheetNames: string[] = [];

    if (format === 'csv') {
      table = this.readCsv(input.buffer, headerRow);
    } else {
      table = await this.reader.readSheet(input.buffer, { ...options, headerRow });
      sheetNames = await this.reader.getSheetNames(input.buffer);
    }

    const recordSet = this.toRecordSet(table, format === 'csv' ? null : table.sheetName, sheetNames);
    if (recordSet.records.length === 0) {
      throw new InputAcquisitionException(
        format === 'csv'
          ? 'The input file appears to be empty.'
          : `The input sheet "${table.sheetName}" appears to be empty.`,
      );
    }

    console.log(
      `[RowSource] ${input.fileName}: ${recordSet.records.length} rows, ${recordSet.headers.length} columns`,
    );
    return recordSet;
  }

  fromAccumulator(accumulator: LineAccumulator): RecordSet {
    if (accumulator.size === 0) {
      throw new InputAcquisitionException('No manual lines were entered.');
    }
    return {
      sheetName: null,
      sheetNames: [],
      headers: Object.values(MANUAL_ENTRY_COLUMNS),
      records: accumulator.toRecords(),
    };
  }

  private toRecordSet(table: SheetTable, sheetName: string | null, sheetNames: string[]): RecordSet {
    const headers = toUniqueHeaders(table.headers);
    const records = table.rows.map((values) => {
      const record: InputRecord = {};
      headers.forEach((header, idx) => {
        record[header] = values[idx] ?? null;
      });
      return record;
    });
    return { sheetName, sheetNames, headers, records };
  }

  private readCsv(buffer: Buffer, headerRow: number): SheetTable {
    const matrix = parseCsvMatrix(buffer.toString('utf-8'));
    if (headerRow > matrix.length) {
      throw new InputAcquisitionException(`The CSV file has no row ${headerRow} to read headers from`);
    }

    const headers = matrix[headerRow - 1];
    const width = Math.max(headers.length, ...matrix.slice(headerRow).map((r) => r.length));
    const rows = matrix
      .slice(headerRow)
      .filter((r) => r.some((v) => v.trim() !== ''))
      .map((r) => Array.from({ length: width }, (_, i) => r[i] ?? null));

    return {
      sheetName: 'csv',
      headers: Array.from({ length: width }, (_, i) => headers[i] ?? null),
      rows,
    };
  }

  private detectFormat(fileName: string): 'excel' | 'csv' {
    const ext = fileName.toLowerCase().split('.').pop() ?? '';
    if (EXCEL_EXTENSIONS.includes(ext)) return 'excel';
    if (ext === 'csv') return 'csv';
    throw new InputAcquisitionException(
      `Unsupported input file "${fileName}". Upload an .xlsx, .xlsm or .csv file.`,
    );
  }
}
