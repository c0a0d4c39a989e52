export * from './spreadsheet-reader.port';
export * from './template-source.port';
