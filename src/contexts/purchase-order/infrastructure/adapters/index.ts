export * from './exceljs-reader.adapter';
export * from './file-template-source.adapter';
