export * from './purchase-order-line.vo';
export * from './purchase-order-layout.vo';
export * from './field-resolution.vo';
export * from './generation-report.vo';
export * from './line-accumulator';
