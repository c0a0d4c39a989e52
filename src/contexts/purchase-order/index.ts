export * from './purchase-order.module';
export * from './domain/value-objects';
export * from './application/services';
