export * from './purchase-order.controller';
