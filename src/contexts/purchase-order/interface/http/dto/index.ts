export * from './purchase-order.dto';
