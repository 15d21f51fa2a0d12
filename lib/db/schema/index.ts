export * from './prices.schema';
