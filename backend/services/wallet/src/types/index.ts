export * from './transaction.types';
export * from './wallet.types';
export * from './guard.types';
export * from './gateway.types';
