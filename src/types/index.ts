export * from './candle';
export * from './smc';
export * from './execution';
