// lib/forecast/index.ts
// Forecast Engine - Module Exports

export * from './types';
export * from './errors';
export * from './config';
export * from './historical';
export * from './assumption-resolver';
export * from './revenue-forecast';
export * from './cost-forecast';
export * from './income-statement';
export * from './working-capital';
export * from './ppe-schedule';
export * from './debt-schedule';
export * from './cash-budget';
export * from './balance-sheet';
export * from './balance-check';
export * from './backtest';
export * from './full-forecast-builder';
export * from './summary';
export * from './company-file';
