// Types
export * from './types.js';
export * from './enums.js';

// Candles
export * from './candle.js';

// Indicators
export * from './indicators/ma.js';
export * from './indicators/rsi.js';
export * from './indicators/macd.js';
export * from './indicators/bollinger.js';
export * from './indicators/volume.js';
export * from './indicators/catalog.js';
export * from './atr/calculator.js';

// Signals
export * from './signals/scoring.js';
export * from './signals/summary.js';

// Performance
export * from './performance/change.js';
