export * from './types.js';
export * from './store.js';
export * from './schemas.js';
export * from './client.js';

// Supabase 구현
export * from './candles.js';
export * from './indicators.js';
export * from './signals.js';
export * from './assets.js';
export * from './watchlists.js';
export * from './supabase-store.js';

// 프로세스 내 구현
export * from './memory-store.js';
