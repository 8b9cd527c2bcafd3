// Re-export all protocol types

export * from './entities.js';
export * from './components.js';
