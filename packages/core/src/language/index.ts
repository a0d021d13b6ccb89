export * from './updater.js';
