export * from './pager.js';
