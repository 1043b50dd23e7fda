export * from './templates';
export * from './catalog';
