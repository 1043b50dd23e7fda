export * from './frame';
export * from './project';
