export * from './factories';
export * from './drawers';
export { componentToRecord, componentFromRecord, readComponent } from './records';
