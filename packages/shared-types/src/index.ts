export * from './workshop';
export * from './settings';
export * from './logs';
