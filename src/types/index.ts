export * from './common';
export * from './calendar';
export * from './workItem';
