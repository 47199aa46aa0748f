export * from './source-id';
export * from './metadata';
export * from './ports';
