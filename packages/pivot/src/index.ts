export * from './errors';
export * from './stations';
export * from './dates';
export * from './types';
export * from './ingest';
export * from './pivot';
export * from './discovery';
export * from './chart';
export * from './workbook';
export * from './pipeline';
