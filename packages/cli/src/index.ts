export * from './libs/route-table';
