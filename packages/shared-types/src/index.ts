export * from './functions';
export * from './quandl-api';
