export * from './environment';
export * from './log-levels';
