export * from './payload';
export * from './record-fields';
