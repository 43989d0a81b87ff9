export * from './matrix';
export * from './env';
