export * from './signal';
export * from './trade';
export * from './config';
export * from './chat';
