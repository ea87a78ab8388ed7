export * from './accuracy';
