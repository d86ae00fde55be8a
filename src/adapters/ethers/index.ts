// index.ts
export { connectEthers as connect } from './provider';
export * from './provider';
